// Runtime configuration. In the browser bundle these values are baked in by
// webpack's DefinePlugin from the build environment (see webpack.config.js);
// nothing here is ever entered through the UI.

export type EnvSource = Readonly<Record<string, string | undefined>>;

export const DEFAULT_RUN_LOG_URL = 'https://api.langsmith.ai/v1/runs';

export interface RunLogConfig {
  apiKey?: string;
  url: string;
  project?: string;
}

export interface AppConfig {
  /** Text-generation endpoint; chat is disabled without it */
  endpoint?: string;
  runLog: RunLogConfig;
  /** Externally announced URL of this app, shown in the header */
  appUrl?: string;
}

function nonBlank(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

// Hosting platforms like Vercel expose the host without a scheme
function normalizeAppUrl(value: string | undefined): string | undefined {
  const url = nonBlank(value);
  if (!url) return undefined;
  return url.startsWith('http') ? url : `https://${url}`;
}

export function loadConfig(env: EnvSource = process.env): AppConfig {
  return {
    endpoint: nonBlank(env.OLLAMA_ENDPOINT),
    runLog: {
      apiKey: nonBlank(env.LANGSMITH_API_KEY),
      url: nonBlank(env.LANGSMITH_URL) ?? DEFAULT_RUN_LOG_URL,
      project: nonBlank(env.LANGSMITH_PROJECT),
    },
    appUrl: normalizeAppUrl(env.APP_URL) ?? normalizeAppUrl(env.VERCEL_URL),
  };
}
