import { describe, expect, it } from 'vitest';
import { DEFAULT_RUN_LOG_URL, loadConfig } from './config';

describe('loadConfig', () => {
  it('reads the endpoint and run-logging settings', () => {
    const config = loadConfig({
      OLLAMA_ENDPOINT: 'http://localhost:11434/api/generate',
      LANGSMITH_API_KEY: 'test-secret',
      LANGSMITH_PROJECT: 'localdev',
    });

    expect(config).toEqual({
      endpoint: 'http://localhost:11434/api/generate',
      runLog: { apiKey: 'test-secret', url: DEFAULT_RUN_LOG_URL, project: 'localdev' },
      appUrl: undefined,
    });
  });

  it('treats a blank endpoint as missing', () => {
    expect(loadConfig({ OLLAMA_ENDPOINT: '   ' }).endpoint).toBeUndefined();
  });

  it('adds a scheme to bare app hosts', () => {
    expect(loadConfig({ VERCEL_URL: 'assistant.example.test' }).appUrl).toBe('https://assistant.example.test');
    expect(loadConfig({ APP_URL: 'http://localhost:8080', VERCEL_URL: 'ignored.test' }).appUrl).toBe('http://localhost:8080');
  });

  it('lets the run-logging url be overridden', () => {
    expect(loadConfig({ LANGSMITH_URL: 'http://runs.test/v1/runs' }).runLog.url).toBe('http://runs.test/v1/runs');
  });
});
