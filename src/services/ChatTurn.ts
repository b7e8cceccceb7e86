import type { AppConfig } from '../config';
import type { ChatMessage, InferenceResult, TurnSettings } from '../types';
import { AnalyticsRing, epochSeconds } from './AnalyticsRing';
import { ChatSession } from './ChatSession';
import { describeError } from './errors';
import type { InferenceClient } from './InferenceClient';
import { estimateInferenceSeconds, networkSeconds } from './InferenceTimeEstimator';
import { logClient, type LogClient } from './LogClient';
import type { RunLogger } from './RunLogger';

/** Everything one interactive session owns. Handlers get it passed in. */
export interface SessionContext {
  chat: ChatSession;
  analytics: AnalyticsRing;
}

export interface TurnDeps {
  client: Pick<InferenceClient, 'call'>;
  endpoint: string;
  runLogger?: Pick<RunLogger, 'send'>;
  appUrl?: AppConfig['appUrl'];
  logger?: LogClient;
  /** Monotonic clock in milliseconds, used for latency */
  clock?: () => number;
}

export type TurnOutcome =
  | { ok: true; message: ChatMessage }
  | { ok: false; message: ChatMessage; error: string };

export function createSessionContext(): SessionContext {
  return { chat: new ChatSession(), analytics: new AnalyticsRing() };
}

/**
 * One user turn: append the prompt, send the whole history to the model,
 * record timing, append the answer. Failures become an inline error message
 * and an error record; nothing is retried and nothing is thrown.
 */
export async function runChatTurn(
  context: SessionContext,
  deps: TurnDeps,
  settings: TurnSettings,
  prompt: string
): Promise<TurnOutcome> {
  const { chat, analytics } = context;
  const logger = deps.logger ?? logClient;
  const clock = deps.clock ?? (() => performance.now());

  chat.append('user', prompt);
  const promptText = chat.renderContext();
  logger.info('chat', 'User message', { length: prompt.length, model: settings.model });

  const started = clock();
  let result: InferenceResult;
  try {
    result = await deps.client.call(promptText, settings.model, settings.maxTokens, deps.endpoint);
  } catch (error) {
    const reason = describeError(error);
    analytics.record({ timestamp: epochSeconds(), error: reason });
    logger.error('chat', 'Turn failed', { error: reason });
    const message = chat.append('assistant', `Error: ${reason}`, { isError: true });
    return { ok: false, message, error: reason };
  }
  const latency = (clock() - started) / 1000;

  const inference = settings.analyticsEnabled
    ? estimateInferenceSeconds(result.headers, result.rawBody)
    : undefined;
  const network = networkSeconds(latency, inference);

  if (settings.analyticsEnabled) {
    analytics.record({
      timestamp: epochSeconds(),
      latencySeconds: latency,
      inferenceSeconds: inference,
      networkSeconds: network,
    });
  }

  const message = chat.append('assistant', result.content, {
    meta: { latencySeconds: latency, inferenceSeconds: inference, networkSeconds: network },
    rawExchange: {
      request: { model: settings.model, prompt: promptText, n_predict: settings.maxTokens, stream: false },
      response: { body: result.rawBody, headers: { ...result.headers } },
    },
  });
  logger.info('chat', 'Assistant response', { latency, inference, network });

  if (settings.runLoggingEnabled && deps.runLogger) {
    const outcome = await deps.runLogger.send({
      prompt: promptText,
      model: settings.model,
      maxTokens: settings.maxTokens,
      text: result.content,
      latencySeconds: latency,
      inferenceSeconds: inference,
      networkSeconds: network,
      appUrl: deps.appUrl,
    });
    analytics.recordRunLog(outcome);
  }

  return { ok: true, message };
}
