export type ChatRole = 'user' | 'assistant';

export interface MessageTiming {
  latencySeconds: number;
  inferenceSeconds?: number;
  networkSeconds?: number;
}

export interface ChatMessage {
  id: string;
  role: ChatRole;
  content: string;
  timestamp: number;
  meta?: MessageTiming;
  isError?: boolean;
  rawExchange?: RawExchange;
}

export interface RawExchange {
  request: {
    model: string;
    prompt: string;
    n_predict: number;
    stream: false;
  };
  response: {
    body: unknown;
    headers: Record<string, string>;
  };
}

export interface InferenceResult {
  readonly content: string;
  readonly rawBody?: unknown;
  readonly headers: Readonly<Record<string, string>>;
}

export interface AnalyticsRecord {
  /** epoch seconds */
  timestamp: number;
  latencySeconds?: number;
  inferenceSeconds?: number;
  networkSeconds?: number;
  error?: string;
}

export interface RunLogRecord {
  /** epoch seconds */
  time: number;
  statusCode?: number;
  ok?: boolean;
  error?: string;
}

export interface AnalyticsSummary {
  count: number;
  errors: number;
  lastLatency?: number;
  avgLatency?: number;
  avgInference?: number;
  avgNetwork?: number;
}

export interface TurnSettings {
  model: string;
  maxTokens: number;
  analyticsEnabled: boolean;
  runLoggingEnabled: boolean;
}
