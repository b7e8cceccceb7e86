import axios, { type AxiosInstance } from 'axios';
import type { RunLogConfig } from '../config';
import type { RunLogRecord } from '../types';
import { epochSeconds } from './AnalyticsRing';
import { describeError } from './errors';
import { logClient, type LogClient } from './LogClient';

export const RUN_LOG_TIMEOUT_MS = 5_000;
export const RUN_NAME = 'localdev-chat-run';
export const RUN_TAGS = ['localdev-assistant', 'ollama'];

export interface ChatRun {
  prompt: string;
  model: string;
  maxTokens: number;
  text: string;
  latencySeconds: number;
  inferenceSeconds?: number;
  networkSeconds?: number;
  appUrl?: string;
}

/** Wire shape accepted by the run-logging endpoint */
export interface RunPayload {
  name: string;
  project: string | null;
  inputs: { prompt: string; model: string; n_predict: number };
  outputs: { text: string };
  metrics: { latency: number; inference_time: number | null; network_time: number | null };
  tags: string[];
  metadata: { app_url: string | null };
}

export function toRunPayload(run: ChatRun, project?: string): RunPayload {
  return {
    name: RUN_NAME,
    project: project ?? null,
    inputs: { prompt: run.prompt, model: run.model, n_predict: Math.trunc(run.maxTokens) },
    outputs: { text: run.text },
    metrics: {
      latency: run.latencySeconds,
      inference_time: run.inferenceSeconds ?? null,
      network_time: run.networkSeconds ?? null,
    },
    tags: RUN_TAGS,
    metadata: { app_url: run.appUrl ?? null },
  };
}

/**
 * Posts finished chat runs to an external run-logging service.
 * Never throws: the outcome comes back as a RunLogRecord for the local analytics log.
 */
export class RunLogger {
  private readonly http: AxiosInstance;

  constructor(
    private readonly config: RunLogConfig & { apiKey: string },
    http?: AxiosInstance,
    private readonly logger: LogClient = logClient
  ) {
    this.http = http ?? axios.create();
  }

  async send(run: ChatRun): Promise<RunLogRecord> {
    try {
      const res = await this.http.post(this.config.url, toRunPayload(run, this.config.project), {
        timeout: RUN_LOG_TIMEOUT_MS,
        headers: {
          Authorization: `Bearer ${this.config.apiKey}`,
          'Content-Type': 'application/json',
        },
        // The status is recorded, not raised
        validateStatus: () => true,
      });
      // Anything below 400 counts as delivered, redirects included
      const ok = res.status < 400;
      this.logger.debug('runlog', 'run logged', { status: res.status, ok });
      return { time: epochSeconds(), statusCode: res.status, ok };
    } catch (error) {
      this.logger.warn('runlog', 'run logging failed', { error: describeError(error) });
      return { time: epochSeconds(), error: describeError(error) };
    }
  }
}

export function createRunLogger(config: RunLogConfig, http?: AxiosInstance): RunLogger | undefined {
  const { apiKey } = config;
  return apiKey ? new RunLogger({ ...config, apiKey }, http) : undefined;
}
