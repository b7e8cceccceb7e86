import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import type { InferenceResult } from '../types';
import { ExpiringCache } from './ExpiringCache';
import { TransportError } from './errors';
import { logClient, type LogClient } from './LogClient';
import { extractText } from './ResponseTextExtractor';

export const REQUEST_TIMEOUT_MS = 30_000;
export const CACHE_TTL_MS = 60 * 60 * 1000;

/** Body of an Ollama-style /api/generate request */
export interface GenerateRequest {
  model: string;
  prompt: string;
  n_predict: number;
  stream: false;
}

export interface InferenceClientOptions {
  http?: AxiosInstance;
  timeoutMs?: number;
  cacheTtlMs?: number;
  now?: () => number;
  logger?: LogClient;
}

function flattenHeaders(headers: AxiosResponse['headers']): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [name, value] of Object.entries<unknown>(headers)) {
    if (Array.isArray(value)) {
      flat[name.toLowerCase()] = value.join(', ');
    } else if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      flat[name.toLowerCase()] = String(value);
    }
  }
  return flat;
}

function describeFailure(error: unknown, timeoutMs: number): TransportError {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status !== undefined) {
      return new TransportError(`HTTP ${status} from inference endpoint`, { cause: error, status });
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new TransportError(`inference endpoint timed out after ${timeoutMs / 1000}s`, { cause: error });
    }
    return new TransportError(error.message, { cause: error });
  }
  return new TransportError(error instanceof Error ? error.message : String(error), { cause: error });
}

/**
 * Calls a locally hosted text-generation endpoint, one POST per turn.
 * Identical (prompt, model, n_predict, endpoint) calls within the cache TTL
 * return the earlier result without touching the network.
 */
export class InferenceClient {
  private readonly http: AxiosInstance;
  private readonly timeoutMs: number;
  private readonly cache: ExpiringCache<InferenceResult>;
  private readonly logger: LogClient;

  constructor(options: InferenceClientOptions = {}) {
    this.http = options.http ?? axios.create();
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.cache = new ExpiringCache({ ttlMs: options.cacheTtlMs ?? CACHE_TTL_MS, now: options.now });
    this.logger = options.logger ?? logClient;

    this.http.interceptors.request.use((req) => {
      this.logger.debug('inference', 'request', { method: req.method, url: req.url });
      return req;
    });

    this.http.interceptors.response.use(
      (res) => {
        this.logger.debug('inference', 'response', {
          status: res.status,
          url: res.config.url,
          contentType: res.headers['content-type'],
        });
        return res;
      },
      (error: unknown) => {
        this.logger.error('inference', 'request failed', {
          status: axios.isAxiosError(error) ? error.response?.status : undefined,
          message: error instanceof Error ? error.message : String(error),
        });
        throw error;
      }
    );
  }

  async call(prompt: string, model: string, maxTokens: number, endpoint: string): Promise<InferenceResult> {
    const key = JSON.stringify([prompt, model, maxTokens, endpoint]);
    const cached = this.cache.get(key);
    if (cached) {
      this.logger.debug('inference', 'cache hit', { model, endpoint });
      return cached;
    }

    const payload: GenerateRequest = {
      model,
      prompt,
      n_predict: Math.trunc(maxTokens),
      stream: false,
    };

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.post<unknown>(endpoint, payload, {
        timeout: this.timeoutMs,
        headers: { 'Content-Type': 'application/json' },
        responseType: 'text',
        // Keep the raw body; parsing depends on the declared content type
        transformResponse: [(data: unknown) => data],
      });
    } catch (error) {
      throw describeFailure(error, this.timeoutMs);
    }

    const result = this.toResult(response);
    this.cache.set(key, result);
    return result;
  }

  private toResult(response: AxiosResponse<unknown>): InferenceResult {
    const headers = flattenHeaders(response.headers);
    const text = typeof response.data === 'string' ? response.data : String(response.data ?? '');
    const contentType = headers['content-type'] ?? '';

    if (contentType.includes('application/json')) {
      try {
        const body: unknown = JSON.parse(text);
        return { content: extractText(body), rawBody: body, headers };
      } catch {
        this.logger.warn('inference', 'response declared JSON but did not parse; using raw text');
      }
    }

    return { content: text, headers };
  }

  clearCache(): void {
    this.cache.clear();
  }
}
