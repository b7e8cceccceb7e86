import { describe, expect, it } from 'vitest';
import { fakeEndpoint } from '../test/fakeEndpoint';
import { LogClient } from './LogClient';
import { createRunLogger, RunLogger, type ChatRun } from './RunLogger';

const RUNS_URL = 'http://runs.test/v1/runs';
const quietLogger = new LogClient({ console: false });

const run: ChatRun = {
  prompt: 'user: hello',
  model: 'mistral',
  maxTokens: 50,
  text: 'hi there',
  latencySeconds: 1.2,
  inferenceSeconds: 0.9,
  networkSeconds: 0.3,
  appUrl: 'https://assistant.example.test',
};

describe('RunLogger', () => {
  it('posts the run with a bearer token and reports the status', async () => {
    const endpoint = fakeEndpoint(() => ({ status: 201 }));
    const logger = new RunLogger({ apiKey: 'test-secret', url: RUNS_URL, project: 'demo' }, endpoint.http, quietLogger);

    const outcome = await logger.send(run);

    expect(outcome).toMatchObject({ statusCode: 201, ok: true });
    const [request] = endpoint.requests;
    expect(request.url).toBe(RUNS_URL);
    expect(request.timeout).toBe(5_000);
    expect(request.headers.get('Authorization')).toBe('Bearer test-secret');
    expect(request.body).toEqual({
      name: 'localdev-chat-run',
      project: 'demo',
      inputs: { prompt: 'user: hello', model: 'mistral', n_predict: 50 },
      outputs: { text: 'hi there' },
      metrics: { latency: 1.2, inference_time: 0.9, network_time: 0.3 },
      tags: ['localdev-assistant', 'ollama'],
      metadata: { app_url: 'https://assistant.example.test' },
    });
  });

  it('counts redirects as delivered', async () => {
    const endpoint = fakeEndpoint(() => ({ status: 302 }));
    const logger = new RunLogger({ apiKey: 'test-secret', url: RUNS_URL }, endpoint.http, quietLogger);

    await expect(logger.send(run)).resolves.toMatchObject({ statusCode: 302, ok: true });
  });

  it('records error statuses without throwing', async () => {
    const endpoint = fakeEndpoint(() => ({ status: 401 }));
    const logger = new RunLogger({ apiKey: 'test-secret', url: RUNS_URL }, endpoint.http, quietLogger);

    await expect(logger.send(run)).resolves.toMatchObject({ statusCode: 401, ok: false });
  });

  it('swallows network failures into the record', async () => {
    const endpoint = fakeEndpoint(() => ({ failure: 'refused' }));
    const logger = new RunLogger({ apiKey: 'test-secret', url: RUNS_URL }, endpoint.http, quietLogger);

    const outcome = await logger.send(run);

    expect(outcome.error).toBe('connect ECONNREFUSED 127.0.0.1:11434');
    expect(outcome.statusCode).toBeUndefined();
  });

  it('is only created when an api key is configured', () => {
    expect(createRunLogger({ url: RUNS_URL })).toBeUndefined();
    expect(createRunLogger({ url: RUNS_URL, apiKey: 'test-secret' })).toBeInstanceOf(RunLogger);
  });
});
