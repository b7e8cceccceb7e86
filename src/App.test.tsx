// @vitest-environment jsdom
import './test/setupDom';
import React from 'react';
import { beforeEach, describe, expect, it } from 'vitest';
import { fireEvent, render, screen } from '@testing-library/react';
import App from './App';
import { DEFAULT_RUN_LOG_URL, type AppConfig } from './config';
import { InferenceClient } from './services/InferenceClient';
import { LogClient } from './services/LogClient';
import { fakeEndpoint, jsonReply, type FakeReply } from './test/fakeEndpoint';

const config: AppConfig = {
  endpoint: 'http://localhost:11434/api/generate',
  runLog: { url: DEFAULT_RUN_LOG_URL },
};

function clientAnswering(reply: FakeReply) {
  const endpoint = fakeEndpoint(() => reply);
  const client = new InferenceClient({ http: endpoint.http, logger: new LogClient({ console: false }) });
  return { endpoint, client };
}

function send(prompt: string) {
  const box = screen.getByPlaceholderText('What is up?');
  fireEvent.change(box, { target: { value: prompt } });
  fireEvent.keyDown(box, { key: 'Enter', code: 'Enter', keyCode: 13 });
}

describe('App', () => {
  beforeEach(() => {
    localStorage.clear();
  });

  it('shows the reply and its timing after a prompt', async () => {
    const { endpoint, client } = clientAnswering(jsonReply({ response: 'hi there' }, { 'x-process-time': '1500' }));
    render(<App config={config} client={client} />);

    send('hello');

    expect(await screen.findByText('hi there')).toBeTruthy();
    expect(screen.getByText('hello')).toBeTruthy();
    expect(screen.getByText(/^inference: 1\.500s • rtt: \d+\.\d{3}s • network: \d+\.\d{3}s$/)).toBeTruthy();
    expect(endpoint.requests[0].body).toEqual({ model: 'mistral', prompt: 'user: hello', n_predict: 50, stream: false });
  });

  it('reports endpoint failures in the conversation', async () => {
    const { client } = clientAnswering({ status: 502, body: 'bad gateway' });
    render(<App config={config} client={client} />);

    send('hello');

    expect(await screen.findByText('Error: HTTP 502 from inference endpoint')).toBeTruthy();
  });

  it('uses the persisted model name', async () => {
    localStorage.setItem('localdev-assistant:model', 'llama3');
    const { endpoint, client } = clientAnswering(jsonReply({ response: 'ok' }));
    render(<App config={config} client={client} />);

    send('hello');

    await screen.findByText('ok');
    expect(endpoint.requests[0].body).toMatchObject({ model: 'llama3' });
  });

  it.each([
    ['5000', 2048],
    ['0', 1],
  ])('keeps a stored n_predict of %s inside the allowed range', async (stored, sent) => {
    localStorage.setItem('localdev-assistant:n-predict', stored);
    const { endpoint, client } = clientAnswering(jsonReply({ response: 'ok' }));
    render(<App config={config} client={client} />);

    send('hi');

    await screen.findByText('ok');
    expect(endpoint.requests[0].body).toMatchObject({ n_predict: sent });
  });

  it('disables chat without an endpoint', () => {
    render(<App config={{ runLog: { url: DEFAULT_RUN_LOG_URL } }} />);

    expect(screen.getByText('Inference endpoint not configured')).toBeTruthy();
    expect(
      screen.getByPlaceholderText('Chat is unavailable until an endpoint is configured')
    ).toHaveProperty('disabled', true);
  });
});
