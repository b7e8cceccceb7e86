import { describe, expect, it, vi } from 'vitest';
import * as monaco from 'monaco-editor';
import { loader } from '@monaco-editor/react';
import { describeExchange } from './JsonViewer';

vi.mock('monaco-editor', () => ({ editor: {} }));
vi.mock('@monaco-editor/react', () => ({ default: () => null, loader: { config: vi.fn() } }));

describe('JsonViewer', () => {
  it('points the editor loader at the bundled monaco', () => {
    expect(loader.config).toHaveBeenCalledWith({ monaco });
  });

  it('summarises the prompt and keeps the reply verbatim', () => {
    const shown = describeExchange({
      request: { model: 'mistral', prompt: 'user: hello', n_predict: 50, stream: false },
      response: { body: { response: 'hi there' }, headers: { 'content-type': 'application/json' } },
    });

    expect(JSON.parse(shown)).toEqual({
      request: { model: 'mistral', prompt: '11 chars', n_predict: 50, stream: false },
      response: { body: { response: 'hi there' }, headers: { 'content-type': 'application/json' } },
    });
  });
});
