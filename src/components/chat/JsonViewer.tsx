import React from 'react';
import * as monaco from 'monaco-editor';
import Editor, { loader } from '@monaco-editor/react';
import type { RawExchange } from '../../types';

// Use the bundled editor instead of the loader's default CDN copy
loader.config({ monaco });

/** What the viewer shows: the prompt is summarised, the reply kept verbatim */
export function describeExchange(exchange: RawExchange): string {
  const { prompt, ...request } = exchange.request;
  return JSON.stringify({ request: { ...request, prompt: `${prompt.length} chars` }, response: exchange.response }, null, 2);
}

export const JsonViewer: React.FC<{ data: RawExchange }> = ({ data }) => (
  <div className="json-viewer">
    <Editor
      height="300px"
      language="json"
      theme="vs-dark"
      value={describeExchange(data)}
      options={{ readOnly: true, minimap: { enabled: false }, lineNumbers: 'off', wordWrap: 'on' }}
    />
  </div>
);
