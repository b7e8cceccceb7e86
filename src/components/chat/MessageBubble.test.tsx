// @vitest-environment jsdom
import '../../test/setupDom';
import React from 'react';
import { describe, expect, it } from 'vitest';
import { render, screen } from '@testing-library/react';
import { MessageBubble } from './MessageBubble';
import type { ChatMessage } from '../../types';

const answer: ChatMessage = {
  id: 'assistant-2',
  role: 'assistant',
  content: 'hi there',
  timestamp: 0,
  meta: { latencySeconds: 1.2, inferenceSeconds: 0.9, networkSeconds: 0.3 },
};

describe('MessageBubble', () => {
  it('renders the assistant reply with its timing caption', () => {
    render(<MessageBubble message={answer} />);

    expect(screen.getByText('hi there')).toBeTruthy();
    expect(screen.getByText('inference: 0.900s • rtt: 1.200s • network: 0.300s')).toBeTruthy();
  });

  it('hides timing when analytics display is off', () => {
    render(<MessageBubble message={answer} showTiming={false} />);

    expect(screen.queryByText(/rtt:/)).toBeNull();
  });

  it('marks failed turns as errors', () => {
    const failed: ChatMessage = {
      id: 'assistant-4',
      role: 'assistant',
      content: 'Error: HTTP 502 from inference endpoint',
      timestamp: 0,
      isError: true,
    };
    const { container } = render(<MessageBubble message={failed} />);

    expect(screen.getByText('Error: HTTP 502 from inference endpoint')).toBeTruthy();
    expect(container.querySelector('.message-bubble.assistant.error')).not.toBeNull();
  });

  it('offers the raw JSON only when a body was parsed', () => {
    const withBody: ChatMessage = {
      ...answer,
      rawExchange: {
        request: { model: 'mistral', prompt: 'user: hello', n_predict: 50, stream: false },
        response: { body: { response: 'hi there' }, headers: {} },
      },
    };
    const { rerender } = render(<MessageBubble message={withBody} />);
    expect(screen.getByRole('button', { name: /Show JSON/ })).toBeTruthy();

    rerender(<MessageBubble message={answer} />);
    expect(screen.queryByRole('button', { name: /Show JSON/ })).toBeNull();
  });
});
