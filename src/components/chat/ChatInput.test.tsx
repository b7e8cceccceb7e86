// @vitest-environment jsdom
import '../../test/setupDom';
import React from 'react';
import { describe, expect, it, vi } from 'vitest';
import { fireEvent, render, screen } from '@testing-library/react';
import { ChatInput } from './ChatInput';

describe('ChatInput', () => {
  it('submits the trimmed prompt on Enter and clears the draft', () => {
    const onSubmit = vi.fn();
    render(<ChatInput onSubmit={onSubmit} onClear={vi.fn()} />);
    const box = screen.getByPlaceholderText('What is up?');

    fireEvent.change(box, { target: { value: '  hello  ' } });
    fireEvent.keyDown(box, { key: 'Enter', code: 'Enter', keyCode: 13 });

    expect(onSubmit).toHaveBeenCalledWith('hello');
    expect(box).toHaveProperty('value', '');
  });

  it('keeps Shift+Enter as a newline', () => {
    const onSubmit = vi.fn();
    render(<ChatInput onSubmit={onSubmit} onClear={vi.fn()} />);
    const box = screen.getByPlaceholderText('What is up?');

    fireEvent.change(box, { target: { value: 'line one' } });
    fireEvent.keyDown(box, { key: 'Enter', code: 'Enter', keyCode: 13, shiftKey: true });

    expect(onSubmit).not.toHaveBeenCalled();
  });

  it('ignores blank prompts', () => {
    const onSubmit = vi.fn();
    render(<ChatInput onSubmit={onSubmit} onClear={vi.fn()} />);

    expect(screen.getByRole('button', { name: 'Send' })).toHaveProperty('disabled', true);
    fireEvent.keyDown(screen.getByPlaceholderText('What is up?'), { key: 'Enter', code: 'Enter', keyCode: 13 });
    expect(onSubmit).not.toHaveBeenCalled();
  });

  it('is disabled without an endpoint', () => {
    render(<ChatInput onSubmit={vi.fn()} onClear={vi.fn()} unavailable />);

    expect(screen.getByPlaceholderText('Chat is unavailable until an endpoint is configured')).toHaveProperty('disabled', true);
  });
});
