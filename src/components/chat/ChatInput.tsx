import React, { useState } from 'react';
import { Input, Button, Space, Tooltip } from 'antd';
import { SendOutlined, ClearOutlined } from '@ant-design/icons';

const { TextArea } = Input;

interface ChatInputProps {
  onSubmit: (prompt: string) => void;
  onClear: () => void;
  /** No endpoint configured */
  unavailable?: boolean;
  /** A turn is in flight */
  busy?: boolean;
}

export const ChatInput: React.FC<ChatInputProps> = ({
  onSubmit,
  onClear,
  unavailable = false,
  busy = false,
}) => {
  const [draft, setDraft] = useState('');
  const prompt = draft.trim();
  const canSend = !unavailable && !busy && prompt.length > 0;

  const submit = () => {
    if (!canSend) return;
    onSubmit(prompt);
    setDraft('');
  };

  return (
    <div className="input-area">
      <Space.Compact style={{ width: '100%' }}>
        <TextArea
          value={draft}
          onChange={(e) => setDraft(e.target.value)}
          onPressEnter={(e) => {
            // Shift+Enter keeps the newline
            if (e.shiftKey) return;
            e.preventDefault();
            submit();
          }}
          placeholder={unavailable ? 'Chat is unavailable until an endpoint is configured' : 'What is up?'}
          disabled={unavailable || busy}
          autoSize={{ minRows: 1, maxRows: 6 }}
          style={{ flex: 1 }}
        />
        <Button
          type="primary"
          icon={<SendOutlined />}
          onClick={submit}
          disabled={!canSend}
          loading={busy}
          aria-label="Send"
        />
        <Tooltip title="Clear conversation">
          <Button
            icon={<ClearOutlined />}
            onClick={onClear}
            disabled={unavailable || busy}
            aria-label="Clear conversation"
          />
        </Tooltip>
      </Space.Compact>
    </div>
  );
};
