import React, { useRef, useEffect } from 'react';
import { Card, Typography, Spin } from 'antd';
import { RobotOutlined } from '@ant-design/icons';
import { MessageBubble } from './MessageBubble';
import type { ChatMessage } from '../../types';

const { Text } = Typography;

interface ChatPanelProps {
  messages: readonly ChatMessage[];
  isGenerating?: boolean;
  showTiming?: boolean;
}

export const ChatPanel: React.FC<ChatPanelProps> = ({ messages, isGenerating = false, showTiming = true }) => {
  const listRef = useRef<HTMLDivElement>(null);

  useEffect(() => {
    if (listRef.current) {
      listRef.current.scrollTop = listRef.current.scrollHeight;
    }
  }, [messages.length, isGenerating]);

  return (
    <div className="message-list" ref={listRef}>
      {messages.length === 0 && !isGenerating && (
        <Text type="secondary" style={{ textAlign: 'center', marginTop: 48 }}>
          Ask the local model anything.
        </Text>
      )}
      {messages.map((msg) => (
        <MessageBubble key={msg.id} message={msg} showTiming={showTiming} />
      ))}
      {isGenerating && (
        <div className="message-bubble assistant">
          <Card size="small" style={{ background: '#1a1a1a', border: 'none' }}>
            <div style={{ display: 'flex', gap: 8, alignItems: 'center' }}>
              <RobotOutlined style={{ color: '#52c41a' }} />
              <Spin size="small" />
              <Text type="secondary">Waiting for the model...</Text>
            </div>
          </Card>
        </div>
      )}
    </div>
  );
};
