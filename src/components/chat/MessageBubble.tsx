import React, { Suspense, lazy, useState } from 'react';
import { Card, Typography, Button, Spin } from 'antd';
import { UserOutlined, RobotOutlined, CodeOutlined, WarningOutlined } from '@ant-design/icons';
import Markdown from 'react-markdown';
import { formatTiming } from '../../utils/format';
import type { ChatMessage } from '../../types';

const { Text } = Typography;

// The editor is large; load it the first time a reply is inspected
const JsonViewer = lazy(() => import('./JsonViewer').then(m => ({ default: m.JsonViewer })));

interface MessageBubbleProps {
  message: ChatMessage;
  showTiming?: boolean;
}

export const MessageBubble: React.FC<MessageBubbleProps> = ({ message, showTiming = true }) => {
  const [showJson, setShowJson] = useState(false);
  const isUser = message.role === 'user';
  const hasRawData = message.rawExchange?.response.body !== undefined;

  const icon = isUser ? (
    <UserOutlined style={{ color: '#fff', marginTop: 4 }} />
  ) : message.isError ? (
    <WarningOutlined style={{ color: '#ff4d4f', marginTop: 4 }} />
  ) : (
    <RobotOutlined style={{ color: '#52c41a', marginTop: 4 }} />
  );

  return (
    <div className={`message-bubble ${message.role}${message.isError ? ' error' : ''}`}>
      <Card
        size="small"
        style={{
          background: isUser ? '#1890ff' : message.isError ? '#2a1215' : '#1a1a1a',
          border: 'none',
        }}
      >
        <div style={{ display: 'flex', gap: 8, alignItems: 'flex-start' }}>
          {icon}
          <div style={{ flex: 1 }}>
            {isUser || message.isError ? (
              <Text style={{ color: message.isError ? '#ff7875' : '#fff', whiteSpace: 'pre-wrap' }}>
                {message.content}
              </Text>
            ) : (
              <div className="markdown-content">
                <Markdown>{message.content}</Markdown>
              </div>
            )}
            {showTiming && message.meta && (
              <div className="message-timing" style={{ marginTop: 8, fontSize: 11, color: '#888', display: 'flex', alignItems: 'center', gap: 12 }}>
                <span>{formatTiming(message.meta)}</span>
                {hasRawData && (
                  <Button
                    type="text"
                    size="small"
                    icon={<CodeOutlined />}
                    onClick={() => setShowJson(!showJson)}
                    style={{ color: showJson ? '#1890ff' : '#888', padding: '0 4px', height: 'auto' }}
                  >
                    {showJson ? 'Hide JSON' : 'Show JSON'}
                  </Button>
                )}
              </div>
            )}
            {showJson && message.rawExchange && (
              <Suspense fallback={<Spin size="small" />}>
                <JsonViewer data={message.rawExchange} />
              </Suspense>
            )}
          </div>
        </div>
      </Card>
    </div>
  );
};
