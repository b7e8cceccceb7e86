import React from 'react';
import { Drawer, Slider, InputNumber, Input, Space, Typography, Divider, Tooltip, Switch } from 'antd';
import { InfoCircleOutlined } from '@ant-design/icons';

const { Text } = Typography;

export const MIN_PREDICT = 1;
export const MAX_PREDICT = 2048;

interface SettingsDrawerProps {
  open: boolean;
  onClose: () => void;
  // Generation
  model: string;
  onModelChange: (value: string) => void;
  maxTokens: number;
  onMaxTokensChange: (value: number) => void;
  // Analytics & logging
  analyticsEnabled: boolean;
  onAnalyticsEnabledChange: (value: boolean) => void;
  runLoggingEnabled: boolean;
  onRunLoggingEnabledChange: (value: boolean) => void;
  /** Run logging needs an API key from the environment */
  runLoggingAvailable: boolean;
  remoteLogging: boolean;
  onRemoteLoggingChange: (value: boolean) => void;
  disabled?: boolean;
}

export function clampPredict(value: number): number {
  return Math.min(MAX_PREDICT, Math.max(MIN_PREDICT, Math.round(value)));
}

export const SettingsDrawer: React.FC<SettingsDrawerProps> = ({
  open,
  onClose,
  model,
  onModelChange,
  maxTokens,
  onMaxTokensChange,
  analyticsEnabled,
  onAnalyticsEnabledChange,
  runLoggingEnabled,
  onRunLoggingEnabledChange,
  runLoggingAvailable,
  remoteLogging,
  onRemoteLoggingChange,
  disabled = false,
}) => (
  <Drawer title="Settings" placement="right" onClose={onClose} open={open} width={360}>
    <div style={{ marginBottom: 16 }}>
      <Text type="secondary" style={{ display: 'block', marginBottom: 8 }}>
        Model{' '}
        <Tooltip title="Model name passed to the endpoint, e.g. mistral or llama3.">
          <InfoCircleOutlined style={{ cursor: 'help' }} />
        </Tooltip>
      </Text>
      <Input
        value={model}
        onChange={(e) => onModelChange(e.target.value)}
        disabled={disabled}
        placeholder="mistral"
      />
    </div>

    <div style={{ marginBottom: 16 }}>
      <Text type="secondary" style={{ display: 'block', marginBottom: 8 }}>
        n_predict{' '}
        <Tooltip title="Upper bound on generated tokens for each reply.">
          <InfoCircleOutlined style={{ cursor: 'help' }} />
        </Tooltip>
      </Text>
      <Space style={{ width: '100%' }}>
        <Slider
          min={MIN_PREDICT}
          max={MAX_PREDICT}
          value={maxTokens}
          onChange={(v) => onMaxTokensChange(clampPredict(v))}
          disabled={disabled}
          style={{ width: 200 }}
          marks={{ 1: '1', 512: '512', 1024: '1K', 2048: '2K' }}
        />
        <InputNumber
          min={MIN_PREDICT}
          max={MAX_PREDICT}
          precision={0}
          value={maxTokens}
          onChange={(v) => v !== null && onMaxTokensChange(clampPredict(v))}
          disabled={disabled}
          style={{ width: 80 }}
        />
      </Space>
    </div>

    <Divider style={{ margin: '8px 0 16px' }} />

    <Space direction="vertical" size="middle">
      <Space>
        <Switch checked={analyticsEnabled} onChange={onAnalyticsEnabledChange} size="small" />
        <Text>Enable analytics (latency & inference time)</Text>
      </Space>
      <Space>
        <Switch
          checked={runLoggingEnabled && runLoggingAvailable}
          onChange={onRunLoggingEnabledChange}
          disabled={!runLoggingAvailable}
          size="small"
        />
        <Text>Send runs to LangSmith</Text>
        {!runLoggingAvailable && (
          <Tooltip title="Set LANGSMITH_API_KEY in the build environment to enable.">
            <InfoCircleOutlined style={{ cursor: 'help', color: '#888' }} />
          </Tooltip>
        )}
      </Space>
    </Space>

    <Divider style={{ margin: '16px 0' }} />

    <Text type="secondary" style={{ display: 'block', marginBottom: 8 }}>
      Developer Options
    </Text>
    <Space>
      <Switch checked={remoteLogging} onChange={onRemoteLoggingChange} size="small" />
      <Text>Remote Logging</Text>
      <Tooltip title="Streams app logs to the dev log server. Run 'npm run logs' to start it.">
        <InfoCircleOutlined style={{ cursor: 'help', color: '#888' }} />
      </Tooltip>
    </Space>
  </Drawer>
);
