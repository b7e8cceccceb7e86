import React, { useState, useRef, useCallback, useEffect, useMemo } from 'react';
import { Layout, Button, Alert, Typography, Tooltip } from 'antd';
import { SettingOutlined, ExperimentOutlined } from '@ant-design/icons';
import { ChatPanel } from './components/chat/ChatPanel';
import { ChatInput } from './components/chat/ChatInput';
import { SettingsDrawer, clampPredict } from './components/settings/SettingsDrawer';
import { AnalyticsPanel } from './components/stats/AnalyticsPanel';
import { epochSeconds } from './services/AnalyticsRing';
import { createSessionContext, runChatTurn, type SessionContext } from './services/ChatTurn';
import { InferenceClient } from './services/InferenceClient';
import { createRunLogger } from './services/RunLogger';
import { logClient, REMOTE_LOGGING_KEY } from './services/LogClient';
import type { AppConfig } from './config';

const { Header, Content } = Layout;
const { Text } = Typography;

const STORAGE_KEYS = {
  MODEL: 'localdev-assistant:model',
  MAX_TOKENS: 'localdev-assistant:n-predict',
  ANALYTICS: 'localdev-assistant:analytics',
  RUN_LOGGING: 'localdev-assistant:run-logging',
};

export const DEFAULT_MODEL = 'mistral';
export const DEFAULT_MAX_TOKENS = 50;

function loadStoredNumber(key: string, defaultVal: number): number {
  const stored = localStorage.getItem(key);
  if (stored) {
    const num = parseInt(stored, 10);
    if (!isNaN(num)) return num;
  }
  return defaultVal;
}

function loadStoredFlag(key: string, defaultVal: boolean): boolean {
  const stored = localStorage.getItem(key);
  return stored === null ? defaultVal : stored === 'true';
}

interface AppProps {
  config: AppConfig;
  /** Overrides the HTTP client, e.g. in tests */
  client?: InferenceClient;
}

const App: React.FC<AppProps> = ({ config, client }) => {
  // One session context per mounted app; discarded with the page
  const sessionRef = useRef<SessionContext>(createSessionContext());
  const [, setRevision] = useState(0);
  const refresh = useCallback(() => setRevision(r => r + 1), []);

  const [model, setModel] = useState(() => localStorage.getItem(STORAGE_KEYS.MODEL) || DEFAULT_MODEL);
  const [maxTokens, setMaxTokens] = useState(() =>
    clampPredict(loadStoredNumber(STORAGE_KEYS.MAX_TOKENS, DEFAULT_MAX_TOKENS))
  );
  const [analyticsEnabled, setAnalyticsEnabled] = useState(() => loadStoredFlag(STORAGE_KEYS.ANALYTICS, true));
  const [runLoggingEnabled, setRunLoggingEnabled] = useState(() =>
    loadStoredFlag(STORAGE_KEYS.RUN_LOGGING, Boolean(config.runLog.apiKey))
  );
  const [remoteLogging, setRemoteLogging] = useState(() => loadStoredFlag(REMOTE_LOGGING_KEY, false));
  const [isGenerating, setIsGenerating] = useState(false);
  const [drawerOpen, setDrawerOpen] = useState(false);

  const inferenceClient = useMemo(() => client ?? new InferenceClient(), [client]);
  const runLogger = useMemo(() => createRunLogger(config.runLog), [config]);

  const { chat, analytics } = sessionRef.current;
  const endpoint = config.endpoint;

  useEffect(() => {
    if (remoteLogging) {
      logClient.connect();
    } else {
      logClient.disconnect();
    }
    localStorage.setItem(REMOTE_LOGGING_KEY, String(remoteLogging));
  }, [remoteLogging]);

  useEffect(() => {
    logClient.info('app', 'Localdev Assistant started', { endpointConfigured: Boolean(endpoint) });
    if (!endpoint) {
      logClient.error('app', 'Inference endpoint not configured');
    }
  }, [endpoint]);

  useEffect(() => {
    localStorage.setItem(STORAGE_KEYS.MODEL, model);
  }, [model]);

  useEffect(() => {
    localStorage.setItem(STORAGE_KEYS.MAX_TOKENS, String(maxTokens));
  }, [maxTokens]);

  useEffect(() => {
    localStorage.setItem(STORAGE_KEYS.ANALYTICS, String(analyticsEnabled));
  }, [analyticsEnabled]);

  useEffect(() => {
    localStorage.setItem(STORAGE_KEYS.RUN_LOGGING, String(runLoggingEnabled));
  }, [runLoggingEnabled]);

  const handleSend = useCallback(async (prompt: string) => {
    if (!endpoint || isGenerating) return;

    setIsGenerating(true);
    const turn = runChatTurn(
      sessionRef.current,
      { client: inferenceClient, endpoint, runLogger, appUrl: config.appUrl },
      { model, maxTokens, analyticsEnabled, runLoggingEnabled },
      prompt
    );
    // The user message is already in the log; show it while waiting
    refresh();
    try {
      await turn;
    } finally {
      setIsGenerating(false);
      refresh();
    }
  }, [endpoint, isGenerating, inferenceClient, runLogger, config.appUrl, model, maxTokens, analyticsEnabled, runLoggingEnabled, refresh]);

  const handleClear = useCallback(() => {
    chat.clear();
    logClient.info('chat', 'Conversation cleared');
    refresh();
  }, [chat, refresh]);

  const handleResetAnalytics = useCallback(() => {
    analytics.reset();
    logClient.info('analytics', 'Analytics reset');
    refresh();
  }, [analytics, refresh]);

  return (
    <Layout className="app-layout">
      <Header className="app-header">
        <div className="header-left">
          <ExperimentOutlined style={{ marginRight: 8 }} />
          <span>Localdev Assistant</span>
          {config.appUrl && (
            <Text type="secondary" style={{ marginLeft: 12, fontSize: 12 }}>
              Running at: {config.appUrl}
            </Text>
          )}
        </div>
        <div style={{ display: 'flex', alignItems: 'center', gap: 12 }}>
          <Tooltip title={endpoint ? 'Endpoint configured' : 'No endpoint configured'}>
            <span style={{ color: endpoint ? '#52c41a' : '#ff4d4f', fontSize: 13 }}>{model || DEFAULT_MODEL}</span>
          </Tooltip>
          <Button
            type="text"
            icon={<SettingOutlined />}
            onClick={() => setDrawerOpen(true)}
            style={{ color: '#fff' }}
          >
            Settings
          </Button>
        </div>
      </Header>
      <Content className="app-content">
        <div className="chat-container">
          <Text type="secondary" style={{ fontSize: 12 }}>
            A simple chatbot backed by a locally hosted model exposed over HTTP. The endpoint comes from the build environment.
          </Text>
          {!endpoint && (
            <Alert
              type="error"
              showIcon
              message="Inference endpoint not configured"
              description="Set OLLAMA_ENDPOINT in the environment and rebuild."
            />
          )}
          <ChatPanel messages={chat.messages} isGenerating={isGenerating} showTiming={analyticsEnabled} />
          {analyticsEnabled && (
            <AnalyticsPanel analytics={analytics} now={epochSeconds()} onReset={handleResetAnalytics} />
          )}
          <ChatInput
            onSubmit={(prompt) => {
              handleSend(prompt).catch((error: unknown) =>
                logClient.error('chat', 'Unexpected turn failure', { error: String(error) })
              );
            }}
            onClear={handleClear}
            unavailable={!endpoint}
            busy={isGenerating}
          />
        </div>
      </Content>
      <SettingsDrawer
        open={drawerOpen}
        onClose={() => setDrawerOpen(false)}
        model={model}
        onModelChange={setModel}
        maxTokens={maxTokens}
        onMaxTokensChange={setMaxTokens}
        analyticsEnabled={analyticsEnabled}
        onAnalyticsEnabledChange={setAnalyticsEnabled}
        runLoggingEnabled={runLoggingEnabled}
        onRunLoggingEnabledChange={setRunLoggingEnabled}
        runLoggingAvailable={Boolean(runLogger)}
        remoteLogging={remoteLogging}
        onRemoteLoggingChange={setRemoteLogging}
        disabled={isGenerating}
      />
    </Layout>
  );
};

export default App;
