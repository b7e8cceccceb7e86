import React from 'react';
import { createRoot } from 'react-dom/client';
import { ConfigProvider, theme } from 'antd';
import App from './App';
import { loadConfig } from './config';
import './styles/main.css';

// Each key is substituted at build time by webpack's DefinePlugin
const config = loadConfig({
  OLLAMA_ENDPOINT: process.env.OLLAMA_ENDPOINT,
  LANGSMITH_API_KEY: process.env.LANGSMITH_API_KEY,
  LANGSMITH_URL: process.env.LANGSMITH_URL,
  LANGSMITH_PROJECT: process.env.LANGSMITH_PROJECT,
  APP_URL: process.env.APP_URL,
  VERCEL_URL: process.env.VERCEL_URL,
});

const container = document.getElementById('root');
if (!container) throw new Error('Root element not found');

const root = createRoot(container);

root.render(
  <React.StrictMode>
    <ConfigProvider
      theme={{
        algorithm: theme.darkAlgorithm,
        token: {
          colorPrimary: '#1890ff',
          colorBgLayout: '#000000',
        },
      }}
    >
      <App config={config} />
    </ConfigProvider>
  </React.StrictMode>
);
