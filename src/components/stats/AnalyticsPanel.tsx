import React from 'react';
import { Collapse, Statistic, Row, Col, Button, Typography, Space, Tag, Popconfirm } from 'antd';
import { LineChartOutlined, ReloadOutlined } from '@ant-design/icons';
import { Sparkline } from './Sparkline';
import { formatRate, formatSeconds } from '../../utils/format';
import type { AnalyticsRing } from '../../services/AnalyticsRing';

const { Text } = Typography;

interface AnalyticsPanelProps {
  analytics: AnalyticsRing;
  /** epoch seconds; the panel prunes and computes as of this instant */
  now: number;
  onReset: () => void;
  defaultExpanded?: boolean;
}

export const AnalyticsPanel: React.FC<AnalyticsPanelProps> = ({ analytics, now, onReset, defaultExpanded = false }) => {
  const summary = analytics.summary(now);
  const perMinute = analytics.throughput(60, now);
  const perFiveMinutes = analytics.throughput(300, now);
  const series = analytics.series();
  const runLogs = analytics.runLogs.slice(-5);

  const body = (
    <div className="analytics-panel">
      <Row gutter={16}>
        <Col span={4}><Statistic title="Total requests" value={summary.count} /></Col>
        <Col span={5}><Statistic title="Last latency (s)" value={formatSeconds(summary.lastLatency)} /></Col>
        <Col span={5}><Statistic title="Avg latency (s)" value={formatSeconds(summary.avgLatency)} /></Col>
        <Col span={5}><Statistic title="Avg inference (s)" value={formatSeconds(summary.avgInference)} /></Col>
        <Col span={5}><Statistic title="Avg network (s)" value={formatSeconds(summary.avgNetwork)} /></Col>
      </Row>

      <Text className="throughput" style={{ display: 'block', margin: '12px 0' }}>
        Throughput: {formatRate(perMinute)} (1m), {formatRate(perFiveMinutes)} (5m)
        {summary.errors > 0 && <Text type="danger"> · {summary.errors} failed</Text>}
      </Text>

      <Space size="large" wrap>
        {series.latency.length > 0 && (
          <div>
            <Text type="secondary" style={{ fontSize: 12 }}>Latency (last {series.latency.length})</Text>
            <br />
            <Sparkline values={series.latency} label="latency history" />
          </div>
        )}
        {series.inference.length > 0 && (
          <div>
            <Text type="secondary" style={{ fontSize: 12 }}>Inference (last {series.inference.length})</Text>
            <br />
            <Sparkline values={series.inference} color="#52c41a" label="inference history" />
          </div>
        )}
      </Space>

      {runLogs.length > 0 && (
        <div style={{ marginTop: 12 }}>
          <Text type="secondary" style={{ fontSize: 12, marginRight: 8 }}>Run logging:</Text>
          {runLogs.map((r, i) => (
            <Tag key={`${r.time}-${i}`} color={r.ok ? 'green' : 'red'}>
              {r.statusCode ?? r.error ?? 'unknown'}
            </Tag>
          ))}
        </div>
      )}

      <div style={{ marginTop: 12 }}>
        <Popconfirm title="Clear all analytics for this session?" onConfirm={onReset}>
          <Button size="small" icon={<ReloadOutlined />}>Reset analytics</Button>
        </Popconfirm>
      </div>
    </div>
  );

  return (
    <Collapse
      size="small"
      defaultActiveKey={defaultExpanded ? ['analytics'] : []}
      items={[
        {
          key: 'analytics',
          label: <span><LineChartOutlined /> Analytics: throughput, latency & inference time</span>,
          children: body,
        },
      ]}
    />
  );
};
