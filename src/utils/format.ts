import type { MessageTiming } from '../types';

export const NO_DATA = '—';

export function formatSeconds(value: number | undefined, digits = 3): string {
  return value === undefined ? NO_DATA : value.toFixed(digits);
}

/** "inference: 0.900s • rtt: 1.200s • network: 0.300s", omitting unknown parts */
export function formatTiming(meta: MessageTiming): string {
  const parts: string[] = [];
  if (meta.inferenceSeconds !== undefined) parts.push(`inference: ${meta.inferenceSeconds.toFixed(3)}s`);
  parts.push(`rtt: ${meta.latencySeconds.toFixed(3)}s`);
  if (meta.networkSeconds !== undefined) parts.push(`network: ${meta.networkSeconds.toFixed(3)}s`);
  return parts.join(' • ');
}

export function formatRate(requestsPerMinute: number): string {
  return `${requestsPerMinute.toFixed(2)} req/min`;
}
