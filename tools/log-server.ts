#!/usr/bin/env tsx
/**
 * Log Server - receives the assistant's log stream over WebSocket and writes
 * it to logs/<sessionId>/NNNN.jsonl. The webpack dev server proxies /logs here.
 *
 * Usage: npm run logs [-- port]
 */

import { WebSocketServer, type RawData, type WebSocket } from 'ws';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { safeSessionId, SessionLogSink, type SinkEntry } from './log-sink';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

const PORT = parseInt(process.argv[2] || process.env.LOG_SERVER_PORT || '9100', 10);
const LOGS_DIR = path.join(__dirname, '..', 'logs');

type ClientMessage =
  | { type: 'init'; sessionId: string }
  | { type: 'log'; entry: SinkEntry };

function parseMessage(data: RawData): ClientMessage | null {
  const parsed: unknown = JSON.parse(data.toString());
  if (typeof parsed !== 'object' || parsed === null || !('type' in parsed)) return null;

  if (parsed.type === 'init' && 'sessionId' in parsed && typeof parsed.sessionId === 'string') {
    return { type: 'init', sessionId: parsed.sessionId };
  }
  if (parsed.type === 'log' && 'entry' in parsed && typeof parsed.entry === 'object' && parsed.entry !== null) {
    const entry = parsed.entry;
    if ('msg' in entry && typeof entry.msg === 'string') {
      return {
        type: 'log',
        entry: {
          ts: 'ts' in entry && typeof entry.ts === 'number' ? entry.ts : Date.now(),
          lvl: 'lvl' in entry && typeof entry.lvl === 'string' ? entry.lvl : 'info',
          sys: 'sys' in entry && typeof entry.sys === 'string' ? entry.sys : 'app',
          msg: entry.msg,
          data: 'data' in entry ? entry.data : undefined,
        },
      };
    }
  }
  return null;
}

const sink = new SessionLogSink(LOGS_DIR);
const wss = new WebSocketServer({ port: PORT });

wss.on('error', (err: Error & { code?: string }) => {
  if (err.code === 'EADDRINUSE') {
    console.error(`[LogServer] Port ${PORT} is already in use. Stop the other process or pass a different port.`);
    process.exit(1);
  }
  console.error('[LogServer] Server error:', err.message);
});

wss.on('connection', (ws: WebSocket) => {
  let clientSession: string | null = null;

  ws.on('message', (data: RawData) => {
    try {
      const msg = parseMessage(data);
      if (!msg) return;

      if (msg.type === 'init') {
        clientSession = safeSessionId(msg.sessionId);
        console.log(clientSession
          ? `[LogServer] Client connected: ${clientSession}`
          : `[LogServer] Rejected session id: ${msg.sessionId}`);
        return;
      }

      if (clientSession) {
        sink.write(clientSession, msg.entry);
      }
    } catch (e) {
      console.error('[LogServer] Failed to handle message:', e instanceof Error ? e.message : String(e));
    }
  });

  ws.on('close', () => {
    if (clientSession) {
      console.log(`[LogServer] Client disconnected: ${clientSession}`);
    }
  });

  ws.on('error', (err: Error) => {
    console.error('[LogServer] WebSocket error:', err.message);
  });
});

console.log(`[LogServer] Listening on ws://localhost:${PORT}`);
console.log(`[LogServer] Logs will be written to: ${LOGS_DIR}`);

function shutdown(): void {
  console.log('\n[LogServer] Shutting down...');
  sink.close();
  wss.close(() => {
    console.log('[LogServer] Stopped');
    process.exit(0);
  });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
