/**
 * Log Client - mirrors app logs to the console and, when enabled, streams them
 * over a WebSocket to the dev log server (tools/log-server.ts).
 *
 * Fire-and-forget: frames are sent without acknowledgment. While disconnected,
 * frames are queued up to MAX_QUEUE_SIZE, dropping the oldest.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Subsystems that emit logs */
export type LogSystem = 'app' | 'chat' | 'inference' | 'analytics' | 'runlog' | 'settings';

export interface LogEntry {
  ts: number;
  lvl: LogLevel;
  sys: LogSystem;
  msg: string;
  data?: unknown;
}

export type LogFrame =
  | { type: 'init'; sessionId: string }
  | { type: 'log'; entry: LogEntry };

/** The subset of the browser WebSocket the client relies on */
export interface LogSocket {
  readonly readyState: number;
  onopen: (() => void) | null;
  onclose: (() => void) | null;
  onerror: (() => void) | null;
  send(data: string): void;
  close(): void;
}

export interface LogClientOptions {
  createSocket?: (url: string) => LogSocket;
  console?: boolean;
}

export const REMOTE_LOGGING_KEY = 'localdev-assistant:remote-logging';

const MAX_QUEUE_SIZE = 1000;
const RECONNECT_DELAY = 2000;
const SOCKET_OPEN = 1;

function makeSessionId(now = new Date()): string {
  // YYYYMMDD-HHMMSS-xxxx so session directories sort chronologically
  const date = now.toISOString().slice(0, 10).replace(/-/g, '');
  const time = now.toTimeString().slice(0, 8).replace(/:/g, '');
  const rand = Math.random().toString(36).slice(2, 6);
  return `${date}-${time}-${rand}`;
}

function browserSocket(url: string): LogSocket {
  const ws = new WebSocket(url);
  const socket: LogSocket = {
    get readyState() {
      return ws.readyState;
    },
    onopen: null,
    onclose: null,
    onerror: null,
    send: (data) => ws.send(data),
    close: () => ws.close(),
  };
  ws.onopen = () => socket.onopen?.();
  ws.onclose = () => socket.onclose?.();
  ws.onerror = () => socket.onerror?.();
  return socket;
}

export function defaultLogUrl(): string | null {
  if (typeof window === 'undefined') return null;
  const protocol = window.location.protocol === 'https:' ? 'wss:' : 'ws:';
  return `${protocol}//${window.location.host}/logs`;
}

export class LogClient {
  private ws: LogSocket | null = null;
  private readonly sessionId: string;
  private queue: string[] = [];
  private connected = false;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private url: string | null = null;
  private enabled = false;
  private readonly createSocket: (url: string) => LogSocket;
  private readonly mirrorToConsole: boolean;

  constructor(options: LogClientOptions = {}) {
    this.sessionId = makeSessionId();
    this.createSocket = options.createSocket ?? browserSocket;
    this.mirrorToConsole = options.console ?? true;
  }

  /** Starts streaming to `url`. A null url (no browser location) leaves the client console-only. */
  connect(url: string | null = defaultLogUrl()): void {
    if (!url) return;
    this.url = url;
    this.enabled = true;
    this.open();
  }

  private open(): void {
    if (this.ws || !this.url) return;

    try {
      const ws = this.createSocket(this.url);
      this.ws = ws;

      // A socket replaced by disconnect()/connect() may still fire late events
      ws.onopen = () => {
        if (this.ws !== ws) return;
        this.connected = true;
        ws.send(JSON.stringify({ type: 'init', sessionId: this.sessionId } satisfies LogFrame));
        this.flushQueue();
      };

      ws.onclose = () => {
        if (this.ws !== ws) return;
        this.connected = false;
        this.ws = null;
        if (this.enabled) {
          this.scheduleReconnect();
        }
      };

      // onclose follows every error
      ws.onerror = () => {};
    } catch (error) {
      this.toConsole('warn', 'app', 'log socket failed to open', { error: String(error) });
      this.scheduleReconnect();
    }
  }

  private send(entry: LogEntry): void {
    if (!this.enabled) return;
    const frame = JSON.stringify({ type: 'log', entry } satisfies LogFrame);

    if (this.connected && this.ws?.readyState === SOCKET_OPEN) {
      this.ws.send(frame);
      return;
    }

    this.queue.push(frame);
    if (this.queue.length > MAX_QUEUE_SIZE) {
      this.queue.shift();
    }
    if (!this.ws && !this.reconnectTimer) {
      this.open();
    }
  }

  private flushQueue(): void {
    while (this.queue.length > 0 && this.connected && this.ws?.readyState === SOCKET_OPEN) {
      const frame = this.queue.shift();
      if (frame) this.ws.send(frame);
    }
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer) return;
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.open();
    }, RECONNECT_DELAY);
  }

  private toConsole(level: LogLevel, system: LogSystem, message: string, data?: unknown): void {
    if (!this.mirrorToConsole) return;
    const prefix = `[${system}]`;
    const method = level === 'error' ? console.error
      : level === 'warn' ? console.warn
      : level === 'debug' ? console.debug
      : console.log;

    if (data !== undefined) {
      method(prefix, message, data);
    } else {
      method(prefix, message);
    }
  }

  log(level: LogLevel, system: LogSystem, message: string, data?: unknown): void {
    this.send({ ts: Date.now(), lvl: level, sys: system, msg: message, data });
    this.toConsole(level, system, message, data);
  }

  debug(system: LogSystem, message: string, data?: unknown): void {
    this.log('debug', system, message, data);
  }

  info(system: LogSystem, message: string, data?: unknown): void {
    this.log('info', system, message, data);
  }

  warn(system: LogSystem, message: string, data?: unknown): void {
    this.log('warn', system, message, data);
  }

  error(system: LogSystem, message: string, data?: unknown): void {
    this.log('error', system, message, data);
  }

  disconnect(): void {
    this.enabled = false;
    this.queue = [];
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    if (this.ws) {
      this.ws.close();
      this.ws = null;
    }
    this.connected = false;
  }

  get queuedFrames(): number {
    return this.queue.length;
  }

  getSessionId(): string {
    return this.sessionId;
  }
}

// Global singleton
export const logClient = new LogClient();
