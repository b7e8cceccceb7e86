import { afterEach, describe, expect, it, vi } from 'vitest';
import { LogClient, type LogFrame, type LogSocket } from './LogClient';

class FakeSocket implements LogSocket {
  readyState = 0;
  onopen: (() => void) | null = null;
  onclose: (() => void) | null = null;
  onerror: (() => void) | null = null;
  sent: LogFrame[] = [];
  closed = false;

  send(data: string): void {
    this.sent.push(JSON.parse(data));
  }

  close(): void {
    this.closed = true;
  }

  open(): void {
    this.readyState = 1;
    this.onopen?.();
  }

  drop(): void {
    this.readyState = 3;
    this.onclose?.();
  }
}

function clientWithSockets() {
  const sockets: FakeSocket[] = [];
  const client = new LogClient({
    console: false,
    createSocket: () => {
      const socket = new FakeSocket();
      sockets.push(socket);
      return socket;
    },
  });
  return { client, sockets };
}

describe('LogClient', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('stays console-only until connected', () => {
    const { client, sockets } = clientWithSockets();
    client.info('app', 'started');
    expect(sockets).toHaveLength(0);
    expect(client.queuedFrames).toBe(0);
  });

  it('queues entries until the socket opens, then sends init before them', () => {
    const { client, sockets } = clientWithSockets();
    client.connect('ws://localhost:9100/logs');
    client.info('chat', 'User message', { length: 5 });
    expect(client.queuedFrames).toBe(1);

    sockets[0].open();

    const [init, log] = sockets[0].sent;
    expect(init).toEqual({ type: 'init', sessionId: client.getSessionId() });
    expect(log).toMatchObject({ type: 'log', entry: { lvl: 'info', sys: 'chat', msg: 'User message', data: { length: 5 } } });
    expect(client.queuedFrames).toBe(0);
  });

  it('sends directly while connected', () => {
    const { client, sockets } = clientWithSockets();
    client.connect('ws://localhost:9100/logs');
    sockets[0].open();

    client.error('inference', 'request failed');

    expect(sockets[0].sent).toHaveLength(2);
    expect(sockets[0].sent[1]).toMatchObject({ entry: { lvl: 'error', sys: 'inference' } });
  });

  it('reconnects after the socket closes', () => {
    vi.useFakeTimers();
    const { client, sockets } = clientWithSockets();
    client.connect('ws://localhost:9100/logs');
    sockets[0].open();
    sockets[0].drop();

    vi.advanceTimersByTime(2000);

    expect(sockets).toHaveLength(2);
    client.disconnect();
  });

  it('stops streaming on disconnect', () => {
    const { client, sockets } = clientWithSockets();
    client.connect('ws://localhost:9100/logs');
    sockets[0].open();

    client.disconnect();
    client.warn('app', 'after disconnect');

    expect(sockets[0].closed).toBe(true);
    expect(sockets[0].sent).toHaveLength(1);
  });

  it('ignores a late close from a socket it already replaced', () => {
    vi.useFakeTimers();
    const { client, sockets } = clientWithSockets();
    client.connect('ws://localhost:9100/logs');
    client.disconnect();
    client.connect('ws://localhost:9100/logs');
    sockets[1].open();

    sockets[0].drop();
    vi.advanceTimersByTime(2000);
    client.info('app', 'still streaming');

    expect(sockets).toHaveLength(2);
    expect(sockets[1].sent.map(f => f.type)).toEqual(['init', 'log']);
    client.disconnect();
  });
});
