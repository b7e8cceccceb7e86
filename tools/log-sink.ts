import * as fs from 'fs';
import * as path from 'path';

export const MAX_LINES_PER_FILE = 2000;

export interface SinkEntry {
  ts: number;
  lvl: string;
  sys: string;
  msg: string;
  data?: unknown;
}

interface SessionState {
  dir: string;
  fileNum: number;
  lineCount: number;
  fd: number;
}

function ensureDir(dir: string): void {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

function fileName(fileNum: number): string {
  return `${String(fileNum).padStart(4, '0')}.jsonl`;
}

// Session ids come from the browser; keep them to one safe path segment
export function safeSessionId(sessionId: string): string | null {
  return /^[A-Za-z0-9_-]{1,64}$/.test(sessionId) ? sessionId : null;
}

/**
 * Writes log entries as JSONL, one directory per client session,
 * rotating to a new numbered file every `maxLines` lines.
 */
export class SessionLogSink {
  private sessions = new Map<string, SessionState>();

  constructor(
    private readonly rootDir: string,
    private readonly maxLines: number = MAX_LINES_PER_FILE
  ) {
    ensureDir(rootDir);
  }

  private stateFor(sessionId: string): SessionState {
    const existing = this.sessions.get(sessionId);
    if (existing) return existing;

    const dir = path.join(this.rootDir, sessionId);
    ensureDir(dir);
    const state: SessionState = {
      dir,
      fileNum: 1,
      lineCount: 0,
      fd: fs.openSync(path.join(dir, fileName(1)), 'a'),
    };
    this.sessions.set(sessionId, state);
    console.log(`[LogServer] New session: ${sessionId}`);
    return state;
  }

  private rotate(state: SessionState): void {
    fs.closeSync(state.fd);
    state.fileNum++;
    state.lineCount = 0;
    state.fd = fs.openSync(path.join(state.dir, fileName(state.fileNum)), 'a');
    console.log(`[LogServer] Rotated to file ${state.fileNum}`);
  }

  write(sessionId: string, entry: SinkEntry): void {
    const state = this.stateFor(sessionId);
    if (state.lineCount >= this.maxLines) {
      this.rotate(state);
    }
    fs.writeSync(state.fd, JSON.stringify(entry) + '\n');
    state.lineCount++;
  }

  close(): void {
    for (const [sessionId, state] of this.sessions) {
      fs.closeSync(state.fd);
      console.log(`[LogServer] Closed session: ${sessionId}`);
    }
    this.sessions.clear();
  }
}
