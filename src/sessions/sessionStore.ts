import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Report, SessionSummary, TaskSessionRecord } from './types.js';
import { isErrnoException } from '../utils/artifacts.js';

const SESSION_ID_PATTERN = /^[a-zA-Z0-9_-]{1,128}$/;

export function isValidSessionId(sessionId: string): boolean {
  return SESSION_ID_PATTERN.test(sessionId);
}

function validateSessionId(sessionId: string): void {
  if (!isValidSessionId(sessionId)) {
    throw new Error(`Invalid session ID: must match ${SESSION_ID_PATTERN.source}`);
  }
}

/**
 * Archive of session traces and reports, one directory per session:
 * `<base>/<id>/session.json` and `<base>/<id>/report.json`.
 */
export class FileSessionStore {
  private readonly locks = new Map<string, Promise<void>>();

  constructor(private readonly baseDir: string) {}

  private withLock<T>(sessionId: string, fn: () => Promise<T>): Promise<T> {
    const prev = this.locks.get(sessionId) ?? Promise.resolve();
    const next = prev.then(fn, fn);
    const cleanup = next.then(() => {}, () => {});
    this.locks.set(sessionId, cleanup);
    void cleanup.then(() => {
      if (this.locks.get(sessionId) === cleanup) {
        this.locks.delete(sessionId);
      }
    });
    return next;
  }

  private async writeJson(sessionId: string, fileName: string, value: unknown): Promise<void> {
    const dir = path.join(this.baseDir, sessionId);
    await fs.mkdir(dir, { recursive: true });
    const filePath = path.join(dir, fileName);
    const tmpPath = filePath + '.tmp';
    await fs.writeFile(tmpPath, JSON.stringify(value, null, 2));
    await fs.rename(tmpPath, filePath);
  }

  private async readJson<T>(sessionId: string, fileName: string): Promise<T | null> {
    const filePath = path.join(this.baseDir, sessionId, fileName);
    try {
      const data = await fs.readFile(filePath, 'utf-8');
      return JSON.parse(data) as T;
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return null;
      throw err;
    }
  }

  async saveSession(record: TaskSessionRecord): Promise<void> {
    validateSessionId(record.id);
    return this.withLock(record.id, () => this.writeJson(record.id, 'session.json', record));
  }

  async getSession(sessionId: string): Promise<TaskSessionRecord | null> {
    validateSessionId(sessionId);
    return this.readJson<TaskSessionRecord>(sessionId, 'session.json');
  }

  async saveReport(report: Report): Promise<void> {
    validateSessionId(report.sessionId);
    return this.withLock(report.sessionId, () => this.writeJson(report.sessionId, 'report.json', report));
  }

  async getReport(sessionId: string): Promise<Report | null> {
    validateSessionId(sessionId);
    return this.readJson<Report>(sessionId, 'report.json');
  }

  async listSessions(): Promise<SessionSummary[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.baseDir);
    } catch {
      return [];
    }

    const summaries: SessionSummary[] = [];
    for (const entry of entries) {
      if (!SESSION_ID_PATTERN.test(entry)) continue;
      try {
        const record = await this.getSession(entry);
        if (record) {
          summaries.push({
            sessionId: record.id,
            deviceId: record.deviceId,
            goal: record.goal.text,
            status: record.status,
            steps: record.steps.length,
            startedAt: record.startedAt,
            endedAt: record.endedAt,
          });
        }
      } catch (err) {
        console.warn(`[store] skipping unreadable session ${entry}: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
    return summaries.sort((a, b) => a.startedAt.localeCompare(b.startedAt));
  }

  // Sessions still `running` on disk were cut off by a restart. Returns their ids
  async markAbortedOnStartup(now: Date = new Date()): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.baseDir);
    } catch {
      return [];
    }

    const marked: string[] = [];
    for (const entry of entries) {
      if (!SESSION_ID_PATTERN.test(entry)) continue;
      try {
        const record = await this.getSession(entry);
        if (record && record.status === 'running') {
          await this.saveSession({
            ...record,
            status: 'aborted',
            endedAt: now.toISOString(),
            terminalReason: 'server_restart',
          });
          marked.push(entry);
        }
      } catch (err) {
        console.warn(`[store] skipping unreadable session ${entry}: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
    return marked;
  }
}
