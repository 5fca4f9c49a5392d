import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FileSessionStore } from '../../src/sessions/sessionStore.js';
import { synthesize } from '../../src/engine/reportSynthesizer.js';
import type { TaskSessionRecord } from '../../src/sessions/types.js';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';

function makeRecord(id: string, overrides: Partial<TaskSessionRecord> = {}): TaskSessionRecord {
  return {
    id,
    deviceId: 'emulator-5554',
    goal: { text: 'Test', maxSteps: 40, timeBudgetMs: 300_000 },
    status: 'running',
    steps: [],
    startedAt: '2025-01-01T00:00:00.000Z',
    endedAt: null,
    terminalReason: null,
    ...overrides,
  };
}

describe('FileSessionStore', () => {
  let tmpDir: string;
  let store: FileSessionStore;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dp-store-'));
    store = new FileSessionStore(tmpDir);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('writes session.json under the session directory', async () => {
    await store.saveSession(makeRecord('s1'));
    const onDisk = JSON.parse(fs.readFileSync(path.join(tmpDir, 's1', 'session.json'), 'utf-8'));
    expect(onDisk.status).toBe('running');
    expect(fs.existsSync(path.join(tmpDir, 's1', 'session.json.tmp'))).toBe(false);
  });

  it('getSession returns the record or null', async () => {
    await store.saveSession(makeRecord('s2'));
    expect((await store.getSession('s2'))?.goal.text).toBe('Test');
    expect(await store.getSession('nonexistent')).toBeNull();
  });

  it('later saves replace earlier ones in order', async () => {
    await Promise.all([
      store.saveSession(makeRecord('s3')),
      store.saveSession(makeRecord('s3', { status: 'succeeded', terminalReason: 'ok' })),
    ]);
    expect((await store.getSession('s3'))?.status).toBe('succeeded');
  });

  it('stores reports beside the trace', async () => {
    const record = makeRecord('s4', { status: 'aborted', terminalReason: 'cancelled', endedAt: '2025-01-01T00:00:05.000Z' });
    const report = synthesize(record, new Date('2025-01-01T00:00:06.000Z'));
    await store.saveReport(report);
    expect(await store.getReport('s4')).toEqual(report);
    expect(await store.getReport('s1')).toBeNull();
  });

  it('listSessions returns summaries ordered by start time', async () => {
    await store.saveSession(makeRecord('late', { startedAt: '2025-01-02T00:00:00.000Z' }));
    await store.saveSession(makeRecord('early'));
    const list = await store.listSessions();
    expect(list.map((s) => s.sessionId)).toEqual(['early', 'late']);
    expect(list[0]).toEqual({
      sessionId: 'early',
      deviceId: 'emulator-5554',
      goal: 'Test',
      status: 'running',
      steps: 0,
      startedAt: '2025-01-01T00:00:00.000Z',
      endedAt: null,
    });
  });

  it('listSessions returns empty for a missing directory', async () => {
    expect(await new FileSessionStore(path.join(tmpDir, 'missing')).listSessions()).toEqual([]);
  });

  it('rejects session IDs with path characters', async () => {
    await expect(store.getSession('../etc')).rejects.toThrow('Invalid session ID');
    await expect(store.saveSession(makeRecord('a/b'))).rejects.toThrow('Invalid session ID');
  });

  it('markAbortedOnStartup aborts running sessions only', async () => {
    await store.saveSession(makeRecord('r1'));
    await store.saveSession(makeRecord('d1', { status: 'succeeded', terminalReason: 'ok' }));

    const marked = await store.markAbortedOnStartup(new Date('2025-01-03T00:00:00.000Z'));
    expect(marked).toEqual(['r1']);
    expect(await store.getSession('r1')).toMatchObject({
      status: 'aborted',
      terminalReason: 'server_restart',
      endedAt: '2025-01-03T00:00:00.000Z',
    });
    expect((await store.getSession('d1'))?.status).toBe('succeeded');
  });
});
