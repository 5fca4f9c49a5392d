import { describe, it, expect } from 'vitest';
import { TaskSession } from '../../src/sessions/taskSession.js';
import type { ActionOutcome, SceneSnapshot } from '../../src/sessions/types.js';

const SNAP: SceneSnapshot = {
  sequence: 1,
  timestamp: '2025-01-01T00:00:00.000Z',
  screenshotRef: 'shot-0000000000000001',
  screenshotHash: 'b'.repeat(64),
  uiTree: [],
  uiTreeSerialization: '[]',
  textExtract: '',
};

const OUTCOME: ActionOutcome = {
  action: { kind: 'key', code: 3 },
  issuedAt: '2025-01-01T00:00:00.000Z',
  durationMs: 5,
  rawResult: null,
  classification: 'ok',
  logCheck: 'clean',
};

function newSession() {
  return new TaskSession('sess-1', 'emulator-5554', { text: 'go home', maxSteps: 5, timeBudgetMs: 1000 }, '2025-01-01T00:00:00.000Z');
}

const STEP = { preSnapshot: SNAP, action: OUTCOME.action, outcome: OUTCOME, postSnapshot: SNAP };

describe('TaskSession', () => {
  it('starts running with no steps', () => {
    const session = newSession();
    expect(session.status).toBe('running');
    expect(session.steps).toEqual([]);
    expect(session.toRecord().endedAt).toBeNull();
  });

  it('assigns consecutive indexes and freezes steps', () => {
    const session = newSession();
    const a = session.appendStep(STEP);
    const b = session.appendStep(STEP);
    expect([a.index, b.index]).toEqual([0, 1]);
    expect(Object.isFrozen(a)).toBe(true);
  });

  it('finishes exactly once', () => {
    const session = newSession();
    session.finish('succeeded', 'done', '2025-01-01T00:00:01.000Z');
    expect(() => session.finish('failed', 'again', '2025-01-01T00:00:02.000Z')).toThrow('already finished as succeeded');
    expect(session.toRecord()).toMatchObject({
      status: 'succeeded',
      terminalReason: 'done',
      endedAt: '2025-01-01T00:00:01.000Z',
    });
  });

  it('rejects steps after the terminal transition', () => {
    const session = newSession();
    session.finish('aborted', 'cancelled', '2025-01-01T00:00:01.000Z');
    expect(() => session.appendStep(STEP)).toThrow('steps can no longer be appended');
    expect(session.steps).toHaveLength(0);
  });

  it('returns records that do not share the step array', () => {
    const session = newSession();
    const record = session.toRecord();
    session.appendStep(STEP);
    expect(record.steps).toHaveLength(0);
  });
});
