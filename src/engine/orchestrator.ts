import type { DeviceDriver } from '../device/types.js';
import type { ReasoningEngine } from '../reasoning/types.js';
import type { SessionRegistry } from '../sessions/sessionRegistry.js';
import type { ScreenshotStore } from '../utils/artifacts.js';
import type {
  ActionOutcome,
  ResolvedGoal,
  SceneSnapshot,
  StepRecord,
  TaskSessionRecord,
  TerminalStatus,
} from '../sessions/types.js';
import { TaskSession } from '../sessions/taskSession.js';
import { SceneSnapshotBuilder } from './snapshotBuilder.js';
import { ActionExecutor } from './actionExecutor.js';
import { validateDecision, actionsEqual, describeAction, type ActionSpec } from './actionSpec.js';
import { CaptureError, getErrorMessage } from '../errors.js';
import { sleep as defaultSleep, withTimeout, TimeoutError } from '../utils/timeout.js';

const STALL_REPETITIONS = 3;

const CANCELLED: Terminal = { status: 'aborted', reason: 'cancelled' };
const OUT_OF_TIME: Terminal = { status: 'timed_out', reason: 'time_budget' };

export type ProgressListener = (record: TaskSessionRecord) => void | Promise<void>;

export interface OrchestratorOptions {
  deviceId: string;
  driver: DeviceDriver;
  engine: ReasoningEngine;
  registry: SessionRegistry;
  screenshots: ScreenshotStore;
  executor?: ActionExecutor;
  captureTimeoutMs?: number;
  // extra attempts after the first failed capture
  captureRetries?: number;
  captureRetryDelayMs?: number;
  clock?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export interface RunOptions {
  onProgress?: ProgressListener;
}

interface Terminal {
  status: TerminalStatus;
  reason: string;
}

/**
 * Perceive, decide, act, verify. One run holds the device lock from the
 * registry for its whole duration and always returns the session trace.
 */
export class TaskOrchestrator {
  readonly deviceId: string;
  private readonly executor: ActionExecutor;
  private readonly clock: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly captureRetries: number;
  private readonly captureRetryDelayMs: number;

  constructor(private readonly options: OrchestratorOptions) {
    this.deviceId = options.deviceId;
    this.clock = options.clock ?? (() => new Date());
    this.sleep = options.sleep ?? defaultSleep;
    this.executor = options.executor ?? new ActionExecutor(options.driver, { clock: this.clock, sleep: this.sleep });
    this.captureRetries = options.captureRetries ?? 3;
    this.captureRetryDelayMs = options.captureRetryDelayMs ?? 500;
  }

  // Throws DeviceBusyError, before any session exists, when the device is taken
  async run(goal: ResolvedGoal, runOptions: RunOptions = {}): Promise<TaskSessionRecord> {
    const lease = this.options.registry.begin(this.deviceId);
    const session = new TaskSession(lease.sessionId, this.deviceId, goal, this.clock().toISOString());
    const builder = new SceneSnapshotBuilder(this.options.driver, this.options.screenshots, {
      timeoutMs: this.options.captureTimeoutMs,
      clock: this.clock,
    });
    const notify = async () => {
      if (!runOptions.onProgress) return;
      try {
        await runOptions.onProgress(session.toRecord());
      } catch (err) {
        console.error(`[orchestrator] progress listener failed for ${session.id}: ${getErrorMessage(err)}`);
      }
    };

    console.log(`[orchestrator] session ${session.id} started on ${this.deviceId}: ${goal.text}`);

    try {
      await notify();
      const terminal = await this.loop(session, builder, lease.signal, notify);
      session.finish(terminal.status, terminal.reason, this.clock().toISOString());
    } catch (err) {
      const message = getErrorMessage(err);
      console.error(`[orchestrator] session ${session.id} internal error: ${message}`);
      if (!session.isTerminal) {
        session.finish('failed', `internal_error: ${message}`, this.clock().toISOString());
      }
    } finally {
      this.options.registry.end(session.id);
    }

    console.log(
      `[orchestrator] session ${session.id} ${session.status} after ${session.steps.length} step(s): ${session.terminalReason}`,
    );
    await notify();
    return session.toRecord();
  }

  abort(sessionId: string): boolean {
    return this.options.registry.abort(sessionId);
  }

  private async loop(
    session: TaskSession,
    builder: SceneSnapshotBuilder,
    signal: AbortSignal,
    notify: () => Promise<void>,
  ): Promise<Terminal> {
    const { goal } = session;
    const startedMs = Date.parse(session.startedAt);
    const remaining = () => goal.timeBudgetMs - (this.clock().getTime() - startedMs);

    for (;;) {
      if (signal.aborted) return CANCELLED;
      if (remaining() <= 0) return OUT_OF_TIME;

      const pre = await this.captureWithRetry(builder, session.id, remaining);
      if (!pre) return remaining() <= 0 ? OUT_OF_TIME : { status: 'failed', reason: 'capture_unavailable' };

      // The engine gets a copy; the live trace keeps growing
      const history = Object.freeze([...session.steps]);
      const decision = await this.decideWithRetry(goal, history, pre, session.id, remaining);
      if (decision === 'time_budget') return OUT_OF_TIME;
      if (!decision) return { status: 'failed', reason: 'reasoning_unavailable' };

      if (decision.kind === 'done') {
        const reason = decision.reason.trim() || (decision.success ? 'goal reached' : 'goal not reached');
        return { status: decision.success ? 'succeeded' : 'failed', reason };
      }

      if (signal.aborted) return CANCELLED;
      const budgetMs = remaining();
      if (budgetMs <= 0) return OUT_OF_TIME;

      const executed = await this.executor.execute(decision, { targetPackage: goal.targetPackage, budgetMs });
      const post = remaining() > 0 ? await this.captureWithRetry(builder, session.id, remaining) : null;
      const outcome = markNoEffect(executed, pre, post);

      const step = session.appendStep({ preSnapshot: pre, action: decision, outcome, postSnapshot: post });
      console.log(
        `[orchestrator] session ${session.id} step ${step.index + 1}: ${describeAction(decision)} -> ${outcome.classification}`,
      );
      await notify();

      if (!post) return remaining() <= 0 ? OUT_OF_TIME : { status: 'failed', reason: 'capture_unavailable' };
      if (signal.aborted) return CANCELLED;
      if (isStalled(session.steps)) return { status: 'failed', reason: 'stalled' };
      if (session.steps.length >= goal.maxSteps) return { status: 'timed_out', reason: 'max_steps' };
      if (remaining() <= 0) return OUT_OF_TIME;
    }
  }

  private async captureWithRetry(
    builder: SceneSnapshotBuilder,
    sessionId: string,
    remaining: () => number,
  ): Promise<SceneSnapshot | null> {
    for (let attempt = 0; attempt <= this.captureRetries; attempt++) {
      const budgetMs = remaining();
      if (budgetMs <= 0) return null;
      try {
        return await builder.capture(budgetMs);
      } catch (err) {
        if (!(err instanceof CaptureError)) throw err;
        console.warn(`[orchestrator] session ${sessionId} capture attempt ${attempt + 1} failed: ${err.message}`);
        if (attempt < this.captureRetries && this.captureRetryDelayMs > 0) {
          await this.sleep(Math.max(0, Math.min(this.captureRetryDelayMs, remaining())));
        }
      }
    }
    return null;
  }

  private async decideWithRetry(
    goal: ResolvedGoal,
    history: readonly StepRecord[],
    snapshot: SceneSnapshot,
    sessionId: string,
    remaining: () => number,
  ): Promise<ActionSpec | 'time_budget' | null> {
    for (let attempt = 1; attempt <= 2; attempt++) {
      const budgetMs = remaining();
      if (budgetMs <= 0) return 'time_budget';
      try {
        const raw: unknown = await withTimeout(
          this.options.engine.decide(goal, history, snapshot),
          budgetMs,
          'decision',
        );
        return validateDecision(raw);
      } catch (err) {
        if (err instanceof TimeoutError) return 'time_budget';
        console.warn(`[orchestrator] session ${sessionId} decision attempt ${attempt} failed: ${getErrorMessage(err)}`);
      }
    }
    return null;
  }
}

function markNoEffect(outcome: ActionOutcome, pre: SceneSnapshot, post: SceneSnapshot | null): ActionOutcome {
  if (outcome.classification !== 'ok' || !post) return outcome;
  if (post.uiTreeSerialization !== pre.uiTreeSerialization) return outcome;
  const marked: ActionOutcome = { ...outcome, classification: 'noop' };
  return Object.freeze(marked);
}

// Same action N times in a row with byte-identical post-action UI trees
export function isStalled(steps: readonly StepRecord[]): boolean {
  if (steps.length < STALL_REPETITIONS) return false;
  const recent = steps.slice(-STALL_REPETITIONS);
  const [first] = recent;
  if (!first.postSnapshot) return false;
  const serialization = first.postSnapshot.uiTreeSerialization;
  return recent.every(
    (step) =>
      actionsEqual(step.action, first.action) &&
      step.postSnapshot !== null &&
      step.postSnapshot.uiTreeSerialization === serialization,
  );
}
