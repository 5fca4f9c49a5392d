import type { ActionSpec, DeviceAction } from './actionSpec.js';
import type { DeviceDriver, RawActionResult } from '../device/types.js';
import { DeviceDriverError } from '../device/types.js';
import { serialDriver, type SerialDeviceDriver } from '../device/serialDriver.js';
import type { ActionOutcome, LogCheck, OutcomeClassification } from '../sessions/types.js';
import { detectCrashes, describeCrash } from '../utils/crashDetector.js';
import { withTimeout, sleep as defaultSleep, TimeoutError } from '../utils/timeout.js';
import { getErrorMessage } from '../errors.js';

// Returns a rejection reason, or null when the APK path may be installed
export type InstallGuard = (apkPath: string) => string | null;

export interface ExecutorOptions {
  actionTimeoutMs?: number;
  // install/uninstall
  packageTimeoutMs?: number;
  installGuard?: InstallGuard;
  clock?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export interface ExecutionContext {
  // Crash attribution is restricted to this package
  targetPackage?: string;
  // Remaining session time; waits and command timeouts are cut to it
  budgetMs?: number;
}

interface Classified {
  rawResult: RawActionResult | null;
  classification: OutcomeClassification;
  logCheck: LogCheck;
  error?: string;
}

export class ActionExecutor {
  private readonly driver: SerialDeviceDriver;
  private readonly actionTimeoutMs: number;
  private readonly packageTimeoutMs: number;
  private readonly clock: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    driver: DeviceDriver,
    private readonly options: ExecutorOptions = {},
  ) {
    this.driver = serialDriver(driver);
    this.actionTimeoutMs = options.actionTimeoutMs ?? 10_000;
    this.packageTimeoutMs = options.packageTimeoutMs ?? 120_000;
    this.clock = options.clock ?? (() => new Date());
    this.sleep = options.sleep ?? defaultSleep;
  }

  async execute(action: ActionSpec, context: ExecutionContext = {}): Promise<ActionOutcome> {
    const issued = this.clock();
    const classified = await this.dispatch(action, issued.getTime(), context);
    const durationMs = Math.max(0, this.clock().getTime() - issued.getTime());

    const outcome: ActionOutcome = {
      action,
      issuedAt: issued.toISOString(),
      durationMs,
      rawResult: classified.rawResult,
      classification: classified.classification,
      logCheck: classified.logCheck,
      ...(classified.error !== undefined ? { error: classified.error } : {}),
    };
    return Object.freeze(outcome);
  }

  private async dispatch(action: ActionSpec, issuedAtMs: number, context: ExecutionContext): Promise<Classified> {
    if (action.kind === 'done') {
      return { rawResult: null, classification: 'noop', logCheck: 'skipped' };
    }
    const budgetMs = context.budgetMs ?? Number.POSITIVE_INFINITY;
    if (action.kind === 'wait') {
      await this.sleep(Math.max(0, Math.min(action.ms, budgetMs)));
      return { rawResult: null, classification: 'ok', logCheck: 'skipped' };
    }

    if (action.kind === 'install' && this.options.installGuard) {
      const rejection = this.options.installGuard(action.path);
      if (rejection !== null) {
        return { rawResult: null, classification: 'deviceError', logCheck: 'skipped', error: `install rejected: ${rejection}` };
      }
    }

    let raw: RawActionResult;
    try {
      await this.driver.idle();
      const timeoutMs = Math.max(1, Math.min(this.timeoutFor(action), budgetMs));
      raw = await withTimeout(this.driver.performAction(action), timeoutMs, action.kind);
    } catch (err) {
      if (err instanceof TimeoutError || (err instanceof DeviceDriverError && err.failure === 'timeout')) {
        return { rawResult: null, classification: 'timeout', logCheck: 'skipped', error: getErrorMessage(err) };
      }
      if (err instanceof DeviceDriverError) {
        return { rawResult: null, classification: 'deviceError', logCheck: 'skipped', error: `${err.failure}: ${err.message}` };
      }
      throw err;
    }

    if (!raw.ok) {
      return { rawResult: raw, classification: 'deviceError', logCheck: 'skipped', error: `command rejected: ${raw.output.trim()}` };
    }

    const leftMs = Number.isFinite(budgetMs) ? budgetMs - (this.clock().getTime() - issuedAtMs) : this.actionTimeoutMs;
    if (leftMs <= 0) {
      return { rawResult: raw, classification: 'ok', logCheck: 'skipped' };
    }
    return this.checkLogs(raw, issuedAtMs, Math.min(this.actionTimeoutMs, leftMs), context.targetPackage);
  }

  private async checkLogs(
    raw: RawActionResult,
    sinceMs: number,
    timeoutMs: number,
    targetPackage?: string,
  ): Promise<Classified> {
    let lines: string[];
    try {
      lines = await withTimeout(this.driver.readLogs(sinceMs), timeoutMs, 'log read');
    } catch (err) {
      console.warn(`[executor] log scan unavailable on ${this.driver.deviceId}: ${getErrorMessage(err)}`);
      return { rawResult: raw, classification: 'ok', logCheck: 'unavailable' };
    }

    const crashes = detectCrashes(lines, targetPackage);
    if (crashes.length > 0) {
      return {
        rawResult: raw,
        classification: 'deviceError',
        logCheck: 'crash',
        error: `app crash detected: ${crashes.map(describeCrash).join(', ')}`,
      };
    }
    return { rawResult: raw, classification: 'ok', logCheck: 'clean' };
  }

  private timeoutFor(action: DeviceAction): number {
    return action.kind === 'install' || action.kind === 'uninstall'
      ? this.packageTimeoutMs
      : this.actionTimeoutMs;
  }
}
