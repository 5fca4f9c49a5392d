import type { ActionSpec, ActionKind } from '../engine/actionSpec.js';
import type { RawActionResult } from '../device/types.js';

export type SessionStatus = 'running' | 'succeeded' | 'failed' | 'timed_out' | 'aborted';
export type TerminalStatus = Exclude<SessionStatus, 'running'>;

export interface Goal {
  text: string;
  maxSteps?: number;
  timeBudgetMs?: number;
  targetPackage?: string;
}

export interface ResolvedGoal {
  text: string;
  maxSteps: number;
  timeBudgetMs: number;
  targetPackage?: string;
}

export interface UiBounds {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

export interface UiElement {
  role: string;
  className: string;
  text: string;
  resourceId: string;
  contentDesc: string;
  bounds: UiBounds | null;
  clickable: boolean;
  children: UiElement[];
}

export interface SceneSnapshot {
  readonly sequence: number;
  readonly timestamp: string;
  readonly screenshotRef: string;
  readonly screenshotHash: string;
  readonly uiTree: readonly UiElement[];
  readonly uiTreeSerialization: string;
  readonly textExtract: string;
}

export type OutcomeClassification = 'ok' | 'deviceError' | 'timeout' | 'noop';

// What the post-action scan of the device log stream found
export type LogCheck = 'clean' | 'crash' | 'unavailable' | 'skipped';

export interface ActionOutcome {
  readonly action: ActionSpec;
  readonly issuedAt: string;
  readonly durationMs: number;
  readonly rawResult: RawActionResult | null;
  readonly classification: OutcomeClassification;
  readonly logCheck: LogCheck;
  readonly error?: string;
}

export interface StepRecord {
  readonly index: number;
  readonly preSnapshot: SceneSnapshot;
  readonly action: ActionSpec;
  readonly outcome: ActionOutcome;
  readonly postSnapshot: SceneSnapshot | null;
}

export interface TaskSessionRecord {
  id: string;
  deviceId: string;
  goal: ResolvedGoal;
  status: SessionStatus;
  steps: StepRecord[];
  startedAt: string;
  endedAt: string | null;
  terminalReason: string | null;
}

export interface SessionSummary {
  sessionId: string;
  deviceId: string;
  goal: string;
  status: SessionStatus;
  steps: number;
  startedAt: string;
  endedAt: string | null;
}

export interface StepSummary {
  index: number;
  actionKind: ActionKind;
  action: string;
  classification: OutcomeClassification;
  elapsedMs: number;
}

export interface FailureDetail {
  // Zero-based index of the offending step, null when no step was recorded
  stepIndex: number | null;
  // One-based position of the same step, as shown to readers
  stepNumber: number | null;
  reason: string;
  snapshotDiff: string[];
}

export interface Report {
  sessionId: string;
  deviceId: string;
  goal: string;
  status: SessionStatus;
  summary: string;
  stepSummaries: StepSummary[];
  failureDetail?: FailureDetail;
  screenshots: string[];
  startedAt: string;
  endedAt: string | null;
  generatedAt: string;
}
