import type {
  ResolvedGoal,
  SessionStatus,
  StepRecord,
  TaskSessionRecord,
  TerminalStatus,
} from './types.js';

type NewStep = Omit<StepRecord, 'index'>;

export class TaskSession {
  private readonly stepList: StepRecord[] = [];
  private currentStatus: SessionStatus = 'running';
  private endTime: string | null = null;
  private reason: string | null = null;

  constructor(
    readonly id: string,
    readonly deviceId: string,
    readonly goal: ResolvedGoal,
    readonly startedAt: string,
  ) {}

  get status(): SessionStatus {
    return this.currentStatus;
  }

  get steps(): readonly StepRecord[] {
    return this.stepList;
  }

  get terminalReason(): string | null {
    return this.reason;
  }

  get isTerminal(): boolean {
    return this.currentStatus !== 'running';
  }

  appendStep(step: NewStep): StepRecord {
    if (this.isTerminal) {
      throw new Error(`Session ${this.id} is ${this.currentStatus}; steps can no longer be appended`);
    }
    const record: StepRecord = Object.freeze({ ...step, index: this.stepList.length });
    this.stepList.push(record);
    return record;
  }

  finish(status: TerminalStatus, reason: string, endedAt: string): void {
    if (this.isTerminal) {
      throw new Error(`Session ${this.id} already finished as ${this.currentStatus}`);
    }
    this.currentStatus = status;
    this.reason = reason;
    this.endTime = endedAt;
  }

  toRecord(): TaskSessionRecord {
    return {
      id: this.id,
      deviceId: this.deviceId,
      goal: this.goal,
      status: this.currentStatus,
      steps: [...this.stepList],
      startedAt: this.startedAt,
      endedAt: this.endTime,
      terminalReason: this.reason,
    };
  }
}
