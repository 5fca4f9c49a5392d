import type { TaskOrchestrator, RunOptions } from './orchestrator.js';
import type { Report, TaskSessionRecord } from '../sessions/types.js';
import { buildFeatureGoal } from '../reasoning/promptTemplate.js';
import { synthesize } from './reportSynthesizer.js';

export interface FeatureTestRequest {
  feature: string;
  description?: string;
  targetPackage?: string;
  maxSteps: number;
  timeBudgetMs: number;
}

export interface FeatureTestResult {
  session: TaskSessionRecord;
  report: Report;
}

export class FeatureTester {
  constructor(
    private readonly orchestrator: TaskOrchestrator,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async test(request: FeatureTestRequest, runOptions: RunOptions = {}): Promise<FeatureTestResult> {
    const session = await this.orchestrator.run(
      {
        text: buildFeatureGoal({ feature: request.feature, description: request.description }),
        maxSteps: request.maxSteps,
        timeBudgetMs: request.timeBudgetMs,
        ...(request.targetPackage ? { targetPackage: request.targetPackage } : {}),
      },
      runOptions,
    );
    return { session, report: synthesize(session, this.clock()) };
  }
}
