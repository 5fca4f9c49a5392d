import type { ActionSpec } from '../engine/actionSpec.js';
import type { ResolvedGoal, SceneSnapshot, StepRecord } from '../sessions/types.js';

export interface ReasoningEngine {
  decide(goal: ResolvedGoal, history: readonly StepRecord[], snapshot: SceneSnapshot): Promise<ActionSpec>;
}
