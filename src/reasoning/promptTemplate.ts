import type { ResolvedGoal, SceneSnapshot, StepRecord } from '../sessions/types.js';
import { describeAction } from '../engine/actionSpec.js';
import { listClickable } from '../device/uiHierarchy.js';

const HISTORY_WINDOW = 10;
const MAX_ELEMENTS = 60;

export const FEATURE_GOAL_TEMPLATE = 'Verify that {{feature}} works correctly and report any defects';

export interface FeatureGoalParams {
  feature: string;
  description?: string;
}

export function buildFeatureGoal(params: FeatureGoalParams): string {
  let goal = FEATURE_GOAL_TEMPLATE.replace('{{feature}}', params.feature.trim());
  if (params.description?.trim()) {
    goal += `\nExpected behavior: ${params.description.trim()}`;
  }
  return goal;
}

export function buildSystemPrompt(goal: ResolvedGoal): string {
  const target = goal.targetPackage ? `\nTARGET APP: ${goal.targetPackage}` : '';
  return `You are operating an Android emulator to accomplish a goal.

GOAL: ${goal.text}${target}
STEP BUDGET: ${goal.maxSteps}

Each turn you see the current screenshot, the visible text and the tappable
elements with their center coordinates in screen pixels. Choose ONE next action.

Respond ONLY with a single JSON object, one of:
{"kind":"tap","x":540,"y":1200}
{"kind":"swipe","x1":540,"y1":1600,"x2":540,"y2":600,"durationMs":300}
{"kind":"type","text":"hello"}
{"kind":"key","code":4}
{"kind":"install","path":"/path/to/app.apk"}
{"kind":"uninstall","pkg":"com.example.app"}
{"kind":"start","pkg":"com.example.app","activity":".MainActivity"}
{"kind":"wait","ms":1000}
{"kind":"done","success":true,"reason":"what was verified"}

Key codes: 3 home, 4 back, 66 enter, 67 delete.
Use "done" with success=false when the goal cannot be reached or a defect
(crash, wrong result) was observed, and say why in "reason".`;
}

function formatHistory(history: readonly StepRecord[]): string {
  if (history.length === 0) return 'none';
  return history
    .slice(-HISTORY_WINDOW)
    .map((step) => {
      const error = step.outcome.error ? ` (${step.outcome.error})` : '';
      return `${step.index + 1}. ${describeAction(step.action)} -> ${step.outcome.classification}${error}`;
    })
    .join('\n');
}

export function buildDecisionPrompt(
  goal: ResolvedGoal,
  history: readonly StepRecord[],
  snapshot: SceneSnapshot,
): string {
  const elements = listClickable(snapshot.uiTree)
    .slice(0, MAX_ELEMENTS)
    .map((el) => `- [${el.role}] "${el.label}" at (${el.centerX},${el.centerY})`)
    .join('\n');

  return `Steps taken so far (${history.length}/${goal.maxSteps}):
${formatHistory(history)}

Visible text:
${snapshot.textExtract || '(none)'}

Tappable elements:
${elements || '(none)'}

What should I do next?`;
}
