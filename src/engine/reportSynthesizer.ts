import type {
  FailureDetail,
  Report,
  SceneSnapshot,
  SessionStatus,
  StepRecord,
  StepSummary,
  TaskSessionRecord,
} from '../sessions/types.js';
import { describeAction } from './actionSpec.js';
import { diffLines } from '../utils/textDiff.js';

const STATUS_LABELS: Record<SessionStatus, string> = {
  running: 'Running',
  succeeded: 'Succeeded',
  failed: 'Failed',
  timed_out: 'Timed out',
  aborted: 'Aborted',
};

function summarize(record: TaskSessionRecord): string {
  const count = record.steps.length;
  const base = `${STATUS_LABELS[record.status]} after ${count} ${count === 1 ? 'step' : 'steps'}`;
  return record.terminalReason ? `${base}: ${record.terminalReason}` : base;
}

function summarizeStep(step: StepRecord): StepSummary {
  return {
    index: step.index,
    actionKind: step.action.kind,
    action: describeAction(step.action),
    classification: step.outcome.classification,
    elapsedMs: step.outcome.durationMs,
  };
}

// Pre and post snapshots in capture order, without repeats
function orderedSnapshots(steps: readonly StepRecord[]): SceneSnapshot[] {
  const seen = new Set<number>();
  const snapshots: SceneSnapshot[] = [];
  for (const step of steps) {
    for (const snapshot of [step.preSnapshot, step.postSnapshot]) {
      if (snapshot && !seen.has(snapshot.sequence)) {
        seen.add(snapshot.sequence);
        snapshots.push(snapshot);
      }
    }
  }
  return snapshots;
}

function offendingStep(steps: readonly StepRecord[]): StepRecord | null {
  for (let i = steps.length - 1; i >= 0; i--) {
    const c = steps[i].outcome.classification;
    if (c === 'deviceError' || c === 'timeout') return steps[i];
  }
  return steps.length > 0 ? steps[steps.length - 1] : null;
}

function buildFailureDetail(record: TaskSessionRecord): FailureDetail {
  const step = offendingStep(record.steps);
  const snapshots = orderedSnapshots(record.steps);
  const snapshotDiff =
    snapshots.length >= 2
      ? diffLines(snapshots[snapshots.length - 2].textExtract, snapshots[snapshots.length - 1].textExtract)
      : [];

  const reasons = [record.terminalReason ?? record.status];
  if (step?.outcome.error) reasons.push(step.outcome.error);

  return {
    stepIndex: step ? step.index : null,
    stepNumber: step ? step.index + 1 : null,
    reason: reasons.join('; '),
    snapshotDiff,
  };
}

export function synthesize(record: TaskSessionRecord, generatedAt: Date = new Date()): Report {
  const screenshots: string[] = [];
  for (const snapshot of orderedSnapshots(record.steps)) {
    if (!screenshots.includes(snapshot.screenshotRef)) screenshots.push(snapshot.screenshotRef);
  }

  const report: Report = {
    sessionId: record.id,
    deviceId: record.deviceId,
    goal: record.goal.text,
    status: record.status,
    summary: summarize(record),
    stepSummaries: record.steps.map(summarizeStep),
    screenshots,
    startedAt: record.startedAt,
    endedAt: record.endedAt,
    generatedAt: generatedAt.toISOString(),
  };
  if (record.status === 'failed' || record.status === 'timed_out') {
    report.failureDetail = buildFailureDetail(record);
  }
  return report;
}

export function renderReportMarkdown(report: Report): string {
  const lines: string[] = [
    `# Test Report: ${report.goal.split('\n')[0]}`,
    '',
    `- **Session:** ${report.sessionId}`,
    `- **Device:** ${report.deviceId}`,
    `- **Status:** ${STATUS_LABELS[report.status]}`,
    `- **Started:** ${report.startedAt}`,
    `- **Ended:** ${report.endedAt ?? '-'}`,
    '',
    '## Summary',
    '',
    report.summary,
    '',
    '## Steps',
    '',
  ];

  if (report.stepSummaries.length === 0) {
    lines.push('No steps were executed.');
  } else {
    lines.push('| # | Action | Result | Time (ms) |', '|---|---|---|---|');
    for (const step of report.stepSummaries) {
      lines.push(`| ${step.index + 1} | \`${step.action}\` | ${step.classification} | ${step.elapsedMs} |`);
    }
  }

  if (report.failureDetail) {
    const detail = report.failureDetail;
    lines.push('', '## Failure', '');
    lines.push(detail.stepNumber !== null ? `Step ${detail.stepNumber}: ${detail.reason}` : detail.reason);
    if (detail.snapshotDiff.length > 0) {
      lines.push('', '```diff', ...detail.snapshotDiff, '```');
    }
  }

  if (report.screenshots.length > 0) {
    lines.push('', '## Screenshots', '');
    for (const ref of report.screenshots) lines.push(`- ${ref}`);
  }

  lines.push('', `_Generated ${report.generatedAt}_`, '');
  return lines.join('\n');
}
