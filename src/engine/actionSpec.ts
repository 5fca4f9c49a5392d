import { z } from 'zod';
import { ReasoningError } from '../errors.js';

const coordinate = z.number().int().min(0);

export const actionSpecSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('tap'), x: coordinate, y: coordinate }),
  z.object({
    kind: z.literal('swipe'),
    x1: coordinate,
    y1: coordinate,
    x2: coordinate,
    y2: coordinate,
    durationMs: z.number().int().min(1).max(10_000),
  }),
  z.object({ kind: z.literal('type'), text: z.string().min(1).max(1000) }),
  z.object({ kind: z.literal('key'), code: z.number().int().min(0).max(400) }),
  z.object({ kind: z.literal('install'), path: z.string().min(1) }),
  z.object({ kind: z.literal('uninstall'), pkg: z.string().min(1) }),
  z.object({ kind: z.literal('start'), pkg: z.string().min(1), activity: z.string().min(1).optional() }),
  z.object({ kind: z.literal('wait'), ms: z.number().int().min(0).max(60_000) }),
  z.object({ kind: z.literal('done'), success: z.boolean(), reason: z.string() }),
]);

export type ActionSpec = z.infer<typeof actionSpecSchema>;
export type ActionKind = ActionSpec['kind'];
export type DoneDirective = Extract<ActionSpec, { kind: 'done' }>;
export type DeviceAction = Exclude<ActionSpec, DoneDirective>;

export const KEYCODE_HOME = 3;
export const KEYCODE_BACK = 4;

export function parseDecisionText(text: string): ActionSpec {
  const jsonMatch = text.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    throw new ReasoningError('No JSON directive found in reasoning output');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(jsonMatch[0]);
  } catch {
    throw new ReasoningError('Reasoning output is not valid JSON');
  }

  return validateDecision(raw);
}

export function validateDecision(raw: unknown): ActionSpec {
  const parsed = actionSpecSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ReasoningError(`Unparseable directive${where}: ${issue?.message ?? 'invalid'}`);
  }
  return parsed.data;
}

function canonical(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonical);
  if (value && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([, v]) => v !== undefined)
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([k, v]) => [k, canonical(v)]),
    );
  }
  return value;
}

// Structural equality, independent of key order
export function actionsEqual(a: ActionSpec, b: ActionSpec): boolean {
  return JSON.stringify(canonical(a)) === JSON.stringify(canonical(b));
}

export function describeAction(action: ActionSpec): string {
  switch (action.kind) {
    case 'tap':
      return `tap(${action.x},${action.y})`;
    case 'swipe':
      return `swipe(${action.x1},${action.y1}->${action.x2},${action.y2},${action.durationMs}ms)`;
    case 'type':
      return `type(${JSON.stringify(action.text.length > 40 ? action.text.slice(0, 40) + '...' : action.text)})`;
    case 'key':
      return `key(${action.code})`;
    case 'install':
      return `install(${action.path})`;
    case 'uninstall':
      return `uninstall(${action.pkg})`;
    case 'start':
      return action.activity ? `start(${action.pkg}/${action.activity})` : `start(${action.pkg})`;
    case 'wait':
      return `wait(${action.ms}ms)`;
    case 'done':
      return `done(${action.success ? 'success' : 'failure'})`;
  }
}
