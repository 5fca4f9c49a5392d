import type { Config } from '../config.js';
import {
  actionSpecSchema,
  KEYCODE_BACK,
  KEYCODE_HOME,
  type DeviceAction,
} from '../engine/actionSpec.js';

type PolicyConfig = Pick<
  Config,
  'devices' | 'defaultMaxSteps' | 'maxStepsCap' | 'defaultTimeBudgetSeconds' | 'timeBudgetSecondsCap'
>;

export interface SanitizedGoalInput {
  goal: string;
  device: string;
  max_steps: number;
  time_budget_seconds: number;
  target_package?: string;
}

export interface SanitizedFeatureInput {
  feature: string;
  description?: string;
  device: string;
  max_steps: number;
  time_budget_seconds: number;
  target_package?: string;
}

export interface ValidationResult<T> {
  valid: boolean;
  sanitized?: T;
  errors: string[];
}

const MAX_GOAL_BYTES = 4096;
const MAX_FEATURE_BYTES = 256;
const PACKAGE_PATTERN = /^[a-zA-Z][a-zA-Z0-9_]*(\.[a-zA-Z][a-zA-Z0-9_]*)+$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

interface CommonFields {
  device: string;
  max_steps: number;
  time_budget_seconds: number;
  target_package?: string;
}

function validateCommon(input: Record<string, unknown>, config: PolicyConfig, errors: string[]): CommonFields {
  const { max_steps: maxSteps, time_budget_seconds: budget, target_package: pkg, device } = input;

  if (maxSteps !== undefined && (typeof maxSteps !== 'number' || !Number.isInteger(maxSteps) || maxSteps < 1)) {
    errors.push('max_steps must be a positive integer');
  }
  if (budget !== undefined && (typeof budget !== 'number' || !Number.isFinite(budget) || budget <= 0)) {
    errors.push('time_budget_seconds must be a positive number');
  }
  if (pkg !== undefined && (typeof pkg !== 'string' || !PACKAGE_PATTERN.test(pkg))) {
    errors.push('target_package must be a valid Android package name');
  }

  let resolvedDevice = config.devices[0];
  if (device !== undefined) {
    if (typeof device !== 'string' || !config.devices.includes(device)) {
      errors.push('device is not configured');
    } else {
      resolvedDevice = device;
    }
  }

  return {
    device: resolvedDevice,
    max_steps: Math.min(typeof maxSteps === 'number' && maxSteps >= 1 ? maxSteps : config.defaultMaxSteps, config.maxStepsCap),
    time_budget_seconds: Math.min(
      typeof budget === 'number' && budget > 0 ? budget : config.defaultTimeBudgetSeconds,
      config.timeBudgetSecondsCap,
    ),
    ...(typeof pkg === 'string' ? { target_package: pkg } : {}),
  };
}

export function validateGoalInput(input: unknown, config: PolicyConfig): ValidationResult<SanitizedGoalInput> {
  const errors: string[] = [];
  const body = isRecord(input) ? input : {};

  const goal = body.goal;
  if (typeof goal !== 'string' || !goal.trim()) {
    errors.push('goal is required');
  } else if (Buffer.byteLength(goal, 'utf-8') > MAX_GOAL_BYTES) {
    errors.push('goal exceeds 4KB limit');
  }

  const common = validateCommon(body, config, errors);
  if (errors.length > 0 || typeof goal !== 'string') {
    return { valid: false, errors };
  }

  return { valid: true, sanitized: { goal: goal.trim(), ...common }, errors: [] };
}

export function validateFeatureInput(input: unknown, config: PolicyConfig): ValidationResult<SanitizedFeatureInput> {
  const errors: string[] = [];
  const body = isRecord(input) ? input : {};

  const feature = body.feature;
  if (typeof feature !== 'string' || !feature.trim()) {
    errors.push('feature is required');
  } else if (Buffer.byteLength(feature, 'utf-8') > MAX_FEATURE_BYTES) {
    errors.push('feature exceeds 256 byte limit');
  }

  const description = body.description;
  if (description !== undefined) {
    if (typeof description !== 'string') {
      errors.push('description must be a string');
    } else if (Buffer.byteLength(description, 'utf-8') > MAX_GOAL_BYTES) {
      errors.push('description exceeds 4KB limit');
    }
  }

  const common = validateCommon(body, config, errors);
  if (errors.length > 0 || typeof feature !== 'string') {
    return { valid: false, errors };
  }

  return {
    valid: true,
    sanitized: {
      feature: feature.trim(),
      ...(typeof description === 'string' && description.trim() ? { description: description.trim() } : {}),
      ...common,
    },
    errors: [],
  };
}

export const ACTION_NAMES = [
  'tap', 'swipe', 'type', 'key', 'back', 'home', 'wait', 'install', 'uninstall', 'start',
] as const;
export type ActionName = (typeof ACTION_NAMES)[number];

export function isActionName(name: string): name is ActionName {
  return (ACTION_NAMES as readonly string[]).includes(name);
}

const DEFAULT_SWIPE_MS = 300;

// Map a tool request body onto the action schema's field names
function toActionCandidate(name: ActionName, body: Record<string, unknown>): Record<string, unknown> {
  switch (name) {
    case 'tap':
      return { kind: 'tap', x: body.x, y: body.y };
    case 'swipe':
      return {
        kind: 'swipe',
        x1: body.x1,
        y1: body.y1,
        x2: body.x2,
        y2: body.y2,
        durationMs: body.duration_ms ?? DEFAULT_SWIPE_MS,
      };
    case 'type':
      return { kind: 'type', text: body.text };
    case 'key':
      return { kind: 'key', code: body.code };
    case 'back':
      return { kind: 'key', code: KEYCODE_BACK };
    case 'home':
      return { kind: 'key', code: KEYCODE_HOME };
    case 'wait':
      return { kind: 'wait', ms: body.ms };
    case 'install':
      return { kind: 'install', path: body.path };
    case 'uninstall':
      return { kind: 'uninstall', pkg: body.package };
    case 'start':
      return body.activity === undefined
        ? { kind: 'start', pkg: body.package }
        : { kind: 'start', pkg: body.package, activity: body.activity };
  }
}

export function validateActionInput(name: ActionName, input: unknown): ValidationResult<DeviceAction> {
  const body = isRecord(input) ? input : {};
  const parsed = actionSpecSchema.safeParse(toActionCandidate(name, body));
  if (!parsed.success) {
    return {
      valid: false,
      errors: parsed.error.issues.map((issue) => `${issue.path.join('.') || name}: ${issue.message}`),
    };
  }
  const action = parsed.data;
  if (action.kind === 'done') {
    return { valid: false, errors: ['done is not a device action'] };
  }
  if ((action.kind === 'uninstall' || action.kind === 'start') && !PACKAGE_PATTERN.test(action.pkg)) {
    return { valid: false, errors: ['package must be a valid Android package name'] };
  }
  return { valid: true, sanitized: action, errors: [] };
}
