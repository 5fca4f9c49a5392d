import { describe, it, expect } from 'vitest';
import {
  validateGoalInput,
  validateFeatureInput,
  validateActionInput,
  isActionName,
} from '../../src/security/policy.js';

const baseConfig = {
  devices: ['emulator-5554', 'emulator-5556'],
  defaultMaxSteps: 40,
  maxStepsCap: 200,
  defaultTimeBudgetSeconds: 300,
  timeBudgetSecondsCap: 1800,
};

describe('validateGoalInput', () => {
  it('accepts valid input with defaults', () => {
    const result = validateGoalInput({ goal: '  Open settings ' }, baseConfig);
    expect(result).toEqual({
      valid: true,
      sanitized: { goal: 'Open settings', device: 'emulator-5554', max_steps: 40, time_budget_seconds: 300 },
      errors: [],
    });
  });

  it('rejects missing goal', () => {
    const result = validateGoalInput({}, baseConfig);
    expect(result.valid).toBe(false);
    expect(result.errors).toContain('goal is required');
  });

  it('rejects a non-object body', () => {
    expect(validateGoalInput(null, baseConfig).errors).toEqual(['goal is required']);
  });

  it('rejects goal exceeding 4KB', () => {
    expect(validateGoalInput({ goal: 'a'.repeat(4097) }, baseConfig).errors).toEqual(['goal exceeds 4KB limit']);
  });

  it('caps budgets', () => {
    const result = validateGoalInput({ goal: 'x', max_steps: 500, time_budget_seconds: 5000 }, baseConfig);
    expect(result.sanitized?.max_steps).toBe(200);
    expect(result.sanitized?.time_budget_seconds).toBe(1800);
  });

  it('rejects malformed budgets', () => {
    const result = validateGoalInput({ goal: 'x', max_steps: 0, time_budget_seconds: 'soon' }, baseConfig);
    expect(result.errors).toEqual([
      'max_steps must be a positive integer',
      'time_budget_seconds must be a positive number',
    ]);
  });

  it('validates target_package', () => {
    expect(validateGoalInput({ goal: 'x', target_package: 'com.example.shop' }, baseConfig).sanitized?.target_package)
      .toBe('com.example.shop');
    expect(validateGoalInput({ goal: 'x', target_package: 'not a package' }, baseConfig).errors)
      .toEqual(['target_package must be a valid Android package name']);
  });

  it('selects configured devices only', () => {
    expect(validateGoalInput({ goal: 'x', device: 'emulator-5556' }, baseConfig).sanitized?.device).toBe('emulator-5556');
    expect(validateGoalInput({ goal: 'x', device: 'emulator-9999' }, baseConfig).errors).toEqual(['device is not configured']);
  });
});

describe('validateFeatureInput', () => {
  it('trims the feature and drops an empty description', () => {
    const result = validateFeatureInput({ feature: ' login ', description: '  ' }, baseConfig);
    expect(result.sanitized).toEqual({ feature: 'login', device: 'emulator-5554', max_steps: 40, time_budget_seconds: 300 });
  });

  it('keeps a description', () => {
    const result = validateFeatureInput({ feature: 'login', description: 'shows the home feed' }, baseConfig);
    expect(result.sanitized?.description).toBe('shows the home feed');
  });

  it('rejects missing feature and bad description', () => {
    expect(validateFeatureInput({ description: 5 }, baseConfig).errors).toEqual([
      'feature is required',
      'description must be a string',
    ]);
  });
});

describe('validateActionInput', () => {
  it('maps tool bodies onto actions', () => {
    expect(validateActionInput('tap', { x: 1, y: 2 }).sanitized).toEqual({ kind: 'tap', x: 1, y: 2 });
    expect(validateActionInput('back', {}).sanitized).toEqual({ kind: 'key', code: 4 });
    expect(validateActionInput('home', undefined).sanitized).toEqual({ kind: 'key', code: 3 });
    expect(validateActionInput('swipe', { x1: 0, y1: 900, x2: 0, y2: 100 }).sanitized).toEqual({
      kind: 'swipe', x1: 0, y1: 900, x2: 0, y2: 100, durationMs: 300,
    });
    expect(validateActionInput('start', { package: 'com.example.shop', activity: '.Main' }).sanitized).toEqual({
      kind: 'start', pkg: 'com.example.shop', activity: '.Main',
    });
    expect(validateActionInput('uninstall', { package: 'com.example.shop' }).sanitized).toEqual({
      kind: 'uninstall', pkg: 'com.example.shop',
    });
  });

  it('reports missing fields by name', () => {
    expect(validateActionInput('tap', { x: 1 }).errors).toEqual(['y: Required']);
  });

  it('rejects invalid package names', () => {
    expect(validateActionInput('uninstall', { package: 'shop' }).errors).toEqual([
      'package must be a valid Android package name',
    ]);
  });
});

describe('isActionName', () => {
  it('knows the tool actions', () => {
    expect(isActionName('back')).toBe(true);
    expect(isActionName('done')).toBe(false);
  });
});
