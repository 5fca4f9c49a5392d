import * as path from 'node:path';

export interface Config {
  port: number;
  bind: string;
  apiToken: string;
  dataDir: string;
  artifactsDir: string;
  devices: string[];
  adbPath: string;
  apkRoots: string[];
  apkDenyGlobs: string[];
  defaultMaxSteps: number;
  maxStepsCap: number;
  defaultTimeBudgetSeconds: number;
  timeBudgetSecondsCap: number;
  captureTimeoutMs: number;
  actionTimeoutMs: number;
  packageTimeoutMs: number;
  model: string;
  googleApiKey: string | null;
}

function splitList(raw: string | undefined): string[] {
  return (raw || '').split(',').map(s => s.trim()).filter(Boolean);
}

function positiveInt(raw: string | undefined, fallback: number): number {
  const value = parseInt(raw || '', 10);
  return Number.isFinite(value) && value >= 1 ? value : fallback;
}

export function loadConfig(): Config {
  const apiToken = process.env.DP_API_TOKEN;
  if (!apiToken) {
    throw new Error('DP_API_TOKEN is required but not set');
  }

  const devices = splitList(process.env.DP_DEVICES);
  const port = parseInt(process.env.DP_PORT || '8790', 10);
  const dataDir = process.env.DP_DATA_DIR || './data/sessions';

  const maxStepsCap = 200;
  const timeBudgetSecondsCap = 1800;

  return {
    port: Number.isFinite(port) && port >= 1 && port <= 65535 ? port : 8790,
    bind: process.env.DP_BIND || '127.0.0.1',
    apiToken,
    dataDir,
    artifactsDir: process.env.DP_ARTIFACTS_DIR || path.join(dataDir, '..', 'artifacts'),
    devices: devices.length > 0 ? devices : ['emulator-5554'],
    adbPath: process.env.DP_ADB_PATH || 'adb',
    apkRoots: splitList(process.env.DP_APK_ROOTS),
    apkDenyGlobs: splitList(process.env.DP_APK_DENY_GLOBS),
    defaultMaxSteps: Math.min(positiveInt(process.env.DP_DEFAULT_MAX_STEPS, 40), maxStepsCap),
    maxStepsCap,
    defaultTimeBudgetSeconds: Math.min(
      positiveInt(process.env.DP_DEFAULT_TIME_BUDGET_SECONDS, 300),
      timeBudgetSecondsCap,
    ),
    timeBudgetSecondsCap,
    captureTimeoutMs: positiveInt(process.env.DP_CAPTURE_TIMEOUT_MS, 5000),
    actionTimeoutMs: positiveInt(process.env.DP_ACTION_TIMEOUT_MS, 10_000),
    packageTimeoutMs: positiveInt(process.env.DP_PACKAGE_TIMEOUT_MS, 120_000),
    model: process.env.DP_MODEL || 'gemini-2.5-flash',
    googleApiKey: process.env.GOOGLE_GENERATIVE_AI_API_KEY || null,
  };
}
