import express, { type Request, type Response, type NextFunction } from 'express';
import type { Config } from './config.js';
import type { DeviceDriver } from './device/types.js';
import { DeviceDriverError } from './device/types.js';
import type { ActionExecutor } from './engine/actionExecutor.js';
import type { TaskOrchestrator } from './engine/orchestrator.js';
import type { ScreenshotStore } from './utils/artifacts.js';
import type { SessionRegistry } from './sessions/sessionRegistry.js';
import type { TaskSessionRecord } from './sessions/types.js';
import { FileSessionStore, isValidSessionId } from './sessions/sessionStore.js';
import { FeatureTester } from './engine/featureTester.js';
import { synthesize, renderReportMarkdown } from './engine/reportSynthesizer.js';
import { createAuthMiddleware } from './middleware/auth.js';
import {
  validateGoalInput,
  validateFeatureInput,
  validateActionInput,
  isActionName,
} from './security/policy.js';
import { validateApkPath } from './security/pathGuard.js';
import { redactLines } from './security/redaction.js';
import { parseUiHierarchy, extractText } from './device/uiHierarchy.js';
import { serialDriver } from './device/serialDriver.js';
import { withTimeout } from './utils/timeout.js';
import {
  CaptureError,
  DeviceBusyError,
  DeviceError,
  DroidPilotError,
  InvalidGoalError,
  SessionNotFoundError,
  getErrorMessage,
  type ErrorCode,
} from './errors.js';

export interface DeviceRuntime {
  driver: DeviceDriver;
  executor: ActionExecutor;
  orchestrator: TaskOrchestrator;
}

export interface AppDeps {
  devices: Map<string, DeviceRuntime>;
  store: FileSessionStore;
  screenshots: ScreenshotStore;
  registry: SessionRegistry;
  clock?: () => Date;
}

const MAX_LOG_LINES = 2000;
const DEFAULT_LOG_LINES = 200;

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  invalid_goal: 400,
  session_not_found: 404,
  device_busy: 503,
  capture_error: 502,
  device_error: 502,
  reasoning_error: 502,
};

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function createApp(config: Config, deps: AppDeps) {
  const app = express();
  const { store, screenshots, registry } = deps;
  const clock = deps.clock ?? (() => new Date());

  app.use(express.json({ limit: '64kb' }));
  app.use(createAuthMiddleware({ token: config.apiToken, publicPaths: ['/v1/health'] }));

  const persist = (record: TaskSessionRecord) => store.saveSession(record);

  function deviceOr404(req: Request, res: Response): DeviceRuntime | null {
    const runtime = deps.devices.get(req.params.device);
    if (!runtime) {
      res.status(404).json({ error: `Device ${req.params.device} is not configured`, code: 'device_not_found' });
      return null;
    }
    // Direct calls queue behind a running session's device calls
    return { ...runtime, driver: serialDriver(runtime.driver) };
  }

  function runtimeFor(deviceId: string): DeviceRuntime {
    const runtime = deps.devices.get(deviceId);
    if (!runtime) throw new InvalidGoalError([`device ${deviceId} is not configured`]);
    return runtime;
  }

  async function loadSession(sessionId: string): Promise<TaskSessionRecord> {
    const record = isValidSessionId(sessionId) ? await store.getSession(sessionId) : null;
    if (!record) throw new SessionNotFoundError(sessionId);
    return record;
  }

  // --- run_android_task ---
  app.post('/v1/tasks', async (req, res) => {
    const validation = validateGoalInput(req.body, config);
    if (!validation.valid || !validation.sanitized) {
      throw new InvalidGoalError(validation.errors);
    }
    const input = validation.sanitized;
    const runtime = runtimeFor(input.device);

    const record = await runtime.orchestrator.run(
      {
        text: input.goal,
        maxSteps: input.max_steps,
        timeBudgetMs: input.time_budget_seconds * 1000,
        ...(input.target_package ? { targetPackage: input.target_package } : {}),
      },
      { onProgress: persist },
    );

    const report = synthesize(record, clock());
    await store.saveReport(report);
    res.json(report);
  });

  // --- test_feature ---
  app.post('/v1/features', async (req, res) => {
    const validation = validateFeatureInput(req.body, config);
    if (!validation.valid || !validation.sanitized) {
      throw new InvalidGoalError(validation.errors);
    }
    const input = validation.sanitized;
    const tester = new FeatureTester(runtimeFor(input.device).orchestrator, clock);

    const { report } = await tester.test(
      {
        feature: input.feature,
        description: input.description,
        targetPackage: input.target_package,
        maxSteps: input.max_steps,
        timeBudgetMs: input.time_budget_seconds * 1000,
      },
      { onProgress: persist },
    );

    await store.saveReport(report);
    res.json(report);
  });

  // --- sessions ---
  app.get('/v1/sessions', async (_req, res) => {
    res.json(await store.listSessions());
  });

  app.get('/v1/sessions/:id', async (req, res) => {
    res.json(await loadSession(req.params.id));
  });

  // --- generate_test_report ---
  app.get('/v1/sessions/:id/report', async (req, res) => {
    const record = await loadSession(req.params.id);
    let report = record.status === 'running' ? null : await store.getReport(record.id);
    if (!report) {
      report = synthesize(record, clock());
      if (record.status !== 'running') await store.saveReport(report);
    }

    if (queryString(req.query.format) === 'markdown') {
      res.type('text/markdown').send(renderReportMarkdown(report));
      return;
    }
    res.json(report);
  });

  app.post('/v1/sessions/:id/abort', async (req, res) => {
    const record = await loadSession(req.params.id);
    if (!registry.abort(record.id)) {
      res.status(409).json({ error: 'Session is not running', code: 'not_running', status: record.status });
      return;
    }
    res.status(202).json({ session_id: record.id, status: 'abort_requested' });
  });

  // --- artifacts ---
  app.get('/v1/artifacts/:ref', async (req, res) => {
    const image = await screenshots.load(req.params.ref);
    if (!image) {
      res.status(404).json({ error: 'Artifact not found', code: 'artifact_not_found' });
      return;
    }
    res.type('png').send(image);
  });

  // --- perception ---
  app.post('/v1/devices/:device/screenshot', async (req, res) => {
    const runtime = deviceOr404(req, res);
    if (!runtime) return;

    let image: Buffer;
    try {
      image = await withTimeout(runtime.driver.captureScreenshot(), config.captureTimeoutMs, 'screenshot');
    } catch (err) {
      throw new CaptureError(`Screenshot failed on ${runtime.driver.deviceId}: ${getErrorMessage(err)}`);
    }
    const entry = await screenshots.save(image);
    res.json({ screenshot_ref: entry.ref, sha256: entry.sha256, bytes: entry.bytes });
  });

  app.get('/v1/devices/:device/ui-tree', async (req, res) => {
    const runtime = deviceOr404(req, res);
    if (!runtime) return;

    try {
      const dump = await withTimeout(runtime.driver.captureUiTree(), config.captureTimeoutMs, 'ui tree');
      const tree = await parseUiHierarchy(dump);
      res.json({ ui_tree: tree, text: extractText(tree) });
    } catch (err) {
      throw new CaptureError(`UI tree capture failed on ${runtime.driver.deviceId}: ${getErrorMessage(err)}`);
    }
  });

  app.get('/v1/devices/:device/logs', async (req, res) => {
    const runtime = deviceOr404(req, res);
    if (!runtime) return;

    const requested = parseInt(queryString(req.query.lines) ?? '', 10);
    const lines = Number.isFinite(requested) && requested > 0 ? Math.min(requested, MAX_LOG_LINES) : DEFAULT_LOG_LINES;
    const since = parseInt(queryString(req.query.since) ?? '', 10);
    const contains = queryString(req.query.contains);

    let logs: string[];
    try {
      logs = await runtime.driver.readLogs(Number.isFinite(since) && since > 0 ? since : 0, lines);
    } catch (err) {
      throw new DeviceError(`Log read failed on ${runtime.driver.deviceId}: ${getErrorMessage(err)}`);
    }
    const filtered = contains ? logs.filter((line) => line.includes(contains)) : logs;
    res.json({ lines: redactLines(filtered) });
  });

  app.get('/v1/devices/:device/apps', async (req, res) => {
    const runtime = deviceOr404(req, res);
    if (!runtime) return;

    try {
      res.json({ packages: await runtime.driver.listPackages() });
    } catch (err) {
      throw new DeviceError(`Package listing failed on ${runtime.driver.deviceId}: ${getErrorMessage(err)}`);
    }
  });

  // --- atomic actions ---
  app.post('/v1/devices/:device/actions/:name', async (req, res) => {
    const runtime = deviceOr404(req, res);
    if (!runtime) return;

    const { name } = req.params;
    if (!isActionName(name)) {
      res.status(404).json({ error: `Unknown action: ${name}`, code: 'unknown_action' });
      return;
    }

    const validation = validateActionInput(name, req.body);
    if (!validation.valid || !validation.sanitized) {
      res.status(400).json({ error: 'Invalid action input', code: 'invalid_action', errors: validation.errors });
      return;
    }
    const action = validation.sanitized;

    if (action.kind === 'install') {
      const check = validateApkPath(action.path, config.apkRoots, config.apkDenyGlobs);
      if (!check.allowed || !check.resolved) {
        res.status(400).json({ error: 'APK path denied', code: 'path_denied', reason: check.reason });
        return;
      }
      res.json(await runtime.executor.execute({ kind: 'install', path: check.resolved }));
      return;
    }

    res.json(await runtime.executor.execute(action));
  });

  // --- health ---
  app.get('/v1/health', (_req, res) => {
    res.json({
      status: 'ok',
      devices: [...deps.devices.keys()],
      active_sessions: registry.activeSessions().map((s) => ({ device: s.deviceId, session_id: s.sessionId })),
    });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof DroidPilotError) {
      const body: Record<string, unknown> = { error: err.message, code: err.code };
      if (err instanceof InvalidGoalError) body.errors = err.errors;
      if (err instanceof DeviceBusyError) body.active_session = err.activeSessionId;
      res.status(STATUS_BY_CODE[err.code]).json(body);
      return;
    }
    if (err instanceof DeviceDriverError) {
      res.status(502).json({ error: err.message, code: 'device_error' });
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body', code: 'bad_request' });
      return;
    }
    console.error(`[app] unhandled error: ${getErrorMessage(err)}`);
    res.status(500).json({ error: 'Internal server error', code: 'internal_error' });
  });

  return app;
}
