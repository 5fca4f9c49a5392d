import 'dotenv/config';
import { loadConfig } from './config.js';
import { createApp, type DeviceRuntime } from './app.js';
import { AdbDeviceDriver } from './device/adbDriver.js';
import { serialDriver } from './device/serialDriver.js';
import { ActionExecutor } from './engine/actionExecutor.js';
import { TaskOrchestrator } from './engine/orchestrator.js';
import { GeminiReasoningEngine } from './reasoning/geminiEngine.js';
import { FileSessionStore } from './sessions/sessionStore.js';
import { SessionRegistry } from './sessions/sessionRegistry.js';
import { FileScreenshotStore } from './utils/artifacts.js';
import { createInstallGuard } from './security/pathGuard.js';

const config = loadConfig();
if (!config.googleApiKey) {
  throw new Error('GOOGLE_GENERATIVE_AI_API_KEY is required but not set');
}

const store = new FileSessionStore(config.dataDir);
const screenshots = new FileScreenshotStore(config.artifactsDir);
const registry = new SessionRegistry();
const engine = new GeminiReasoningEngine({ apiKey: config.googleApiKey, model: config.model, screenshots });
const installGuard = createInstallGuard(config.apkRoots, config.apkDenyGlobs);

const devices = new Map<string, DeviceRuntime>();
for (const deviceId of config.devices) {
  // adb commands never outlive the capture or action deadline
  const driver = serialDriver(
    new AdbDeviceDriver(deviceId, {
      adbPath: config.adbPath,
      commandTimeoutMs: Math.min(config.captureTimeoutMs, config.actionTimeoutMs),
      packageTimeoutMs: config.packageTimeoutMs,
    }),
  );
  const executor = new ActionExecutor(driver, {
    actionTimeoutMs: config.actionTimeoutMs,
    packageTimeoutMs: config.packageTimeoutMs,
    installGuard,
  });
  const orchestrator = new TaskOrchestrator({
    deviceId,
    driver,
    engine,
    registry,
    screenshots,
    executor,
    captureTimeoutMs: config.captureTimeoutMs,
  });
  devices.set(deviceId, { driver, executor, orchestrator });
}

// Sessions left running by a previous process can never finish
const aborted = await store.markAbortedOnStartup();
if (aborted.length > 0) {
  console.log(`[startup] marked ${aborted.length} interrupted session(s) as aborted`);
}

const app = createApp(config, { devices, store, screenshots, registry });

app.listen(config.port, config.bind, () => {
  console.log(`droidpilot listening on ${config.bind}:${config.port} (devices: ${config.devices.join(', ')})`);
});
