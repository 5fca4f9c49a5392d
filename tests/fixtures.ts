import type { ActionSpec, DeviceAction } from '../src/engine/actionSpec.js';
import type { DeviceDriver, RawActionResult } from '../src/device/types.js';
import { DeviceDriverError } from '../src/device/types.js';
import type { ReasoningEngine } from '../src/reasoning/types.js';
import type { ResolvedGoal, SceneSnapshot, StepRecord } from '../src/sessions/types.js';
import { ReasoningError } from '../src/errors.js';

export function hierarchyXml(...labels: string[]): string {
  const nodes = labels
    .map(
      (label, i) =>
        `<node index="${i}" text="${label}" resource-id="com.example.shop:id/item${i}" class="android.widget.Button" ` +
        `content-desc="" clickable="true" bounds="[0,${i * 100}][200,${i * 100 + 100}]" />`,
    )
    .join('');
  return (
    `<?xml version='1.0' encoding='UTF-8' standalone='yes' ?><hierarchy rotation="0">` +
    `<node index="0" text="" resource-id="" class="android.widget.FrameLayout" content-desc="" clickable="false" bounds="[0,0][1080,1920]">` +
    `${nodes}</node></hierarchy>`
  );
}

type Scripted<T> = T | Error;

/**
 * Scripted device: each capture pops the next screen (the last one repeats),
 * each action pops the next result (default ok).
 */
export class FakeDriver implements DeviceDriver {
  readonly deviceId: string;
  readonly actions: DeviceAction[] = [];
  readonly logReads: number[] = [];
  screens: Array<Scripted<string>>;
  actionResults: Array<Scripted<RawActionResult>> = [];
  logs: Array<Scripted<string[]>> = [];
  screenshotFailures = 0;
  packages = ['com.android.settings', 'com.example.shop'];
  private captures = 0;

  constructor(deviceId = 'emulator-5554', screens: Array<Scripted<string>> = [hierarchyXml('Home')]) {
    this.deviceId = deviceId;
    this.screens = screens;
  }

  async captureScreenshot(): Promise<Buffer> {
    if (this.screenshotFailures > 0) {
      this.screenshotFailures -= 1;
      throw new DeviceDriverError('device offline', 'connection_lost');
    }
    return Buffer.from(`png-${this.captures}`);
  }

  async captureUiTree(): Promise<string> {
    const index = Math.min(this.captures, this.screens.length - 1);
    this.captures += 1;
    const next = this.screens[index];
    if (next instanceof Error) throw next;
    return next;
  }

  async performAction(action: DeviceAction): Promise<RawActionResult> {
    this.actions.push(action);
    const next = this.actionResults.shift();
    if (next instanceof Error) throw next;
    return next ?? { ok: true, output: '', exitCode: 0 };
  }

  async readLogs(sinceOffset: number): Promise<string[]> {
    this.logReads.push(sinceOffset);
    const next = this.logs.shift();
    if (next instanceof Error) throw next;
    return next ?? [];
  }

  async listPackages(): Promise<string[]> {
    return [...this.packages];
  }
}

/** Clock that advances by `stepMs` on every read */
export function steppingClock(startIso = '2025-01-01T00:00:00.000Z', stepMs = 10): () => Date {
  let now = Date.parse(startIso);
  return () => {
    const current = new Date(now);
    now += stepMs;
    return current;
  };
}

/** Reasoning engine that replays a fixed list of decisions */
export class ScriptedEngine implements ReasoningEngine {
  readonly calls: Array<{ goal: ResolvedGoal; historyLength: number; sequence: number }> = [];
  onDecide?: () => void;

  constructor(private readonly script: Array<ActionSpec | Error>, private readonly fallback?: ActionSpec) {}

  async decide(goal: ResolvedGoal, history: readonly StepRecord[], snapshot: SceneSnapshot): Promise<ActionSpec> {
    this.calls.push({ goal, historyLength: history.length, sequence: snapshot.sequence });
    this.onDecide?.();
    const next = this.script.shift() ?? this.fallback;
    if (next === undefined) throw new ReasoningError('script exhausted');
    if (next instanceof Error) throw next;
    return next;
  }
}
