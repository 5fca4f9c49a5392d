import type { DeviceAction } from '../engine/actionSpec.js';
import type { DeviceDriver, RawActionResult } from './types.js';
import { DeviceDriverError } from './types.js';
import { runCommand, type CommandRunner, type CommandResult } from '../utils/exec.js';
import { sleep } from '../utils/timeout.js';

export interface AdbDriverOptions {
  adbPath?: string;
  run?: CommandRunner;
  commandTimeoutMs?: number;
  packageTimeoutMs?: number;
}

const DEFAULT_LOG_LINES = 500;

const CONNECTION_PATTERNS = [
  'device offline',
  'unauthorized',
  'device not found',
  'no devices/emulators found',
  'no such device',
  'cannot connect',
];

// Characters the device shell would interpret inside `input text`
const SHELL_SPECIAL = /[\\()<>|;&*'"`~$!?#[\]{}]/g;

export function escapeInputText(text: string): string {
  return text.replace(SHELL_SPECIAL, (ch) => `\\${ch}`).replace(/ /g, '%s');
}

function isRejected(output: string): boolean {
  return /Failure \[|^Error:|^Exception|monkey aborted/m.test(output);
}

export class AdbDeviceDriver implements DeviceDriver {
  private readonly adbPath: string;
  private readonly run: CommandRunner;
  private readonly commandTimeoutMs: number;
  private readonly packageTimeoutMs: number;

  constructor(
    readonly deviceId: string,
    options: AdbDriverOptions = {},
  ) {
    this.adbPath = options.adbPath ?? 'adb';
    this.run = options.run ?? runCommand;
    this.commandTimeoutMs = options.commandTimeoutMs ?? 15_000;
    this.packageTimeoutMs = options.packageTimeoutMs ?? 120_000;
  }

  async captureScreenshot(): Promise<Buffer> {
    const result = await this.exec(['exec-out', 'screencap', '-p']);
    this.assertSucceeded(result, 'screencap');
    return result.stdout;
  }

  async captureUiTree(): Promise<string> {
    const result = await this.exec(['exec-out', 'uiautomator', 'dump', '/dev/tty']);
    this.assertSucceeded(result, 'uiautomator dump');
    // Output is the XML followed by "UI hierchary dumped to: /dev/tty"
    const xml = result.stdout.toString('utf-8');
    const end = xml.lastIndexOf('</hierarchy>');
    return end === -1 ? xml : xml.slice(0, end + '</hierarchy>'.length);
  }

  async performAction(action: DeviceAction): Promise<RawActionResult> {
    if (action.kind === 'wait') {
      await sleep(action.ms);
      return { ok: true, output: '', exitCode: 0 };
    }

    const timeoutMs =
      action.kind === 'install' || action.kind === 'uninstall' ? this.packageTimeoutMs : this.commandTimeoutMs;
    const result = await this.exec(argsFor(action), timeoutMs);
    this.assertReachable(result);

    const output = `${result.stdout.toString('utf-8')}${result.stderr}`.trim();
    return {
      ok: result.exitCode === 0 && !isRejected(output),
      output,
      exitCode: result.exitCode,
    };
  }

  async readLogs(sinceOffset: number, maxLines: number = DEFAULT_LOG_LINES): Promise<string[]> {
    const args =
      sinceOffset > 0
        ? ['logcat', '-d', '-v', 'epoch', '-T', (sinceOffset / 1000).toFixed(3)]
        : ['logcat', '-d', '-v', 'epoch', '-t', String(maxLines)];
    const result = await this.exec(args);
    this.assertSucceeded(result, 'logcat');
    const lines = result.stdout
      .toString('utf-8')
      .split('\n')
      .map((l) => l.trimEnd())
      .filter((l) => l && !l.startsWith('--------- beginning of'));
    return lines.slice(-maxLines);
  }

  async listPackages(): Promise<string[]> {
    const result = await this.exec(['shell', 'pm', 'list', 'packages']);
    this.assertSucceeded(result, 'pm list packages');
    return result.stdout
      .toString('utf-8')
      .split('\n')
      .map((l) => l.trim())
      .filter((l) => l.startsWith('package:'))
      .map((l) => l.slice('package:'.length))
      .sort();
  }

  private exec(args: string[], timeoutMs: number = this.commandTimeoutMs): Promise<CommandResult> {
    return this.run(this.adbPath, ['-s', this.deviceId, ...args], { timeoutMs });
  }

  private assertReachable(result: CommandResult): void {
    if (result.timedOut) {
      throw new DeviceDriverError(`adb command timed out on ${this.deviceId}`, 'timeout');
    }
    if (result.spawnError) {
      throw new DeviceDriverError(`adb could not be started: ${result.spawnError}`, 'connection_lost');
    }
    const stderr = result.stderr.toLowerCase();
    const pattern = CONNECTION_PATTERNS.find((p) => stderr.includes(p));
    if (pattern) {
      throw new DeviceDriverError(`${this.deviceId}: ${pattern}`, 'connection_lost');
    }
  }

  private assertSucceeded(result: CommandResult, what: string): void {
    this.assertReachable(result);
    if (result.exitCode !== 0) {
      const detail = result.stderr.trim() || `exit code ${result.exitCode}`;
      throw new DeviceDriverError(`${what} failed on ${this.deviceId}: ${detail}`, 'command_rejected');
    }
  }
}

function argsFor(action: Exclude<DeviceAction, { kind: 'wait' }>): string[] {
  switch (action.kind) {
    case 'tap':
      return ['shell', 'input', 'tap', String(action.x), String(action.y)];
    case 'swipe':
      return [
        'shell', 'input', 'swipe',
        String(action.x1), String(action.y1), String(action.x2), String(action.y2), String(action.durationMs),
      ];
    case 'type':
      return ['shell', 'input', 'text', escapeInputText(action.text)];
    case 'key':
      return ['shell', 'input', 'keyevent', String(action.code)];
    case 'install':
      return ['install', '-r', action.path];
    case 'uninstall':
      return ['uninstall', action.pkg];
    case 'start':
      return action.activity
        ? ['shell', 'am', 'start', '-n', `${action.pkg}/${action.activity}`]
        : ['shell', 'monkey', '-p', action.pkg, '-c', 'android.intent.category.LAUNCHER', '1'];
  }
}
