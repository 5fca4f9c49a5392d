import type { DeviceAction } from '../engine/actionSpec.js';

export interface RawActionResult {
  ok: boolean;
  output: string;
  exitCode: number | null;
}

export type DriverFailure = 'connection_lost' | 'command_rejected' | 'timeout';

export class DeviceDriverError extends Error {
  constructor(
    message: string,
    public readonly failure: DriverFailure,
  ) {
    super(message);
    this.name = 'DeviceDriverError';
  }
}

export interface DeviceDriver {
  readonly deviceId: string;
  captureScreenshot(): Promise<Buffer>;
  // Raw UI hierarchy dump (uiautomator XML)
  captureUiTree(): Promise<string>;
  performAction(action: DeviceAction): Promise<RawActionResult>;
  // Log lines written at or after `sinceOffset` (epoch milliseconds)
  readLogs(sinceOffset: number, maxLines?: number): Promise<string[]>;
  listPackages(): Promise<string[]>;
}
