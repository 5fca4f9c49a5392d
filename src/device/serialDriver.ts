import type { DeviceAction } from '../engine/actionSpec.js';
import type { DeviceDriver, RawActionResult } from './types.js';

/**
 * One call at a time per device. A caller that stops waiting on a slow call
 * (a timeout) does not free the device: the next call queues behind it.
 */
export class SerialDeviceDriver implements DeviceDriver {
  readonly deviceId: string;
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly inner: DeviceDriver) {
    this.deviceId = inner.deviceId;
  }

  // Resolves once every call queued so far has settled
  idle(): Promise<void> {
    return this.tail;
  }

  private enqueue<T>(fn: () => Promise<T>): Promise<T> {
    const next = this.tail.then(fn);
    this.tail = next.then(() => {}, () => {});
    return next;
  }

  captureScreenshot(): Promise<Buffer> {
    return this.enqueue(() => this.inner.captureScreenshot());
  }

  captureUiTree(): Promise<string> {
    return this.enqueue(() => this.inner.captureUiTree());
  }

  performAction(action: DeviceAction): Promise<RawActionResult> {
    return this.enqueue(() => this.inner.performAction(action));
  }

  readLogs(sinceOffset: number, maxLines?: number): Promise<string[]> {
    return this.enqueue(() => this.inner.readLogs(sinceOffset, maxLines));
  }

  listPackages(): Promise<string[]> {
    return this.enqueue(() => this.inner.listPackages());
  }
}

const lanes = new WeakMap<DeviceDriver, SerialDeviceDriver>();

// Everyone holding the same driver shares one queue
export function serialDriver(driver: DeviceDriver): SerialDeviceDriver {
  if (driver instanceof SerialDeviceDriver) return driver;
  let lane = lanes.get(driver);
  if (!lane) {
    lane = new SerialDeviceDriver(driver);
    lanes.set(driver, lane);
  }
  return lane;
}
