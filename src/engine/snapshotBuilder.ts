import type { DeviceDriver } from '../device/types.js';
import type { SceneSnapshot, UiElement } from '../sessions/types.js';
import type { ScreenshotStore } from '../utils/artifacts.js';
import { serialDriver, type SerialDeviceDriver } from '../device/serialDriver.js';
import { parseUiHierarchy, serializeUiTree, extractText } from '../device/uiHierarchy.js';
import { withTimeout } from '../utils/timeout.js';
import { CaptureError, getErrorMessage } from '../errors.js';

export interface SnapshotBuilderOptions {
  timeoutMs?: number;
  clock?: () => Date;
}

function freezeTree(elements: UiElement[]): readonly UiElement[] {
  for (const element of elements) {
    freezeTree(element.children);
    if (element.bounds) Object.freeze(element.bounds);
    Object.freeze(element);
  }
  return Object.freeze(elements);
}

/**
 * Normalizes a screenshot plus UI hierarchy dump into one SceneSnapshot.
 * Either both parts are captured or the call fails with CaptureError.
 * One builder per session: `sequence` counts successful captures.
 */
export class SceneSnapshotBuilder {
  private sequence = 0;
  private readonly driver: SerialDeviceDriver;
  private readonly timeoutMs: number;
  private readonly clock: () => Date;

  constructor(
    driver: DeviceDriver,
    private readonly screenshots: ScreenshotStore,
    options: SnapshotBuilderOptions = {},
  ) {
    this.driver = serialDriver(driver);
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.clock = options.clock ?? (() => new Date());
  }

  // budgetMs caps the timeout when less time than that is left
  async capture(budgetMs?: number): Promise<SceneSnapshot> {
    const timeoutMs = Math.max(1, Math.min(this.timeoutMs, budgetMs ?? this.timeoutMs));
    let captured: Omit<SceneSnapshot, 'sequence'>;
    try {
      // A call abandoned by an earlier timeout still owns the device
      await this.driver.idle();
      captured = await withTimeout(this.captureParts(), timeoutMs, 'scene capture');
    } catch (err) {
      if (err instanceof CaptureError) throw err;
      throw new CaptureError(`Capture failed on ${this.driver.deviceId}: ${getErrorMessage(err)}`);
    }

    this.sequence += 1;
    return Object.freeze({ ...captured, sequence: this.sequence });
  }

  private async captureParts(): Promise<Omit<SceneSnapshot, 'sequence'>> {
    const timestamp = this.clock().toISOString();
    const image = await this.driver.captureScreenshot();
    if (image.length === 0) {
      throw new CaptureError(`Capture failed on ${this.driver.deviceId}: empty screenshot`);
    }
    const dump = await this.driver.captureUiTree();
    const uiTree = await parseUiHierarchy(dump);
    const stored = await this.screenshots.save(image);

    return {
      timestamp,
      screenshotRef: stored.ref,
      screenshotHash: stored.sha256,
      uiTreeSerialization: serializeUiTree(uiTree),
      textExtract: extractText(uiTree),
      uiTree: freezeTree(uiTree),
    };
  }
}
