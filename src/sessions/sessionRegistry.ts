import { v4 as uuidv4 } from 'uuid';
import { DeviceBusyError } from '../errors.js';

interface ActiveEntry {
  deviceId: string;
  controller: AbortController;
}

export interface SessionLease {
  sessionId: string;
  signal: AbortSignal;
}

export class SessionRegistry {
  private readonly byDevice = new Map<string, string>();
  private readonly active = new Map<string, ActiveEntry>();

  begin(deviceId: string): SessionLease {
    const current = this.byDevice.get(deviceId);
    if (current !== undefined) {
      throw new DeviceBusyError(deviceId, current);
    }
    const sessionId = uuidv4();
    const controller = new AbortController();
    this.byDevice.set(deviceId, sessionId);
    this.active.set(sessionId, { deviceId, controller });
    return { sessionId, signal: controller.signal };
  }

  end(sessionId: string): void {
    const entry = this.active.get(sessionId);
    if (!entry) return;
    this.active.delete(sessionId);
    if (this.byDevice.get(entry.deviceId) === sessionId) {
      this.byDevice.delete(entry.deviceId);
    }
  }

  // Signal cancellation. Returns false when the session is not running here
  abort(sessionId: string): boolean {
    const entry = this.active.get(sessionId);
    if (!entry) return false;
    entry.controller.abort();
    return true;
  }

  isActive(sessionId: string): boolean {
    return this.active.has(sessionId);
  }

  activeSessionId(deviceId: string): string | null {
    return this.byDevice.get(deviceId) ?? null;
  }

  activeSessions(): Array<{ deviceId: string; sessionId: string }> {
    return [...this.byDevice.entries()].map(([deviceId, sessionId]) => ({ deviceId, sessionId }));
  }
}
