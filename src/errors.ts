export type ErrorCode =
  | 'capture_error'
  | 'device_error'
  | 'reasoning_error'
  | 'device_busy'
  | 'invalid_goal'
  | 'session_not_found';

export class DroidPilotError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
  ) {
    super(message);
    this.name = 'DroidPilotError';
  }
}

// Screenshot or UI hierarchy could not be retrieved from the device
export class CaptureError extends DroidPilotError {
  constructor(message: string) {
    super(message, 'capture_error');
    this.name = 'CaptureError';
  }
}

// Action rejected, connection lost, or an app crash was seen in the log stream
export class DeviceError extends DroidPilotError {
  constructor(message: string) {
    super(message, 'device_error');
    this.name = 'DeviceError';
  }
}

export class ReasoningError extends DroidPilotError {
  constructor(message: string) {
    super(message, 'reasoning_error');
    this.name = 'ReasoningError';
  }
}

export class DeviceBusyError extends DroidPilotError {
  constructor(
    public readonly deviceId: string,
    public readonly activeSessionId: string,
  ) {
    super(`Device ${deviceId} is busy with session ${activeSessionId}`, 'device_busy');
    this.name = 'DeviceBusyError';
  }
}

export class InvalidGoalError extends DroidPilotError {
  constructor(public readonly errors: string[]) {
    super(`Invalid goal: ${errors.join('; ')}`, 'invalid_goal');
    this.name = 'InvalidGoalError';
  }
}

export class SessionNotFoundError extends DroidPilotError {
  constructor(public readonly sessionId: string) {
    super(`Session ${sessionId} not found`, 'session_not_found');
    this.name = 'SessionNotFoundError';
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}
