// Device information interfaces
export interface AndroidDevice {
  id: string;
  status: 'device' | 'offline' | 'unauthorized' | 'unknown';
  model?: string;
  product?: string;
  transportId?: string;
  usb?: string;
  productString?: string;
}

// Screen geometry, device pixels
export interface Rect {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

/**
 * One on-screen element as captured by a tree snapshot. Snapshots are rebuilt on
 * every query and never mutated once built.
 */
export interface RawNode {
  text: string;
  contentDescription: string;
  resourceId: string;
  className: string;
  packageName: string;
  bounds: Rect;
  clickable: boolean;
  longClickable: boolean;
  editable: boolean;
  focused: boolean;
  selected: boolean;
  checked: boolean;
  checkable: boolean;
  scrollable: boolean;
  focusable: boolean;
  enabled: boolean;
  children: RawNode[];
}

export interface CompactBounds {
  x: number;
  y: number;
  w: number;
  h: number;
}

export interface CompactElement {
  index: number;
  displayText: string;
  bounds: CompactBounds;
  resourceId: string;
  shortClassName: string;
  flags: string;
}

export interface Point {
  x: number;
  y: number;
}

// A single continuous touch. startTime is relative to the start of the gesture.
export interface GestureStroke {
  points: Point[];
  startTime: number;
  duration: number;
}

export interface PhoneState {
  currentApp: string;
  packageName: string;
  activityName: string;
  keyboardVisible: boolean;
  isEditable: boolean;
  focusedElement: {
    text: string;
    className: string;
    resourceId: string;
  } | null;
}

export interface PackageInfo {
  packageName: string;
  label: string;
  versionName?: string;
  isSystemApp: boolean;
}

// Error handling interfaces
export interface RelayErrorShape {
  code: string;
  message: string;
  details?: unknown;
  suggestion?: string;
}

export const ErrorCodes = {
  UNKNOWN_ACTION: 'UNKNOWN_ACTION',
  MISSING_PARAMETER: 'MISSING_PARAMETER',
  OPERATION_FAILED: 'OPERATION_FAILED',
  UNAUTHORIZED: 'UNAUTHORIZED',
  MALFORMED_INPUT: 'MALFORMED_INPUT',
  QUEUE_FULL: 'QUEUE_FULL',
  QUEUED: 'QUEUED',
  TIMEOUT: 'TIMEOUT',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export const RpcErrorCodes = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INTERNAL_ERROR: -32603,
  QUEUE_FULL: -32001,
  QUEUED: -32002,
} as const;

export class RelayError extends Error implements RelayErrorShape {
  code: string;
  details?: unknown;
  suggestion?: string;

  constructor(code: string, message: string, details?: unknown, suggestion?: string) {
    super(message);
    this.name = 'RelayError';
    this.code = code;
    this.details = details;
    this.suggestion = suggestion;
  }
}

export class UnknownActionError extends RelayError {
  constructor(action: string) {
    super(ErrorCodes.UNKNOWN_ACTION, `Unknown action: ${action}`, { action });
    this.name = 'UnknownActionError';
  }
}

export class MissingParameterError extends RelayError {
  constructor(parameter: string) {
    super(ErrorCodes.MISSING_PARAMETER, `Missing required parameter: ${parameter}`, {
      parameter,
    });
    this.name = 'MissingParameterError';
  }
}

export class OperationFailedError extends RelayError {
  constructor(message: string, details?: unknown) {
    super(ErrorCodes.OPERATION_FAILED, message, details);
    this.name = 'OperationFailedError';
  }
}

export class UnauthorizedError extends RelayError {
  constructor() {
    super(
      ErrorCodes.UNAUTHORIZED,
      'Unauthorized',
      null,
      'Send the configured token as "Authorization: Bearer <token>"'
    );
    this.name = 'UnauthorizedError';
  }
}

export class MalformedInputError extends RelayError {
  constructor(message: string, details?: unknown) {
    super(ErrorCodes.MALFORMED_INPUT, message, details);
    this.name = 'MalformedInputError';
  }
}

export class QueueFullError extends RelayError {
  constructor(capacity: number) {
    super(ErrorCodes.QUEUE_FULL, 'Request queue full, retry later', { capacity });
    this.name = 'QueueFullError';
  }
}

export class OperationTimeoutError extends RelayError {
  constructor(message: string, timeoutMs: number) {
    super(ErrorCodes.TIMEOUT, message, { timeoutMs });
    this.name = 'OperationTimeoutError';
  }
}

export class ADBCommandError extends RelayError {
  constructor(code: string, message: string, details?: unknown, suggestion?: string) {
    super(code, message, details, suggestion);
    this.name = 'ADBCommandError';
  }
}

export class ADBNotFoundError extends ADBCommandError {
  constructor() {
    super(
      'ADB_NOT_FOUND',
      'Android Debug Bridge (ADB) not found',
      null,
      'Please install Android SDK Platform Tools and ensure ADB is in your PATH'
    );
    this.name = 'ADBNotFoundError';
  }
}

export class DeviceNotFoundError extends ADBCommandError {
  constructor(deviceId: string) {
    super(
      'DEVICE_NOT_FOUND',
      `Device with ID '${deviceId}' not found`,
      { deviceId },
      'Please check if the device is connected and authorized'
    );
    this.name = 'DeviceNotFoundError';
  }
}

export class NoDevicesFoundError extends ADBCommandError {
  constructor() {
    super(
      'NO_DEVICES_FOUND',
      'No Android devices found',
      null,
      'Please connect an Android device or start an emulator and ensure USB debugging is enabled'
    );
    this.name = 'NoDevicesFoundError';
  }
}

export class ScreenshotCaptureError extends ADBCommandError {
  constructor(deviceId: string, originalError?: Error) {
    super(
      'SCREENSHOT_CAPTURE_FAILED',
      `Failed to capture screenshot from device '${deviceId}'`,
      { deviceId, originalError: originalError?.message },
      'Please ensure the device is connected and screen is unlocked'
    );
    this.name = 'ScreenshotCaptureError';
  }
}

// A child process that exited non-zero, was killed, or could not be started
export class CommandFailure extends Error {
  constructor(
    message: string,
    readonly status: number | null,
    readonly stdout: Buffer = Buffer.alloc(0),
    readonly stderr: Buffer = Buffer.alloc(0)
  ) {
    super(message);
    this.name = 'CommandFailure';
  }
}
