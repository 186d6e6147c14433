import { ConfigStore } from './config';
import {
  DeviceAutomation,
  GlobalActions,
  PackageFilter,
  isGlobalActionName,
} from './device/automation';
import {
  doubleTapGesture,
  longPressGesture,
  swipeGesture,
  tapGesture,
  LONG_PRESS_DURATION_MS,
  SWIPE_DURATION_MS,
  clampSwipeDuration,
} from './gestures';
import { compact, filterVisibleTree } from './tree/compactor';
import {
  ErrorCodes,
  MalformedInputError,
  MissingParameterError,
  OperationFailedError,
  OperationTimeoutError,
  RawNode,
  RelayError,
  UnknownActionError,
} from './types';
import { TaskQueue } from './utils/taskQueue';
import { SERVER_NAME, SERVER_VERSION } from './version';

export type Params = Record<string, unknown>;

export type DispatchResult =
  | { kind: 'success'; message?: string; data?: unknown }
  | { kind: 'binary'; data: Buffer; mimeType: string }
  | { kind: 'error'; code: string; message: string };

export type JsonBody = Record<string, unknown>;

export const SCREENSHOT_TIMEOUT_MS = 5000;

const SETTINGS_PACKAGE = 'com.android.settings';

const ACTION_ALIASES: Record<string, string> = {
  'keyboard/input': 'input',
  'keyboard/clear': 'clear',
  'keyboard/key': 'key',
};

const BASE64_PATTERN = /^[A-Za-z0-9+/_-]*={0,2}$/;

type Handler = (params: Params) => Promise<DispatchResult>;

export function normalizeAction(action: string): string {
  let name = action.trim();
  if (name.startsWith('/action/')) {
    name = name.slice('/action/'.length);
  } else if (name.startsWith('action.')) {
    name = name.slice('action.'.length);
  } else if (name.startsWith('/')) {
    name = name.slice(1);
  }
  return ACTION_ALIASES[name] ?? name;
}

export function intParam(params: Params, key: string, fallback = 0): number {
  const value = params[key];
  if (typeof value === 'number' && Number.isFinite(value)) {
    return Math.trunc(value);
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) {
      return Math.trunc(parsed);
    }
  }
  return fallback;
}

export function boolParam(params: Params, key: string, fallback: boolean): boolean {
  const value = params[key];
  if (typeof value === 'boolean') {
    return value;
  }
  if (value === 'true' || value === '1' || value === 1) {
    return true;
  }
  if (value === 'false' || value === '0' || value === 0) {
    return false;
  }
  return fallback;
}

export function stringParam(params: Params, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = params[key];
    if (typeof value === 'string' && value.trim() !== '' && value !== 'null') {
      return value;
    }
  }
  return undefined;
}

export function success(message?: string, data?: unknown): DispatchResult {
  const result: Extract<DispatchResult, { kind: 'success' }> = { kind: 'success' };
  if (message !== undefined) result.message = message;
  if (data !== undefined) result.data = data;
  return result;
}

export function failure(error: unknown): DispatchResult {
  if (error instanceof RelayError) {
    return { kind: 'error', code: error.code, message: error.message };
  }
  return {
    kind: 'error',
    code: ErrorCodes.OPERATION_FAILED,
    message: error instanceof Error ? error.message : String(error),
  };
}

export function toJsonBody(result: DispatchResult): JsonBody {
  switch (result.kind) {
    case 'success': {
      const body: JsonBody = { success: true };
      if (result.message !== undefined) body.message = result.message;
      if (result.data !== undefined) body.data = result.data;
      return body;
    }
    case 'binary':
      return { success: true, mimeType: result.mimeType, data: result.data.toString('base64') };
    case 'error':
      return { success: false, error: result.message, code: result.code };
  }
}

function decodeBase64Text(encoded: string): string {
  const compacted = encoded.replace(/\s+/g, '');
  if (!BASE64_PATTERN.test(compacted)) {
    throw new MalformedInputError('base64_text is not valid base64');
  }
  return Buffer.from(compacted, 'base64').toString('utf8');
}

async function withTimeout<T>(work: Promise<T>, timeoutMs: number, message: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new OperationTimeoutError(message, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export interface CommandDispatcherOptions {
  // Shared with anything else that talks to the same device.
  deviceLock?: TaskQueue;
  screenshotTimeoutMs?: number;
}

/**
 * Routes a canonical action name and parameter bag to the device. `dispatch` never
 * rejects: every failure comes back as an error result.
 */
export class CommandDispatcher {
  private readonly handlers = new Map<string, Handler>();
  private readonly deviceLock: TaskQueue;
  private readonly screenshotTimeoutMs: number;

  constructor(
    private readonly device: DeviceAutomation,
    private readonly config: ConfigStore,
    options: CommandDispatcherOptions = {}
  ) {
    this.deviceLock = options.deviceLock ?? new TaskQueue(1);
    this.screenshotTimeoutMs = options.screenshotTimeoutMs ?? SCREENSHOT_TIMEOUT_MS;

    this.register('tap', params => this.tap(params));
    this.register('double_tap', params => this.doubleTap(params));
    this.register('long_press', params => this.longPress(params));
    this.register('swipe', params => this.swipe(params));
    this.register('global', params => this.globalAction(params));
    this.register('app', params => this.launchApp(params));
    this.register('input', params => this.input(params));
    this.register('clear', () => this.clear());
    this.register('key', params => this.key(params));
    this.register('overlay_offset', async params => this.overlayOffset(params));
    this.register('socket_port', async params => this.socketPort(params));
    this.register('screenshot', params => this.screenshot(params));

    this.register('ping', async () => success('pong'));
    this.register('version', async () =>
      success(undefined, { name: SERVER_NAME, version: SERVER_VERSION })
    );
    this.register('a11y_tree', params => this.tree(params));
    this.register('a11y_tree_full', params => this.fullTree(params));
    this.register('state', params => this.state(params));
    this.register('state_full', params => this.fullState(params));
    this.register('phone_state', async () => success(undefined, await this.device.getPhoneState()));
    this.register('packages', params => this.packages(params));
  }

  get actions(): string[] {
    return [...this.handlers.keys()];
  }

  async dispatch(action: string, params: Params = {}): Promise<DispatchResult> {
    const handler = this.handlers.get(normalizeAction(action));
    if (!handler) {
      return failure(new UnknownActionError(action));
    }

    try {
      return await this.deviceLock.run(() => handler(params));
    } catch (error) {
      if (!(error instanceof RelayError)) {
        console.error(
          `[dispatch] ${action} failed:`,
          error instanceof Error ? error.message : String(error)
        );
      }
      return failure(error);
    }
  }

  // Runs work against the device under the same lock the actions use.
  async withDevice<T>(work: (device: DeviceAutomation) => Promise<T>): Promise<T> {
    return this.deviceLock.run(() => work(this.device));
  }

  private register(name: string, handler: Handler): void {
    this.handlers.set(name, handler);
  }

  private async tap(params: Params): Promise<DispatchResult> {
    const x = intParam(params, 'x');
    const y = intParam(params, 'y');
    if (!(await this.device.performGesture(tapGesture(x, y)))) {
      throw new OperationFailedError(`Failed to perform tap at (${x}, ${y})`);
    }
    return success(`Tap performed at (${x}, ${y})`);
  }

  private async doubleTap(params: Params): Promise<DispatchResult> {
    const x = intParam(params, 'x');
    const y = intParam(params, 'y');
    if (!(await this.device.performGesture(doubleTapGesture(x, y)))) {
      throw new OperationFailedError(`Failed to perform double tap at (${x}, ${y})`);
    }
    return success(`Double tap performed at (${x}, ${y})`);
  }

  private async longPress(params: Params): Promise<DispatchResult> {
    const x = intParam(params, 'x');
    const y = intParam(params, 'y');
    const duration = intParam(params, 'duration', LONG_PRESS_DURATION_MS);
    if (!(await this.device.performGesture(longPressGesture(x, y, duration)))) {
      throw new OperationFailedError(`Failed to perform long press at (${x}, ${y})`);
    }
    return success(`Long press performed at (${x}, ${y}) for ${duration}ms`);
  }

  private async swipe(params: Params): Promise<DispatchResult> {
    const start = { x: intParam(params, 'startX'), y: intParam(params, 'startY') };
    const end = { x: intParam(params, 'endX'), y: intParam(params, 'endY') };
    const duration = clampSwipeDuration(intParam(params, 'duration', SWIPE_DURATION_MS));
    if (!(await this.device.performGesture(swipeGesture(start, end, duration)))) {
      throw new OperationFailedError(
        `Failed to perform swipe from (${start.x}, ${start.y}) to (${end.x}, ${end.y})`
      );
    }
    return success(
      `Swipe performed from (${start.x}, ${start.y}) to (${end.x}, ${end.y}) over ${duration}ms`
    );
  }

  private async globalAction(params: Params): Promise<DispatchResult> {
    const named = stringParam(params, 'action', 'actionId')?.toLowerCase();
    const actionId =
      named !== undefined && isGlobalActionName(named)
        ? GlobalActions[named]
        : intParam(params, 'action', intParam(params, 'actionId'));
    if (!(await this.device.performGlobalAction(actionId))) {
      throw new OperationFailedError(`Failed to perform global action ${actionId}`);
    }
    return success(`Global action ${actionId} performed`);
  }

  private async launchApp(params: Params): Promise<DispatchResult> {
    const requested = stringParam(params, 'package', 'packageName');
    if (!requested) {
      throw new MissingParameterError('package');
    }
    const packageName = requested.toLowerCase() === 'settings' ? SETTINGS_PACKAGE : requested;
    let activity = stringParam(params, 'activity');
    if (activity?.startsWith('.')) {
      activity = `${packageName}${activity}`;
    }

    if (!(await this.device.launchApp(packageName, activity))) {
      throw new OperationFailedError(`Failed to launch ${packageName}`, { packageName, activity });
    }
    return success(activity ? `Launched ${packageName}/${activity}` : `Launched ${packageName}`);
  }

  private async focusedField(): Promise<RawNode> {
    const focused = await this.device.getFocusedEditableNode();
    if (!focused) {
      throw new OperationFailedError('No focused editable field');
    }
    return focused;
  }

  private async input(params: Params): Promise<DispatchResult> {
    const encoded = stringParam(params, 'base64_text', 'base64Text');
    if (encoded === undefined) {
      throw new MissingParameterError('base64_text');
    }
    const text = decodeBase64Text(encoded);
    const clear = boolParam(params, 'clear', true);

    const focused = await this.focusedField();
    const next = clear ? text : `${focused.text}${text}`;
    if (!(await this.device.setNodeText(focused, next))) {
      throw new OperationFailedError('Failed to set text on focused field');
    }
    return success(`Text input completed (${clear ? 'replaced' : 'appended'})`);
  }

  private async clear(): Promise<DispatchResult> {
    const focused = await this.focusedField();
    if (!(await this.device.setNodeText(focused, ''))) {
      throw new OperationFailedError('Failed to clear focused field');
    }
    return success('Text cleared');
  }

  private async key(params: Params): Promise<DispatchResult> {
    const keyCode = intParam(params, 'key_code', intParam(params, 'keyCode'));
    if (!(await this.device.sendKeyEvent(keyCode))) {
      throw new OperationFailedError(`Failed to send key event ${keyCode}`);
    }
    return success(`Key event ${keyCode} sent`);
  }

  private overlayOffset(params: Params): DispatchResult {
    const offset = intParam(params, 'offset');
    this.config.set('overlayOffset', offset);
    return success(`Overlay offset updated to ${offset}`);
  }

  private socketPort(params: Params): DispatchResult {
    const port = intParam(params, 'port');
    if (port < 1 || port > 65535) {
      throw new OperationFailedError(`Failed to update socket server port to ${port}`, { port });
    }
    this.config.set('socketServerPort', port);
    return success(`Socket server port updated to ${port}`);
  }

  private async screenshot(params: Params): Promise<DispatchResult> {
    const hideOverlay = boolParam(params, 'hideOverlay', true);
    const data = await withTimeout(
      this.device.captureScreenshot(hideOverlay),
      this.screenshotTimeoutMs,
      'Screenshot timeout - operation took too long'
    );
    return { kind: 'binary', data, mimeType: 'image/png' };
  }

  private async requireTree(): Promise<RawNode> {
    const root = await this.device.snapshotTree();
    if (!root) {
      throw new OperationFailedError('No active window');
    }
    return root;
  }

  private async tree(params: Params): Promise<DispatchResult> {
    const root = await this.requireTree();
    const screenBounds = boolParam(params, 'filter', true)
      ? await this.device.getScreenBounds()
      : undefined;
    return success(undefined, compact(root, { screenBounds }));
  }

  private async fullTree(params: Params): Promise<DispatchResult> {
    const root = await this.requireTree();
    if (!boolParam(params, 'filter', true)) {
      return success(undefined, root);
    }
    return success(undefined, filterVisibleTree(root, await this.device.getScreenBounds()));
  }

  private async state(params: Params): Promise<DispatchResult> {
    const root = await this.requireTree();
    const screen = await this.device.getScreenBounds();
    const elements = compact(root, {
      screenBounds: boolParam(params, 'filter', true) ? screen : undefined,
    });
    return success(undefined, {
      a11y_tree: elements,
      phone_state: await this.device.getPhoneState(),
      screen: { width: screen.right - screen.left, height: screen.bottom - screen.top },
    });
  }

  private async fullState(params: Params): Promise<DispatchResult> {
    const root = await this.requireTree();
    const screen = await this.device.getScreenBounds();
    return success(undefined, {
      a11y_tree: boolParam(params, 'filter', true) ? filterVisibleTree(root, screen) : root,
      phone_state: await this.device.getPhoneState(),
      device_context: { screen_bounds: screen },
    });
  }

  private async packages(params: Params): Promise<DispatchResult> {
    const requested = stringParam(params, 'filter', 'type') ?? 'all';
    const filter: PackageFilter =
      requested === 'user' || requested === 'system' ? requested : 'all';
    return success(undefined, await this.device.listPackages(filter));
  }
}
