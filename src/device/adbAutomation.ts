import { centerOf } from '../gestures';
import { GestureStroke, PackageInfo, PhoneState, RawNode, Rect, RelayError } from '../types';
import {
  captureScreenshot,
  dumpUiHierarchy,
  getCurrentActivity,
  getWindowSize,
  inputText,
  isKeyboardShown,
  listInstalledPackages,
  resolveDeviceId,
  sendKeyevents,
  shell,
  startApp,
  swipeScreen,
  tapScreen,
} from '../utils/adb';
import { DeviceAutomation, GlobalActions, PackageFilter } from './automation';
import { parseUiHierarchy } from './uiautomatorParser';

export const KEYCODE_HOME = 3;
export const KEYCODE_BACK = 4;
export const KEYCODE_POWER = 26;
export const KEYCODE_DEL = 67;
export const KEYCODE_MOVE_END = 123;
export const KEYCODE_APP_SWITCH = 187;

// Strokes up to this long with a single point are sent as `input tap`.
const TAP_MAX_MS = 200;

export interface AdbDeviceAutomationOptions {
  // adb serial; the first available device when omitted
  deviceId?: string;
  sleep?: (ms: number) => Promise<void>;
}

function findNode(root: RawNode, predicate: (node: RawNode) => boolean): RawNode | null {
  const stack: RawNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    if (predicate(node)) return node;
    for (let i = node.children.length - 1; i >= 0; i--) {
      stack.push(node.children[i]);
    }
  }
  return null;
}

/**
 * DeviceAutomation over the adb command line. Every call runs adb as a child process;
 * the dispatcher's device lock keeps them from interleaving.
 */
export class AdbDeviceAutomation implements DeviceAutomation {
  private resolvedId: string | null = null;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: AdbDeviceAutomationOptions = {}) {
    this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)));
  }

  async deviceId(): Promise<string> {
    if (!this.resolvedId) {
      this.resolvedId = await resolveDeviceId(this.options.deviceId);
    }
    return this.resolvedId;
  }

  async snapshotTree(): Promise<RawNode | null> {
    return parseUiHierarchy(await dumpUiHierarchy(await this.deviceId()));
  }

  async getScreenBounds(): Promise<Rect> {
    const { width, height } = await getWindowSize(await this.deviceId());
    return { left: 0, top: 0, right: width, bottom: height };
  }

  async performGesture(strokes: GestureStroke[]): Promise<boolean> {
    const ordered = [...strokes].sort((a, b) => a.startTime - b.startTime);
    const startedAt = Date.now();

    return this.attempt('gesture', async () => {
      const deviceId = await this.deviceId();
      for (const stroke of ordered) {
        const wait = stroke.startTime - (Date.now() - startedAt);
        if (wait > 0) {
          await this.sleep(wait);
        }
        await this.performStroke(deviceId, stroke);
      }
    });
  }

  async performGlobalAction(actionId: number): Promise<boolean> {
    const run = (work: (deviceId: string) => Promise<unknown>) =>
      this.attempt('global action', async () => {
        await work(await this.deviceId());
      });

    switch (actionId) {
      case GlobalActions.back:
        return run(deviceId => sendKeyevents(deviceId, [KEYCODE_BACK]));
      case GlobalActions.home:
        return run(deviceId => sendKeyevents(deviceId, [KEYCODE_HOME]));
      case GlobalActions.recents:
        return run(deviceId => sendKeyevents(deviceId, [KEYCODE_APP_SWITCH]));
      case GlobalActions.notifications:
        return run(deviceId => shell(deviceId, 'cmd statusbar expand-notifications'));
      case GlobalActions.quick_settings:
        return run(deviceId => shell(deviceId, 'cmd statusbar expand-settings'));
      case GlobalActions.power_dialog:
        return run(deviceId => sendKeyevents(deviceId, [KEYCODE_POWER], true));
      default:
        return false;
    }
  }

  async getFocusedEditableNode(): Promise<RawNode | null> {
    const root = await this.snapshotTree();
    return root ? findNode(root, node => node.focused && node.editable) : null;
  }

  async setNodeText(node: RawNode, text: string): Promise<boolean> {
    return this.attempt('set text', async () => {
      const deviceId = await this.deviceId();
      if (!node.focused) {
        const center = centerOf(node.bounds);
        await tapScreen(deviceId, center.x, center.y);
      }
      if (node.text.length > 0) {
        await sendKeyevents(deviceId, [
          KEYCODE_MOVE_END,
          ...new Array<number>(node.text.length).fill(KEYCODE_DEL),
        ]);
      }
      if (text.length > 0) {
        await inputText(deviceId, text);
      }
    });
  }

  async sendKeyEvent(keyCode: number): Promise<boolean> {
    return this.attempt('key event', async () => sendKeyevents(await this.deviceId(), [keyCode]));
  }

  async launchApp(packageName: string, activity?: string): Promise<boolean> {
    return this.attempt('launch', async () => {
      const output = await startApp(await this.deviceId(), packageName, activity);
      if (/Error|No activities found/i.test(output)) {
        throw new RelayError('LAUNCH_FAILED', output.trim());
      }
    });
  }

  // adb screenshots never include an on-device overlay, so hideOverlay has no effect.
  async captureScreenshot(_hideOverlay: boolean): Promise<Buffer> {
    return captureScreenshot(await this.deviceId());
  }

  async getPhoneState(): Promise<PhoneState> {
    const deviceId = await this.deviceId();
    const current = await getCurrentActivity(deviceId);
    const root = await this.snapshotTree();
    const focused = root ? findNode(root, node => node.focused) : null;

    return {
      currentApp: current.packageName ?? '',
      packageName: current.packageName ?? '',
      activityName: current.activity ?? '',
      keyboardVisible: await isKeyboardShown(deviceId),
      isEditable: focused?.editable ?? false,
      focusedElement: focused
        ? { text: focused.text, className: focused.className, resourceId: focused.resourceId }
        : null,
    };
  }

  async listPackages(filter: PackageFilter): Promise<PackageInfo[]> {
    const toInfo = (isSystemApp: boolean) => (packageName: string): PackageInfo => ({
      packageName,
      label: packageName,
      isSystemApp,
    });

    const deviceId = await this.deviceId();
    if (filter === 'user') {
      return (await listInstalledPackages(deviceId, { thirdPartyOnly: true })).map(toInfo(false));
    }
    if (filter === 'system') {
      return (await listInstalledPackages(deviceId, { systemOnly: true })).map(toInfo(true));
    }

    const user = new Set(await listInstalledPackages(deviceId, { thirdPartyOnly: true }));
    return (await listInstalledPackages(deviceId)).map(packageName =>
      toInfo(!user.has(packageName))(packageName)
    );
  }

  private async performStroke(deviceId: string, stroke: GestureStroke): Promise<void> {
    const first = stroke.points[0];
    const last = stroke.points[stroke.points.length - 1];
    if (!first || !last) {
      return;
    }

    const stationary = first.x === last.x && first.y === last.y;
    if (stationary && stroke.duration <= TAP_MAX_MS) {
      await tapScreen(deviceId, first.x, first.y);
      return;
    }
    await swipeScreen(deviceId, first.x, first.y, last.x, last.y, stroke.duration);
  }

  // Device refusals become `false`; the dispatcher turns that into a failed result.
  private async attempt(label: string, work: () => Promise<void>): Promise<boolean> {
    try {
      await work();
      return true;
    } catch (error) {
      if (!(error instanceof RelayError)) {
        throw error;
      }
      console.error(`[adb] ${label} failed: ${error.message}`);
      return false;
    }
  }
}
