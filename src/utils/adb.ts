import {
  AndroidDevice,
  ADBCommandError,
  ADBNotFoundError,
  CommandFailure,
  DeviceNotFoundError,
  NoDevicesFoundError,
  ScreenshotCaptureError,
} from '../types';
import { RunOptions, runCommand } from './exec';

// Default timeout for ADB commands (5 seconds)
const DEFAULT_TIMEOUT = 5000;
const DEFAULT_MAX_BUFFER = 50 * 1024 * 1024;
const UI_DUMP_TIMEOUT_MS = 10000;
const UI_DUMP_PATH = '/sdcard/a11y_relay_ui.xml';

/**
 * Quotes a value for the device's POSIX shell. `adb shell` joins its arguments and
 * hands the line to `sh` on the device, so anything caller-supplied goes through here.
 */
export function escapeShellArg(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

// `input text` reads %s as a space
export function encodeAdbInputText(value: string): string {
  return value.replace(/\s/g, '%s');
}

function normalizeActivityName(activity: string, packageName: string): string {
  if (activity.startsWith('.')) {
    return `${packageName}${activity}`;
  }

  return activity;
}

// adb exits with status 1 for some commands that still printed a usable result
function partialOutput(error: unknown): Buffer | null {
  if (!(error instanceof CommandFailure) || error.status !== 1) {
    return null;
  }
  return error.stdout.length > 0 ? error.stdout : null;
}

function commandError(args: string[], error: unknown): ADBCommandError {
  const message = error instanceof Error ? error.message : String(error);
  return new ADBCommandError('ADB_COMMAND_FAILED', `ADB command failed: ${message}`, {
    command: args.join(' '),
    error: message,
  });
}

// Check if ADB is available
export async function checkADBInstalled(): Promise<boolean> {
  try {
    await runCommand('adb', ['version'], { timeout: DEFAULT_TIMEOUT });
    return true;
  } catch {
    return false;
  }
}

// Execute ADB command that returns binary data
export async function executeADBCommandBinary(args: string[], options: RunOptions = {}): Promise<Buffer> {
  if (!(await checkADBInstalled())) {
    throw new ADBNotFoundError();
  }

  try {
    return await runCommand('adb', args, {
      timeout: DEFAULT_TIMEOUT,
      maxBuffer: DEFAULT_MAX_BUFFER,
      ...options,
    });
  } catch (error) {
    const output = partialOutput(error);
    if (output) {
      return output;
    }
    throw commandError(args, error);
  }
}

// Execute ADB command with error handling
export async function executeADBCommand(args: string[], options: RunOptions = {}): Promise<string> {
  return (await executeADBCommandBinary(args, options)).toString('utf-8');
}

function toDeviceStatus(value: string): AndroidDevice['status'] {
  switch (value) {
    case 'device':
    case 'offline':
    case 'unauthorized':
      return value;
    default:
      return 'unknown';
  }
}

// Parse device list from ADB output
export function parseDeviceList(output: string): AndroidDevice[] {
  const lines = output.trim().split('\n');
  const devices: AndroidDevice[] = [];

  // Skip header line
  for (let i = 1; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;

    const parts = line.split(/\s+/);
    if (parts.length < 2) continue;

    const device: AndroidDevice = {
      id: parts[0],
      status: toDeviceStatus(parts[1]),
    };

    for (const part of parts.slice(2)) {
      if (part.startsWith('model:')) {
        device.model = part.substring(6);
      } else if (part.startsWith('product:')) {
        device.product = part.substring(8);
      } else if (part.startsWith('transport_id:')) {
        device.transportId = part.substring(13);
      }
    }

    devices.push(device);
  }

  return devices;
}

// Get list of connected devices
export async function getConnectedDevices(): Promise<AndroidDevice[]> {
  const devices = parseDeviceList(await executeADBCommand(['devices', '-l']));
  if (devices.length === 0) {
    throw new NoDevicesFoundError();
  }
  return devices;
}

export async function resolveDeviceId(deviceId?: string): Promise<string> {
  const devices = await getConnectedDevices();

  if (deviceId) {
    const device = devices.find(d => d.id === deviceId);

    if (!device) {
      throw new DeviceNotFoundError(deviceId);
    }

    if (device.status !== 'device') {
      throw new ADBCommandError(
        'DEVICE_NOT_AVAILABLE',
        `Device '${deviceId}' is not available (status: ${device.status})`,
        { device }
      );
    }

    return deviceId;
  }

  const available = devices.find(device => device.status === 'device');
  if (!available) {
    throw new ADBCommandError('NO_AVAILABLE_DEVICES', 'No available devices found', { devices });
  }
  return available.id;
}

/**
 * Runs `command` through the device shell of an already resolved device. Caller-supplied
 * words in `command` must be quoted with `escapeShellArg`.
 */
export function shell(deviceId: string, command: string, options: RunOptions = {}): Promise<string> {
  return executeADBCommand(['-s', deviceId, 'shell', command], options);
}

export async function captureScreenshot(deviceId: string): Promise<Buffer> {
  let data: Buffer;
  try {
    data = await executeADBCommandBinary(['-s', deviceId, 'exec-out', 'screencap -p']);
  } catch (error) {
    if (error instanceof ADBCommandError) {
      throw error;
    }
    throw new ScreenshotCaptureError(deviceId, error instanceof Error ? error : undefined);
  }

  if (data.length === 0) {
    throw new ScreenshotCaptureError(deviceId);
  }
  return data;
}

// Dumps the window hierarchy to a temp file on the device and reads it back.
export async function dumpUiHierarchy(deviceId: string): Promise<string> {
  const filePath = escapeShellArg(UI_DUMP_PATH);
  await shell(deviceId, `uiautomator dump ${filePath}`, { timeout: UI_DUMP_TIMEOUT_MS });
  const output = await executeADBCommand(['-s', deviceId, 'exec-out', `cat ${filePath}`], {
    timeout: UI_DUMP_TIMEOUT_MS,
  });
  await shell(deviceId, `rm ${filePath}`);

  const xml = output.trim();
  if (!xml.includes('<hierarchy')) {
    throw new ADBCommandError(
      'UI_DUMP_FAILED',
      `Failed to dump UI hierarchy from device '${deviceId}'`,
      { deviceId, output: xml.slice(0, 200) }
    );
  }
  return xml;
}

export async function getCurrentActivity(deviceId: string): Promise<{
  packageName?: string;
  activity?: string;
  raw: string;
}> {
  const output = await shell(deviceId, 'dumpsys activity activities', { timeout: 8000 });

  const rawLine =
    output
      .split('\n')
      .map(line => line.trim())
      .find(
        line =>
          line.includes('topResumedActivity') ||
          line.includes('ResumedActivity') ||
          line.includes('mFocusedApp')
      ) ?? '';

  const match = rawLine.match(/([A-Za-z0-9._]+)\/([A-Za-z0-9._$]+)/);
  if (!match) {
    return { raw: rawLine };
  }

  const packageName = match[1];
  return {
    packageName,
    activity: normalizeActivityName(match[2], packageName),
    raw: rawLine,
  };
}

export async function getWindowSize(deviceId: string): Promise<{ width: number; height: number }> {
  const raw = (await shell(deviceId, 'wm size')).trim();

  const physicalMatch = raw.match(/Physical size:\s*(\d+)x(\d+)/i);
  const overrideMatch = raw.match(/Override size:\s*(\d+)x(\d+)/i);
  const match = overrideMatch ?? physicalMatch;

  if (!match) {
    throw new ADBCommandError(
      'WINDOW_SIZE_NOT_FOUND',
      'Failed to parse window size from device output',
      { output: raw }
    );
  }

  return { width: parseInt(match[1], 10), height: parseInt(match[2], 10) };
}

export async function isKeyboardShown(deviceId: string): Promise<boolean> {
  return /mInputShown=true/.test(await shell(deviceId, 'dumpsys input_method'));
}

export async function listInstalledPackages(
  deviceId: string,
  options: { thirdPartyOnly?: boolean; systemOnly?: boolean } = {}
): Promise<string[]> {
  const flags: string[] = [];
  if (options.thirdPartyOnly) flags.push('-3');
  if (options.systemOnly) flags.push('-s');
  const output = await shell(deviceId, `pm list packages ${flags.join(' ')}`.trim(), { timeout: 10000 });
  return output
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.startsWith('package:'))
    .map(line => line.replace(/^package:/, '').trim())
    .sort();
}

export async function tapScreen(deviceId: string, x: number, y: number): Promise<void> {
  await shell(deviceId, `input tap ${x} ${y}`);
}

export async function swipeScreen(
  deviceId: string,
  startX: number,
  startY: number,
  endX: number,
  endY: number,
  durationMs: number
): Promise<void> {
  await shell(deviceId, `input swipe ${startX} ${startY} ${endX} ${endY} ${durationMs}`, {
    timeout: DEFAULT_TIMEOUT + durationMs,
  });
}

export async function inputText(deviceId: string, text: string): Promise<void> {
  await shell(deviceId, `input text ${escapeShellArg(encodeAdbInputText(text))}`);
}

export async function sendKeyevents(deviceId: string, keyCodes: number[], longPress = false): Promise<void> {
  const flag = longPress ? '--longpress ' : '';
  await shell(deviceId, `input keyevent ${flag}${keyCodes.join(' ')}`);
}

export function startApp(deviceId: string, packageName: string, activity?: string): Promise<string> {
  if (activity) {
    const component = `${packageName}/${normalizeActivityName(activity, packageName)}`;
    return shell(deviceId, `am start -n ${escapeShellArg(component)}`, { timeout: 10000 });
  }
  return shell(
    deviceId,
    `monkey -p ${escapeShellArg(packageName)} -c android.intent.category.LAUNCHER 1`,
    { timeout: 10000 }
  );
}
