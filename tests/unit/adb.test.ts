import {
  captureScreenshot,
  checkADBInstalled,
  dumpUiHierarchy,
  escapeShellArg,
  executeADBCommand,
  getConnectedDevices,
  getCurrentActivity,
  getWindowSize,
  inputText,
  isKeyboardShown,
  listInstalledPackages,
  parseDeviceList,
  resolveDeviceId,
  sendKeyevents,
  startApp,
  swipeScreen,
} from '../../src/utils/adb';
import { runCommand } from '../../src/utils/exec';
import {
  ADBCommandError,
  ADBNotFoundError,
  CommandFailure,
  DeviceNotFoundError,
  NoDevicesFoundError,
  ScreenshotCaptureError,
} from '../../src/types';
import {
  fakeAdb,
  mockActivityOutput,
  mockDeviceListOutput,
  mockEmptyDeviceListOutput,
  mockInputMethodOutput,
  mockScreenshotData,
  mockUiDump,
  mockUnauthorizedDeviceListOutput,
} from '../mocks/adb.mock';

jest.mock('../../src/utils/exec', () => ({
  runCommand: jest.fn(),
}));

describe('ADB Utilities', () => {
  const mockRunCommand = jest.mocked(runCommand);
  const ADB_RUN_OPTIONS = { timeout: 5000, maxBuffer: 50 * 1024 * 1024 };
  const SERIAL = 'emulator-5554';

  function deviceCalls(): string[][] {
    return mockRunCommand.mock.calls
      .map(([, args]) => args)
      .filter(args => args[0] === '-s');
  }

  function deviceCommands(): string[] {
    return deviceCalls().map(args => ['adb', ...args].join(' '));
  }

  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('checkADBInstalled', () => {
    it('should return true if ADB is installed', async () => {
      mockRunCommand.mockResolvedValue(Buffer.from('Android Debug Bridge version 1.0.41'));

      expect(await checkADBInstalled()).toBe(true);
      expect(mockRunCommand).toHaveBeenCalledWith('adb', ['version'], { timeout: 5000 });
    });

    it('should return false if ADB is not installed', async () => {
      mockRunCommand.mockRejectedValue(new CommandFailure('spawn adb ENOENT', null));

      expect(await checkADBInstalled()).toBe(false);
    });
  });

  describe('executeADBCommand', () => {
    it('should execute ADB command successfully', async () => {
      mockRunCommand.mockImplementation(fakeAdb());

      expect(await executeADBCommand(['devices', '-l'])).toBe(mockDeviceListOutput);
      expect(mockRunCommand).toHaveBeenCalledWith('adb', ['devices', '-l'], ADB_RUN_OPTIONS);
    });

    it('should throw ADBNotFoundError if ADB is not installed', async () => {
      mockRunCommand.mockRejectedValue(new CommandFailure('spawn adb ENOENT', null));

      await expect(executeADBCommand(['devices'])).rejects.toThrow(ADBNotFoundError);
    });

    it('should return partial output when adb exits with status 1', async () => {
      mockRunCommand.mockImplementation(
        fakeAdb({ 'shell dumpsys': new CommandFailure('exit 1', 1, Buffer.from('partial')) })
      );

      expect(await executeADBCommand(['-s', SERIAL, 'shell', 'dumpsys window'])).toBe('partial');
    });

    it('should wrap other failures in an ADBCommandError', async () => {
      mockRunCommand.mockImplementation(fakeAdb({ 'shell false': new CommandFailure('boom', 2) }));

      await expect(executeADBCommand(['-s', SERIAL, 'shell', 'false'])).rejects.toThrow(
        new ADBCommandError('ADB_COMMAND_FAILED', 'ADB command failed: boom')
      );
    });
  });

  describe('parseDeviceList', () => {
    it('should parse serials, states and device properties', () => {
      expect(parseDeviceList(mockDeviceListOutput)).toEqual([
        { id: SERIAL, status: 'device', product: 'sdk_gphone_x86', model: 'sdk_gphone_x86', transportId: '1' },
        { id: '192.168.1.100:5555', status: 'device', product: 'pixel', model: 'pixel', transportId: '2' },
      ]);
    });

    it('should map unfamiliar states to unknown', () => {
      expect(parseDeviceList('List of devices attached\nabc123\tbootloader')).toEqual([
        { id: 'abc123', status: 'unknown' },
      ]);
    });

    it('should return an empty list for no devices', () => {
      expect(parseDeviceList(mockEmptyDeviceListOutput)).toEqual([]);
    });
  });

  describe('device selection', () => {
    it('should throw NoDevicesFoundError when nothing is attached', async () => {
      mockRunCommand.mockResolvedValue(Buffer.from(mockEmptyDeviceListOutput));

      await expect(getConnectedDevices()).rejects.toThrow(NoDevicesFoundError);
    });

    it('should pick the first available device', async () => {
      mockRunCommand.mockImplementation(fakeAdb());

      expect(await resolveDeviceId()).toBe(SERIAL);
    });

    it('should reject an unknown serial', async () => {
      mockRunCommand.mockImplementation(fakeAdb());

      await expect(resolveDeviceId('missing')).rejects.toThrow(DeviceNotFoundError);
    });

    it('should reject an unauthorized device', async () => {
      mockRunCommand.mockResolvedValue(Buffer.from(mockUnauthorizedDeviceListOutput));

      await expect(resolveDeviceId('192.168.1.100:5555')).rejects.toThrow(
        "Device '192.168.1.100:5555' is not available (status: unauthorized)"
      );
      await expect(resolveDeviceId()).rejects.toThrow('No available devices found');
    });
  });

  describe('captureScreenshot', () => {
    it('should return the PNG bytes', async () => {
      mockRunCommand.mockImplementation(fakeAdb({ 'exec-out screencap -p': mockScreenshotData }));

      expect(await captureScreenshot(SERIAL)).toEqual(mockScreenshotData);
      expect(deviceCommands()).toEqual([`adb -s ${SERIAL} exec-out screencap -p`]);
    });

    it('should reject empty output', async () => {
      mockRunCommand.mockImplementation(fakeAdb());

      await expect(captureScreenshot(SERIAL)).rejects.toThrow(ScreenshotCaptureError);
    });
  });

  describe('dumpUiHierarchy', () => {
    it('should dump, read back and remove the hierarchy file', async () => {
      mockRunCommand.mockImplementation(fakeAdb({ 'exec-out cat': mockUiDump }));

      expect(await dumpUiHierarchy(SERIAL)).toBe(mockUiDump);
      expect(deviceCommands()).toEqual([
        `adb -s ${SERIAL} shell uiautomator dump '/sdcard/a11y_relay_ui.xml'`,
        `adb -s ${SERIAL} exec-out cat '/sdcard/a11y_relay_ui.xml'`,
        `adb -s ${SERIAL} shell rm '/sdcard/a11y_relay_ui.xml'`,
      ]);
    });

    it('should fail when the output is not a hierarchy', async () => {
      mockRunCommand.mockImplementation(fakeAdb({ 'exec-out cat': 'ERROR: could not get idle state.' }));

      await expect(dumpUiHierarchy(SERIAL)).rejects.toThrow(
        `Failed to dump UI hierarchy from device '${SERIAL}'`
      );
    });
  });

  describe('device queries', () => {
    it('should read the resumed activity', async () => {
      mockRunCommand.mockImplementation(fakeAdb({ 'shell dumpsys activity': mockActivityOutput }));

      expect(await getCurrentActivity(SERIAL)).toEqual({
        packageName: 'com.example.app',
        activity: 'com.example.app.LoginActivity',
        raw: 'topResumedActivity=ActivityRecord{4f1c2a u0 com.example.app/.LoginActivity t12}',
      });
    });

    it('should prefer the override window size', async () => {
      mockRunCommand.mockImplementation(
        fakeAdb({ 'shell wm size': 'Physical size: 1080x2400\nOverride size: 720x1600' })
      );

      expect(await getWindowSize(SERIAL)).toEqual({ width: 720, height: 1600 });
    });

    it('should fail on unreadable window size output', async () => {
      mockRunCommand.mockImplementation(fakeAdb({ 'shell wm size': 'nope' }));

      await expect(getWindowSize(SERIAL)).rejects.toThrow('Failed to parse window size from device output');
    });

    it('should detect the soft keyboard', async () => {
      mockRunCommand.mockImplementation(fakeAdb({ 'shell dumpsys input_method': mockInputMethodOutput }));

      expect(await isKeyboardShown(SERIAL)).toBe(true);
    });

    it('should list packages sorted and filtered', async () => {
      mockRunCommand.mockImplementation(
        fakeAdb({ 'shell pm list packages -3': 'package:com.zeta\npackage:com.alpha\n' })
      );

      expect(await listInstalledPackages(SERIAL, { thirdPartyOnly: true })).toEqual(['com.alpha', 'com.zeta']);
      expect(mockRunCommand).toHaveBeenCalledWith('adb', ['-s', SERIAL, 'shell', 'pm list packages -3'], {
        ...ADB_RUN_OPTIONS,
        timeout: 10000,
      });
    });
  });

  describe('input commands', () => {
    beforeEach(() => {
      mockRunCommand.mockImplementation(fakeAdb());
    });

    it('should quote text and encode spaces', async () => {
      await inputText(SERIAL, "it's here");

      expect(deviceCalls()).toEqual([['-s', SERIAL, 'shell', `input text 'it'\\''s%shere'`]]);
    });

    it('should keep shell syntax in the text inside one quoted word', async () => {
      await inputText(SERIAL, 'hi;reboot');
      await inputText(SERIAL, '$(rm -rf /sdcard)');
      await inputText(SERIAL, "a'; reboot; echo '");

      expect(deviceCalls()).toEqual([
        ['-s', SERIAL, 'shell', `input text 'hi;reboot'`],
        ['-s', SERIAL, 'shell', `input text '$(rm%s-rf%s/sdcard)'`],
        ['-s', SERIAL, 'shell', `input text 'a'\\'';%sreboot;%secho%s'\\'''`],
      ]);
    });

    it('should send key events in one command', async () => {
      await sendKeyevents(SERIAL, [123, 67, 67]);
      await sendKeyevents(SERIAL, [26], true);

      expect(deviceCommands()).toEqual([
        `adb -s ${SERIAL} shell input keyevent 123 67 67`,
        `adb -s ${SERIAL} shell input keyevent --longpress 26`,
      ]);
    });

    it('should extend the timeout by the swipe duration', async () => {
      await swipeScreen(SERIAL, 1, 2, 3, 4, 300);

      expect(mockRunCommand).toHaveBeenCalledWith('adb', ['-s', SERIAL, 'shell', 'input swipe 1 2 3 4 300'], {
        ...ADB_RUN_OPTIONS,
        timeout: 5300,
      });
    });

    it('should start an activity or the launcher entry', async () => {
      await startApp(SERIAL, 'com.example.app', '.Main');
      await startApp(SERIAL, 'com.example.app');

      expect(deviceCommands()).toEqual([
        `adb -s ${SERIAL} shell am start -n 'com.example.app/com.example.app.Main'`,
        `adb -s ${SERIAL} shell monkey -p 'com.example.app' -c android.intent.category.LAUNCHER 1`,
      ]);
    });

    it('should quote a package name carrying shell syntax', async () => {
      await startApp(SERIAL, 'com.x;reboot');
      await startApp(SERIAL, 'com.x', '$(reboot)');

      expect(deviceCalls()).toEqual([
        ['-s', SERIAL, 'shell', `monkey -p 'com.x;reboot' -c android.intent.category.LAUNCHER 1`],
        ['-s', SERIAL, 'shell', `am start -n 'com.x/$(reboot)'`],
      ]);
    });
  });

  describe('escapeShellArg', () => {
    it('should single-quote values for a POSIX shell', () => {
      expect(escapeShellArg("it's")).toBe(`'it'\\''s'`);
      expect(escapeShellArg('$(id); `id`')).toBe("'$(id); `id`'");
    });
  });
});
