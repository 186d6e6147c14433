import { parseArgValue, parseCliArgs } from '../../src/cli';
import { MalformedInputError } from '../../src/types';

describe('Command line', () => {
  describe('parseArgValue', () => {
    it('should return the value after a flag', () => {
      expect(parseArgValue(['--port', '9000', '--token', 'test-secret'], '--token')).toBe('test-secret');
    });

    it('should return undefined for a missing flag or value', () => {
      expect(parseArgValue(['--port'], '--token')).toBeUndefined();
      expect(parseArgValue(['--port'], '--port')).toBeUndefined();
    });
  });

  describe('parseCliArgs', () => {
    it('should recognise the version flags', () => {
      expect(parseCliArgs(['--version'])).toEqual({ kind: 'version' });
      expect(parseCliArgs(['serve', '-v'])).toEqual({ kind: 'version' });
    });

    it('should read the compact subcommand', () => {
      expect(parseCliArgs(['compact', 'tree.json'])).toEqual({ kind: 'compact', file: 'tree.json' });
    });

    it('should require a file for compact', () => {
      expect(() => parseCliArgs(['compact'])).toThrow('Usage: a11y-relay compact <file>');
    });

    it('should serve with no overrides by default', () => {
      expect(parseCliArgs([])).toEqual({ kind: 'serve', overrides: {} });
    });

    it('should turn flags into configuration overrides', () => {
      const command = parseCliArgs([
        '--port',
        '9000',
        '--ws-port',
        '9001',
        '--reverse-url',
        'ws://controller.test/relay',
        '--token',
        'test-secret',
        '--device',
        'emulator-5554',
      ]);

      expect(command).toEqual({
        kind: 'serve',
        overrides: {
          socketServerPort: 9000,
          websocketPort: 9001,
          reverseConnectionUrl: 'ws://controller.test/relay',
          reverseConnectionEnabled: true,
          authToken: 'test-secret',
          authEnabled: true,
          deviceId: 'emulator-5554',
        },
      });
    });

    it('should fall back to environment variables', () => {
      const command = parseCliArgs(['--port', '9000'], {
        A11Y_RELAY_PORT: '7000',
        A11Y_RELAY_WS_PORT: '7001',
        ANDROID_SERIAL: 'emulator-5556',
      });

      expect(command).toEqual({
        kind: 'serve',
        overrides: { socketServerPort: 9000, websocketPort: 7001, deviceId: 'emulator-5556' },
      });
    });

    it('should reject ports outside the valid range', () => {
      expect(() => parseCliArgs(['--port', '70000'])).toThrow(MalformedInputError);
      expect(() => parseCliArgs(['--ws-port', 'abc'])).toThrow('Invalid port for --ws-port: abc');
    });
  });
});
