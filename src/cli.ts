import { RelayConfig } from './config';
import { MalformedInputError } from './types';

export type CliCommand =
  | { kind: 'version' }
  | { kind: 'compact'; file: string }
  | { kind: 'serve'; overrides: Partial<RelayConfig> };

export type Environment = Record<string, string | undefined>;

export function parseArgValue(args: string[], key: string): string | undefined {
  const index = args.findIndex(value => value === key);
  if (index < 0) {
    return undefined;
  }
  return args[index + 1];
}

function parsePort(value: string, source: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new MalformedInputError(`Invalid port for ${source}: ${value}`);
  }
  return port;
}

/**
 * Reads the command line. Flags win over environment variables; both win over the
 * stored configuration.
 */
export function parseCliArgs(args: string[], env: Environment = {}): CliCommand {
  if (args.includes('--version') || args.includes('-v') || args.includes('-V')) {
    return { kind: 'version' };
  }

  if (args[0] === 'compact') {
    const file = args[1];
    if (!file) {
      throw new MalformedInputError('Usage: a11y-relay compact <file>');
    }
    return { kind: 'compact', file };
  }

  const overrides: Partial<RelayConfig> = {};

  const port = parseArgValue(args, '--port') ?? env.A11Y_RELAY_PORT;
  if (port !== undefined) {
    overrides.socketServerPort = parsePort(port, '--port');
  }

  const wsPort = parseArgValue(args, '--ws-port') ?? env.A11Y_RELAY_WS_PORT;
  if (wsPort !== undefined) {
    overrides.websocketPort = parsePort(wsPort, '--ws-port');
  }

  const reverseUrl = parseArgValue(args, '--reverse-url') ?? env.A11Y_RELAY_REVERSE_URL;
  if (reverseUrl) {
    overrides.reverseConnectionUrl = reverseUrl;
    overrides.reverseConnectionEnabled = true;
  }

  const token = parseArgValue(args, '--token') ?? env.A11Y_RELAY_TOKEN;
  if (token) {
    overrides.authToken = token;
    overrides.authEnabled = true;
  }

  const device = parseArgValue(args, '--device') ?? env.ANDROID_SERIAL;
  if (device) {
    overrides.deviceId = device;
  }

  return { kind: 'serve', overrides };
}
