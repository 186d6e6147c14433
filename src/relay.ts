import { ConfigKey, ConfigStore, RelayConfig } from './config';
import { DeviceAutomation } from './device/automation';
import { CommandDispatcher } from './dispatcher';
import { RelayHttpServer } from './http/server';
import { ReverseConnectionClient, ReverseSocketFactory } from './reverse/client';
import { RpcWebSocketServer } from './rpc/wsServer';
import { createToolServer } from './server';

export interface RelayServiceOptions {
  config: ConfigStore;
  device: DeviceAutomation;
  // Port overrides for the first bind; 0 picks a free port.
  httpPort?: number;
  wsPort?: number;
  settleMs?: number;
  socketFactory?: ReverseSocketFactory;
}

const REVERSE_RESTART_KEYS: ReadonlySet<ConfigKey> = new Set([
  'reverseConnectionUrl',
  'reverseConnectionToken',
]);

/**
 * Owns one dispatcher and every transport in front of it. Transports that are
 * enabled in the configuration start with the service; the reverse connection
 * also follows later configuration changes.
 */
export class RelayService {
  readonly dispatcher: CommandDispatcher;
  readonly http: RelayHttpServer;
  readonly websocket: RpcWebSocketServer;
  readonly reverse: ReverseConnectionClient;
  private unsubscribe: (() => void) | null = null;
  private running = false;

  constructor(private readonly options: RelayServiceOptions) {
    const { config } = options;
    this.dispatcher = new CommandDispatcher(options.device, config);

    const createServer = () =>
      createToolServer({ dispatcher: this.dispatcher, config, settleMs: options.settleMs });

    this.http = new RelayHttpServer({
      dispatcher: this.dispatcher,
      config,
      port: options.httpPort,
    });
    this.websocket = new RpcWebSocketServer({
      port: options.wsPort ?? config.get('websocketPort'),
      host: config.get('socketServerHost'),
      config,
      createServer,
    });
    this.reverse = new ReverseConnectionClient({
      config,
      createServer,
      socketFactory: options.socketFactory,
    });

    this.reverse.on('error', (error: Error) => console.error(`[reverse] ${error.message}`));
    this.reverse.on('connected', () => console.error('[relay] reverse connection established'));
  }

  get isRunning(): boolean {
    return this.running;
  }

  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    const { config } = this.options;

    if (config.get('socketServerEnabled')) {
      await this.http.start();
    }
    if (config.get('websocketEnabled')) {
      await this.websocket.start();
    }
    if (config.get('reverseConnectionEnabled')) {
      this.reverse.start();
    }

    this.unsubscribe = config.subscribe((key, next) => this.onConfigChange(key, next));
    this.running = true;
    console.error('[relay] started');
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.unsubscribe?.();
    this.unsubscribe = null;

    this.reverse.stop();
    await Promise.all([this.http.stop(), this.websocket.stop()]);
    console.error('[relay] stopped');
  }

  private onConfigChange(key: ConfigKey, config: RelayConfig): void {
    if (key === 'reverseConnectionEnabled') {
      if (config.reverseConnectionEnabled) {
        this.reverse.start();
      } else {
        this.reverse.stop();
      }
      return;
    }

    if (REVERSE_RESTART_KEYS.has(key) && config.reverseConnectionEnabled) {
      this.reverse.stop();
      this.reverse.start();
    }
  }
}

export { ConfigStore, RelayConfigSchema } from './config';
export type { RelayConfig } from './config';
export { CommandDispatcher, normalizeAction, toJsonBody } from './dispatcher';
export type { DispatchResult, Params } from './dispatcher';
export type { DeviceAutomation, PackageFilter } from './device/automation';
export { AdbDeviceAutomation } from './device/adbAutomation';
export { compact, compactTreeJson, formatCompactTree } from './tree/compactor';
export { createToolServer, ToolServer } from './server';
export { RelayHttpServer } from './http/server';
export { RpcWebSocketServer } from './rpc/wsServer';
export { ReverseConnectionClient } from './reverse/client';
export type { ConnectionState } from './reverse/client';
export * from './types';
