import { EventEmitter } from 'events';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import WebSocket from 'ws';
import { ConfigStore } from '../config';
import { RpcSocket, RpcSocketHandlers, attachWebSocket, wrapWebSocket } from '../rpc/socket';
import { Backoff } from './backoff';
import { PendingRequestQueueOptions } from './pendingQueue';
import { ReverseSessionTransport } from './transport';

export type ConnectionState = 'disconnected' | 'connecting' | 'awaiting_handshake' | 'ready';

export type ReverseSocketFactory = (
  url: string,
  headers: Record<string, string>,
  handlers: RpcSocketHandlers
) => RpcSocket;

export interface ReconnectScheduledEvent {
  delayMs: number;
  attempt: number;
}

export interface ReverseConnectionClientOptions {
  config: ConfigStore;
  createServer: () => Server;
  socketFactory?: ReverseSocketFactory;
  backoff?: Backoff;
  queue?: PendingRequestQueueOptions;
}

export const defaultSocketFactory: ReverseSocketFactory = (url, headers, handlers) => {
  const ws = new WebSocket(url, { headers });
  attachWebSocket(ws, handlers);
  return wrapWebSocket(ws);
};

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Keeps an outbound WebSocket to a remote controller and serves JSON-RPC over it.
 * The remote side initiates the handshake. Dropped connections are retried with
 * exponential backoff for as long as the feature stays enabled.
 *
 * Events: `state` (ConnectionState) on every transition, `connected` the first time
 * the session becomes ready, `reconnect_scheduled` (ReconnectScheduledEvent),
 * `error` (Error) when the client cannot run at all.
 */
export class ReverseConnectionClient extends EventEmitter {
  private current: ConnectionState = 'disconnected';
  private running = false;
  private everConnected = false;
  private socket: RpcSocket | null = null;
  private transport: ReverseSessionTransport | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private pongTimer: NodeJS.Timeout | null = null;
  private readonly backoff: Backoff;
  private readonly socketFactory: ReverseSocketFactory;

  constructor(private readonly options: ReverseConnectionClientOptions) {
    super();
    this.backoff = options.backoff ?? new Backoff();
    this.socketFactory = options.socketFactory ?? defaultSocketFactory;
  }

  get state(): ConnectionState {
    return this.current;
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) {
      return;
    }

    const url = this.options.config.get('reverseConnectionUrl');
    if (!url) {
      // nothing to connect to; the relay keeps serving its other transports
      this.emit('error', new Error('Reverse connection URL is not configured'));
      return;
    }

    this.running = true;
    this.backoff.reset();
    this.connect();
  }

  stop(): void {
    this.running = false;
    this.clearReconnect();
    this.teardown();
    this.setState('disconnected');
  }

  private connect(): void {
    this.reconnectTimer = null;
    if (!this.running || !this.options.config.get('reverseConnectionEnabled')) {
      this.running = false;
      return;
    }

    const url = this.options.config.get('reverseConnectionUrl');
    const token = this.options.config.get('reverseConnectionToken');
    const headers: Record<string, string> = token ? { Authorization: `Bearer ${token}` } : {};

    this.setState('connecting');
    console.error(`[reverse] connecting to ${url}`);

    let socket: RpcSocket | null = null;
    try {
      socket = this.socketFactory(url, headers, {
        onOpen: () => {
          if (socket && socket === this.socket) this.handleOpen(socket);
        },
        onMessage: text => {
          if (socket && socket === this.socket) this.transport?.handleText(text);
        },
        onPong: () => {
          if (socket && socket === this.socket) this.clearPongTimer();
        },
        onClose: (code, reason) => {
          if (socket && socket === this.socket) this.handleClose(code, reason);
        },
        onError: error => {
          console.error('[reverse] socket error:', error.message);
          if (socket && socket === this.socket) this.transport?.handleError(error);
        },
      });
      this.socket = socket;
    } catch (error) {
      console.error('[reverse] could not open socket:', errorMessage(error));
      this.setState('disconnected');
      this.scheduleReconnect();
    }
  }

  private handleOpen(socket: RpcSocket): void {
    console.error('[reverse] connected, waiting for initialize');
    this.backoff.reset();
    this.setState('awaiting_handshake');

    const transport = new ReverseSessionTransport(socket, {
      queue: this.options.queue,
      onReady: () => this.handleReady(),
    });
    this.transport = transport;
    this.startHeartbeat(socket);

    this.options
      .createServer()
      .connect(transport)
      .catch((error: unknown) => {
        console.error('[reverse] failed to start session:', errorMessage(error));
        socket.terminate();
      });
  }

  private handleReady(): void {
    this.setState('ready');
    if (!this.everConnected) {
      this.everConnected = true;
      this.emit('connected');
    }
  }

  private handleClose(code: number, reason: string): void {
    console.error(`[reverse] connection closed (${code}${reason ? `: ${reason}` : ''})`);
    this.teardown();
    this.setState('disconnected');
    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (!this.running || this.reconnectTimer) {
      return;
    }
    if (!this.options.config.get('reverseConnectionEnabled')) {
      this.running = false;
      return;
    }

    const delayMs = this.backoff.next();
    const event: ReconnectScheduledEvent = { delayMs, attempt: this.backoff.attempt };
    console.error(`[reverse] reconnecting in ${delayMs}ms (attempt ${event.attempt})`);
    this.emit('reconnect_scheduled', event);
    this.reconnectTimer = setTimeout(() => this.connect(), delayMs);
  }

  private startHeartbeat(socket: RpcSocket): void {
    const intervalMs = this.options.config.get('heartbeatIntervalMs');
    const timeoutMs = this.options.config.get('heartbeatTimeoutMs');

    this.heartbeatTimer = setInterval(() => {
      if (!socket.isOpen || this.pongTimer) {
        return;
      }
      socket.ping();
      this.pongTimer = setTimeout(() => {
        this.pongTimer = null;
        console.error(`[reverse] no pong within ${timeoutMs}ms, dropping connection`);
        socket.terminate();
      }, timeoutMs);
    }, intervalMs);
  }

  private clearPongTimer(): void {
    if (this.pongTimer) {
      clearTimeout(this.pongTimer);
      this.pongTimer = null;
    }
  }

  private clearReconnect(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private teardown(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
    this.clearPongTimer();

    const socket = this.socket;
    const transport = this.transport;
    this.socket = null;
    this.transport = null;

    transport?.handleClose();
    if (socket?.isOpen) {
      socket.close(1000, 'Client stopping');
    }
  }

  private setState(next: ConnectionState): void {
    if (next === this.current) {
      return;
    }
    this.current = next;
    this.emit('state', next);
  }
}
