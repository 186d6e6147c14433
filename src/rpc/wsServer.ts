import { IncomingMessage } from 'http';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import WebSocket, { WebSocketServer } from 'ws';
import { ConfigStore } from '../config';
import { isAuthorized } from '../utils/auth';
import { attachWebSocket, wrapWebSocket } from './socket';
import { SerialRpcTransport } from './transport';

export const CLOSE_UNAUTHORIZED = 1008;
export const CLOSE_TRY_AGAIN_LATER = 1013;

export interface RpcWebSocketServerOptions {
  port: number;
  host?: string;
  config: ConfigStore;
  // A fresh JSON-RPC server for every session.
  createServer: () => Server;
}

interface Session {
  ws: WebSocket;
  transport: SerialRpcTransport;
}

/**
 * WebSocket endpoint for JSON-RPC callers. Only one session is served at a time;
 * a second connection is turned away until the first one closes.
 */
export class RpcWebSocketServer {
  private wss: WebSocketServer | null = null;
  private session: Session | null = null;

  constructor(private readonly options: RpcWebSocketServerOptions) {}

  get port(): number | null {
    const address = this.wss?.address();
    if (!address || typeof address === 'string') {
      return null;
    }
    return address.port;
  }

  get hasSession(): boolean {
    return this.session !== null;
  }

  async start(): Promise<number> {
    if (this.wss) {
      throw new Error('WebSocket server already started');
    }

    const wss = new WebSocketServer({ port: this.options.port, host: this.options.host });
    await new Promise<void>((resolve, reject) => {
      wss.once('listening', () => resolve());
      wss.once('error', reject);
    });

    wss.on('connection', (ws, request) => this.handleConnection(ws, request));
    wss.on('error', error => {
      console.error('[rpc] WebSocket server error:', error.message);
    });
    this.wss = wss;

    const port = this.port ?? this.options.port;
    console.error(`[rpc] WebSocket server listening on port ${port}`);
    return port;
  }

  async stop(): Promise<void> {
    const wss = this.wss;
    if (!wss) {
      return;
    }
    this.wss = null;

    if (this.session) {
      await this.session.transport.close();
      this.session = null;
    }
    for (const client of wss.clients) {
      client.terminate();
    }

    await new Promise<void>((resolve, reject) => {
      wss.close(error => (error ? reject(error) : resolve()));
    });
  }

  private handleConnection(ws: WebSocket, request: IncomingMessage): void {
    if (!isAuthorized(this.options.config, request.headers, request.url)) {
      console.error('[rpc] rejected WebSocket connection: unauthorized');
      ws.close(CLOSE_UNAUTHORIZED, 'Unauthorized');
      return;
    }

    if (this.session) {
      ws.close(CLOSE_TRY_AGAIN_LATER, 'Session already active');
      return;
    }

    const transport = new SerialRpcTransport(wrapWebSocket(ws));
    const session: Session = { ws, transport };
    this.session = session;

    attachWebSocket(ws, {
      onMessage: text => transport.handleText(text),
      onClose: () => {
        transport.handleClose();
        if (this.session === session) {
          this.session = null;
        }
      },
      onError: error => transport.handleError(error),
    });

    this.options
      .createServer()
      .connect(transport)
      .catch((error: unknown) => {
        console.error(
          '[rpc] failed to start session:',
          error instanceof Error ? error.message : String(error)
        );
        ws.terminate();
      });
  }
}
