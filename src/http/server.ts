import http, { IncomingMessage, ServerResponse } from 'http';
import { ConfigStore } from '../config';
import { CommandDispatcher, DispatchResult, Params, toJsonBody } from '../dispatcher';
import { ErrorCodes, MalformedInputError, RelayError } from '../types';
import { isAuthorized } from '../utils/auth';
import { TaskQueue } from '../utils/taskQueue';
import { PayloadTooLargeError, autoType, parseBody, readBody } from './body';

export const HTTP_WORKERS = 5;

// Read-only queries reachable with GET.
export const GET_ACTIONS: readonly string[] = [
  'ping',
  'version',
  'a11y_tree',
  'a11y_tree_full',
  'state',
  'state_full',
  'phone_state',
  'packages',
  'screenshot',
];

const EXEMPT_PATHS = new Set(['/ping']);

type JsonObject = Record<string, unknown>;

export interface RelayHttpServerOptions {
  dispatcher: CommandDispatcher;
  config: ConfigStore;
  // Overrides socketServerPort for the first bind; 0 picks a free port.
  port?: number;
  host?: string;
  workers?: number;
}

function baseHeaders(response: ServerResponse): void {
  response.setHeader('Connection', 'close');
  response.setHeader('Access-Control-Allow-Origin', '*');
}

function sendJson(response: ServerResponse, statusCode: number, body: JsonObject): void {
  response.statusCode = statusCode;
  baseHeaders(response);
  response.setHeader('Content-Type', 'application/json; charset=utf-8');
  response.end(JSON.stringify(body));
}

function sendBinary(response: ServerResponse, data: Buffer, contentType: string): void {
  response.statusCode = 200;
  baseHeaders(response);
  response.setHeader('Content-Type', contentType);
  response.setHeader('Content-Length', data.byteLength);
  response.end(data);
}

function queryParams(url: URL): Params {
  const params: Params = {};
  for (const [key, value] of url.searchParams) {
    if (key !== 'token') {
      params[key] = autoType(value);
    }
  }
  return params;
}

function statusFor(error: unknown): number {
  if (error instanceof PayloadTooLargeError) return 413;
  if (error instanceof MalformedInputError) return 400;
  return 500;
}

/**
 * Request/response endpoint. GET paths are read-only queries, POST paths name an
 * action and carry its parameters in a JSON or form body. Application failures are
 * answered with 200 and `success: false`.
 */
export class RelayHttpServer {
  private server: http.Server | null = null;
  private readonly queue: TaskQueue;
  private unsubscribe: (() => void) | null = null;
  private boundPort: number | null = null;

  constructor(private readonly options: RelayHttpServerOptions) {
    this.queue = new TaskQueue(options.workers ?? HTTP_WORKERS);
  }

  get port(): number | null {
    return this.boundPort;
  }

  get isListening(): boolean {
    return this.server !== null;
  }

  async start(): Promise<number> {
    if (this.server) {
      throw new Error('HTTP server already started');
    }

    const port = await this.listen(this.options.port ?? this.options.config.get('socketServerPort'));
    this.unsubscribe = this.options.config.subscribe((key, config) => {
      if (key === 'socketServerPort' && config.socketServerPort !== this.boundPort) {
        this.rebind(config.socketServerPort).catch((error: unknown) => {
          console.error(
            `[http] failed to move to port ${config.socketServerPort}:`,
            error instanceof Error ? error.message : String(error)
          );
        });
      }
    });
    return port;
  }

  async stop(): Promise<void> {
    this.unsubscribe?.();
    this.unsubscribe = null;
    await this.close();
  }

  private async listen(port: number): Promise<number> {
    const server = http.createServer((request, response) => {
      this.queue
        .run(() => this.handle(request, response))
        .catch((error: unknown) => {
          const message = error instanceof Error ? error.message : String(error);
          if (!(error instanceof RelayError)) {
            console.error(`[http] ${request.method} ${request.url} failed:`, message);
          }
          if (!response.headersSent) {
            sendJson(response, statusFor(error), {
              success: false,
              error: message,
              code: error instanceof RelayError ? error.code : ErrorCodes.OPERATION_FAILED,
            });
          }
        });
    });

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, this.options.host ?? this.options.config.get('socketServerHost'), () => {
        server.off('error', reject);
        resolve();
      });
    });

    server.on('error', error => console.error('[http] server error:', error.message));
    const address = server.address();
    this.server = server;
    this.boundPort = address && typeof address !== 'string' ? address.port : port;
    console.error(`[http] listening on port ${this.boundPort}`);
    return this.boundPort;
  }

  private async close(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;
    this.boundPort = null;
    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
      server.closeIdleConnections();
    });
  }

  private async rebind(port: number): Promise<void> {
    console.error(`[http] rebinding to port ${port}`);
    await this.close();
    await this.listen(port);
  }

  private async handle(request: IncomingMessage, response: ServerResponse): Promise<void> {
    const method = request.method ?? 'GET';
    const url = new URL(request.url ?? '/', 'http://localhost');
    const pathname = url.pathname.replace(/\/+$/, '') || '/';

    if (method === 'OPTIONS') {
      response.statusCode = 204;
      baseHeaders(response);
      response.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
      response.setHeader('Access-Control-Allow-Headers', 'Authorization, Content-Type');
      response.end();
      return;
    }

    if (!EXEMPT_PATHS.has(pathname) && !isAuthorized(this.options.config, request.headers, request.url)) {
      sendJson(response, 401, { success: false, error: 'Unauthorized', code: ErrorCodes.UNAUTHORIZED });
      return;
    }

    if (method === 'GET') {
      const action = pathname.slice(1);
      if (!GET_ACTIONS.includes(action)) {
        sendJson(response, 404, {
          success: false,
          error: `Not found: ${pathname}`,
          code: ErrorCodes.UNKNOWN_ACTION,
        });
        return;
      }
      const result = await this.options.dispatcher.dispatch(action, queryParams(url));
      this.respond(response, result, 'image/png');
      return;
    }

    if (method === 'POST') {
      const params = parseBody(await readBody(request), request.headers['content-type']);
      const result = await this.options.dispatcher.dispatch(pathname, {
        ...queryParams(url),
        ...params,
      });
      this.respond(response, result, 'application/octet-stream');
      return;
    }

    response.setHeader('Allow', 'GET, POST, OPTIONS');
    sendJson(response, 405, {
      success: false,
      error: `Method not allowed: ${method}`,
      code: ErrorCodes.UNKNOWN_ACTION,
    });
  }

  private respond(response: ServerResponse, result: DispatchResult, binaryType: string): void {
    if (result.kind === 'binary') {
      sendBinary(response, result.data, binaryType);
      return;
    }
    sendJson(response, 200, toJsonBody(result));
  }
}
