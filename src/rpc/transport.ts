import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  JSONRPCMessageSchema,
  type JSONRPCMessage,
  type JSONRPCRequest,
  type RequestId,
} from '@modelcontextprotocol/sdk/types.js';
import { RpcErrorCodes } from '../types';
import { RpcSocket } from './socket';

type RpcId = RequestId | null;

export function isRequest(message: JSONRPCMessage): message is JSONRPCRequest {
  return 'method' in message && 'id' in message;
}

function isResponse(message: JSONRPCMessage): message is Extract<JSONRPCMessage, { id: RequestId }> & ({ result: unknown } | { error: unknown }) {
  return 'result' in message || 'error' in message;
}

function readId(value: unknown): RpcId {
  if (typeof value === 'object' && value !== null && 'id' in value) {
    const { id } = value;
    if (typeof id === 'string' || typeof id === 'number') {
      return id;
    }
  }
  return null;
}

/**
 * Transport over one socket that hands requests to the server one at a time: the
 * next request is delivered only once the response to the current one has gone out.
 * Notifications keep their place in the arrival order.
 */
export class SerialRpcTransport implements Transport {
  onclose?: Transport['onclose'];
  onerror?: Transport['onerror'];
  onmessage?: Transport['onmessage'];

  protected readonly inbox: JSONRPCMessage[] = [];
  private inFlight: RequestId | null = null;
  private started = false;
  private closed = false;

  constructor(protected readonly socket: RpcSocket) {}

  get isClosed(): boolean {
    return this.closed;
  }

  async start(): Promise<void> {
    this.started = true;
    this.pump();
  }

  async send(message: JSONRPCMessage): Promise<void> {
    if (this.closed) {
      throw new Error('Transport is closed');
    }

    this.socket.send(JSON.stringify(message));

    if (isResponse(message) && message.id === this.inFlight) {
      this.inFlight = null;
      this.onResponseSent(message.id, 'error' in message);
      this.pump();
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.socket.close(1000, 'Session closed');
    this.handleClose();
  }

  // Feed one text frame from the socket.
  handleText(text: string): void {
    if (this.closed) {
      return;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      this.sendRaw({
        jsonrpc: '2.0',
        id: null,
        error: { code: RpcErrorCodes.PARSE_ERROR, message: 'Parse error' },
      });
      return;
    }

    const parsed = JSONRPCMessageSchema.safeParse(raw);
    if (!parsed.success) {
      this.sendRaw({
        jsonrpc: '2.0',
        id: readId(raw),
        error: { code: RpcErrorCodes.INVALID_REQUEST, message: 'Invalid Request' },
      });
      return;
    }

    this.receive(parsed.data);
  }

  handleClose(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.inbox.length = 0;
    this.inFlight = null;
    this.onclose?.();
  }

  handleError(error: Error): void {
    this.onerror?.(error);
  }

  protected receive(message: JSONRPCMessage): void {
    if (isRequest(message) && !this.admit(message)) {
      return;
    }

    if (this.isCancellationOfInFlight(message)) {
      // the server drops the response of a cancelled request
      this.onmessage?.(message);
      this.inFlight = null;
      this.pump();
      return;
    }

    this.inbox.push(message);
    this.pump();
  }

  /** Return false to keep a request away from the server. */
  protected admit(_request: JSONRPCRequest): boolean {
    return true;
  }

  protected onResponseSent(_id: RequestId, _isError: boolean): void {}

  // Puts requests ahead of anything already waiting.
  protected prioritize(requests: JSONRPCRequest[]): void {
    this.inbox.unshift(...requests);
    this.pump();
  }

  protected sendRaw(payload: Record<string, unknown>): void {
    if (!this.closed) {
      this.socket.send(JSON.stringify(payload));
    }
  }

  private isCancellationOfInFlight(message: JSONRPCMessage): boolean {
    if (this.inFlight === null || isRequest(message) || !('method' in message)) {
      return false;
    }
    return (
      message.method === 'notifications/cancelled' &&
      message.params?.requestId === this.inFlight
    );
  }

  private pump(): void {
    while (this.started && !this.closed && this.inbox.length > 0) {
      const next = this.inbox[0];
      if (isRequest(next)) {
        if (this.inFlight !== null) {
          return;
        }
        this.inFlight = next.id;
      }
      this.inbox.shift();
      this.onmessage?.(next);
    }
  }
}
