import type { JSONRPCRequest, RequestId } from '@modelcontextprotocol/sdk/types.js';
import { SerialRpcTransport } from '../rpc/transport';
import { RpcSocket } from '../rpc/socket';
import { QueueFullError, RpcErrorCodes } from '../types';
import { SERVER_NAME } from '../version';
import { PendingRequestQueue, PendingRequestQueueOptions } from './pendingQueue';

export const QUEUED_MESSAGE = 'Request queued, will process automatically';

export interface ReverseSessionTransportOptions {
  queue?: PendingRequestQueueOptions;
  onReady?: () => void;
}

/**
 * Session over the outbound socket. Tool calls that arrive before the peer's
 * `initialize` has been answered wait in a bounded queue and are replayed, oldest
 * first, ahead of anything received after the handshake.
 */
export class ReverseSessionTransport extends SerialRpcTransport {
  private readonly pending: PendingRequestQueue<JSONRPCRequest>;
  private initializeId: RequestId | null = null;
  private ready = false;

  constructor(
    socket: RpcSocket,
    private readonly options: ReverseSessionTransportOptions = {}
  ) {
    super(socket);
    this.pending = new PendingRequestQueue(options.queue);
  }

  get isReady(): boolean {
    return this.ready;
  }

  get queuedCount(): number {
    return this.pending.size;
  }

  override handleClose(): void {
    this.pending.clear();
    super.handleClose();
  }

  protected override admit(request: JSONRPCRequest): boolean {
    if (request.method === 'initialize') {
      this.initializeId = request.id;
      return true;
    }
    if (this.ready || request.method !== 'tools/call') {
      return true;
    }

    if (this.pending.offer(request.id, request.method, request) === 'full') {
      const error = new QueueFullError(this.pending.capacity);
      this.sendRaw({
        jsonrpc: '2.0',
        id: request.id,
        error: { code: RpcErrorCodes.QUEUE_FULL, message: error.message },
      });
      return false;
    }

    this.sendRaw({
      jsonrpc: '2.0',
      method: 'notifications/message',
      params: {
        level: 'info',
        logger: SERVER_NAME,
        data: { requestId: request.id, code: RpcErrorCodes.QUEUED, message: QUEUED_MESSAGE },
      },
    });
    return false;
  }

  protected override onResponseSent(id: RequestId, isError: boolean): void {
    if (this.ready || isError || id !== this.initializeId) {
      return;
    }

    this.ready = true;
    const drained = this.pending.drain().map(entry => entry.payload);
    if (drained.length > 0) {
      console.error(`[reverse] replaying ${drained.length} queued request(s)`);
    }
    this.options.onReady?.();
    this.prioritize(drained);
  }
}
