import WebSocket from 'ws';

/** What a JSON-RPC session needs from its socket. */
export interface RpcSocket {
  send(text: string): void;
  close(code?: number, reason?: string): void;
  // Drops the connection without a closing handshake.
  terminate(): void;
  ping(): void;
  readonly isOpen: boolean;
}

export interface RpcSocketHandlers {
  onOpen?(): void;
  onMessage(text: string): void;
  onPong?(): void;
  onClose(code: number, reason: string): void;
  onError?(error: Error): void;
}

export function wrapWebSocket(ws: WebSocket): RpcSocket {
  return {
    send: text => ws.send(text),
    close: (code, reason) => ws.close(code, reason),
    terminate: () => ws.terminate(),
    ping: () => ws.ping(),
    get isOpen() {
      return ws.readyState === WebSocket.OPEN;
    },
  };
}

export function attachWebSocket(ws: WebSocket, handlers: RpcSocketHandlers): void {
  ws.on('open', () => handlers.onOpen?.());
  ws.on('message', (data: WebSocket.RawData) => {
    handlers.onMessage(rawDataToString(data));
  });
  ws.on('pong', () => handlers.onPong?.());
  ws.on('close', (code: number, reason: Buffer) => handlers.onClose(code, reason.toString()));
  ws.on('error', (error: Error) => handlers.onError?.(error));
}

export function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return data.toString('utf8');
}
