import type { JSONRPCMessage } from '@modelcontextprotocol/sdk/types.js';
import { RpcSocket } from '../../src/rpc/socket';
import { isRequest } from '../../src/rpc/transport';

export class FakeSocket implements RpcSocket {
  sent: string[] = [];
  closes: Array<{ code?: number; reason?: string }> = [];
  pings = 0;
  terminated = false;
  isOpen = true;

  send(text: string): void {
    this.sent.push(text);
  }

  close(code?: number, reason?: string): void {
    this.isOpen = false;
    this.closes.push({ code, reason });
  }

  terminate(): void {
    this.isOpen = false;
    this.terminated = true;
  }

  ping(): void {
    this.pings += 1;
  }

  messages(): unknown[] {
    return this.sent.map(text => JSON.parse(text));
  }
}

// Resolves once every pending promise job has run.
export function flush(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

export async function waitUntil(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error('Condition not met in time');
    }
    await new Promise(resolve => setTimeout(resolve, 5));
  }
}

export function request(id: number, method: string, params: Record<string, unknown> = {}): string {
  return JSON.stringify({ jsonrpc: '2.0', id, method, params });
}

// 'method#id' for requests, the method for notifications.
export function label(message: JSONRPCMessage): string {
  if (isRequest(message)) {
    return `${message.method}#${message.id}`;
  }
  return 'method' in message ? message.method : 'response';
}
