export const PENDING_QUEUE_CAPACITY = 10;
export const PENDING_REQUEST_TTL_MS = 30000;

export interface PendingRequest<T> {
  id: string | number;
  method: string;
  payload: T;
  enqueuedAt: number;
}

export interface PendingRequestQueueOptions {
  capacity?: number;
  ttlMs?: number;
  now?: () => number;
}

/**
 * Bounded FIFO of requests received before the session is ready. Entries older than
 * the TTL are purged whenever the queue is touched.
 */
export class PendingRequestQueue<T> {
  readonly capacity: number;
  readonly ttlMs: number;
  private readonly now: () => number;
  private entries: PendingRequest<T>[] = [];

  constructor(options: PendingRequestQueueOptions = {}) {
    this.capacity = options.capacity ?? PENDING_QUEUE_CAPACITY;
    this.ttlMs = options.ttlMs ?? PENDING_REQUEST_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    this.purge();
    return this.entries.length;
  }

  offer(id: string | number, method: string, payload: T): 'queued' | 'full' {
    this.purge();
    if (this.entries.length >= this.capacity) {
      return 'full';
    }
    this.entries.push({ id, method, payload, enqueuedAt: this.now() });
    return 'queued';
  }

  // Removes and returns every live entry in arrival order.
  drain(): PendingRequest<T>[] {
    this.purge();
    const drained = this.entries;
    this.entries = [];
    return drained;
  }

  clear(): void {
    this.entries = [];
  }

  private purge(): void {
    const cutoff = this.now() - this.ttlMs;
    this.entries = this.entries.filter(entry => entry.enqueuedAt > cutoff);
  }
}
