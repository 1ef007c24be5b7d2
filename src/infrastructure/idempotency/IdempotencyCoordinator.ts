import { ConflictError } from '../../application/errors/AppError.js';

export interface StoredResponse {
  status: number;
  body: string;
  contentType?: string;
}

export interface IdempotencyOutcome {
  response: StoredResponse;
  /** True when the response came from the cache rather than this caller's handler. */
  replayed: boolean;
}

export interface IdempotencyCoordinatorOptions {
  /** Completed records older than this are forgotten. Unset keeps them for the process lifetime. */
  ttlMs?: number;
  /** Upper bound on waiting for another caller's in-flight execution. Unset waits indefinitely. */
  waitTimeoutMs?: number;
  clock?: () => number;
}

type IdempotencyRecord =
  | { state: 'in-flight'; released: Promise<void> }
  | { state: 'completed'; response: StoredResponse; completedAt: number };

export const isSuccessStatus = (status: number): boolean => status >= 200 && status < 300;

/**
 * Deduplicates executions that share a client-supplied key.
 *
 * A key is vacant, in-flight or completed. Exactly one caller claims a vacant
 * key and runs its handler; concurrent callers await the claim's release
 * together. Only 2xx outcomes are kept: anything else vacates the key so the
 * next caller, waiting or new, runs its own handler.
 */
export class IdempotencyCoordinator {
  private readonly records = new Map<string, IdempotencyRecord>();
  private readonly ttlMs?: number;
  private readonly waitTimeoutMs?: number;
  private readonly clock: () => number;

  constructor(options: IdempotencyCoordinatorOptions = {}) {
    this.ttlMs = options.ttlMs;
    this.waitTimeoutMs = options.waitTimeoutMs;
    this.clock = options.clock ?? Date.now;
  }

  async execute(key: string, handler: () => Promise<StoredResponse>): Promise<IdempotencyOutcome> {
    for (;;) {
      const record = this.lookup(key);

      if (!record) {
        return { response: await this.runClaimed(key, handler), replayed: false };
      }

      if (record.state === 'completed') {
        return { response: record.response, replayed: true };
      }

      await this.waitFor(record.released);
    }
  }

  /** Number of keys currently held, in-flight or completed. */
  get size(): number {
    return this.records.size;
  }

  /** Drops expired completed records. Returns how many were removed. */
  purgeExpired(): number {
    let removed = 0;

    for (const [key, record] of this.records) {
      if (this.isExpired(record)) {
        this.records.delete(key);
        removed++;
      }
    }

    return removed;
  }

  clear(): void {
    this.records.clear();
  }

  private lookup(key: string): IdempotencyRecord | undefined {
    const record = this.records.get(key);

    if (record && this.isExpired(record)) {
      this.records.delete(key);
      return undefined;
    }

    return record;
  }

  private isExpired(record: IdempotencyRecord): boolean {
    return (
      record.state === 'completed' && this.ttlMs !== undefined && this.clock() - record.completedAt >= this.ttlMs
    );
  }

  private async runClaimed(key: string, handler: () => Promise<StoredResponse>): Promise<StoredResponse> {
    let release: () => void = () => undefined;
    const released = new Promise<void>((resolve) => {
      release = resolve;
    });

    this.records.set(key, { state: 'in-flight', released });

    try {
      const response = await handler();

      if (isSuccessStatus(response.status)) {
        this.records.set(key, { state: 'completed', response, completedAt: this.clock() });
      } else {
        this.records.delete(key);
      }

      return response;
    } catch (error) {
      this.records.delete(key);
      throw error;
    } finally {
      release();
    }
  }

  private async waitFor(released: Promise<void>): Promise<void> {
    if (this.waitTimeoutMs === undefined) {
      return released;
    }

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () =>
          reject(
            new ConflictError(
              'IDEMPOTENCY_KEY_IN_PROGRESS',
              'A request with this Idempotency-Key is still being processed',
            ),
          ),
        this.waitTimeoutMs,
      );
    });

    try {
      await Promise.race([released, timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }
}
