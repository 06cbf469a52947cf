import { EventEmitter } from 'events';
import { logger } from '../../utils/logger.js';
import { getEnvironmentConfig } from '../config/environment.js';
import type { CharacteristicId } from '../../types/device.js';
import type { TransportLink } from './transportLink.js';
import { MeshLinkError, linkResetError, toMeshLinkError } from './errors.js';

export type Operation =
  | { kind: 'write'; target: CharacteristicId; payload: Uint8Array }
  | { kind: 'read'; target: CharacteristicId }
  | { kind: 'setNotify'; target: CharacteristicId; enable: boolean }
  | { kind: 'reliableWrite'; target: CharacteristicId; payload: Uint8Array };

export type OperationKind = Operation['kind'];

export interface OperationQueueOptions {
  timeoutMs?: number;
  maxAttempts?: number;
  reliableWriteBackoffMs?: number;
}

export interface EscalationEvent {
  kind: OperationKind;
  target: CharacteristicId;
  attempts: number;
  error: MeshLinkError;
}

export interface OperationQueueStats {
  completed: number;
  failed: number;
  retried: number;
  timedOut: number;
  escalations: number;
}

interface QueuedOperation {
  token: number;
  op: Operation;
  attempt: number;
  resolve: (value: Uint8Array | null) => void;
  reject: (error: MeshLinkError) => void;
}

interface InFlightOperation {
  entry: QueuedOperation;
  timer: NodeJS.Timeout;
}

type Outcome =
  | { ok: true; value: Uint8Array | null }
  | { ok: false; error: MeshLinkError };

const RETRYABLE_KINDS: ReadonlySet<OperationKind> = new Set<OperationKind>(['read', 'reliableWrite']);

/**
 * Operation Queue
 *
 * Serializes transport primitives so exactly one is outstanding on the
 * link. Each attempt gets its own token: a completion or timeout carrying
 * a token that is no longer in flight is dropped, so a late callback can
 * never settle a different operation.
 *
 * Emits:
 * - 'escalation' (EscalationEvent) when an operation fails for good
 */
export class OperationQueue extends EventEmitter {
  private readonly link: TransportLink;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly reliableWriteBackoffMs: number;

  private queue: QueuedOperation[] = [];
  private inFlight: InFlightOperation | null = null;
  private backoffTimers: Map<NodeJS.Timeout, QueuedOperation> = new Map();
  private nextToken = 1;
  private stats: OperationQueueStats = { completed: 0, failed: 0, retried: 0, timedOut: 0, escalations: 0 };

  constructor(link: TransportLink, options: OperationQueueOptions = {}) {
    super();
    const env = getEnvironmentConfig();
    this.link = link;
    this.timeoutMs = options.timeoutMs ?? env.operationTimeoutMs;
    this.maxAttempts = options.maxAttempts ?? env.maxOperationAttempts;
    this.reliableWriteBackoffMs = options.reliableWriteBackoffMs ?? env.reliableWriteBackoffMs;
  }

  /**
   * Append an operation and start processing if idle.
   * Resolves with the bytes read (reads) or null (everything else).
   */
  enqueue(op: Operation): Promise<Uint8Array | null> {
    return new Promise<Uint8Array | null>((resolve, reject) => {
      this.queue.push({ token: this.nextToken++, op, attempt: 1, resolve, reject });
      this.processNext();
    });
  }

  async write(target: CharacteristicId, payload: Uint8Array): Promise<void> {
    await this.enqueue({ kind: 'write', target, payload });
  }

  read(target: CharacteristicId): Promise<Uint8Array | null> {
    return this.enqueue({ kind: 'read', target });
  }

  async setNotify(target: CharacteristicId, enable: boolean): Promise<void> {
    await this.enqueue({ kind: 'setNotify', target, enable });
  }

  async reliableWrite(target: CharacteristicId, payload: Uint8Array): Promise<void> {
    await this.enqueue({ kind: 'reliableWrite', target, payload });
  }

  /**
   * Fail everything queued, waiting on backoff, or in flight with a
   * LINK_RESET error. Returns how many operations were failed.
   */
  reset(reason: string): number {
    const failed: QueuedOperation[] = [];

    if (this.inFlight) {
      clearTimeout(this.inFlight.timer);
      failed.push(this.inFlight.entry);
    }
    // Cleared unconditionally: nothing that was in flight may hold the slot
    this.inFlight = null;

    for (const [timer, entry] of this.backoffTimers) {
      clearTimeout(timer);
      failed.push(entry);
    }
    this.backoffTimers.clear();

    failed.push(...this.queue);
    this.queue = [];

    const error = linkResetError(reason);
    for (const entry of failed) {
      entry.reject(error);
    }

    if (failed.length > 0) {
      logger.info(`🔄 Operation queue reset (${reason}): failed ${failed.length} pending operation(s)`);
    }
    return failed.length;
  }

  get size(): number {
    return this.queue.length + this.backoffTimers.size + (this.inFlight ? 1 : 0);
  }

  get isBusy(): boolean {
    return this.inFlight !== null;
  }

  getStats(): OperationQueueStats {
    return { ...this.stats };
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private processNext(): void {
    while (!this.inFlight) {
      const entry = this.queue.shift();
      if (!entry) {
        return;
      }

      const { target } = entry.op;
      if (!this.link.isConnected() || !this.link.hasCharacteristic(target)) {
        // No retry consumed: there is nothing to retry against
        this.stats.failed++;
        logger.warn(`⚠️  ${entry.op.kind} on ${target} skipped: link or characteristic unavailable`);
        entry.reject(new MeshLinkError(`Characteristic ${target} unavailable`, 'TRANSPORT_UNAVAILABLE'));
        continue;
      }

      this.start(entry);
    }
  }

  private start(entry: QueuedOperation): void {
    const { token } = entry;
    const timer = setTimeout(() => {
      this.settle(token, {
        ok: false,
        error: new MeshLinkError(
          `${entry.op.kind} on ${entry.op.target} timed out after ${this.timeoutMs}ms`,
          'OPERATION_TIMEOUT'
        ),
      });
    }, this.timeoutMs);
    this.inFlight = { entry, timer };

    logger.debug(`▶️  ${entry.op.kind} on ${entry.op.target} (attempt ${entry.attempt}/${this.maxAttempts})`);

    this.execute(entry.op).then(
      (value) => this.settle(token, { ok: true, value }),
      (error: unknown) => this.settle(token, { ok: false, error: toMeshLinkError(error) })
    );
  }

  private async execute(op: Operation): Promise<Uint8Array | null> {
    switch (op.kind) {
      case 'write':
        await this.link.performWrite(op.target, op.payload);
        return null;
      case 'read':
        return this.link.performRead(op.target);
      case 'setNotify':
        await this.link.setNotify(op.target, op.enable);
        return null;
      case 'reliableWrite':
        await this.link.performReliableWrite(op.target, op.payload);
        return null;
    }
  }

  private settle(token: number, outcome: Outcome): void {
    const current = this.inFlight;
    if (!current || current.entry.token !== token) {
      logger.debug(`Ignoring stale completion for operation token ${token}`);
      return;
    }

    clearTimeout(current.timer);
    this.inFlight = null;

    if (outcome.ok) {
      this.stats.completed++;
      current.entry.resolve(outcome.value);
    } else {
      this.handleFailure(current.entry, outcome.error);
    }

    this.processNext();
  }

  private handleFailure(entry: QueuedOperation, error: MeshLinkError): void {
    const { op } = entry;
    if (error.code === 'OPERATION_TIMEOUT') {
      this.stats.timedOut++;
    }

    if (RETRYABLE_KINDS.has(op.kind) && error.isRetryable && entry.attempt < this.maxAttempts) {
      this.stats.retried++;
      const retry: QueuedOperation = { ...entry, token: this.nextToken++, attempt: entry.attempt + 1 };
      logger.warn(`🔁 ${op.kind} on ${op.target} failed (${error.message}), retrying (attempt ${retry.attempt}/${this.maxAttempts})`);

      if (op.kind === 'reliableWrite' && this.reliableWriteBackoffMs > 0) {
        const timer = setTimeout(() => {
          this.backoffTimers.delete(timer);
          this.queue.push(retry);
          this.processNext();
        }, this.reliableWriteBackoffMs);
        this.backoffTimers.set(timer, retry);
      } else {
        this.queue.push(retry);
      }
      return;
    }

    this.stats.failed++;
    entry.reject(error);

    if (error.code === 'TRANSPORT_UNAVAILABLE' || error.code === 'LINK_RESET') {
      return;
    }

    this.stats.escalations++;
    logger.error(`❌ ${op.kind} on ${op.target} failed after ${entry.attempt} attempt(s): ${error.message}`);
    const event: EscalationEvent = { kind: op.kind, target: op.target, attempts: entry.attempt, error };
    this.emit('escalation', event);
  }
}
