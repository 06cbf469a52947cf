import { EventEmitter } from 'events';
import { logger } from '../../utils/logger.js';
import { MessageStatus, TERMINAL_MESSAGE_STATUSES, type MessageStatusChange } from '../../types/message.js';

const ALLOWED_TRANSITIONS: Readonly<Record<MessageStatus, ReadonlySet<MessageStatus>>> = {
  [MessageStatus.SENDING]: new Set([MessageStatus.SENT, MessageStatus.FAILED]),
  [MessageStatus.SENT]: new Set([
    MessageStatus.DELIVERED,
    MessageStatus.RECEIVED,
    MessageStatus.FAILED,
    MessageStatus.ERROR,
  ]),
  [MessageStatus.DELIVERED]: new Set(),
  [MessageStatus.RECEIVED]: new Set(),
  [MessageStatus.FAILED]: new Set(),
  [MessageStatus.ERROR]: new Set(),
};

export const DEFAULT_STATUS_HISTORY_SIZE = 256;

export function isAllowedTransition(from: MessageStatus, to: MessageStatus): boolean {
  return ALLOWED_TRANSITIONS[from].has(to);
}

interface TrackedStatus {
  correlationId: string;
  status: MessageStatus;
}

/**
 * Message status bookkeeping per packet id.
 *
 * Updates that do not follow the transition table are rejected and
 * logged. Ids that reached a terminal status are remembered in a bounded
 * history so a late ack for an already-resolved packet is still rejected.
 *
 * Emits 'status' (MessageStatusChange) for every applied update.
 */
export class MessageStatusTracker extends EventEmitter {
  private readonly active = new Map<number, TrackedStatus>();
  private readonly history = new Map<number, TrackedStatus>();
  private readonly historySize: number;

  constructor(historySize: number = DEFAULT_STATUS_HISTORY_SIZE) {
    super();
    this.historySize = historySize;
  }

  /**
   * Start tracking a packet in Sending
   */
  begin(packetId: number, correlationId: string): void {
    // An id can be reused after wraparound; the old record no longer applies
    this.history.delete(packetId);
    this.active.set(packetId, { correlationId, status: MessageStatus.SENDING });
    this.publish(packetId, correlationId, null, MessageStatus.SENDING);
  }

  get(packetId: number): MessageStatus | undefined {
    return this.active.get(packetId)?.status ?? this.history.get(packetId)?.status;
  }

  /**
   * Apply an update. Returns false (and changes nothing) when the
   * transition is not allowed or the id is unknown.
   */
  update(packetId: number, next: MessageStatus): boolean {
    const current = this.active.get(packetId);
    if (!current) {
      const resolved = this.history.get(packetId);
      if (resolved) {
        logger.debug(`Ignoring ${next} for packet ${packetId}: already ${resolved.status}`);
      } else {
        logger.debug(`Ignoring ${next} for unknown packet ${packetId}`);
      }
      return false;
    }

    if (!isAllowedTransition(current.status, next)) {
      logger.warn(`⚠️  Rejected status change ${current.status} -> ${next} for packet ${packetId}`);
      return false;
    }

    const previous = current.status;
    if (TERMINAL_MESSAGE_STATUSES.has(next)) {
      this.active.delete(packetId);
      this.remember(packetId, { correlationId: current.correlationId, status: next });
    } else {
      current.status = next;
    }

    this.publish(packetId, current.correlationId, previous, next);
    return true;
  }

  /**
   * Stop tracking a packet that will see no further updates (an
   * untracked packet once Sent). Its last status goes to history.
   */
  release(packetId: number): void {
    const current = this.active.get(packetId);
    if (!current) return;
    this.active.delete(packetId);
    this.remember(packetId, current);
  }

  get activeCount(): number {
    return this.active.size;
  }

  clear(): void {
    this.active.clear();
    this.history.clear();
  }

  private remember(packetId: number, entry: TrackedStatus): void {
    this.history.set(packetId, entry);
    while (this.history.size > this.historySize) {
      const oldest = this.history.keys().next();
      if (oldest.done) break;
      this.history.delete(oldest.value);
    }
  }

  private publish(packetId: number, correlationId: string, previous: MessageStatus | null, status: MessageStatus): void {
    const change: MessageStatusChange = { packetId, correlationId, previous, status, at: Date.now() };
    logger.debug(`📨 Packet ${packetId} (${correlationId}): ${previous ?? 'new'} -> ${status}`);
    this.emit('status', change);
  }
}
