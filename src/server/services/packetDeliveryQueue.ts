import { EventEmitter } from 'events';
import { logger } from '../../utils/logger.js';
import { getEnvironmentConfig } from '../config/environment.js';
import {
  BROADCAST_NODE_NUM,
  MessageStatus,
  TERMINAL_MESSAGE_STATUSES,
  type DeliveryResult,
  type OutboundPacket,
  type PacketOptions,
} from '../../types/message.js';
import type { OperationQueue } from '../transport/operationQueue.js';
import { MeshLinkError, linkResetError, toMeshLinkError } from '../transport/errors.js';
import { MessageStatusTracker } from './messageStatusTracker.js';

export const MAX_PACKET_ID = 0xffffffff;
const DEFAULT_PORTNUM = 256; // PRIVATE_APP

export interface PacketDeliveryQueueOptions {
  /** Frames a packet for the toRadio characteristic */
  encode: (packet: OutboundPacket) => Uint8Array;
  /** Writes only start while this returns true */
  isReady: () => boolean;
  statusTracker?: MessageStatusTracker;
  packetTimeoutMs?: number;
  messageTimeoutMs?: number;
  maxMessageRetries?: number;
  maxPayloadBytes?: number;
  /** First id handed out; random when omitted */
  initialPacketId?: number;
}

interface PendingPacket {
  packet: OutboundPacket;
  createdAt: number;
  retryCount: number;
  trackedForAck: boolean;
  messageTimer: NodeJS.Timeout | null;
  awaitingReplay: boolean;
  resolve: (result: DeliveryResult) => void;
}

/**
 * Packet Delivery Queue
 *
 * Numbers outbound packets, writes them one at a time through the
 * OperationQueue and follows each to a final status:
 * - untracked packets resolve Sent once the radio took the write
 * - tracked packets wait for a routing ack, retrying on message timeout
 *
 * Writes belong to a generation. Link loss and flush start a new one, and
 * completions from an older generation are ignored.
 *
 * Emits:
 * - 'result' (DeliveryResult) when a packet resolves
 */
export class PacketDeliveryQueue extends EventEmitter {
  readonly statusTracker: MessageStatusTracker;

  private readonly operations: OperationQueue;
  private readonly encode: (packet: OutboundPacket) => Uint8Array;
  private readonly isReady: () => boolean;
  private readonly packetTimeoutMs: number;
  private readonly messageTimeoutMs: number;
  private readonly maxMessageRetries: number;
  private readonly maxPayloadBytes: number;

  private readonly pending = new Map<number, PendingPacket>();
  private sendQueue: number[] = [];
  private sending = false;
  private generation = 0;
  private lastId: number;

  constructor(operations: OperationQueue, options: PacketDeliveryQueueOptions) {
    super();
    const env = getEnvironmentConfig();
    this.operations = operations;
    this.encode = options.encode;
    this.isReady = options.isReady;
    this.statusTracker = options.statusTracker ?? new MessageStatusTracker();
    this.packetTimeoutMs = options.packetTimeoutMs ?? env.packetTimeoutMs;
    this.messageTimeoutMs = options.messageTimeoutMs ?? env.messageTimeoutMs;
    this.maxMessageRetries = options.maxMessageRetries ?? env.maxMessageRetries;
    this.maxPayloadBytes = options.maxPayloadBytes ?? env.maxPayloadBytes;

    const first = options.initialPacketId ?? 1 + Math.floor(Math.random() * 0x7fffffff);
    if (!Number.isInteger(first) || first < 1 || first > MAX_PACKET_ID) {
      throw new RangeError(`initialPacketId must be an integer in 1..${MAX_PACKET_ID}, got ${first}`);
    }
    this.lastId = first - 1;
  }

  /**
   * Queue a packet. Never blocks; the promise resolves with the final
   * status (it does not reject).
   */
  submit(payload: Uint8Array, options: PacketOptions): Promise<DeliveryResult> {
    const id = this.nextPacketId();
    const packet: OutboundPacket = {
      id,
      correlationId: options.correlationId,
      payload,
      destination: options.destination ?? BROADCAST_NODE_NUM,
      channel: options.channel ?? 0,
      portnum: options.portnum ?? DEFAULT_PORTNUM,
      wantAck: options.trackForAck,
    };

    this.statusTracker.begin(id, packet.correlationId);

    if (payload.length > this.maxPayloadBytes) {
      const error = new MeshLinkError(
        `Payload of ${payload.length} bytes exceeds the ${this.maxPayloadBytes} byte limit`,
        'PAYLOAD_TOO_LARGE'
      );
      logger.warn(`⚠️  Packet ${id} (${packet.correlationId}) rejected: ${error.message}`);
      this.statusTracker.update(id, MessageStatus.FAILED);
      const result: DeliveryResult = { packetId: id, correlationId: packet.correlationId, status: MessageStatus.FAILED, error: error.message };
      this.emit('result', result);
      return Promise.resolve(result);
    }

    return new Promise<DeliveryResult>((resolve) => {
      this.pending.set(id, {
        packet,
        createdAt: Date.now(),
        retryCount: 0,
        trackedForAck: options.trackForAck,
        messageTimer: null,
        awaitingReplay: false,
        resolve,
      });
      this.sendQueue.push(id);
      logger.debug(`📤 Queued packet ${id} (${packet.correlationId}, ${payload.length} bytes, ack=${options.trackForAck})`);
      this.pump();
    });
  }

  /**
   * Routing ack/nak for a packet we sent (request id = our packet id)
   */
  handleRoutingAck(requestId: number, errorReason: string, from: number): boolean {
    const entry = this.pending.get(requestId);
    const acked = errorReason === 'NONE';

    if (!entry) {
      // Lets the tracker log late acks against its history
      this.statusTracker.update(requestId, acked ? MessageStatus.DELIVERED : MessageStatus.FAILED);
      return false;
    }

    if (acked) {
      const status = from === entry.packet.destination ? MessageStatus.RECEIVED : MessageStatus.DELIVERED;
      logger.info(`✅ Packet ${requestId} acknowledged by ${nodeId(from)} (${status})`);
      this.finish(entry, status);
    } else {
      logger.warn(`📮 Routing error from ${nodeId(from)} for packet ${requestId}: ${errorReason}`);
      this.finish(entry, MessageStatus.FAILED, `Routing error: ${errorReason}`);
    }
    return true;
  }

  /**
   * QueueStatus frame. Zero means the radio queued the packet (Sent);
   * anything else means it refused it. Id 0 carries no packet to match.
   */
  handleQueueStatus(meshPacketId: number, res: number): boolean {
    if (meshPacketId === 0) {
      return false;
    }
    const entry = this.pending.get(meshPacketId);
    if (!entry) {
      logger.debug(`Queue status for unknown packet ${meshPacketId} (res ${res})`);
      return false;
    }
    if (res === 0) {
      logger.debug(`Radio queued packet ${meshPacketId}`);
      if (this.statusTracker.get(meshPacketId) === MessageStatus.SENDING) {
        this.statusTracker.update(meshPacketId, MessageStatus.SENT);
      }
      return true;
    }

    const status = this.statusTracker.get(meshPacketId) === MessageStatus.SENT ? MessageStatus.ERROR : MessageStatus.FAILED;
    logger.warn(`⚠️  Radio rejected packet ${meshPacketId} (res ${res})`);
    this.finish(entry, status, `Radio queue rejected packet (res ${res})`);
    return true;
  }

  /**
   * The link went away. Untracked packets fail; tracked ones wait for
   * replay on the next Ready.
   */
  handleLinkLost(reason: string): void {
    this.generation++;
    this.sending = false;
    this.sendQueue = [];

    const message = linkResetError(reason).message;
    let parked = 0;
    for (const entry of [...this.pending.values()]) {
      this.clearMessageTimer(entry);
      if (entry.trackedForAck) {
        entry.awaitingReplay = true;
        parked++;
      } else {
        this.finish(entry, MessageStatus.FAILED, message);
      }
    }
    if (parked > 0) {
      logger.info(`⏸️  ${parked} tracked packet(s) held for replay after link loss`);
    }
  }

  /**
   * Link is Ready: replay held packets (same id and payload) and resume
   */
  handleReady(): void {
    const replay = [...this.pending.values()].filter((entry) => entry.awaitingReplay);
    for (const entry of replay) {
      entry.awaitingReplay = false;
      this.sendQueue.push(entry.packet.id);
    }
    if (replay.length > 0) {
      logger.info(`🔁 Replaying ${replay.length} tracked packet(s): ${replay.map((entry) => entry.packet.id).join(', ')}`);
    }
    this.pump();
  }

  /**
   * Resolve every pending packet as Failed and cancel all timers.
   * Returns how many packets were flushed.
   */
  flush(reason: string): number {
    this.generation++;
    this.sending = false;
    this.sendQueue = [];

    const entries = [...this.pending.values()];
    for (const entry of entries) {
      this.finish(entry, MessageStatus.FAILED, `Flushed: ${reason}`);
    }
    if (entries.length > 0) {
      logger.info(`🧹 Flushed ${entries.length} pending packet(s): ${reason}`);
    }
    return entries.length;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  get queuedCount(): number {
    return this.sendQueue.length;
  }

  hasPending(packetId: number): boolean {
    return this.pending.has(packetId);
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private nextPacketId(): number {
    do {
      this.lastId = this.lastId >= MAX_PACKET_ID ? 1 : this.lastId + 1;
    } while (this.pending.has(this.lastId));
    return this.lastId;
  }

  private pump(): void {
    while (!this.sending && this.isReady()) {
      const id = this.sendQueue.shift();
      if (id === undefined) {
        return;
      }
      const entry = this.pending.get(id);
      if (!entry) {
        continue;
      }
      this.transmit(entry);
    }
  }

  private transmit(entry: PendingPacket): void {
    const { packet } = entry;
    const generation = this.generation;

    let frame: Uint8Array;
    try {
      frame = this.encode(packet);
    } catch (error) {
      logger.error(`❌ Failed to encode packet ${packet.id}:`, error);
      this.finish(entry, MessageStatus.FAILED, `Encode failed: ${toMeshLinkError(error).message}`);
      return;
    }

    this.sending = true;
    if (entry.trackedForAck) {
      this.armMessageTimer(entry);
    }

    let released = false;
    const release = () => {
      if (released) return;
      released = true;
      clearTimeout(packetTimer);
      if (generation === this.generation) {
        this.sending = false;
        this.pump();
      }
    };

    const packetTimer = setTimeout(() => {
      if (generation === this.generation) {
        this.handlePacketTimeout(entry);
      }
      release();
    }, this.packetTimeoutMs);

    logger.debug(`✍️  Writing packet ${packet.id} (attempt ${entry.retryCount + 1})`);
    this.operations.reliableWrite('toRadio', frame).then(
      () => {
        if (generation === this.generation) {
          this.handleWriteSuccess(entry);
        }
        release();
      },
      (error: unknown) => {
        const failure = toMeshLinkError(error);
        if (generation === this.generation) {
          this.handleWriteFailure(entry, failure);
        } else if (failure.code !== 'LINK_RESET' && entry.awaitingReplay) {
          // The write failed for good and its escalation tore the link down
          // before this callback ran: fail it rather than replay it
          this.handleWriteFailure(entry, failure);
        }
        release();
      }
    );
  }

  private handleWriteSuccess(entry: PendingPacket): void {
    const { id } = entry.packet;
    if (this.pending.get(id) !== entry) {
      return;
    }
    if (this.statusTracker.get(id) === MessageStatus.SENDING) {
      this.statusTracker.update(id, MessageStatus.SENT);
    }
    if (!entry.trackedForAck) {
      this.finish(entry, MessageStatus.SENT);
    }
  }

  private handleWriteFailure(entry: PendingPacket, error: MeshLinkError): void {
    const { id } = entry.packet;
    if (this.pending.get(id) !== entry) {
      return;
    }
    if (error.code === 'LINK_RESET' && entry.trackedForAck) {
      this.clearMessageTimer(entry);
      entry.awaitingReplay = true;
      logger.info(`⏸️  Packet ${id} held for replay: ${error.message}`);
      return;
    }
    logger.warn(`⚠️  Write of packet ${id} failed: ${error.message}`);
    this.finish(entry, MessageStatus.FAILED, error.message);
  }

  private handlePacketTimeout(entry: PendingPacket): void {
    const { id } = entry.packet;
    if (this.pending.get(id) !== entry) {
      return;
    }
    if (entry.trackedForAck) {
      logger.warn(`⚠️  No write confirmation for packet ${id} within ${this.packetTimeoutMs}ms, waiting on ack`);
      return;
    }
    this.finish(entry, MessageStatus.FAILED, `No write confirmation within ${this.packetTimeoutMs}ms`);
  }

  private armMessageTimer(entry: PendingPacket): void {
    this.clearMessageTimer(entry);
    entry.messageTimer = setTimeout(() => {
      entry.messageTimer = null;
      this.handleMessageTimeout(entry);
    }, this.messageTimeoutMs);
  }

  private clearMessageTimer(entry: PendingPacket): void {
    if (entry.messageTimer) {
      clearTimeout(entry.messageTimer);
      entry.messageTimer = null;
    }
  }

  private handleMessageTimeout(entry: PendingPacket): void {
    const { id } = entry.packet;
    if (this.pending.get(id) !== entry) {
      return;
    }
    if (entry.retryCount < this.maxMessageRetries) {
      entry.retryCount++;
      logger.warn(`🔁 No ack for packet ${id}, resending (retry ${entry.retryCount}/${this.maxMessageRetries})`);
      this.sendQueue.push(id);
      this.pump();
      return;
    }
    logger.warn(`❌ No ack for packet ${id} after ${entry.retryCount + 1} attempt(s)`);
    this.finish(entry, MessageStatus.FAILED, `No acknowledgment after ${entry.retryCount + 1} attempt(s)`);
  }

  /**
   * Drive the tracker to `status` and resolve the caller exactly once
   */
  private finish(entry: PendingPacket, status: MessageStatus, error?: string): void {
    const { id, correlationId } = entry.packet;
    if (this.pending.get(id) !== entry) {
      return;
    }
    this.pending.delete(id);
    this.clearMessageTimer(entry);
    this.sendQueue = this.sendQueue.filter((queued) => queued !== id);

    const current = this.statusTracker.get(id);
    if (current !== status) {
      if (current === MessageStatus.SENDING && (status === MessageStatus.DELIVERED || status === MessageStatus.RECEIVED)) {
        // Ack overtook the write confirmation
        this.statusTracker.update(id, MessageStatus.SENT);
      }
      this.statusTracker.update(id, status);
    }
    if (!TERMINAL_MESSAGE_STATUSES.has(status)) {
      this.statusTracker.release(id);
    }

    const result: DeliveryResult = error === undefined
      ? { packetId: id, correlationId, status }
      : { packetId: id, correlationId, status, error };
    logger.debug(`📬 Packet ${id} resolved ${status} after ${Date.now() - entry.createdAt}ms`);
    entry.resolve(result);
    this.emit('result', result);
  }
}

function nodeId(num: number): string {
  return `!${num.toString(16).padStart(8, '0')}`;
}
