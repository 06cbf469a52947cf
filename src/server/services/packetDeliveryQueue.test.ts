import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { PacketDeliveryQueue, MAX_PACKET_ID, type PacketDeliveryQueueOptions } from './packetDeliveryQueue.js';
import { OperationQueue } from '../transport/operationQueue.js';
import { FakeTransportLink, hang } from '../transport/fakeTransportLink.js';
import { MessageStatus, type DeliveryResult, type OutboundPacket } from '../../types/message.js';
import { logger } from '../../utils/logger.js';

const NODE_A = 0x0a0a0a0a;
const RELAY = 0x0b0b0b0b;

describe('PacketDeliveryQueue', () => {
  let link: FakeTransportLink;
  let operations: OperationQueue;
  let ready: boolean;
  let encoded: OutboundPacket[];
  let statuses: Array<[number, MessageStatus]>;

  function createQueue(overrides: Partial<PacketDeliveryQueueOptions> = {}): PacketDeliveryQueue {
    const queue = new PacketDeliveryQueue(operations, {
      encode: (packet) => {
        encoded.push(packet);
        return Uint8Array.of(packet.id & 0xff);
      },
      isReady: () => ready,
      packetTimeoutMs: 4000,
      messageTimeoutMs: 30000,
      maxMessageRetries: 1,
      maxPayloadBytes: 8,
      initialPacketId: 100,
      ...overrides,
    });
    queue.statusTracker.on('status', (change: { packetId: number; status: MessageStatus }) => {
      statuses.push([change.packetId, change.status]);
    });
    return queue;
  }

  beforeEach(() => {
    logger.setLevel('silent');
    vi.useFakeTimers();
    link = new FakeTransportLink();
    link.connected = true;
    operations = new OperationQueue(link, { timeoutMs: 1000, maxAttempts: 3, reliableWriteBackoffMs: 200 });
    ready = true;
    encoded = [];
    statuses = [];
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('packet ids', () => {
    it('should hand out increasing ids starting at the initial id', async () => {
      const queue = createQueue();

      const results = await Promise.all([
        queue.submit(Uint8Array.of(1), { correlationId: 'a', trackForAck: false }),
        queue.submit(Uint8Array.of(2), { correlationId: 'b', trackForAck: false }),
      ]);

      expect(results.map((result) => result.packetId)).toEqual([100, 101]);
    });

    it('should wrap from the maximum id back to 1', async () => {
      const queue = createQueue({ initialPacketId: MAX_PACKET_ID });

      const results = await Promise.all([
        queue.submit(Uint8Array.of(1), { correlationId: 'a', trackForAck: false }),
        queue.submit(Uint8Array.of(2), { correlationId: 'b', trackForAck: false }),
      ]);

      expect(results.map((result) => result.packetId)).toEqual([MAX_PACKET_ID, 1]);
    });

    it('should reject an initial id outside the id range', () => {
      expect(() => createQueue({ initialPacketId: 0 })).toThrow(RangeError);
    });
  });

  describe('untracked packets', () => {
    it('should resolve Sent once the radio accepts the write', async () => {
      const queue = createQueue();

      const result = await queue.submit(Uint8Array.of(1, 2, 3), { correlationId: 'hello', trackForAck: false });

      expect(result).toEqual({ packetId: 100, correlationId: 'hello', status: MessageStatus.SENT });
      expect(statuses).toEqual([
        [100, MessageStatus.SENDING],
        [100, MessageStatus.SENT],
      ]);
      expect(encoded[0]).toEqual({
        id: 100,
        correlationId: 'hello',
        payload: Uint8Array.of(1, 2, 3),
        destination: 0xffffffff,
        channel: 0,
        portnum: 256,
        wantAck: false,
      });
      expect(queue.pendingCount).toBe(0);
    });

    it('should write untracked packets in submission order', async () => {
      const queue = createQueue();

      const results = await Promise.all(
        ['a', 'b', 'c'].map((correlationId, index) =>
          queue.submit(Uint8Array.of(index), { correlationId, trackForAck: false })
        )
      );

      expect(encoded.map((packet) => packet.correlationId)).toEqual(['a', 'b', 'c']);
      expect(results.map((result) => [result.packetId, result.status])).toEqual([
        [100, MessageStatus.SENT],
        [101, MessageStatus.SENT],
        [102, MessageStatus.SENT],
      ]);
    });

    it('should write one packet at a time', async () => {
      const writes: Array<() => void> = [];
      link.reliableWriteHandler = () => new Promise<void>((resolve) => writes.push(resolve));
      const queue = createQueue();

      const first = queue.submit(Uint8Array.of(1), { correlationId: 'a', trackForAck: false });
      const second = queue.submit(Uint8Array.of(2), { correlationId: 'b', trackForAck: false });
      expect(link.callsMatching('reliableWrite:')).toHaveLength(1);
      expect(queue.queuedCount).toBe(1);

      writes[0]();
      await vi.advanceTimersByTimeAsync(0);
      expect(link.callsMatching('reliableWrite:')).toHaveLength(2);

      writes[1]();
      await expect(first).resolves.toMatchObject({ status: MessageStatus.SENT });
      await expect(second).resolves.toMatchObject({ status: MessageStatus.SENT });
    });

    it('should hold packets until the link is ready', async () => {
      ready = false;
      const queue = createQueue();

      const result = queue.submit(Uint8Array.of(1), { correlationId: 'later', trackForAck: false });
      await vi.advanceTimersByTimeAsync(0);
      expect(link.calls).toEqual([]);
      expect(queue.queuedCount).toBe(1);

      ready = true;
      queue.handleReady();

      await expect(result).resolves.toMatchObject({ packetId: 100, status: MessageStatus.SENT });
    });

    it('should fail when the write is not confirmed in time', async () => {
      link.reliableWriteHandler = () => hang();
      const queue = createQueue({ packetTimeoutMs: 500 });

      const result = queue.submit(Uint8Array.of(1), { correlationId: 'slow', trackForAck: false });
      await vi.advanceTimersByTimeAsync(500);

      await expect(result).resolves.toEqual({
        packetId: 100,
        correlationId: 'slow',
        status: MessageStatus.FAILED,
        error: 'No write confirmation within 500ms',
      });
    });

    it('should fail with the transport error when the write escalates', async () => {
      link.reliableWriteHandler = () => Promise.reject(new Error('gatt busy'));
      const queue = createQueue();

      const result = queue.submit(Uint8Array.of(1), { correlationId: 'busy', trackForAck: false });
      await vi.advanceTimersByTimeAsync(400);

      await expect(result).resolves.toMatchObject({ status: MessageStatus.FAILED, error: 'gatt busy' });
      expect(link.callsMatching('reliableWrite:')).toHaveLength(3);
    });

    it('should fail a tracked packet whose write escalates without waiting for the message timeout', async () => {
      link.reliableWriteHandler = () => Promise.reject(new Error('gatt busy'));
      const queue = createQueue();

      const result = queue.submit(Uint8Array.of(1), { correlationId: 'busy', trackForAck: true, destination: NODE_A });
      await vi.advanceTimersByTimeAsync(400);

      await expect(result).resolves.toEqual({
        packetId: 100,
        correlationId: 'busy',
        status: MessageStatus.FAILED,
        error: 'gatt busy',
      });
      expect(queue.pendingCount).toBe(0);
    });

    it('should fail an escalated tracked write even when the escalation drops the link first', async () => {
      link.reliableWriteHandler = () => Promise.reject(new Error('gatt busy'));
      const queue = createQueue();
      // The lifecycle tears the link down synchronously on escalation
      operations.on('escalation', () => queue.handleLinkLost('reliableWrite escalation'));

      const result = queue.submit(Uint8Array.of(1), { correlationId: 'busy', trackForAck: true, destination: NODE_A });
      await vi.advanceTimersByTimeAsync(400);

      await expect(result).resolves.toEqual({
        packetId: 100,
        correlationId: 'busy',
        status: MessageStatus.FAILED,
        error: 'gatt busy',
      });

      queue.handleReady();
      await vi.advanceTimersByTimeAsync(60000);
      expect(encoded).toHaveLength(1);
      expect(link.callsMatching('reliableWrite:')).toHaveLength(3);
    });

    it('should refuse payloads over the size limit without writing', async () => {
      const queue = createQueue();

      const result = await queue.submit(new Uint8Array(9), { correlationId: 'big', trackForAck: true });

      expect(result).toEqual({
        packetId: 100,
        correlationId: 'big',
        status: MessageStatus.FAILED,
        error: 'Payload of 9 bytes exceeds the 8 byte limit',
      });
      expect(link.calls).toEqual([]);
      expect(statuses).toEqual([
        [100, MessageStatus.SENDING],
        [100, MessageStatus.FAILED],
      ]);
    });
  });

  describe('tracked packets', () => {
    it('should resolve Received when the destination acknowledges', async () => {
      const queue = createQueue();

      const result = queue.submit(Uint8Array.of(1), { correlationId: 'dm', trackForAck: true, destination: NODE_A });
      await vi.advanceTimersByTimeAsync(0);
      expect(queue.statusTracker.get(100)).toBe(MessageStatus.SENT);

      expect(queue.handleRoutingAck(100, 'NONE', NODE_A)).toBe(true);

      await expect(result).resolves.toEqual({ packetId: 100, correlationId: 'dm', status: MessageStatus.RECEIVED });
      expect(statuses.map(([, status]) => status)).toEqual([
        MessageStatus.SENDING,
        MessageStatus.SENT,
        MessageStatus.RECEIVED,
      ]);
    });

    it('should resolve Delivered when another node acknowledges', async () => {
      const queue = createQueue();

      const result = queue.submit(Uint8Array.of(1), { correlationId: 'bc', trackForAck: true });
      await vi.advanceTimersByTimeAsync(0);
      queue.handleRoutingAck(100, 'NONE', RELAY);

      await expect(result).resolves.toMatchObject({ status: MessageStatus.DELIVERED });
    });

    it('should fail on a routing error', async () => {
      const queue = createQueue();

      const result = queue.submit(Uint8Array.of(1), { correlationId: 'dm', trackForAck: true, destination: NODE_A });
      await vi.advanceTimersByTimeAsync(0);
      queue.handleRoutingAck(100, 'NO_ROUTE', RELAY);

      await expect(result).resolves.toEqual({
        packetId: 100,
        correlationId: 'dm',
        status: MessageStatus.FAILED,
        error: 'Routing error: NO_ROUTE',
      });
    });

    it('should step through Sent when the ack beats the write confirmation', async () => {
      link.reliableWriteHandler = () => hang();
      const queue = createQueue();

      const result = queue.submit(Uint8Array.of(1), { correlationId: 'fast', trackForAck: true, destination: NODE_A });
      queue.handleRoutingAck(100, 'NONE', NODE_A);

      await expect(result).resolves.toMatchObject({ status: MessageStatus.RECEIVED });
      expect(statuses.map(([, status]) => status)).toEqual([
        MessageStatus.SENDING,
        MessageStatus.SENT,
        MessageStatus.RECEIVED,
      ]);
    });

    it('should ignore acks for packets it is not waiting on', () => {
      const queue = createQueue();

      expect(queue.handleRoutingAck(4242, 'NONE', NODE_A)).toBe(false);
      expect(statuses).toEqual([]);
    });

    it('should resend with the same id after a message timeout, then fail', async () => {
      const queue = createQueue();

      const result = queue.submit(Uint8Array.of(7), { correlationId: 'retry', trackForAck: true, destination: NODE_A });
      await vi.advanceTimersByTimeAsync(30000);
      expect(encoded.map((packet) => packet.id)).toEqual([100, 100]);

      await vi.advanceTimersByTimeAsync(30000);

      await expect(result).resolves.toEqual({
        packetId: 100,
        correlationId: 'retry',
        status: MessageStatus.FAILED,
        error: 'No acknowledgment after 2 attempt(s)',
      });
      expect(link.callsMatching('reliableWrite:')).toHaveLength(2);
    });

    it('should keep waiting for the ack when the write confirmation is late', async () => {
      link.reliableWriteHandler = () => hang();
      const queue = createQueue({ packetTimeoutMs: 500 });

      const result = queue.submit(Uint8Array.of(1), { correlationId: 'dm', trackForAck: true, destination: NODE_A });
      await vi.advanceTimersByTimeAsync(500);
      expect(queue.hasPending(100)).toBe(true);

      queue.handleRoutingAck(100, 'NONE', NODE_A);
      await expect(result).resolves.toMatchObject({ status: MessageStatus.RECEIVED });
    });
  });

  describe('queue status', () => {
    it('should mark a sent packet Error when the radio rejects it', async () => {
      const queue = createQueue();

      const result = queue.submit(Uint8Array.of(1), { correlationId: 'q', trackForAck: true, destination: NODE_A });
      await vi.advanceTimersByTimeAsync(0);

      expect(queue.handleQueueStatus(100, 0)).toBe(true);
      expect(queue.hasPending(100)).toBe(true);
      expect(queue.handleQueueStatus(100, 3)).toBe(true);

      await expect(result).resolves.toEqual({
        packetId: 100,
        correlationId: 'q',
        status: MessageStatus.ERROR,
        error: 'Radio queue rejected packet (res 3)',
      });
    });

    it('should mark a packet Sent when the radio reports it queued before the write confirms', async () => {
      link.reliableWriteHandler = () => hang();
      const queue = createQueue();

      const result = queue.submit(Uint8Array.of(1), { correlationId: 'q', trackForAck: true, destination: NODE_A });
      expect(queue.handleQueueStatus(100, 0)).toBe(true);
      expect(queue.statusTracker.get(100)).toBe(MessageStatus.SENT);

      queue.handleQueueStatus(100, 3);

      await expect(result).resolves.toMatchObject({ status: MessageStatus.ERROR });
      expect(statuses).toEqual([
        [100, MessageStatus.SENDING],
        [100, MessageStatus.SENT],
        [100, MessageStatus.ERROR],
      ]);
    });

    it('should mark an unsent packet Failed when the radio rejects it', async () => {
      link.reliableWriteHandler = () => hang();
      const queue = createQueue();

      const result = queue.submit(Uint8Array.of(1), { correlationId: 'q', trackForAck: true, destination: NODE_A });
      queue.handleQueueStatus(100, 3);

      await expect(result).resolves.toMatchObject({ status: MessageStatus.FAILED });
    });

    it('should ignore queue status without a known packet id', () => {
      const queue = createQueue();

      expect(queue.handleQueueStatus(0, 3)).toBe(false);
      expect(queue.handleQueueStatus(555, 3)).toBe(false);
    });
  });

  describe('link loss', () => {
    it('should fail untracked packets and replay tracked ones on the next Ready', async () => {
      link.reliableWriteHandler = () => hang();
      const queue = createQueue();

      const tracked = queue.submit(Uint8Array.of(1), { correlationId: 'keep', trackForAck: true, destination: NODE_A });
      const untracked = queue.submit(Uint8Array.of(2), { correlationId: 'drop', trackForAck: false });

      operations.reset('connection lost');
      queue.handleLinkLost('connection lost');

      await expect(untracked).resolves.toEqual({
        packetId: 101,
        correlationId: 'drop',
        status: MessageStatus.FAILED,
        error: 'Link reset: connection lost',
      });
      expect(queue.pendingCount).toBe(1);

      link.reliableWriteHandler = async () => undefined;
      queue.handleReady();
      await vi.advanceTimersByTimeAsync(0);

      expect(encoded.map((packet) => packet.id)).toEqual([100, 100]);
      expect(queue.statusTracker.get(100)).toBe(MessageStatus.SENT);

      queue.handleRoutingAck(100, 'NONE', NODE_A);
      await expect(tracked).resolves.toEqual({ packetId: 100, correlationId: 'keep', status: MessageStatus.RECEIVED });
    });

    it('should replay every in-flight tracked packet exactly once with its original id', async () => {
      const queue = createQueue();

      const first = queue.submit(Uint8Array.of(1), { correlationId: 'one', trackForAck: true, destination: NODE_A });
      const second = queue.submit(Uint8Array.of(2), { correlationId: 'two', trackForAck: true, destination: NODE_A });
      await vi.advanceTimersByTimeAsync(0);
      expect(encoded.map((packet) => packet.id)).toEqual([100, 101]);

      ready = false;
      queue.handleLinkLost('connection lost');
      ready = true;
      queue.handleReady();
      await vi.advanceTimersByTimeAsync(0);
      queue.handleReady();
      await vi.advanceTimersByTimeAsync(0);

      expect(encoded.map((packet) => packet.id)).toEqual([100, 101, 100, 101]);
      expect(encoded[2].payload).toEqual(Uint8Array.of(1));

      queue.handleRoutingAck(100, 'NONE', NODE_A);
      queue.handleRoutingAck(101, 'NONE', RELAY);
      await expect(first).resolves.toMatchObject({ packetId: 100, status: MessageStatus.RECEIVED });
      await expect(second).resolves.toMatchObject({ packetId: 101, status: MessageStatus.DELIVERED });
    });

    it('should hold a tracked packet whose write was cut off by a link reset', async () => {
      link.reliableWriteHandler = () => hang();
      const queue = createQueue();

      const result = queue.submit(Uint8Array.of(1), { correlationId: 'keep', trackForAck: true, destination: NODE_A });
      operations.reset('session superseded');
      await vi.advanceTimersByTimeAsync(0);

      expect(queue.hasPending(100)).toBe(true);
      expect(queue.queuedCount).toBe(0);

      link.reliableWriteHandler = async () => undefined;
      queue.handleReady();
      await vi.advanceTimersByTimeAsync(0);
      queue.handleRoutingAck(100, 'NONE', NODE_A);

      await expect(result).resolves.toMatchObject({ packetId: 100, status: MessageStatus.RECEIVED });
    });

    it('should not time out held packets while the link is down', async () => {
      const queue = createQueue();

      const result = queue.submit(Uint8Array.of(1), { correlationId: 'keep', trackForAck: true, destination: NODE_A });
      await vi.advanceTimersByTimeAsync(0);
      ready = false;
      queue.handleLinkLost('connection lost');

      await vi.advanceTimersByTimeAsync(120000);
      expect(queue.hasPending(100)).toBe(true);

      ready = true;
      queue.handleReady();
      await vi.advanceTimersByTimeAsync(0);
      queue.handleRoutingAck(100, 'NONE', RELAY);

      await expect(result).resolves.toMatchObject({ status: MessageStatus.DELIVERED });
    });
  });

  describe('flush', () => {
    it('should fail everything pending and report the count', async () => {
      ready = false;
      const queue = createQueue();
      const results: DeliveryResult[] = [];
      queue.on('result', (result: DeliveryResult) => results.push(result));

      const first = queue.submit(Uint8Array.of(1), { correlationId: 'a', trackForAck: true });
      const second = queue.submit(Uint8Array.of(2), { correlationId: 'b', trackForAck: false });

      expect(queue.flush('user disconnect')).toBe(2);

      await expect(first).resolves.toMatchObject({ status: MessageStatus.FAILED, error: 'Flushed: user disconnect' });
      await expect(second).resolves.toMatchObject({ status: MessageStatus.FAILED, error: 'Flushed: user disconnect' });
      expect(results.map((result) => result.packetId)).toEqual([100, 101]);
      expect(queue.pendingCount).toBe(0);
      expect(queue.queuedCount).toBe(0);
    });
  });
});
