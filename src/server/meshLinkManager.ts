import { EventEmitter } from 'events';
import { logger } from '../utils/logger.js';
import meshProtobufService, { type MeshProtobufService, type DecodedMeshPacket } from './meshProtobufService.js';
import { OperationQueue, type OperationQueueOptions } from './transport/operationQueue.js';
import { ConnectionLifecycle, type ConnectionLifecycleOptions } from './transport/connectionLifecycle.js';
import type { TransportLink } from './transport/transportLink.js';
import { PacketDeliveryQueue, type PacketDeliveryQueueOptions } from './services/packetDeliveryQueue.js';
import {
  NotificationDispatcher,
  type NotificationHandler,
} from './services/notificationDispatcher.js';
import { MeshLinkError } from './transport/errors.js';
import { MessageStatus, type DeliveryResult, type MessageStatusChange, type PacketOptions } from '../types/message.js';
import type { ConnectionState, RecoveryEvent } from '../types/connection.js';
import type { CharacteristicId, EndpointRef, LinkTarget } from '../types/device.js';

/** Topics the manager handles itself */
export const RESERVED_TOPICS: ReadonlySet<string> = new Set(['fromNum', 'ROUTING_APP']);

export interface MeshLinkManagerOptions {
  link: TransportLink;
  protobufService?: MeshProtobufService;
  protoDir?: string;
  operations?: OperationQueueOptions;
  lifecycle?: Omit<ConnectionLifecycleOptions, 'createWantConfig' | 'onFrame'>;
  delivery?: Omit<PacketDeliveryQueueOptions, 'encode' | 'isReady'>;
}

export type ConnectionStateListener = (state: ConnectionState) => void;

/**
 * Mesh Link Manager
 *
 * Entry point for applications: owns one link's OperationQueue,
 * ConnectionLifecycle, PacketDeliveryQueue and NotificationDispatcher,
 * and routes decoded radio frames between them.
 *
 * Emits:
 * - 'connectionState' (ConnectionState)
 * - 'messageStatus' (MessageStatusChange)
 * - 'recovery' (RecoveryEvent)
 * - 'ready' (EndpointRef)
 */
export class MeshLinkManager extends EventEmitter {
  readonly operations: OperationQueue;
  readonly lifecycle: ConnectionLifecycle;
  readonly delivery: PacketDeliveryQueue;
  readonly dispatcher: NotificationDispatcher;

  private readonly link: TransportLink;
  private readonly protobuf: MeshProtobufService;
  private readonly protoDir?: string;
  private readonly detachLink: () => void;
  private disposed = false;

  constructor(options: MeshLinkManagerOptions) {
    super();
    this.link = options.link;
    this.protobuf = options.protobufService ?? meshProtobufService;
    this.protoDir = options.protoDir;

    this.operations = new OperationQueue(this.link, options.operations);
    this.lifecycle = new ConnectionLifecycle(this.link, this.operations, {
      ...options.lifecycle,
      createWantConfig: (nonce) => this.protobuf.createWantConfigRequest(nonce),
      onFrame: (frame) => this.handleFrame(frame),
    });
    this.delivery = new PacketDeliveryQueue(this.operations, {
      ...options.delivery,
      encode: (packet) => this.protobuf.encodePacket(packet),
      isReady: () => this.lifecycle.isReady(),
    });
    this.dispatcher = new NotificationDispatcher();

    this.dispatcher.register('fromNum', () => this.lifecycle.requestDrain());
    this.dispatcher.register('ROUTING_APP', (data, meta) => {
      this.delivery.handleRoutingAck(meta.requestId, this.protobuf.decodeRoutingError(data), meta.from);
    });

    this.lifecycle.on('ready', (endpoint: EndpointRef) => {
      this.delivery.handleReady();
      this.emit('ready', endpoint);
    });
    this.lifecycle.on('linkLost', (reason: string) => this.delivery.handleLinkLost(reason));
    this.lifecycle.on('failed', (reason: string) => this.delivery.flush(reason));
    this.lifecycle.on('state', (state: ConnectionState) => this.emit('connectionState', state));
    this.lifecycle.on('recovery', (event: RecoveryEvent) => this.emit('recovery', event));
    this.delivery.statusTracker.on('status', (change: MessageStatusChange) => this.emit('messageStatus', change));

    this.detachLink = this.link.onNotification((source, data) => this.handleLinkNotification(source, data));
  }

  /**
   * Load the control-frame schema
   */
  async initialize(): Promise<void> {
    await this.protobuf.initialize(this.protoDir);
  }

  async connect(target: LinkTarget): Promise<void> {
    this.assertNotDisposed();
    await this.initialize();
    await this.lifecycle.connect(target);
  }

  async disconnect(): Promise<void> {
    this.delivery.flush('user disconnect');
    await this.lifecycle.disconnect();
  }

  async forceReconnect(): Promise<void> {
    this.assertNotDisposed();
    await this.lifecycle.forceReconnect();
  }

  /**
   * Queue application bytes for the radio. Resolves with the final
   * status; packets submitted while the link is down wait for Ready.
   */
  submitPacket(payload: Uint8Array, options: PacketOptions): Promise<DeliveryResult> {
    if (this.disposed) {
      return Promise.resolve({
        packetId: 0,
        correlationId: options.correlationId,
        status: MessageStatus.FAILED,
        error: 'Link manager disposed',
      });
    }
    return this.delivery.submit(payload, options);
  }

  /**
   * Register the handler for a topic (a PortNum name such as
   * TEXT_MESSAGE_APP). Returns a function that unregisters it.
   */
  onNotification(topic: string, handler: NotificationHandler): () => void {
    if (RESERVED_TOPICS.has(topic)) {
      throw new RangeError(`Topic ${topic} is reserved`);
    }
    this.dispatcher.register(topic, handler);
    return () => {
      this.dispatcher.unregister(topic);
    };
  }

  getConnectionState(): ConnectionState {
    return this.lifecycle.getState();
  }

  /**
   * Calls the listener with the current state, then on every change
   */
  observeConnectionState(listener: ConnectionStateListener): () => void {
    listener(this.lifecycle.getState());
    this.on('connectionState', listener);
    return () => {
      this.off('connectionState', listener);
    };
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    this.detachLink();
    this.delivery.flush('disposed');
    await this.lifecycle.dispose();
    this.dispatcher.clear();
    this.removeAllListeners();
  }

  // ─── Inbound routing ───────────────────────────────────────────────

  private handleLinkNotification(source: CharacteristicId, data: Uint8Array): void {
    switch (source) {
      case 'fromNum':
        this.dispatcher.dispatch('fromNum', data);
        break;
      case 'fromRadio':
        // Some transports push frames instead of waiting for a read
        this.handleFrame(data);
        break;
      default:
        logger.debug(`Ignoring notification from ${source}`);
    }
  }

  private handleFrame(frame: Uint8Array): void {
    const decoded = this.protobuf.decodeFromRadio(frame);
    if (!decoded) {
      return;
    }

    switch (decoded.type) {
      case 'configComplete':
        this.lifecycle.handleConfigComplete(decoded.id);
        break;
      case 'rebooted':
        this.lifecycle.handleRadioRebooted();
        break;
      case 'queueStatus':
        this.delivery.handleQueueStatus(decoded.status.meshPacketId, decoded.status.res);
        break;
      case 'meshPacket':
        this.dispatchPacket(decoded.packet);
        break;
      case 'other':
        break;
    }
  }

  private dispatchPacket(packet: DecodedMeshPacket): void {
    if (packet.encrypted) {
      logger.debug(`🔒 Dropping encrypted packet ${packet.id} from !${packet.from.toString(16).padStart(8, '0')}`);
      return;
    }
    this.dispatcher.dispatch(packet.portName, packet.payload, {
      from: packet.from,
      to: packet.to,
      packetId: packet.id,
      requestId: packet.requestId,
      channel: packet.channel,
      receivedAt: Date.now(),
    });
  }

  private assertNotDisposed(): void {
    if (this.disposed) {
      throw new MeshLinkError('Link manager disposed', 'TRANSPORT_UNAVAILABLE');
    }
  }
}
