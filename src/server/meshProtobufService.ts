/**
 * Mesh Protobuf Service
 *
 * Encodes and decodes the radio's control frames (ToRadio / FromRadio)
 * using the protobuf definitions loaded at run time by protobufjs.
 * Application payload bytes are carried opaquely in Data.payload.
 */
import type protobuf from 'protobufjs';
import { loadProtobufDefinitions, getProtobufRoot } from './protobufLoader.js';
import { logger } from '../utils/logger.js';
import type { OutboundPacket } from '../types/message.js';

export const DEFAULT_HOP_LIMIT = 3;

export interface DecodedMeshPacket {
  id: number;
  from: number;
  to: number;
  channel: number;
  portnum: number;
  portName: string;
  payload: Uint8Array;
  requestId: number;
  wantAck: boolean;
  /** Payload was still encrypted; nothing here can be routed by port */
  encrypted: boolean;
}

export interface QueueStatusFrame {
  res: number;
  free: number;
  maxlen: number;
  meshPacketId: number;
}

export type FromRadioFrame =
  | { type: 'configComplete'; id: number }
  | { type: 'queueStatus'; status: QueueStatusFrame }
  | { type: 'meshPacket'; packet: DecodedMeshPacket }
  | { type: 'rebooted' }
  | { type: 'other'; id: number };

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !(value instanceof Uint8Array) && !Array.isArray(value);
}

function numberField(source: PlainObject, key: string, fallback = 0): number {
  const value = source[key];
  return typeof value === 'number' ? value : fallback;
}

function bytesField(source: PlainObject, key: string): Uint8Array {
  const value = source[key];
  return value instanceof Uint8Array ? value : new Uint8Array(0);
}

export class MeshProtobufService {
  private static instance: MeshProtobufService;
  private isInitialized = false;

  private constructor() {}

  static getInstance(): MeshProtobufService {
    if (!MeshProtobufService.instance) {
      MeshProtobufService.instance = new MeshProtobufService();
    }
    return MeshProtobufService.instance;
  }

  async initialize(protoDir?: string): Promise<void> {
    if (this.isInitialized) return;

    try {
      logger.debug('🔧 Initializing Mesh Protobuf Service...');
      await loadProtobufDefinitions(protoDir);
      this.isInitialized = true;
      logger.debug('✅ Mesh Protobuf Service initialized');
    } catch (error) {
      logger.error('❌ Failed to initialize protobuf service:', error);
      throw error;
    }
  }

  get ready(): boolean {
    return this.isInitialized && getProtobufRoot() !== null;
  }

  private requireRoot(): protobuf.Root {
    const root = getProtobufRoot();
    if (!root) {
      throw new Error('Protobuf definitions not loaded; call initialize() first');
    }
    return root;
  }

  /**
   * ToRadio{want_config_id}: asks the radio to stream its state, ending
   * with a config_complete_id equal to the nonce
   */
  createWantConfigRequest(nonce: number): Uint8Array {
    const ToRadio = this.requireRoot().lookupType('meshtastic.ToRadio');
    return ToRadio.encode(ToRadio.create({ wantConfigId: nonce })).finish();
  }

  /**
   * ToRadio{packet} carrying the application payload opaquely
   */
  encodePacket(packet: OutboundPacket, hopLimit: number = DEFAULT_HOP_LIMIT): Uint8Array {
    const root = this.requireRoot();
    const Data = root.lookupType('meshtastic.Data');
    const MeshPacket = root.lookupType('meshtastic.MeshPacket');
    const ToRadio = root.lookupType('meshtastic.ToRadio');

    const data = Data.create({
      portnum: packet.portnum,
      payload: packet.payload,
    });

    const meshPacket = MeshPacket.create({
      to: packet.destination,
      channel: packet.channel,
      id: packet.id,
      decoded: data,
      wantAck: packet.wantAck,
      hopLimit,
    });

    return ToRadio.encode(ToRadio.create({ packet: meshPacket })).finish();
  }

  /**
   * Decode one FromRadio frame read from the fromRadio characteristic.
   * Returns null for bytes that are not a FromRadio message.
   */
  decodeFromRadio(data: Uint8Array): FromRadioFrame | null {
    if (data.length === 0) return null;

    const root = this.requireRoot();
    const FromRadio = root.lookupType('meshtastic.FromRadio');

    let fromRadio: PlainObject;
    try {
      fromRadio = FromRadio.toObject(FromRadio.decode(data), { defaults: false });
    } catch (error) {
      logger.warn('⚠️  Failed to decode FromRadio frame:', error instanceof Error ? error.message : error);
      return null;
    }

    if (typeof fromRadio.configCompleteId === 'number') {
      return { type: 'configComplete', id: fromRadio.configCompleteId };
    }

    if (fromRadio.rebooted === true) {
      return { type: 'rebooted' };
    }

    const queueStatus = fromRadio.queueStatus;
    if (isPlainObject(queueStatus)) {
      return {
        type: 'queueStatus',
        status: {
          res: numberField(queueStatus, 'res'),
          free: numberField(queueStatus, 'free'),
          maxlen: numberField(queueStatus, 'maxlen'),
          meshPacketId: numberField(queueStatus, 'meshPacketId'),
        },
      };
    }

    const packet = fromRadio.packet;
    if (isPlainObject(packet)) {
      return { type: 'meshPacket', packet: this.toDecodedPacket(packet) };
    }

    logger.debug('📦 FromRadio frame with no variant handled here, id', numberField(fromRadio, 'id'));
    return { type: 'other', id: numberField(fromRadio, 'id') };
  }

  private toDecodedPacket(packet: PlainObject): DecodedMeshPacket {
    const decoded = isPlainObject(packet.decoded) ? packet.decoded : null;
    const portnum = decoded ? numberField(decoded, 'portnum') : 0;
    const payload = decoded ? bytesField(decoded, 'payload') : new Uint8Array(0);

    return {
      id: numberField(packet, 'id'),
      from: numberField(packet, 'from'),
      to: numberField(packet, 'to'),
      channel: numberField(packet, 'channel'),
      portnum,
      portName: this.getPortNumName(portnum),
      payload,
      requestId: decoded ? numberField(decoded, 'requestId') : 0,
      wantAck: packet.wantAck === true,
      encrypted: decoded === null,
    };
  }

  /**
   * Routing.error_reason as its enum name. A Routing message with no
   * variant set is an implicit success (NONE).
   */
  decodeRoutingError(payload: Uint8Array): string {
    const root = this.requireRoot();
    const Routing = root.lookupType('meshtastic.Routing');
    const errors = root.lookupEnum('meshtastic.Routing.Error');
    try {
      const routing: PlainObject = Routing.toObject(Routing.decode(payload), { defaults: false });
      const reason = numberField(routing, 'errorReason', 0);
      return errors.valuesById[reason] ?? `UNKNOWN_ERROR_${reason}`;
    } catch (error) {
      logger.warn('⚠️  Failed to decode Routing payload:', error instanceof Error ? error.message : error);
      return 'UNDECODABLE';
    }
  }

  /**
   * Normalize portnum to a number. Accepts the numeric value or the
   * PortNum enum name.
   */
  normalizePortNum(portnum: number | string | undefined | null): number | undefined {
    if (portnum === undefined || portnum === null) {
      return undefined;
    }

    if (typeof portnum === 'number') {
      return portnum;
    }

    const root = getProtobufRoot();
    if (!root) {
      return undefined;
    }
    const value = root.lookupEnum('meshtastic.PortNum').values[portnum];
    return typeof value === 'number' ? value : undefined;
  }

  /**
   * PortNum enum name, or UNKNOWN_<n> for values the schema does not name
   */
  getPortNumName(portnum: number | string | undefined): string {
    const normalized = this.normalizePortNum(portnum);
    if (normalized === undefined) {
      return `UNKNOWN_${portnum}`;
    }
    const root = getProtobufRoot();
    const name = root?.lookupEnum('meshtastic.PortNum').valuesById[normalized];
    return name ?? `UNKNOWN_${normalized}`;
  }
}

// Export singleton instance
export default MeshProtobufService.getInstance();
