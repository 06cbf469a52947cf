import { describe, it, expect, beforeAll } from 'vitest';
import { fileURLToPath } from 'url';
import type protobuf from 'protobufjs';
import { MeshProtobufService, DEFAULT_HOP_LIMIT } from './meshProtobufService.js';
import { getProtobufRoot } from './protobufLoader.js';
import { logger } from '../utils/logger.js';

const PROTO_DIR = fileURLToPath(new URL('../../protobufs', import.meta.url));

describe('MeshProtobufService', () => {
  const service = MeshProtobufService.getInstance();

  beforeAll(async () => {
    logger.setLevel('silent');
    await service.initialize(PROTO_DIR);
  });

  function requireRoot(): protobuf.Root {
    const root = getProtobufRoot();
    if (!root) {
      throw new Error('protobuf root not loaded');
    }
    return root;
  }

  function encode(typeName: string, value: Record<string, unknown>): Uint8Array {
    const type = requireRoot().lookupType(typeName);
    return type.encode(type.fromObject(value)).finish();
  }

  function decodeToRadio(bytes: Uint8Array): Record<string, unknown> {
    const ToRadio = requireRoot().lookupType('meshtastic.ToRadio');
    return ToRadio.toObject(ToRadio.decode(bytes), { defaults: false });
  }

  it('should report ready once definitions are loaded', () => {
    expect(service.ready).toBe(true);
  });

  describe('outbound frames', () => {
    it('should encode a want_config request carrying the nonce', () => {
      expect(decodeToRadio(service.createWantConfigRequest(42))).toEqual({ wantConfigId: 42 });
    });

    it('should wrap the payload in a MeshPacket', () => {
      const bytes = service.encodePacket({
        id: 100,
        correlationId: 'msg-1',
        payload: Uint8Array.of(1, 2, 3),
        destination: 0x1234abcd,
        channel: 2,
        portnum: 256,
        wantAck: true,
      });

      expect(decodeToRadio(bytes).packet).toMatchObject({
        to: 0x1234abcd,
        channel: 2,
        id: 100,
        wantAck: true,
        hopLimit: DEFAULT_HOP_LIMIT,
        decoded: { portnum: 256 },
      });
    });

    it('should carry the payload bytes unchanged', () => {
      const ToRadio = requireRoot().lookupType('meshtastic.ToRadio');
      const bytes = service.encodePacket({
        id: 7,
        correlationId: 'raw',
        payload: Uint8Array.of(0, 255, 16),
        destination: 0xffffffff,
        channel: 0,
        portnum: 1,
        wantAck: false,
      });

      const message: Record<string, unknown> = ToRadio.toObject(ToRadio.decode(bytes), { bytes: Array });
      expect(message).toMatchObject({ packet: { to: 0xffffffff, decoded: { payload: [0, 255, 16] } } });
    });
  });

  describe('decodeFromRadio', () => {
    it('should decode config complete', () => {
      const frame = encode('meshtastic.FromRadio', { id: 1, configCompleteId: 42 });

      expect(service.decodeFromRadio(frame)).toEqual({ type: 'configComplete', id: 42 });
    });

    it('should decode queue status with zero fields defaulted', () => {
      const frame = encode('meshtastic.FromRadio', {
        queueStatus: { res: 0, free: 15, maxlen: 16, meshPacketId: 100 },
      });

      expect(service.decodeFromRadio(frame)).toEqual({
        type: 'queueStatus',
        status: { res: 0, free: 15, maxlen: 16, meshPacketId: 100 },
      });
    });

    it('should decode a mesh packet with its port name', () => {
      const frame = encode('meshtastic.FromRadio', {
        packet: {
          from: 0x0a0a0a0a,
          to: 0xffffffff,
          channel: 1,
          id: 777,
          decoded: { portnum: 1, payload: Uint8Array.of(104, 105) },
        },
      });

      const result = service.decodeFromRadio(frame);
      if (result?.type !== 'meshPacket') {
        throw new Error(`expected a mesh packet, got ${result?.type}`);
      }
      expect(result.packet).toMatchObject({
        id: 777,
        from: 0x0a0a0a0a,
        to: 0xffffffff,
        channel: 1,
        portnum: 1,
        portName: 'TEXT_MESSAGE_APP',
        requestId: 0,
        wantAck: false,
        encrypted: false,
      });
      expect(Array.from(result.packet.payload)).toEqual([104, 105]);
    });

    it('should carry the request id of a routing reply', () => {
      const frame = encode('meshtastic.FromRadio', {
        packet: { from: 5, to: 6, id: 9, decoded: { portnum: 5, requestId: 100 } },
      });

      const result = service.decodeFromRadio(frame);
      expect(result).toMatchObject({ type: 'meshPacket', packet: { portName: 'ROUTING_APP', requestId: 100 } });
    });

    it('should flag packets that are still encrypted', () => {
      const frame = encode('meshtastic.FromRadio', {
        packet: { from: 5, to: 6, id: 10, encrypted: Uint8Array.of(9, 9, 9) },
      });

      const result = service.decodeFromRadio(frame);
      expect(result).toMatchObject({ type: 'meshPacket', packet: { encrypted: true, portnum: 0, portName: 'UNKNOWN_APP' } });
    });

    it('should decode a reboot notice', () => {
      const frame = encode('meshtastic.FromRadio', { rebooted: true });

      expect(service.decodeFromRadio(frame)).toEqual({ type: 'rebooted' });
    });

    it('should report frames with no handled variant as other', () => {
      const frame = encode('meshtastic.FromRadio', { id: 3 });

      expect(service.decodeFromRadio(frame)).toEqual({ type: 'other', id: 3 });
    });

    it('should return null for empty or malformed frames', () => {
      expect(service.decodeFromRadio(new Uint8Array(0))).toBeNull();
      expect(service.decodeFromRadio(Uint8Array.of(0x12, 0x05, 0x01))).toBeNull();
    });
  });

  describe('decodeRoutingError', () => {
    it('should name the error reason', () => {
      expect(service.decodeRoutingError(encode('meshtastic.Routing', { errorReason: 1 }))).toBe('NO_ROUTE');
      expect(service.decodeRoutingError(encode('meshtastic.Routing', { errorReason: 'MAX_RETRANSMIT' }))).toBe('MAX_RETRANSMIT');
    });

    it('should treat a routing message without an error as success', () => {
      expect(service.decodeRoutingError(new Uint8Array(0))).toBe('NONE');
      expect(service.decodeRoutingError(encode('meshtastic.Routing', { routeReply: { route: [1, 2] } }))).toBe('NONE');
    });

    it('should report undecodable payloads', () => {
      expect(service.decodeRoutingError(Uint8Array.of(0x0a, 0x05))).toBe('UNDECODABLE');
    });
  });

  describe('port numbers', () => {
    it('should normalize names and numbers', () => {
      expect(service.normalizePortNum(70)).toBe(70);
      expect(service.normalizePortNum('POSITION_APP')).toBe(3);
      expect(service.normalizePortNum('NOT_A_PORT')).toBeUndefined();
      expect(service.normalizePortNum(undefined)).toBeUndefined();
      expect(service.normalizePortNum(null)).toBeUndefined();
    });

    it('should name known ports and flag unknown ones', () => {
      expect(service.getPortNumName(67)).toBe('TELEMETRY_APP');
      expect(service.getPortNumName(256)).toBe('PRIVATE_APP');
      expect(service.getPortNumName(999)).toBe('UNKNOWN_999');
      expect(service.getPortNumName('NOT_A_PORT')).toBe('UNKNOWN_NOT_A_PORT');
    });
  });
});
