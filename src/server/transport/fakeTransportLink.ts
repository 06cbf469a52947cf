/**
 * In-process TransportLink for tests. Every primitive is a replaceable
 * handler; defaults succeed immediately. Calls are recorded in `calls`.
 */
import type { CharacteristicId, EndpointRef, LinkTarget } from '../../types/device.js';
import type {
  AuthorizationListener,
  DisconnectListener,
  LinkEvent,
  NotificationListener,
  TransportLink,
} from './transportLink.js';

export interface FakeTransportLinkOptions {
  endpoint?: EndpointRef;
  characteristics?: CharacteristicId[];
  withCacheInvalidation?: boolean;
  withAdapterRestart?: boolean;
  authorizationRequired?: boolean;
}

export interface WrittenFrame {
  kind: 'write' | 'reliableWrite';
  target: CharacteristicId;
  bytes: Uint8Array;
}

/** A promise that never settles */
export function hang<T>(): Promise<T> {
  return new Promise<T>(() => undefined);
}

export class FakeTransportLink implements TransportLink {
  readonly calls: string[] = [];
  readonly written: WrittenFrame[] = [];
  /** Frames returned by successive fromRadio reads; empty means null */
  readonly readQueue: Uint8Array[] = [];

  endpoint: EndpointRef;
  characteristics: CharacteristicId[];
  authorizationRequired: boolean;
  connected = false;

  invalidateCache?: () => Promise<void>;
  restartAdapter?: () => Promise<void>;

  connectHandler: (target: LinkTarget) => Promise<LinkEvent>;
  mtuHandler: (mtu: number) => Promise<number> = async (mtu) => mtu;
  discoverHandler: () => Promise<readonly CharacteristicId[]>;
  readHandler: (target: CharacteristicId) => Promise<Uint8Array | null>;
  writeHandler: (target: CharacteristicId, bytes: Uint8Array) => Promise<void> = async () => undefined;
  reliableWriteHandler: (target: CharacteristicId, bytes: Uint8Array) => Promise<void> = async () => undefined;
  setNotifyHandler: (target: CharacteristicId, enabled: boolean) => Promise<void> = async () => undefined;
  /** Runs after the link is marked disconnected */
  disconnectHandler: () => Promise<void> = async () => undefined;

  private readonly disconnectListeners = new Set<DisconnectListener>();
  private readonly notificationListeners = new Set<NotificationListener>();
  private readonly authorizationListeners = new Set<AuthorizationListener>();

  constructor(options: FakeTransportLinkOptions = {}) {
    this.endpoint = options.endpoint ?? { address: 'AA:BB:CC:DD:EE:01', name: 'Test Radio' };
    this.characteristics = options.characteristics ?? ['toRadio', 'fromRadio', 'fromNum'];
    this.authorizationRequired = options.authorizationRequired ?? false;

    this.connectHandler = async () => {
      this.connected = true;
      return { type: 'linkUp', endpoint: this.endpoint };
    };
    this.discoverHandler = async () => this.characteristics;
    this.readHandler = async () => this.readQueue.shift() ?? null;

    if (options.withCacheInvalidation) {
      this.invalidateCache = async () => {
        this.calls.push('invalidateCache');
      };
    }
    if (options.withAdapterRestart) {
      this.restartAdapter = async () => {
        this.calls.push('restartAdapter');
      };
    }
  }

  connect(target: LinkTarget): Promise<LinkEvent> {
    this.calls.push(`connect:${target.address}`);
    return this.connectHandler(target);
  }

  disconnect(): Promise<void> {
    this.calls.push('disconnect');
    this.connected = false;
    return this.disconnectHandler();
  }

  isConnected(): boolean {
    return this.connected;
  }

  discoverServices(): Promise<readonly CharacteristicId[]> {
    this.calls.push('discoverServices');
    return this.discoverHandler();
  }

  hasCharacteristic(id: CharacteristicId): boolean {
    return this.characteristics.includes(id);
  }

  requestMtu(mtu: number): Promise<number> {
    this.calls.push(`requestMtu:${mtu}`);
    return this.mtuHandler(mtu);
  }

  requiresAuthorization(): boolean {
    return this.authorizationRequired;
  }

  requestAuthorization(target: LinkTarget): void {
    this.calls.push(`requestAuthorization:${target.address}`);
  }

  performWrite(dest: CharacteristicId, bytes: Uint8Array): Promise<void> {
    this.calls.push(`write:${dest}`);
    this.written.push({ kind: 'write', target: dest, bytes });
    return this.writeHandler(dest, bytes);
  }

  performRead(dest: CharacteristicId): Promise<Uint8Array | null> {
    this.calls.push(`read:${dest}`);
    return this.readHandler(dest);
  }

  setNotify(dest: CharacteristicId, enabled: boolean): Promise<void> {
    this.calls.push(`setNotify:${dest}:${enabled}`);
    return this.setNotifyHandler(dest, enabled);
  }

  performReliableWrite(dest: CharacteristicId, bytes: Uint8Array): Promise<void> {
    this.calls.push(`reliableWrite:${dest}`);
    this.written.push({ kind: 'reliableWrite', target: dest, bytes });
    return this.reliableWriteHandler(dest, bytes);
  }

  onDisconnect(listener: DisconnectListener): () => void {
    this.disconnectListeners.add(listener);
    return () => this.disconnectListeners.delete(listener);
  }

  onNotification(listener: NotificationListener): () => void {
    this.notificationListeners.add(listener);
    return () => this.notificationListeners.delete(listener);
  }

  onAuthorization(listener: AuthorizationListener): () => void {
    this.authorizationListeners.add(listener);
    return () => this.authorizationListeners.delete(listener);
  }

  // ─── Test controls ─────────────────────────────────────────────────

  /** Peer or stack dropped the link */
  emitDisconnect(reasonCode: number): void {
    this.connected = false;
    for (const listener of [...this.disconnectListeners]) {
      listener(reasonCode);
    }
  }

  emitNotification(source: CharacteristicId, data: Uint8Array): void {
    for (const listener of [...this.notificationListeners]) {
      listener(source, data);
    }
  }

  emitAuthorization(address: string, granted: boolean): void {
    for (const listener of [...this.authorizationListeners]) {
      listener(address, granted);
    }
  }

  callsMatching(prefix: string): string[] {
    return this.calls.filter((call) => call.startsWith(prefix));
  }
}
