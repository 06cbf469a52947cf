/**
 * TransportLink: the radio driver this package sits on.
 *
 * Implementations wrap a platform BLE stack (noble, Web Bluetooth bridge,
 * a serial shim, ...). Every primitive completes exactly once through the
 * returned promise; the OperationQueue guarantees only one is outstanding.
 * Listener registration returns an unsubscribe function.
 */
import type { CharacteristicId, EndpointRef, LinkTarget } from '../../types/device.js';

export type LinkEvent =
  | { type: 'linkUp'; endpoint: EndpointRef }
  | { type: 'linkDown'; reasonCode: number };

export type DisconnectListener = (reasonCode: number) => void;
export type NotificationListener = (source: CharacteristicId, data: Uint8Array) => void;
export type AuthorizationListener = (address: string, granted: boolean) => void;

export interface TransportLink {
  // ─── Link management (ConnectionLifecycle only) ───────────────────

  connect(target: LinkTarget): Promise<LinkEvent>;
  disconnect(): Promise<void>;
  isConnected(): boolean;

  /** Resolves with the characteristics the peer exposes */
  discoverServices(): Promise<readonly CharacteristicId[]>;
  hasCharacteristic(id: CharacteristicId): boolean;

  /** Resolves with the MTU the peer granted */
  requestMtu(mtu: number): Promise<number>;

  /** Pairing: true when the peer must be bonded before connecting */
  requiresAuthorization(target: LinkTarget): boolean;
  /** Starts pairing; the result arrives through onAuthorization */
  requestAuthorization(target: LinkTarget): void;

  /** Optional: drop the platform's cached service table */
  invalidateCache?(): Promise<void>;
  /** Optional: power-cycle the local adapter/stack */
  restartAdapter?(): Promise<void>;

  // ─── Primitives (OperationQueue only) ────────────────────────────

  performWrite(dest: CharacteristicId, bytes: Uint8Array): Promise<void>;
  /** Resolves null (or an empty array) when nothing is waiting */
  performRead(dest: CharacteristicId): Promise<Uint8Array | null>;
  setNotify(dest: CharacteristicId, enabled: boolean): Promise<void>;
  /** begin, write, peer confirms, execute (or abort on mismatch) */
  performReliableWrite(dest: CharacteristicId, bytes: Uint8Array): Promise<void>;

  // ─── Events ──────────────────────────────────────────────────────

  onDisconnect(listener: DisconnectListener): () => void;
  onNotification(listener: NotificationListener): () => void;
  onAuthorization(listener: AuthorizationListener): () => void;
}
