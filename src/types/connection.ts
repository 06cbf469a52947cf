import type { EndpointRef } from './device.js'

export type ConnectionState =
  | { readonly status: 'disconnected' }
  | { readonly status: 'connecting' }
  | { readonly status: 'connected'; readonly endpoint: EndpointRef }
  | { readonly status: 'failed'; readonly reason: string }

export type LifecyclePhase =
  | 'idle'
  | 'connecting'
  | 'linkEstablished'
  | 'parameterNegotiation'
  | 'serviceResolution'
  | 'backlogDrain'
  | 'handshakeInProgress'
  | 'ready'
  | 'disconnected'
  | 'failed'

/**
 * Named categories for the transport's disconnect reason codes
 */
export enum DisconnectCategory {
  NORMAL = 'normal',
  LOST_CONNECTION = 'lostConnection',
  STALE_CACHE = 'staleCache',
  PERSISTENT_STACK_FAULT = 'persistentStackFault'
}

export type RecoveryAction = 'reconnect' | 'refreshCacheAndReconnect' | 'restartStackAndReconnect'

export interface RecoveryEvent {
  action: RecoveryAction
  category: DisconnectCategory
  attempt: number
  delayMs: number
}
