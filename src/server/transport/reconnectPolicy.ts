import { DisconnectCategory, type RecoveryAction } from '../../types/connection.js';

/**
 * BLE GATT status codes reported with a disconnect
 */
export const DEFAULT_DISCONNECT_CODES: Readonly<Record<number, DisconnectCategory>> = {
  0: DisconnectCategory.NORMAL,                    // GATT_SUCCESS: local close
  8: DisconnectCategory.LOST_CONNECTION,           // GATT_CONN_TIMEOUT
  19: DisconnectCategory.LOST_CONNECTION,          // GATT_CONN_TERMINATE_PEER_USER
  22: DisconnectCategory.LOST_CONNECTION,          // GATT_CONN_TERMINATE_LOCAL_HOST
  62: DisconnectCategory.LOST_CONNECTION,          // GATT_CONN_FAIL_ESTABLISH
  129: DisconnectCategory.STALE_CACHE,             // GATT_INTERNAL_ERROR
  137: DisconnectCategory.STALE_CACHE,             // GATT_INVALID_HANDLE after a firmware update
  133: DisconnectCategory.PERSISTENT_STACK_FAULT,  // GATT_ERROR
  257: DisconnectCategory.PERSISTENT_STACK_FAULT,  // GATT_FAILURE
};

const CATEGORY_DESCRIPTIONS: Record<DisconnectCategory, string> = {
  [DisconnectCategory.NORMAL]: 'disconnected',
  [DisconnectCategory.LOST_CONNECTION]: 'connection lost',
  [DisconnectCategory.STALE_CACHE]: 'stale service cache',
  [DisconnectCategory.PERSISTENT_STACK_FAULT]: 'bluetooth stack fault',
};

const RECOVERY_ACTIONS: Record<Exclude<DisconnectCategory, DisconnectCategory.NORMAL>, RecoveryAction> = {
  [DisconnectCategory.LOST_CONNECTION]: 'reconnect',
  [DisconnectCategory.STALE_CACHE]: 'refreshCacheAndReconnect',
  [DisconnectCategory.PERSISTENT_STACK_FAULT]: 'restartStackAndReconnect',
};

export interface ReconnectPolicy {
  classify(reasonCode: number): DisconnectCategory;
  describe(category: DisconnectCategory): string;
  recoveryFor(category: Exclude<DisconnectCategory, DisconnectCategory.NORMAL>): RecoveryAction;
  /** Delay before reconnect attempt `attempt` (1-based) */
  delayFor(attempt: number): number;
  readonly maxAttempts: number;
}

export interface ReconnectPolicyOptions {
  codes?: Readonly<Record<number, DisconnectCategory>>;
  stepMs: number;
  maxDelayMs: number;
  maxAttempts: number;
}

/**
 * Linear backoff: min(attempt * step, max). Unknown codes count as a
 * lost connection.
 */
export function createReconnectPolicy(options: ReconnectPolicyOptions): ReconnectPolicy {
  const codes = options.codes ?? DEFAULT_DISCONNECT_CODES;
  return {
    classify: (reasonCode) => codes[reasonCode] ?? DisconnectCategory.LOST_CONNECTION,
    describe: (category) => CATEGORY_DESCRIPTIONS[category],
    recoveryFor: (category) => RECOVERY_ACTIONS[category],
    delayFor: (attempt) => Math.min(Math.max(attempt, 1) * options.stepMs, options.maxDelayMs),
    maxAttempts: options.maxAttempts,
  };
}
