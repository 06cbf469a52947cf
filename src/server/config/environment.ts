import path from 'path';
import { logger } from '../../utils/logger.js';

/**
 * Tunables for the link, operation queue and delivery queue.
 * All durations are milliseconds.
 */
export interface EnvironmentConfig {
  operationTimeoutMs: number;
  maxOperationAttempts: number;
  reliableWriteBackoffMs: number;
  packetTimeoutMs: number;
  messageTimeoutMs: number;
  maxMessageRetries: number;
  reconnectStepMs: number;
  reconnectMaxDelayMs: number;
  maxReconnectAttempts: number;
  drainIntervalMs: number;
  maxDrainReads: number;
  handshakeTimeoutMs: number;
  authorizationTimeoutMs: number;
  requestedMtu: number;
  maxPayloadBytes: number;
  protoDir: string;
}

type IntKey = Exclude<keyof EnvironmentConfig, 'protoDir'>;

interface IntSetting {
  env: string;
  defaultValue: number;
  min: number;
}

const INT_SETTINGS: Record<IntKey, IntSetting> = {
  operationTimeoutMs: { env: 'MESHLINK_OPERATION_TIMEOUT_MS', defaultValue: 4000, min: 1 },
  maxOperationAttempts: { env: 'MESHLINK_MAX_OPERATION_ATTEMPTS', defaultValue: 3, min: 1 },
  reliableWriteBackoffMs: { env: 'MESHLINK_RELIABLE_WRITE_BACKOFF_MS', defaultValue: 200, min: 0 },
  packetTimeoutMs: { env: 'MESHLINK_PACKET_TIMEOUT_MS', defaultValue: 8000, min: 1 },
  messageTimeoutMs: { env: 'MESHLINK_MESSAGE_TIMEOUT_MS', defaultValue: 30000, min: 1 },
  maxMessageRetries: { env: 'MESHLINK_MAX_MESSAGE_RETRIES', defaultValue: 1, min: 0 },
  reconnectStepMs: { env: 'MESHLINK_RECONNECT_STEP_MS', defaultValue: 1000, min: 0 },
  reconnectMaxDelayMs: { env: 'MESHLINK_RECONNECT_MAX_DELAY_MS', defaultValue: 10000, min: 0 },
  maxReconnectAttempts: { env: 'MESHLINK_MAX_RECONNECT_ATTEMPTS', defaultValue: 10, min: 1 },
  drainIntervalMs: { env: 'MESHLINK_DRAIN_INTERVAL_MS', defaultValue: 100, min: 0 },
  maxDrainReads: { env: 'MESHLINK_MAX_DRAIN_READS', defaultValue: 500, min: 1 },
  handshakeTimeoutMs: { env: 'MESHLINK_HANDSHAKE_TIMEOUT_MS', defaultValue: 30000, min: 1 },
  authorizationTimeoutMs: { env: 'MESHLINK_AUTHORIZATION_TIMEOUT_MS', defaultValue: 30000, min: 1 },
  requestedMtu: { env: 'MESHLINK_REQUESTED_MTU', defaultValue: 512, min: 23 },
  maxPayloadBytes: { env: 'MESHLINK_MAX_PAYLOAD_BYTES', defaultValue: 252, min: 1 },
};

let cachedConfig: EnvironmentConfig | null = null;

function parseIntSetting(key: IntKey, env: NodeJS.ProcessEnv): number {
  const setting = INT_SETTINGS[key];
  const raw = env[setting.env];
  if (raw === undefined || raw.trim() === '') {
    return setting.defaultValue;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < setting.min) {
    logger.warn(`⚠️  Invalid ${setting.env}="${raw}", using default ${setting.defaultValue}`);
    return setting.defaultValue;
  }
  return value;
}

/**
 * Build a config from an environment map without touching the cache.
 */
export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const int = (key: IntKey): number => parseIntSetting(key, env);
  const protoDir = env.MESHLINK_PROTO_DIR?.trim() || path.join(process.cwd(), 'protobufs');

  return {
    operationTimeoutMs: int('operationTimeoutMs'),
    maxOperationAttempts: int('maxOperationAttempts'),
    reliableWriteBackoffMs: int('reliableWriteBackoffMs'),
    packetTimeoutMs: int('packetTimeoutMs'),
    messageTimeoutMs: int('messageTimeoutMs'),
    maxMessageRetries: int('maxMessageRetries'),
    reconnectStepMs: int('reconnectStepMs'),
    reconnectMaxDelayMs: int('reconnectMaxDelayMs'),
    maxReconnectAttempts: int('maxReconnectAttempts'),
    drainIntervalMs: int('drainIntervalMs'),
    maxDrainReads: int('maxDrainReads'),
    handshakeTimeoutMs: int('handshakeTimeoutMs'),
    authorizationTimeoutMs: int('authorizationTimeoutMs'),
    requestedMtu: int('requestedMtu'),
    maxPayloadBytes: int('maxPayloadBytes'),
    protoDir,
  };
}

/**
 * Get environment configuration (parsed once, then cached)
 */
export function getEnvironmentConfig(): EnvironmentConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvironmentConfig();
  }
  return cachedConfig;
}

/**
 * Drop the cached config so the next call re-reads process.env
 */
export function resetEnvironmentConfig(): void {
  cachedConfig = null;
}
