export { MeshLinkManager, RESERVED_TOPICS } from './server/meshLinkManager.js';
export type { MeshLinkManagerOptions, ConnectionStateListener } from './server/meshLinkManager.js';

export { MeshProtobufService } from './server/meshProtobufService.js';
export type { DecodedMeshPacket, FromRadioFrame, QueueStatusFrame } from './server/meshProtobufService.js';

export { OperationQueue } from './server/transport/operationQueue.js';
export type { Operation, OperationQueueOptions, OperationQueueStats, EscalationEvent } from './server/transport/operationQueue.js';
export { ConnectionLifecycle } from './server/transport/connectionLifecycle.js';
export type { ConnectionLifecycleOptions } from './server/transport/connectionLifecycle.js';
export {
  createDeviceQuirkPolicy,
  createRuleClassifier,
  DEFAULT_CLASSIFICATION_RULES,
  DEFAULT_QUIRKS,
} from './server/transport/deviceQuirks.js';
export type { DeviceQuirks, DeviceQuirkPolicy, ClassificationRule } from './server/transport/deviceQuirks.js';
export { createReconnectPolicy, DEFAULT_DISCONNECT_CODES } from './server/transport/reconnectPolicy.js';
export type { ReconnectPolicy, ReconnectPolicyOptions } from './server/transport/reconnectPolicy.js';
export { MeshLinkError } from './server/transport/errors.js';
export type { MeshLinkErrorCode, HandshakeStage } from './server/transport/errors.js';
export type { TransportLink, LinkEvent } from './server/transport/transportLink.js';

export { PacketDeliveryQueue, MAX_PACKET_ID } from './server/services/packetDeliveryQueue.js';
export type { PacketDeliveryQueueOptions } from './server/services/packetDeliveryQueue.js';
export { MessageStatusTracker, isAllowedTransition } from './server/services/messageStatusTracker.js';
export { NotificationDispatcher } from './server/services/notificationDispatcher.js';
export type { NotificationHandler, NotificationMeta } from './server/services/notificationDispatcher.js';

export { getEnvironmentConfig, loadEnvironmentConfig, resetEnvironmentConfig } from './server/config/environment.js';
export type { EnvironmentConfig } from './server/config/environment.js';
export { logger } from './utils/logger.js';
export type { LogLevel } from './utils/logger.js';

export * from './types/message.js';
export * from './types/connection.js';
export * from './types/device.js';
