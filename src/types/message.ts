export enum MessageStatus {
  SENDING = 'sending',      // Queued or being written to the radio
  SENT = 'sent',            // Written to the radio
  DELIVERED = 'delivered',  // Acknowledged by a mesh node
  RECEIVED = 'received',    // Acknowledged by the intended recipient
  FAILED = 'failed',        // Not acknowledged, or dropped before it left the radio
  ERROR = 'error'           // Rejected by the radio after it was sent
}

export const TERMINAL_MESSAGE_STATUSES: ReadonlySet<MessageStatus> = new Set([
  MessageStatus.DELIVERED,
  MessageStatus.RECEIVED,
  MessageStatus.FAILED,
  MessageStatus.ERROR
])

export const BROADCAST_NODE_NUM = 0xffffffff

/**
 * Options accepted when handing a packet to the delivery queue
 */
export interface PacketOptions {
  correlationId: string
  trackForAck: boolean
  destination?: number  // Node number, defaults to broadcast
  channel?: number      // Channel index, defaults to primary (0)
  portnum?: number      // Defaults to PRIVATE_APP (256)
}

export interface OutboundPacket {
  id: number
  correlationId: string
  payload: Uint8Array
  destination: number
  channel: number
  portnum: number
  wantAck: boolean
}

export interface DeliveryResult {
  packetId: number
  correlationId: string
  status: MessageStatus
  error?: string
}

export interface MessageStatusChange {
  packetId: number
  correlationId: string
  previous: MessageStatus | null
  status: MessageStatus
  at: number
}
