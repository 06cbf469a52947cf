export type MeshLinkErrorCode =
  | 'TRANSPORT_UNAVAILABLE'
  | 'OPERATION_TIMEOUT'
  | 'OPERATION_FAILED'
  | 'HANDSHAKE_FAILED'
  | 'MESSAGE_DELIVERY_FAILED'
  | 'LINK_RESET'
  | 'PAYLOAD_TOO_LARGE';

export type HandshakeStage =
  | 'authorization'
  | 'connect'
  | 'serviceResolution'
  | 'handshake';

export interface MeshLinkErrorOptions {
  stage?: HandshakeStage;
  status?: number;
  cause?: unknown;
}

/**
 * Single error type for the transport and messaging layers.
 * `code` decides recovery; `stage` and `status` carry detail for logs.
 */
export class MeshLinkError extends Error {
  readonly code: MeshLinkErrorCode;
  readonly stage?: HandshakeStage;
  readonly status?: number;

  constructor(message: string, code: MeshLinkErrorCode, options: MeshLinkErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'MeshLinkError';
    this.code = code;
    this.stage = options.stage;
    this.status = options.status;
  }

  /** Errors that a retry at the operation level may fix */
  get isRetryable(): boolean {
    return this.code === 'OPERATION_TIMEOUT' || this.code === 'OPERATION_FAILED';
  }
}

/**
 * Normalize anything thrown by a transport into a MeshLinkError
 */
export function toMeshLinkError(error: unknown, fallbackCode: MeshLinkErrorCode = 'OPERATION_FAILED'): MeshLinkError {
  if (error instanceof MeshLinkError) {
    return error;
  }
  if (error instanceof Error) {
    return new MeshLinkError(error.message, fallbackCode, { cause: error });
  }
  return new MeshLinkError(String(error), fallbackCode);
}

export function linkResetError(reason: string): MeshLinkError {
  return new MeshLinkError(`Link reset: ${reason}`, 'LINK_RESET');
}
