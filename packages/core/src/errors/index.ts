/**
 * WalletGate Error Codes
 */
export const ErrorCodes = {
  TRANSPORT_SETUP_FAILED: 'TRANSPORT_SETUP_FAILED',
  MESSAGE_PARSE_FAILED: 'MESSAGE_PARSE_FAILED',
  TENANT_RESOLUTION_FAILED: 'TENANT_RESOLUTION_FAILED',
  INVALID_EXCHANGE_STATE: 'INVALID_EXCHANGE_STATE',
  RESPONSE_WAIT_CONFLICT: 'RESPONSE_WAIT_CONFLICT',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

/**
 * Base class for WalletGate errors
 */
export class WalletGateError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly hint?: string,
    public readonly exchangeId?: string,
  ) {
    super(message);
    this.name = 'WalletGateError';
  }

  toErrorMessage() {
    return {
      code: this.code,
      message: this.message,
      hint: this.hint,
    };
  }
}

/**
 * Error: Listener could not be started (bind failure)
 */
export class TransportSetupError extends WalletGateError {
  constructor(reason: string, hint?: string) {
    super(ErrorCodes.TRANSPORT_SETUP_FAILED, reason, hint);
    this.name = 'TransportSetupError';
  }
}

/**
 * Error: Inbound bytes could not be authenticated or decoded
 */
export class MessageParseError extends WalletGateError {
  constructor(reason: string, hint?: string, exchangeId?: string) {
    super(ErrorCodes.MESSAGE_PARSE_FAILED, `Message parse failed: ${reason}`, hint, exchangeId);
    this.name = 'MessageParseError';
  }
}

/**
 * Error: Owning tenant could not be determined or its store opened
 */
export class TenantResolutionError extends WalletGateError {
  constructor(
    reason: string,
    public readonly tenantId?: string,
    hint?: string,
    exchangeId?: string,
  ) {
    super(ErrorCodes.TENANT_RESOLUTION_FAILED, `Tenant resolution failed: ${reason}`, hint, exchangeId);
    this.name = 'TenantResolutionError';
  }
}

/**
 * Error: Operation not allowed in the exchange's current state
 */
export class ExchangeStateError extends WalletGateError {
  constructor(
    message: string,
    exchangeId?: string,
    code: typeof ErrorCodes.INVALID_EXCHANGE_STATE | typeof ErrorCodes.RESPONSE_WAIT_CONFLICT =
      ErrorCodes.INVALID_EXCHANGE_STATE,
  ) {
    super(code, message, undefined, exchangeId);
    this.name = 'ExchangeStateError';
  }
}

/** Client-facing faults: the sender can correct these */
export function isClientFault(error: unknown): boolean {
  return error instanceof MessageParseError;
}
