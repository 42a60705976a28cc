/**
 * Error types for registry-bridge
 */

/**
 * Error codes for different error types
 */
export const ErrorCode = {
  INVALID_PARAM: 'INVALID_PARAM',
  NOT_FOUND: 'NOT_FOUND',
  REGISTRY_UNREACHABLE: 'REGISTRY_UNREACHABLE',
  REGISTRY_ERROR: 'REGISTRY_ERROR',
  TIMEOUT: 'TIMEOUT',
  REFRESH_FAILED: 'REFRESH_FAILED',
  UNSUPPORTED_PROTOCOL: 'UNSUPPORTED_PROTOCOL',
  CONFIG_ERROR: 'CONFIG_ERROR',
  TRANSPORT_ERROR: 'TRANSPORT_ERROR',
  TOOL_INVOCATION_ERROR: 'TOOL_INVOCATION_ERROR',
  CLOSED: 'CLOSED'
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

export type BridgeErrorOptions = {
  cause?: unknown;
};

/**
 * Base class of every error thrown by the bridge packages
 */
export class BridgeError extends Error {
  readonly code: ErrorCodeType;

  constructor(code: ErrorCodeType, message: string, options?: BridgeErrorOptions) {
    super(message);
    this.name = 'BridgeError';
    this.code = code;
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

export class InvalidParamError extends BridgeError {
  constructor(message: string, options?: BridgeErrorOptions) {
    super(ErrorCode.INVALID_PARAM, message, options);
    this.name = 'InvalidParamError';
  }
}

export type ResourceKind = 'mcp-server' | 'agent-card' | 'tool' | 'endpoint';

export class ResourceNotFoundError extends BridgeError {
  readonly kind: ResourceKind;
  readonly resourceName: string;

  constructor(kind: ResourceKind, resourceName: string, options?: BridgeErrorOptions & { message?: string }) {
    super(ErrorCode.NOT_FOUND, options?.message ?? `${kind} '${resourceName}' not found`, options);
    this.name = 'ResourceNotFoundError';
    this.kind = kind;
    this.resourceName = resourceName;
  }
}

/**
 * The registry could not be reached; `status` carries the registry's native code when known
 */
export class RegistryUnreachableError extends BridgeError {
  readonly status?: number;

  constructor(message: string, options?: BridgeErrorOptions & { status?: number }) {
    super(ErrorCode.REGISTRY_UNREACHABLE, message, options);
    this.name = 'RegistryUnreachableError';
    this.status = options?.status;
  }
}

export class RegistryError extends BridgeError {
  readonly status?: number;

  constructor(message: string, options?: BridgeErrorOptions & { status?: number }) {
    super(ErrorCode.REGISTRY_ERROR, message, options);
    this.name = 'RegistryError';
    this.status = options?.status;
  }
}

export class TimeoutError extends BridgeError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, options?: BridgeErrorOptions) {
    super(ErrorCode.TIMEOUT, message, options);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class RefreshError extends BridgeError {
  readonly resourceName: string;

  constructor(resourceName: string, message: string, options?: BridgeErrorOptions) {
    super(ErrorCode.REFRESH_FAILED, message, options);
    this.name = 'RefreshError';
    this.resourceName = resourceName;
  }
}

export class UnsupportedProtocolError extends BridgeError {
  readonly protocol: string;

  constructor(protocol: string, options?: BridgeErrorOptions) {
    super(ErrorCode.UNSUPPORTED_PROTOCOL, `Unsupported protocol: ${protocol}`, options);
    this.name = 'UnsupportedProtocolError';
    this.protocol = protocol;
  }
}

export class ConfigError extends BridgeError {
  constructor(message: string, options?: BridgeErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, options);
    this.name = 'ConfigError';
  }
}

export class TransportError extends BridgeError {
  constructor(message: string, options?: BridgeErrorOptions) {
    super(ErrorCode.TRANSPORT_ERROR, message, options);
    this.name = 'TransportError';
  }
}

export class ToolInvocationError extends BridgeError {
  constructor(message: string, options?: BridgeErrorOptions) {
    super(ErrorCode.TOOL_INVOCATION_ERROR, message, options);
    this.name = 'ToolInvocationError';
  }
}

export class ClosedError extends BridgeError {
  constructor(message: string, options?: BridgeErrorOptions) {
    super(ErrorCode.CLOSED, message, options);
    this.name = 'ClosedError';
  }
}

export function isBridgeError(error: unknown): error is BridgeError {
  return error instanceof BridgeError;
}

export function hasErrorCode(error: unknown, code: ErrorCodeType): error is BridgeError {
  return isBridgeError(error) && error.code === code;
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
