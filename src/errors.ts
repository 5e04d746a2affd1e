import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';

export class McpDiagError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed or incomplete transport configuration. Raised before any connection attempt. */
export class ConfigurationError extends McpDiagError {}

export class NotConnectedError extends McpDiagError {
  constructor(operation: string) {
    super(`Cannot ${operation}: session is not connected`);
  }
}

export class SessionBusyError extends McpDiagError {
  constructor() {
    super('Session already has an active connection');
  }
}

export class TransportFailure extends McpDiagError {}

export class ProtocolError extends McpDiagError {
  readonly code?: number;

  constructor(message: string, options?: { cause?: unknown; code?: number }) {
    super(message, options);
    this.code = options?.code;
  }
}

export class UnsupportedCapabilityError extends McpDiagError {
  readonly capability: string;

  constructor(capability: string, options?: { cause?: unknown }) {
    super(`${capability} not supported`, options);
    this.capability = capability;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Maps whatever an operation raised onto the typed taxonomy; `method` names the capability for MethodNotFound.
export function toOperationError(error: unknown, method: string): McpDiagError {
  if (error instanceof McpDiagError) return error;
  if (error instanceof McpError) {
    if (error.code === ErrorCode.ConnectionClosed || error.code === ErrorCode.RequestTimeout) {
      return new TransportFailure(error.message, { cause: error });
    }
    if (error.code === ErrorCode.MethodNotFound) return new UnsupportedCapabilityError(method, { cause: error });
    return new ProtocolError(error.message, { cause: error, code: error.code });
  }
  // The SDK raises a plain Error once its transport is gone.
  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError' || error.message === 'Not connected')) {
    return new TransportFailure(error.message, { cause: error });
  }
  return new ProtocolError(errorMessage(error), { cause: error });
}
