export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public code: string = 'INTERNAL_ERROR',
    public isOperational = true
  ) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

export class HostNotFoundError extends AppError {
  constructor(key: string, by: 'id' | 'ip' = 'ip') {
    super(`Host with ${by === 'id' ? 'id' : 'IP'} '${key}' not found`, 404, 'NOT_FOUND');
  }
}

export class InvalidAddressError extends AppError {
  constructor(address: string, field = 'ip_address') {
    super(`Invalid IPv4 address for ${field}: '${address}'`, 400, 'INVALID_ADDRESS');
  }
}

export class HostConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, 'HOST_CONFLICT');
  }
}

export class InvalidHostnameError extends AppError {
  constructor(hostname: string) {
    super(`Cannot set primary for hostname '${hostname}'`, 400, 'INVALID_HOSTNAME');
  }
}

export class InvalidSnapshotError extends AppError {
  constructor(reason: string) {
    super(`Invalid snapshot: ${reason}`, 400, 'INVALID_SNAPSHOT');
  }
}

export class BackupUnavailableError extends AppError {
  constructor(message = 'No backups available') {
    super(message, 404, 'BACKUP_UNAVAILABLE');
  }
}

/**
 * Persistence failure on a roster mutation. The operator has to look at the
 * disk; retrying the request will not help.
 */
export class StoreIOError extends AppError {
  constructor(operation: string, cause: unknown) {
    super(
      `Host store ${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      500,
      'STORE_IO_ERROR',
      false
    );
  }
}

export class PeerUnreachableError extends AppError {
  constructor(
    public readonly peer: string,
    cause: unknown
  ) {
    super(
      `Peer ${peer} unreachable: ${cause instanceof Error ? cause.message : String(cause)}`,
      502,
      'PEER_UNREACHABLE'
    );
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
