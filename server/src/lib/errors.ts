export type ClientErrorCode =
  | 'VALIDATION_ERROR'
  | 'NAME_CONFLICT'
  | 'NO_TARGETS_MATCHED'
  | 'SECURITY_VIOLATION'
  | 'CLIENT_NOT_FOUND';

/**
 * A per-request failure caused by the caller. Reported back on the socket;
 * never fatal to the connection or the registry.
 */
export class ClientError extends Error {
  constructor(
    readonly code: ClientErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends ClientError {
  constructor(message: string) {
    super('VALIDATION_ERROR', message);
  }
}

export class NameConflictError extends ClientError {
  constructor(readonly requestedName: string) {
    super('NAME_CONFLICT', `Name '${requestedName}' is already taken by another client`);
  }
}

export class NoTargetsMatchedError extends ClientError {
  constructor() {
    super('NO_TARGETS_MATCHED', 'No clients matched target specification');
  }
}

export class SecurityViolationError extends ClientError {
  constructor(message: string) {
    super('SECURITY_VIOLATION', message);
  }
}

export class ClientNotFoundError extends ClientError {
  constructor(readonly clientId: string) {
    super('CLIENT_NOT_FOUND', `Client '${clientId}' is not connected`);
  }
}

export class InvalidClientTypeError extends ValidationError {
  constructor(readonly clientType: string) {
    super(`Invalid client type '${clientType}'`);
  }
}
