export type DatabaseErrorCode =
  | "CONNECTION_ERROR"
  | "DRIVER_MISSING"
  | "INVALID_ARGUMENT"
  | "BACKEND_ERROR"
  | "REJECTED_STATEMENT";

const MAX_MESSAGE_LENGTH = 500;

export class DatabaseError extends Error {
  readonly code: DatabaseErrorCode;

  constructor(code: DatabaseErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The live connection could not be established or used. */
export class ConnectionError extends DatabaseError {
  constructor(message: string) {
    super("CONNECTION_ERROR", message);
  }
}

/** The driver package for a connector is not installed or failed to load. */
export class DriverMissingError extends DatabaseError {
  constructor(message: string) {
    super("DRIVER_MISSING", message);
  }
}

export class InvalidArgumentError extends DatabaseError {
  constructor(message: string) {
    super("INVALID_ARGUMENT", message);
  }
}

/** A query or catalog call was accepted by the connection but failed on the server. */
export class BackendError extends DatabaseError {
  constructor(message: string) {
    super("BACKEND_ERROR", message);
  }
}

export class RejectedStatementError extends DatabaseError {
  constructor(message: string) {
    super("REJECTED_STATEMENT", message);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function truncateMessage(message: string, maxLength = MAX_MESSAGE_LENGTH): string {
  if (message.length <= maxLength) return message;
  return `${message.slice(0, maxLength)}...`;
}
