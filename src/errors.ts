/**
 * A credential the operation needs is not configured.
 * Scans treat this as a silent no-op.
 */
export class MissingCredentialError extends Error {
  public readonly setting: string;

  constructor(setting: string) {
    super(`Missing credential: ${setting}`);
    this.name = "MissingCredentialError";
    this.setting = setting;
    Object.setPrototypeOf(this, MissingCredentialError.prototype);
  }
}

/**
 * Booking details came back without a usable book token
 */
export class MissingTokenError extends Error {
  constructor(message = "No booking token received") {
    super(message);
    this.name = "MissingTokenError";
    Object.setPrototypeOf(this, MissingTokenError.prototype);
  }
}

/**
 * A watch record that can't be scanned (bad date, bad time window)
 */
export class InvalidWatchError extends Error {
  public readonly watchId: number;

  constructor(watchId: number, message: string) {
    super(message);
    this.name = "InvalidWatchError";
    this.watchId = watchId;
    Object.setPrototypeOf(this, InvalidWatchError.prototype);
  }
}

/**
 * Message text for anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
