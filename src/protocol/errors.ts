/**
 * kutyus exception hierarchy.
 *
 * All protocol-specific errors inherit from KutyusError. Chain validation
 * failures are not exceptions: the validator returns them as values.
 */

/** Base error for all kutyus errors. */
export class KutyusError extends Error {
  constructor(message?: string) {
    super(message);
    this.name = "KutyusError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Base for the three decoding failures. Discarding the input is always safe. */
export class DecodeError extends KutyusError {
  constructor(message?: string) {
    super(message);
    this.name = "DecodeError";
  }
}

/** The input ended before the encoding did. A longer read may succeed. */
export class TruncatedInputError extends DecodeError {
  constructor(message?: string) {
    super(message);
    this.name = "TruncatedInputError";
  }
}

/** The bytes do not follow the wire format. */
export class InvalidEncodingError extends DecodeError {
  constructor(message?: string) {
    super(message);
    this.name = "InvalidEncodingError";
  }
}

/** The version byte names a format this library cannot read. */
export class UnsupportedVersionError extends InvalidEncodingError {
  constructor(message?: string) {
    super(message);
    this.name = "UnsupportedVersionError";
  }
}

/** Well-formed bytes, or an in-memory Message, that violate field constraints. */
export class MalformedMessageError extends DecodeError {
  constructor(message?: string) {
    super(message);
    this.name = "MalformedMessageError";
  }
}

/** Raised by the frame builder for a sequence below 1. */
export class InvalidSequenceError extends KutyusError {
  constructor(message?: string) {
    super(message);
    this.name = "InvalidSequenceError";
  }
}

/** Raised on signing failures. */
export class SigningError extends KutyusError {
  constructor(message?: string) {
    super(message);
    this.name = "SigningError";
  }
}

/** Base error for persistence failures. */
export class StoreError extends KutyusError {
  constructor(message?: string) {
    super(message);
    this.name = "StoreError";
  }
}

/** The frame does not extend the stored head of its feed. */
export class StoreConflictError extends StoreError {
  constructor(message?: string) {
    super(message);
    this.name = "StoreConflictError";
  }
}

/** The store was used before open() or after close(). */
export class StoreClosedError extends StoreError {
  constructor(message?: string) {
    super(message);
    this.name = "StoreClosedError";
  }
}

/** Raised by FeedLog.publish when the validator refuses the built frame. */
export class FrameRejectedError extends KutyusError {
  readonly reason: string;

  constructor(reason: string, message?: string) {
    super(message ?? reason);
    this.name = "FrameRejectedError";
    this.reason = reason;
  }
}
