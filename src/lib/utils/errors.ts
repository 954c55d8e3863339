import type { MessageType } from "../protocol/message-types.ts";

/**
 * Base error class for all protocol errors
 */
export class ProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProtocolError";
    Object.setPrototypeOf(this, ProtocolError.prototype);
  }
}

/**
 * Error thrown when a line does not match the field layout of its type
 */
export class MalformedMessageError extends ProtocolError {
  public readonly kind: "MalformedMessage" | "TooShort";
  /** Line that failed, terminator removed */
  public readonly rawText: string;
  /** Type announced by the tag, null if the line was too short to tell */
  public readonly messageType: MessageType | null;

  constructor(
    message: string,
    rawText: string,
    messageType: MessageType | null = null,
    kind: "MalformedMessage" | "TooShort" = "MalformedMessage",
  ) {
    super(message);
    this.name = "MalformedMessageError";
    this.kind = kind;
    this.rawText = rawText;
    this.messageType = messageType;
    Object.setPrototypeOf(this, MalformedMessageError.prototype);
  }
}

/**
 * Error thrown when a line is too short to hold a type tag, address and axis
 */
export class TooShortError extends MalformedMessageError {
  declare readonly kind: "TooShort";
  public readonly minLength: number;

  constructor(rawText: string, minLength: number) {
    super(
      `Reply string too short to be a valid reply: ${rawText.length} characters, need at least ${minLength}`,
      rawText,
      null,
      "TooShort",
    );
    this.name = "TooShortError";
    this.minLength = minLength;
    Object.setPrototypeOf(this, TooShortError.prototype);
  }
}

/**
 * Error thrown when the checksum on a line does not match its body
 */
export class ChecksumMismatchError extends ProtocolError {
  public readonly kind = "ChecksumMismatch" as const;
  public readonly rawText: string;
  /** Checksum as it appeared on the wire */
  public readonly found: string;
  /** Checksum computed from the body */
  public readonly expected: string;

  constructor(rawText: string, found: string, expected: string) {
    super(
      `Checksum incorrect. Found ${found}, expected ${expected}. Possible data corruption detected.`,
    );
    this.name = "ChecksumMismatchError";
    this.rawText = rawText;
    this.found = found;
    this.expected = expected;
    Object.setPrototypeOf(this, ChecksumMismatchError.prototype);
  }
}

/**
 * Error thrown when a line starts with something other than `@`, `!` or `#`
 */
export class UnknownMessageTypeError extends ProtocolError {
  public readonly kind = "UnknownMessageType" as const;
  public readonly rawText: string;
  public readonly typeTag: string;

  constructor(rawText: string, typeTag: string) {
    super(`Invalid response type: ${typeTag}`);
    this.name = "UnknownMessageTypeError";
    this.rawText = rawText;
    this.typeTag = typeTag;
    Object.setPrototypeOf(this, UnknownMessageTypeError.prototype);
  }
}

/**
 * Error thrown when a message is constructed with a field the wire format
 * cannot represent
 */
export class InvalidFieldError extends ProtocolError {
  public readonly kind = "InvalidField" as const;
  public readonly field: string;
  public readonly value: unknown;

  constructor(field: string, value: unknown, reason: string) {
    super(`Invalid ${field} ${JSON.stringify(value)}: ${reason}`);
    this.name = "InvalidFieldError";
    this.field = field;
    this.value = value;
    Object.setPrototypeOf(this, InvalidFieldError.prototype);
  }
}

/**
 * Any error a parse can produce
 *
 * Branch on `kind` rather than on the message text.
 */
export type ReplyParseError =
  | TooShortError
  | MalformedMessageError
  | ChecksumMismatchError
  | UnknownMessageTypeError;

export type ReplyParseErrorKind = ReplyParseError["kind"];
