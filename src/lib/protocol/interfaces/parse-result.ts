import type { ReplyParseError } from "../../utils/errors.ts";
import type { ReplyMessage } from "./reply-message.ts";

/**
 * Outcome of parsing a single line
 *
 * Either a complete message or the error explaining why there is none.
 */
export type ParseResult =
  | { readonly ok: true; readonly message: ReplyMessage }
  | { readonly ok: false; readonly error: ReplyParseError };

/**
 * Outcome of checking a claimed checksum against a body
 */
export interface ChecksumCheck {
  valid: boolean;
  /** Checksum computed from the body, two uppercase hex digits */
  expected: string;
}
