import type { ChecksumCase } from "./interfaces/config.ts";
import type { ChecksumCheck } from "./interfaces/parse-result.ts";

/**
 * Computes the longitudinal redundancy check of a message body
 *
 * The body is everything between the type tag and the `:` delimiter. Code
 * points are summed, the low byte is inverted and incremented (the two's
 * complement of the sum), and the result is rendered as two uppercase hex
 * digits. Adding the checksum byte to the body sum therefore gives 0 mod 256.
 *
 * @param body - Message body without type tag or checksum suffix
 * @returns Two uppercase hex digits
 */
export function computeChecksum(body: string): string {
  let sum = 0;
  for (const ch of body) {
    sum += ch.codePointAt(0) ?? 0;
  }
  // ((sum & 0xFF) ^ 0xFF) + 1, with 0x100 wrapping to 0x00
  const checksum = -sum & 0xff;
  return checksum.toString(16).toUpperCase().padStart(2, "0");
}

/**
 * Checks a claimed checksum against the one computed from a body
 *
 * @param body - Message body without type tag or checksum suffix
 * @param claimed - Checksum text as received
 * @param checksumCase - "upper" rejects lowercase hex digits
 */
export function verifyChecksum(
  body: string,
  claimed: string,
  checksumCase: ChecksumCase = "any",
): ChecksumCheck {
  const expected = computeChecksum(body);
  const found = checksumCase === "any" ? claimed.toUpperCase() : claimed;
  return { valid: found === expected, expected };
}
