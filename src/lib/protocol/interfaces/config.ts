/**
 * Line terminators understood by the codec
 */
export type LineTerminator = "\n" | "\r\n";

/**
 * How a claimed checksum is compared with the computed one
 *
 * - "any": hex digits match regardless of case
 * - "upper": the claimed checksum must be uppercase, as devices send it
 */
export type ChecksumCase = "any" | "upper";

/**
 * Codec configuration
 *
 * Parsing always accepts both terminators; these settings only shape what
 * the codec emits and how strictly it reads checksums.
 */
export interface CodecConfig {
  /**
   * Terminator appended by `encode`
   *
   * Devices end their lines with CRLF. The default is a single LF.
   */
  lineTerminator: LineTerminator;

  /**
   * Case rule for claimed checksums
   */
  checksumCase: ChecksumCase;
}
