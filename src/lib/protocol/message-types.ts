/**
 * Message type tags
 *
 * The first character of every line sent by a device identifies which of the
 * three reply layouts follows.
 *
 * ## Overview
 *
 * Devices share a single serial daisy chain:
 * - The host sends commands prefixed with `/`
 * - Each addressed device answers with exactly one reply (`@`)
 * - Devices may also emit info lines (`#`) and unsolicited alerts (`!`)
 * - Any line may end in a `:CC` checksum suffix
 *
 */
export enum MessageType {
  /**
   * `@`: REPLY (Device to Host)
   *
   * The direct answer to a command.
   *
   * ## Format
   *
   * ```
   * @DD A [MM ]FF SSSS WW DATA[:CC]
   * ```
   *
   * - `FF`: "OK" if the command was accepted, "RJ" if rejected
   * - `SSSS`: "BUSY" while the axis is moving, "IDLE" otherwise
   * - `WW`: highest priority warning flag, "--" if there is none
   * - `DATA`: everything up to the checksum, may contain spaces
   */
  REPLY = "@",

  /**
   * `!`: ALERT (Device to Host)
   *
   * Sent without a request, e.g. when a movement finishes while alerts are
   * enabled on the device.
   *
   * ## Format
   *
   * ```
   * !DD A [MM ]SSSS WW[ DATA][:CC]
   * ```
   */
  ALERT = "!",

  /**
   * `#`: INFO (Device to Host)
   *
   * Extra lines that follow a reply, e.g. the output of `help` or a stream
   * listing. Info messages carry no flags, only data.
   *
   * ## Format
   *
   * ```
   * #DD A [MM ]DATA[:CC]
   * ```
   */
  INFO = "#",
}

const MESSAGE_TYPES: ReadonlyMap<string, MessageType> = new Map([
  [MessageType.REPLY, MessageType.REPLY],
  [MessageType.ALERT, MessageType.ALERT],
  [MessageType.INFO, MessageType.INFO],
]);

/**
 * Looks up the message type for a leading tag character
 *
 * @param tag - First character of a line
 * @returns The matching type, or null for any other character
 */
export function toMessageType(tag: string): MessageType | null {
  return MESSAGE_TYPES.get(tag) ?? null;
}
