import { CHECKSUM_DELIMITER, FIELD_DELIMITER } from "../constants.ts";
import type { CodecConfig } from "../interfaces/config.ts";
import { DEFAULT_CODEC_CONFIG } from "../interfaces/defaults.ts";
import type { ReplyMessage } from "../interfaces/reply-message.ts";
import { MessageType } from "../message-types.ts";

const pad2 = (value: number): string => String(value).padStart(2, "0");

/**
 * Encoder turning a ReplyMessage back into a wire line
 *
 * Uses the same field widths the parser reads: two-digit device address and
 * message id, single-digit axis. The stored checksum is appended verbatim.
 */
export class ReplyEncoder {
  /**
   * Creates a new ReplyEncoder instance.
   * @param config Codec configuration; only `lineTerminator` affects encoding
   */
  constructor(private config: Readonly<CodecConfig> = DEFAULT_CODEC_CONFIG) {}

  /**
   * Encodes a message as a complete line
   *
   * @param message - Message to encode
   * @returns Body, `:CC` if the message carries a checksum, and the terminator
   */
  public encode(message: ReplyMessage): string {
    const body = ReplyEncoder.formatBody(message);
    const suffix =
      message.checksum !== null
        ? `${CHECKSUM_DELIMITER}${message.checksum}`
        : "";
    return `${message.type}${body}${suffix}${this.config.lineTerminator}`;
  }

  /**
   * Formats the part of a message the checksum covers
   *
   * Picks one of six layouts from the message type and whether a message id
   * is present:
   *
   * ```
   * Reply: DD A [MM ]FF SSSS WW DATA
   * Info:  DD A [MM ]DATA
   * Alert: DD A [MM ]SSSS WW[ DATA]
   * ```
   *
   * @param message - Message to format
   * @returns Body without type tag, checksum or terminator
   */
  public static formatBody(message: ReplyMessage): string {
    const fields: string[] = [pad2(message.deviceAddress), String(message.axisNumber)];
    if (message.messageId !== null) {
      fields.push(pad2(message.messageId));
    }

    switch (message.type) {
      case MessageType.REPLY:
        fields.push(
          message.replyFlag,
          message.deviceStatus,
          message.warningFlag,
          message.data,
        );
        break;
      case MessageType.INFO:
        fields.push(message.data);
        break;
      case MessageType.ALERT:
        fields.push(message.deviceStatus, message.warningFlag);
        if (message.data !== "") {
          fields.push(message.data);
        }
        break;
    }

    return fields.join(FIELD_DELIMITER);
  }
}
