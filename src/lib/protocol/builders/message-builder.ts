import { computeChecksum } from "../checksum.ts";
import {
  CHECKSUM_DELIMITER,
  CHECKSUM_LENGTH,
  MAX_AXIS_NUMBER,
  MAX_DEVICE_ADDRESS,
  MAX_MESSAGE_ID,
  MIN_DEVICE_ADDRESS,
  NO_WARNING,
} from "../constants.ts";
import type {
  AlertMessage,
  CommandReply,
  InfoMessage,
  ReplyMessage,
} from "../interfaces/reply-message.ts";
import { MessageType } from "../message-types.ts";
import type { DeviceStatus, ReplyFlag } from "../reply-flags.ts";
import { InvalidFieldError } from "../../utils/errors.ts";
import { ReplyEncoder } from "./reply-encoder.ts";

/**
 * Fields accepted by every constructor
 *
 * Omitted optional fields take their wire defaults: no message id, empty
 * data, no checksum.
 */
export interface MessageInput {
  deviceAddress: number;
  axisNumber: number;
  messageId?: number | null;
  data?: string;
  checksum?: string | null;
}

export interface CommandReplyInput extends MessageInput {
  replyFlag: ReplyFlag;
  deviceStatus: DeviceStatus;
  /** Defaults to "--" */
  warningFlag?: string;
}

export interface AlertInput extends MessageInput {
  deviceStatus: DeviceStatus;
  /** Defaults to "--" */
  warningFlag?: string;
}

export type InfoInput = MessageInput;

/**
 * Builder for messages created by the application rather than parsed
 *
 * Every message it returns is frozen and encodes without error. Messages
 * without a checksum, or stamped by `withChecksum`, parse back to an equal
 * message; a checksum passed in by hand is kept as given. Fields the wire
 * format cannot carry are rejected with InvalidFieldError.
 */
export class MessageBuilder {
  private static readonly WARNING_FLAG_PATTERN = /^\S{2}$/;
  private static readonly CHECKSUM_PATTERN = /^[0-9A-Fa-f]{2}$/;
  private static readonly LINE_BREAK_PATTERN = /[\r\n]/;
  // Info data like "12 abc" would be read back as message id 12
  private static readonly LEADING_ID_PATTERN = /^\d{1,3} /;

  /**
   * Build a reply (`@`)
   * @param input Reply fields
   * @returns Frozen reply
   */
  static reply(input: CommandReplyInput): CommandReply {
    const message: CommandReply = Object.freeze({
      type: MessageType.REPLY,
      ...MessageBuilder.commonFields(input),
      replyFlag: input.replyFlag,
      deviceStatus: input.deviceStatus,
      warningFlag: MessageBuilder.warningFlag(input.warningFlag),
    });
    return MessageBuilder.checked(message);
  }

  /**
   * Build an alert (`!`)
   * @param input Alert fields
   * @returns Frozen alert
   */
  static alert(input: AlertInput): AlertMessage {
    const message: AlertMessage = Object.freeze({
      type: MessageType.ALERT,
      ...MessageBuilder.commonFields(input),
      deviceStatus: input.deviceStatus,
      warningFlag: MessageBuilder.warningFlag(input.warningFlag),
    });
    return MessageBuilder.checked(message);
  }

  /**
   * Build an info message (`#`)
   * @param input Info fields
   * @returns Frozen info message
   */
  static info(input: InfoInput): InfoMessage {
    const message: InfoMessage = Object.freeze({
      type: MessageType.INFO,
      ...MessageBuilder.commonFields(input),
    });

    if (
      message.messageId === null &&
      MessageBuilder.LEADING_ID_PATTERN.test(message.data)
    ) {
      throw new InvalidFieldError(
        "data",
        message.data,
        "leading number would be read as a message id",
      );
    }
    return MessageBuilder.checked(message);
  }

  /**
   * Returns a copy of a message carrying a freshly computed checksum
   *
   * Encoding never recomputes a checksum, so call this after building or
   * changing a message that should go out with one.
   *
   * @param message Message to stamp
   * @returns Frozen copy with `checksum` set
   */
  static withChecksum<T extends ReplyMessage>(message: T): T {
    const stamped: T = {
      ...message,
      checksum: computeChecksum(ReplyEncoder.formatBody(message)),
    };
    Object.freeze(stamped);
    return stamped;
  }

  /**
   * Returns a copy of a message without a checksum
   */
  static withoutChecksum<T extends ReplyMessage>(message: T): T {
    const stripped: T = { ...message, checksum: null };
    Object.freeze(stripped);
    return MessageBuilder.checked(stripped);
  }

  private static commonFields(input: MessageInput) {
    const messageId = input.messageId ?? null;
    const data = input.data ?? "";
    const checksum = input.checksum ?? null;

    MessageBuilder.checkRange(
      "deviceAddress",
      input.deviceAddress,
      MIN_DEVICE_ADDRESS,
      MAX_DEVICE_ADDRESS,
    );
    MessageBuilder.checkRange("axisNumber", input.axisNumber, 0, MAX_AXIS_NUMBER);
    if (messageId !== null) {
      MessageBuilder.checkRange("messageId", messageId, 0, MAX_MESSAGE_ID);
    }
    if (MessageBuilder.LINE_BREAK_PATTERN.test(data)) {
      throw new InvalidFieldError("data", data, "must not contain line breaks");
    }
    if (checksum !== null && !MessageBuilder.CHECKSUM_PATTERN.test(checksum)) {
      throw new InvalidFieldError("checksum", checksum, "must be two hex digits");
    }

    return {
      deviceAddress: input.deviceAddress,
      axisNumber: input.axisNumber,
      messageId,
      data,
      checksum,
    };
  }

  private static warningFlag(flag: string = NO_WARNING): string {
    if (!MessageBuilder.WARNING_FLAG_PATTERN.test(flag)) {
      throw new InvalidFieldError(
        "warningFlag",
        flag,
        "must be two non-space characters",
      );
    }
    return flag;
  }

  private static checkRange(
    field: string,
    value: number,
    min: number,
    max: number,
  ): void {
    if (!Number.isInteger(value) || value < min || value > max) {
      throw new InvalidFieldError(
        field,
        value,
        `must be an integer from ${min} to ${max}`,
      );
    }
  }

  /**
   * Rejects an unchecksummed message whose body ends like a checksum suffix
   */
  private static checked<T extends ReplyMessage>(message: T): T {
    if (message.checksum === null) {
      const body = ReplyEncoder.formatBody(message);
      if (body.charAt(body.length - CHECKSUM_LENGTH - 1) === CHECKSUM_DELIMITER) {
        throw new InvalidFieldError(
          "data",
          message.data,
          "ends like a checksum suffix",
        );
      }
    }
    return message;
  }
}
