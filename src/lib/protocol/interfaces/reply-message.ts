import type { MessageType } from "../message-types.ts";
import type { DeviceStatus, ReplyFlag } from "../reply-flags.ts";

/**
 * Fields shared by every message type
 */
interface MessageFields {
  /**
   * Address of the device that sent the message (1-99)
   */
  readonly deviceAddress: number;

  /**
   * Axis the message refers to (0-9)
   *
   * 0 means the device as a whole.
   */
  readonly axisNumber: number;

  /**
   * Correlation id copied from the command (0-255)
   *
   * null when the line carried no id. 0 is a valid id.
   */
  readonly messageId: number | null;

  /**
   * Free-form payload, possibly empty or containing spaces
   */
  readonly data: string;

  /**
   * Two hex digits exactly as they appeared on the wire
   *
   * null when the line had no checksum suffix. Encoding writes this value
   * back unchanged; it is never recomputed implicitly.
   */
  readonly checksum: string | null;
}

/**
 * Direct answer to a command (`@`)
 */
export interface CommandReply extends MessageFields {
  readonly type: MessageType.REPLY;
  readonly replyFlag: ReplyFlag;
  readonly deviceStatus: DeviceStatus;
  /** Two characters, "--" when there is no warning */
  readonly warningFlag: string;
}

/**
 * Unsolicited alert (`!`)
 */
export interface AlertMessage extends MessageFields {
  readonly type: MessageType.ALERT;
  readonly deviceStatus: DeviceStatus;
  /** Two characters, "--" when there is no warning */
  readonly warningFlag: string;
}

/**
 * Informational line (`#`)
 */
export interface InfoMessage extends MessageFields {
  readonly type: MessageType.INFO;
}

/**
 * One line received from (or destined to) a device on the bus
 *
 * Narrow on `type` to reach the variant-specific fields.
 */
export type ReplyMessage = CommandReply | AlertMessage | InfoMessage;
