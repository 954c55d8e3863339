import {
  CHECKSUM_DELIMITER,
  CHECKSUM_LENGTH,
  MAX_DEVICE_ADDRESS,
  MAX_MESSAGE_ID,
  MIN_DEVICE_ADDRESS,
  MIN_FRAME_LENGTH,
} from "../constants.ts";
import { verifyChecksum } from "../checksum.ts";
import type { CodecConfig } from "../interfaces/config.ts";
import { DEFAULT_CODEC_CONFIG } from "../interfaces/defaults.ts";
import type { ParseResult } from "../interfaces/parse-result.ts";
import type {
  AlertMessage,
  CommandReply,
  InfoMessage,
  ReplyMessage,
} from "../interfaces/reply-message.ts";
import { MessageType, toMessageType } from "../message-types.ts";
import { toDeviceStatus, toReplyFlag } from "../reply-flags.ts";
import {
  ChecksumMismatchError,
  MalformedMessageError,
  TooShortError,
  UnknownMessageTypeError,
  type ReplyParseError,
} from "../../utils/errors.ts";

interface AddressFields {
  deviceAddress: number;
  axisNumber: number;
  messageId: number | null;
}

const failure = (error: ReplyParseError): ParseResult => ({ ok: false, error });
const success = (message: ReplyMessage): ParseResult => ({ ok: true, message });

/**
 * Parser for lines received from a device
 *
 * Turns one raw line into a frozen ReplyMessage. Parsing is all-or-nothing:
 * a line that fails any check yields an error and no message.
 */
export class ReplyParser {
  // Groups: address, axis, message id, reply flag, status, warning flag, data
  private static readonly REPLY_PATTERN =
    /^@(\d{1,2}) (\d) (?:(\d{1,3}) )?(OK|RJ) (BUSY|IDLE) (\S{2}) (.*)$/;

  // Groups: address, axis, message id, data
  private static readonly INFO_PATTERN = /^#(\d{1,2}) (\d) (?:(\d{1,3}) )?(.*)$/;

  // Groups: address, axis, message id, status, warning flag, data
  // A separator after the warning flag must be followed by data
  private static readonly ALERT_PATTERN =
    /^!(\d{1,2}) (\d) (?:(\d{1,3}) )?(BUSY|IDLE) (\S{2})(?: (.+))?$/;

  /**
   * Creates a new ReplyParser instance.
   * @param config Codec configuration; only `checksumCase` affects parsing
   */
  constructor(private config: Readonly<CodecConfig> = DEFAULT_CODEC_CONFIG) {}

  /**
   * Parses one line without throwing
   *
   * Steps, in order: strip CR/LF, check the minimum length, split off and
   * verify the checksum, then match the layout selected by the type tag.
   *
   * @param rawLine - Line as read from the transport, terminator optional
   * @returns The message, or the first error encountered
   */
  public tryParse(rawLine: string): ParseResult {
    const line = ReplyParser.stripTerminator(rawLine);

    if (line.length < MIN_FRAME_LENGTH) {
      return failure(new TooShortError(line, MIN_FRAME_LENGTH));
    }

    let body = line;
    let checksum: string | null = null;

    const delimiterIndex = line.length - CHECKSUM_LENGTH - 1;
    if (line.charAt(delimiterIndex) === CHECKSUM_DELIMITER) {
      checksum = line.slice(delimiterIndex + 1);
      body = line.slice(0, delimiterIndex);

      // The type tag is not covered by the checksum
      const check = verifyChecksum(
        body.slice(1),
        checksum,
        this.config.checksumCase,
      );
      if (!check.valid) {
        return failure(new ChecksumMismatchError(line, checksum, check.expected));
      }
    }

    const tag = body.charAt(0);
    switch (toMessageType(tag)) {
      case MessageType.REPLY:
        return ReplyParser.parseReply(line, body, checksum);
      case MessageType.INFO:
        return ReplyParser.parseInfo(line, body, checksum);
      case MessageType.ALERT:
        return ReplyParser.parseAlert(line, body, checksum);
      case null:
        return failure(new UnknownMessageTypeError(line, tag));
    }
  }

  /**
   * Parses one line
   *
   * @param rawLine - Line as read from the transport, terminator optional
   * @returns The parsed message
   * @throws {ReplyParseError} If the line is not a valid message
   */
  public parse(rawLine: string): ReplyMessage {
    const result = this.tryParse(rawLine);
    if (!result.ok) {
      throw result.error;
    }
    return result.message;
  }

  private static parseReply(
    line: string,
    body: string,
    checksum: string | null,
  ): ParseResult {
    const match = ReplyParser.REPLY_PATTERN.exec(body);
    const address = match && ReplyParser.readAddressFields(match);
    if (!match || !address) {
      return ReplyParser.malformed(line, MessageType.REPLY, "reply");
    }

    const [, , , , flagText = "", statusText = "", warningFlag = "", data = ""] =
      match;
    const replyFlag = toReplyFlag(flagText);
    const deviceStatus = toDeviceStatus(statusText);
    if (!replyFlag || !deviceStatus) {
      return ReplyParser.malformed(line, MessageType.REPLY, "reply");
    }

    const message: CommandReply = Object.freeze({
      type: MessageType.REPLY,
      ...address,
      replyFlag,
      deviceStatus,
      warningFlag,
      data,
      checksum,
    });
    return success(message);
  }

  private static parseInfo(
    line: string,
    body: string,
    checksum: string | null,
  ): ParseResult {
    const match = ReplyParser.INFO_PATTERN.exec(body);
    const address = match && ReplyParser.readAddressFields(match);
    if (!match || !address) {
      return ReplyParser.malformed(line, MessageType.INFO, "info message");
    }

    const message: InfoMessage = Object.freeze({
      type: MessageType.INFO,
      ...address,
      data: match[4] ?? "",
      checksum,
    });
    return success(message);
  }

  private static parseAlert(
    line: string,
    body: string,
    checksum: string | null,
  ): ParseResult {
    const match = ReplyParser.ALERT_PATTERN.exec(body);
    const address = match && ReplyParser.readAddressFields(match);
    if (!match || !address) {
      return ReplyParser.malformed(line, MessageType.ALERT, "alert");
    }

    const [, , , , statusText = "", warningFlag = "", data = ""] = match;
    const deviceStatus = toDeviceStatus(statusText);
    if (!deviceStatus) {
      return ReplyParser.malformed(line, MessageType.ALERT, "alert");
    }

    const message: AlertMessage = Object.freeze({
      type: MessageType.ALERT,
      ...address,
      deviceStatus,
      warningFlag,
      data,
      checksum,
    });
    return success(message);
  }

  private static malformed(
    line: string,
    type: MessageType,
    description: string,
  ): ParseResult {
    return failure(
      new MalformedMessageError(
        `Failed to parse ${description}: ${line}`,
        line,
        type,
      ),
    );
  }

  /**
   * Reads the address, axis and optional message id from the first three
   * groups of a layout match
   *
   * @returns The fields, or null if a value is outside its range
   */
  private static readAddressFields(match: RegExpExecArray): AddressFields | null {
    const [, addressText, axisText, messageIdText] = match;
    if (addressText === undefined || axisText === undefined) {
      return null;
    }

    const deviceAddress = parseInt(addressText, 10);
    const axisNumber = parseInt(axisText, 10);
    const messageId =
      messageIdText !== undefined ? parseInt(messageIdText, 10) : null;

    if (deviceAddress < MIN_DEVICE_ADDRESS || deviceAddress > MAX_DEVICE_ADDRESS) {
      return null;
    }
    if (messageId !== null && messageId > MAX_MESSAGE_ID) {
      return null;
    }

    return { deviceAddress, axisNumber, messageId };
  }

  /**
   * Removes CR and LF characters from both ends of a line
   */
  private static stripTerminator(rawLine: string): string {
    return rawLine.replace(/^[\r\n]+|[\r\n]+$/g, "");
  }
}
