import type { CodecConfig } from "./interfaces/config.ts";
import { resolveCodecConfig } from "./interfaces/defaults.ts";
import type { ParseResult } from "./interfaces/parse-result.ts";
import type { ReplyMessage } from "./interfaces/reply-message.ts";
import { ReplyEncoder } from "./builders/reply-encoder.ts";
import { ReplyParser } from "./parsers/reply-parser.ts";
import { LogEventType, type Logger } from "../utils/logger.ts";

/**
 * Bidirectional codec between wire lines and ReplyMessage values
 *
 * Holds only its configuration and an optional logger, both fixed at
 * construction, so one instance can serve any number of callers.
 */
export class ReplyCodec {
  public readonly config: Readonly<CodecConfig>;
  private readonly parser: ReplyParser;
  private readonly encoder: ReplyEncoder;

  /**
   * @param config Overrides for DEFAULT_CODEC_CONFIG
   * @param logger Receives parse and encode events; nothing is logged without one
   */
  constructor(
    config: Partial<CodecConfig> = {},
    private readonly logger: Logger | null = null,
  ) {
    this.config = resolveCodecConfig(config);
    this.parser = new ReplyParser(this.config);
    this.encoder = new ReplyEncoder(this.config);
  }

  /**
   * Parses one line without throwing
   */
  public tryParse(rawLine: string): ParseResult {
    this.logger?.debug(
      `[RECV] ${JSON.stringify(rawLine)}`,
      LogEventType.LINE_RECEIVED,
      rawLine,
    );

    const result = this.parser.tryParse(rawLine);
    if (result.ok) {
      this.logger?.debug(
        `[PARSED] ${result.message.type} device ${result.message.deviceAddress} axis ${result.message.axisNumber}`,
        LogEventType.REPLY_PARSED,
        result.message,
      );
    } else {
      this.logger?.warning(
        `[REJECTED] ${result.error.kind}: ${result.error.message}`,
        LogEventType.PARSE_FAILED,
        result.error,
      );
    }
    return result;
  }

  /**
   * Parses one line
   * @throws {ReplyParseError} If the line is not a valid message
   */
  public parse(rawLine: string): ReplyMessage {
    const result = this.tryParse(rawLine);
    if (!result.ok) {
      throw result.error;
    }
    return result.message;
  }

  /**
   * Encodes a message as a terminated wire line
   */
  public encode(message: ReplyMessage): string {
    const line = this.encoder.encode(message);
    this.logger?.debug(
      `[ENCODED] ${JSON.stringify(line)}`,
      LogEventType.REPLY_ENCODED,
      message,
    );
    return line;
  }

  /**
   * Same as encode
   */
  public stringify(message: ReplyMessage): string {
    return this.encode(message);
  }
}

const defaultCodec = new ReplyCodec();

/**
 * Parses one line with the default configuration
 * @throws {ReplyParseError} If the line is not a valid message
 */
export function parse(rawLine: string): ReplyMessage {
  return defaultCodec.parse(rawLine);
}

export function tryParse(rawLine: string): ParseResult {
  return defaultCodec.tryParse(rawLine);
}

/**
 * Encodes a message with the default configuration (LF terminated)
 */
export function encode(message: ReplyMessage): string {
  return defaultCodec.encode(message);
}

export const stringify = encode;
