import { createInterface } from "node:readline";
import {
  CHECKSUM_DELIMITER,
  MessageType,
  ReplyFlag,
  computeChecksum,
  describeWarningFlag,
  type CodecConfig,
  type ParseResult,
  type ReplyCodec,
  type ReplyMessage,
} from "../lib/index.ts";
import type { DecodeOptions } from "../cli/types.ts";

export interface DecodedLine {
  raw: string;
  result: ParseResult;
  /** The message encoded again, null when parsing failed */
  reencoded: string | null;
}

export interface FieldRow {
  label: string;
  value: string;
}

const TYPE_NAMES: Record<MessageType, string> = {
  [MessageType.REPLY]: "Reply",
  [MessageType.ALERT]: "Alert",
  [MessageType.INFO]: "Info",
};

// Tags that may lead a body passed to `checksum`, including `/` for commands
const TYPE_TAG_PATTERN = /^[@!#/]/;

export async function readLines(input: NodeJS.ReadableStream): Promise<string[]> {
  const lines: string[] = [];
  const reader = createInterface({ input, crlfDelay: Infinity });

  for await (const line of reader) {
    if (line.trim() !== "") {
      lines.push(line);
    }
  }

  return lines;
}

export const NO_INPUT_HINT =
  "No lines given and stdin is a terminal. Pass reply lines as arguments or pipe them in.";

/**
 * Whether decoding would wait on a terminal for input nobody is piping in
 */
export function awaitsTerminalInput(
  lines: string[],
  input: { isTTY?: boolean },
): boolean {
  return lines.length === 0 && input.isTTY === true;
}

export function decodeLines(codec: ReplyCodec, lines: string[]): DecodedLine[] {
  return lines.map((raw) => {
    const result = codec.tryParse(raw);
    return {
      raw,
      result,
      reencoded: result.ok ? codec.encode(result.message) : null,
    };
  });
}

export function countFailures(decoded: DecodedLine[]): number {
  return decoded.filter((line) => !line.result.ok).length;
}

export function formatWarning(flag: string): string {
  return `${flag} (${describeWarningFlag(flag) ?? "Undocumented flag"})`;
}

export function formatReplyFields(message: ReplyMessage): FieldRow[] {
  const rows: FieldRow[] = [
    { label: "Type", value: `${TYPE_NAMES[message.type]} (${message.type})` },
    { label: "Device", value: String(message.deviceAddress) },
    {
      label: "Axis",
      value:
        message.axisNumber === 0 ? "0 (whole device)" : String(message.axisNumber),
    },
    {
      label: "Message ID",
      value: message.messageId === null ? "-" : String(message.messageId),
    },
  ];

  if (message.type === MessageType.REPLY) {
    rows.push({
      label: "Reply",
      value:
        message.replyFlag === ReplyFlag.OK ? "OK (accepted)" : "RJ (rejected)",
    });
  }

  if (message.type !== MessageType.INFO) {
    rows.push({ label: "Status", value: message.deviceStatus });
    rows.push({ label: "Warning", value: formatWarning(message.warningFlag) });
  }

  rows.push({ label: "Data", value: message.data === "" ? "<empty>" : message.data });
  rows.push({ label: "Checksum", value: message.checksum ?? "-" });

  return rows;
}

/**
 * Computes the checksum for a body, ignoring a leading type tag
 */
export function appendChecksum(input: string): { checksum: string; line: string } {
  const tag = TYPE_TAG_PATTERN.test(input) ? input.charAt(0) : "";
  const body = input.slice(tag.length);
  const checksum = computeChecksum(body);
  return { checksum, line: `${tag}${body}${CHECKSUM_DELIMITER}${checksum}` };
}

export function toCodecConfig(options: DecodeOptions): Partial<CodecConfig> {
  return {
    lineTerminator: options.crlf ? "\r\n" : "\n",
    checksumCase: options.strictChecksumCase ? "upper" : "any",
  };
}
