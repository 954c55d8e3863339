// Constants
export * from "./constants.ts";

// Enums
export * from "./message-types.ts";
export * from "./reply-flags.ts";

// Interfaces and configs
export * from "./interfaces/index.ts";

// Checksum
export { computeChecksum, verifyChecksum } from "./checksum.ts";

// Builders
export {
  MessageBuilder,
  type AlertInput,
  type CommandReplyInput,
  type InfoInput,
  type MessageInput,
} from "./builders/message-builder.ts";
export { ReplyEncoder } from "./builders/reply-encoder.ts";

// Parsers
export { ReplyParser } from "./parsers/reply-parser.ts";

// Codec
export { ReplyCodec, parse, tryParse, encode, stringify } from "./codec.ts";
