export type {
  CodecConfig,
  ChecksumCase,
  LineTerminator,
} from "./config.ts";
export { DEFAULT_CODEC_CONFIG, resolveCodecConfig } from "./defaults.ts";
export type { ChecksumCheck, ParseResult } from "./parse-result.ts";
export type {
  AlertMessage,
  CommandReply,
  InfoMessage,
  ReplyMessage,
} from "./reply-message.ts";
