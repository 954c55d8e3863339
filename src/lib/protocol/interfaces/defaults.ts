import type { CodecConfig } from "./config.ts";

/**
 * Default codec configuration
 *
 * - lineTerminator: "\n" - a single line feed after every encoded line
 * - checksumCase: "any" - lowercase checksums from hand-written input are accepted
 */
export const DEFAULT_CODEC_CONFIG: Readonly<CodecConfig> = Object.freeze({
  lineTerminator: "\n",
  checksumCase: "any",
});

/**
 * Merges caller overrides onto the default configuration
 *
 * @param overrides - Settings to change, may be empty
 * @returns A frozen, complete configuration
 */
export function resolveCodecConfig(
  overrides: Partial<CodecConfig> = {},
): Readonly<CodecConfig> {
  return Object.freeze({ ...DEFAULT_CODEC_CONFIG, ...overrides });
}
