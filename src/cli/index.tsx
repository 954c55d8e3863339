import { Command } from "commander";
import { ReplyCodec } from "../lib/index.ts";
import { LogLevel, logger } from "../lib/utils/logger.ts";
import {
  NO_INPUT_HINT,
  appendChecksum,
  awaitsTerminalInput,
  toCodecConfig,
} from "../utils/app-utils.ts";
import type { DecodeOptions, GlobalOptions } from "./types.ts";

/**
 * @param input Stream `decode` reads when no lines are given
 */
export function setupCLI(
  input: NodeJS.ReadableStream & { isTTY?: boolean } = process.stdin,
) {
  const program = new Command();

  program
    .name("stagectl")
    .description("Decode and inspect replies from ASCII motion controllers")
    .version("1.0.0")
    .option("-v, --verbose", "Show codec events including raw lines", false);

  program
    .command("decode [lines...]")
    .description(
      "Parse reply lines given as arguments, or one per line from stdin",
    )
    .option("--crlf", "Re-encode lines with CRLF terminators", false)
    .option(
      "--strict-checksum-case",
      "Reject checksums written in lowercase",
      false,
    )
    .action(async (lines: string[], options: DecodeOptions) => {
      const { verbose } = program.opts<GlobalOptions>();

      if (awaitsTerminalInput(lines, input)) {
        program.error(NO_INPUT_HINT, { exitCode: 1, code: "stagectl.noInput" });
      }

      if (verbose) {
        logger.setLevel(LogLevel.DEBUG);
      }

      const codec = new ReplyCodec(toCodecConfig(options), logger);

      const { DecodeApp } = await import("../components/DecodeApp.tsx");
      const { render } = await import("ink");
      render(
        <DecodeApp
          lines={lines}
          input={input}
          codec={codec}
          verbose={verbose}
        />,
      );
    });

  program
    .command("checksum <body>")
    .description(
      "Print the checksum of a message body and the line with it appended",
    )
    .action((body: string) => {
      const { checksum, line } = appendChecksum(body);
      console.log(checksum);
      console.log(line);
    });

  return program;
}
