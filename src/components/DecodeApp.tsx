import { useEffect } from "react";
import type React from "react";
import { Box, Text, useApp } from "ink";
import Spinner from "ink-spinner";
import { Header, ReplyDetails } from "./index.ts";
import { useDecodedLines } from "../hooks/useDecodedLines.ts";
import { countFailures } from "../utils/app-utils.ts";
import type { ReplyCodec } from "../lib/index.ts";

export interface DecodeAppProps {
  lines: string[];
  input: NodeJS.ReadableStream;
  codec: ReplyCodec;
  verbose: boolean;
}

export const DecodeApp: React.FC<DecodeAppProps> = ({
  lines,
  input,
  codec,
  verbose,
}) => {
  const { exit } = useApp();
  const { loading, error, decoded } = useDecodedLines(lines, input, codec);
  const failures = countFailures(decoded);

  useEffect(() => {
    if (!loading) {
      // Give time for the final render, then exit
      const timer = setTimeout(() => {
        process.exitCode = error || failures > 0 ? 1 : 0;
        exit();
      }, 100);
      return () => clearTimeout(timer);
    }
  }, [loading, error, failures, exit]);

  return (
    <Box flexDirection="column" padding={1}>
      <Header />

      {loading && (
        <Box>
          <Text color="cyan">
            <Spinner type="dots" />
          </Text>
          <Text color="cyan" bold>
            {" "}
            Reading lines from stdin...
          </Text>
        </Box>
      )}

      {error && (
        <Box flexDirection="column">
          <Text color="red" bold>
            ✗ Could not read input
          </Text>
          <Text color="gray">{error}</Text>
        </Box>
      )}

      {!loading && !error && (
        <Box flexDirection="column">
          {decoded.map((line, index) => (
            <ReplyDetails
              key={index}
              line={line}
              index={index}
              verbose={verbose}
            />
          ))}

          {decoded.length === 0 && (
            <Text color="yellow">⚠ No lines to decode</Text>
          )}

          {decoded.length > 0 && (
            <Text color={failures > 0 ? "red" : "green"}>
              {decoded.length - failures} of {decoded.length} line(s) parsed
            </Text>
          )}
        </Box>
      )}
    </Box>
  );
};
