import { Box, Text } from "ink";
import type React from "react";
import { formatReplyFields, type DecodedLine } from "../utils/app-utils.ts";

interface ReplyDetailsProps {
  line: DecodedLine;
  index: number;
  verbose: boolean;
}

export const ReplyDetails: React.FC<ReplyDetailsProps> = ({
  line,
  index,
  verbose,
}) => {
  const { result } = line;

  return (
    <Box flexDirection="column" marginBottom={1}>
      <Box>
        <Text color="dim">[{index + 1}] </Text>
        <Text color={result.ok ? "green" : "red"}>
          {result.ok ? "✓" : "✗"}{" "}
        </Text>
        <Text>{line.raw}</Text>
      </Box>

      {result.ok ? (
        <Box paddingLeft={4} flexDirection="column">
          {formatReplyFields(result.message).map((row) => (
            <Box key={row.label}>
              <Box width={12}>
                <Text color="gray">{row.label}:</Text>
              </Box>
              <Text>{row.value}</Text>
            </Box>
          ))}

          {verbose && line.reencoded !== null && (
            <Box>
              <Box width={12}>
                <Text color="gray">Encoded:</Text>
              </Box>
              <Text color="dim">{JSON.stringify(line.reencoded)}</Text>
            </Box>
          )}
        </Box>
      ) : (
        <Box paddingLeft={4}>
          <Text color="red" bold>
            {result.error.kind}
          </Text>
          <Text color="gray"> {result.error.message}</Text>
        </Box>
      )}
    </Box>
  );
};
