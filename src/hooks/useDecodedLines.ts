import { useEffect, useRef, useState } from "react";
import type { ReplyCodec } from "../lib/index.ts";
import { decodeLines, readLines, type DecodedLine } from "../utils/app-utils.ts";

/**
 * Decodes the given lines, or every line of `input` when none are given
 */
export function useDecodedLines(
  lines: string[],
  input: NodeJS.ReadableStream,
  codec: ReplyCodec,
) {
  const [loading, setLoading] = useState<boolean>(true);
  const [error, setError] = useState<string | null>(null);
  const [decoded, setDecoded] = useState<DecodedLine[]>([]);
  const hasStarted = useRef(false);

  useEffect(() => {
    if (hasStarted.current) {
      return;
    }
    hasStarted.current = true;

    const source = lines.length > 0 ? Promise.resolve(lines) : readLines(input);

    void source
      .then((received) => {
        setDecoded(decodeLines(codec, received));
        setLoading(false);
      })
      .catch((err: unknown) => {
        setError(err instanceof Error ? err.message : String(err));
        setLoading(false);
      });
  }, [lines, input, codec]);

  return { loading, error, decoded };
}
