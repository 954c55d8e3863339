import { describe, test, expect } from "vitest";
import { Readable } from "node:stream";
import {
  NO_INPUT_HINT,
  appendChecksum,
  awaitsTerminalInput,
  countFailures,
  decodeLines,
  formatReplyFields,
  formatWarning,
  readLines,
  toCodecConfig,
} from "./app-utils.ts";
import { ReplyCodec } from "../lib/index.ts";

const codec = new ReplyCodec();

describe("readLines()", () => {
  test("splits on LF and CRLF and skips blank lines", async () => {
    const input = Readable.from(["@01 2 OK IDLE -- DONE\r\n\n   \n#01 0 \n"]);
    expect(await readLines(input)).toEqual(["@01 2 OK IDLE -- DONE", "#01 0 "]);
  });

  test("empty input", async () => {
    expect(await readLines(Readable.from([]))).toEqual([]);
  });
});

describe("awaitsTerminalInput()", () => {
  test("no lines on a terminal", () => {
    expect(awaitsTerminalInput([], { isTTY: true })).toBe(true);
  });

  test("no lines on a pipe", () => {
    expect(awaitsTerminalInput([], { isTTY: false })).toBe(false);
    expect(awaitsTerminalInput([], {})).toBe(false);
  });

  test("lines given on a terminal", () => {
    expect(awaitsTerminalInput(["@01 0 OK IDLE -- 0"], { isTTY: true })).toBe(false);
  });

  test("hint names both ways to supply lines", () => {
    expect(NO_INPUT_HINT).toBe(
      "No lines given and stdin is a terminal. Pass reply lines as arguments or pipe them in.",
    );
  });
});

describe("decodeLines()", () => {
  test("decodes each line and re-encodes the successes", () => {
    const decoded = decodeLines(codec, ["@01 2 OK IDLE -- DONE", "@01"]);

    expect(decoded).toHaveLength(2);
    expect(decoded[0]?.raw).toBe("@01 2 OK IDLE -- DONE");
    expect(decoded[0]?.result.ok).toBe(true);
    expect(decoded[0]?.reencoded).toBe("@01 2 OK IDLE -- DONE\n");
    expect(decoded[1]?.result.ok).toBe(false);
    expect(decoded[1]?.reencoded).toBeNull();
  });

  test("countFailures()", () => {
    const decoded = decodeLines(codec, ["@01", "#01 0 hi", "$01 0 x", "@01 0 OK IDLE -- 0:00"]);
    expect(countFailures(decoded)).toBe(3);
  });
});

describe("formatWarning()", () => {
  test("documented flag", () => {
    expect(formatWarning("FS")).toBe("FS (Stalled and stopped)");
  });

  test("undocumented flag", () => {
    expect(formatWarning("ZZ")).toBe("ZZ (Undocumented flag)");
  });
});

describe("formatReplyFields()", () => {
  test("rejected reply", () => {
    expect(formatReplyFields(codec.parse("@01 0 RJ BUSY WR BADDATA"))).toEqual([
      { label: "Type", value: "Reply (@)" },
      { label: "Device", value: "1" },
      { label: "Axis", value: "0 (whole device)" },
      { label: "Message ID", value: "-" },
      { label: "Reply", value: "RJ (rejected)" },
      { label: "Status", value: "BUSY" },
      { label: "Warning", value: "WR (No reference position)" },
      { label: "Data", value: "BADDATA" },
      { label: "Checksum", value: "-" },
    ]);
  });

  test("alert with message id", () => {
    expect(formatReplyFields(codec.parse("!01 1 12 IDLE FS"))).toEqual([
      { label: "Type", value: "Alert (!)" },
      { label: "Device", value: "1" },
      { label: "Axis", value: "1" },
      { label: "Message ID", value: "12" },
      { label: "Status", value: "IDLE" },
      { label: "Warning", value: "FS (Stalled and stopped)" },
      { label: "Data", value: "<empty>" },
      { label: "Checksum", value: "-" },
    ]);
  });

  test("info with checksum", () => {
    expect(formatReplyFields(codec.parse("#02 0 hello:1A"))).toEqual([
      { label: "Type", value: "Info (#)" },
      { label: "Device", value: "2" },
      { label: "Axis", value: "0 (whole device)" },
      { label: "Message ID", value: "-" },
      { label: "Data", value: "hello" },
      { label: "Checksum", value: "1A" },
    ]);
  });
});

describe("appendChecksum()", () => {
  test("reply line", () => {
    expect(appendChecksum("@01 2 OK IDLE -- DONE")).toEqual({
      checksum: "95",
      line: "@01 2 OK IDLE -- DONE:95",
    });
  });

  test("command line", () => {
    expect(appendChecksum("/1 0 home")).toEqual({
      checksum: "B6",
      line: "/1 0 home:B6",
    });
  });

  test("bare body", () => {
    expect(appendChecksum("01 0 ")).toEqual({ checksum: "2F", line: "01 0 :2F" });
  });
});

describe("toCodecConfig()", () => {
  test("defaults", () => {
    expect(toCodecConfig({ crlf: false, strictChecksumCase: false })).toEqual({
      lineTerminator: "\n",
      checksumCase: "any",
    });
  });

  test("CRLF and strict checksum case", () => {
    expect(toCodecConfig({ crlf: true, strictChecksumCase: true })).toEqual({
      lineTerminator: "\r\n",
      checksumCase: "upper",
    });
  });
});
