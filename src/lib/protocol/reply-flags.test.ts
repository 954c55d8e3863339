import { describe, test, expect } from "vitest";
import {
  DeviceStatus,
  ReplyFlag,
  WarningFlag,
  describeWarningFlag,
  toDeviceStatus,
  toReplyFlag,
} from "./reply-flags.ts";
import { MessageType, toMessageType } from "./message-types.ts";

describe("describeWarningFlag()", () => {
  test("no warning", () => {
    expect(describeWarningFlag("--")).toBe("No warnings");
  });

  test("documented flags", () => {
    expect(describeWarningFlag(WarningFlag.STALLED)).toBe("Stalled and stopped");
    expect(describeWarningFlag("WR")).toBe("No reference position");
    expect(describeWarningFlag("NI")).toBe("Movement interrupted");
  });

  test("every flag has a description", () => {
    for (const flag of Object.values(WarningFlag)) {
      expect(describeWarningFlag(flag)).not.toBeNull();
    }
  });

  test("undocumented flag", () => {
    expect(describeWarningFlag("ZZ")).toBeNull();
  });

  test("inherited object keys are not flags", () => {
    expect(describeWarningFlag("constructor")).toBeNull();
  });

  test("lookup is case-sensitive", () => {
    expect(describeWarningFlag("fs")).toBeNull();
  });
});

describe("toReplyFlag()", () => {
  test("known flags", () => {
    expect(toReplyFlag("OK")).toBe(ReplyFlag.OK);
    expect(toReplyFlag("RJ")).toBe(ReplyFlag.REJECTED);
  });

  test("unknown flag", () => {
    expect(toReplyFlag("ok")).toBeNull();
  });
});

describe("toDeviceStatus()", () => {
  test("known statuses", () => {
    expect(toDeviceStatus("BUSY")).toBe(DeviceStatus.BUSY);
    expect(toDeviceStatus("IDLE")).toBe(DeviceStatus.IDLE);
  });

  test("unknown status", () => {
    expect(toDeviceStatus("WAIT")).toBeNull();
  });
});

describe("toMessageType()", () => {
  test("type tags", () => {
    expect(toMessageType("@")).toBe(MessageType.REPLY);
    expect(toMessageType("!")).toBe(MessageType.ALERT);
    expect(toMessageType("#")).toBe(MessageType.INFO);
  });

  test("command tag is not a reply type", () => {
    expect(toMessageType("/")).toBeNull();
  });
});
