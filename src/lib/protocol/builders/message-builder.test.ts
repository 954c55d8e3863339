import { describe, test, expect } from "vitest";
import { MessageBuilder } from "./message-builder.ts";
import { ReplyEncoder } from "./reply-encoder.ts";
import { ReplyParser } from "../parsers/reply-parser.ts";
import { MessageType } from "../message-types.ts";
import { DeviceStatus, ReplyFlag } from "../reply-flags.ts";
import { InvalidFieldError } from "../../utils/errors.ts";

const encoder = new ReplyEncoder();
const parser = new ReplyParser();

const done = () =>
  MessageBuilder.reply({
    deviceAddress: 1,
    axisNumber: 2,
    replyFlag: ReplyFlag.OK,
    deviceStatus: DeviceStatus.IDLE,
    data: "DONE",
  });

describe("MessageBuilder", () => {
  describe("reply()", () => {
    test("applies defaults for omitted fields", () => {
      expect(done()).toEqual({
        type: MessageType.REPLY,
        deviceAddress: 1,
        axisNumber: 2,
        messageId: null,
        replyFlag: ReplyFlag.OK,
        deviceStatus: DeviceStatus.IDLE,
        warningFlag: "--",
        data: "DONE",
        checksum: null,
      });
    });

    test("equals the parsed wire form", () => {
      expect(done()).toEqual(parser.parse("@01 2 OK IDLE -- DONE\n"));
    });

    test("result is frozen", () => {
      expect(Object.isFrozen(done())).toBe(true);
    });

    test("keeps an explicit warning flag", () => {
      const message = MessageBuilder.reply({
        deviceAddress: 3,
        axisNumber: 1,
        replyFlag: ReplyFlag.REJECTED,
        deviceStatus: DeviceStatus.BUSY,
        warningFlag: "WR",
        data: "BADDATA",
      });
      expect(encoder.encode(message)).toBe("@03 1 RJ BUSY WR BADDATA\n");
    });
  });

  describe("alert()", () => {
    test("applies defaults for omitted fields", () => {
      expect(
        MessageBuilder.alert({
          deviceAddress: 1,
          axisNumber: 1,
          deviceStatus: DeviceStatus.IDLE,
        }),
      ).toEqual({
        type: MessageType.ALERT,
        deviceAddress: 1,
        axisNumber: 1,
        messageId: null,
        deviceStatus: DeviceStatus.IDLE,
        warningFlag: "--",
        data: "",
        checksum: null,
      });
    });
  });

  describe("info()", () => {
    test("applies defaults for omitted fields", () => {
      expect(MessageBuilder.info({ deviceAddress: 1, axisNumber: 0 })).toEqual({
        type: MessageType.INFO,
        deviceAddress: 1,
        axisNumber: 0,
        messageId: null,
        data: "",
        checksum: null,
      });
    });

    test("leading number is allowed when a message id is set", () => {
      const message = MessageBuilder.info({
        deviceAddress: 1,
        axisNumber: 0,
        messageId: 4,
        data: "12 abc",
      });
      expect(parser.parse(encoder.encode(message))).toEqual(message);
    });

    test("rejects data that would be read as a message id", () => {
      expect(() =>
        MessageBuilder.info({ deviceAddress: 1, axisNumber: 0, data: "12 abc" }),
      ).toThrow(InvalidFieldError);
    });
  });

  describe("field validation", () => {
    test("device address out of range", () => {
      for (const deviceAddress of [0, 100, 1.5]) {
        expect(() =>
          MessageBuilder.info({ deviceAddress, axisNumber: 0 }),
        ).toThrow(InvalidFieldError);
      }
    });

    test("error names the field and value", () => {
      try {
        MessageBuilder.info({ deviceAddress: 0, axisNumber: 0 });
        throw new Error("Should have thrown");
      } catch (e) {
        expect(e).toBeInstanceOf(InvalidFieldError);
        if (e instanceof InvalidFieldError) {
          expect(e.field).toBe("deviceAddress");
          expect(e.value).toBe(0);
          expect(e.message).toBe(
            "Invalid deviceAddress 0: must be an integer from 1 to 99",
          );
        }
      }
    });

    test("axis number out of range", () => {
      expect(() =>
        MessageBuilder.info({ deviceAddress: 1, axisNumber: 10 }),
      ).toThrow(InvalidFieldError);
    });

    test("message id out of range", () => {
      for (const messageId of [-1, 256]) {
        expect(() =>
          MessageBuilder.info({ deviceAddress: 1, axisNumber: 0, messageId }),
        ).toThrow(InvalidFieldError);
      }
    });

    test("warning flag must be two characters", () => {
      for (const warningFlag of ["X", "ABC", "- "]) {
        expect(() =>
          MessageBuilder.alert({
            deviceAddress: 1,
            axisNumber: 0,
            deviceStatus: DeviceStatus.IDLE,
            warningFlag,
          }),
        ).toThrow(InvalidFieldError);
      }
    });

    test("data with a line break", () => {
      expect(() =>
        MessageBuilder.info({ deviceAddress: 1, axisNumber: 0, data: "a\nb" }),
      ).toThrow(InvalidFieldError);
    });

    test("checksum must be two hex digits", () => {
      expect(() =>
        MessageBuilder.info({ deviceAddress: 1, axisNumber: 0, checksum: "G1" }),
      ).toThrow(InvalidFieldError);
    });

    test("data ending like a checksum suffix", () => {
      expect(() =>
        MessageBuilder.info({ deviceAddress: 1, axisNumber: 0, data: "x:AB" }),
      ).toThrow("ends like a checksum suffix");
    });
  });

  describe("withChecksum()", () => {
    test("computes the checksum of the encoded body", () => {
      const stamped = MessageBuilder.withChecksum(done());
      expect(stamped.checksum).toBe("95");
      expect(encoder.encode(stamped)).toBe("@01 2 OK IDLE -- DONE:95\n");
    });

    test("stamped message parses back unchanged", () => {
      const stamped = MessageBuilder.withChecksum(
        MessageBuilder.info({ deviceAddress: 2, axisNumber: 0, messageId: 7, data: "hello" }),
      );
      expect(stamped.checksum).toBe("93");
      expect(parser.parse(encoder.encode(stamped))).toEqual(stamped);
    });

    test("returns a frozen copy and leaves the original alone", () => {
      const original = done();
      const stamped = MessageBuilder.withChecksum(original);
      expect(original.checksum).toBeNull();
      expect(stamped).not.toBe(original);
      expect(Object.isFrozen(stamped)).toBe(true);
    });

    test("data ending like a checksum is fine once stamped", () => {
      const stamped = MessageBuilder.withChecksum(
        MessageBuilder.info({ deviceAddress: 1, axisNumber: 0, data: "x:AB", checksum: "00" }),
      );
      expect(parser.parse(encoder.encode(stamped))).toEqual(stamped);
    });
  });

  describe("withoutChecksum()", () => {
    test("clears the checksum", () => {
      const stamped = MessageBuilder.withChecksum(done());
      expect(MessageBuilder.withoutChecksum(stamped)).toEqual(done());
    });
  });
});
