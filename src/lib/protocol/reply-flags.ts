/**
 * Whether a device accepted the command it is replying to
 */
export enum ReplyFlag {
  /**
   * The command was valid and has been executed (or started)
   */
  OK = "OK",

  /**
   * The command was rejected
   *
   * The data field holds the reason, e.g. `BADDATA` or `BADCOMMAND`.
   */
  REJECTED = "RJ",
}

/**
 * Motion state of the replying axis (or of any axis, for device scope)
 */
export enum DeviceStatus {
  BUSY = "BUSY",
  IDLE = "IDLE",
}

/**
 * Documented warning flags
 *
 * Flags starting with `F` are faults, `W` warnings and `N` notices. A reply
 * shows only the highest priority flag; the device reports the full list in
 * answer to a `warnings` command.
 *
 * Devices may send codes that are not listed here; the parser accepts any
 * two characters.
 */
export enum WarningFlag {
  NONE = "--",
  DRIVER_DISABLED = "FD",
  ENCODER_ERROR = "FQ",
  STALLED = "FS",
  EXCESSIVE_TWIST = "FT",
  STREAM_BOUNDS_ERROR = "FB",
  INTERPOLATED_PATH_DEVIATION = "FP",
  LIMIT_ERROR = "FE",
  NOT_HOMED = "WH",
  UNEXPECTED_LIMIT_TRIGGER = "WL",
  INVALID_CALIBRATION_TYPE = "WP",
  VOLTAGE_OUT_OF_RANGE = "WV",
  SYSTEM_TEMPERATURE_HIGH = "WT",
  DISPLACED_WHEN_STATIONARY = "WM",
  NO_REFERENCE_POSITION = "WR",
  MANUAL_CONTROL = "NC",
  MOVEMENT_INTERRUPTED = "NI",
  STREAM_DISCONTINUITY = "ND",
  SETTING_UPDATE_PENDING = "NU",
  JOYSTICK_CALIBRATING = "NJ",
}

const WARNING_DESCRIPTIONS: Readonly<Record<WarningFlag, string>> = {
  [WarningFlag.NONE]: "No warnings",
  [WarningFlag.DRIVER_DISABLED]: "Driver disabled",
  [WarningFlag.ENCODER_ERROR]: "Encoder error",
  [WarningFlag.STALLED]: "Stalled and stopped",
  [WarningFlag.EXCESSIVE_TWIST]: "Excessive twist",
  [WarningFlag.STREAM_BOUNDS_ERROR]: "Stream bounds error",
  [WarningFlag.INTERPOLATED_PATH_DEVIATION]: "Interpolated path deviation",
  [WarningFlag.LIMIT_ERROR]: "Limit error",
  [WarningFlag.NOT_HOMED]: "Device not homed",
  [WarningFlag.UNEXPECTED_LIMIT_TRIGGER]: "Unexpected limit trigger",
  [WarningFlag.INVALID_CALIBRATION_TYPE]: "Invalid calibration type",
  [WarningFlag.VOLTAGE_OUT_OF_RANGE]: "Voltage out of range",
  [WarningFlag.SYSTEM_TEMPERATURE_HIGH]: "System temperature high",
  [WarningFlag.DISPLACED_WHEN_STATIONARY]: "Displaced when stationary",
  [WarningFlag.NO_REFERENCE_POSITION]: "No reference position",
  [WarningFlag.MANUAL_CONTROL]: "Manual control",
  [WarningFlag.MOVEMENT_INTERRUPTED]: "Movement interrupted",
  [WarningFlag.STREAM_DISCONTINUITY]: "Stream discontinuity",
  [WarningFlag.SETTING_UPDATE_PENDING]: "Setting update pending",
  [WarningFlag.JOYSTICK_CALIBRATING]: "Joystick calibrating",
};

function isWarningFlag(flag: string): flag is WarningFlag {
  return Object.prototype.hasOwnProperty.call(WARNING_DESCRIPTIONS, flag);
}

/**
 * Returns a readable description of a warning flag
 *
 * @param flag - Two-character flag from a reply or alert
 * @returns Description, or null if the flag is not documented
 */
export function describeWarningFlag(flag: string): string | null {
  return isWarningFlag(flag) ? WARNING_DESCRIPTIONS[flag] : null;
}

export function toReplyFlag(value: string): ReplyFlag | null {
  switch (value) {
    case ReplyFlag.OK:
      return ReplyFlag.OK;
    case ReplyFlag.REJECTED:
      return ReplyFlag.REJECTED;
    default:
      return null;
  }
}

export function toDeviceStatus(value: string): DeviceStatus | null {
  switch (value) {
    case DeviceStatus.BUSY:
      return DeviceStatus.BUSY;
    case DeviceStatus.IDLE:
      return DeviceStatus.IDLE;
    default:
      return null;
  }
}
