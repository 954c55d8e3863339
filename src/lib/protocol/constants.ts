/**
 * Separator between the message body and its two-digit checksum (`:`)
 *
 * When present it is always the third character from the end of a line,
 * once the line terminator has been removed.
 */
export const CHECKSUM_DELIMITER = ":";

/**
 * Number of hex digits in a checksum suffix
 */
export const CHECKSUM_LENGTH = 2;

/**
 * Separator between fields of a message body (a single space)
 */
export const FIELD_DELIMITER = " ";

/**
 * Shortest line that can still hold a type tag, device address and axis
 *
 * Example: `@1 0` padded to `@01 0`.
 */
export const MIN_FRAME_LENGTH = 5;

/**
 * Warning flag sent by a device when nothing needs attention
 */
export const NO_WARNING = "--";

export const MIN_DEVICE_ADDRESS = 1;
export const MAX_DEVICE_ADDRESS = 99;
export const MAX_AXIS_NUMBER = 9;
export const MAX_MESSAGE_ID = 255;
