/**
 * Tempdeck Commands
 * G-code style command lines understood by the firmware
 */

export const TempdeckCommand = {
  /** Report firmware info: "model:.. serial:.. version:.." */
  IDENTIFY: "M115",
  /** Set setpoint and activate heating/cooling */
  SET_TARGET: "M104",
  /** Report temperatures: "C:<current> T:<target|none>" */
  GET_TEMPS: "M105",
  /** Disable heating/cooling */
  DEACTIVATE: "M18",
} as const;

/** Literal line the firmware sends (twice) after every command */
export const ACK = "ok";
export const ACK_LINES = 2;

/** Commands end in CRLF; responses end in LF */
export const COMMAND_TERMINATOR = "\r\n";

// Exact value of the double, ties to even, never exponent notation
const TEMPERATURE_FORMAT = new Intl.NumberFormat("en-US", {
  useGrouping: false,
  minimumFractionDigits: 3,
  maximumFractionDigits: 3,
  roundingMode: "halfEven",
});

/**
 * Format a temperature the way the firmware expects it: 3 fixed decimals
 */
export function formatTemperature(temp: number): string {
  if (Number.isNaN(temp)) return "nan";
  if (temp === Infinity) return "inf";
  if (temp === -Infinity) return "-inf";
  return TEMPERATURE_FORMAT.format(temp);
}

export function setTargetCommand(temp: number): string {
  return `${TempdeckCommand.SET_TARGET} S${formatTemperature(temp)}`;
}

/**
 * Encode a command line as ASCII bytes, terminator included
 */
export function encodeCommand(cmd: string): Uint8Array {
  return new Uint8Array(Buffer.from(`${cmd}${COMMAND_TERMINATOR}`, "ascii"));
}
