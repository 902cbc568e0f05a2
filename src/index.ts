/**
 * Tempdeck driver
 * Library entry point
 */

export {
  TempdeckControl,
  type DeviceIdentity,
  type TemperatureReading,
  type ConnectedDevice,
  type TempdeckOptions,
  type DiscoveryOptions,
  type OpenOptions,
  type TransportOpener,
} from "./tempdeck/control";

export { LineProtocol } from "./protocol/engine";
export {
  TempdeckCommand,
  ACK,
  formatTemperature,
  setTargetCommand,
  encodeCommand,
} from "./protocol/commands";
export {
  parseResponse,
  parseFloatStrict,
  parseFloatOrNone,
  parseText,
  requireField,
  type FieldParser,
  type FieldParsers,
  type ParsedResponse,
} from "./protocol/fields";

export {
  SerialTransport,
  READ_TIMEOUT_MS,
  type LineTransport,
  type SerialPortLike,
  type SerialTransportOptions,
  type OpenSerialOptions,
} from "./serial/transport";
export { LineDecoder } from "./serial/lines";

export {
  createDiscovery,
  SerialPortDiscovery,
  MockDiscovery,
  DEFAULT_USB_IDS,
  parseUsbIds,
  formatUsbId,
  matchesUsbId,
  type DeviceDiscovery,
  type DeviceInfo,
  type UsbId,
} from "./discovery";

export {
  TempdeckError,
  isTempdeckError,
  type TempdeckErrorKind,
} from "./errors";

export { createLogger, silentLogger, type Logger, type LogLevel } from "./logger";
export { loadConfig, type TempdeckConfig } from "./config";
