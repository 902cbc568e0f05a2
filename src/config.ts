/**
 * Configuration from environment variables
 * CLI flags override these; library callers pass options explicitly
 */

import { DEFAULT_USB_IDS, parseUsbIds, type UsbId } from "./discovery/interface";
import { isLogLevel, type LogLevel } from "./logger";

type Env = Record<string, string | undefined>;

function getEnvNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function getEnvString(env: Env, key: string, defaultValue: string): string {
  return env[key] ?? defaultValue;
}

function getEnvBoolean(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  if (value === undefined) return defaultValue;
  const normalized = value.toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  return defaultValue;
}

function getEnvLogLevel(env: Env, key: string, defaultValue: LogLevel): LogLevel {
  const value = env[key]?.toLowerCase();
  return value !== undefined && isLogLevel(value) ? value : defaultValue;
}

function getEnvUsbIds(env: Env, key: string, defaultValue: readonly UsbId[]): readonly UsbId[] {
  const value = env[key];
  if (value === undefined) return defaultValue;
  const ids = parseUsbIds(value);
  return ids.length > 0 ? ids : defaultValue;
}

export interface TempdeckConfig {
  SERIAL_PORT: string;
  USB_LOCATION: string;
  USB_IDS: readonly UsbId[];
  BAUD_RATE: number;
  DEACTIVATE_ACK: boolean;
  LOG_LEVEL: LogLevel;
}

export function loadConfig(env: Env = process.env): TempdeckConfig {
  return {
    /**
     * Serial port path used when no flag selects a device
     * @env TEMPDECK_SERIAL_PORT
     * @default "" (discover by USB id)
     */
    SERIAL_PORT: getEnvString(env, "TEMPDECK_SERIAL_PORT", ""),

    /**
     * USB location string used when no flag selects a device
     * @env TEMPDECK_USB_LOCATION
     * @default ""
     */
    USB_LOCATION: getEnvString(env, "TEMPDECK_USB_LOCATION", ""),

    /**
     * Comma-separated vid:pid pairs in hex, e.g. "04d8:ee93"
     * @env TEMPDECK_USB_IDS
     * @default "04d8:ee93"
     */
    USB_IDS: getEnvUsbIds(env, "TEMPDECK_USB_IDS", DEFAULT_USB_IDS),

    /**
     * Serial baud rate
     * @env TEMPDECK_BAUD_RATE
     * @default 115200
     */
    BAUD_RATE: getEnvNumber(env, "TEMPDECK_BAUD_RATE", 115200),

    /**
     * Wait for the double "ok" after M18
     * @env TEMPDECK_DEACTIVATE_ACK
     * @default true
     */
    DEACTIVATE_ACK: getEnvBoolean(env, "TEMPDECK_DEACTIVATE_ACK", true),

    /**
     * Log level: debug, info, warn, error, silent
     * @env TEMPDECK_LOG_LEVEL
     * @default "warn"
     */
    LOG_LEVEL: getEnvLogLevel(env, "TEMPDECK_LOG_LEVEL", "warn"),
  };
}

export const config = loadConfig();
