/**
 * Response Field Parser
 * Parses one response line of whitespace-separated key:value tokens
 *
 * Format:
 * - "model:TD1 serial:ABC123 version:1.0"
 * - "C:25.900 T:none"
 * A key without a parser keeps its value as text.
 */

import { invalidResponse } from "../errors";

export type FieldParser<T> = (raw: string) => T;

/**
 * One parser per typed key
 */
export type FieldParsers<T> = { readonly [K in keyof T]: FieldParser<T[K]> };

export interface ParsedResponse<T> {
  /** Values of keys that had a parser */
  fields: Partial<T>;
  /** Every other key, as text */
  text: Map<string, string>;
  /** The line as received, for error messages */
  raw: string;
}

const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;
const FLOAT_WORDS = /^([+-]?)(inf|infinity|nan)$/i;

/**
 * Strict float conversion: decimal or exponent notation, optional sign,
 * inf/infinity/nan. Throws on anything else, including "" and "0x10".
 */
export function parseFloatStrict(raw: string): number {
  const value = raw.trim();
  if (FLOAT_PATTERN.test(value)) {
    return Number(value);
  }
  const word = FLOAT_WORDS.exec(value);
  if (word) {
    if (word[2].toLowerCase() === "nan") return NaN;
    return word[1] === "-" ? -Infinity : Infinity;
  }
  throw new Error(`could not convert to float: ${JSON.stringify(raw)}`);
}

/**
 * Float, or null for the device's "none" (no active setpoint)
 */
export function parseFloatOrNone(raw: string): number | null {
  return raw === "none" ? null : parseFloatStrict(raw);
}

export function parseText(raw: string): string {
  return raw;
}

function hasParser<T>(parsers: FieldParsers<T>, key: string): key is Extract<keyof T, string> {
  return Object.prototype.hasOwnProperty.call(parsers, key);
}

function assignField<T, K extends keyof T>(
  fields: Partial<T>,
  parsers: FieldParsers<T>,
  key: K,
  value: string
): void {
  fields[key] = parsers[key](value);
}

/**
 * Parse a response line. A later duplicate key overwrites an earlier one.
 * @throws TempdeckError (invalid_response) if a token has no ":" or a value
 *   fails its parser
 */
export function parseResponse<T>(raw: string, parsers: FieldParsers<T>): ParsedResponse<T> {
  const fields: Partial<T> = {};
  const text = new Map<string, string>();

  for (const piece of raw.split(/\s+/)) {
    if (piece === "") continue;

    const sep = piece.indexOf(":");
    if (sep < 0) {
      throw invalidResponse(
        `Couldn't parse this part: '${piece}' -- full response was '${raw}'`,
        raw
      );
    }

    const key = piece.slice(0, sep);
    const value = piece.slice(sep + 1);

    if (hasParser(parsers, key)) {
      try {
        assignField(fields, parsers, key, value);
      } catch (err) {
        throw invalidResponse(
          `Couldn't parse this part: '${piece}' -- full response was '${raw}'`,
          raw,
          err
        );
      }
    } else {
      text.set(key, value);
    }
  }

  return { fields, text, raw };
}

/**
 * Pull a required field out of a parsed response
 * @throws TempdeckError (invalid_response) if the key was absent
 */
export function requireField<T>(value: T | undefined, description: string, raw: string): T {
  if (value === undefined) {
    throw invalidResponse(`Response missing value for ${description}: '${raw}'`, raw);
  }
  return value;
}
