/**
 * Datapoint table - the tab-separated text a user edits
 *
 * TIMESTAMP	VALUE	COMMENT	ID
 * 2024-01-15 08:30:00	1.5	ran	65a4f0c2
 *
 * Timestamps are written in local time. Comments are not escaped, so a tab or
 * newline inside one will not survive the round trip.
 */

import { EOL } from "os";
import { TableParseError } from "../errors";
import type { Datapoint, EditableRow, UtcOffsetProvider } from "./types";

export const TABLE_HEADER = "TIMESTAMP\tVALUE\tCOMMENT\tID";

const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;
const DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

export const localUtcOffset: UtcOffsetProvider = () => -new Date().getTimezoneOffset();

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * Format an instant as "YYYY-MM-DD HH:MM:SS" at the given offset.
 */
export function formatTimestamp(date: Date, offsetMinutes: number): string {
  const shifted = new Date(date.getTime() + offsetMinutes * 60_000);
  const day = `${pad(shifted.getUTCFullYear(), 4)}-${pad(shifted.getUTCMonth() + 1)}-${pad(shifted.getUTCDate())}`;
  const time = `${pad(shifted.getUTCHours())}:${pad(shifted.getUTCMinutes())}:${pad(shifted.getUTCSeconds())}`;
  return `${day} ${time}`;
}

/**
 * Parse "YYYY-MM-DD HH:MM:SS" written at the given offset.
 * Returns null for any other shape or an impossible date.
 */
export function parseTimestamp(text: string, offsetMinutes: number): Date | null {
  const match = text.match(TIMESTAMP_PATTERN);
  if (!match) {
    return null;
  }

  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);

  const wall = new Date(0);
  wall.setUTCFullYear(year, month - 1, day);
  wall.setUTCHours(hour, minute, second, 0);

  // Date rolls over out-of-range fields (Feb 30 -> Mar 1), so check them back
  if (
    wall.getUTCFullYear() !== year ||
    wall.getUTCMonth() !== month - 1 ||
    wall.getUTCDate() !== day ||
    wall.getUTCHours() !== hour ||
    wall.getUTCMinutes() !== minute ||
    wall.getUTCSeconds() !== second
  ) {
    return null;
  }

  return new Date(wall.getTime() - offsetMinutes * 60_000);
}

/**
 * Parse a decimal number. Blank text, "Infinity" and "NaN" are rejected.
 */
export function parseValue(text: string): number | null {
  if (!DECIMAL_PATTERN.test(text)) {
    return null;
  }
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

export function encodeTable(
  datapoints: readonly Datapoint[],
  utcOffset: UtcOffsetProvider = localUtcOffset
): string {
  const offset = utcOffset();
  const lines = [TABLE_HEADER];

  for (const dp of datapoints) {
    lines.push(
      [formatTimestamp(dp.timestamp, offset), String(dp.value), dp.comment ?? "", dp.id].join("\t")
    );
  }

  return lines.map((line) => line + EOL).join("");
}

function splitLines(text: string): string[] {
  const lines = text.split("\n").map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
  // A terminated last line does not start another one
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

/**
 * Read an edited table back into rows.
 *
 * The first line is taken to be the header and skipped. Any malformed row,
 * blank lines included, fails the whole table with a TableParseError.
 */
export function decodeTable(
  text: string,
  utcOffset: UtcOffsetProvider = localUtcOffset
): EditableRow[] {
  const offset = utcOffset();
  const lines = splitLines(text);
  const rows: EditableRow[] = [];

  for (let index = 1; index < lines.length; index++) {
    const line = lines[index];
    const lineNumber = index + 1;
    const fields: Array<string | undefined> = line.split("\t");
    const [timestampField = "", valueField, commentField, idField] = fields;

    if (valueField === undefined) {
      throw new TableParseError("missing value", lineNumber, line);
    }

    const timestamp = parseTimestamp(timestampField, offset);
    if (!timestamp) {
      throw new TableParseError("invalid timestamp (expected YYYY-MM-DD HH:MM:SS)", lineNumber, line);
    }

    const value = parseValue(valueField);
    if (value === null) {
      throw new TableParseError("invalid value", lineNumber, line);
    }

    const row: EditableRow = { timestamp, value, comment: commentField ?? "" };
    if (idField) {
      row.id = idField;
    }
    rows.push(row);
  }

  return rows;
}
