import type { Cadence } from "../models/scene.model";
import { ValidationError } from "./errors";

export interface DateChunk {
  readonly start: string;
  readonly end: string;
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

/** Parses a strict YYYY-MM-DD string into a UTC midnight Date. */
export function parseIsoDate(value: string, item?: string): Date {
  const match = ISO_DATE.exec(value.trim());
  if (!match) {
    throw new ValidationError(`Invalid date "${value}", expected YYYY-MM-DD`, item);
  }
  const [, y, m, d] = match;
  const year = Number(y);
  const month = Number(m) - 1;
  const day = Number(d);
  const date = new Date(Date.UTC(year, month, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month ||
    date.getUTCDate() !== day
  ) {
    throw new ValidationError(`Invalid calendar date "${value}"`, item);
  }
  return date;
}

export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

/** Adds calendar months, clamping to the last day of the target month. */
export function addMonths(date: Date, months: number): Date {
  const year = date.getUTCFullYear();
  const month = date.getUTCMonth() + months;
  const lastDay = new Date(Date.UTC(year, month + 1, 0)).getUTCDate();
  return new Date(Date.UTC(year, month, Math.min(date.getUTCDate(), lastDay)));
}

/**
 * Splits [start, end] into contiguous chunks of at most `maxMonths` months.
 * Only the trailing chunk may be shorter.
 */
export function subdivideDateRange(
  start: string,
  end: string,
  maxMonths: number,
): DateChunk[] {
  if (!Number.isInteger(maxMonths) || maxMonths < 1) {
    throw new ValidationError(`maxMonths must be a positive integer, got ${maxMonths}`);
  }

  const endDate = parseIsoDate(end);
  const chunks: DateChunk[] = [];
  let cursor = parseIsoDate(start);

  while (cursor.getTime() <= endDate.getTime()) {
    let chunkEnd = addDays(addMonths(cursor, maxMonths), -1);
    if (chunkEnd.getTime() > endDate.getTime()) {
      chunkEnd = endDate;
    }
    chunks.push({ start: formatIsoDate(cursor), end: formatIsoDate(chunkEnd) });
    cursor = addDays(chunkEnd, 1);
  }

  return chunks;
}

/** Sunday on or before the date (Sunday-start weeks). */
export function weekStart(date: Date): Date {
  return addDays(date, -date.getUTCDay());
}

export function intervalKey(date: Date, cadence: Cadence): string {
  switch (cadence) {
    case "daily":
      return formatIsoDate(date);
    case "weekly":
      return formatIsoDate(weekStart(date));
    case "monthly":
      return formatIsoDate(date).slice(0, 7);
  }
}

/** Acquisition date embedded in an artifact name, as YYYY_MM_DD. */
export function extractDateFromFilename(filename: string): string | null {
  const match = /(\d{4})(\d{2})(\d{2})_/.exec(filename);
  if (!match) {
    return null;
  }
  return `${match[1]}_${match[2]}_${match[3]}`;
}

export function extractSceneId(filename: string): string | null {
  const match = /\d{8}_(\w+)_/.exec(filename);
  return match ? match[1] : null;
}

/** Week start for a YYYY_MM_DD string, in the same format. */
export function weekStartKey(underscoredDate: string): string {
  const date = parseIsoDate(underscoredDate.replace(/_/g, "-"));
  return formatIsoDate(weekStart(date)).replace(/-/g, "_");
}
