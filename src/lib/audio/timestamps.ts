/*
 * C64 Commander - Configure and control your Commodore 64 Ultimate over your local network
 * Copyright (C) 2026 Christian Gleissner
 *
 * Licensed under the GNU General Public License v2.0 or later.
 * See <https://www.gnu.org/licenses/> for details.
 */

import { AudioError } from './audioErrors';

export type AudioTimestamp = {
  /** Millisecond precision; see `nanoseconds` for the full fraction. */
  date: Date;
  nanoseconds: number;
  raw: string;
};

// YYYY-MM-DDTHH:MM:SS.<1-9 fraction digits>Z, always UTC.
const STATUS_TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})\.(\d{1,9})Z$/;

const formatError = (field: string, value: unknown, reason: string) =>
  new AudioError(`Error in parsing ${field}. (${reason}: ${JSON.stringify(value)})`, 'format');

export const parseStatusTimestamp = (value: unknown, field = 'timestamp'): AudioTimestamp => {
  if (typeof value !== 'string') {
    throw formatError(field, value, 'expected a string');
  }
  const match = STATUS_TIMESTAMP_PATTERN.exec(value);
  if (!match) {
    throw formatError(field, value, 'unexpected format');
  }
  const [, year, month, day, hours, minutes, seconds, fraction] = match;
  const parts = [year, month, day, hours, minutes, seconds].map(Number);
  const [y, mo, d, h, mi, s] = parts;
  const nanoseconds = Number(fraction.padEnd(9, '0'));
  const epochMs = Date.UTC(y, mo - 1, d, h, mi, s, Math.floor(nanoseconds / 1_000_000));
  const date = new Date(epochMs);

  // Date.UTC rolls 2024-02-30 over into March; reject instead.
  if (
    Number.isNaN(epochMs)
    || date.getUTCFullYear() !== y
    || date.getUTCMonth() !== mo - 1
    || date.getUTCDate() !== d
    || date.getUTCHours() !== h
    || date.getUTCMinutes() !== mi
    || date.getUTCSeconds() !== s
  ) {
    throw formatError(field, value, 'out of range');
  }

  return { date, nanoseconds, raw: value };
};
