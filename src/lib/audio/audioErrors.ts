/*
 * C64 Commander - Configure and control your Commodore 64 Ultimate over your local network
 * Copyright (C) 2026 Christian Gleissner
 *
 * Licensed under the GNU General Public License v2.0 or later.
 * See <https://www.gnu.org/licenses/> for details.
 */

export type AudioErrorCode =
  | 'io'
  | 'parse'
  | 'not-found'
  | 'timeout'
  | 'format'
  | 'encoding';

type AudioErrorOptions = {
  path?: string;
  cause?: unknown;
};

export class AudioError extends Error {
  readonly code: AudioErrorCode;
  readonly path?: string;

  constructor(message: string, code: AudioErrorCode, options: AudioErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'AudioError';
    this.code = code;
    this.path = options.path;
  }
}

export const isAudioError = (value: unknown, code?: AudioErrorCode): value is AudioError =>
  value instanceof AudioError && (code === undefined || value.code === code);

export const describeCause = (error: unknown) => {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
};
