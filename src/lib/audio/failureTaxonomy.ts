/*
 * C64 Commander - Configure and control your Commodore 64 Ultimate over your local network
 * Copyright (C) 2026 Christian Gleissner
 *
 * Licensed under the GNU General Public License v2.0 or later.
 * See <https://www.gnu.org/licenses/> for details.
 */

import { AudioError, type AudioErrorCode } from './audioErrors';

export type FailureClass =
  | 'io-missing'
  | 'io-permission'
  | 'io-failure'
  | 'parse-failure'
  | 'lookup-miss'
  | 'timeout'
  | 'format-failure'
  | 'encoding-failure'
  | 'unknown';

export type FailureClassification = {
  code: AudioErrorCode | null;
  failureClass: FailureClass;
  // True when the daemon may simply not have caught up yet.
  isTransient: boolean;
  errorType: string | null;
};

const NODE_MISSING_CODES = new Set(['ENOENT', 'ENOTDIR']);
const NODE_PERMISSION_CODES = new Set(['EACCES', 'EPERM', 'EROFS']);

const readNodeCode = (error: unknown): string | null => {
  if (!error || typeof error !== 'object' || !('code' in error)) return null;
  const { code } = error;
  return typeof code === 'string' ? code : null;
};

const classifyNodeError = (error: unknown): FailureClass | null => {
  const code = readNodeCode(error);
  if (!code) return null;
  if (NODE_MISSING_CODES.has(code)) return 'io-missing';
  if (NODE_PERMISSION_CODES.has(code)) return 'io-permission';
  if (code.startsWith('E')) return 'io-failure';
  return null;
};

const classifyAudioError = (error: AudioError): FailureClass => {
  switch (error.code) {
    case 'io':
      return classifyNodeError(error.cause) ?? 'io-failure';
    case 'parse':
      return 'parse-failure';
    case 'not-found':
      return 'lookup-miss';
    case 'timeout':
      return 'timeout';
    case 'format':
      return 'format-failure';
    case 'encoding':
      return 'encoding-failure';
  }
};

const TRANSIENT_CLASSES = new Set<FailureClass>(['io-missing', 'parse-failure', 'lookup-miss']);

const resolveErrorType = (error: unknown) => {
  if (error instanceof AudioError) return `AudioError:${error.code}`;
  if (error instanceof Error && error.name && error.name !== 'Error') return error.name;
  return null;
};

export const classifyAudioFailure = (error: unknown): FailureClassification => {
  let failureClass: FailureClass = 'unknown';
  if (error instanceof AudioError) {
    failureClass = classifyAudioError(error);
  } else if (error instanceof SyntaxError) {
    failureClass = 'parse-failure';
  } else {
    failureClass = classifyNodeError(error) ?? 'unknown';
  }

  return {
    code: error instanceof AudioError ? error.code : null,
    failureClass,
    isTransient: TRANSIENT_CLASSES.has(failureClass),
    errorType: resolveErrorType(error),
  };
};
