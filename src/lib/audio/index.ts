/*
 * C64 Commander - Configure and control your Commodore 64 Ultimate over your local network
 * Copyright (C) 2026 Christian Gleissner
 *
 * Licensed under the GNU General Public License v2.0 or later.
 * See <https://www.gnu.org/licenses/> for details.
 */

export { AudioBuilder, DEFAULT_PLAYBACK_PARAMETERS } from './audioBuilder';
export { AudioClient, isDisabled, isRunning } from './audioClient';
export { createAudioContext, getDefaultAudioContext, resetDefaultAudioContext } from './audioContext';
export type { AudioContext } from './audioContext';
export { AudioError, isAudioError } from './audioErrors';
export type { AudioErrorCode } from './audioErrors';
export { AudioSource } from './audioSource';
export { FILE_FORMATS, Waveform, fileSource, sourceTypeOf, toneSource } from './audioTypes';
export type {
  AudioUpdate,
  FileFormat,
  FileSource,
  PlaybackParameters,
  SourceDescriptor,
  SourceType,
  ToneSource,
} from './audioTypes';
export { CommandWriteQueue, appendCommand } from './commandChannel';
export { buildCreateCommand, buildUpdateCommand, encodeCreateCommand, encodeUpdateCommand } from './commandEncoder';
export type { CreateCommand, UpdateCommand } from './commandEncoder';
export { waitForSourceId } from './confirmPoller';
export type { ConfirmOptions, ConfirmResult } from './confirmPoller';
export { classifyAudioFailure } from './failureTaxonomy';
export type { FailureClass, FailureClassification } from './failureTaxonomy';
export { ProvisionalNameSequence, provisionalNames } from './provisionalNames';
export { StatusResolver, parseStatusText } from './statusSnapshot';
export type { StatusDocument, StatusRecord } from './statusSnapshot';
export { parseStatusTimestamp } from './timestamps';
export type { AudioTimestamp } from './timestamps';
