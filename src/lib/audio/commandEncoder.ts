/*
 * C64 Commander - Configure and control your Commodore 64 Ultimate over your local network
 * Copyright (C) 2026 Christian Gleissner
 *
 * Licensed under the GNU General Public License v2.0 or later.
 * See <https://www.gnu.org/licenses/> for details.
 */

// Wire format of the daemon's command file. Field names and their order are
// fixed by the daemon and must not change.

import { AudioError } from './audioErrors';
import {
  FILE_FORMATS,
  sourceTypeOf,
  type AudioUpdate,
  type PlaybackParameters,
  type SourceDescriptor,
  type SourceType,
} from './audioTypes';

type FileArgs = {
  Path: string;
};

type ToneArgs = {
  WaveType: number;
  Pitch: number;
  Seconds: number;
};

export type CreateCommand = {
  Name: string;
  Type: SourceType;
  Volume: number;
  DoesLoop: boolean;
  LoopCount: number;
  Args: FileArgs | ToneArgs;
};

export type UpdateCommand = {
  ID: number;
  Volume: number;
  Paused: boolean;
  DoesLoop: boolean;
  LoopCount: number;
};

const assertFinite = (value: number, field: string) => {
  if (!Number.isFinite(value)) {
    throw new AudioError(`Cannot encode ${field}: ${value} is not a finite number.`, 'encoding');
  }
};

const assertInteger = (value: number, field: string) => {
  if (!Number.isSafeInteger(value)) {
    throw new AudioError(`Cannot encode ${field}: ${value} is not an integer.`, 'encoding');
  }
};

const buildArgs = (descriptor: SourceDescriptor): FileArgs | ToneArgs => {
  if (descriptor.kind === 'file') {
    if (!FILE_FORMATS.includes(descriptor.format)) {
      throw new AudioError(
        `Cannot encode Type: ${String(descriptor.format)} is not a supported file format.`,
        'encoding',
      );
    }
    if (!descriptor.path) {
      throw new AudioError('Cannot encode Path: file path is empty.', 'encoding');
    }
    return { Path: descriptor.path };
  }
  assertFinite(descriptor.pitch, 'Pitch');
  assertFinite(descriptor.duration, 'Seconds');
  return {
    WaveType: descriptor.waveform,
    Pitch: descriptor.pitch,
    Seconds: descriptor.duration,
  };
};

export const buildCreateCommand = (
  name: string,
  descriptor: SourceDescriptor,
  params: PlaybackParameters,
): CreateCommand => {
  if (!name) {
    throw new AudioError('Cannot encode Name: name is empty.', 'encoding');
  }
  assertFinite(params.volume, 'Volume');
  assertInteger(params.loopCount, 'LoopCount');
  return {
    Name: name,
    Type: sourceTypeOf(descriptor),
    Volume: params.volume,
    DoesLoop: params.doesLoop,
    LoopCount: params.loopCount,
    Args: buildArgs(descriptor),
  };
};

export const buildUpdateCommand = (id: number, update: AudioUpdate): UpdateCommand => {
  assertInteger(id, 'ID');
  assertFinite(update.volume, 'Volume');
  assertInteger(update.loopCount, 'LoopCount');
  return {
    ID: id,
    Volume: update.volume,
    Paused: update.paused,
    DoesLoop: update.doesLoop,
    LoopCount: update.loopCount,
  };
};

export const encodeCreateCommand = (name: string, descriptor: SourceDescriptor, params: PlaybackParameters) =>
  JSON.stringify(buildCreateCommand(name, descriptor, params));

export const encodeUpdateCommand = (id: number, update: AudioUpdate) =>
  JSON.stringify(buildUpdateCommand(id, update));
