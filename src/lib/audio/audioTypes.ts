/*
 * C64 Commander - Configure and control your Commodore 64 Ultimate over your local network
 * Copyright (C) 2026 Christian Gleissner
 *
 * Licensed under the GNU General Public License v2.0 or later.
 * See <https://www.gnu.org/licenses/> for details.
 */

export type FileFormat = 'wav' | 'aiff' | 'mp3';

export const FILE_FORMATS: readonly FileFormat[] = ['wav', 'aiff', 'mp3'];

/** Waveform codes understood by the daemon's tone generator. */
export const Waveform = {
  Sine: 0,
  Triangle: 1,
  Saw: 2,
  Square: 3,
} as const;

export type Waveform = (typeof Waveform)[keyof typeof Waveform];

export type FileSource = {
  kind: 'file';
  format: FileFormat;
  path: string;
};

export type ToneSource = {
  kind: 'tone';
  waveform: Waveform;
  pitch: number;
  /** Seconds. */
  duration: number;
};

export type SourceDescriptor = FileSource | ToneSource;

export type SourceType = FileFormat | 'tone';

export type PlaybackParameters = {
  volume: number;
  doesLoop: boolean;
  /** Negative means loop forever. */
  loopCount: number;
};

export type AudioUpdate = {
  volume: number;
  paused: boolean;
  doesLoop: boolean;
  /** Negative means loop forever. */
  loopCount: number;
};

export const fileSource = (format: FileFormat, path: string): FileSource => ({ kind: 'file', format, path });

export const toneSource = (waveform: Waveform, pitch: number, duration: number): ToneSource => ({
  kind: 'tone',
  waveform,
  pitch,
  duration,
});

export const sourceTypeOf = (descriptor: SourceDescriptor): SourceType =>
  descriptor.kind === 'file' ? descriptor.format : 'tone';
