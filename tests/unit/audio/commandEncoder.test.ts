/*
 * C64 Commander - Configure and control your Commodore 64 Ultimate over your local network
 * Copyright (C) 2026 Christian Gleissner
 *
 * Licensed under the GNU General Public License v2.0 or later.
 * See <https://www.gnu.org/licenses/> for details.
 */

import { describe, expect, it } from 'vitest';
import { AudioError } from '@/lib/audio/audioErrors';
import { FILE_FORMATS, Waveform, fileSource, sourceTypeOf, toneSource, type FileSource } from '@/lib/audio/audioTypes';
import { DEFAULT_PLAYBACK_PARAMETERS } from '@/lib/audio/audioBuilder';
import { buildCreateCommand, encodeCreateCommand, encodeUpdateCommand } from '@/lib/audio/commandEncoder';

const captureError = (fn: () => unknown) => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected the call to throw');
};

describe('commandEncoder', () => {
  it('encodes a tone with default playback parameters', () => {
    const payload = encodeCreateCommand(
      'ts_audio_0',
      toneSource(Waveform.Square, 440, 2),
      DEFAULT_PLAYBACK_PARAMETERS,
    );

    expect(payload).toBe(
      '{"Name":"ts_audio_0","Type":"tone","Volume":1,"DoesLoop":false,"LoopCount":-1,'
      + '"Args":{"WaveType":3,"Pitch":440,"Seconds":2}}',
    );
  });

  it('encodes a looping file with its format as the type', () => {
    const payload = encodeCreateCommand('intro', fileSource('wav', 'audio.wav'), {
      volume: 0.5,
      doesLoop: true,
      loopCount: -1,
    });

    expect(payload).toBe(
      '{"Name":"intro","Type":"wav","Volume":0.5,"DoesLoop":true,"LoopCount":-1,"Args":{"Path":"audio.wav"}}',
    );
  });

  it('maps every source kind to its discriminator', () => {
    expect(sourceTypeOf(fileSource('wav', 'a.wav'))).toBe('wav');
    expect(sourceTypeOf(fileSource('aiff', 'a.aiff'))).toBe('aiff');
    expect(sourceTypeOf(fileSource('mp3', 'a.mp3'))).toBe('mp3');
    expect(sourceTypeOf(toneSource(Waveform.Sine, 220, 1))).toBe('tone');
  });

  it('sends waveform codes as small integers', () => {
    const codes = [Waveform.Sine, Waveform.Triangle, Waveform.Saw, Waveform.Square].map((waveform) => {
      const payload = JSON.parse(
        encodeCreateCommand('w', toneSource(waveform, 100, 0.5), DEFAULT_PLAYBACK_PARAMETERS),
      ) as { Args: { WaveType: number } };
      return payload.Args.WaveType;
    });

    expect(codes).toEqual([0, 1, 2, 3]);
  });

  it('passes volume through without clamping', () => {
    const payload = encodeCreateCommand('loud', fileSource('mp3', 'x.mp3'), {
      volume: 3.5,
      doesLoop: false,
      loopCount: 2,
    });

    expect(payload).toContain('"Volume":3.5');
  });

  it('encodes an update addressed by id', () => {
    const payload = encodeUpdateCommand(7, { volume: 0.25, paused: true, doesLoop: false, loopCount: 0 });

    expect(payload).toBe('{"ID":7,"Volume":0.25,"Paused":true,"DoesLoop":false,"LoopCount":0}');
  });

  it('rejects values JSON cannot carry', () => {
    const error = captureError(() =>
      encodeCreateCommand('bad', toneSource(Waveform.Saw, Number.NaN, 1), DEFAULT_PLAYBACK_PARAMETERS),
    );

    expect(error).toBeInstanceOf(AudioError);
    expect((error as AudioError).code).toBe('encoding');
    expect((error as AudioError).message).toBe('Cannot encode Pitch: NaN is not a finite number.');
  });

  it('rejects fractional loop counts and ids', () => {
    expect(() =>
      encodeCreateCommand('bad', fileSource('wav', 'a.wav'), { volume: 1, doesLoop: true, loopCount: 1.5 }),
    ).toThrow('Cannot encode LoopCount: 1.5 is not an integer.');
    expect(() =>
      encodeUpdateCommand(2.5, { volume: 1, paused: false, doesLoop: false, loopCount: 0 }),
    ).toThrow('Cannot encode ID: 2.5 is not an integer.');
  });

  it('rejects empty names and paths', () => {
    expect(() => encodeCreateCommand('', fileSource('wav', 'a.wav'), DEFAULT_PLAYBACK_PARAMETERS))
      .toThrow('Cannot encode Name: name is empty.');
    expect(() => encodeCreateCommand('n', fileSource('wav', ''), DEFAULT_PLAYBACK_PARAMETERS))
      .toThrow('Cannot encode Path: file path is empty.');
  });

  it('rejects file formats the daemon does not play', () => {
    const descriptor = JSON.parse('{"kind":"file","format":"ogg","path":"a.ogg"}') as FileSource;

    expect(() => encodeCreateCommand('n', descriptor, DEFAULT_PLAYBACK_PARAMETERS))
      .toThrow('Cannot encode Type: ogg is not a supported file format.');
  });

  it('accepts every supported file format', () => {
    const types = FILE_FORMATS.map((format) =>
      buildCreateCommand('n', fileSource(format, `a.${format}`), DEFAULT_PLAYBACK_PARAMETERS).Type);

    expect(types).toEqual(['wav', 'aiff', 'mp3']);
  });
});
