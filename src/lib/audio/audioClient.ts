/*
 * C64 Commander - Configure and control your Commodore 64 Ultimate over your local network
 * Copyright (C) 2026 Christian Gleissner
 *
 * Licensed under the GNU General Public License v2.0 or later.
 * See <https://www.gnu.org/licenses/> for details.
 */

import { resolveAudioSettings, type AudioSettings } from '@/lib/config/audioSettings';
import { createAudioContext, getDefaultAudioContext, type AudioContext } from './audioContext';
import { AudioBuilder } from './audioBuilder';
import type { AudioSource } from './audioSource';
import type { PlaybackParameters, SourceDescriptor } from './audioTypes';
import type { StatusDocument, StatusRecord } from './statusSnapshot';

export class AudioClient {
  readonly context: AudioContext;

  constructor(settings: Partial<AudioSettings> | AudioContext = {}) {
    this.context = 'resolver' in settings
      ? settings
      : createAudioContext(resolveAudioSettings(settings));
  }

  get settings(): AudioSettings {
    return this.context.settings;
  }

  builder(descriptor: SourceDescriptor): AudioBuilder {
    return new AudioBuilder(descriptor, this.context);
  }

  play(descriptor: SourceDescriptor, params: Partial<PlaybackParameters> = {}): Promise<AudioSource> {
    const builder = this.builder(descriptor);
    if (params.volume !== undefined) builder.volume(params.volume);
    if (params.doesLoop !== undefined) builder.doesLoop(params.doesLoop);
    if (params.loopCount !== undefined) builder.loopCount(params.loopCount);
    return builder.build();
  }

  parseStatus(): Promise<StatusDocument> {
    return this.context.resolver.parseStatus();
  }

  findById(id: number): Promise<StatusRecord> {
    return this.context.resolver.findById(id);
  }

  findByName(name: string): Promise<StatusRecord> {
    return this.context.resolver.findByName(name);
  }

  /** Whether the daemon reports any source as playing. */
  isRunning(): Promise<boolean> {
    return this.context.resolver.isRunning();
  }

  /** Whether audio playback has been turned off on the host. */
  isDisabled(): Promise<boolean> {
    return this.context.resolver.isDisabled();
  }
}

export const isRunning = () => getDefaultAudioContext().resolver.isRunning();

export const isDisabled = () => getDefaultAudioContext().resolver.isDisabled();
