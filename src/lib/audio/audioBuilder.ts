/*
 * C64 Commander - Configure and control your Commodore 64 Ultimate over your local network
 * Copyright (C) 2026 Christian Gleissner
 *
 * Licensed under the GNU General Public License v2.0 or later.
 * See <https://www.gnu.org/licenses/> for details.
 */

import { buildErrorLogDetails } from '@/lib/logging';
import { logger } from '@/lib/diagnostics/logger';
import { getDefaultAudioContext, type AudioContext } from './audioContext';
import type { PlaybackParameters, SourceDescriptor } from './audioTypes';
import { sourceTypeOf } from './audioTypes';
import { AudioSource } from './audioSource';
import { encodeCreateCommand } from './commandEncoder';
import { waitForSourceId } from './confirmPoller';
import { classifyAudioFailure } from './failureTaxonomy';

export const DEFAULT_PLAYBACK_PARAMETERS: PlaybackParameters = {
  volume: 1.0,
  doesLoop: false,
  loopCount: -1,
};

/**
 * Collects playback settings for one file or tone and starts it with
 * `build()`. A builder can be built many times; each build starts a new
 * source.
 */
export class AudioBuilder {
  private nameOverride: string | null = null;
  private params: PlaybackParameters = { ...DEFAULT_PLAYBACK_PARAMETERS };
  private readonly descriptor: SourceDescriptor;

  constructor(
    descriptor: SourceDescriptor,
    private readonly context: AudioContext = getDefaultAudioContext(),
  ) {
    this.descriptor = Object.freeze({ ...descriptor });
  }

  /**
   * Use a fixed name instead of a generated one. Not recommended: if two live
   * sources share a name, `build()` may hand back the wrong one.
   */
  name(name: string): this {
    this.nameOverride = name;
    return this;
  }

  volume(volume: number): this {
    this.params.volume = volume;
    return this;
  }

  doesLoop(doesLoop: boolean): this {
    this.params.doesLoop = doesLoop;
    return this;
  }

  /** Only takes effect with `doesLoop(true)`. Negative loops forever. */
  loopCount(loopCount: number): this {
    this.params.loopCount = loopCount;
    return this;
  }

  get parameters(): PlaybackParameters {
    return { ...this.params };
  }

  /**
   * Sends the create command and waits until the daemon reports the new
   * source. Rejects with an `io` error when the command file cannot be
   * written and with `timeout` when the daemon does not answer in time.
   */
  async build(): Promise<AudioSource> {
    const { settings, resolver, commands, names } = this.context;
    const name = this.nameOverride ?? names.next(settings.namePrefix);
    const payload = encodeCreateCommand(name, this.descriptor, this.params);

    try {
      await commands.append(payload);
      const confirmed = await waitForSourceId(resolver, name, {
        timeoutMs: settings.confirmTimeoutMs,
        pollIntervalMs: settings.pollIntervalMs,
      });
      logger.info('Audio source started', {
        component: 'audioBuilder',
        details: {
          name,
          id: confirmed.id,
          type: sourceTypeOf(this.descriptor),
          attempts: confirmed.attempts,
          elapsedMs: confirmed.elapsedMs,
        },
      });
      return new AudioSource(confirmed.id, this.descriptor, resolver, commands);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error('Audio source failed to start', {
        component: 'audioBuilder',
        details: buildErrorLogDetails(err, {
          name,
          type: sourceTypeOf(this.descriptor),
          failureClass: classifyAudioFailure(error).failureClass,
        }),
      });
      throw error;
    }
  }
}
