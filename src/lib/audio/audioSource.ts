/*
 * C64 Commander - Configure and control your Commodore 64 Ultimate over your local network
 * Copyright (C) 2026 Christian Gleissner
 *
 * Licensed under the GNU General Public License v2.0 or later.
 * See <https://www.gnu.org/licenses/> for details.
 */

import { buildErrorLogDetails } from '@/lib/logging';
import { logger } from '@/lib/diagnostics/logger';
import { AudioError } from './audioErrors';
import type { AudioUpdate, SourceDescriptor, SourceType } from './audioTypes';
import { sourceTypeOf } from './audioTypes';
import { encodeUpdateCommand } from './commandEncoder';
import { classifyAudioFailure } from './failureTaxonomy';
import type { CommandWriteQueue } from './commandChannel';
import type { StatusRecord, StatusResolver } from './statusSnapshot';
import { parseStatusTimestamp, type AudioTimestamp } from './timestamps';

type RecordField = 'Volume' | 'Paused' | 'Loop' | 'Duration' | 'Remaining' | 'StartTime' | 'EndTime';

/**
 * A playing source the daemon has acknowledged. Every getter reads the status
 * file again; once the daemon drops the source they fail with `not-found`.
 */
export class AudioSource {
  readonly type: SourceType;

  constructor(
    readonly id: number,
    descriptor: SourceDescriptor,
    private readonly resolver: StatusResolver,
    private readonly commands: CommandWriteQueue,
  ) {
    this.type = sourceTypeOf(descriptor);
  }

  getStatus(): Promise<StatusRecord> {
    return this.resolver.findById(this.id);
  }

  private requireField<T>(value: T | undefined, field: RecordField): T {
    if (value === undefined) {
      throw new AudioError(`Audio source ${this.id} has no ${field} in ${this.resolver.path}.`, 'parse', {
        path: this.resolver.path,
      });
    }
    return value;
  }

  async getName(): Promise<string> {
    const record = await this.getStatus();
    return record.Name;
  }

  async getVolume(): Promise<number> {
    const record = await this.getStatus();
    return this.requireField(record.Volume, 'Volume');
  }

  /** Total length in milliseconds. */
  async getDuration(): Promise<number> {
    const record = await this.getStatus();
    return this.requireField(record.Duration, 'Duration');
  }

  /** Milliseconds left to play. */
  async getRemaining(): Promise<number> {
    const record = await this.getStatus();
    return this.requireField(record.Remaining, 'Remaining');
  }

  async isPaused(): Promise<boolean> {
    const record = await this.getStatus();
    return this.requireField(record.Paused, 'Paused');
  }

  /** Loops left; negative means forever. */
  async getLoop(): Promise<number> {
    const record = await this.getStatus();
    return this.requireField(record.Loop, 'Loop');
  }

  async getStartTime(): Promise<AudioTimestamp> {
    const record = await this.getStatus();
    return parseStatusTimestamp(this.requireField(record.StartTime, 'StartTime'), 'start time');
  }

  async getEndTime(): Promise<AudioTimestamp> {
    const record = await this.getStatus();
    return parseStatusTimestamp(this.requireField(record.EndTime, 'EndTime'), 'end time');
  }

  /**
   * Queues an update for the daemon and returns once it is written. The
   * daemon applies it on its own schedule, so an immediate read may still
   * show the old values.
   */
  async update(update: AudioUpdate): Promise<void> {
    const payload = encodeUpdateCommand(this.id, update);
    try {
      await this.commands.append(payload);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error('Audio source update failed', {
        component: 'audioSource',
        details: buildErrorLogDetails(err, {
          id: this.id,
          failureClass: classifyAudioFailure(error).failureClass,
        }),
      });
      throw error;
    }
    logger.debug('Audio source update sent', {
      component: 'audioSource',
      details: { id: this.id, ...update },
    });
  }
}
