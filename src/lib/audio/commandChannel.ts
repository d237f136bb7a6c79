/*
 * C64 Commander - Configure and control your Commodore 64 Ultimate over your local network
 * Copyright (C) 2026 Christian Gleissner
 *
 * Licensed under the GNU General Public License v2.0 or later.
 * See <https://www.gnu.org/licenses/> for details.
 */

import { constants, promises as fs } from 'node:fs';
import type { FileHandle } from 'node:fs/promises';
import { AudioError, describeCause } from './audioErrors';

// Append without O_CREAT: the daemon owns the channel and a missing file means
// the daemon is not there to read it.
const APPEND_FLAGS = constants.O_WRONLY | constants.O_APPEND;

export const appendCommand = async (channelPath: string, payload: string): Promise<void> => {
  let handle: FileHandle;
  try {
    handle = await fs.open(channelPath, APPEND_FLAGS);
  } catch (error) {
    throw new AudioError(`Error in opening ${channelPath}. (${describeCause(error)})`, 'io', {
      path: channelPath,
      cause: error,
    });
  }

  let failure: AudioError | null = null;
  try {
    const expectedBytes = Buffer.byteLength(payload, 'utf8');
    const { bytesWritten } = await handle.write(payload, null, 'utf8');
    if (bytesWritten !== expectedBytes) {
      failure = new AudioError(
        `Error in writing to ${channelPath}. (wrote ${bytesWritten} of ${expectedBytes} bytes)`,
        'io',
        { path: channelPath },
      );
    }
  } catch (error) {
    failure = new AudioError(`Error in writing to ${channelPath}. (${describeCause(error)})`, 'io', {
      path: channelPath,
      cause: error,
    });
  }

  try {
    await handle.close();
  } catch (error) {
    failure ??= new AudioError(`Error in closing ${channelPath}. (${describeCause(error)})`, 'io', {
      path: channelPath,
      cause: error,
    });
  }

  if (failure) throw failure;
};

/**
 * Runs appends from this process one at a time in submission order, so two
 * commands never interleave on the channel. Other processes writing to the
 * same channel are not coordinated with. Failures reach the caller through
 * the returned promise and are logged there.
 */
export class CommandWriteQueue {
  private queue: Promise<void> = Promise.resolve();
  private pending = 0;

  constructor(private readonly channelPath: string) {}

  get path(): string {
    return this.channelPath;
  }

  get inFlight(): number {
    return this.pending;
  }

  append(payload: string): Promise<void> {
    this.pending += 1;
    const next = this.queue.then(() => appendCommand(this.channelPath, payload));
    const settled = next.finally(() => {
      this.pending -= 1;
    });
    this.queue = Promise.allSettled([settled]).then(() => undefined);
    return settled;
  }
}
