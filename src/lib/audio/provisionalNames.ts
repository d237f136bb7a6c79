/*
 * C64 Commander - Configure and control your Commodore 64 Ultimate over your local network
 * Copyright (C) 2026 Christian Gleissner
 *
 * Licensed under the GNU General Public License v2.0 or later.
 * See <https://www.gnu.org/licenses/> for details.
 */

import { DEFAULT_NAME_PREFIX } from '@/lib/config/audioSettings';

/**
 * Hands out names used to find a freshly created source in the status
 * snapshot before the daemon has assigned it an ID.
 *
 * The counter only ever moves forward. Names are unique within one process;
 * two processes using the same prefix can collide.
 */
export class ProvisionalNameSequence {
  private counter = 0;

  next(prefix: string = DEFAULT_NAME_PREFIX): string {
    const value = this.counter;
    this.counter += 1;
    return `${prefix}${value}`;
  }

  get issued(): number {
    return this.counter;
  }
}

// Created once at module load and never reset for the lifetime of the process.
export const provisionalNames = new ProvisionalNameSequence();
