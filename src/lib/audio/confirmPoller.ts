/*
 * C64 Commander - Configure and control your Commodore 64 Ultimate over your local network
 * Copyright (C) 2026 Christian Gleissner
 *
 * Licensed under the GNU General Public License v2.0 or later.
 * See <https://www.gnu.org/licenses/> for details.
 */

import { logger } from '@/lib/diagnostics/logger';
import { DEFAULT_CONFIRM_TIMEOUT_MS, DEFAULT_POLL_INTERVAL_MS } from '@/lib/config/audioSettings';
import { AudioError, isAudioError, type AudioErrorCode } from './audioErrors';
import { classifyAudioFailure, type FailureClassification } from './failureTaxonomy';
import type { StatusResolver } from './statusSnapshot';

export type ConfirmOptions = {
  timeoutMs?: number;
  pollIntervalMs?: number;
};

export type ConfirmResult = {
  id: number;
  attempts: number;
  elapsedMs: number;
};

const RETRYABLE_CODES = new Set<AudioErrorCode>(['io', 'parse', 'not-found']);

const delay = (ms: number) => new Promise<void>((resolve) => {
  setTimeout(resolve, ms);
});

/**
 * Polls the status snapshot until a source named `name` shows up and returns
 * the ID the daemon gave it. Missing, half-written or not-yet-updated status
 * files count as "not there yet"; only running out of time is reported.
 */
export const waitForSourceId = async (
  resolver: StatusResolver,
  name: string,
  options: ConfirmOptions = {},
): Promise<ConfirmResult> => {
  const timeoutMs = Math.max(0, options.timeoutMs ?? DEFAULT_CONFIRM_TIMEOUT_MS);
  const pollIntervalMs = Math.max(0, options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS);
  // Monotonic clock; wall-clock jumps do not move the deadline.
  const startedAt = performance.now();
  let attempts = 0;
  let lastFailure: FailureClassification | null = null;

  while (performance.now() - startedAt <= timeoutMs) {
    attempts += 1;
    try {
      const record = await resolver.findByName(name);
      const elapsedMs = Math.round(performance.now() - startedAt);
      logger.debug('Audio source confirmed', {
        component: 'confirmPoller',
        details: { name, id: record.ID, attempts, elapsedMs },
      });
      return { id: record.ID, attempts, elapsedMs };
    } catch (error) {
      if (!isAudioError(error) || !RETRYABLE_CODES.has(error.code)) throw error;
      lastFailure = classifyAudioFailure(error);
    }
    if (pollIntervalMs > 0) {
      await delay(pollIntervalMs);
    }
  }

  logger.warn('Audio source confirmation timed out', {
    component: 'confirmPoller',
    details: {
      name,
      statusPath: resolver.path,
      timeoutMs,
      attempts,
      lastFailureClass: lastFailure?.failureClass ?? null,
      lastFailureTransient: lastFailure?.isTransient ?? null,
    },
  });
  throw new AudioError(`Timed out while waiting for ${resolver.path} to update.`, 'timeout', {
    path: resolver.path,
  });
};
