/*
 * C64 Commander - Configure and control your Commodore 64 Ultimate over your local network
 * Copyright (C) 2026 Christian Gleissner
 *
 * Licensed under the GNU General Public License v2.0 or later.
 * See <https://www.gnu.org/licenses/> for details.
 */

import { describe, expect, it } from 'vitest';
import { ProvisionalNameSequence, provisionalNames } from '@/lib/audio/provisionalNames';

describe('ProvisionalNameSequence', () => {
  it('counts up from zero with the given prefix', () => {
    const sequence = new ProvisionalNameSequence();

    expect(sequence.next('clip_')).toBe('clip_0');
    expect(sequence.next('clip_')).toBe('clip_1');
    expect(sequence.next()).toBe('ts_audio_2');
    expect(sequence.issued).toBe(3);
  });

  it('never repeats a name within the process', () => {
    const names = Array.from({ length: 500 }, () => provisionalNames.next());

    expect(new Set(names).size).toBe(500);
  });

  it('keeps counting across prefixes', () => {
    const sequence = new ProvisionalNameSequence();
    sequence.next('a_');

    expect(sequence.next('b_')).toBe('b_1');
  });
});
