/*
 * C64 Commander - Configure and control your Commodore 64 Ultimate over your local network
 * Copyright (C) 2026 Christian Gleissner
 *
 * Licensed under the GNU General Public License v2.0 or later.
 * See <https://www.gnu.org/licenses/> for details.
 */

import { describe, expect, it } from 'vitest';
import { splitConcatenatedJson } from '@/test/fakeAudioDaemon';

describe('splitConcatenatedJson', () => {
  it('splits objects written back to back', () => {
    const { chunks, consumed } = splitConcatenatedJson('{"ID":1}{"Name":"a}b","Args":{"Path":"x"}}');

    expect(chunks).toEqual(['{"ID":1}', '{"Name":"a}b","Args":{"Path":"x"}}']);
    expect(consumed).toBe(42);
  });

  it('leaves a partial trailing object unconsumed', () => {
    const { chunks, consumed } = splitConcatenatedJson('{"ID":1}{"ID":');

    expect(chunks).toEqual(['{"ID":1}']);
    expect(consumed).toBe(8);
  });
});
