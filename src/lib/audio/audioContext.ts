/*
 * C64 Commander - Configure and control your Commodore 64 Ultimate over your local network
 * Copyright (C) 2026 Christian Gleissner
 *
 * Licensed under the GNU General Public License v2.0 or later.
 * See <https://www.gnu.org/licenses/> for details.
 */

import { setDebugLoggingEnabled } from '@/lib/logging';
import { resolveAudioSettings, type AudioSettings } from '@/lib/config/audioSettings';
import { CommandWriteQueue } from './commandChannel';
import { provisionalNames, type ProvisionalNameSequence } from './provisionalNames';
import { StatusResolver } from './statusSnapshot';

export type AudioContext = {
  settings: AudioSettings;
  resolver: StatusResolver;
  commands: CommandWriteQueue;
  names: ProvisionalNameSequence;
};

export const createAudioContext = (
  settings: AudioSettings,
  names: ProvisionalNameSequence = provisionalNames,
): AudioContext => {
  if (settings.debugLogging) {
    setDebugLoggingEnabled(true);
  }
  return {
    settings,
    resolver: new StatusResolver(settings.statusPath),
    commands: new CommandWriteQueue(settings.commandPath),
    names,
  };
};

let defaultContext: AudioContext | null = null;

export const getDefaultAudioContext = (): AudioContext => {
  if (!defaultContext) {
    defaultContext = createAudioContext(resolveAudioSettings());
  }
  return defaultContext;
};

export const resetDefaultAudioContext = () => {
  defaultContext = null;
};
