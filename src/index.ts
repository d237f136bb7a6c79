/*
 * C64 Commander - Configure and control your Commodore 64 Ultimate over your local network
 * Copyright (C) 2026 Christian Gleissner
 *
 * Licensed under the GNU General Public License v2.0 or later.
 * See <https://www.gnu.org/licenses/> for details.
 */

// Client for the host audio daemon: start files and tones, read their status
// and change volume, pause and looping while they play.

export * from './lib/audio';
export {
  AudioSettingsSchema,
  DefaultAudioSettings,
  loadAudioSettings,
  resolveAudioSettings,
} from './lib/config/audioSettings';
export type { AudioSettings } from './lib/config/audioSettings';
export {
  clearLogs,
  formatLogsForShare,
  getErrorLogs,
  getLogs,
  setDebugLoggingEnabled,
  subscribeToLogs,
} from './lib/logging';
export type { LogEntry, LogLevel } from './lib/logging';
