/*
 * C64 Commander - Configure and control your Commodore 64 Ultimate over your local network
 * Copyright (C) 2026 Christian Gleissner
 *
 * Licensed under the GNU General Public License v2.0 or later.
 * See <https://www.gnu.org/licenses/> for details.
 */

import fs from 'node:fs';
import path from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';

export const DEFAULT_COMMAND_PATH = '/tmp/audio';
export const DEFAULT_STATUS_PATH = '/tmp/audioStatus.json';
export const DEFAULT_CONFIRM_TIMEOUT_MS = 2000;
export const DEFAULT_POLL_INTERVAL_MS = 5;
export const DEFAULT_NAME_PREFIX = 'ts_audio_';

export const AudioSettingsSchema = z.object({
  commandPath: z.string().min(1),
  statusPath: z.string().min(1),
  confirmTimeoutMs: z.number().int().min(0),
  // Kept well below the confirm timeout so a sleep never eats the whole budget.
  pollIntervalMs: z.number().int().min(0).max(100),
  namePrefix: z.string().min(1),
  debugLogging: z.boolean(),
});

export type AudioSettings = z.infer<typeof AudioSettingsSchema>;

export const DefaultAudioSettings: AudioSettings = {
  commandPath: DEFAULT_COMMAND_PATH,
  statusPath: DEFAULT_STATUS_PATH,
  confirmTimeoutMs: DEFAULT_CONFIRM_TIMEOUT_MS,
  pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
  namePrefix: DEFAULT_NAME_PREFIX,
  debugLogging: false,
};

type SettingsEnv = Record<string, string | undefined>;

const readEnvOverrides = (env: SettingsEnv): Partial<AudioSettings> => {
  const overrides: Partial<AudioSettings> = {};
  const commandPath = env.AUDIO_COMMAND_PATH?.trim();
  if (commandPath) overrides.commandPath = commandPath;
  const statusPath = env.AUDIO_STATUS_PATH?.trim();
  if (statusPath) overrides.statusPath = statusPath;
  return overrides;
};

// Explicit overrides win over the environment, which wins over the defaults.
export const resolveAudioSettings = (
  overrides: Partial<AudioSettings> = {},
  env: SettingsEnv = process.env,
): AudioSettings =>
  AudioSettingsSchema.parse({
    ...DefaultAudioSettings,
    ...readEnvOverrides(env),
    ...overrides,
  });

const parseSettingsFile = (absolutePath: string, raw: string): unknown => {
  const extension = path.extname(absolutePath).toLowerCase();
  if (extension === '.yaml' || extension === '.yml') {
    return yaml.load(raw);
  }
  return JSON.parse(raw);
};

export function loadAudioSettings(configPath?: string, env: SettingsEnv = process.env): AudioSettings {
  if (!configPath) {
    return resolveAudioSettings({}, env);
  }
  const absolutePath = path.isAbsolute(configPath) ? configPath : path.join(process.cwd(), configPath);
  const raw = fs.readFileSync(absolutePath, 'utf8');
  const data = AudioSettingsSchema.partial().parse(parseSettingsFile(absolutePath, raw) ?? {});
  return AudioSettingsSchema.parse({
    ...DefaultAudioSettings,
    ...data,
    ...readEnvOverrides(env),
  });
}
