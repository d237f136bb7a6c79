/*
 * C64 Commander - Configure and control your Commodore 64 Ultimate over your local network
 * Copyright (C) 2026 Christian Gleissner
 *
 * Licensed under the GNU General Public License v2.0 or later.
 * See <https://www.gnu.org/licenses/> for details.
 */

import { promises as fs } from 'node:fs';
import { z } from 'zod';
import { AudioError, describeCause } from './audioErrors';

export const StatusRecordSchema = z
  .object({
    ID: z.number().int().nonnegative(),
    Name: z.string(),
    Volume: z.number().optional(),
    Paused: z.boolean().optional(),
    Loop: z.number().int().optional(),
    Duration: z.number().optional(),
    Remaining: z.number().optional(),
    StartTime: z.string().optional(),
    EndTime: z.string().optional(),
  })
  .passthrough();

// Records are only checked against StatusRecordSchema once a lookup matches
// them, so one odd entry does not hide the others.
export const StatusDocumentSchema = z
  .object({
    Running: z.boolean(),
    Disabled: z.boolean(),
    // The daemon writes null rather than [] when nothing is playing.
    Sources: z
      .array(z.record(z.string(), z.unknown()))
      .nullish()
      .transform((sources) => sources ?? []),
  })
  .passthrough();

export type StatusRecord = z.infer<typeof StatusRecordSchema>;
export type StatusDocument = z.infer<typeof StatusDocumentSchema>;
type RawStatusRecord = StatusDocument['Sources'][number];

const formatIssues = (error: z.ZodError) =>
  error.issues
    .map((issue) => `${issue.path.length ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    .join('; ');

export const parseStatusText = (text: string): StatusDocument => {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new AudioError(`Error in parsing JSON. (${describeCause(error)})`, 'parse', { cause: error });
  }
  const result = StatusDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new AudioError(`Error in parsing JSON. (${formatIssues(result.error)})`, 'parse', {
      cause: result.error,
    });
  }
  return result.data;
};

/** Reads the daemon's status file. Every call goes back to disk. */
export class StatusResolver {
  constructor(private readonly statusPath: string) {}

  get path(): string {
    return this.statusPath;
  }

  async parseStatus(): Promise<StatusDocument> {
    let text: string;
    try {
      text = await fs.readFile(this.statusPath, 'utf8');
    } catch (error) {
      throw new AudioError(`Error in reading ${this.statusPath}. (${describeCause(error)})`, 'io', {
        path: this.statusPath,
        cause: error,
      });
    }
    try {
      return parseStatusText(text);
    } catch (error) {
      if (error instanceof AudioError) {
        throw new AudioError(error.message, error.code, { path: this.statusPath, cause: error.cause });
      }
      throw error;
    }
  }

  /**
   * First matching record that validates. Matches that fail validation are
   * skipped; if nothing else matches, the first of them is reported as `parse`.
   */
  private async findRecord(matches: (source: RawStatusRecord) => boolean, label: string): Promise<StatusRecord> {
    const status = await this.parseStatus();
    let invalid: z.ZodError | null = null;
    for (const source of status.Sources) {
      if (!matches(source)) continue;
      const result = StatusRecordSchema.safeParse(source);
      if (result.success) return result.data;
      invalid ??= result.error;
    }
    if (invalid) {
      throw new AudioError(`Error in parsing audio source with ${label}. (${formatIssues(invalid)})`, 'parse', {
        path: this.statusPath,
        cause: invalid,
      });
    }
    throw new AudioError(`No audio source found with ${label}.`, 'not-found', { path: this.statusPath });
  }

  findById(id: number): Promise<StatusRecord> {
    return this.findRecord((source) => source.ID === id, `id ${id}`);
  }

  findByName(name: string): Promise<StatusRecord> {
    return this.findRecord((source) => source.Name === name, `name ${name}`);
  }

  async isRunning(): Promise<boolean> {
    const status = await this.parseStatus();
    return status.Running;
  }

  async isDisabled(): Promise<boolean> {
    const status = await this.parseStatus();
    return status.Disabled;
  }
}
