import fs from 'fs/promises';
import { z } from 'zod';
import { Job } from '../types';

const TrackSchema = z.object({
  title: z.string().min(1),
  artist: z.string().min(1),
  album: z.string().default(''),
  durationSeconds: z.number().nonnegative().default(0),
  sourceLocator: z.string().optional(),
  artworkUrl: z.string().optional(),
  isrc: z.string().optional(),
  year: z.union([z.string(), z.number()]).transform(String).optional(),
  genre: z.string().optional(),
  trackNumber: z.number().int().positive().optional(),
  discNumber: z.number().int().positive().optional(),
});

export const JobSchema = z.object({
  folderName: z.string().min(1),
  artworkUrl: z.string().optional(),
  tracks: z.array(TrackSchema),
});

/**
 * Validate a job description
 */
export function parseJob(input: unknown): Job {
  const result = JobSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'job'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid job file: ${details}`);
  }
  return result.data;
}

export async function loadJobFile(filePath: string): Promise<Job> {
  const raw = await fs.readFile(filePath, 'utf8');
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new Error(`Invalid job file: ${filePath} is not valid JSON`);
  }
  return parseJob(json);
}
