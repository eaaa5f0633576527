/**
 * Candidate profile loading. Read once at engine start-up; the engine never
 * writes it back.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { candidateProfileSchema, type CandidateProfile } from '@jobscope/schemas';

export class CandidateProfileError extends Error {
  readonly path: string;

  constructor(profilePath: string, message: string, options?: { cause?: unknown }) {
    super(`Candidate profile ${profilePath}: ${message}`, options);
    this.name = 'CandidateProfileError';
    this.path = profilePath;
  }
}

export function parseCandidateProfile(data: unknown, source = 'inline'): CandidateProfile {
  const result = candidateProfileSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new CandidateProfileError(source, `invalid profile (${issues})`, { cause: result.error });
  }
  return result.data;
}

export async function loadCandidateProfile(filePath: string): Promise<CandidateProfile> {
  const absolutePath = path.resolve(filePath);

  let raw: string;
  try {
    raw = await fs.readFile(absolutePath, 'utf-8');
  } catch (err) {
    throw new CandidateProfileError(absolutePath, 'file could not be read', { cause: err });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new CandidateProfileError(absolutePath, 'file is not valid JSON', { cause: err });
  }

  return parseCandidateProfile(data, absolutePath);
}
