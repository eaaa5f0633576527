import { createHash } from 'crypto';

export const JOB_ID_LENGTH = 12;

/**
 * Stable job id for a posting source (URL, file path or caller-supplied key).
 * The same source always yields the same id.
 */
export function computeJobId(source: string): string {
  return createHash('md5').update(source.trim()).digest('hex').slice(0, JOB_ID_LENGTH);
}
