/**
 * Response parsing utilities for short model replies.
 */

/**
 * First run of digits in a reply ("Probability: 72%" -> 72), or null when the
 * reply carries no number at all ("N/A").
 */
export function extractFirstInteger(response: string): number | null {
  const match = response.match(/\d+/);
  if (!match) return null;
  const value = Number.parseInt(match[0], 10);
  return Number.isFinite(value) ? value : null;
}
