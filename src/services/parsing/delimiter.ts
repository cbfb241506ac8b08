/**
 * CSV delimiter detection
 *
 * @module services/parsing/delimiter
 */

/** Candidates in tie-break order */
export const DELIMITER_CANDIDATES = [',', ';', '\t', '|'] as const;

export const DEFAULT_DELIMITER = ',';

/** Bytes of input examined */
export const DELIMITER_SAMPLE_BYTES = 4096;

/**
 * Pick the candidate that occurs most often outside double-quoted sections.
 * Ties go to the earlier candidate; no occurrence at all gives ','.
 */
export function detectDelimiter(sample: string): string {
  const counts = new Map<string, number>(DELIMITER_CANDIDATES.map((d) => [d, 0]));
  let inQuotes = false;

  for (const ch of sample) {
    if (ch === '"') {
      inQuotes = !inQuotes;
      continue;
    }
    if (inQuotes) continue;
    const current = counts.get(ch);
    if (current !== undefined) {
      counts.set(ch, current + 1);
    }
  }

  let best: string = DEFAULT_DELIMITER;
  let bestCount = 0;
  for (const candidate of DELIMITER_CANDIDATES) {
    const count = counts.get(candidate) ?? 0;
    if (count > bestCount) {
      best = candidate;
      bestCount = count;
    }
  }
  return best;
}
