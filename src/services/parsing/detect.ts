/**
 * Table configuration detection from a file's header
 *
 * @module services/parsing/detect
 */

import { configuredFields, type TableConfig } from '../../models/table-config.js';
import { InputValidationError } from '../../utils/validation.js';

/**
 * Pick the configuration whose source fields overlap most with the headers.
 *
 * @throws InputValidationError when nothing overlaps or the best overlap is shared
 */
export function detectTableConfig(
  headers: readonly string[],
  configs: Iterable<TableConfig>
): TableConfig {
  const present = new Set(headers);
  const scored = [...configs]
    .map((config) => ({
      config,
      score: configuredFields(config).filter((f) => present.has(f)).length,
    }))
    .sort((a, b) => b.score - a.score);

  const best = scored[0];
  if (best === undefined || best.score === 0) {
    throw new InputValidationError(
      `No table configuration matches the file headers: ${headers.join(', ') || '(none)'}`
    );
  }

  const tied = scored.filter((s) => s.score === best.score);
  if (tied.length > 1) {
    throw new InputValidationError(
      `Ambiguous table configuration: ${tied.map((s) => s.config.table).join(', ')} each match ${String(best.score)} fields`
    );
  }
  return best.config;
}
