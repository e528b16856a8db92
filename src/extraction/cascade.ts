import { logger } from '../utils/logger.js';
import { errorMessage, withTimeout } from '../utils/async.js';

/**
 * One way of pulling candidates (courses, assignments) out of a page.
 * Implementations return [] rather than throwing on markup they do not
 * understand; the driver still guards against a throw.
 */
export interface ExtractionStrategy<I, C> {
  readonly name: string;
  /** Strategies backed by an optional service (the language model) report here. */
  isAvailable?(): Promise<boolean>;
  extract(input: I): Promise<C[]>;
}

export interface CascadeOptions {
  /** Per-strategy budget; 0 disables the timer. */
  timeoutMs?: number;
  /** Label for log lines, e.g. the course name. */
  label?: string;
}

export interface CascadeResult<C> {
  items: C[];
  /** Name of the strategy that produced `items`, or null when all came back empty. */
  strategy: string | null;
  /** Strategies that were tried, in order. */
  attempted: string[];
  /** One line per strategy that threw or timed out. */
  failures: string[];
}

/** Keep the first candidate for each key, in input order. */
export function dedupeBy<C>(items: C[], key: (item: C) => string): C[] {
  const seen = new Set<string>();
  const result: C[] = [];
  for (const item of items) {
    const k = key(item);
    if (seen.has(k)) continue;
    seen.add(k);
    result.push(item);
  }
  return result;
}

/**
 * Try strategies in priority order and stop at the first one that returns
 * candidates. Results are never merged across strategies.
 */
export async function runCascade<I, C extends { url: string }>(
  strategies: ReadonlyArray<ExtractionStrategy<I, C>>,
  input: I,
  options: CascadeOptions = {}
): Promise<CascadeResult<C>> {
  const label = options.label ? ` (${options.label})` : '';
  const attempted: string[] = [];
  const failures: string[] = [];

  for (const strategy of strategies) {
    if (strategy.isAvailable) {
      let available = false;
      try {
        available = await strategy.isAvailable();
      } catch (error) {
        logger.debug(`Strategy ${strategy.name} availability check failed: ${error}`);
      }
      if (!available) {
        logger.debug(`Strategy ${strategy.name}${label}: unavailable, skipping`);
        continue;
      }
    }

    attempted.push(strategy.name);
    try {
      const items = await withTimeout(
        strategy.extract(input),
        options.timeoutMs ?? 0,
        `Strategy ${strategy.name}`
      );
      if (items.length > 0) {
        const unique = dedupeBy(items, (item) => item.url);
        logger.info(`Strategy ${strategy.name}${label}: ${unique.length} result(s)`);
        return { items: unique, strategy: strategy.name, attempted, failures };
      }
      logger.debug(`Strategy ${strategy.name}${label}: no results`);
    } catch (error) {
      const message = `Strategy ${strategy.name}${label} failed: ${errorMessage(error)}`;
      logger.warn(message);
      failures.push(message);
    }
  }

  return { items: [], strategy: null, attempted, failures };
}
