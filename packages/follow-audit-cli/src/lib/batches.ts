import type { Link } from "./links.js";
import type { BrowserService } from "./ports/browser.js";
import type { DelayFn } from "./ports/timer.js";
import type { Logger } from "./logger.js";
import { createNoopLogger } from "./logger.js";
import { browserOpenFailed } from "./errors/catalog.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface Batch {
  /** 1-based position of this batch */
  index: number;
  links: Link[];
}

export interface BatchOptions {
  /** Links per batch (at least 1) */
  batchSize: number;
  /** Pause after each batch in milliseconds */
  pauseMs: number;
  /** Also pause after the final batch */
  trailingPause?: boolean;
  /** Report links without opening them or pausing */
  dryRun?: boolean;
}

export interface BatchSummary {
  total: number;
  batches: number;
  opened: number;
}

/**
 * Progress callbacks. Every hook is optional so callers can observe only
 * what they render.
 */
export interface BatchReporter {
  onBatchStart?(batch: Batch, totalBatches: number): void;
  onLink?(link: Link, batch: Batch): void;
  onPauseStart?(ms: number, batch: Batch): void;
  onPauseEnd?(batch: Batch): void;
}

export interface BatchDeps {
  browser: BrowserService;
  delay: DelayFn;
  reporter?: BatchReporter;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Chunking
// ---------------------------------------------------------------------------

/**
 * Split into consecutive chunks of `size`; the last chunk may be shorter.
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Batch size must be a positive integer, got ${size}`);
  }

  const chunks: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    chunks.push(items.slice(start, start + size));
  }
  return chunks;
}

export function toBatches(links: readonly Link[], size: number): Batch[] {
  return chunk(links, size).map((group, i) => ({ index: i + 1, links: group }));
}

// ---------------------------------------------------------------------------
// Opening
// ---------------------------------------------------------------------------

/**
 * Open links batch by batch, one at a time, pausing after each batch.
 * A browser failure aborts the run.
 */
export async function openInBatches(
  links: readonly Link[],
  options: BatchOptions,
  deps: BatchDeps
): Promise<BatchSummary> {
  if (!Number.isFinite(options.pauseMs) || options.pauseMs < 0) {
    throw new RangeError(`Pause must be zero or more milliseconds, got ${options.pauseMs}`);
  }

  const { browser, delay, reporter = {}, logger = createNoopLogger() } = deps;
  const trailingPause = options.trailingPause ?? true;
  const batches = toBatches(links, options.batchSize);
  let opened = 0;

  for (const batch of batches) {
    reporter.onBatchStart?.(batch, batches.length);

    for (const link of batch.links) {
      reporter.onLink?.(link, batch);
      if (options.dryRun) continue;

      try {
        await browser.open(link);
      } catch (error) {
        throw browserOpenFailed(link, error);
      }
      opened++;
      logger.debug("Opened link", { link, batch: batch.index });
    }

    if (options.dryRun) continue;

    const isLast = batch.index === batches.length;
    if (isLast && !trailingPause) continue;

    reporter.onPauseStart?.(options.pauseMs, batch);
    await delay(options.pauseMs);
    reporter.onPauseEnd?.(batch);
  }

  return { total: links.length, batches: batches.length, opened };
}
