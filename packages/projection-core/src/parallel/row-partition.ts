// ---------------------------------------------------------------------------
// Row partitioning for the resampling kernels
// ---------------------------------------------------------------------------
// Every kernel reads immutable inputs and writes only the rows it is given,
// so any split of the rows produces the same bytes as a single pass. The
// ranges are what a worker pool would be handed one each.
// ---------------------------------------------------------------------------

import type { RowRange } from '../types.js';

/** A kernel that fills the output rows `[range.start, range.end)`. */
export type RowKernel = (range: RowRange) => void;

/**
 * Split `height` rows into at most `chunks` contiguous ranges as evenly as
 * possible. The first `height % chunks` ranges get one extra row.
 */
export function partitionRows(height: number, chunks: number): RowRange[] {
  if (!Number.isInteger(chunks) || chunks < 1) {
    throw new RangeError(`chunks must be a positive integer, got ${chunks}`);
  }
  if (height <= 0) {
    return [];
  }

  const ranges: RowRange[] = [];
  const baseSize = Math.floor(height / chunks);
  const remainder = height % chunks;
  let start = 0;

  for (let i = 0; i < chunks; i++) {
    const size = baseSize + (i < remainder ? 1 : 0);
    if (size === 0) break;
    ranges.push({ start, end: start + size });
    start += size;
  }

  return ranges;
}

/** Run `kernel` over every range of {@link partitionRows}. */
export function forEachRowRange(height: number, chunks: number, kernel: RowKernel): void {
  for (const range of partitionRows(height, chunks)) {
    kernel(range);
  }
}
