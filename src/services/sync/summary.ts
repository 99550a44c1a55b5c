import type {
  SeasonSyncSummary,
  SyncCounts,
  SyncSummary,
} from "../../types/index.js";

export function emptyCounts(): SyncCounts {
  return {
    totalMatches: 0,
    newMatches: 0,
    updatedMatches: 0,
    skippedMatches: 0,
    errors: [],
  };
}

/**
 * Fold per-season results into one batch summary. Errors keep processing
 * order.
 */
export function mergeSummaries(
  seasons: string[],
  results: SeasonSyncSummary[],
  forceUpdate: boolean,
  updatedAt: Date = new Date()
): SyncSummary {
  const counts = emptyCounts();

  for (const result of results) {
    counts.totalMatches += result.totalMatches;
    counts.newMatches += result.newMatches;
    counts.updatedMatches += result.updatedMatches;
    counts.skippedMatches += result.skippedMatches;
    counts.errors.push(...result.errors);
  }

  return {
    updatedAt: updatedAt.toISOString(),
    seasons: [...seasons],
    forceUpdate,
    ...counts,
  };
}
