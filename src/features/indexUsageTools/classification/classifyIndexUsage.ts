/**
 * Returned in place of a ratio whose denominator is zero.
 */
export const RATIO_SENTINEL = 999999;

export interface IndexUsageCounters {
  seeks: number;
  scans: number;
  lookups: number;
  updates: number;
  isClustered: boolean;
}

export const INDEX_RECOMMENDATIONS = [
  'CONSIDER DROPPING - Unused',
  'OPTIMIZE - High Scans, No Seeks',
  'OPTIMIZE - Poor Scan/Seek Ratio',
  'COVERING INDEX - High Key Lookups',
  'HIGH MAINTENANCE - More Updates than Reads',
  'PERFORMING WELL',
  'NORMAL USAGE',
] as const;

export type IndexRecommendation = (typeof INDEX_RECOMMENDATIONS)[number];

export interface IndexUsageThresholds {
  /** An unread index is a drop candidate only below this many updates. */
  unusedMaxUpdates: number;
  highScansNoSeeks: number;
  poorScanToSeekRatio: number;
  highLookupPercentage: number;
  highMaintenanceReadToWriteRatio: number;
  performingWellReads: number;
  priority: {
    unused: number;
    heavyScans: { minScans: number; score: number };
    poorScanToSeekRatio: { minRatio: number; score: number };
    heavyLookups: { minLookups: number; score: number };
  };
}

export const DEFAULT_INDEX_USAGE_THRESHOLDS: IndexUsageThresholds = {
  unusedMaxUpdates: 100,
  highScansNoSeeks: 1000,
  poorScanToSeekRatio: 10,
  highLookupPercentage: 50,
  highMaintenanceReadToWriteRatio: 0.1,
  performingWellReads: 10000,
  priority: {
    unused: 90,
    heavyScans: { minScans: 100000, score: 80 },
    poorScanToSeekRatio: { minRatio: 50, score: 70 },
    heavyLookups: { minLookups: 10000, score: 60 },
  },
};

export interface IndexUsageRatios {
  totalReads: number;
  /** Higher means less efficient. */
  scanToSeekRatio: number;
  /** Lower means a higher maintenance cost per read. */
  readToWriteRatio: number;
  /** High values suggest a covering index. */
  lookupPercentage: number;
}

export interface IndexUsageClassification extends IndexUsageRatios {
  recommendation: IndexRecommendation;
  priorityScore: number;
}

function assertCounter(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(
      `${name} must be a non-negative integer, received ${value}`
    );
  }
}

function assertCounters(counters: IndexUsageCounters): void {
  assertCounter('seeks', counters.seeks);
  assertCounter('scans', counters.scans);
  assertCounter('lookups', counters.lookups);
  assertCounter('updates', counters.updates);
}

export function computeUsageRatios({
  seeks,
  scans,
  lookups,
  updates,
}: IndexUsageCounters): IndexUsageRatios {
  const totalReads = seeks + scans + lookups;

  let scanToSeekRatio: number;
  if (seeks === 0) {
    scanToSeekRatio = scans > 0 ? RATIO_SENTINEL : 0;
  } else {
    scanToSeekRatio = scans / seeks;
  }

  const readToWriteRatio =
    updates === 0 ? RATIO_SENTINEL : totalReads / updates;

  const lookupPercentage =
    totalReads === 0 ? 0 : (lookups * 100) / totalReads;

  return { totalReads, scanToSeekRatio, readToWriteRatio, lookupPercentage };
}

function recommend(
  counters: IndexUsageCounters,
  ratios: IndexUsageRatios,
  thresholds: IndexUsageThresholds
): IndexRecommendation {
  const { seeks, scans, lookups, updates, isClustered } = counters;

  if (
    ratios.totalReads === 0 &&
    updates < thresholds.unusedMaxUpdates &&
    !isClustered
  ) {
    return 'CONSIDER DROPPING - Unused';
  }
  if (seeks === 0 && scans > thresholds.highScansNoSeeks) {
    return 'OPTIMIZE - High Scans, No Seeks';
  }
  if (seeks > 0 && ratios.scanToSeekRatio > thresholds.poorScanToSeekRatio) {
    return 'OPTIMIZE - Poor Scan/Seek Ratio';
  }
  if (
    lookups > 0 &&
    ratios.lookupPercentage > thresholds.highLookupPercentage
  ) {
    return 'COVERING INDEX - High Key Lookups';
  }
  if (
    updates > 0 &&
    ratios.readToWriteRatio < thresholds.highMaintenanceReadToWriteRatio
  ) {
    return 'HIGH MAINTENANCE - More Updates than Reads';
  }
  if (seeks + scans > thresholds.performingWellReads && lookups === 0) {
    return 'PERFORMING WELL';
  }
  return 'NORMAL USAGE';
}

function prioritize(
  counters: IndexUsageCounters,
  ratios: IndexUsageRatios,
  { priority }: IndexUsageThresholds
): number {
  const { seeks, scans, lookups, isClustered } = counters;

  if (ratios.totalReads === 0 && !isClustered) {
    return priority.unused;
  }
  if (scans > priority.heavyScans.minScans && seeks === 0) {
    return priority.heavyScans.score;
  }
  // A zero-seek index has no scan/seek ratio to rank on here.
  if (
    seeks > 0 &&
    ratios.scanToSeekRatio > priority.poorScanToSeekRatio.minRatio
  ) {
    return priority.poorScanToSeekRatio.score;
  }
  if (lookups > priority.heavyLookups.minLookups) {
    return priority.heavyLookups.score;
  }
  return 0;
}

/**
 * Labels an index from its usage counters and scores how urgently it needs
 * attention. The first matching rule wins for both the label and the score.
 *
 * @throws RangeError when a counter is negative or not an integer
 */
export function classifyIndexUsage(
  counters: IndexUsageCounters,
  thresholds: IndexUsageThresholds = DEFAULT_INDEX_USAGE_THRESHOLDS
): IndexUsageClassification {
  assertCounters(counters);
  const ratios = computeUsageRatios(counters);
  return {
    ...ratios,
    recommendation: recommend(counters, ratios, thresholds),
    priorityScore: prioritize(counters, ratios, thresholds),
  };
}
