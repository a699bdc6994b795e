export interface HeapScanCounters {
  scans: number;
  seeks: number;
}

export type HeapRecommendation =
  | 'HIGH PRIORITY - Consider adding selective indexes'
  | 'MEDIUM - Monitor query patterns'
  | 'Normal';

export interface HeapScanThresholds {
  /** Heaps at or below this many scans are left out of the report. */
  minScans: number;
  high: { minScans: number; maxSeekShare: number };
  medium: { minScans: number; maxSeekShare: number };
}

export const DEFAULT_HEAP_SCAN_THRESHOLDS: HeapScanThresholds = {
  minScans: 100,
  high: { minScans: 1000, maxSeekShare: 0.1 },
  medium: { minScans: 500, maxSeekShare: 0.2 },
};

// Heaps scanned far more often than they are sought are missing a selective index.
export function classifyHeapScans(
  { scans, seeks }: HeapScanCounters,
  thresholds: HeapScanThresholds = DEFAULT_HEAP_SCAN_THRESHOLDS
): HeapRecommendation {
  const { high, medium } = thresholds;
  if (scans > high.minScans && seeks < scans * high.maxSeekShare) {
    return 'HIGH PRIORITY - Consider adding selective indexes';
  }
  if (scans > medium.minScans && seeks < scans * medium.maxSeekShare) {
    return 'MEDIUM - Monitor query patterns';
  }
  return 'Normal';
}
