import { AnalysisConfigOptions } from "./types";

export const DEFAULT_SECTION_COUNT = 10;
export const DEFAULT_GAP_SEC = 1.2;
export const DEFAULT_SECTION_GAP_SEC = 4;
export const DEFAULT_MAX_SUBSECTION_SEC = 60;
export const DEFAULT_RISE_RATIO = 1.5;
export const DEFAULT_MIN_SUBSECTION_SEC = 2;
export const DEFAULT_PEAK_DISTANCE_SEC = 1;

export class AnalysisConfig {
  section_count: number;
  gap_sec: number;
  section_gap_sec: number;
  max_subsection_sec: number;
  rise_ratio: number;
  min_subsection_sec: number;
  peak_distance_sec: number;

  constructor(options: AnalysisConfigOptions = {}) {
    this.section_count = positiveInt(options.sectionCount ?? DEFAULT_SECTION_COUNT, "sectionCount");
    this.gap_sec = nonNegative(options.gapSec ?? DEFAULT_GAP_SEC, "gapSec");
    this.section_gap_sec = nonNegative(options.sectionGapSec ?? DEFAULT_SECTION_GAP_SEC, "sectionGapSec");
    this.max_subsection_sec = nonNegative(
      options.maxSubsectionSec ?? DEFAULT_MAX_SUBSECTION_SEC,
      "maxSubsectionSec"
    );
    this.rise_ratio = options.riseRatio ?? DEFAULT_RISE_RATIO;
    if (!(this.rise_ratio > 1)) {
      throw new Error(`riseRatio must be greater than 1, got ${this.rise_ratio}`);
    }
    this.min_subsection_sec = nonNegative(
      options.minSubsectionSec ?? DEFAULT_MIN_SUBSECTION_SEC,
      "minSubsectionSec"
    );
    this.peak_distance_sec = nonNegative(
      options.peakDistanceSec ?? DEFAULT_PEAK_DISTANCE_SEC,
      "peakDistanceSec"
    );
  }
}

function positiveInt(value: number, name: string): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

function nonNegative(value: number, name: string): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`${name} must be a non-negative number, got ${value}`);
  }
  return value;
}
