import { DEFAULT_BURST_POLICY, DEFAULT_MIN_USAGE_FOR_REVIEW, REVIEW_WEIGHT_BANDS } from '../constants.js';

// =============================================================================
// Review Weighting
// =============================================================================

export interface BurstPolicy {
  /** Reviews, including the one being submitted, that make a burst */
  reviewCount: number;
  /** Maximum gap between consecutive reviews in a burst */
  windowMs: number;
  /** Multiplier applied to a damped review's weight */
  dampingFactor: number;
}

/**
 * Trust weight of a review given the reviewer's total usage of the skill.
 * Returns 0 below the usage gate.
 */
export function computeReviewWeight(totalUsage: number, minUsage: number = DEFAULT_MIN_USAGE_FOR_REVIEW): number {
  if (totalUsage < minUsage) {
    return 0;
  }

  for (const band of REVIEW_WEIGHT_BANDS) {
    if (totalUsage >= band.minUsage) {
      return band.weight;
    }
  }

  // Gate configured below the lowest band
  return REVIEW_WEIGHT_BANDS[REVIEW_WEIGHT_BANDS.length - 1]?.weight ?? 1.0;
}

/**
 * Whether the newest `policy.reviewCount` timestamps form a burst: every
 * consecutive gap strictly under the window.
 */
export function isReviewBurst(timestamps: number[], policy: BurstPolicy = DEFAULT_BURST_POLICY): boolean {
  if (timestamps.length < policy.reviewCount) {
    return false;
  }

  const newest = [...timestamps].sort((a, b) => b - a).slice(0, policy.reviewCount);
  for (let i = 1; i < newest.length; i++) {
    const newer = newest[i - 1];
    const older = newest[i];
    if (newer === undefined || older === undefined || newer - older >= policy.windowMs) {
      return false;
    }
  }
  return true;
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Weight-normalised mean rating rounded to 2 decimals; 0 without weight
 */
export function computeWeightedRating(weightedSum: number, totalWeight: number): number {
  if (totalWeight <= 0) {
    return 0;
  }
  return roundTo(weightedSum / totalWeight, 2);
}
