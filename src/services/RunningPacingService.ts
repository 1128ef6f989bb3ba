import type { Segment } from '../types/track'
import type { PaceSource, RunningPolicy, RunningSegmentResult } from '../types/simulation'

export const UPHILL_PENALTY = 12.0       // s/km per % grade
export const DOWNHILL_GAIN = 6.0         // s/km per % grade
export const MAX_DOWNHILL_GAIN = 18.0    // s/km
export const MIN_PACE_RATIO = 0.85

/**
 * Grade-adjusted pace in s/km. Uphill adds a fixed penalty per percent;
 * downhill gains are capped both in absolute terms and at 15% of the
 * base pace.
 */
export function adjustPace(basePace: number, grade: number): number {
  const pct = grade * 100
  if (pct > 0) return basePace + UPHILL_PENALTY * pct

  const improvement = Math.min(DOWNHILL_GAIN * -pct, MAX_DOWNHILL_GAIN)
  return Math.max(basePace - improvement, basePace * MIN_PACE_RATIO)
}

// km/h → s/km
export const speedToPace = (kmh: number): number => 3600 / kmh

export function resolveBasePace(source: PaceSource): number {
  if (source.basePace !== undefined) return source.basePace
  return speedToPace(source.referenceSpeed)
}

export function simulateRunning(segments: Segment[], policy: RunningPolicy): RunningSegmentResult[] {
  // constant offset for the whole run, not compounded per segment
  const basePace = policy.basePace * (1 + policy.fatigueFactor)

  return segments.map(segment => {
    const pace = adjustPace(basePace, segment.grade)
    const speed = pace > 0 ? 1000 / pace : 0
    const time = speed > 0 ? segment.distance / speed : 0
    return { distance: segment.distance, grade: segment.grade, pace, speed, time }
  })
}
