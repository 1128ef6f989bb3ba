import type { Segment } from '../types/track'
import type { CyclingPolicy, CyclingSegmentResult, RiderParameters } from '../types/simulation'
import { solveVelocity } from './PowerModel'

export const CLIMB_GRADE = 0.05
export const RISE_GRADE = 0.02
export const DESCENT_GRADE = -0.03
export const MIN_DESCENT_POWER = 50

// Ordered: first matching tier wins
export function assignPower(grade: number, policy: CyclingPolicy): number {
  const { targetPower, criticalPower } = policy
  if (grade > CLIMB_GRADE) return Math.min(1.12 * targetPower, criticalPower)
  if (grade > RISE_GRADE) return 1.06 * targetPower
  if (grade < DESCENT_GRADE) return Math.max(0.6 * targetPower, MIN_DESCENT_POWER)
  return targetPower
}

export function simulateCycling(
  segments: Segment[],
  rider: RiderParameters,
  policy: CyclingPolicy
): CyclingSegmentResult[] {
  return segments.map(segment => {
    const power = assignPower(segment.grade, policy)
    const speed = solveVelocity(power, segment.grade, rider)
    const time = speed > 0 ? segment.distance / speed : 0
    return { distance: segment.distance, grade: segment.grade, power, speed, time }
  })
}
