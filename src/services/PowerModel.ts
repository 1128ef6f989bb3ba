import type { RiderParameters } from '../types/simulation'

export const GRAVITY = 9.81
export const AIR_DENSITY = 1.225

export const MIN_SPEED = 0.1
export const MAX_SPEED = 25.0
export const SOLVER_ITERATIONS = 50

/**
 * Power (W) needed to hold `v` m/s on a slope of `grade`:
 * rolling resistance + aerodynamic drag + gravity.
 */
export function powerRequired(v: number, grade: number, rider: RiderParameters): number {
  const theta = Math.atan(grade)
  const rolling = rider.crr * rider.mass * GRAVITY * Math.cos(theta) * v
  const drag = 0.5 * AIR_DENSITY * rider.cda * v * v * v
  const climbing = rider.mass * GRAVITY * Math.sin(theta) * v
  return rolling + drag + climbing
}

/**
 * Inverts {@link powerRequired} by bisection over [MIN_SPEED, MAX_SPEED].
 *
 * Runs a fixed number of halvings and returns the last midpoint. A power
 * outside what the bracket can produce converges to the nearest edge
 * instead of failing.
 */
export function solveVelocity(power: number, grade: number, rider: RiderParameters): number {
  let lo = MIN_SPEED
  let hi = MAX_SPEED

  for (let i = 0; i < SOLVER_ITERATIONS; i++) {
    const mid = (lo + hi) / 2
    if (powerRequired(mid, grade, rider) > power) hi = mid
    else lo = mid
  }

  return (lo + hi) / 2
}
