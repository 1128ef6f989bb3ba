import { describe, it, expect } from 'vitest'
import { MAX_SPEED, MIN_SPEED, powerRequired, solveVelocity } from '../PowerModel'

const rider = { mass: 80, cda: 0.3, crr: 0.004 }

describe('powerRequired', () => {
  it('adds rolling resistance and drag on the flat', () => {
    // 0.004 * 80 * 9.81 * 10 + 0.5 * 1.225 * 0.3 * 1000
    expect(powerRequired(10, 0, rider)).toBeCloseTo(31.392 + 183.75, 9)
  })

  it('adds the climbing term on a slope', () => {
    const theta = Math.atan(0.05)
    const expected =
      0.004 * 80 * 9.81 * Math.cos(theta) * 5 +
      0.5 * 1.225 * 0.3 * 125 +
      80 * 9.81 * Math.sin(theta) * 5
    expect(powerRequired(5, 0.05, rider)).toBeCloseTo(expected, 9)
  })

  it('is strictly increasing in speed', () => {
    for (const grade of [0, 0.02, 0.08]) {
      let previous = powerRequired(0.05, grade, rider)
      for (let v = 0.1; v <= 25; v += 0.1) {
        const p = powerRequired(v, grade, rider)
        expect(p).toBeGreaterThan(previous)
        previous = p
      }
    }
  })
})

describe('solveVelocity', () => {
  it('recovers the speed that produced a given power', () => {
    for (const grade of [0, 0.03, 0.08]) {
      for (const v0 of [0.5, 5, 12.3, 24]) {
        const power = powerRequired(v0, grade, rider)
        expect(Math.abs(solveVelocity(power, grade, rider) - v0)).toBeLessThan(1e-6)
      }
    }
  })

  it('settles on the upper bound when the power is out of reach', () => {
    expect(Math.abs(solveVelocity(1e6, 0, rider) - MAX_SPEED)).toBeLessThan(1e-6)
  })

  it('settles on the lower bound when the power is too small', () => {
    expect(Math.abs(solveVelocity(0, 0, rider) - MIN_SPEED)).toBeLessThan(1e-6)
  })
})
