import { describe, it, expect } from 'vitest'
import { SimulationService } from '../SimulationService'
import { ValidationError } from '../../errors'

const samples = [
  { latitude: 45.0, longitude: 6.0, elevation: 500 },
  { latitude: 45.01, longitude: 6.0, elevation: 560 },
  { latitude: 45.02, longitude: 6.0, elevation: 560 },
  { latitude: 45.03, longitude: 6.0, elevation: 500 }
]

const cycling = { mass: 78, cda: 0.3, crr: 0.004, targetPower: 220, criticalPower: 260 }
const running = { basePace: 300, fatigueFactor: 0.05 }

describe('SimulationService', () => {
  const service = new SimulationService()

  it('runs both disciplines over the same segments', () => {
    const result = service.computeRoute(samples, { cycling, running }, 'Col')

    expect(result.stats.name).toBe('Col')
    expect(result.stats.sampleCount).toBe(4)
    expect(result.cycling?.route.segments).toHaveLength(3)
    expect(result.running?.route.segments).toHaveLength(3)
    expect(result.cycling?.route.segments.map(s => s.distance))
      .toEqual(result.running?.route.segments.map(s => s.distance))
  })

  it('adds up both legs in the multisport summary', () => {
    const result = service.computeRoute(samples, { cycling, running })

    expect(result.multisport?.fatigueFactor).toBe(0.05)
    expect(result.multisport?.totalTime).toBe(
      (result.cycling?.summary.totalTime ?? 0) + (result.running?.summary.totalTime ?? 0)
    )
  })

  it('only runs the requested discipline', () => {
    const result = service.computeRoute(samples, { running })
    expect(result.cycling).toBeUndefined()
    expect(result.multisport).toBeUndefined()
    expect(result.running?.summary.averagePace).not.toBeNull()
  })

  it('gives the same result for a reference speed and its pace', () => {
    const byPace = service.computeRoute(samples, { running: { basePace: 300, fatigueFactor: 0 } })
    const bySpeed = service.computeRoute(samples, { running: { referenceSpeed: 12, fatigueFactor: 0 } })
    expect(bySpeed.running).toEqual(byPace.running)
  })

  it('is idempotent', () => {
    const first = service.computeRoute(samples, { cycling, running })
    const second = service.computeRoute(samples, { cycling, running })
    expect(second).toEqual(first)
  })

  it('degrades to zero statistics on a single-sample route', () => {
    const result = service.computeRoute([samples[0]], { cycling, running })
    expect(result.cycling?.summary.totalTime).toBe(0)
    expect(result.cycling?.summary.averagePower).toBe(0)
    expect(result.running?.summary.averagePace).toBeNull()
  })

  it('rejects an empty route', () => {
    expect(() => service.computeRoute([], { cycling })).toThrow(ValidationError)
  })

  it('rejects non-positive physical parameters', () => {
    expect(() => service.computeRoute(samples, { cycling: { ...cycling, mass: 0 } }))
      .toThrow('mass must be a positive number, got 0')
    expect(() => service.computeRoute(samples, { cycling: { ...cycling, cda: -0.3 } }))
      .toThrow(ValidationError)
    expect(() => service.computeRoute(samples, { cycling: { ...cycling, crr: 0 } }))
      .toThrow(ValidationError)
  })

  it('accepts a non-positive critical power', () => {
    const result = service.computeRoute(samples, { cycling: { ...cycling, criticalPower: 0 } })
    expect(result.cycling?.summary.intensityFactor).toBe(0)
  })

  it('rejects out-of-range coordinates', () => {
    expect(() => service.computeRoute([{ latitude: 91, longitude: 0, elevation: 0 }], { running }))
      .toThrow('Sample 0: latitude out of range (91)')
  })

  it('rejects a negative fatigue factor', () => {
    expect(() => service.computeRoute(samples, { running: { basePace: 300, fatigueFactor: -0.1 } }))
      .toThrow(ValidationError)
  })

  it('requires at least one discipline', () => {
    expect(() => service.computeRoute(samples, {})).toThrow(ValidationError)
  })
})
