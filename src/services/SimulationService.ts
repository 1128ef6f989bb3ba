import type { Sample, Segment } from '../types/track'
import type {
  CyclingParameters,
  CyclingSimulation,
  RunningParameters,
  RunningSimulation,
  SimulationRequest,
  SimulationResult
} from '../types/simulation'
import { ValidationError } from '../errors'
import { describeTrack, segmentTrack } from './GeodesicService'
import { simulateCycling } from './CyclingPacingService'
import { resolveBasePace, simulateRunning } from './RunningPacingService'
import { buildRouteResult, summarizeCycling, summarizeRunning } from './AggregationService'

const isFiniteNumber = (v: unknown): v is number => typeof v === 'number' && Number.isFinite(v)

function requirePositive(value: number, field: string) {
  if (!isFiniteNumber(value) || value <= 0) {
    throw new ValidationError(`${field} must be a positive number, got ${value}`)
  }
}

export function validateSamples(samples: Sample[]) {
  if (samples.length === 0) throw new ValidationError('Route has no samples')

  samples.forEach((s, i) => {
    if (!isFiniteNumber(s.latitude) || s.latitude < -90 || s.latitude > 90) {
      throw new ValidationError(`Sample ${i}: latitude out of range (${s.latitude})`)
    }
    if (!isFiniteNumber(s.longitude) || s.longitude < -180 || s.longitude > 180) {
      throw new ValidationError(`Sample ${i}: longitude out of range (${s.longitude})`)
    }
    if (!isFiniteNumber(s.elevation)) {
      throw new ValidationError(`Sample ${i}: elevation is not a number`)
    }
  })
}

export function validateCycling(params: CyclingParameters) {
  requirePositive(params.mass, 'mass')
  requirePositive(params.cda, 'cda')
  requirePositive(params.crr, 'crr')
  if (!isFiniteNumber(params.targetPower) || params.targetPower < 0) {
    throw new ValidationError(`targetPower must be >= 0, got ${params.targetPower}`)
  }
  // a non-positive CP is allowed, the intensity factor falls back to 0
  if (!isFiniteNumber(params.criticalPower)) {
    throw new ValidationError('criticalPower must be a number')
  }
}

export function validateRunning(params: RunningParameters) {
  const hasPace = params.basePace !== undefined
  const hasSpeed = params.referenceSpeed !== undefined
  if (hasPace === hasSpeed) {
    throw new ValidationError('Provide exactly one of basePace or referenceSpeed')
  }
  if (params.basePace !== undefined) requirePositive(params.basePace, 'basePace')
  else requirePositive(params.referenceSpeed, 'referenceSpeed')

  if (!isFiniteNumber(params.fatigueFactor) || params.fatigueFactor < 0) {
    throw new ValidationError(`fatigueFactor must be >= 0, got ${params.fatigueFactor}`)
  }
}

export class SimulationService {
  computeCycling(segments: Segment[], params: CyclingParameters): CyclingSimulation {
    validateCycling(params)
    const rows = simulateCycling(
      segments,
      { mass: params.mass, cda: params.cda, crr: params.crr },
      { targetPower: params.targetPower, criticalPower: params.criticalPower }
    )
    return { route: buildRouteResult(rows), summary: summarizeCycling(rows, params.criticalPower) }
  }

  computeRunning(segments: Segment[], params: RunningParameters): RunningSimulation {
    validateRunning(params)
    const rows = simulateRunning(segments, {
      basePace: resolveBasePace(params),
      fatigueFactor: params.fatigueFactor
    })
    return { route: buildRouteResult(rows), summary: summarizeRunning(rows) }
  }

  /**
   * Full re-run for one route and one set of parameters. Nothing is cached,
   * calling it again with the same input gives the same result.
   */
  computeRoute(samples: Sample[], request: SimulationRequest, name?: string): SimulationResult {
    if (!request.cycling && !request.running) {
      throw new ValidationError('Nothing to simulate: provide cycling and/or running parameters')
    }
    validateSamples(samples)
    if (request.cycling) validateCycling(request.cycling)
    if (request.running) validateRunning(request.running)

    const segments = segmentTrack(samples)
    const result: SimulationResult = { stats: describeTrack(samples, name) }

    if (request.cycling) result.cycling = this.computeCycling(segments, request.cycling)
    if (request.running) result.running = this.computeRunning(segments, request.running)

    if (result.cycling && result.running) {
      result.multisport = {
        totalTime: result.cycling.summary.totalTime + result.running.summary.totalTime,
        fatigueFactor: request.running?.fatigueFactor ?? 0
      }
    }

    return result
  }
}
