import type { Segment } from '../types/track'
import type {
  CyclingSegmentResult,
  CyclingSummary,
  RouteResult,
  RunningSegmentResult,
  RunningSummary
} from '../types/simulation'

type TimedSegment = Segment & { time: number }

export function buildRouteResult<T extends TimedSegment>(segments: T[]): RouteResult<T> {
  const cumulativeDistance: number[] = []
  const cumulativeTime: number[] = []
  let meters = 0
  let seconds = 0

  for (const s of segments) {
    meters += s.distance
    seconds += s.time
    cumulativeDistance.push(meters / 1000)
    cumulativeTime.push(seconds / 60)
  }

  return { segments, cumulativeDistance, cumulativeTime }
}

const totals = (segments: TimedSegment[]) => {
  let meters = 0
  let seconds = 0
  for (const s of segments) {
    meters += s.distance
    seconds += s.time
  }
  return { meters, seconds }
}

export function summarizeCycling(segments: CyclingSegmentResult[], criticalPower: number): CyclingSummary {
  const { meters, seconds } = totals(segments)
  const work = segments.reduce((sum, s) => sum + s.power * s.time, 0)

  const averagePower = seconds > 0 ? work / seconds : 0
  const intensityFactor = criticalPower > 0 ? averagePower / criticalPower : 0
  const hours = seconds / 3600

  return {
    totalDistance: meters / 1000,
    totalTime: hours,
    averagePower,
    intensityFactor,
    trainingStressScore: hours * intensityFactor * intensityFactor * 100
  }
}

export function summarizeRunning(segments: RunningSegmentResult[]): RunningSummary {
  const { meters, seconds } = totals(segments)
  const km = meters / 1000

  return {
    totalDistance: km,
    totalTime: seconds / 3600,
    averagePace: km > 0 ? seconds / 60 / km : null
  }
}
