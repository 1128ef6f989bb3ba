import type { Segment, SamplePoint, TrackStats } from './track'

export interface RiderParameters {
  mass: number  // rider + bike, kg
  cda: number   // m²
  crr: number
}

export interface CyclingPolicy {
  targetPower: number    // W
  criticalPower: number  // W, CP / FTP
}

export type CyclingParameters = RiderParameters & CyclingPolicy

// Exactly one of the two is the source of truth for a run
export type PaceSource =
  | { basePace: number; referenceSpeed?: undefined }   // s/km
  | { referenceSpeed: number; basePace?: undefined }   // km/h

export type RunningParameters = PaceSource & {
  fatigueFactor: number  // 0.1 = 10% slower
}

export interface RunningPolicy {
  basePace: number  // s/km, resolved from PaceSource
  fatigueFactor: number
}

export interface CyclingSegmentResult extends Segment {
  power: number  // W
  speed: number  // m/s
  time: number   // s
}

export interface RunningSegmentResult extends Segment {
  pace: number   // s/km
  speed: number  // m/s
  time: number   // s
}

export interface RouteResult<T extends Segment> {
  segments: T[]
  cumulativeDistance: number[]  // km
  cumulativeTime: number[]      // min
}

export interface CyclingSummary {
  totalDistance: number  // km
  totalTime: number      // h
  averagePower: number
  intensityFactor: number
  trainingStressScore: number
}

export interface RunningSummary {
  totalDistance: number  // km
  totalTime: number      // h
  averagePace: number | null  // min/km
}

export interface CyclingSimulation {
  route: RouteResult<CyclingSegmentResult>
  summary: CyclingSummary
}

export interface RunningSimulation {
  route: RouteResult<RunningSegmentResult>
  summary: RunningSummary
}

export interface MultisportSummary {
  totalTime: number  // h, bike + run
  fatigueFactor: number
}

export interface SimulationRequest {
  cycling?: CyclingParameters
  running?: RunningParameters
}

export interface SimulationResult {
  stats: TrackStats
  cycling?: CyclingSimulation
  running?: RunningSimulation
  multisport?: MultisportSummary
}

export type TrackInput =
  | { samples: SamplePoint[] }
  | { gpx: string }
  | { polyline: string }

export interface SimulateBody extends SimulationRequest {
  track: TrackInput
}

export type ExportFormat = 'csv' | 'json'
