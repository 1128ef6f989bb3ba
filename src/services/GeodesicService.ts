import type { Sample, Segment, TrackStats } from '../types/track'

export const EARTH_RADIUS = 6371000

const toRad = (d: number): number => d * (Math.PI / 180)

// Great-circle distance in metres (haversine)
export function calculateDistance(a: Sample, b: Sample): number {
  const dLat = toRad(b.latitude - a.latitude)
  const dLon = toRad(b.longitude - a.longitude)
  const lat1 = toRad(a.latitude)
  const lat2 = toRad(b.latitude)
  const sa = Math.sin(dLat / 2)
  const sb = Math.sin(dLon / 2)
  const h = sa * sa + Math.cos(lat1) * Math.cos(lat2) * sb * sb
  const c = 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h))
  return EARTH_RADIUS * c
}

/**
 * One segment per pair of consecutive samples. Elevation noise is not
 * filtered and goes straight into the grade.
 */
export function segmentTrack(samples: Sample[]): Segment[] {
  const segments: Segment[] = []
  for (let i = 1; i < samples.length; i++) {
    const prev = samples[i - 1]
    const curr = samples[i]
    const distance = calculateDistance(prev, curr)
    const grade = distance === 0 ? 0 : (curr.elevation - prev.elevation) / distance
    segments.push({ distance, grade })
  }
  return segments
}

export function describeTrack(samples: Sample[], name?: string): TrackStats {
  let totalDistance = 0
  let gain = 0
  let loss = 0
  let max = -Infinity
  let min = Infinity

  samples.forEach((s, i) => {
    if (s.elevation > max) max = s.elevation
    if (s.elevation < min) min = s.elevation
    if (i > 0) {
      const prev = samples[i - 1]
      totalDistance += calculateDistance(prev, s)
      const diff = s.elevation - prev.elevation
      if (diff > 0) gain += diff
      else loss += Math.abs(diff)
    }
  })

  return {
    name,
    totalDistance,
    totalElevationGain: gain,
    totalElevationLoss: loss,
    maxElevation: max === -Infinity ? 0 : max,
    minElevation: min === Infinity ? 0 : min,
    sampleCount: samples.length
  }
}
