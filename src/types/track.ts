export interface Sample {
    latitude: number
    longitude: number
    elevation: number  // metres, 0 when the source has none
  }

  export interface SamplePoint {
    latitude: number
    longitude: number
    elevation?: number
  }

  export interface Segment {
    distance: number  // metres
    grade: number     // rise / run, 0.05 = 5% climb
  }

  export interface TrackStats {
    name?: string
    totalDistance: number       // metres
    totalElevationGain: number  // metres
    totalElevationLoss: number  // metres
    maxElevation: number
    minElevation: number
    sampleCount: number
  }

  export interface ParsedTrack {
    name?: string
    samples: Sample[]
  }
