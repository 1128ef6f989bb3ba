import type { ExportFormat, SimulationResult } from '../types/simulation'
import { formatPace, msToKmh } from '../utils/format'

export interface ExportedFile {
  content: string
  mimeType: string
  filename: string
}

const CSV_HEADER = [
  'discipline', 'segment', 'distance_m', 'grade_pct', 'power_w', 'pace',
  'speed_kmh', 'time_s', 'cumulative_km', 'cumulative_min'
].join(',')

export class ExportService {

  toCsv(result: SimulationResult): string {
    const lines: string[] = [CSV_HEADER]

    if (result.cycling) {
      const { segments, cumulativeDistance, cumulativeTime } = result.cycling.route
      segments.forEach((s, i) => {
        lines.push([
          'cycling', i + 1, s.distance.toFixed(1), (s.grade * 100).toFixed(2), s.power.toFixed(0), '',
          msToKmh(s.speed).toFixed(2), s.time.toFixed(1), cumulativeDistance[i].toFixed(3), cumulativeTime[i].toFixed(2)
        ].join(','))
      })
    }

    if (result.running) {
      const { segments, cumulativeDistance, cumulativeTime } = result.running.route
      segments.forEach((s, i) => {
        lines.push([
          'running', i + 1, s.distance.toFixed(1), (s.grade * 100).toFixed(2), '', formatPace(s.pace),
          msToKmh(s.speed).toFixed(2), s.time.toFixed(1), cumulativeDistance[i].toFixed(3), cumulativeTime[i].toFixed(2)
        ].join(','))
      })
    }

    return lines.join('\n') + '\n'
  }

  export(result: SimulationResult, format: ExportFormat): ExportedFile {
    const base = (result.stats.name || 'route').replace(/[^a-zA-Z0-9]/g, '_')
    switch (format) {
      case 'csv':
        return {
          content: this.toCsv(result),
          mimeType: 'text/csv',
          filename: `${base}_pacing.csv`
        }
      case 'json':
        return {
          content: JSON.stringify(result, null, 2),
          mimeType: 'application/json',
          filename: `${base}_pacing.json`
        }
    }
  }
}
