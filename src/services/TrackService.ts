import polyline from '@mapbox/polyline'
import { DOMParser } from '@xmldom/xmldom'
import type { ParsedTrack, Sample, SamplePoint } from '../types/track'
import { ValidationError } from '../errors'

// Turns the supported track sources into an ordered list of samples.
// No downsampling and no smoothing: points are kept as recorded.
export class TrackService {

  fromSamples(points: SamplePoint[]): Sample[] {
    return points.map(p => ({
      latitude: p.latitude,
      longitude: p.longitude,
      elevation: p.elevation ?? 0
    }))
  }

  parseGpx(content: string): ParsedTrack {
    const errors: string[] = []
    const parser = new DOMParser({
      errorHandler: {
        warning: () => undefined,
        error: (msg: string) => { errors.push(msg) },
        fatalError: (msg: string) => { errors.push(msg) }
      }
    })

    let doc: Document
    try {
      doc = parser.parseFromString(content, 'text/xml')
    } catch (e) {
      throw new ValidationError(`Invalid GPX: ${e instanceof Error ? e.message : String(e)}`)
    }
    if (errors.length > 0) throw new ValidationError(`Invalid GPX: ${errors[0]}`)

    let pts = doc.getElementsByTagName('trkpt')
    if (pts.length === 0) pts = doc.getElementsByTagName('rtept')
    if (pts.length === 0) throw new ValidationError('No track points found in GPX file')

    const samples: Sample[] = []
    for (let i = 0; i < pts.length; i++) {
      const pt = pts.item(i)
      if (!pt) continue
      const ele = pt.getElementsByTagName('ele').item(0)?.textContent
      samples.push({
        latitude: parseFloat(pt.getAttribute('lat') ?? ''),
        longitude: parseFloat(pt.getAttribute('lon') ?? ''),
        elevation: ele ? parseFloat(ele) : 0
      })
    }

    const nameNode = doc.getElementsByTagName('name').item(0)
    const name = nameNode?.textContent?.trim() || undefined

    return { name, samples }
  }

  decodePolyline(encoded: string): Sample[] {
    return polyline.decode(encoded).map(([lat, lng]) => ({ latitude: lat, longitude: lng, elevation: 0 }))
  }
}
