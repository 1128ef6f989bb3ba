import { describe, it, expect } from 'vitest'
import { TrackService } from '../TrackService'
import { ValidationError } from '../../errors'

const gpx = `<?xml version="1.0" encoding="UTF-8"?>
<gpx version="1.1" creator="test" xmlns="http://www.topografix.com/GPX/1/1">
  <trk>
    <name> Morning Loop </name>
    <trkseg>
      <trkpt lat="45.100000" lon="6.200000"><ele>812.5</ele></trkpt>
      <trkpt lat="45.101000" lon="6.201000"></trkpt>
    </trkseg>
  </trk>
</gpx>`

describe('TrackService', () => {
  const tracks = new TrackService()

  it('defaults missing elevations to 0', () => {
    expect(tracks.fromSamples([{ latitude: 1, longitude: 2 }, { latitude: 3, longitude: 4, elevation: 5 }]))
      .toEqual([
        { latitude: 1, longitude: 2, elevation: 0 },
        { latitude: 3, longitude: 4, elevation: 5 }
      ])
  })

  it('reads track points and the track name from GPX', () => {
    const track = tracks.parseGpx(gpx)

    expect(track.name).toBe('Morning Loop')
    expect(track.samples).toEqual([
      { latitude: 45.1, longitude: 6.2, elevation: 812.5 },
      { latitude: 45.101, longitude: 6.201, elevation: 0 }
    ])
  })

  it('falls back to route points', () => {
    const route = `<gpx><rte><rtept lat="1" lon="2"><ele>3</ele></rtept></rte></gpx>`
    expect(tracks.parseGpx(route).samples).toEqual([{ latitude: 1, longitude: 2, elevation: 3 }])
  })

  it('rejects a GPX document without points', () => {
    expect(() => tracks.parseGpx('<gpx><trk></trk></gpx>')).toThrow('No track points found in GPX file')
  })

  it('rejects content that is not a GPX document', () => {
    expect(() => tracks.parseGpx('just some text')).toThrow(ValidationError)
  })

  it('decodes an encoded polyline', () => {
    const samples = tracks.decodePolyline('_p~iF~ps|U_ulLnnqC_mqNvxq`@')
    expect(samples).toEqual([
      { latitude: 38.5, longitude: -120.2, elevation: 0 },
      { latitude: 40.7, longitude: -120.95, elevation: 0 },
      { latitude: 43.252, longitude: -126.453, elevation: 0 }
    ])
  })
})
