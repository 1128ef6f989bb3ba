import axios from 'axios'
import type { AxiosInstance } from 'axios'
import type { FastifyBaseLogger } from 'fastify'
import type { Sample } from '../types/track'
import { UpstreamError } from '../errors'

interface StravaStream<T> {
  type: string
  data: T[]
  series_type: string
  original_size: number
  resolution: string
}

export interface StravaSegmentStreams {
  latlng?: StravaStream<[number, number]>
  altitude?: StravaStream<number>
  distance?: StravaStream<number>
}

export interface StravaServiceOptions {
  baseURL: string
  timeout: number
  client?: AxiosInstance
}

export class StravaService {
  private client: AxiosInstance
  private log: FastifyBaseLogger

  constructor(log: FastifyBaseLogger, options: StravaServiceOptions) {
    this.log = log
    this.client = options.client ?? axios.create({
      baseURL: options.baseURL,
      timeout: options.timeout
    })
  }

  async getSegmentStreams(segmentId: number, accessToken: string): Promise<StravaSegmentStreams> {
    try {
      const response = await this.client.get<StravaSegmentStreams>(`/segments/${segmentId}/streams`, {
        headers: { Authorization: `Bearer ${accessToken}` },
        params: { keys: 'latlng,altitude', key_by_type: true }
      })

      return response.data
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined
      this.log.error({ err: error, segmentId, status }, 'Error fetching segment streams')
      throw new UpstreamError(`Failed to fetch streams for segment ${segmentId} from Strava`, status)
    }
  }

  // altitude may be missing on some segments, elevation then defaults to 0
  async getSegmentTrack(segmentId: number, accessToken: string): Promise<Sample[]> {
    const streams = await this.getSegmentStreams(segmentId, accessToken)
    const latlng = streams.latlng?.data ?? []
    const altitude = streams.altitude?.data ?? []

    if (latlng.length === 0) {
      throw new UpstreamError(`Segment ${segmentId} has no latlng stream`)
    }

    return latlng.map(([lat, lng], i) => ({
      latitude: lat,
      longitude: lng,
      elevation: altitude[i] ?? 0
    }))
  }
}
