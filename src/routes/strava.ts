import type { FastifyPluginAsync } from 'fastify'
import { StravaService } from '../services/StravaService'
import type { StravaServiceOptions } from '../services/StravaService'
import { describeTrack } from '../services/GeodesicService'
import { UpstreamError } from '../errors'

export type StravaRoutesOptions = StravaServiceOptions

const stravaRoutes: FastifyPluginAsync<StravaRoutesOptions> = async (fastify, opts) => {
  const stravaService = new StravaService(fastify.log, opts)

  // Segment geometry as samples, ready to post to /api/simulation
  fastify.get<{ Params: { id: number }, Headers: { authorization?: string } }>('/segments/:id/track', {
    schema: {
      params: {
        type: 'object',
        required: ['id'],
        properties: { id: { type: 'integer', minimum: 1 } }
      }
    }
  }, async (request, reply) => {
    const auth = request.headers.authorization
    const token = auth?.startsWith('Bearer ') ? auth.slice(7).trim() : ''
    if (!token) {
      return reply.status(401).send({ error: 'Missing Strava access token' })
    }

    try {
      const samples = await stravaService.getSegmentTrack(request.params.id, token)
      return { success: true, samples, stats: describeTrack(samples) }
    } catch (error) {
      if (error instanceof UpstreamError) {
        return reply.status(502).send({ error: 'Strava request failed', message: error.message })
      }
      fastify.log.error(error)
      return reply.status(500).send({ error: 'Failed to load segment track' })
    }
  })
}

export default stravaRoutes
