import type { FastifyPluginAsync, FastifyReply } from 'fastify'
import { SimulationService } from '../services/SimulationService'
import { TrackService } from '../services/TrackService'
import { ExportService } from '../services/ExportService'
import type { ExportFormat, SimulateBody, TrackInput } from '../types/simulation'
import type { ParsedTrack } from '../types/track'
import { ValidationError } from '../errors'

const sampleSchema = {
  type: 'object',
  required: ['latitude', 'longitude'],
  properties: {
    latitude: { type: 'number' },
    longitude: { type: 'number' },
    elevation: { type: 'number' }
  }
}

const simulateBodySchema = {
  type: 'object',
  required: ['track'],
  properties: {
    track: {
      type: 'object',
      oneOf: [
        { required: ['samples'] },
        { required: ['gpx'] },
        { required: ['polyline'] }
      ],
      properties: {
        samples: { type: 'array', items: sampleSchema },
        gpx: { type: 'string', minLength: 1 },
        polyline: { type: 'string', minLength: 1 }
      }
    },
    cycling: {
      type: 'object',
      required: ['mass', 'cda', 'crr', 'targetPower', 'criticalPower'],
      properties: {
        mass: { type: 'number', exclusiveMinimum: 0 },
        cda: { type: 'number', exclusiveMinimum: 0 },
        crr: { type: 'number', exclusiveMinimum: 0 },
        targetPower: { type: 'number', minimum: 0 },
        criticalPower: { type: 'number' }
      }
    },
    running: {
      type: 'object',
      required: ['fatigueFactor'],
      oneOf: [
        { required: ['basePace'] },
        { required: ['referenceSpeed'] }
      ],
      properties: {
        basePace: { type: 'number', exclusiveMinimum: 0 },       // s/km
        referenceSpeed: { type: 'number', exclusiveMinimum: 0 }, // km/h
        fatigueFactor: { type: 'number', minimum: 0, maximum: 0.2 }
      }
    }
  }
}

const simulationRoutes: FastifyPluginAsync = async (fastify) => {
  const tracks = new TrackService()
  const simulator = new SimulationService()
  const exporter = new ExportService()

  const loadTrack = (track: TrackInput): ParsedTrack => {
    if ('samples' in track) return { samples: tracks.fromSamples(track.samples) }
    if ('gpx' in track) return tracks.parseGpx(track.gpx)
    return { samples: tracks.decodePolyline(track.polyline) }
  }

  const simulate = (body: SimulateBody) => {
    const { name, samples } = loadTrack(body.track)
    return simulator.computeRoute(samples, { cycling: body.cycling, running: body.running }, name)
  }

  const fail = (reply: FastifyReply, error: unknown, action: string) => {
    if (error instanceof ValidationError) {
      return reply.status(400).send({ error: `Failed to ${action}`, message: error.message })
    }
    fastify.log.error(error)
    return reply.status(500).send({
      error: `Failed to ${action}`,
      message: error instanceof Error ? error.message : 'Unknown error'
    })
  }

  // Simulate one or both disciplines over a track
  fastify.post<{ Body: SimulateBody }>('/', {
    schema: { body: simulateBodySchema }
  }, async (request, reply) => {
    try {
      const result = simulate(request.body)
      request.log.debug({
        samples: result.stats.sampleCount,
        cycling: result.cycling?.summary,
        running: result.running?.summary
      }, 'Route simulated')

      return { success: true, data: result }
    } catch (error) {
      return fail(reply, error, 'simulate route')
    }
  })

  // export
  fastify.post<{ Body: SimulateBody, Params: { format: ExportFormat } }>('/export/:format', {
    schema: {
      body: simulateBodySchema,
      params: {
        type: 'object',
        required: ['format'],
        properties: { format: { type: 'string', enum: ['csv', 'json'] } }
      }
    }
  }, async (request, reply) => {
    try {
      const exported = exporter.export(simulate(request.body), request.params.format)

      reply.header('Content-Type', exported.mimeType)
      reply.header('Content-Disposition', `attachment; filename="${exported.filename}"`)

      return exported.content
    } catch (error) {
      return fail(reply, error, 'export route')
    }
  })
}

export default simulationRoutes
