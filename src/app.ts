import Fastify from 'fastify'
import type { FastifyInstance } from 'fastify'
import cors from '@fastify/cors'
import type { AxiosInstance } from 'axios'
import type { AppConfig } from './config'

// Routes
import simulationRoutes from './routes/simulation'
import stravaRoutes from './routes/strava'

export interface AppDependencies {
  stravaClient?: AxiosInstance
}

export const VERSION = '1.0.0'

export async function buildApp(config: AppConfig, deps: AppDependencies = {}): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: { level: config.logLevel },
    bodyLimit: config.bodyLimit
  })

  await fastify.register(cors, { origin: config.corsOrigin })

  // Routes
  await fastify.register(simulationRoutes, { prefix: '/api/simulation' })
  await fastify.register(stravaRoutes, {
    prefix: '/api/strava',
    baseURL: config.stravaApiUrl,
    timeout: config.stravaTimeoutMs,
    client: deps.stravaClient
  })

  // Health check
  fastify.get('/health', async () => {
    return {
      status: 'OK',
      timestamp: new Date().toISOString(),
      version: VERSION
    }
  })

  return fastify
}
