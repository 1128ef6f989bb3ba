import type { FastifyInstance } from 'fastify'
import { buildApp } from './app'
import { loadConfig } from './config'

const config = loadConfig()
let fastify: FastifyInstance | undefined

const start = async () => {
  try {
    fastify = await buildApp(config)
    await fastify.listen({ port: config.port, host: config.host })
  } catch (err) {
    if (fastify) fastify.log.error(err)
    else console.error('Failed to start server:', err)
    process.exit(1)
  }
}

const gracefulShutdown = async () => {
  try {
    await fastify?.close()
    fastify?.log.info('Server stopped')
    process.exit(0)
  } catch (err) {
    console.error('Error during shutdown:', err)
    process.exit(1)
  }
}

process.on('SIGTERM', gracefulShutdown)
process.on('SIGINT', gracefulShutdown)

void start()
