export interface AppConfig {
  port: number
  host: string
  env: string
  logLevel: string
  corsOrigin: string | boolean
  bodyLimit: number
  stravaApiUrl: string
  stravaTimeoutMs: number
}

const toInt = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value ?? '', 10)
  return Number.isNaN(parsed) ? fallback : parsed
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const nodeEnv = env.NODE_ENV || 'development'
  const origin = env.CORS_ORIGIN || '*'

  return {
    port: toInt(env.PORT, 3000),
    host: env.HOST || '0.0.0.0',
    env: nodeEnv,
    logLevel: env.LOG_LEVEL || (nodeEnv === 'production' ? 'info' : 'debug'),
    corsOrigin: origin === '*' ? true : origin,
    // GPX uploads are sent inline
    bodyLimit: toInt(env.BODY_LIMIT, 5 * 1024 * 1024),
    stravaApiUrl: env.STRAVA_API_URL || 'https://www.strava.com/api/v3',
    stravaTimeoutMs: toInt(env.STRAVA_TIMEOUT_MS, 10000)
  }
}
