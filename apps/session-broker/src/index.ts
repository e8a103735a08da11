import 'reflect-metadata'

import {fileURLToPath} from 'node:url'

import {createStructuredLogger} from '@tunnel-broker/logging'

import {createSessionBrokerApp, SERVICE_NAME} from './app'
import {loadConfig} from './config'

export * from './app'
export * from './config'
export * from './errors'
export * from './http'

const main = async () => {
  const config = loadConfig(process.env)
  const app = await createSessionBrokerApp({config})

  await app.start()
  app.logger.info({
    event: 'process.started',
    component: 'process.entrypoint',
    message: `Listening on ${config.host}:${config.port}`
  })

  let stopping = false
  const shutdown = async (signal: NodeJS.Signals) => {
    if (stopping) {
      return
    }
    stopping = true

    app.logger.info({
      event: 'process.shutdown',
      component: 'process.entrypoint',
      message: 'Shutting down',
      reason_code: signal
    })

    try {
      await app.stop()
      process.exit(0)
    } catch (error) {
      app.logger.error({
        event: 'process.shutdown.failed',
        component: 'process.entrypoint',
        message: 'Shutdown did not complete cleanly',
        metadata: {error}
      })
      process.exit(1)
    }
  }

  process.on('SIGINT', () => {
    void shutdown('SIGINT')
  })
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM')
  })
}

const isMainModule = (() => {
  const entryFile = process.argv[1]
  if (!entryFile) {
    return false
  }

  return fileURLToPath(import.meta.url) === entryFile
})()

if (isMainModule) {
  void main().catch(error => {
    const env = process.env.NODE_ENV === 'production' ? 'production' : process.env.NODE_ENV === 'test' ? 'test' : 'development'
    const startupLogger = createStructuredLogger({
      service: SERVICE_NAME,
      env,
      level: 'error'
    })
    startupLogger.fatal({
      event: 'process.startup.failed',
      component: 'process.entrypoint',
      message: 'Session broker startup failed',
      reason_code: 'startup_failed',
      metadata: {error}
    })
    process.exit(1)
  })
}
