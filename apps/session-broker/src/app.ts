import type {Server} from 'node:http'

import {NestFactory} from '@nestjs/core'
import {ExpressAdapter} from '@nestjs/platform-express'
import express from 'express'
import helmet from 'helmet'

import {
  createKubernetesCredentialIssuer,
  loadKubeConfig,
  type ClusterCredentialIssuer
} from '@tunnel-broker/credentials'
import {createIdentityExchange, type FetchLike, type IdentityExchange} from '@tunnel-broker/identity'
import {createStructuredLogger, type StructuredLogger} from '@tunnel-broker/logging'
import {SessionRegistry} from '@tunnel-broker/sessions'
import {
  createKubernetesWorkloadRuntime,
  TunnelMultiplexer,
  type WorkloadRuntimeFactory
} from '@tunnel-broker/tunnel'
import {createOrchestratorWorkloadLocator, type WorkloadLocator} from '@tunnel-broker/workload-locator'

import type {ServiceConfig} from './config'
import type {RouteRuntime} from './http/routes/types'
import {SessionBrokerNestModule} from './nest/sessionBrokerNestModule'

export const SERVICE_NAME = 'session-broker'

/** Collaborators the service builds from config unless they are supplied. */
export type SessionBrokerDependencies = {
  logger?: StructuredLogger
  fetchImpl?: FetchLike
  identity?: IdentityExchange
  locator?: WorkloadLocator
  issuer?: ClusterCredentialIssuer
  runtimeFactory?: WorkloadRuntimeFactory
  now?: () => Date
}

const createDefaultIssuer = ({config, logger}: {config: ServiceConfig; logger: StructuredLogger}) =>
  createKubernetesCredentialIssuer({
    kubeConfig: loadKubeConfig(config.credentials.kubeconfigPath),
    tokenTtlSeconds: config.credentials.ttlSeconds,
    audience: config.credentials.audience,
    logger
  })

export const createSessionBrokerApp = async ({
  config,
  dependencies = {}
}: {
  config: ServiceConfig
  dependencies?: SessionBrokerDependencies
}) => {
  const now = dependencies.now ?? (() => new Date())
  const logger =
    dependencies.logger ??
    createStructuredLogger({
      service: SERVICE_NAME,
      env: config.nodeEnv,
      level: config.logging.level,
      extraSensitiveKeys: config.logging.redactExtraKeys
    })
  const fetchImpl = dependencies.fetchImpl ?? fetch

  const identity =
    dependencies.identity ??
    createIdentityExchange({
      config: config.identity,
      flowStateKey: config.sessions.tokenSecret,
      fetchImpl,
      now
    })

  const locator =
    dependencies.locator ??
    createOrchestratorWorkloadLocator({
      apiUrl: config.orchestrator.apiUrl,
      ...(config.orchestrator.apiToken ? {apiToken: config.orchestrator.apiToken} : {}),
      naming: config.orchestrator.naming,
      requestTimeoutMs: config.orchestrator.timeoutMs,
      readyTimeoutMs: config.orchestrator.readyTimeoutMs,
      pollIntervalMs: config.orchestrator.pollIntervalMs,
      fetchImpl,
      logger,
      now
    })

  const registry = new SessionRegistry({
    issuer: dependencies.issuer ?? createDefaultIssuer({config, logger}),
    tokenSecret: config.sessions.tokenSecret,
    sessionLifetimeSeconds: config.sessions.lifetimeSeconds,
    tokenTtlSeconds: config.sessions.tokenTtlSeconds,
    logger,
    now
  })

  const multiplexer = new TunnelMultiplexer({
    registry,
    runtimeFactory: dependencies.runtimeFactory ?? createKubernetesWorkloadRuntime,
    idleTimeoutMs: config.tunnel.idleTimeoutSeconds * 1000,
    maxPayloadBytes: config.tunnel.maxMessageBytes,
    logger
  })

  const runtime: RouteRuntime = {config, identity, locator, registry, logger, now}

  const expressApp = express()
  expressApp.disable('x-powered-by')
  expressApp.use(
    helmet({
      contentSecurityPolicy: false
    })
  )

  const nestApp = await NestFactory.create(
    SessionBrokerNestModule.register({runtime}),
    new ExpressAdapter(expressApp),
    {
      bodyParser: false,
      logger: config.nodeEnv === 'test' ? false : ['error', 'warn', 'log']
    }
  )

  if (config.corsAllowedOrigins.length > 0) {
    nestApp.enableCors({
      origin: config.corsAllowedOrigins
    })
  }

  await nestApp.init()

  const server = nestApp.getHttpServer() as Server
  server.on('upgrade', (request, socket, head: Buffer) => {
    multiplexer.handleUpgrade(request, socket, head).catch((error: unknown) => {
      logger.error({
        event: 'tunnel.upgrade.failed',
        component: 'tunnel.multiplexer',
        message: 'Tunnel upgrade failed',
        reason_code: 'internal_error',
        metadata: {error}
      })
      socket.destroy()
    })
  })

  const start = async () => {
    await nestApp.listen(config.port, config.host)
    registry.startSweeper(config.sessions.sweepIntervalSeconds * 1000)
  }

  // Tunnels go first so their sessions end as tunnel_closed; whatever is left is revoked as shutdown.
  const stop = async () => {
    registry.stopSweeper()
    await multiplexer.close()
    await registry.deleteAll('shutdown')
    await nestApp.close()
  }

  return {
    server,
    start,
    stop,
    registry,
    multiplexer,
    logger
  }
}

export type SessionBrokerApp = Awaited<ReturnType<typeof createSessionBrokerApp>>
