import {randomUUID} from 'node:crypto'
import type {IncomingMessage, ServerResponse} from 'node:http'

import {runWithLogContext, setLogContextFields} from '@tunnel-broker/logging'

import {isAppError} from '../errors'
import {extractCorrelationId, sendError} from '../http'
import {handleAuthCallbackRoute, handleAuthRefreshRoute, handleAuthStartRoute} from './routes/authRoutes'
import {handleFallbackRoute} from './routes/fallbackRoute'
import {handleHealthRoute} from './routes/healthRoute'
import {
  handleSessionCreateRoute,
  handleSessionDeleteRoute,
  handleSessionGetRoute,
  handleSessionTokenRoute
} from './routes/sessionRoutes'
import type {
  RouteRuntime,
  SessionBrokerRouteHandler,
  SessionBrokerRouteHandlers,
  SessionBrokerRouteLogicHandler
} from './routes/types'

// Express rewrites `url` inside mounted routers; `originalUrl` keeps the path the client sent.
const getRawRequestUrl = (request: IncomingMessage) => {
  if ('originalUrl' in request && typeof request.originalUrl === 'string' && request.originalUrl.length > 0) {
    return request.originalUrl
  }

  return request.url ?? '/'
}

const parseUrl = (request: IncomingMessage) => {
  const host = request.headers.host ?? 'localhost'
  return new URL(getRawRequestUrl(request), `http://${host}`)
}

const sanitizeRouteForLog = (rawUrl: string) => {
  const routeWithoutQuery = rawUrl.split('?', 1)[0] ?? ''
  return routeWithoutQuery.length > 0 ? routeWithoutQuery : '/'
}

export const createSessionBrokerRouteHandlers = ({runtime}: {runtime: RouteRuntime}): SessionBrokerRouteHandlers => {
  const {logger, now} = runtime

  const createRouteHandler = (routeLogicHandler: SessionBrokerRouteLogicHandler): SessionBrokerRouteHandler =>
    (request: IncomingMessage, response: ServerResponse) => {
      const correlationId = extractCorrelationId(request)
      const startedAtMs = now().getTime()
      const method = request.method ?? 'GET'

      return runWithLogContext(
        {
          correlation_id: correlationId,
          request_id: randomUUID(),
          method
        },
        async () => {
          let pathname = '/'
          let responseReasonCode: string | undefined

          logger.info({
            event: 'request.received',
            component: 'http.server',
            message: 'Request received',
            route: sanitizeRouteForLog(getRawRequestUrl(request)),
            method
          })

          try {
            const url = parseUrl(request)
            pathname = url.pathname
            setLogContextFields({route: pathname})

            await routeLogicHandler({
              request,
              response,
              correlationId,
              method,
              pathname,
              searchParams: url.searchParams,
              runtime
            })
          } catch (error) {
            if (isAppError(error)) {
              responseReasonCode = error.code
              logger.warn({
                event: 'request.rejected',
                component: 'http.server',
                message: `Request rejected: ${error.code}`,
                reason_code: error.code,
                route: pathname,
                method
              })

              sendError({
                response,
                status: error.status,
                error: error.code,
                message: error.message,
                correlationId
              })
              return
            }

            responseReasonCode = 'internal_error'
            logger.error({
              event: 'request.failed',
              component: 'http.server',
              message: 'Unexpected internal error',
              reason_code: 'internal_error',
              route: pathname,
              method,
              metadata: {error}
            })

            sendError({
              response,
              status: 500,
              error: 'internal_error',
              message: 'Unexpected internal error',
              correlationId
            })
          } finally {
            const statusCode = response.statusCode
            const completed = {
              event: 'request.completed',
              component: 'http.server',
              message: 'Request completed',
              route: pathname,
              method,
              status_code: statusCode,
              duration_ms: Math.max(0, now().getTime() - startedAtMs),
              ...(responseReasonCode ? {reason_code: responseReasonCode} : {})
            }

            if (statusCode >= 500) {
              logger.error(completed)
            } else if (statusCode >= 400) {
              logger.warn(completed)
            } else {
              logger.info(completed)
            }
          }
        }
      )
    }

  return {
    health: createRouteHandler(handleHealthRoute),
    authStart: createRouteHandler(handleAuthStartRoute),
    authCallback: createRouteHandler(handleAuthCallbackRoute),
    authRefresh: createRouteHandler(handleAuthRefreshRoute),
    sessionCreate: createRouteHandler(handleSessionCreateRoute),
    sessionGet: createRouteHandler(handleSessionGetRoute),
    sessionDelete: createRouteHandler(handleSessionDeleteRoute),
    sessionToken: createRouteHandler(handleSessionTokenRoute),
    fallback: createRouteHandler(handleFallbackRoute)
  }
}
