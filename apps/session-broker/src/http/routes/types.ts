import type {IncomingMessage, ServerResponse} from 'node:http'

import type {IdentityExchange} from '@tunnel-broker/identity'
import type {StructuredLogger} from '@tunnel-broker/logging'
import type {SessionRegistry} from '@tunnel-broker/sessions'
import type {WorkloadLocator} from '@tunnel-broker/workload-locator'

import type {ServiceConfig} from '../../config'

export type RouteRuntime = {
  config: ServiceConfig
  identity: IdentityExchange
  locator: WorkloadLocator
  registry: SessionRegistry
  logger: StructuredLogger
  now: () => Date
}

export type RouteHandlerContext = {
  request: IncomingMessage
  response: ServerResponse
  correlationId: string
  method: string
  pathname: string
  searchParams: URLSearchParams
  runtime: RouteRuntime
}

export type SessionBrokerRouteKind =
  | 'health'
  | 'authStart'
  | 'authCallback'
  | 'authRefresh'
  | 'sessionCreate'
  | 'sessionGet'
  | 'sessionDelete'
  | 'sessionToken'
  | 'fallback'

export type SessionBrokerRouteLogicHandler = (context: RouteHandlerContext) => void | Promise<void>

export type SessionBrokerRouteHandler = (request: IncomingMessage, response: ServerResponse) => Promise<void>

export type SessionBrokerRouteHandlers = Record<SessionBrokerRouteKind, SessionBrokerRouteHandler>
