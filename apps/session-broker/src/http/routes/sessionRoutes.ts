import type {IncomingMessage} from 'node:http'

import type {IdentityProof} from '@tunnel-broker/identity'
import {setLogContextFields} from '@tunnel-broker/logging'
import {
  SessionCreateRequestSchema,
  SessionDeleteResponseSchema,
  SessionResponseSchema,
  SessionTokenRequestSchema,
  SessionTokenResponseSchema,
  type SessionResponse
} from '@tunnel-broker/schemas'
import type {Session, SessionIdentity} from '@tunnel-broker/sessions'

import {forbidden, notFound} from '../../errors'
import {buildTunnelUrl, decodePathParam, parseJsonBody, sendContract} from '../../http'
import {identityFailure, locatorFailure, sessionFailure} from '../failures'
import type {RouteRuntime, SessionBrokerRouteLogicHandler} from './types'

const SESSION_PATH = /^\/session\/([^/]+)(?:\/token)?\/?$/u

const sessionIdFromPath = (pathname: string) => {
  const encoded = SESSION_PATH.exec(pathname)?.[1]
  if (!encoded) {
    throw notFound('route_not_found', `No session resource at ${pathname}`)
  }

  return decodePathParam(encoded)
}

const toSessionIdentity = (proof: IdentityProof): SessionIdentity => ({
  subject: proof.subject,
  ...(proof.email ? {email: proof.email} : {}),
  ...(proof.name ? {name: proof.name} : {})
})

const toSessionResponse = ({
  session,
  request,
  runtime
}: {
  session: Session
  request: IncomingMessage
  runtime: RouteRuntime
}): SessionResponse => ({
  session_id: session.id,
  username: session.identity.subject,
  namespace: session.workload.namespace,
  workload: session.workload.workloadName,
  tunnel_url: buildTunnelUrl({publicBaseUrl: runtime.config.publicBaseUrl, request, sessionId: session.id}),
  session_token: session.sessionToken,
  expires_at: session.expiresAt.toISOString()
})

const validateAccess = async ({runtime, accessToken}: {runtime: RouteRuntime; accessToken: string}) => {
  const proof = await runtime.identity.validateAccess(accessToken)
  if (!proof.ok) {
    runtime.logger.warn({
      event: 'identity.provider.failed',
      component: 'http.session',
      message: 'Access token validation failed',
      reason_code: proof.error.code
    })
    throw identityFailure(proof.error)
  }

  setLogContextFields({user: proof.value.subject})
  return proof.value
}

export const handleSessionCreateRoute: SessionBrokerRouteLogicHandler = async ({
  request,
  response,
  correlationId,
  runtime
}) => {
  const body = await parseJsonBody({
    request,
    schema: SessionCreateRequestSchema,
    maxBodyBytes: runtime.config.maxBodyBytes
  })

  const proof = await validateAccess({runtime, accessToken: body.access_token})

  const located = await runtime.locator.ensureRunning(proof.subject)
  if (!located.ok) {
    throw locatorFailure(located.error)
  }
  setLogContextFields({workload: located.value.workloadName})

  const created = await runtime.registry.create({
    identity: toSessionIdentity(proof),
    workload: located.value,
    ...(body.refresh_token ? {refreshToken: body.refresh_token} : {})
  })
  if (!created.ok) {
    throw sessionFailure(created.error)
  }
  setLogContextFields({session_id: created.value.id})

  sendContract({
    response,
    correlationId,
    schema: SessionResponseSchema,
    payload: toSessionResponse({session: created.value, request, runtime})
  })
}

export const handleSessionGetRoute: SessionBrokerRouteLogicHandler = ({
  request,
  response,
  correlationId,
  pathname,
  runtime
}) => {
  const found = runtime.registry.get(sessionIdFromPath(pathname))
  if (!found.ok) {
    throw sessionFailure(found.error)
  }

  sendContract({
    response,
    correlationId,
    schema: SessionResponseSchema,
    payload: toSessionResponse({session: found.value, request, runtime})
  })
}

export const handleSessionDeleteRoute: SessionBrokerRouteLogicHandler = async ({
  response,
  correlationId,
  pathname,
  runtime
}) => {
  const sessionId = sessionIdFromPath(pathname)
  setLogContextFields({session_id: sessionId})

  const deleted = await runtime.registry.delete(sessionId, 'explicit')
  if (!deleted.ok) {
    throw sessionFailure(deleted.error)
  }

  sendContract({
    response,
    correlationId,
    schema: SessionDeleteResponseSchema,
    payload: {message: 'session deleted'}
  })
}

/** Re-authenticates the session owner and rotates the session token without touching the credential. */
export const handleSessionTokenRoute: SessionBrokerRouteLogicHandler = async ({
  request,
  response,
  correlationId,
  pathname,
  runtime
}) => {
  const sessionId = sessionIdFromPath(pathname)
  const body = await parseJsonBody({
    request,
    schema: SessionTokenRequestSchema,
    maxBodyBytes: runtime.config.maxBodyBytes
  })

  const proof = await validateAccess({runtime, accessToken: body.access_token})

  const current = runtime.registry.get(sessionId)
  if (!current.ok) {
    throw sessionFailure(current.error)
  }

  if (current.value.identity.subject !== proof.subject) {
    throw forbidden('session_owner_mismatch', 'Access token does not belong to the session owner')
  }

  const rotated = await runtime.registry.reissueToken(sessionId)
  if (!rotated.ok) {
    throw sessionFailure(rotated.error)
  }

  sendContract({
    response,
    correlationId,
    schema: SessionTokenResponseSchema,
    payload: {
      session_id: rotated.value.id,
      session_token: rotated.value.sessionToken,
      token_expires_at: rotated.value.tokenExpiresAt.toISOString()
    }
  })
}
