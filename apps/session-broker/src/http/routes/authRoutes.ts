import type {TokenSet} from '@tunnel-broker/identity'
import {
  AuthCallbackQuerySchema,
  AuthRefreshRequestSchema,
  AuthStartResponseSchema,
  TokenSetResponseSchema,
  type TokenSetResponse
} from '@tunnel-broker/schemas'

import {badRequest, unauthorized} from '../../errors'
import {parseJsonBody, parseQuery, sendContract} from '../../http'
import {identityFailure} from '../failures'
import type {SessionBrokerRouteLogicHandler} from './types'

const toTokenSetResponse = (tokens: TokenSet): TokenSetResponse => ({
  access_token: tokens.accessToken,
  ...(tokens.refreshToken ? {refresh_token: tokens.refreshToken} : {}),
  ...(tokens.expiresIn !== undefined ? {expires_in: tokens.expiresIn} : {}),
  token_type: tokens.tokenType
})

export const handleAuthStartRoute: SessionBrokerRouteLogicHandler = ({response, correlationId, runtime}) => {
  const {authorizationUrl, flowState} = runtime.identity.startLogin()

  runtime.logger.info({
    event: 'identity.login.start',
    component: 'http.auth',
    message: 'Login flow started'
  })

  sendContract({
    response,
    correlationId,
    schema: AuthStartResponseSchema,
    payload: {auth_url: authorizationUrl, state: flowState}
  })
}

/** `state` is the opaque flow state handed out by /auth/start, returned verbatim by the client. */
export const handleAuthCallbackRoute: SessionBrokerRouteLogicHandler = async ({
  response,
  correlationId,
  searchParams,
  runtime
}) => {
  const query = parseQuery({searchParams, schema: AuthCallbackQuerySchema})
  if (query.error) {
    throw unauthorized('provider_rejected', query.error_description ?? query.error)
  }

  if (!query.code || !query.state) {
    throw badRequest('auth_callback_invalid', 'Callback requires code and state parameters')
  }

  const completed = await runtime.identity.completeLogin({code: query.code, flowState: query.state})
  if (!completed.ok) {
    runtime.logger.warn({
      event: 'identity.provider.failed',
      component: 'http.auth',
      message: 'Login completion failed',
      reason_code: completed.error.code
    })
    throw identityFailure(completed.error)
  }

  runtime.logger.info({
    event: 'identity.login.complete',
    component: 'http.auth',
    message: 'Login completed'
  })

  sendContract({
    response,
    correlationId,
    schema: TokenSetResponseSchema,
    payload: toTokenSetResponse(completed.value)
  })
}

export const handleAuthRefreshRoute: SessionBrokerRouteLogicHandler = async ({
  request,
  response,
  correlationId,
  runtime
}) => {
  const body = await parseJsonBody({
    request,
    schema: AuthRefreshRequestSchema,
    maxBodyBytes: runtime.config.maxBodyBytes
  })

  const refreshed = await runtime.identity.refresh(body.refresh_token)
  if (!refreshed.ok) {
    runtime.logger.warn({
      event: 'identity.provider.failed',
      component: 'http.auth',
      message: 'Token refresh failed',
      reason_code: refreshed.error.code
    })
    throw identityFailure(refreshed.error)
  }

  sendContract({
    response,
    correlationId,
    schema: TokenSetResponseSchema,
    payload: toTokenSetResponse(refreshed.value)
  })
}
