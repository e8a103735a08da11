import type {IdentityError} from '@tunnel-broker/identity'
import type {SessionError} from '@tunnel-broker/sessions'
import type {LocatorError} from '@tunnel-broker/workload-locator'

import {
  AppError,
  badGateway,
  badRequest,
  gatewayTimeout,
  internal,
  notFound,
  serviceUnavailable,
  unauthorized
} from '../errors'

export const identityFailure = (error: IdentityError): AppError => {
  switch (error.code) {
    case 'invalid_flow_state':
      return badRequest(error.code, error.message)
    case 'provider_rejected':
    case 'token_rejected':
      return unauthorized(error.code, error.message)
    case 'malformed_provider_response':
      return badGateway(error.code, error.message)
    case 'provider_unreachable':
      return serviceUnavailable(error.code, error.message)
    case 'identity_config_invalid':
      return internal(error.code, error.message)
  }
}

export const locatorFailure = (error: LocatorError): AppError => {
  switch (error.code) {
    case 'workload_unavailable':
      return gatewayTimeout(error.code, error.message)
    case 'upstream_error':
    case 'upstream_unreachable':
    case 'upstream_response_invalid':
      return badGateway(error.code, error.message)
  }
}

export const sessionFailure = (error: SessionError): AppError => {
  switch (error.code) {
    case 'session_not_found':
    case 'session_expired':
      return notFound(error.code, error.message)
    case 'credential_mint_failed':
      return badGateway(error.code, error.message)
  }
}
