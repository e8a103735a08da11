import {randomUUID} from 'node:crypto'
import type {IncomingMessage, ServerResponse} from 'node:http'

import {ErrorResponseSchema} from '@tunnel-broker/schemas'
import type {z} from 'zod'

import {badRequest, unsupportedMediaType} from './errors'

const DEFAULT_SECURITY_HEADERS: Record<string, string> = {
  'x-content-type-options': 'nosniff',
  'x-frame-options': 'DENY',
  'referrer-policy': 'no-referrer',
  'cache-control': 'no-store'
}

const MAX_CORRELATION_ID_LENGTH = 128

const firstHeaderValue = (header: string | string[] | undefined) => (Array.isArray(header) ? header[0] : header)

const isJsonContentType = (contentTypeHeader: string | undefined) =>
  typeof contentTypeHeader === 'string' && contentTypeHeader.toLowerCase().includes('application/json')

export const extractCorrelationId = (request: IncomingMessage) => {
  const value = firstHeaderValue(request.headers['x-correlation-id'])
  if (typeof value !== 'string') {
    return randomUUID()
  }

  const trimmed = value.trim()
  if (trimmed.length === 0 || trimmed.length > MAX_CORRELATION_ID_LENGTH) {
    return randomUUID()
  }

  return trimmed
}

const readBodyBuffer = async ({request, maxBodyBytes}: {request: IncomingMessage; maxBodyBytes: number}) => {
  const chunks: Buffer[] = []
  let size = 0

  for await (const chunk of request) {
    let bufferChunk: Buffer
    if (typeof chunk === 'string') {
      bufferChunk = Buffer.from(chunk, 'utf8')
    } else if (chunk instanceof Uint8Array) {
      bufferChunk = Buffer.from(chunk)
    } else {
      throw badRequest('request_body_invalid', 'Request body contains an invalid chunk type')
    }

    size += bufferChunk.length
    if (size > maxBodyBytes) {
      throw badRequest('request_body_too_large', `Request body exceeds ${maxBodyBytes} bytes`)
    }

    chunks.push(bufferChunk)
  }

  return Buffer.concat(chunks)
}

const describeIssues = (error: z.ZodError) =>
  error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.map(String).join('.')}: ${issue.message}` : issue.message))
    .join('; ')

/** Reads and validates a JSON body. Express body parsing is off, so the raw stream is still unread here. */
export const parseJsonBody = async <TSchema extends z.ZodType>({
  request,
  schema,
  maxBodyBytes
}: {
  request: IncomingMessage
  schema: TSchema
  maxBodyBytes: number
}): Promise<z.infer<TSchema>> => {
  if (!isJsonContentType(request.headers['content-type'])) {
    throw unsupportedMediaType('content_type_invalid', 'Content-Type must be application/json')
  }

  const raw = await readBodyBuffer({request, maxBodyBytes})
  if (raw.length === 0) {
    throw badRequest('request_body_missing', 'Request body is required')
  }

  let parsedBody: unknown
  try {
    parsedBody = JSON.parse(raw.toString('utf8')) as unknown
  } catch {
    throw badRequest('request_body_invalid_json', 'Request body contains invalid JSON')
  }

  const parsed = schema.safeParse(parsedBody)
  if (!parsed.success) {
    throw badRequest('request_body_schema_invalid', describeIssues(parsed.error))
  }

  return parsed.data
}

export const parseQuery = <TSchema extends z.ZodType>({
  searchParams,
  schema
}: {
  searchParams: URLSearchParams
  schema: TSchema
}): z.infer<TSchema> => {
  const parsed = schema.safeParse(Object.fromEntries(searchParams.entries()))
  if (!parsed.success) {
    throw badRequest('query_invalid', describeIssues(parsed.error))
  }

  return parsed.data
}

export const decodePathParam = (value: string) => {
  try {
    return decodeURIComponent(value)
  } catch {
    throw badRequest('path_param_invalid', 'Path parameter encoding is invalid')
  }
}

/**
 * Address clients open the tunnel at. Derived from the public base URL when one is
 * configured, otherwise from the Host the request arrived on.
 */
export const buildTunnelUrl = ({
  publicBaseUrl,
  request,
  sessionId
}: {
  publicBaseUrl: string | undefined
  request: IncomingMessage
  sessionId: string
}) => {
  const tunnelPath = `/tunnel/${encodeURIComponent(sessionId)}`
  if (!publicBaseUrl) {
    return `wss://${request.headers.host ?? 'localhost'}${tunnelPath}`
  }

  const url = new URL(publicBaseUrl)
  url.protocol = url.protocol === 'http:' ? 'ws:' : 'wss:'
  url.pathname = `${url.pathname.replace(/\/+$/u, '')}${tunnelPath}`
  url.search = ''
  url.hash = ''
  return url.toString()
}

export const sendJson = ({
  response,
  status,
  correlationId,
  payload
}: {
  response: ServerResponse
  status: number
  correlationId: string
  payload: unknown
}) => {
  const body = Buffer.from(JSON.stringify(payload), 'utf8')

  response.writeHead(status, {
    ...DEFAULT_SECURITY_HEADERS,
    'content-type': 'application/json; charset=utf-8',
    'content-length': String(body.length),
    'x-correlation-id': correlationId
  })

  response.end(body)
}

/** Sends a payload after checking it against its wire contract. */
export const sendContract = <TSchema extends z.ZodType>({
  response,
  status = 200,
  correlationId,
  schema,
  payload
}: {
  response: ServerResponse
  status?: number
  correlationId: string
  schema: TSchema
  payload: z.input<TSchema>
}) => {
  sendJson({response, status, correlationId, payload: schema.parse(payload)})
}

export const sendError = ({
  response,
  status,
  error,
  message,
  correlationId
}: {
  response: ServerResponse
  status: number
  error: string
  message: string
  correlationId: string
}) => {
  sendContract({
    response,
    status,
    correlationId,
    schema: ErrorResponseSchema,
    payload: {error, message, correlation_id: correlationId}
  })
}
