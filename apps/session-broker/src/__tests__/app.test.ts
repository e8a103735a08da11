import {afterEach, describe, expect, it} from 'vitest'
import {z} from 'zod'

import {openTunnel, refusedUpgrade, startTestBroker, type TestBroker} from './fixtures'

const SessionBodySchema = z.object({
  session_id: z.string(),
  username: z.string(),
  namespace: z.string(),
  workload: z.string(),
  tunnel_url: z.string(),
  session_token: z.string(),
  expires_at: z.string()
})

const ErrorBodySchema = z.object({error: z.string(), message: z.string(), correlation_id: z.string()})

const brokers: TestBroker[] = []

const start = async (options?: Parameters<typeof startTestBroker>[0]) => {
  const broker = await startTestBroker(options)
  brokers.push(broker)
  return broker
}

afterEach(async () => {
  await Promise.all(brokers.splice(0).map(broker => broker.app.stop()))
})

const postJson = (url: string, body: unknown) =>
  fetch(url, {method: 'POST', headers: {'content-type': 'application/json'}, body: JSON.stringify(body)})

const createSession = async (broker: TestBroker, accessToken = 'access-alice') => {
  const response = await postJson(`${broker.httpUrl}/session`, {access_token: accessToken, refresh_token: 'refresh-alice'})
  expect(response.status).toBe(200)
  return SessionBodySchema.parse(await response.json())
}

const tunnelUrlOf = (broker: TestBroker, sessionId: string, token: string) =>
  `${broker.wsUrl}/tunnel/${encodeURIComponent(sessionId)}?token=${encodeURIComponent(token)}`

const errorOf = async (response: Response) => {
  const body = ErrorBodySchema.parse(await response.json())
  return {status: response.status, error: body.error, message: body.message}
}

describe('session broker end to end', () => {
  it('logs in, creates a session and runs a command over the tunnel', async () => {
    const broker = await start()

    const started = await fetch(`${broker.httpUrl}/auth/start`)
    expect(started.status).toBe(200)
    const {auth_url: authUrl, state} = z.object({auth_url: z.string(), state: z.string()}).parse(await started.json())
    expect(new URL(authUrl).origin).toBe('https://idp.test')
    expect(new URL(authUrl).searchParams.get('client_id')).toBe('broker-client')

    const callback = await fetch(
      `${broker.httpUrl}/auth/callback?code=code-alice&state=${encodeURIComponent(state)}`
    )
    expect(callback.status).toBe(200)
    expect(await callback.json()).toEqual({
      access_token: 'access-alice',
      refresh_token: 'refresh-alice',
      expires_in: 900,
      token_type: 'Bearer'
    })

    const session = await createSession(broker)
    const port = new URL(broker.httpUrl).port
    expect(session).toMatchObject({
      username: 'alice@example.org',
      namespace: 'user-alice',
      workload: 'nb-alice',
      tunnel_url: `wss://127.0.0.1:${port}/tunnel/${session.session_id}`
    })
    expect(broker.issuer.livePrincipals()).toEqual(['user-alice/tunnel-session-1'])

    const client = await openTunnel(tunnelUrlOf(broker, session.session_id, session.session_token))
    client.send({type: 'exec', payload: {command: 'echo', args: ['hi']}})

    expect(await client.next()).toEqual({type: 'exec_response', payload: {stream: 'stdout', data: 'hi\n'}})
    expect(await client.next()).toEqual({type: 'exec_response', payload: {exit_code: 0, done: true}})
  })

  it('refuses a tunnel whose session token has expired without minting anything', async () => {
    let current = new Date()
    const broker = await start({now: () => current})
    const session = await createSession(broker)

    current = new Date(current.getTime() + 16 * 60 * 1000)

    expect(await refusedUpgrade(tunnelUrlOf(broker, session.session_id, session.session_token))).toEqual({
      status: 401,
      body: {error: 'session_invalid', message: 'Session token is invalid or the session has ended'}
    })
    expect(broker.issuer.livePrincipals()).toEqual(['user-alice/tunnel-session-1'])
    expect(broker.app.multiplexer.activeTunnels).toBe(0)
  })

  it('closes an open tunnel and revokes the principal when the session is deleted', async () => {
    const broker = await start()
    const session = await createSession(broker)
    const client = await openTunnel(tunnelUrlOf(broker, session.session_id, session.session_token))

    const deleted = await fetch(`${broker.httpUrl}/session/${session.session_id}`, {method: 'DELETE'})
    expect(deleted.status).toBe(200)
    expect(await deleted.json()).toEqual({message: 'session deleted'})

    expect(await client.next()).toEqual({
      type: 'error',
      payload: {code: 'session_ended', message: 'Session ended: explicit'}
    })
    expect(await client.closed).toEqual({code: 4001, reason: 'session ended: explicit'})
    expect(broker.issuer.livePrincipals()).toEqual([])
    expect(broker.issuer.revocations()).toEqual(['tunnel-session-1'])

    const lookup = await fetch(`${broker.httpUrl}/session/${session.session_id}`)
    expect(await errorOf(lookup)).toEqual({status: 404, error: 'session_not_found', message: 'Session not found'})
  })
})

describe('session broker http surface', () => {
  it('reports health with a unix timestamp and echoes the correlation id', async () => {
    const broker = await start()

    const response = await fetch(`${broker.httpUrl}/health`, {headers: {'x-correlation-id': 'corr-1'}})

    expect(response.status).toBe(200)
    expect(response.headers.get('x-correlation-id')).toBe('corr-1')
    expect(response.headers.get('cache-control')).toBe('no-store')
    const body = z.object({status: z.literal('healthy'), timestamp: z.number()}).parse(await response.json())
    expect(Math.abs(body.timestamp - Date.now() / 1000)).toBeLessThan(60)
  })

  it('answers unknown routes with route_not_found', async () => {
    const broker = await start()

    const response = await fetch(`${broker.httpUrl}/nowhere`)

    expect(await errorOf(response)).toEqual({
      status: 404,
      error: 'route_not_found',
      message: 'Unsupported route GET /nowhere'
    })
  })

  it('maps callback failures onto statuses', async () => {
    const broker = await start()
    const {state} = z.object({state: z.string()}).parse(await (await fetch(`${broker.httpUrl}/auth/start`)).json())

    const badCode = await fetch(`${broker.httpUrl}/auth/callback?code=stolen&state=${encodeURIComponent(state)}`)
    const badState = await fetch(`${broker.httpUrl}/auth/callback?code=code-alice&state=forged.state`)
    const missing = await fetch(`${broker.httpUrl}/auth/callback?code=code-alice`)
    const denied = await fetch(`${broker.httpUrl}/auth/callback?error=access_denied`)

    expect(await errorOf(badCode)).toEqual({
      status: 401,
      error: 'provider_rejected',
      message: 'Grant is invalid or expired'
    })
    expect((await errorOf(badState)).error).toBe('invalid_flow_state')
    expect(badState.status).toBe(400)
    expect(await errorOf(missing)).toEqual({
      status: 400,
      error: 'auth_callback_invalid',
      message: 'Callback requires code and state parameters'
    })
    expect(await errorOf(denied)).toEqual({status: 401, error: 'provider_rejected', message: 'access_denied'})
  })

  it('refreshes tokens and keeps the refresh token the provider did not rotate', async () => {
    const broker = await start()

    const response = await postJson(`${broker.httpUrl}/auth/refresh`, {refresh_token: 'refresh-alice'})

    expect(response.status).toBe(200)
    expect(await response.json()).toEqual({
      access_token: 'access-alice-2',
      refresh_token: 'refresh-alice',
      expires_in: 900,
      token_type: 'Bearer'
    })
  })

  it('rejects session creation for bad input, bad tokens and upstream failures', async () => {
    const broker = await start()

    const wrongType = await fetch(`${broker.httpUrl}/session`, {
      method: 'POST',
      headers: {'content-type': 'text/plain'},
      body: 'hello'
    })
    const emptyObject = await postJson(`${broker.httpUrl}/session`, {})
    const unknownToken = await postJson(`${broker.httpUrl}/session`, {access_token: 'access-mallory'})
    const hubDown = await postJson(`${broker.httpUrl}/session`, {access_token: 'access-carol'})

    expect((await errorOf(wrongType)).status).toBe(415)
    expect(await errorOf(emptyObject)).toMatchObject({status: 400, error: 'request_body_schema_invalid'})
    expect(await errorOf(unknownToken)).toEqual({
      status: 401,
      error: 'token_rejected',
      message: 'Access token was rejected (status 401)'
    })
    expect(await errorOf(hubDown)).toEqual({
      status: 502,
      error: 'upstream_error',
      message: 'GET /users/carol%40example.org returned status 500'
    })
    expect(broker.issuer.livePrincipals()).toEqual([])
  })

  it('reports a failed credential mint as a bad gateway', async () => {
    const broker = await start()
    broker.issuer.failNextMint('binding_failed')

    const response = await postJson(`${broker.httpUrl}/session`, {access_token: 'access-alice'})

    expect(await errorOf(response)).toEqual({
      status: 502,
      error: 'credential_mint_failed',
      message: 'Injected binding_failed'
    })
    expect(broker.app.registry.size).toBe(0)
  })

  it('returns an existing session and rotates its token only for the owner', async () => {
    let current = new Date()
    const broker = await start({now: () => current})
    const session = await createSession(broker)

    const fetched = await fetch(`${broker.httpUrl}/session/${session.session_id}`)
    expect(SessionBodySchema.parse(await fetched.json())).toEqual(session)

    const stranger = await postJson(`${broker.httpUrl}/session/${session.session_id}/token`, {
      access_token: 'access-bob'
    })
    expect(await errorOf(stranger)).toEqual({
      status: 403,
      error: 'session_owner_mismatch',
      message: 'Access token does not belong to the session owner'
    })

    current = new Date(current.getTime() + 16 * 60 * 1000)
    const rotated = await postJson(`${broker.httpUrl}/session/${session.session_id}/token`, {
      access_token: 'access-alice-2'
    })
    expect(rotated.status).toBe(200)
    const body = z
      .object({session_id: z.string(), session_token: z.string(), token_expires_at: z.string()})
      .parse(await rotated.json())
    expect(body.session_id).toBe(session.session_id)
    expect(body.session_token).not.toBe(session.session_token)
    expect(body.token_expires_at).toBe(new Date(current.getTime() + 15 * 60 * 1000).toISOString())

    const client = await openTunnel(tunnelUrlOf(broker, session.session_id, body.session_token))
    client.send({type: 'exec', payload: {command: 'echo', args: ['again']}})
    expect(await client.next()).toEqual({type: 'exec_response', payload: {stream: 'stdout', data: 'again\n'}})
  })

  it('allows only one tunnel per session', async () => {
    const broker = await start()
    const session = await createSession(broker)
    const url = tunnelUrlOf(broker, session.session_id, session.session_token)
    await openTunnel(url)

    expect(await refusedUpgrade(url)).toEqual({
      status: 409,
      body: {error: 'tunnel_already_bound', message: 'Session already has an open tunnel'}
    })
  })

  it('revokes every remaining credential when stopped', async () => {
    const broker = await startTestBroker()
    await createSession(broker)
    await createSession(broker, 'access-bob')
    expect(broker.issuer.livePrincipals()).toHaveLength(2)

    await broker.app.stop()

    expect(broker.issuer.livePrincipals()).toEqual([])
    expect(broker.app.registry.size).toBe(0)
  })
})
