import {createInMemoryCredentialIssuer, type InMemoryCredentialIssuer} from '@tunnel-broker/credentials'
import type {FetchLike} from '@tunnel-broker/identity'
import {createInMemoryWorkload, type InMemoryWorkload} from '@tunnel-broker/tunnel'
import {vi, type Mock} from 'vitest'
import WebSocket from 'ws'

import {createSessionBrokerApp, type SessionBrokerApp} from '../app'
import {loadConfig, type ServiceConfig} from '../config'

export const IDP_URL = 'https://idp.test'
export const HUB_URL = 'https://hub.test/hub/api'

export const makeConfig = (overrides: NodeJS.ProcessEnv = {}): ServiceConfig => ({
  ...loadConfig({
    NODE_ENV: 'test',
    BROKER_HOST: '127.0.0.1',
    SESSION_TOKEN_SECRET: 'test-secret-test-secret-test-secret',
    OIDC_ISSUER: IDP_URL,
    OIDC_CLIENT_ID: 'broker-client',
    OIDC_REDIRECT_URL: 'http://127.0.0.1/auth/callback',
    ORCHESTRATOR_API_URL: HUB_URL,
    WORKLOAD_NAME_TEMPLATE: 'nb-{user}',
    ...overrides
  }),
  port: 0
})

type UserInfo = {sub: string; email: string; name: string}

const USERS: Record<string, UserInfo> = {
  'access-alice': {sub: 'http://idp.test/users/1', email: 'alice@example.org', name: 'Alice'},
  'access-alice-2': {sub: 'http://idp.test/users/1', email: 'alice@example.org', name: 'Alice'},
  'access-bob': {sub: 'http://idp.test/users/2', email: 'bob@example.org', name: 'Bob'},
  'access-carol': {sub: 'http://idp.test/users/3', email: 'carol@example.org', name: 'Carol'}
}

const json = (status: number, body: unknown) =>
  new Response(JSON.stringify(body), {status, headers: {'content-type': 'application/json'}})

const urlOf = (input: Parameters<FetchLike>[0]) =>
  typeof input === 'string' ? input : input instanceof URL ? input.href : input.url

/**
 * Stands in for both the identity provider and the orchestration API. Alice and Bob
 * already have running servers; the orchestrator fails for Carol.
 */
export const createUpstreamStub = (): Mock<FetchLike> =>
  vi.fn<FetchLike>(async (input, init) => {
    const url = urlOf(input)
    const method = init?.method ?? 'GET'

    if (url === `${IDP_URL}/oauth2/token` && method === 'POST') {
      const form = new URLSearchParams(typeof init?.body === 'string' ? init.body : '')
      if (form.get('grant_type') === 'authorization_code' && form.get('code') === 'code-alice') {
        return json(200, {access_token: 'access-alice', refresh_token: 'refresh-alice', expires_in: 900, token_type: 'Bearer'})
      }
      if (form.get('grant_type') === 'refresh_token' && form.get('refresh_token') === 'refresh-alice') {
        return json(200, {access_token: 'access-alice-2', expires_in: 900})
      }
      return json(400, {error: 'invalid_grant', error_description: 'Grant is invalid or expired'})
    }

    if (url === `${IDP_URL}/oauth2/userinfo`) {
      const authorization = new Headers(init?.headers).get('authorization') ?? ''
      const user = USERS[authorization.replace(/^Bearer /u, '')]
      return user ? json(200, user) : new Response('denied', {status: 401})
    }

    if (url === `${HUB_URL}/users/alice%40example.org` || url === `${HUB_URL}/users/bob%40example.org`) {
      const name = decodeURIComponent(url.slice(url.lastIndexOf('/') + 1))
      return json(200, {name, servers: {'': {ready: true}}})
    }

    if (url.startsWith(`${HUB_URL}/users/`)) {
      return json(500, {message: 'hub exploded'})
    }

    return new Response('not found', {status: 404})
  })

export type TestBroker = {
  app: SessionBrokerApp
  issuer: InMemoryCredentialIssuer
  workload: InMemoryWorkload
  upstream: Mock<FetchLike>
  httpUrl: string
  wsUrl: string
}

export const startTestBroker = async ({
  env = {},
  now
}: {
  env?: NodeJS.ProcessEnv
  now?: () => Date
} = {}): Promise<TestBroker> => {
  const issuer = createInMemoryCredentialIssuer()
  const workload = createInMemoryWorkload()
  const upstream = createUpstreamStub()
  const app = await createSessionBrokerApp({
    config: makeConfig(env),
    dependencies: {
      fetchImpl: upstream,
      issuer,
      runtimeFactory: () => workload.runtime,
      ...(now ? {now} : {})
    }
  })
  await app.start()

  const address = app.server.address()
  if (!address || typeof address === 'string') {
    await app.stop()
    throw new Error('expected a TCP address')
  }

  return {
    app,
    issuer,
    workload,
    upstream,
    httpUrl: `http://127.0.0.1:${address.port}`,
    wsUrl: `ws://127.0.0.1:${address.port}`
  }
}

export type TunnelClient = {
  ws: WebSocket
  next: () => Promise<unknown>
  send: (message: unknown) => void
  closed: Promise<{code: number; reason: string}>
}

export const openTunnel = (url: string) =>
  new Promise<TunnelClient>((resolve, reject) => {
    const ws = new WebSocket(url)
    const inbox: unknown[] = []
    const waiters: Array<(message: unknown) => void> = []
    const closed = new Promise<{code: number; reason: string}>(resolveClosed => {
      ws.once('close', (code, reason) => resolveClosed({code, reason: reason.toString('utf8')}))
    })

    ws.on('message', data => {
      const message: unknown = JSON.parse(String(data))
      const waiter = waiters.shift()
      if (waiter) {
        waiter(message)
      } else {
        inbox.push(message)
      }
    })
    ws.once('error', reject)
    ws.once('open', () =>
      resolve({
        ws,
        closed,
        send: message => ws.send(JSON.stringify(message)),
        next: () =>
          inbox.length > 0
            ? Promise.resolve(inbox.shift())
            : new Promise<unknown>(resolveMessage => waiters.push(resolveMessage))
      })
    )
  })

export const refusedUpgrade = (url: string) =>
  new Promise<{status: number; body: unknown}>((resolve, reject) => {
    const ws = new WebSocket(url)
    ws.on('error', () => undefined)
    ws.once('open', () => reject(new Error('upgrade should have been refused')))
    ws.once('unexpected-response', (request, response) => {
      let body = ''
      response.setEncoding('utf8')
      response.on('data', (chunk: string) => {
        body += chunk
      })
      response.on('end', () => {
        request.destroy()
        resolve({status: response.statusCode ?? 0, body: JSON.parse(body)})
      })
    })
  })
