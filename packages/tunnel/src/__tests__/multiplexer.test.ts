import {createServer, type Server} from 'node:http';

import {createInMemoryCredentialIssuer, type InMemoryCredentialIssuer} from '@tunnel-broker/credentials';
import {SessionRegistry, type Session} from '@tunnel-broker/sessions';
import {afterEach, describe, expect, it, vi} from 'vitest';
import WebSocket from 'ws';

import {createInMemoryWorkload, type InMemoryWorkload} from '../inMemoryRuntime';
import {TunnelMultiplexer} from '../multiplexer';

type Harness = {
  registry: SessionRegistry;
  issuer: InMemoryCredentialIssuer;
  workload: InMemoryWorkload;
  multiplexer: TunnelMultiplexer;
  session: Session;
  baseUrl: string;
  tunnelUrl: (sessionId?: string, token?: string) => string;
  close: () => Promise<void>;
};

type TestClient = {
  ws: WebSocket;
  next: () => Promise<unknown>;
  send: (message: unknown) => void;
  closed: Promise<{code: number; reason: string}>;
};

const harnesses: Harness[] = [];

const createHarness = async ({
  idleTimeoutMs = 60_000,
  sessionLifetimeSeconds = 3600,
  now
}: {
  idleTimeoutMs?: number;
  sessionLifetimeSeconds?: number;
  now?: () => Date;
} = {}): Promise<Harness> => {
  const issuer = createInMemoryCredentialIssuer(now ? {now} : {});
  const registry = new SessionRegistry({
    issuer,
    tokenSecret: Buffer.alloc(32, 't'),
    sessionLifetimeSeconds,
    tokenTtlSeconds: 900,
    ...(now ? {now} : {})
  });
  const workload = createInMemoryWorkload();
  const multiplexer = new TunnelMultiplexer({
    registry,
    runtimeFactory: () => workload.runtime,
    idleTimeoutMs,
    maxPayloadBytes: 1024 * 1024
  });

  const server: Server = createServer((_request, response) => {
    response.statusCode = 404;
    response.end();
  });
  server.on('upgrade', (request, socket, head) => {
    multiplexer.handleUpgrade(request, socket, head).catch(() => socket.destroy());
  });
  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('expected a TCP address');
  }

  const created = await registry.create({
    identity: {subject: 'alice@campus.example'},
    workload: {workloadName: 'nb-alice', namespace: 'user-alice', status: 'running'}
  });
  if (!created.ok) {
    throw new Error(created.error.message);
  }

  const baseUrl = `ws://127.0.0.1:${address.port}`;
  const session = created.value;
  const harness: Harness = {
    registry,
    issuer,
    workload,
    multiplexer,
    session,
    baseUrl,
    tunnelUrl: (sessionId = session.id, token = session.sessionToken) =>
      `${baseUrl}/tunnel/${sessionId}?token=${encodeURIComponent(token)}`,
    close: async () => {
      await multiplexer.close();
      server.closeAllConnections();
      await new Promise<void>(resolve => server.close(() => resolve()));
    }
  };
  harnesses.push(harness);
  return harness;
};

const connect = (url: string) =>
  new Promise<TestClient>((resolve, reject) => {
    const ws = new WebSocket(url);
    const inbox: unknown[] = [];
    const waiters: Array<(message: unknown) => void> = [];
    const closed = new Promise<{code: number; reason: string}>(resolveClosed => {
      ws.once('close', (code, reason) => resolveClosed({code, reason: reason.toString('utf8')}));
    });

    ws.on('message', data => {
      const message: unknown = JSON.parse(String(data));
      const waiter = waiters.shift();
      if (waiter) {
        waiter(message);
      } else {
        inbox.push(message);
      }
    });
    ws.once('error', reject);
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
    );
  });

const expectRefused = (url: string) =>
  new Promise<{status: number; body: unknown}>((resolve, reject) => {
    const ws = new WebSocket(url);
    ws.on('error', () => undefined);
    ws.once('open', () => reject(new Error('upgrade should have been refused')));
    ws.once('unexpected-response', (request, response) => {
      let body = '';
      response.setEncoding('utf8');
      response.on('data', (chunk: string) => {
        body += chunk;
      });
      response.on('end', () => {
        request.destroy();
        resolve({status: response.statusCode ?? 0, body: JSON.parse(body)});
      });
    });
  });

afterEach(async () => {
  await Promise.all(harnesses.splice(0).map(harness => harness.close()));
});

describe('tunnel multiplexer', () => {
  it('runs a command and streams its output before the exit code', async () => {
    const harness = await createHarness();
    const client = await connect(harness.tunnelUrl());

    client.send({type: 'exec', payload: {command: 'echo', args: ['hi'], request_id: 'r1'}});

    expect(await client.next()).toEqual({
      type: 'exec_response',
      payload: {request_id: 'r1', stream: 'stdout', data: 'hi\n'}
    });
    expect(await client.next()).toEqual({
      type: 'exec_response',
      payload: {request_id: 'r1', exit_code: 0, done: true}
    });
    expect(harness.multiplexer.isBound(harness.session.id)).toBe(true);
  });

  it('reports a command that cannot start', async () => {
    const harness = await createHarness();
    const client = await connect(harness.tunnelUrl());

    client.send({type: 'exec', payload: {command: 'nope'}});

    expect(await client.next()).toEqual({
      type: 'error',
      payload: {code: 'exec_failed', message: 'executable file not found: nope'}
    });
  });

  it('writes, reads, lists and deletes files in request order', async () => {
    const harness = await createHarness();
    const client = await connect(harness.tunnelUrl());

    client.send({type: 'file', payload: {operation: 'write', path: '/home/jovyan/notes.txt', content: 'hello\n'}});
    client.send({type: 'file', payload: {operation: 'read', path: '/home/jovyan/notes.txt'}});
    client.send({type: 'file', payload: {operation: 'list', path: '/home/jovyan'}});
    client.send({type: 'file', payload: {operation: 'delete', path: '/home/jovyan/notes.txt'}});
    client.send({type: 'file', payload: {operation: 'read', path: '/home/jovyan/notes.txt'}});

    expect(await client.next()).toEqual({type: 'file_response', payload: {success: true}});
    expect(await client.next()).toEqual({type: 'file_response', payload: {success: true, content: 'hello\n'}});
    expect(await client.next()).toEqual({type: 'file_response', payload: {success: true, content: 'notes.txt\n'}});
    expect(await client.next()).toEqual({type: 'file_response', payload: {success: true}});
    expect(await client.next()).toEqual({
      type: 'file_response',
      payload: {success: false, error: 'cat: /home/jovyan/notes.txt: No such file or directory'}
    });
  });

  it('answers malformed and unknown messages without closing', async () => {
    const harness = await createHarness();
    const client = await connect(harness.tunnelUrl());

    client.ws.send('{not json');
    client.send({type: 'teleport', payload: {}});
    client.send({type: 'file', payload: {operation: 'write', path: '/tmp/x'}});
    client.send({type: 'exec', payload: {command: 'echo', args: ['still', 'here']}});

    expect(await client.next()).toEqual({
      type: 'error',
      payload: {code: 'message_invalid', message: 'Frame is not valid JSON'}
    });
    expect(await client.next()).toEqual({
      type: 'error',
      payload: {code: 'message_type_unknown', message: 'Unknown message type: teleport'}
    });
    expect(await client.next()).toEqual({
      type: 'error',
      payload: {code: 'message_invalid', message: 'file payload requires an operation and a path'}
    });
    expect(await client.next()).toEqual({
      type: 'exec_response',
      payload: {stream: 'stdout', data: 'still here\n'}
    });
  });

  it('forwards bytes to a workload port and back', async () => {
    const harness = await createHarness();
    const client = await connect(harness.tunnelUrl());

    client.send({type: 'portforward', payload: {port: 8888, forward_id: 'f1'}});
    expect(await client.next()).toEqual({
      type: 'portforward_response',
      payload: {forward_id: 'f1', action: 'opened', port: 8888}
    });

    client.send({type: 'portforward', payload: {action: 'data', forward_id: 'f1', data: 'cGluZw=='}});
    expect(await client.next()).toEqual({
      type: 'portforward_response',
      payload: {forward_id: 'f1', action: 'data', data: 'cGluZw=='}
    });

    client.send({type: 'portforward', payload: {action: 'close', forward_id: 'f1'}});
    expect(await client.next()).toEqual({type: 'portforward_response', payload: {forward_id: 'f1', action: 'closed'}});
    expect(harness.workload.openForwards()).toBe(0);

    client.send({type: 'portforward', payload: {action: 'data', forward_id: 'f1', data: 'cGluZw=='}});
    expect(await client.next()).toEqual({
      type: 'error',
      payload: {code: 'portforward_unknown', message: 'No open forward f1', forward_id: 'f1'}
    });
  });

  it('reports a forward the workload refuses', async () => {
    const harness = await createHarness();
    const client = await connect(harness.tunnelUrl());

    client.send({type: 'portforward', payload: {action: 'open', port: 9999, forward_id: 'f2'}});

    expect(await client.next()).toEqual({
      type: 'error',
      payload: {code: 'portforward_failed', message: 'connection refused on port 9999', forward_id: 'f2'}
    });
  });

  it('refuses an upgrade whose token belongs to another session id', async () => {
    const harness = await createHarness();

    const refused = await expectRefused(harness.tunnelUrl('some-other-session'));

    expect(refused).toEqual({
      status: 401,
      body: {error: 'session_invalid', message: 'Session token is invalid or the session has ended'}
    });
    expect(harness.multiplexer.activeTunnels).toBe(0);
    expect(harness.registry.get(harness.session.id).ok).toBe(true);
  });

  it('refuses an upgrade without a valid token', async () => {
    const harness = await createHarness();

    const missing = await expectRefused(`${harness.baseUrl}/tunnel/${harness.session.id}`);
    const forged = await expectRefused(harness.tunnelUrl(harness.session.id, 'forged.token.value'));

    expect(missing.status).toBe(401);
    expect(forged).toEqual(missing);
  });

  it('answers 404 for upgrades outside the tunnel path', async () => {
    const harness = await createHarness();

    const refused = await expectRefused(`${harness.baseUrl}/elsewhere`);

    expect(refused).toEqual({
      status: 404,
      body: {error: 'route_not_found', message: 'No tunnel endpoint at this path'}
    });
  });

  it('allows one tunnel per session', async () => {
    const harness = await createHarness();
    await connect(harness.tunnelUrl());

    const refused = await expectRefused(harness.tunnelUrl());

    expect(refused).toEqual({
      status: 409,
      body: {error: 'tunnel_already_bound', message: 'Session already has an open tunnel'}
    });
  });

  it('closes the tunnel with a reason when its session is deleted', async () => {
    const harness = await createHarness();
    const client = await connect(harness.tunnelUrl());

    await harness.registry.delete(harness.session.id);

    expect(await client.next()).toEqual({
      type: 'error',
      payload: {code: 'session_ended', message: 'Session ended: explicit'}
    });
    expect(await client.closed).toEqual({code: 4001, reason: 'session ended: explicit'});
    expect(harness.issuer.livePrincipals()).toEqual([]);
    await vi.waitFor(() => expect(harness.multiplexer.activeTunnels).toBe(0));
    expect(harness.issuer.revocations()).toHaveLength(1);
  });

  it('ends the session and cancels work when the client disconnects', async () => {
    const harness = await createHarness();
    const client = await connect(harness.tunnelUrl());
    client.send({type: 'exec', payload: {command: 'block'}});
    await vi.waitFor(() => expect(harness.workload.execCount()).toBe(1));

    client.ws.close();

    await vi.waitFor(() => expect(harness.registry.size).toBe(0));
    expect(harness.issuer.livePrincipals()).toEqual([]);
    expect(harness.issuer.revocations()).toEqual(['tunnel-session-1']);
  });

  it('closes an idle tunnel', async () => {
    const harness = await createHarness({idleTimeoutMs: 150});
    const client = await connect(harness.tunnelUrl());

    expect(await client.next()).toEqual({
      type: 'error',
      payload: {code: 'idle_timeout', message: 'Tunnel idle for too long'}
    });
    expect(await client.closed).toEqual({code: 4000, reason: 'idle timeout'});
    await vi.waitFor(() => expect(harness.registry.size).toBe(0));
  });

  it('keeps a tunnel with a running command open past the idle window', async () => {
    const harness = await createHarness({idleTimeoutMs: 100});
    const client = await connect(harness.tunnelUrl());
    client.send({type: 'exec', payload: {command: 'block'}});
    await vi.waitFor(() => expect(harness.workload.execCount()).toBe(1));

    await new Promise(resolve => setTimeout(resolve, 350));

    expect(harness.multiplexer.isBound(harness.session.id)).toBe(true);
    expect(harness.registry.get(harness.session.id).ok).toBe(true);
    expect(harness.issuer.revocations()).toEqual([]);
  });

  it('keeps a tunnel with an open forward alive past the idle window', async () => {
    const harness = await createHarness({idleTimeoutMs: 100});
    const client = await connect(harness.tunnelUrl());
    client.send({type: 'portforward', payload: {port: 8888, forward_id: 'f1'}});
    expect(await client.next()).toEqual({
      type: 'portforward_response',
      payload: {forward_id: 'f1', action: 'opened', port: 8888}
    });

    await new Promise(resolve => setTimeout(resolve, 350));

    expect(harness.multiplexer.isBound(harness.session.id)).toBe(true);
    expect(harness.workload.openForwards()).toBe(1);
  });

  it('ends an expired session before running anything else on its tunnel', async () => {
    let current = Date.now();
    const harness = await createHarness({sessionLifetimeSeconds: 60, now: () => new Date(current)});
    const client = await connect(harness.tunnelUrl());

    current += 120_000;
    client.send({type: 'exec', payload: {command: 'echo', args: ['still-running']}});

    expect(await client.next()).toEqual({
      type: 'error',
      payload: {code: 'session_ended', message: 'Session ended: expired'}
    });
    expect(await client.closed).toEqual({code: 4001, reason: 'session ended: expired'});
    expect(harness.workload.execCount()).toBe(0);
    await vi.waitFor(() => expect(harness.issuer.livePrincipals()).toEqual([]));
    expect(harness.issuer.revocations()).toEqual(['tunnel-session-1']);
    expect(harness.registry.size).toBe(0);
  });

  it('closes the tunnel when its session runs out of lifetime', async () => {
    const harness = await createHarness({sessionLifetimeSeconds: 3});
    const client = await connect(harness.tunnelUrl());

    expect(await client.next()).toEqual({
      type: 'error',
      payload: {code: 'session_ended', message: 'Session ended: expired'}
    });
    expect(await client.closed).toEqual({code: 4001, reason: 'session ended: expired'});
    await vi.waitFor(() => expect(harness.registry.size).toBe(0));
    expect(harness.issuer.revocations()).toEqual(['tunnel-session-1']);
  });
});
