import {randomUUID} from 'node:crypto';
import type {IncomingMessage} from 'node:http';
import type {Duplex} from 'node:stream';

import {createNoopLogger, runWithLogContext, setLogContextFields, type StructuredLogger} from '@tunnel-broker/logging';
import type {Session, SessionEndReason, SessionRegistry} from '@tunnel-broker/sessions';
import {WebSocketServer, type WebSocket} from 'ws';

import {TunnelConnection} from './connection';
import type {WorkloadRuntimeFactory} from './runtime';
import {parseTunnelUpgrade, rejectUpgrade} from './upgrade';

export type TunnelMultiplexerOptions = {
  registry: SessionRegistry;
  runtimeFactory: WorkloadRuntimeFactory;
  idleTimeoutMs: number;
  maxPayloadBytes: number;
  logger?: StructuredLogger;
};

const TUNNEL_ROUTE = '/tunnel';

const SESSION_INVALID = {error: 'session_invalid', message: 'Session token is invalid or the session has ended'};

/**
 * Accepts `/tunnel/{sessionId}` upgrades, binds each to its session and tears the
 * session down when the tunnel goes away.
 */
export class TunnelMultiplexer {
  private readonly registry: SessionRegistry;
  private readonly runtimeFactory: WorkloadRuntimeFactory;
  private readonly idleTimeoutMs: number;
  private readonly logger: StructuredLogger;
  private readonly server: WebSocketServer;
  private readonly bindings = new Map<string, TunnelConnection>();
  private readonly reserved = new Set<string>();
  private readonly cleanups = new Set<Promise<void>>();
  private readonly unsubscribe: () => void;

  constructor(options: TunnelMultiplexerOptions) {
    this.registry = options.registry;
    this.runtimeFactory = options.runtimeFactory;
    this.idleTimeoutMs = options.idleTimeoutMs;
    this.logger = options.logger ?? createNoopLogger();
    this.server = new WebSocketServer({noServer: true, maxPayload: options.maxPayloadBytes});
    this.unsubscribe = this.registry.onSessionEnded(({session, reason}) => {
      if (reason !== 'tunnel_closed') {
        this.bindings.get(session.id)?.endForSession(reason);
      }
    });
  }

  get activeTunnels() {
    return this.bindings.size;
  }

  isBound(sessionId: string) {
    return this.bindings.has(sessionId);
  }

  handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer) {
    return runWithLogContext({request_id: randomUUID(), route: TUNNEL_ROUTE, method: request.method ?? 'GET'}, () =>
      this.upgrade(request, socket, head)
    );
  }

  private async upgrade(request: IncomingMessage, socket: Duplex, head: Buffer) {
    const target = parseTunnelUpgrade(request);
    if (!target) {
      rejectUpgrade({socket, status: 404, body: {error: 'route_not_found', message: 'No tunnel endpoint at this path'}});
      return;
    }

    const resolved = target.token ? await this.registry.getByToken(target.token) : null;
    if (!resolved?.ok || resolved.value.id !== target.sessionId) {
      this.logger.warn({
        event: 'tunnel.upgrade.rejected',
        component: 'tunnel.multiplexer',
        message: 'Tunnel upgrade refused',
        reason_code: 'session_invalid',
        status_code: 401,
        metadata: {token_present: target.token !== null}
      });
      rejectUpgrade({socket, status: 401, body: SESSION_INVALID});
      return;
    }

    const session = resolved.value;
    setLogContextFields({session_id: session.id, user: session.identity.subject});
    if (this.bindings.has(session.id) || this.reserved.has(session.id)) {
      this.logger.warn({
        event: 'tunnel.upgrade.rejected',
        component: 'tunnel.multiplexer',
        message: 'Session already has a bound tunnel',
        session_id: session.id,
        reason_code: 'tunnel_already_bound',
        status_code: 409
      });
      rejectUpgrade({
        socket,
        status: 409,
        body: {error: 'tunnel_already_bound', message: 'Session already has an open tunnel'}
      });
      return;
    }

    if (socket.destroyed) {
      return;
    }

    this.reserved.add(session.id);
    socket.once('close', () => this.reserved.delete(session.id));
    this.server.handleUpgrade(request, socket, head, ws => {
      this.reserved.delete(session.id);
      this.bind(session, ws);
    });
  }

  /** Closes every tunnel and waits until their sessions have been released. */
  async close() {
    this.unsubscribe();
    const connections = [...this.bindings.values()];
    for (const connection of connections) {
      connection.shutdown();
    }
    await Promise.all(connections.map(connection => connection.closed));
    await Promise.all([...this.cleanups]);
    await new Promise<void>((resolve, reject) => {
      this.server.close(error => (error ? reject(error) : resolve()));
    });
  }

  private bind(session: Session, ws: WebSocket) {
    // The session may have ended while the handshake completed.
    if (!this.registry.get(session.id).ok) {
      ws.close(4001, 'session ended');
      return;
    }

    const connection = new TunnelConnection({
      socket: ws,
      session,
      runtime: this.runtimeFactory(session.credential),
      idleTimeoutMs: this.idleTimeoutMs,
      remainingLifetimeMs: () => this.registry.remainingLifetimeMs(session.id),
      isSessionActive: () => this.registry.get(session.id).ok,
      onSessionExpired: expired => this.expire(expired),
      logger: this.logger,
      onClosed: closed => this.release(closed)
    });
    this.bindings.set(session.id, connection);

    this.logger.info({
      event: 'tunnel.bound',
      component: 'tunnel.multiplexer',
      message: 'Tunnel bound to session',
      session_id: session.id,
      user: session.identity.subject,
      workload: session.workload.workloadName
    });
  }

  // Ends the session ahead of the expiry sweep.
  private expire(connection: TunnelConnection) {
    connection.endForSession('expired');
    this.endSession(connection.session.id, 'expired');
  }

  private release(connection: TunnelConnection) {
    const sessionId = connection.session.id;
    if (this.bindings.get(sessionId) === connection) {
      this.bindings.delete(sessionId);
    }

    this.endSession(sessionId, 'tunnel_closed');
  }

  private endSession(sessionId: string, reason: SessionEndReason) {
    const cleanup = this.registry
      .delete(sessionId, reason)
      .then(() => undefined)
      .catch((error: unknown) => {
        this.logger.error({
          event: 'tunnel.release.failed',
          component: 'tunnel.multiplexer',
          message: 'Session cleanup after tunnel close failed',
          session_id: sessionId,
          reason_code: reason,
          metadata: {error}
        });
      })
      .finally(() => {
        this.cleanups.delete(cleanup);
      });
    this.cleanups.add(cleanup);
  }
}
