import {randomUUID} from 'node:crypto';
import {StringDecoder} from 'node:string_decoder';

import {createNoopLogger, type StructuredLogger} from '@tunnel-broker/logging';
import {
  ExecRequestSchema,
  FileRequestSchema,
  PortForwardRequestSchema,
  TunnelEnvelopeSchema,
  type ExecRequest,
  type FileRequest,
  type OutboundTunnelMessage,
  type PortForwardRequest,
  type TunnelErrorCode
} from '@tunnel-broker/schemas';
import type {Session} from '@tunnel-broker/sessions';
import WebSocket, {type RawData} from 'ws';

import {toFileCommand} from './fileCommands';
import type {PortForwardChannel, WorkloadRuntime} from './runtime';

export type TunnelState = 'bound' | 'closing' | 'closed';

export const CLOSE_IDLE = 4000;
export const CLOSE_SESSION_ENDED = 4001;

const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error));

const rawDataToString = (raw: RawData) => {
  if (Array.isArray(raw)) {
    return Buffer.concat(raw).toString('utf8');
  }

  return Buffer.from(raw instanceof ArrayBuffer ? new Uint8Array(raw) : raw).toString('utf8');
};

const withRequestId = (requestId: string | undefined) => (requestId ? {request_id: requestId} : {});

// setTimeout fires immediately for delays beyond a signed 32-bit integer.
const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

export type TunnelConnectionOptions = {
  socket: WebSocket;
  session: Session;
  runtime: WorkloadRuntime;
  idleTimeoutMs: number;
  /** Time left before the session expires, measured on the registry's clock. */
  remainingLifetimeMs: () => number;
  isSessionActive: () => boolean;
  onSessionExpired: (connection: TunnelConnection) => void;
  logger?: StructuredLogger;
  onClosed: (connection: TunnelConnection) => void;
};

/**
 * One bound tunnel. Exec and file requests run one at a time in arrival order; port
 * forwards run alongside them, keyed by forward id. The tunnel only counts as idle
 * while nothing is queued or forwarding.
 */
export class TunnelConnection {
  readonly session: Session;
  private readonly socket: WebSocket;
  private readonly runtime: WorkloadRuntime;
  private readonly idleTimeoutMs: number;
  private readonly logger: StructuredLogger;
  private readonly onClosed: (connection: TunnelConnection) => void;
  private readonly isSessionActive: () => boolean;
  private readonly remainingLifetimeMs: () => number;
  private readonly onSessionExpired: (connection: TunnelConnection) => void;
  private readonly forwards = new Map<string, PortForwardChannel>();
  private readonly lifetime = new AbortController();
  private queue: Promise<void> = Promise.resolve();
  private pendingTasks = 0;
  private idleTimer: NodeJS.Timeout | undefined;
  private expiryTimer: NodeJS.Timeout | undefined;
  private currentState: TunnelState = 'bound';
  private resolveClosed: () => void = () => undefined;
  readonly closed = new Promise<void>(resolve => {
    this.resolveClosed = resolve;
  });

  constructor(options: TunnelConnectionOptions) {
    this.socket = options.socket;
    this.session = options.session;
    this.runtime = options.runtime;
    this.idleTimeoutMs = options.idleTimeoutMs;
    this.logger = options.logger ?? createNoopLogger();
    this.onClosed = options.onClosed;
    this.isSessionActive = options.isSessionActive;
    this.remainingLifetimeMs = options.remainingLifetimeMs;
    this.onSessionExpired = options.onSessionExpired;

    this.socket.on('message', (raw, isBinary) => this.handleFrame(raw, isBinary));
    this.socket.on('close', (code, reason) => this.handleClose(code, reason.toString('utf8')));
    this.socket.on('error', error => {
      this.log('warn', {event: 'tunnel.socket.error', message: error.message, reason_code: 'socket_error'});
    });
    this.armIdleTimer();
    this.armExpiryTimer();
  }

  get state() {
    return this.currentState;
  }

  /** Ends the tunnel because its session is gone; the client gets the reason first. */
  endForSession(reason: string) {
    if (this.currentState !== 'bound') {
      return;
    }

    this.send({type: 'error', payload: {code: 'session_ended', message: `Session ended: ${reason}`}});
    this.beginClosing(CLOSE_SESSION_ENDED, `session ended: ${reason}`);
  }

  shutdown() {
    this.beginClosing(1001, 'broker shutting down');
  }

  private handleFrame(raw: RawData, isBinary: boolean) {
    if (this.currentState !== 'bound') {
      return;
    }

    this.armIdleTimer();
    if (!this.isSessionActive()) {
      this.onSessionExpired(this);
      return;
    }

    if (isBinary) {
      this.sendError('message_invalid', 'Binary frames are not supported');
      return;
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(rawDataToString(raw));
    } catch {
      this.rejectMessage('message_invalid', 'Frame is not valid JSON');
      return;
    }

    const envelope = TunnelEnvelopeSchema.safeParse(decoded);
    if (!envelope.success) {
      this.rejectMessage('message_invalid', 'Frame must be an object with a string type');
      return;
    }

    const {type, payload} = envelope.data;
    switch (type) {
      case 'exec': {
        const request = ExecRequestSchema.safeParse(payload);
        if (!request.success) {
          this.rejectMessage('message_invalid', 'exec payload requires a command');
          return;
        }
        this.enqueue(() => this.runExec(request.data));
        return;
      }
      case 'file': {
        const request = FileRequestSchema.safeParse(payload);
        if (!request.success) {
          this.rejectMessage('message_invalid', 'file payload requires an operation and a path');
          return;
        }
        this.enqueue(() => this.runFile(request.data));
        return;
      }
      case 'portforward': {
        const request = PortForwardRequestSchema.safeParse(payload);
        if (!request.success) {
          this.rejectMessage('message_invalid', 'portforward payload is invalid');
          return;
        }
        this.handlePortForward(request.data);
        return;
      }
      default:
        this.rejectMessage('message_type_unknown', `Unknown message type: ${type}`);
    }
  }

  private enqueue(task: () => Promise<void>) {
    this.pendingTasks += 1;
    this.queue = this.queue
      .then(task)
      .catch((error: unknown) => {
        this.log('error', {event: 'tunnel.task.failed', message: describeError(error), reason_code: 'internal_error'});
        this.sendError('internal_error', 'Request failed unexpectedly');
      })
      .finally(() => {
        this.pendingTasks -= 1;
        this.armIdleTimer();
      });
  }

  private async runExec(request: ExecRequest) {
    if (this.currentState !== 'bound') {
      return;
    }

    const requestId = withRequestId(request.request_id);
    const emitter = (stream: 'stdout' | 'stderr', enabled: boolean) => {
      const decoder = new StringDecoder('utf8');
      return {
        write: (chunk: Buffer) => {
          const data = decoder.write(chunk);
          if (enabled && data.length > 0) {
            this.send({type: 'exec_response', payload: {...requestId, stream, data}});
          }
        },
        flush: () => {
          const data = decoder.end();
          if (enabled && data.length > 0) {
            this.send({type: 'exec_response', payload: {...requestId, stream, data}});
          }
        }
      };
    };
    const stdout = emitter('stdout', request.stdout);
    const stderr = emitter('stderr', request.stderr);

    try {
      const {exitCode} = await this.runtime.exec({
        command: [request.command, ...request.args],
        ...(request.stdin !== undefined ? {stdin: Buffer.from(request.stdin, 'utf8')} : {}),
        onStdout: stdout.write,
        onStderr: stderr.write,
        signal: this.lifetime.signal
      });
      stdout.flush();
      stderr.flush();
      this.send({type: 'exec_response', payload: {...requestId, exit_code: exitCode, done: true}});
    } catch (error) {
      if (this.currentState !== 'bound') {
        return;
      }

      this.log('warn', {
        event: 'tunnel.exec.failed',
        message: describeError(error),
        reason_code: 'exec_failed',
        metadata: {command: request.command}
      });
      this.sendError('exec_failed', describeError(error), request.request_id);
    }
  }

  private async runFile(request: FileRequest) {
    if (this.currentState !== 'bound') {
      return;
    }

    const requestId = withRequestId(request.request_id);
    const {command, stdin} = toFileCommand(request);
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    try {
      const {exitCode} = await this.runtime.exec({
        command,
        ...(stdin ? {stdin} : {}),
        onStdout: chunk => stdout.push(chunk),
        onStderr: chunk => stderr.push(chunk),
        signal: this.lifetime.signal
      });

      if (exitCode !== 0) {
        const message = Buffer.concat(stderr).toString('utf8').trim();
        this.send({
          type: 'file_response',
          payload: {...requestId, success: false, error: message.length > 0 ? message : `exit code ${exitCode}`}
        });
        return;
      }

      const returnsContent = request.operation === 'read' || request.operation === 'list';
      this.send({
        type: 'file_response',
        payload: {
          ...requestId,
          success: true,
          ...(returnsContent ? {content: Buffer.concat(stdout).toString('utf8')} : {})
        }
      });
    } catch (error) {
      if (this.currentState !== 'bound') {
        return;
      }

      this.send({type: 'file_response', payload: {...requestId, success: false, error: describeError(error)}});
    }
  }

  private handlePortForward(request: PortForwardRequest) {
    switch (request.action) {
      case 'open': {
        const forwardId = request.forward_id ?? randomUUID();
        if (this.forwards.has(forwardId)) {
          this.sendError('portforward_failed', `Forward ${forwardId} is already open`, undefined, forwardId);
          return;
        }
        this.openForward(forwardId, request.port).catch((error: unknown) => {
          this.log('error', {event: 'tunnel.portforward.failed', message: describeError(error)});
        });
        return;
      }
      case 'data': {
        const channel = this.forwards.get(request.forward_id);
        if (!channel) {
          this.sendError('portforward_unknown', `No open forward ${request.forward_id}`, undefined, request.forward_id);
          return;
        }
        channel.write(Buffer.from(request.data, 'base64'));
        return;
      }
      case 'close': {
        const channel = this.forwards.get(request.forward_id);
        if (!channel) {
          this.sendError('portforward_unknown', `No open forward ${request.forward_id}`, undefined, request.forward_id);
          return;
        }
        this.forwards.delete(request.forward_id);
        channel.close();
        this.send({type: 'portforward_response', payload: {forward_id: request.forward_id, action: 'closed'}});
      }
    }
  }

  private async openForward(forwardId: string, port: number) {
    let channel: PortForwardChannel;
    try {
      channel = await this.runtime.openPortForward({
        port,
        onData: chunk => {
          if (this.forwards.has(forwardId)) {
            this.send({
              type: 'portforward_response',
              payload: {forward_id: forwardId, action: 'data', data: chunk.toString('base64')}
            });
          }
        },
        onClose: reason => {
          if (this.forwards.delete(forwardId)) {
            this.send({
              type: 'portforward_response',
              payload: {forward_id: forwardId, action: 'closed', ...(reason ? {reason} : {})}
            });
          }
        }
      });
    } catch (error) {
      this.sendError('portforward_failed', describeError(error), undefined, forwardId);
      return;
    }

    if (this.currentState !== 'bound' || this.forwards.has(forwardId)) {
      channel.close();
      return;
    }

    this.forwards.set(forwardId, channel);
    this.send({type: 'portforward_response', payload: {forward_id: forwardId, action: 'opened', port}});
  }

  private rejectMessage(code: TunnelErrorCode, message: string) {
    this.log('debug', {event: 'tunnel.message.invalid', message, reason_code: code});
    this.sendError(code, message);
  }

  private sendError(code: TunnelErrorCode, message: string, requestId?: string, forwardId?: string) {
    this.send({
      type: 'error',
      payload: {code, message, ...withRequestId(requestId), ...(forwardId ? {forward_id: forwardId} : {})}
    });
  }

  private send(message: OutboundTunnelMessage) {
    if (this.socket.readyState === WebSocket.OPEN) {
      this.socket.send(JSON.stringify(message));
    }
  }

  private armIdleTimer() {
    if (this.idleTimer) {
      clearTimeout(this.idleTimer);
      this.idleTimer = undefined;
    }
    if (this.currentState !== 'bound') {
      return;
    }

    this.idleTimer = setTimeout(() => {
      if (this.pendingTasks > 0 || this.forwards.size > 0) {
        this.armIdleTimer();
        return;
      }

      if (this.currentState === 'bound') {
        this.send({type: 'error', payload: {code: 'idle_timeout', message: 'Tunnel idle for too long'}});
        this.beginClosing(CLOSE_IDLE, 'idle timeout');
      }
    }, this.idleTimeoutMs);
    this.idleTimer.unref();
  }

  private armExpiryTimer() {
    const remaining = this.remainingLifetimeMs();
    if (remaining <= 0) {
      this.onSessionExpired(this);
      return;
    }

    this.expiryTimer = setTimeout(() => {
      this.expiryTimer = undefined;
      if (this.currentState === 'bound') {
        this.armExpiryTimer();
      }
    }, Math.min(remaining, MAX_TIMER_DELAY_MS));
    this.expiryTimer.unref();
  }

  private beginClosing(code: number, reason: string) {
    if (this.currentState === 'bound') {
      this.socket.close(code, reason);
    }
    this.release();
  }

  private handleClose(code: number, reason: string) {
    this.release();
    if (this.currentState === 'closed') {
      return;
    }

    this.currentState = 'closed';
    this.log('info', {event: 'tunnel.closed', message: 'Tunnel closed', metadata: {code, reason}});
    this.onClosed(this);
    this.resolveClosed();
  }

  // Cancels everything in flight; runs once on the way out.
  private release() {
    if (this.currentState !== 'bound') {
      return;
    }

    this.currentState = 'closing';
    if (this.idleTimer) {
      clearTimeout(this.idleTimer);
      this.idleTimer = undefined;
    }
    if (this.expiryTimer) {
      clearTimeout(this.expiryTimer);
      this.expiryTimer = undefined;
    }
    this.lifetime.abort(new Error('tunnel closed'));

    const channels = [...this.forwards.values()];
    this.forwards.clear();
    for (const channel of channels) {
      channel.close();
    }
  }

  private log(
    level: 'debug' | 'info' | 'warn' | 'error',
    input: {event: string; message?: string; reason_code?: string; metadata?: Record<string, unknown>}
  ) {
    this.logger.log({
      level,
      component: 'tunnel.connection',
      session_id: this.session.id,
      user: this.session.identity.subject,
      workload: this.session.workload.workloadName,
      ...input
    });
  }
}
