import {STATUS_CODES, type IncomingMessage} from 'node:http';
import type {Duplex} from 'node:stream';

const TUNNEL_PATH = /^\/tunnel\/([^/]+)\/?$/u;

export type TunnelUpgradeTarget = {
  sessionId: string;
  token: string | null;
};

/** Session id from the path, token from `?token=` or a bearer authorization header. */
export const parseTunnelUpgrade = (
  request: Pick<IncomingMessage, 'url' | 'headers'>
): TunnelUpgradeTarget | null => {
  const url = new URL(request.url ?? '/', 'http://tunnel.invalid');
  const match = TUNNEL_PATH.exec(url.pathname);
  const encodedId = match?.[1];
  if (!encodedId) {
    return null;
  }

  let sessionId: string;
  try {
    sessionId = decodeURIComponent(encodedId);
  } catch {
    return null;
  }

  const queryToken = url.searchParams.get('token');
  const authorization = request.headers.authorization;
  const bearer = authorization?.startsWith('Bearer ') ? authorization.slice('Bearer '.length).trim() : undefined;

  return {sessionId, token: queryToken ?? (bearer && bearer.length > 0 ? bearer : null)};
};

/** Answers a refused upgrade with a plain HTTP response and drops the socket. */
export const rejectUpgrade = ({
  socket,
  status,
  body
}: {
  socket: Duplex;
  status: number;
  body: Record<string, unknown>;
}) => {
  if (!socket.writable) {
    socket.destroy();
    return;
  }

  const payload = JSON.stringify(body);
  socket.once('finish', () => socket.destroy());
  socket.end(
    `HTTP/1.1 ${status} ${STATUS_CODES[status] ?? 'Error'}\r\n` +
      'Connection: close\r\n' +
      'Content-Type: application/json; charset=utf-8\r\n' +
      'Cache-Control: no-store\r\n' +
      `Content-Length: ${Buffer.byteLength(payload)}\r\n` +
      '\r\n' +
      payload
  );
};
