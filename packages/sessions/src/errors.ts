import {z} from 'zod';

export const sessionErrorCodeSchema = z.enum(['session_not_found', 'session_expired', 'credential_mint_failed']);

export type SessionErrorCode = z.infer<typeof sessionErrorCodeSchema>;

export type SessionError = {
  code: SessionErrorCode;
  message: string;
  cause_code?: string;
};

export type SessionResult<T> = {ok: true; value: T} | {ok: false; error: SessionError};

export const ok = <T>(value: T): {ok: true; value: T} => ({ok: true, value});

export const err = (
  code: SessionErrorCode,
  message: string,
  causeCode?: string
): {ok: false; error: SessionError} => ({
  ok: false,
  error: {code, message, ...(causeCode ? {cause_code: causeCode} : {})}
});
