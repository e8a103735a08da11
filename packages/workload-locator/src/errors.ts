import {z} from 'zod';

export const locatorErrorCodeSchema = z.enum([
  'workload_unavailable',
  'upstream_error',
  'upstream_unreachable',
  'upstream_response_invalid'
]);

export type LocatorErrorCode = z.infer<typeof locatorErrorCodeSchema>;

export type LocatorError = {
  code: LocatorErrorCode;
  message: string;
};

export type LocatorResult<T> = {ok: true; value: T} | {ok: false; error: LocatorError};

export const ok = <T>(value: T): {ok: true; value: T} => ({ok: true, value});

export const err = (code: LocatorErrorCode, message: string): {ok: false; error: LocatorError} => ({
  ok: false,
  error: {code, message}
});
