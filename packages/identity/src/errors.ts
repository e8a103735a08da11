import {z} from 'zod';

export const identityErrorCodeSchema = z.enum([
  'invalid_flow_state',
  'provider_rejected',
  'malformed_provider_response',
  'token_rejected',
  'provider_unreachable',
  'identity_config_invalid'
]);

export type IdentityErrorCode = z.infer<typeof identityErrorCodeSchema>;

export type IdentityError = {
  code: IdentityErrorCode;
  message: string;
};

export type IdentitySuccess<T> = {
  ok: true;
  value: T;
};

export type IdentityFailure = {
  ok: false;
  error: IdentityError;
};

export type IdentityResult<T> = IdentitySuccess<T> | IdentityFailure;

export const ok = <T>(value: T): IdentitySuccess<T> => ({ok: true, value});

export const err = (code: IdentityErrorCode, message: string): IdentityFailure => ({
  ok: false,
  error: {code, message}
});
