import {z} from 'zod';

export const credentialErrorCodeSchema = z.enum(['principal_create_failed', 'binding_failed', 'token_mint_failed']);

export type CredentialErrorCode = z.infer<typeof credentialErrorCodeSchema>;

export type CredentialError = {
  code: CredentialErrorCode;
  message: string;
};

export type CredentialResult<T> = {ok: true; value: T} | {ok: false; error: CredentialError};

export const ok = <T>(value: T): {ok: true; value: T} => ({ok: true, value});

export const err = (code: CredentialErrorCode, message: string): {ok: false; error: CredentialError} => ({
  ok: false,
  error: {code, message}
});

export const describeClusterError = (error: unknown) => {
  const status = clusterStatusOf(error);
  const reason = error instanceof Error ? error.message : String(error);
  return status === undefined ? reason : `status ${status}: ${reason}`;
};

// ApiException and plain HTTP errors both carry the response status as `code`.
export const clusterStatusOf = (error: unknown): number | undefined => {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }

  return typeof error.code === 'number' ? error.code : undefined;
};
