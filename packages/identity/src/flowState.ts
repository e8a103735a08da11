import {createHmac, timingSafeEqual} from 'node:crypto';

import {z} from 'zod';

import {err, ok, type IdentityResult} from './errors';

const FLOW_STATE_VERSION = 1;

const flowStatePayloadSchema = z
  .object({
    v: z.literal(FLOW_STATE_VERSION),
    state: z.string().min(16),
    code_verifier: z.string().min(43).max(128),
    iat: z.number().int(),
    exp: z.number().int()
  })
  .strict();

export type FlowStatePayload = z.infer<typeof flowStatePayloadSchema>;

const sign = ({key, encodedPayload}: {key: Buffer; encodedPayload: string}) =>
  createHmac('sha256', key).update(encodedPayload).digest();

export const sealFlowState = ({
  key,
  state,
  codeVerifier,
  now,
  ttlSeconds
}: {
  key: Buffer;
  state: string;
  codeVerifier: string;
  now: Date;
  ttlSeconds: number;
}) => {
  const issuedAt = Math.floor(now.getTime() / 1000);
  const payload = flowStatePayloadSchema.parse({
    v: FLOW_STATE_VERSION,
    state,
    code_verifier: codeVerifier,
    iat: issuedAt,
    exp: issuedAt + ttlSeconds
  });

  const encodedPayload = Buffer.from(JSON.stringify(payload), 'utf8').toString('base64url');
  return `${encodedPayload}.${sign({key, encodedPayload}).toString('base64url')}`;
};

export const openFlowState = ({
  key,
  flowState,
  now
}: {
  key: Buffer;
  flowState: string;
  now: Date;
}): IdentityResult<FlowStatePayload> => {
  const [encodedPayload, encodedSignature, ...rest] = flowState.split('.');
  if (!encodedPayload || !encodedSignature || rest.length > 0) {
    return err('invalid_flow_state', 'Flow state is malformed');
  }

  const expected = sign({key, encodedPayload});
  const presented = Buffer.from(encodedSignature, 'base64url');
  if (presented.length !== expected.length || !timingSafeEqual(presented, expected)) {
    return err('invalid_flow_state', 'Flow state signature is invalid');
  }

  let payload: FlowStatePayload;
  try {
    payload = flowStatePayloadSchema.parse(JSON.parse(Buffer.from(encodedPayload, 'base64url').toString('utf8')));
  } catch {
    return err('invalid_flow_state', 'Flow state payload is invalid');
  }

  if (payload.exp <= Math.floor(now.getTime() / 1000)) {
    return err('invalid_flow_state', 'Flow state has expired');
  }

  return ok(payload);
};
