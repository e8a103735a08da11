import {createHash} from 'node:crypto';

import {describe, expect, it} from 'vitest';

import {openFlowState, sealFlowState} from '../flowState';
import {createPkcePair, deriveCodeChallenge} from '../pkce';

const key = Buffer.alloc(32, 'k');
const now = new Date('2026-03-01T12:00:00.000Z');

describe('pkce', () => {
  it('derives the S256 challenge from the verifier', () => {
    const {codeVerifier, codeChallenge} = createPkcePair();

    expect(codeVerifier).toMatch(/^[A-Za-z0-9_-]{43,128}$/u);
    expect(codeChallenge).toBe(createHash('sha256').update(codeVerifier).digest('base64url'));
  });

  it('matches the RFC 7636 appendix B example', () => {
    expect(deriveCodeChallenge('dBjftJeZ4CVP-mB92K27uhbUJU1p1r_wW1gFWFOEjXk')).toBe(
      'E9Melhoa2OwvFrEMTJguCHaoeK1t8URWbuGJSstw-cM'
    );
  });
});

describe('flow state', () => {
  const seal = () =>
    sealFlowState({
      key,
      state: 'anti-replay-state-value',
      codeVerifier: 'v'.repeat(64),
      now,
      ttlSeconds: 600
    });

  it('round-trips the verifier and anti-replay state', () => {
    const opened = openFlowState({key, flowState: seal(), now});

    expect(opened).toEqual({
      ok: true,
      value: {
        v: 1,
        state: 'anti-replay-state-value',
        code_verifier: 'v'.repeat(64),
        iat: Math.floor(now.getTime() / 1000),
        exp: Math.floor(now.getTime() / 1000) + 600
      }
    });
  });

  it('rejects a flow state signed with another key', () => {
    const opened = openFlowState({key: Buffer.alloc(32, 'x'), flowState: seal(), now});

    expect(opened).toEqual({
      ok: false,
      error: {code: 'invalid_flow_state', message: 'Flow state signature is invalid'}
    });
  });

  it('rejects a tampered payload', () => {
    const [, signature] = seal().split('.');
    const forged = Buffer.from(JSON.stringify({v: 1, state: 'x'.repeat(16), code_verifier: 'y'.repeat(64), iat: 0, exp: 9e9}))
      .toString('base64url');

    const opened = openFlowState({key, flowState: `${forged}.${signature ?? ''}`, now});

    expect(opened.ok).toBe(false);
  });

  it('rejects malformed and expired flow states', () => {
    expect(openFlowState({key, flowState: 'not-a-flow-state', now})).toEqual({
      ok: false,
      error: {code: 'invalid_flow_state', message: 'Flow state is malformed'}
    });

    const later = new Date(now.getTime() + 601_000);
    expect(openFlowState({key, flowState: seal(), now: later})).toEqual({
      ok: false,
      error: {code: 'invalid_flow_state', message: 'Flow state has expired'}
    });
  });
});
