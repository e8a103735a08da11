import {describe, expect, it} from 'vitest';

import {createInMemoryCredentialIssuer} from '../inMemoryIssuer';

const workload = {workloadName: 'nb-alice', namespace: 'user-alice', status: 'running' as const};

describe('in-memory credential issuer', () => {
  it('tracks live principals across mint and revoke', async () => {
    const issuer = createInMemoryCredentialIssuer({now: () => new Date('2026-03-01T12:00:00.000Z')});

    const minted = await issuer.mint(workload);
    if (!minted.ok) {
      throw new Error('expected mint to succeed');
    }

    expect(minted.value.expiresAt.toISOString()).toBe('2026-03-01T13:00:00.000Z');
    expect(issuer.livePrincipals()).toEqual(['user-alice/tunnel-session-1']);

    await issuer.revoke(minted.value);

    expect(issuer.livePrincipals()).toEqual([]);
    expect(issuer.revocations()).toEqual(['tunnel-session-1']);
  });

  it('fails exactly the next mint when a failure is injected', async () => {
    const issuer = createInMemoryCredentialIssuer();
    issuer.failNextMint('token_mint_failed');

    const failed = await issuer.mint(workload);
    const recovered = await issuer.mint(workload);

    expect(failed).toEqual({ok: false, error: {code: 'token_mint_failed', message: 'Injected token_mint_failed'}});
    expect(recovered.ok).toBe(true);
    expect(issuer.livePrincipals()).toHaveLength(1);
  });
});
