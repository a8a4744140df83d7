import { createHash, randomBytes } from 'node:crypto';

export const PKCE_CHALLENGE_METHOD = 'S256';

/** 32 random bytes as base64url, i.e. a 43 character verifier. */
export function createCodeVerifier(): string {
  return randomBytes(32).toString('base64url');
}

export function createCodeChallenge(verifier: string): string {
  return createHash('sha256').update(verifier).digest('base64url');
}

export function createOAuthState(): string {
  return randomBytes(24).toString('base64url');
}
