/**
 * PIPELINE TRIGGER: Scheduler Authentication
 *
 *   allow   no check (local dev, tests)
 *   secret  Authorization: Bearer <SCHEDULER_SECRET>
 *   oidc    Authorization: Bearer <JWT> signed by the scheduler's identity
 *           provider, checked against issuer + audience
 *
 * Missing credentials → 401, wrong credentials → 403.
 */

import { timingSafeEqual } from 'node:crypto';
import type { FastifyRequest } from 'fastify';
import { createRemoteJWKSet, jwtVerify, type JWTVerifyGetKey } from 'jose';
import { AuthRejectedError, errorMessage } from '../../common/errors.js';
import type { SchedulerAuthConfig } from '../../config/env.js';

export interface SchedulerAuthVerifier {
  readonly mode: SchedulerAuthConfig['mode'];
  verify(authorization: string | undefined): Promise<void>;
}

export function bearerToken(authorization: string | undefined): string | null {
  if (!authorization) return null;
  const match = /^Bearer\s+(\S+)\s*$/i.exec(authorization);
  return match ? match[1] : null;
}

function requireBearer(authorization: string | undefined): string {
  const token = bearerToken(authorization);
  if (!token) {
    throw new AuthRejectedError('Missing bearer token', 401);
  }
  return token;
}

export class AllowAllVerifier implements SchedulerAuthVerifier {
  readonly mode = 'allow' as const;

  async verify(): Promise<void> {
    return;
  }
}

export class SharedSecretVerifier implements SchedulerAuthVerifier {
  readonly mode = 'secret' as const;
  private readonly expected: Buffer;

  constructor(secret: string) {
    this.expected = Buffer.from(secret, 'utf-8');
  }

  async verify(authorization: string | undefined): Promise<void> {
    const given = Buffer.from(requireBearer(authorization), 'utf-8');
    const ok = given.length === this.expected.length && timingSafeEqual(given, this.expected);
    if (!ok) {
      throw new AuthRejectedError('Invalid scheduler secret', 403);
    }
  }
}

export interface OidcVerifierOptions {
  issuer: string;
  audience: string;
  getKey: JWTVerifyGetKey;
}

export class OidcTokenVerifier implements SchedulerAuthVerifier {
  readonly mode = 'oidc' as const;

  constructor(private readonly options: OidcVerifierOptions) {}

  async verify(authorization: string | undefined): Promise<void> {
    const token = requireBearer(authorization);
    try {
      await jwtVerify(token, this.options.getKey, {
        issuer: this.options.issuer,
        audience: this.options.audience,
      });
    } catch (err) {
      throw new AuthRejectedError(`Invalid scheduler token: ${errorMessage(err)}`, 403);
    }
  }
}

export function createSchedulerAuthVerifier(cfg: SchedulerAuthConfig): SchedulerAuthVerifier {
  switch (cfg.mode) {
    case 'secret':
      return new SharedSecretVerifier(cfg.secret);
    case 'oidc':
      return new OidcTokenVerifier({
        issuer: cfg.issuer,
        audience: cfg.audience,
        getKey: createRemoteJWKSet(new URL(cfg.jwksUrl)),
      });
    case 'allow':
      return new AllowAllVerifier();
  }
}

/** Fastify preHandler for the trigger route */
export function schedulerAuthHook(verifier: SchedulerAuthVerifier) {
  return async (req: FastifyRequest): Promise<void> => {
    await verifier.verify(req.headers.authorization);
  };
}
