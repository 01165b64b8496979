import * as jose from 'jose';
import { SecretsManagerClient, GetSecretValueCommand } from '@aws-sdk/client-secrets-manager';
import { loadConfig, AppConfig } from '../utils/config';
import { logger } from '../utils/logger';
import { UnauthorizedError } from '../utils/errors';
import { Principal, User, UserRole } from '../types';

/**
 * Token Service
 * Issues and verifies HMAC-signed access tokens carrying the user id and role
 */

const SUPPORTED_ALGORITHMS = ['HS256', 'HS384', 'HS512'];

// Cache the signing key to avoid re-fetching the secret on every invocation
let cachedKey: Uint8Array | null = null;

/**
 * Resolve the signing secret: JWT_SECRET wins, otherwise the Secrets Manager
 * secret named by JWT_SECRET_ID is read once per container
 */
async function getSigningKey(config: AppConfig['jwt']): Promise<Uint8Array> {
  if (cachedKey) {
    return cachedKey;
  }

  if (config.secret) {
    cachedKey = new TextEncoder().encode(config.secret);
    return cachedKey;
  }

  if (!config.secretId) {
    throw new Error('JWT_SECRET or JWT_SECRET_ID must be set');
  }

  try {
    const secretsManager = new SecretsManagerClient({
      region: process.env.AWS_REGION || 'us-east-2',
    });

    const response = await secretsManager.send(
      new GetSecretValueCommand({
        SecretId: config.secretId,
      })
    );

    if (!response.SecretString) {
      throw new Error('Secret value is empty');
    }

    const parsed: unknown = JSON.parse(response.SecretString);
    const secret =
      typeof parsed === 'object' && parsed !== null && 'secret' in parsed ? parsed.secret : undefined;
    if (typeof secret !== 'string' || secret.length === 0) {
      throw new Error('Secret does not contain a "secret" field');
    }

    cachedKey = new TextEncoder().encode(secret);
    logger.info('JWT signing key loaded from Secrets Manager');
    return cachedKey;
  } catch (error) {
    logger.error('Failed to retrieve JWT secret from Secrets Manager', error);
    throw new Error('JWT secret unavailable - Secrets Manager access failed');
  }
}

/**
 * Drop the cached signing key (tests, secret rotation)
 */
export function resetSigningKeyCache(): void {
  cachedKey = null;
}

export interface AccessToken {
  accessToken: string;
  tokenType: 'bearer';
}

function isUserRole(value: unknown): value is UserRole {
  const roles: unknown[] = Object.values(UserRole);
  return roles.includes(value);
}

export class TokenService {
  private config: AppConfig['jwt'];

  constructor(config: AppConfig['jwt'] = loadConfig().jwt) {
    if (!SUPPORTED_ALGORITHMS.includes(config.algorithm)) {
      throw new Error(`Unsupported JWT algorithm: ${config.algorithm}`);
    }
    this.config = config;
  }

  async issue(user: Pick<User, 'id' | 'role'>): Promise<AccessToken> {
    const key = await getSigningKey(this.config);

    const accessToken = await new jose.SignJWT({ role: user.role })
      .setProtectedHeader({ alg: this.config.algorithm })
      .setSubject(String(user.id))
      .setIssuedAt()
      .setExpirationTime(`${this.config.expireMinutes}m`)
      .sign(key);

    return { accessToken, tokenType: 'bearer' };
  }

  /**
   * Verify signature and expiry; returns the principal the token was issued to
   */
  async verify(token: string): Promise<Principal> {
    const key = await getSigningKey(this.config);

    let payload: jose.JWTPayload;
    try {
      ({ payload } = await jose.jwtVerify(token, key, { algorithms: [this.config.algorithm] }));
    } catch (error) {
      logger.debug('Token verification failed', {
        reason: error instanceof Error ? error.message : String(error),
      });
      throw new UnauthorizedError('Could not validate credentials');
    }

    const id = Number(payload.sub);
    if (!Number.isInteger(id) || id <= 0 || !isUserRole(payload.role)) {
      throw new UnauthorizedError('Could not validate credentials');
    }

    return { id, role: payload.role };
  }
}
