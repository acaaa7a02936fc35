/**
 * Gateway configuration, read from environment variables (and a local .env
 * file through dotenv).
 */

import 'dotenv/config';
import { LogSeverity, parseLogSeverity } from './utils/logger.js';

export interface Config {
  port: number;
  logLevel: LogSeverity;

  // OAuth2 policy configuration
  policy: {
    introspectionResourceId: string;
    checkRequiredScopes: boolean;
    requiredScopes?: string[];
    extractPayload: boolean;
    realm: string;
  };

  // Introspection endpoint of the authorization server (RFC 7662)
  introspection: {
    endpoint?: string;
    clientId?: string;
    clientSecret?: string;
    timeoutMs: number;
  };

  // Redis cache for introspection results (optional)
  cache: {
    enabled: boolean;
    url?: string;
    ttlSeconds: number;
  };
}

type Env = Record<string, string | undefined>;

function readInteger(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  switch (raw.trim().toLowerCase()) {
    case '1':
    case 'true':
    case 'yes':
      return true;
    case '0':
    case 'false':
    case 'no':
      return false;
    default:
      throw new Error(`${name} must be a boolean, got "${raw}"`);
  }
}

// Scopes are listed space or comma separated; unset means "no requirement".
function readScopes(env: Env, name: string): string[] | undefined {
  const raw = env[name];
  if (raw === undefined) {
    return undefined;
  }
  return raw.split(/[\s,]+/).filter(scope => scope.length > 0);
}

function optional(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: Env = process.env): Config {
  const logLevelName = env.LOG_LEVEL || 'info';
  const logLevel = parseLogSeverity(logLevelName);
  if (!logLevel) {
    throw new Error(`LOG_LEVEL must be one of ${Object.values(LogSeverity).join(', ').toLowerCase()}, got "${logLevelName}"`);
  }

  const redisUrl = optional(env, 'REDIS_URL');

  return {
    port: readInteger(env, 'PORT', 3232),
    logLevel,

    policy: {
      introspectionResourceId: optional(env, 'INTROSPECTION_RESOURCE') || 'oauth2',
      checkRequiredScopes: readBoolean(env, 'CHECK_REQUIRED_SCOPES', false),
      requiredScopes: readScopes(env, 'REQUIRED_SCOPES'),
      extractPayload: readBoolean(env, 'EXTRACT_PAYLOAD', false),
      realm: optional(env, 'AUTH_REALM') || 'gravitee.io'
    },

    introspection: {
      endpoint: optional(env, 'INTROSPECTION_ENDPOINT'),
      clientId: optional(env, 'INTROSPECTION_CLIENT_ID'),
      clientSecret: env.INTROSPECTION_CLIENT_SECRET,
      timeoutMs: readInteger(env, 'INTROSPECTION_TIMEOUT_MS', 5000)
    },

    cache: {
      enabled: !!redisUrl,
      url: redisUrl,
      ttlSeconds: readInteger(env, 'INTROSPECTION_CACHE_TTL', 60)
    }
  };
}
