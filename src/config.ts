/**
 * corepipe — Runtime configuration
 *
 * Environment variables are validated once at startup with envalid.
 */

import { resolve } from 'node:path';
import { bool, cleanEnv, num, str } from 'envalid';

const resolvePath = (p: string): string => (p.startsWith('/') ? p : resolve(process.cwd(), p));

const optionalPath = (p: string): string | undefined => (p === '' ? undefined : resolvePath(p));

const logLevel = str({
  choices: ['debug', 'info', 'warn', 'error'] as const,
  default: 'info',
  desc: 'Logging level',
});

const logFormat = str({
  choices: ['text', 'json'] as const,
  default: 'text',
  desc: 'Log output format',
});

const env = cleanEnv(process.env, {
  NODE_ENV: str({ choices: ['development', 'production', 'test'], default: 'development' }),
  COREPIPE_DB_PATH: str({ default: 'corepipe.db', desc: 'SQLite database file' }),
  LOG_LEVEL: logLevel,
  LOG_FORMAT: logFormat,
  AGENT_RPC_PORT: num({ default: 19090, desc: 'Agent RPC port used when a host has none' }),
  AGENT_RPC_SCHEME: str({ choices: ['http', 'https'] as const, default: 'http' }),
  AGENT_RPC_TIMEOUT_MS: num({ default: 30000, desc: 'Per-call agent RPC timeout (ms)' }),
  AGENT_RPC_KEEPALIVE_MS: num({ default: 30000, desc: 'Keep-alive interval for agent connections (ms)' }),
  AGENT_RPC_CA_FILE: str({ default: '', desc: 'CA bundle for agent TLS' }),
  AGENT_RPC_CERT_FILE: str({ default: '', desc: 'Client certificate for agent mTLS' }),
  AGENT_RPC_KEY_FILE: str({ default: '', desc: 'Client key for agent mTLS' }),
  AGENT_RPC_INSECURE_SKIP_VERIFY: bool({
    default: false,
    desc: 'Skip agent TLS certificate verification',
  }),
});

export const config = {
  isDev: env.NODE_ENV === 'development',
  isProd: env.NODE_ENV === 'production',
  isTest: env.NODE_ENV === 'test',
  dbPath: env.COREPIPE_DB_PATH,
  logLevel: env.LOG_LEVEL,
  logFormat: env.LOG_FORMAT,
  agentRpc: {
    defaultPort: env.AGENT_RPC_PORT,
    scheme: env.AGENT_RPC_SCHEME,
    timeoutMs: env.AGENT_RPC_TIMEOUT_MS,
    keepAliveMs: env.AGENT_RPC_KEEPALIVE_MS,
    caFile: optionalPath(env.AGENT_RPC_CA_FILE),
    certFile: optionalPath(env.AGENT_RPC_CERT_FILE),
    keyFile: optionalPath(env.AGENT_RPC_KEY_FILE),
    insecureSkipVerify: env.AGENT_RPC_INSECURE_SKIP_VERIFY,
  },
} as const;

export type Config = typeof config;
