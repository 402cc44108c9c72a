import { ConfigError } from './errors';

export interface ServerConfig {
  port: number;
  host?: string;
  environment: string;
}

export const DEFAULT_PORT = 8080;

function parsePort(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') {
    return DEFAULT_PORT;
  }
  const port = Number(raw.trim());
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError(`Invalid PORT value: ${raw}`);
  }
  return port;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: parsePort(env.PORT),
    host: env.HOST?.trim() || undefined,
    environment: env.NODE_ENV || 'development',
  };
}
