import { parsePort } from '../env.utils';

export const ENV_PORT = 'PORT';
export const DEFAULT_HTTP_PORT = 3000;

/** Port for the HTTP server; a missing or invalid PORT falls back to 3000. */
export function loadHttpPort(env: NodeJS.ProcessEnv = process.env): number {
  return parsePort(env[ENV_PORT], DEFAULT_HTTP_PORT);
}
