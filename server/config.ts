import { isValidTimeZone } from "./validation";

export interface ServerConfig {
  port: number;
  dataDir: string;
  timezone: string | null;
  apiKey: string | null;
}

export const DEFAULT_PORT = 5000;
export const DEFAULT_DATA_DIR = "data";

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const rawPort = env.PORT?.trim();
  const port = rawPort ? Number(rawPort) : DEFAULT_PORT;
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid PORT "${rawPort}"`);
  }

  const timezone = env.DASHBOARD_TIMEZONE?.trim() || null;
  if (timezone && !isValidTimeZone(timezone)) {
    throw new Error(`Unknown DASHBOARD_TIMEZONE "${timezone}"`);
  }

  return {
    port,
    dataDir: env.DATA_DIR?.trim() || DEFAULT_DATA_DIR,
    timezone,
    apiKey: env.API_KEY || null,
  };
}
