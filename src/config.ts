/**
 * config.ts — Runtime configuration from environment variables
 */

import { DEFAULT_TIMEOUT } from "./bridge/executor.js";
import { DEFAULT_MAPPING_DIR } from "./mapping/store.js";

export interface BridgeConfig {
  host: string;
  port: number;
  allowedOrigins: string[];
  progId: string;
  timeout: number;
  mappingDir: string;
}

const DEFAULT_PORT = 8000;
const DEFAULT_ORIGINS = ["http://localhost:3000"];

export function getBridgeConfig(env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  const rawPort = env.PORT?.trim();
  const port = rawPort ? Number(rawPort) : DEFAULT_PORT;
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid PORT "${rawPort}". Must be an integer between 0 and 65535.`);
  }

  const rawTimeout = env.BRIDGE_TIMEOUT?.trim();
  const timeout = rawTimeout ? Number(rawTimeout) : DEFAULT_TIMEOUT;
  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw new Error(
      `Invalid BRIDGE_TIMEOUT "${rawTimeout}". Must be a positive whole number of milliseconds.`,
    );
  }

  const origins = (env.ALLOWED_ORIGINS || "")
    .split(",")
    .map((o) => o.trim())
    .filter(Boolean);

  return {
    host: env.HOST || "127.0.0.1",
    port,
    allowedOrigins: origins.length > 0 ? origins : DEFAULT_ORIGINS,
    progId: env.CAD_PROG_ID || "Inventor.Application",
    timeout,
    mappingDir: env.MAPPING_DIR || DEFAULT_MAPPING_DIR,
  };
}
