import { InvalidArgumentError } from './errors';
import { LogLevel, parseLogLevel } from './logging/structured-logger';

export const DEFAULT_ISSUER_MSP_ID = 'Org1MSP';
export const DEFAULT_PORT = 3000;
export const DEFAULT_EVENT_LOG_CAPACITY = 1000;

export interface NodeConfig {
  issuerMspId: string;
  port: number;
  /** Unset keeps the world state in memory only. */
  dataDir?: string;
  /** Unset accepts any non-empty identity as an approvee. */
  knownIdentities?: string[];
  /** Committed events kept for `GET /api/events`; older ones are dropped. */
  eventLogCapacity: number;
  logLevel: LogLevel;
}

function parsePort(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') return DEFAULT_PORT;
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError(`PORT must be an integer between 0 and 65535, got ${JSON.stringify(raw)}`);
  }
  return port;
}

function parseCapacity(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') return DEFAULT_EVENT_LOG_CAPACITY;
  const capacity = Number(raw);
  if (!Number.isSafeInteger(capacity) || capacity < 1) {
    throw new InvalidArgumentError(`EVENT_LOG_CAPACITY must be a positive integer, got ${JSON.stringify(raw)}`);
  }
  return capacity;
}

function parseList(raw: string | undefined): string[] | undefined {
  if (raw === undefined) return undefined;
  const items = raw.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
  return items.length > 0 ? items : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): NodeConfig {
  const dataDir = env.DATA_DIR?.trim();
  return {
    issuerMspId: env.ISSUER_MSP_ID?.trim() || DEFAULT_ISSUER_MSP_ID,
    port: parsePort(env.PORT),
    dataDir: dataDir ? dataDir : undefined,
    knownIdentities: parseList(env.KNOWN_IDENTITIES),
    eventLogCapacity: parseCapacity(env.EVENT_LOG_CAPACITY),
    logLevel: parseLogLevel(env.NFT_LOG_LEVEL),
  };
}
