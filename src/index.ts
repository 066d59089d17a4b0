import * as dotenv from 'dotenv';
import { loadConfig, NodeConfig } from './config';
import { errorMessage } from './errors';
import { ContractHost, EventLog, FileEventLog } from './host';
import { OpenDirectory, StaticDirectory } from './identity';
import { FileWorldState, WorldState } from './ledger';
import { logger } from './logging/structured-logger';
import { ApiServer } from './api/api-server';
import { NftContract } from './token';

export function createHost(config: NodeConfig): ContractHost {
  const directory = config.knownIdentities
    ? new StaticDirectory(config.knownIdentities)
    : new OpenDirectory();
  const contract = new NftContract({ issuerMspId: config.issuerMspId, directory });
  if (config.dataDir) {
    const state = FileWorldState.open(config.dataDir);
    return new ContractHost(contract, state, FileEventLog.open(config.dataDir, config.eventLogCapacity));
  }
  return new ContractHost(contract, new WorldState(), new EventLog(config.eventLogCapacity));
}

async function main(): Promise<void> {
  dotenv.config();
  const config = loadConfig();
  logger.setLevel(config.logLevel);

  logger.info('Main', 'Starting NFT ledger node', {
    issuerMspId: config.issuerMspId,
    port: config.port,
    dataDir: config.dataDir ?? '(memory)',
    knownIdentities: config.knownIdentities?.length ?? 'any',
  });

  const server = new ApiServer(createHost(config), config.port);

  const shutdown = (signal: string) => {
    logger.info('Main', 'Shutting down', { signal });
    server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error('Main', 'Shutdown failed', { error: errorMessage(err) });
        process.exit(1);
      }
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await server.start();
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error('Main', 'Fatal error', { error: errorMessage(error) });
    process.exit(1);
  });
}
