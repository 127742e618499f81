import dotenv from 'dotenv';
import { loadConfig, type Config } from './config/index.js';
import logger from './utils/logger.js';
import { ConfigError } from './utils/errors.js';
import { createApp } from './app.js';
import { CredentialBroker } from './advisory/credential-broker.js';
import { AdvisoryClient } from './advisory/advisory.client.js';
import { SimulatedAdvisor, loadSimulatedResponses } from './advisory/simulated-advisor.js';
import { InMemoryWaterDataStore, loadWaterDataset } from './water/water.store.js';

dotenv.config();

function readConfig(): Config {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error('Refusing to start: configuration is incomplete', { issues: error.issues });
    } else {
      logger.error('Refusing to start', { error: error instanceof Error ? error.message : String(error) });
    }
    process.exit(1);
  }
}

const config = readConfig();

const broker = new CredentialBroker({
  apiKey: config.watsonx.apiKey,
  iamUrl: config.watsonx.iamUrl,
  timeoutMs: config.watsonx.iamTimeoutMs,
  safetyMarginMs: config.watsonx.tokenSafetyMarginMs,
});

const advisor = new AdvisoryClient({
  broker,
  baseUrl: config.watsonx.baseUrl,
  projectId: config.watsonx.projectId,
  modelId: config.watsonx.modelId,
  apiVersion: config.watsonx.apiVersion,
  timeoutMs: config.watsonx.modelTimeoutMs,
});

const app = createApp({
  store: new InMemoryWaterDataStore(loadWaterDataset(config.data.waterDataPath)),
  advisor,
  simulated: new SimulatedAdvisor(loadSimulatedResponses(config.data.simulatedResponsesPath)),
  corsOrigin: config.cors.origin,
  exposeRawUpstream: config.advisory.exposeRawUpstream,
});

const server = app.listen(config.port, () => {
  logger.info(`Water advisory API running on port ${config.port}`, {
    env: config.nodeEnv,
    model: config.watsonx.modelId,
    exposeRawUpstream: config.advisory.exposeRawUpstream,
  });
});

// Graceful shutdown
function shutdown() {
  logger.info('Shutting down...');
  server.close(error => {
    if (error) {
      logger.error('Error while closing server', { error: error.message });
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
