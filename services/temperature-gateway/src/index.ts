/**
 * Temperature Gateway Service - Main Entry Point
 * REST façade over a SOAP temperature conversion service
 */

import { createLogger, getErrorMessage } from '../../../shared/utils/index.js';
import { loadServiceConfig, SERVICE_NAME } from './config/index.js';
import { createApp } from './app.js';
import { WSDLTemperatureClient } from './clients/soap.client.js';
import { ConversionGateway } from './services/conversion.service.js';

const bootLogger = createLogger(SERVICE_NAME);

async function main() {
  const config = loadServiceConfig();
  const logger = createLogger(SERVICE_NAME, config.logLevel);

  logger.info('Starting Temperature Gateway', {
    env: config.env,
    port: config.port,
    wsdlUrl: config.soap.wsdlUrl,
  });

  const client = new WSDLTemperatureClient(config.soap, createLogger(`${SERVICE_NAME}:soap-client`, config.logLevel));

  // Warm up; conversions answer 503 until the WSDL can be loaded
  try {
    await client.initialize();
  } catch (error) {
    logger.warn('SOAP client not ready, WSDL will be loaded on first request', {
      error: getErrorMessage(error),
    });
  }

  const gateway = new ConversionGateway(client, {
    batchMaxItems: config.batch.maxItems,
    logger: createLogger(`${SERVICE_NAME}:service`, config.logLevel),
  });

  const app = createApp({
    gateway,
    config,
    logger: createLogger(`${SERVICE_NAME}:error`, config.logLevel),
  });

  const server = app.listen(config.port, () => {
    logger.info(`Temperature Gateway listening on port ${config.port}`);
  });

  const shutdown = () => {
    logger.info('Shutting down...');
    server.close(() => process.exit(0));
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch(error => {
  bootLogger.error('Failed to start service', error);
  process.exit(1);
});
