import "dotenv/config";
import express from "express";
import { createServer } from "http";
import { loadServerConfig } from "./config";
import { logger } from "./logger";
import { PatientCollection } from "./sgrt";
import { createSgrtRouter } from "./sgrt-api";

async function startServer() {
  const config = loadServerConfig();

  logger.info(`Loading patient database from ${config.dataRoots.join(', ')}`, 'server');
  const collection = await PatientCollection.loadAsync(config.dataRoots, { config: config.sgrt, logger });

  const app = express();
  const server = createServer(app);

  app.use(express.json());
  app.use('/api', createSgrtRouter(collection));

  server.listen(config.port, "0.0.0.0", () => {
    logger.info(`SGRT data service running on port ${config.port}`, 'server');
  });

  const shutdown = () => {
    logger.info('Shutting down', 'server');
    server.close(() => process.exit(0));
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

startServer().catch((error: unknown) => {
  logger.error(error, 'server');
  process.exit(1);
});
