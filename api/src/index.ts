import 'dotenv/config';
import { buildApp } from './app';
import { loadConfig } from './config';
import { FileMediaStorage } from './media/storage';
import { createPgStores, createPool } from './stores/pg';

const config = loadConfig();
const pool = createPool(config.databaseUrl, config.dbPoolMax);

const fastify = buildApp({
  config,
  stores: createPgStores(pool),
  media: new FileMediaStorage(config.mediaRoot, config.mediaUrl),
});

// Start server
const start = async () => {
  try {
    await fastify.listen({ port: config.port, host: '0.0.0.0' });
    fastify.log.info(`Foodgram API listening on port ${config.port}`);
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

// Graceful shutdown
const shutdown = async () => {
  await fastify.close();
  await pool.end();
};

process.on('SIGTERM', () => {
  shutdown().catch((err) => fastify.log.error(err));
});
process.on('SIGINT', () => {
  shutdown().catch((err) => fastify.log.error(err));
});

void start();
