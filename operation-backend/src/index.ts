import 'dotenv/config';
import { buildApp } from './app.js';
import { loadBackendConfig } from './config/index.js';
import { DatabaseClient } from './database/client.js';

const config = loadBackendConfig();
const db = new DatabaseClient(config.database);
const fastify = buildApp(db, { logLevel: config.logLevel });

const start = async () => {
  try {
    await db.query('SELECT 1');
    fastify.log.info('database connection established');

    await fastify.listen({
      port: config.server.port,
      host: config.server.host,
    });
  } catch (err) {
    fastify.log.error(err);
    await db.close();
    process.exit(1);
  }
};

process.on('SIGINT', () => {
  Promise.all([fastify.close(), db.close()]).then(
    () => process.exit(0),
    () => process.exit(1)
  );
});

void start();
