import { createApp } from './app';
import { getConfig } from './config';
import { loadSchemaDirectory } from './ingest/document';
import { createFerry } from './lib';
import { logger } from './logger';

const config = getConfig();
const ferry = createFerry({ config });

const start = async () => {
  if (config.schemaDir) {
    const versions = await loadSchemaDirectory(ferry.registry, config.schemaDir);
    logger.info({ dir: config.schemaDir, versions: versions.map(v => v.version) }, 'schema documents loaded');
  }
  const app = createApp({ registry: ferry.registry, mapper: ferry.mapper, archives: ferry.archives });
  app.listen(config.port, () => {
    logger.info({ port: config.port }, 'API listening');
  });
};

start().catch(err => {
  logger.fatal({ err }, 'API failed to start');
  process.exit(1);
});
