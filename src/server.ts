// src/server.ts
// What: HTTP server entrypoint.
// How: Initializes env and logger, builds the services, opens the document memory (restoring the newest snapshot
//      when persisted state is corrupted), then listens on the configured port.

import config from './config/env.js';
import { createApp } from './app.js';
import logger from './logging.js';
import { createServices } from './services/bootstrap.js';

async function main(): Promise<void> {
  const { manager, sessions } = createServices(config);
  const report = await manager.open();
  if (report.status === 'restored') {
    logger.warn({ snapshot_id: report.snapshot_id, reason: report.reason }, 'Recovered from snapshot on startup');
  }

  const app = createApp({ manager, sessions, uploadMaxBytes: config.UPLOAD_MAX_BYTES });
  const port = config.PORT;
  app.listen(port, () => {
    logger.info({ port, backend: config.INDEX_BACKEND, data_dir: config.DATA_DIR }, 'Server listening');
  });
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Server failed to start');
  process.exit(1);
});
