// Main entry point for the marketing assistant

import 'dotenv/config';
import { loadConfig } from './config.js';
import { startServer } from './server/index.js';
import { describeError } from './shared/errors.js';
import { setLogLevel } from './shared/logger.js';

async function main() {
  const config = loadConfig();
  setLogLevel(config.logging.level);
  await startServer(config);
}

main().catch((error: unknown) => {
  console.error('[Main] Fatal error:', describeError(error));
  process.exit(1);
});
