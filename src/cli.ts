#!/usr/bin/env node
import "dotenv/config";
import { loadConfig } from "./config.js";
import { closeDatabase, initializeDatabase } from "./db/index.js";
import { executeCommand, parseArgs } from "./commands.js";
import { MarketingService } from "./service.js";
import { describeError } from "./shared/errors.js";
import { setLogLevel } from "./shared/logger.js";
import { startServer } from "./server/index.js";

const usage = `Usage:
  npm run dev -- init
  npm run dev -- client-add --name "Name" --handle <chat handle> [--channels facebook,instagram] [--approval manual|auto]
                 [--cadence 3] [--voice "Voice"] [--instructions "Notes"] [--status active|inactive]
                 [--facebook-page <id>] [--instagram-account <id>] [--linkedin-author <urn>]
  npm run dev -- clients
  npm run dev -- curate (--client <id> | --all [--max-clients N]) [--ideas N] [--mode sync|async]
  npm run dev -- draft (--client <id> | --all [--max-clients N]) [--posts N] [--mode sync|async]
  npm run dev -- publish --client <id>
  npm run dev -- workflow (--client <id> | --all [--max-clients N]) [--ideas N] [--posts N] [--mode sync|async]
  npm run dev -- submit --client <id> --text "Idea" [--image <url>] [--channel facebook|instagram|linkedin]
  npm run dev -- chat --handle <chat handle> --text "Message" [--image <url>]
  npm run dev -- pending --client <id> [--limit N]
  npm run dev -- approve --client <id> --id <postId>
  npm run dev -- reject --client <id> --id <postId> [--feedback "Reason"]
  npm run dev -- health
  npm run dev -- serve
`;

const args = process.argv.slice(2);

const run = async (): Promise<void> => {
  if (args.length === 0) {
    console.log(usage);
    return;
  }

  const config = loadConfig();
  setLogLevel(config.logging.level);
  const parsed = parseArgs(args);

  switch (parsed.command) {
    case "init": {
      await initializeDatabase({ path: config.database.path });
      closeDatabase();
      console.log(`Initialized store at ${config.database.path}`);
      return;
    }
    case "serve": {
      await startServer(config);
      return;
    }
    case "help": {
      console.log(usage);
      return;
    }
  }

  const db = await initializeDatabase({ path: config.database.path });
  const service = new MarketingService(config, db);
  try {
    const result = await executeCommand(service, parsed);
    // Async runs keep working until the queue is empty
    await service.shutdown();
    console.log(JSON.stringify(result, null, 2));
  } finally {
    closeDatabase();
  }
};

run().catch((error: unknown) => {
  console.error(describeError(error));
  process.exit(1);
});
