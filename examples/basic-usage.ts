/**
 * Basic Usage Example
 *
 * Loads the configuration (file + MEDIASYNC_* environment), starts the sync
 * engine, prints session changes for a minute and browses one library folder.
 */

import { ConfigManager, createLogger, createSyncEngine } from '../src/index.js';
import dotenv from 'dotenv';

dotenv.config();

async function main(): Promise<void> {
  // 1. Load and validate config
  const config = new ConfigManager().loadValidated();
  const logger = createLogger('example', { level: config.logging.level, pretty: true });

  // 2. Build the engine (REST client, push connection, cache, coordinator)
  const engine = createSyncEngine(config, { logger });

  // 3. Subscribe before starting so the initial poll is observed
  engine.coordinator.subscribe('added', (event) => {
    console.log(`+ ${event.session.displayName} (${event.deviceKey})`);
  });
  engine.coordinator.subscribe('playbackChanged', (event) => {
    console.log(`${event.session.displayName}: ${event.transition} via ${event.source}`);
  });
  engine.coordinator.subscribe('removed', (event) => {
    console.log(`- ${event.deviceKey} (${event.reason})`);
  });

  await engine.start();
  console.log(`Tracking ${engine.coordinator.currentState().size} sessions`);

  // 4. Browse a folder through the cache
  const folderId = process.env.MEDIASYNC_EXAMPLE_FOLDER;
  if (folderId) {
    const page = await engine.library.getLibraryItems(folderId);
    console.log(`Folder ${folderId}: ${page.totalCount} items`);
  }

  await new Promise((resolve) => setTimeout(resolve, 60_000));
  await engine.stop();
}

main().catch(console.error);
