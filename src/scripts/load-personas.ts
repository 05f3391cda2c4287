// Upserts the default personas: npm run personas:load

import 'dotenv/config';
import { closeDatabase, initializeDatabase } from '../db/index.js';
import { seedPersonas } from '../db/seed.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('scripts:load-personas');

async function main() {
  const db = await initializeDatabase();
  const { created, updated } = await seedPersonas(db, { update: true });
  logger.info('Personas loaded', { created, updated });
  closeDatabase();
}

main().catch((error: unknown) => {
  logger.error('Failed to load personas', { error });
  closeDatabase();
  process.exit(1);
});
