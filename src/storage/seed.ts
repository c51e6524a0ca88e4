/**
 * Database Seed Runner
 *
 * Loads the demo corpus in seeds/corpus.json into the content table.
 * Chunks whose id already exists are skipped, so running the script twice
 * leaves the table unchanged.
 *
 * Usage:
 *   npm run db:seed
 *   DATABASE_URL=/path/to/db npm run db:seed
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { getDatabaseURL } from '../config';
import { openDatabase } from './db';
import { ContentChunkRepository } from './repositories';

const CORPUS_PATH = fileURLToPath(new URL('./seeds/corpus.json', import.meta.url));

const corpusSchema = z.array(
  z.object({
    chunkId: z.string().min(1),
    topic: z.string().min(1),
    text: z.string().min(1),
  })
);

/**
 * Reads and validates the seed corpus.
 */
function loadCorpus() {
  return corpusSchema.parse(JSON.parse(readFileSync(CORPUS_PATH, 'utf8')));
}

async function main() {
  const dbPath = getDatabaseURL();
  console.log(`Seeding database at ${dbPath}...`);

  const { db, sqlite } = openDatabase(dbPath);
  const repo = new ContentChunkRepository(db);

  const corpus = loadCorpus();
  const inserted = await repo.createMany(corpus);

  console.log('');
  console.log('Seeding complete!');
  console.log(`  Chunks inserted: ${inserted}`);
  console.log(`  Chunks skipped: ${corpus.length - inserted}`);

  for (const { topic, chunkCount } of await repo.findTopics()) {
    console.log(`    ${topic}: ${chunkCount} chunk(s)`);
  }

  sqlite.close();
}

// Execute the seeder
main().catch((error) => {
  console.error('Seeding failed:', error);
  process.exit(1);
});
