import { eq } from 'drizzle-orm';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { personas, type InsertPersona } from './schema.js';
import type * as schema from './schema.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('db:seed');

type SeedDatabase = BetterSQLite3Database<typeof schema>;

export type PersonaSeed = Omit<InsertPersona, 'id' | 'createdAt' | 'updatedAt'> & { slug: string };

export const DEFAULT_PERSONAS: PersonaSeed[] = [
  {
    name: 'Technical Writer',
    slug: 'technical',
    personaType: 'technical',
    description: 'Precise, jargon-appropriate, citation-heavy writing',
    systemPrompt: '',
    temperature: 0.7,
    maxTokens: 4000,
    topP: 0.9,
    displayOrder: 1,
  },
  {
    name: 'Storyteller',
    slug: 'narrative',
    personaType: 'narrative',
    description: 'Narrative-driven, emotional hooks, memorable content',
    systemPrompt: '',
    temperature: 0.8,
    maxTokens: 4000,
    topP: 0.9,
    displayOrder: 2,
  },
  {
    name: 'Industry Analyst',
    slug: 'analyst',
    personaType: 'analyst',
    description: 'Data-focused, trend-aware, forward-looking insights',
    systemPrompt: '',
    temperature: 0.6,
    maxTokens: 4000,
    topP: 0.9,
    displayOrder: 3,
  },
  {
    name: 'Educator',
    slug: 'educator',
    personaType: 'educator',
    description: 'Explanatory, structured, beginner-friendly approach',
    systemPrompt: '',
    temperature: 0.7,
    maxTokens: 4000,
    topP: 0.9,
    displayOrder: 4,
  },
];

export interface SeedResult {
  created: number;
  updated: number;
}

/**
 * Inserts any default persona whose slug is missing. With `update: true`,
 * existing rows are overwritten with the defaults as well.
 */
export async function seedPersonas(
  db: SeedDatabase,
  options: { update?: boolean } = {},
): Promise<SeedResult> {
  const result: SeedResult = { created: 0, updated: 0 };

  for (const seed of DEFAULT_PERSONAS) {
    const existing = await db.query.personas.findFirst({
      where: eq(personas.slug, seed.slug),
    });

    if (!existing) {
      db.insert(personas).values(seed).run();
      result.created++;
      logger.info('Seeded persona', { slug: seed.slug, name: seed.name });
    } else if (options.update) {
      db.update(personas)
        .set({ ...seed, updatedAt: new Date().toISOString() })
        .where(eq(personas.id, existing.id))
        .run();
      result.updated++;
      logger.info('Updated persona', { slug: seed.slug, name: seed.name });
    }
  }

  return result;
}
