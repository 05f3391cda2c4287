// Persona Store: read-only lookups over the seeded personas table.

import { and, asc, eq } from 'drizzle-orm';
import { getDatabase } from '../db/index.js';
import { personas, type Persona } from '../db/schema.js';
import { PersonaNotFoundError } from '../utils/errors.js';

export async function listActivePersonas(): Promise<Persona[]> {
  return getDatabase().query.personas.findMany({
    where: eq(personas.isActive, true),
    orderBy: [asc(personas.displayOrder), asc(personas.name)],
  });
}

/** Active persona by slug, or `PersonaNotFoundError`. */
export async function getActivePersona(slug: string): Promise<Persona> {
  const persona = await getDatabase().query.personas.findFirst({
    where: and(eq(personas.slug, slug), eq(personas.isActive, true)),
  });
  if (!persona) {
    throw new PersonaNotFoundError(slug);
  }
  return persona;
}

