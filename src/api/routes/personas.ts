import { Hono } from 'hono';
import { getActivePersona, listActivePersonas } from '../../services/personas.js';
import { serializePersona } from '../serializers.js';
import type { AppEnv } from '../types.js';

const app = new Hono<AppEnv>();

app.get('/personas', async (c) => {
  const personas = await listActivePersonas();
  return c.json(personas.map(serializePersona));
});

app.get('/personas/:slug', async (c) => {
  const persona = await getActivePersona(c.req.param('slug'));
  return c.json(serializePersona(persona));
});

export default app;
