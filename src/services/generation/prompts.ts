// Prompt Builder: persona template + topic -> (systemPrompt, userPrompt)
// Persona base prompts live in /templates/personas/<type>.md

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { createLogger } from '../../utils/logger.js';
import { InvalidTopicError } from '../../utils/errors.js';
import type { GenerationSpeed, PersonaType } from '../../types/index.js';

const logger = createLogger('generation:prompts');

const TEMPLATE_DIR = join(process.cwd(), 'templates', 'personas');

export const MIN_TOPIC_LENGTH = 5;
export const MAX_TOPIC_LENGTH = 500;

export const WORD_BOUNDS: Record<GenerationSpeed, { min: number; max: number }> = {
  fast: { min: 180, max: 260 },
  normal: { min: 800, max: 1200 },
};

const STYLE_GUIDANCE: Record<PersonaType, string> = {
  technical: 'Use code blocks for technical examples. Define technical terms on first use.',
  narrative: 'Use storytelling elements. Include personal anecdotes or hypothetical scenarios.',
  analyst: 'Include data points. Reference industry reports. Provide numerical comparisons.',
  educator: "Explain terms simply. Use 'imagine' scenarios. Include learning checks.",
  creative: 'Write in a clear, engaging style. Let the voice carry the piece.',
};

const FALLBACK_TEMPLATE = `You are a skilled blog writer.

Write well-structured, accurate articles and cite sources as [Source Name](url).

Style guidance: {{style_guidance}}`;

/** The persona fields prompt building reads. */
export interface PromptPersona {
  slug: string;
  personaType: PersonaType;
  systemPrompt: string;
}

export interface BuildPromptInput {
  topic: string;
  persona: PromptPersona;
  additionalContext?: Record<string, string>;
  speed?: GenerationSpeed;
}

export interface BuiltPrompt {
  systemPrompt: string;
  userPrompt: string;
}

const templateCache = new Map<PersonaType, string>();

function loadPersonaTemplate(type: PersonaType): string {
  const cached = templateCache.get(type);
  if (cached !== undefined) return cached;

  let template: string;
  try {
    template = readFileSync(join(TEMPLATE_DIR, `${type}.md`), 'utf-8').trim();
  } catch (error) {
    logger.warn(`Persona template not found for ${type}, using inline template`, {
      error: error instanceof Error ? error.message : String(error),
    });
    template = FALLBACK_TEMPLATE;
  }
  templateCache.set(type, template);
  return template;
}

export function styleGuidanceFor(type: PersonaType): string {
  return STYLE_GUIDANCE[type];
}

/** Replaces `{{name}}` placeholders; unknown names are left as-is. */
export function renderTemplate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{\{\s*(\w+)\s*\}\}/g, (match, name: string) => vars[name] ?? match);
}

export function validateTopic(topic: string): string {
  const trimmed = topic.trim();
  if (trimmed.length < MIN_TOPIC_LENGTH) {
    throw new InvalidTopicError(`Topic must be at least ${MIN_TOPIC_LENGTH} characters`, {
      minLength: MIN_TOPIC_LENGTH,
      length: trimmed.length,
    });
  }
  if (trimmed.length > MAX_TOPIC_LENGTH) {
    throw new InvalidTopicError(`Topic must be at most ${MAX_TOPIC_LENGTH} characters`, {
      maxLength: MAX_TOPIC_LENGTH,
      length: trimmed.length,
    });
  }
  return trimmed;
}

export function buildSystemPrompt(persona: PromptPersona): string {
  const base = renderTemplate(loadPersonaTemplate(persona.personaType), {
    style_guidance: styleGuidanceFor(persona.personaType),
  });

  const custom = persona.systemPrompt.trim();
  return custom ? `${base}\n\nAdditional Instructions:\n${custom}` : base;
}

export function buildUserPrompt(
  topic: string,
  persona: PromptPersona,
  additionalContext: Record<string, string> = {},
  speed: GenerationSpeed = 'normal',
): string {
  const { min, max } = WORD_BOUNDS[speed];
  const lines: string[] = [`Write a comprehensive blog post about: ${topic}`, ''];

  const contextEntries = Object.entries(additionalContext).filter(([, value]) => value.trim() !== '');
  if (contextEntries.length > 0) {
    lines.push('Additional context to consider:');
    for (const [key, value] of contextEntries) {
      lines.push(`- ${key}: ${value}`);
    }
    lines.push('');
  }

  lines.push(
    'Requirements:',
    `- Length: ${min}-${max} words`,
    '- Start with a compelling, descriptive headline as a level-1 heading (# Headline)',
    '- Use markdown formatting (## for subheadings, ** for emphasis)',
    '- End with a summary paragraph of key takeaways',
    '- Format every referenced source as [Source Name](url)',
    `- ${styleGuidanceFor(persona.personaType)}`,
  );
  if (speed === 'fast') {
    lines.push('- Optimize for speed: keep the response concise and focused.');
  }

  lines.push(
    '',
    'After the main content, include a "## Sources" section listing every reference as a markdown link.',
  );

  return lines.join('\n');
}

/**
 * Builds both prompts. Throws `InvalidTopicError` for topics shorter than
 * five characters after trimming. Persona resolution (and `PersonaNotFound`)
 * happens in the persona store before this is called.
 */
export function buildGenerationPrompt(input: BuildPromptInput): BuiltPrompt {
  const topic = validateTopic(input.topic);
  const speed = input.speed ?? 'normal';

  return {
    systemPrompt: buildSystemPrompt(input.persona),
    userPrompt: buildUserPrompt(topic, input.persona, input.additionalContext, speed),
  };
}
