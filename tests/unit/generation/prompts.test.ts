import { describe, it, expect } from 'vitest';
import {
  buildGenerationPrompt,
  buildSystemPrompt,
  buildUserPrompt,
  renderTemplate,
  validateTopic,
  type PromptPersona,
} from '../../../src/services/generation/prompts.js';
import { InvalidTopicError } from '../../../src/utils/errors.js';

const technical: PromptPersona = { slug: 'technical-writer', personaType: 'technical', systemPrompt: '' };

describe('validateTopic', () => {
  it('trims and accepts topics of five characters or more', () => {
    expect(validateTopic('  Solar  ')).toBe('Solar');
  });

  it('rejects topics shorter than five characters after trimming', () => {
    expect(() => validateTopic('  abc  ')).toThrow(InvalidTopicError);
  });

  it('rejects topics longer than 500 characters', () => {
    expect(() => validateTopic('x'.repeat(501))).toThrow('Topic must be at most 500 characters');
  });
});

describe('renderTemplate', () => {
  it('fills known placeholders and keeps unknown ones', () => {
    expect(renderTemplate('{{ a }} and {{b}}', { a: 'one' })).toBe('one and {{b}}');
  });
});

describe('buildSystemPrompt', () => {
  it('renders the persona template with its style guidance', () => {
    const prompt = buildSystemPrompt(technical);

    expect(prompt).toContain('Style guidance: Use code blocks for technical examples. Define technical terms on first use.');
    expect(prompt).not.toContain('{{');
  });

  it('appends operator instructions', () => {
    const prompt = buildSystemPrompt({ ...technical, systemPrompt: 'Keep it practical.' });
    expect(prompt.endsWith('\n\nAdditional Instructions:\nKeep it practical.')).toBe(true);
  });
});

describe('buildUserPrompt', () => {
  it('asks for 800-1200 words at normal speed', () => {
    const prompt = buildUserPrompt('The future of renewable energy', technical);
    const lines = prompt.split('\n');

    expect(lines[0]).toBe('Write a comprehensive blog post about: The future of renewable energy');
    expect(lines).toContain('- Length: 800-1200 words');
    expect(lines).not.toContain('- Optimize for speed: keep the response concise and focused.');
    expect(lines[lines.length - 1]).toBe(
      'After the main content, include a "## Sources" section listing every reference as a markdown link.',
    );
  });

  it('asks for a short piece at fast speed', () => {
    const lines = buildUserPrompt('Solar basics', technical, {}, 'fast').split('\n');

    expect(lines).toContain('- Length: 180-260 words');
    expect(lines).toContain('- Optimize for speed: keep the response concise and focused.');
  });

  it('lists non-empty additional context', () => {
    const prompt = buildUserPrompt('Solar basics', technical, { audience: 'homeowners', tone: '  ' });

    expect(prompt).toContain('Additional context to consider:\n- audience: homeowners\n');
    expect(prompt).not.toContain('- tone:');
  });
});

describe('buildGenerationPrompt', () => {
  it('uses the trimmed topic', () => {
    const { userPrompt } = buildGenerationPrompt({ topic: '  Solar basics  ', persona: technical });
    expect(userPrompt.startsWith('Write a comprehensive blog post about: Solar basics\n')).toBe(true);
  });

  it('throws InvalidTopicError before building anything', () => {
    expect(() => buildGenerationPrompt({ topic: 'abc', persona: technical })).toThrow(InvalidTopicError);
  });
});
