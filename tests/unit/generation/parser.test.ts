import { describe, it, expect } from 'vitest';
import {
  countWords,
  extractDomain,
  parseGeneratedContent,
  readingTimeMinutes,
  splitSources,
} from '../../../src/services/generation/parser.js';

const ARTICLE = [
  '# Solar Power Today',
  '',
  'Intro paragraph.',
  '',
  '## Why It Matters',
  '',
  'Body text here.',
  '',
  '## Sources',
  '',
  '- [IEA Report](https://www.iea.org/reports/solar)',
  '- [NREL](https://nrel.gov/data)',
  '- [IEA Report again](https://www.iea.org/reports/solar)',
  '',
].join('\n');

describe('parseGeneratedContent', () => {
  it('splits the sources section off the body', () => {
    const parsed = parseGeneratedContent(ARTICLE);

    expect(parsed.title).toBe('Solar Power Today');
    expect(parsed.bodyMarkdown).toBe('# Solar Power Today\n\nIntro paragraph.\n\n## Why It Matters\n\nBody text here.');
    expect(parsed.sources).toEqual([
      { title: 'IEA Report', url: 'https://www.iea.org/reports/solar', domain: 'iea.org', isVerified: false, relevanceScore: null },
      { title: 'NREL', url: 'https://nrel.gov/data', domain: 'nrel.gov', isVerified: false, relevanceScore: null },
    ]);
  });

  it('describes the body structure', () => {
    const { structure } = parseGeneratedContent(ARTICLE);

    expect(structure).toEqual({
      wordCount: 13,
      headingCount: 2,
      readingTimeMinutes: 1,
      headings: [
        { level: 1, text: 'Solar Power Today' },
        { level: 2, text: 'Why It Matters' },
      ],
    });
  });

  it('leaves the body untouched when there is no sources section', () => {
    const raw = '# Plain\n\nJust text with a [link](https://example.com).';
    const parsed = parseGeneratedContent(raw);

    expect(parsed.bodyMarkdown).toBe(raw);
    expect(parsed.sources).toEqual([]);
  });

  it('returns a null title when there is no level-1 heading', () => {
    expect(parseGeneratedContent('## Only a subheading\n\ntext').title).toBeNull();
  });

  it('parses a short answer with a single source', () => {
    const parsed = parseGeneratedContent('Intro text here.\n\n## Sources\n- [OpenAI](https://openai.com/blog)\n');

    expect(parsed).toEqual({
      title: null,
      bodyMarkdown: 'Intro text here.',
      sources: [
        { title: 'OpenAI', url: 'https://openai.com/blog', domain: 'openai.com', isVerified: false, relevanceScore: null },
      ],
      structure: { wordCount: 3, headingCount: 0, readingTimeMinutes: 1, headings: [] },
    });
  });

  it('returns the same result for the same input regardless of earlier calls', () => {
    const first = parseGeneratedContent(ARTICLE);
    parseGeneratedContent('# Other\n\n## References\n[B](https://b.example.com)');
    const second = parseGeneratedContent(ARTICLE);

    expect(second).toEqual(first);
    expect(second).not.toBe(first);
    expect(second.sources).toHaveLength(2);
  });
});

describe('splitSources', () => {
  it('stops the section at the next heading', () => {
    const raw = '# T\n\nText one.\n\n## References\n[A](https://a.example.com/x)\n\n## Afterword\n\nMore.';
    const { body, sourcesBlock } = splitSources(raw);

    expect(body).toBe('# T\n\nText one.\n\n## Afterword\n\nMore.');
    expect(sourcesBlock).toBe('\n[A](https://a.example.com/x)\n\n');
  });

  it('matches the heading case-insensitively with a trailing colon', () => {
    const { sourcesBlock } = splitSources('Body\n\n### citations:\n- [X](https://x.io)');
    expect(sourcesBlock).toBe('\n- [X](https://x.io)');
  });
});

describe('reading time', () => {
  it('is two minutes for 400 words', () => {
    const text = Array.from({ length: 400 }, () => 'word').join(' ');
    expect(countWords(text)).toBe(400);
    expect(readingTimeMinutes(countWords(text))).toBe(2);
  });

  it('never drops below one minute', () => {
    expect(readingTimeMinutes(50)).toBe(1);
    expect(readingTimeMinutes(0)).toBe(1);
  });
});

describe('extractDomain', () => {
  it('strips www', () => {
    expect(extractDomain('https://www.example.com/a?b=c')).toBe('example.com');
  });

  it('returns an empty string for unparseable urls', () => {
    expect(extractDomain('not a url')).toBe('');
  });
});
