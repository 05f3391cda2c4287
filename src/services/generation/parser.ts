// Response Parser: raw model markdown -> title, body, citations, structure.
// Pure; no I/O.

import type { Citation, ContentStructure, HeadingEntry } from '../../types/index.js';

export const WORDS_PER_MINUTE = 200;

export interface ParsedContent {
  title: string | null;
  bodyMarkdown: string;
  sources: Citation[];
  structure: ContentStructure;
}

const TITLE_PATTERN = /^#\s+(.+?)\s*#*\s*$/m;
const SOURCES_HEADING_PATTERN = /^#{1,6}[ \t]*(?:sources|references|citations)[ \t]*:?[ \t]*#*[ \t]*$/im;
const NEXT_HEADING_PATTERN = /^#{1,6}\s/m;
const LINK_PATTERN = /\[([^\]]+)\]\(([^)\s]+)(?:\s+"[^"]*")?\)/g;
const HEADING_PATTERN = /^(#{1,3})\s+(.+?)\s*#*\s*$/gm;

/** Host of `url` with a leading `www.` removed; empty for unparseable URLs. */
export function extractDomain(url: string): string {
  try {
    return new URL(url).hostname.replace(/^www\./i, '');
  } catch {
    return '';
  }
}

export function extractTitle(markdown: string): string | null {
  const match = TITLE_PATTERN.exec(markdown);
  return match ? match[1].trim() : null;
}

export function extractCitations(block: string): Citation[] {
  const seen = new Set<string>();
  const citations: Citation[] = [];

  for (const match of block.matchAll(LINK_PATTERN)) {
    const title = match[1].trim();
    const url = match[2].trim();
    if (seen.has(url)) continue;
    seen.add(url);
    citations.push({
      title,
      url,
      domain: extractDomain(url),
      isVerified: false,
      relevanceScore: null,
    });
  }

  return citations;
}

/**
 * Splits off the `Sources` / `References` / `Citations` section. The section
 * runs from its heading to the next heading of any level, or the end.
 */
export function splitSources(markdown: string): { body: string; sourcesBlock: string | null } {
  const heading = SOURCES_HEADING_PATTERN.exec(markdown);
  if (!heading) {
    return { body: markdown, sourcesBlock: null };
  }

  const start = heading.index;
  const afterHeading = start + heading[0].length;
  const rest = markdown.slice(afterHeading);
  const next = NEXT_HEADING_PATTERN.exec(rest);
  const end = next ? afterHeading + next.index : markdown.length;

  const before = markdown.slice(0, start).replace(/\s+$/, '');
  const after = markdown.slice(end);
  const body = after ? `${before}\n\n${after}` : before;

  return { body, sourcesBlock: markdown.slice(afterHeading, end) };
}

export function extractHeadings(markdown: string): HeadingEntry[] {
  return Array.from(markdown.matchAll(HEADING_PATTERN), (match) => ({
    level: match[1].length,
    text: match[2].trim(),
  }));
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

export function readingTimeMinutes(wordCount: number): number {
  return Math.max(1, Math.floor(wordCount / WORDS_PER_MINUTE));
}

export function analyzeStructure(bodyMarkdown: string): ContentStructure {
  const headings = extractHeadings(bodyMarkdown);
  const wordCount = countWords(bodyMarkdown);
  return {
    wordCount,
    headingCount: headings.length,
    readingTimeMinutes: readingTimeMinutes(wordCount),
    headings,
  };
}

export function parseGeneratedContent(raw: string): ParsedContent {
  const { body, sourcesBlock } = splitSources(raw);

  return {
    title: extractTitle(body),
    bodyMarkdown: body,
    sources: sourcesBlock === null ? [] : extractCitations(sourcesBlock),
    structure: analyzeStructure(body),
  };
}
