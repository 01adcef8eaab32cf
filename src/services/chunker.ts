import { decode, encode } from "gpt-tokenizer";

export interface ChunkResult {
  sectionTitle: string;
  content: string;
  tokenCount: number;
  chunkIndex: number;
}

export interface ChunkOptions {
  // Upper bound on tokens per chunk
  maxTokens: number;
  // A heading only opens a new chunk once the current one has this many tokens
  minTokens: number;
}

export const DEFAULT_CHUNK_OPTIONS: ChunkOptions = {
  maxTokens: 500,
  minTokens: 50,
};

/**
 * Count tokens in a string using GPT tokenizer
 */
export function countTokens(text: string): number {
  return encode(text).length;
}

interface Section {
  title: string;
  // Heading line included
  content: string;
  headed: boolean;
}

// One piece small enough to embed, with the separator that precedes it
interface Unit {
  title: string;
  text: string;
  separator: string;
  opensSection: boolean;
}

/**
 * Split markdown into sections at headings; each heading stays with its body
 */
function splitByHeaders(markdown: string): Section[] {
  const headerRegex = /^#{1,6}\s+(.+)$/gm;
  const matches: Array<{ index: number; title: string }> = [];
  let match: RegExpExecArray | null;
  while ((match = headerRegex.exec(markdown)) !== null) {
    matches.push({ index: match.index, title: match[1].trim() });
  }

  if (matches.length === 0) {
    return [{ title: "Document", content: markdown.trim(), headed: false }];
  }

  const sections: Section[] = [];
  const intro = markdown.slice(0, matches[0].index).trim();
  if (intro) {
    sections.push({ title: "Introduction", content: intro, headed: false });
  }

  for (let i = 0; i < matches.length; i++) {
    const end = i + 1 < matches.length ? matches[i + 1].index : markdown.length;
    const content = markdown.slice(matches[i].index, end).trim();
    if (content) {
      sections.push({ title: matches[i].title, content, headed: true });
    }
  }

  return sections;
}

function splitByParagraphs(text: string): string[] {
  return text
    .split(/\n\s*\n+/)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

function splitBySentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * Last resort for a single run of text with no whitespace
 */
function splitByTokenWindows(text: string, maxTokens: number): string[] {
  const tokens = encode(text);
  const windows: string[] = [];
  for (let i = 0; i < tokens.length; i += maxTokens) {
    windows.push(decode(tokens.slice(i, i + maxTokens)));
  }
  return windows;
}

/**
 * Pack words greedily up to maxTokens
 */
function splitByWords(text: string, maxTokens: number): string[] {
  const pieces: string[] = [];
  let current = "";

  for (const word of text.split(/\s+/).filter((w) => w.length > 0)) {
    if (countTokens(word) > maxTokens) {
      if (current) pieces.push(current);
      current = "";
      pieces.push(...splitByTokenWindows(word, maxTokens));
      continue;
    }
    const candidate = current ? `${current} ${word}` : word;
    if (current && countTokens(candidate) > maxTokens) {
      pieces.push(current);
      current = word;
    } else {
      current = candidate;
    }
  }

  if (current) pieces.push(current);
  return pieces;
}

/**
 * Break a section into units no larger than maxTokens, coarsest split first
 */
function sectionUnits(section: Section, maxTokens: number): Unit[] {
  const unit = (text: string, separator: string, opensSection: boolean): Unit => ({
    title: section.title,
    text,
    separator,
    opensSection,
  });

  if (countTokens(section.content) <= maxTokens) {
    return [unit(section.content, "\n\n", section.headed)];
  }

  const units: Unit[] = [];
  for (const paragraph of splitByParagraphs(section.content)) {
    const first = units.length === 0;
    if (countTokens(paragraph) <= maxTokens) {
      units.push(unit(paragraph, "\n\n", first && section.headed));
      continue;
    }

    splitBySentences(paragraph).forEach((sentence, i) => {
      const pieces =
        countTokens(sentence) <= maxTokens ? [sentence] : splitByWords(sentence, maxTokens);
      pieces.forEach((piece, j) => {
        const opens = first && i === 0 && j === 0 && section.headed;
        units.push(unit(piece, i === 0 && j === 0 ? "\n\n" : " ", opens));
      });
    });
  }

  return units;
}

/**
 * Chunk a markdown document into pieces for embedding
 *
 * Sections are split at headings, then oversized sections by paragraphs,
 * sentences, words and finally raw token windows. The resulting units are
 * packed greedily up to `maxTokens`. Chunks never overlap, so joining them
 * reproduces the document apart from whitespace.
 */
export function chunkDocument(
  markdown: string,
  options: Partial<ChunkOptions> = {}
): ChunkResult[] {
  const { maxTokens, minTokens } = { ...DEFAULT_CHUNK_OPTIONS, ...options };
  if (maxTokens < 1) {
    throw new RangeError(`maxTokens must be at least 1, got ${maxTokens}`);
  }
  if (!markdown || markdown.trim().length === 0) {
    return [];
  }

  const units = splitByHeaders(markdown).flatMap((section) => sectionUnits(section, maxTokens));

  const chunks: ChunkResult[] = [];
  let current: { title: string; content: string; tokens: number } | null = null;

  const flush = () => {
    if (current) {
      chunks.push({
        sectionTitle: current.title,
        content: current.content,
        tokenCount: current.tokens,
        chunkIndex: chunks.length,
      });
      current = null;
    }
  };

  for (const unit of units) {
    if (current !== null) {
      const startsFresh: boolean = unit.opensSection && current.tokens >= minTokens;
      const merged: string = `${current.content}${unit.separator}${unit.text}`;
      const mergedTokens: number = startsFresh ? Infinity : countTokens(merged);
      if (mergedTokens <= maxTokens) {
        current = { title: current.title, content: merged, tokens: mergedTokens };
        continue;
      }
      flush();
    }
    current = { title: unit.title, content: unit.text, tokens: countTokens(unit.text) };
  }
  flush();

  return chunks;
}
