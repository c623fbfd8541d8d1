import { readFileSync } from 'fs';
import { z } from 'zod';

const ExtensionListSchema = z.array(z.string().regex(/^[a-z0-9]+$/));

let cachedExtensions: string[] | null = null;

/**
 * File extensions recognised in issue text, read once from
 * `data/code-extensions.json`.
 */
export function codeExtensions(): string[] {
  if (!cachedExtensions) {
    const raw: unknown = JSON.parse(readFileSync(new URL('../../data/code-extensions.json', import.meta.url), 'utf-8'));
    cachedExtensions = ExtensionListSchema.parse(raw);
  }
  return cachedExtensions;
}

/**
 * Paths like `src/app.ts` mentioned in free text. Unique, sorted.
 */
export function extractFileReferences(text: string, extensions: string[] = codeExtensions()): string[] {
  const found = new Set<string>();
  for (const ext of extensions) {
    const pattern = new RegExp(`[A-Za-z0-9_/.-]+\\.${ext}\\b`, 'g');
    for (const match of text.matchAll(pattern)) {
      found.add(match[0]);
    }
  }
  return [...found].sort();
}

const CODE_ELEMENT_PATTERN = /(?:function |def |class |method |endpoint |route |api |component )([A-Za-z0-9_]+)/g;

/**
 * Identifiers introduced by words like "function" or "class", used as search
 * hints when an issue names no files.
 */
export function extractCodeElements(text: string, limit = 5): string[] {
  const found = new Set<string>();
  for (const match of text.matchAll(CODE_ELEMENT_PATTERN)) {
    const name = match[1];
    if (name) found.add(name);
  }
  return [...found].sort().slice(0, limit);
}

/** `#123` references, unique and ascending. */
export function extractIssueReferences(text: string): number[] {
  const found = new Set<number>();
  for (const match of text.matchAll(/#([0-9]+)/g)) {
    const value = Number(match[1]);
    if (value > 0) found.add(value);
  }
  return [...found].sort((a, b) => a - b);
}
