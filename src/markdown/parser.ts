// src/markdown/parser.ts - markdown-it configuration shared by every conversion

import MarkdownIt from 'markdown-it';
import { DEFAULT_EXTENSIONS, type MarkdownExtension, type ParserOptions } from '../types.js';
import { buildBlockTree } from './BlockTree.js';
import { parseLinkReferences } from './linkReferences.js';
import { type MarkdownEnv, type MarkdownParser, type ParsedDocument, type Token } from './types.js';

const identity = (url: string): string => url;

/**
 * Create the parser used for extraction, injection and HTML rendering.
 *
 * - raw HTML is on so `<!-- mdpo-* -->` comments become HTML tokens
 * - `text_join` is off so escapes and entities keep their source form
 *   (`text_special` tokens carry it in `markup`)
 * - link destinations are kept exactly as written
 */
export function createMarkdownParser(options: ParserOptions = {}): MarkdownParser {
  const extensions = new Set<MarkdownExtension>(options.extensions ?? DEFAULT_EXTENSIONS);

  const md = new MarkdownIt({
    html: true,
    linkify: extensions.has('linkify'),
  });

  md.core.ruler.disable('text_join');
  md.normalizeLink = identity;
  md.normalizeLinkText = identity;

  if (!extensions.has('tables')) md.disable('table');
  if (!extensions.has('strikethrough')) md.disable('strikethrough');

  return md;
}

export function parseMarkdown(md: MarkdownParser, content: string): ParsedDocument {
  const env: MarkdownEnv = {};
  const tokens = md.parse(content, env);

  return {
    blocks: buildBlockTree(tokens),
    references: parseLinkReferences(content, env),
    env,
  };
}

/** Parse a single line of inline Markdown, as found in a msgstr */
export function parseInline(md: MarkdownParser, text: string, env: MarkdownEnv): Token[] {
  const [inline] = md.parseInline(text, env);
  return inline?.children ?? [];
}
