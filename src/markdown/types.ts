/**
 * Types shared by the Markdown parsing, serialization and command layers
 */

import type MarkdownIt from 'markdown-it';
import { type LinkReference } from '../types.js';

/** A markdown-it token, block or inline */
export type Token = ReturnType<MarkdownIt['parse']>[number];

export type MarkdownParser = MarkdownIt;

/** Reference definition as registered by markdown-it */
export interface ReferenceDefinition {
  href: string;
  title: string;
}

/** Environment object markdown-it fills while parsing */
export interface MarkdownEnv {
  references?: Record<string, ReferenceDefinition>;
}

export const BLOCK_KINDS = [
  'heading',
  'paragraph',
  'blockquote',
  'bullet_list',
  'ordered_list',
  'list_item',
  'table',
  'thead',
  'tbody',
  'tr',
  'th',
  'td',
  'fence',
  'code_block',
  'html_block',
  'hr',
] as const;
export type BlockKind = (typeof BLOCK_KINDS)[number];

/** Block-level node folded from markdown-it's flat token stream */
export interface BlockNode {
  kind: BlockKind;
  /** Opening token, or the only token for leaf blocks like fences */
  token: Token;
  children: BlockNode[];
  /** Inline content of headings, paragraphs and table cells */
  inline?: Token;
  /** 1-indexed source line */
  line: number;
}

export interface ParsedDocument {
  blocks: BlockNode[];
  references: LinkReference[];
  env: MarkdownEnv;
}
