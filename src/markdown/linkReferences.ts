// src/markdown/linkReferences.ts - Link reference definitions ([label]: href "title")

import { type LinkReference } from '../types.js';
import { type MarkdownEnv } from './types.js';

/**
 * Single-line link reference definition. Groups: label, destination and the
 * title in one of its three delimiters.
 */
export const LINK_REFERENCE_RE =
  /^ {0,3}\[([^\]]+)\]:[ \t]*<?([^\s>]+)>?(?:[ \t]+(?:"((?:[^"\\]|\\.)*)"|'((?:[^'\\]|\\.)*)'|\(((?:[^()\\]|\\.)*)\)))?[ \t]*$/;

/**
 * Normalize a reference label the way markdown-it keys `env.references`
 */
export function normalizeReferenceLabel(label: string): string {
  return label.trim().replace(/\s+/g, ' ').toLowerCase().toUpperCase();
}

/** Escape `"` inside a link title written between double quotes */
export function escapeLinkTitle(title: string): string {
  return title.replace(/(?<!\\)"/g, '\\"');
}

function matchLinkReference(line: string, lineNumber: number): LinkReference | null {
  const match = LINK_REFERENCE_RE.exec(line);
  if (!match) return null;

  const [, label, href, doubleQuoted, singleQuoted, parenthesized] = match;
  if (label === undefined || href === undefined) return null;

  const title = doubleQuoted ?? singleQuoted ?? parenthesized;
  return {
    label,
    href,
    ...(title !== undefined && title !== '' ? { title } : {}),
    line: lineNumber,
  };
}

/**
 * Find link reference definitions in Markdown content.
 *
 * When `env` comes from parsing the same content, only labels markdown-it
 * registered are returned (this leaves out look-alikes in code blocks), and
 * only the first definition of a label, which is the one that wins.
 */
export function parseLinkReferences(content: string, env?: MarkdownEnv): LinkReference[] {
  const references: LinkReference[] = [];
  const seen = new Set<string>();

  content.split(/\r?\n/).forEach((line, index) => {
    const reference = matchLinkReference(line, index + 1);
    if (!reference) return;

    const key = normalizeReferenceLabel(reference.label);
    if (seen.has(key)) return;
    if (env && !env.references?.[key]) return;

    seen.add(key);
    references.push(reference);
  });

  return references;
}

/** Message written to the catalog for a definition */
export function linkReferenceToMsgid(reference: LinkReference): string {
  const title = reference.title !== undefined ? ` "${escapeLinkTitle(reference.title)}"` : '';
  return `[${reference.label}]: ${reference.href}${title}`;
}

/**
 * Build a markdown-it reference environment from (translated) definition
 * lines, so `[text][label]` inside a translation resolves to its target.
 * Lines that are not definitions are ignored.
 */
export function referencesEnvFromMessages(
  messages: readonly string[],
  base: MarkdownEnv = {}
): MarkdownEnv {
  const references = { ...(base.references ?? {}) };

  messages.forEach((message, index) => {
    const reference = matchLinkReference(message, index + 1);
    if (!reference) return;
    references[normalizeReferenceLabel(reference.label)] = {
      href: reference.href,
      title: reference.title ?? '',
    };
  });

  return { references };
}
