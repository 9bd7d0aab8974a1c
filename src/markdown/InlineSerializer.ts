/**
 * InlineSerializer - Converts markdown-it inline tokens back to Markdown
 *
 * Produces the single-line text stored as a msgid and, from the same tokens,
 * the wrapped lines written by po2md. Breaks only happen at spaces in
 * running text, never inside code spans, autolinks or link destinations.
 */

import { DEFAULT_MARKUP, type MarkupStrings } from '../types.js';
import { escapeLinkTitle } from './linkReferences.js';
import { type Token } from './types.js';

export interface InlineSerializerOptions {
  markup?: Partial<MarkupStrings>;
  /** Drop inline markup and keep only the text */
  plaintext?: boolean;
}

/**
 * Words that would open a new block when placed at the start of a line:
 * list markers, headings, setext underlines, rules and fences, and any word
 * starting a block quote or an HTML block.
 */
const BLOCK_MARKER_RE =
  /^(?:[-+*]|#{1,6}|\d{1,9}[.)]|=+|-{2,}|\*{3,}|_{3,}|`{3,}.*|~{3,}.*|>.*|<[A-Za-z/!?].*)$/;

/** Backslashes markdown-it would read as escapes */
const ESCAPABLE_BACKSLASH_RE = /\\(?=[!-/:-@[-`{-~])/g;

/**
 * Link destination as written between parentheses. markdown-it hands out
 * unescaped destinations, so ones holding spaces, parentheses or angle
 * brackets go between `<` and `>`.
 */
export function linkDestination(href: string): string {
  const escaped = href.replace(ESCAPABLE_BACKSLASH_RE, '\\\\');
  if (!/[\s()<>]/.test(escaped)) return escaped;
  return `<${escaped.replace(/[<>]/g, '\\$&')}>`;
}

/** Unescaped pipes end a table cell */
export function escapeTableCell(text: string): string {
  return text.replace(/(?<!\\)\|/g, '\\|');
}

/**
 * Shortest backtick run that does not occur, with exactly that length, in
 * the code span content.
 */
export function backtickFenceLength(content: string): number {
  const runs = new Set((content.match(/`+/g) ?? []).map((run) => run.length));
  let length = 1;
  while (runs.has(length)) length++;
  return length;
}

/**
 * Greedy wrap. A word never moves to a new line on its own if that would
 * turn the line into a block marker.
 */
export function wrapWords(words: readonly string[], width: number): string[] {
  const lines: string[] = [];
  let line = '';

  for (const word of words) {
    if (!line) {
      line = word;
    } else if (line.length + 1 + word.length <= width || BLOCK_MARKER_RE.test(word)) {
      line += ` ${word}`;
    } else {
      lines.push(line);
      line = word;
    }
  }

  if (line) lines.push(line);
  return lines;
}

/** Accumulates words; each inner array is a line ended by a hard break */
class WordCollector {
  private readonly lines: string[][] = [[]];
  private word = '';
  /** Depth of contexts where spaces are literal */
  private literalDepth = 0;

  append(text: string): void {
    this.word += text;
  }

  text(content: string): void {
    if (this.literalDepth > 0) {
      this.word += content;
      return;
    }
    content.split(' ').forEach((part, index) => {
      if (index > 0) this.breakWord();
      this.word += part;
    });
  }

  breakWord(): void {
    if (!this.word) return;
    this.lines[this.lines.length - 1]?.push(this.word);
    this.word = '';
  }

  hardBreak(): void {
    this.breakWord();
    this.lines.push([]);
  }

  enterLiteral(): void {
    this.literalDepth++;
  }

  leaveLiteral(): void {
    this.literalDepth = Math.max(0, this.literalDepth - 1);
  }

  finish(): string[][] {
    this.breakWord();
    return this.lines;
  }
}

export class InlineSerializer {
  private readonly markup: MarkupStrings;
  private readonly plaintext: boolean;

  constructor(options: InlineSerializerOptions = {}) {
    this.markup = { ...DEFAULT_MARKUP, ...options.markup };
    this.plaintext = options.plaintext ?? false;
  }

  /**
   * Single-line form of the inline content, used as msgid.
   * Hard breaks are kept as a backslash followed by a newline.
   */
  toMsgid(children: readonly Token[]): string {
    return this.collect(children)
      .map((words) => words.join(' '))
      .join('\\\n');
  }

  /**
   * Inline content wrapped at `width` columns
   */
  toLines(children: readonly Token[], width = Number.POSITIVE_INFINITY): string[] {
    const segments = this.collect(children);
    const lines: string[] = [];

    segments.forEach((words, index) => {
      const wrapped = wrapWords(words, width);
      if (index < segments.length - 1) {
        const last = wrapped.pop() ?? '';
        wrapped.push(`${last}\\`);
      }
      lines.push(...wrapped);
    });

    return lines;
  }

  private collect(children: readonly Token[]): string[][] {
    const collector = new WordCollector();
    this.walk(children, collector);
    return collector.finish();
  }

  private walk(children: readonly Token[], out: WordCollector): void {
    const openLinks: Token[] = [];
    const { markup, plaintext } = this;

    for (const token of children) {
      switch (token.type) {
        case 'text':
          out.text(token.content);
          break;
        case 'text_special':
          // Escapes and entities: `markup` holds the source form
          out.text(plaintext ? token.content : token.markup);
          break;
        case 'softbreak':
          out.breakWord();
          break;
        case 'hardbreak':
          out.hardBreak();
          break;
        case 'code_inline':
          if (plaintext) out.text(token.content);
          else out.append(this.codeSpan(token.content));
          break;
        case 'em_open':
          if (!plaintext) out.append(markup.italicStart);
          break;
        case 'em_close':
          if (!plaintext) out.append(markup.italicEnd);
          break;
        case 'strong_open':
          if (!plaintext) out.append(markup.boldStart);
          break;
        case 'strong_close':
          if (!plaintext) out.append(markup.boldEnd);
          break;
        case 's_open':
          if (!plaintext) out.append(markup.strikethroughStart);
          break;
        case 's_close':
          if (!plaintext) out.append(markup.strikethroughEnd);
          break;
        case 'link_open':
          openLinks.push(token);
          this.openLink(token, out);
          break;
        case 'link_close': {
          const open = openLinks.pop();
          if (open) this.closeLink(open, out);
          break;
        }
        case 'image':
          this.image(token, out);
          break;
        case 'html_inline':
          if (!plaintext) out.append(token.content.replace(/\r?\n/g, ' '));
          break;
        default:
          out.text(token.content);
      }
    }
  }

  private codeSpan(content: string): string {
    const { codeStart, codeEnd } = this.markup;
    if (codeStart !== '`' || codeEnd !== '`') {
      return `${codeStart}${content}${codeEnd}`;
    }

    const fence = '`'.repeat(backtickFenceLength(content));
    const needsPadding =
      content.startsWith('`') ||
      content.endsWith('`') ||
      (content.startsWith(' ') && content.endsWith(' ') && content.trim() !== '');
    const body = needsPadding ? ` ${content} ` : content;

    return `${fence}${body}${fence}`;
  }

  private openLink(token: Token, out: WordCollector): void {
    if (token.markup === 'linkify') return;
    if (token.markup === 'autolink') {
      if (!this.plaintext) out.append('<');
      out.enterLiteral();
      return;
    }
    if (!this.plaintext) out.append(this.markup.linkStart);
  }

  private closeLink(open: Token, out: WordCollector): void {
    if (open.markup === 'linkify') return;
    if (open.markup === 'autolink') {
      out.leaveLiteral();
      if (!this.plaintext) out.append('>');
      return;
    }
    if (this.plaintext) return;

    out.append(`${this.markup.linkEnd}${this.destination(open.attrGet('href'), open.attrGet('title'))}`);
  }

  private image(token: Token, out: WordCollector): void {
    if (!this.plaintext) out.append(`!${this.markup.linkStart}`);
    this.walk(token.children ?? [], out);
    if (this.plaintext) return;

    out.append(`${this.markup.linkEnd}${this.destination(token.attrGet('src'), token.attrGet('title'))}`);
  }

  private destination(href: string | null, title: string | null): string {
    const written = linkDestination(href ?? '');
    const titlePart = title ? ` "${escapeLinkTitle(title)}"` : '';
    return `(${written}${titlePart})`;
  }
}
