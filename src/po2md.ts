/**
 * Po2Md - Writes a Markdown document back with translations applied
 *
 * The document is walked exactly like Md2Po walks it, so each message has
 * the msgid extraction gave it. Translations are parsed as inline Markdown
 * and the whole document is re-serialized: ATX headings, wrapped
 * paragraphs, normalized emphasis, and lists, quotes, tables and code
 * blocks keeping their markers.
 */

import {
  buildCommandLookup,
  CommandState,
  parseCommandComment,
  type CommandLookup,
  type MessageDirective,
} from './markdown/commands.js';
import { isTightList } from './markdown/BlockTree.js';
import { InlineSerializer, escapeTableCell } from './markdown/InlineSerializer.js';
import { linkReferenceToMsgid, referencesEnvFromMessages } from './markdown/linkReferences.js';
import { createMarkdownParser, parseInline, parseMarkdown } from './markdown/parser.js';
import { type BlockNode, type MarkdownEnv, type MarkdownParser } from './markdown/types.js';
import { buildTranslationMap, loadCatalogs, messageKey, type Catalog, type TranslationMap } from './po/catalog.js';
import { resolveMarkdownSource, writeTextFile } from './sources.js';
import { DEFAULT_WRAPWIDTH, type Po2MdOptions } from './types.js';

export interface Po2MdResult {
  markdown: string;
  /** Enabled messages that had a translation */
  translated: number;
  /** Enabled messages left in the source language */
  untranslated: number;
}

const TABLE_ALIGNMENTS: Record<string, string> = {
  'text-align:left': ':---',
  'text-align:center': ':---:',
  'text-align:right': '---:',
};

export class Po2Md {
  private readonly md: MarkdownParser;
  private readonly serializer: InlineSerializer;
  private readonly commands: CommandLookup;
  private readonly wrapwidth: number;

  private state = new CommandState();
  private env: MarkdownEnv = {};
  private translated = 0;
  private untranslated = 0;

  constructor(
    private readonly translations: TranslationMap,
    private readonly options: Po2MdOptions = {}
  ) {
    this.md = createMarkdownParser(options);
    this.serializer = new InlineSerializer({ markup: options.markup });
    this.commands = buildCommandLookup(options.commandAliases);
    this.wrapwidth = options.wrapwidth ?? DEFAULT_WRAPWIDTH;
  }

  static fromCatalogs(catalogs: readonly Catalog[], options: Po2MdOptions = {}): Po2Md {
    return new Po2Md(buildTranslationMap(catalogs), options);
  }

  translate(content: string): Po2MdResult {
    this.state = new CommandState(this.options.includeCodeblocks ?? false);
    this.translated = 0;
    this.untranslated = 0;

    const document = parseMarkdown(this.md, content);

    // Definitions first, so labels used inside translations resolve
    const referenceLines = document.references.map((reference) => {
      const msgid = linkReferenceToMsgid(reference);
      return this.lookup(msgid, { enabled: true }) ?? msgid;
    });
    this.env = referencesEnvFromMessages(referenceLines, document.env);

    const lines = this.renderBlocks(document.blocks, this.wrapwidth, false);
    if (referenceLines.length > 0) {
      if (lines.length > 0) lines.push('');
      lines.push(...referenceLines);
    }

    return {
      markdown: lines.length > 0 ? `${lines.join('\n')}\n` : '',
      translated: this.translated,
      untranslated: this.untranslated,
    };
  }

  private lookup(msgid: string, directive: MessageDirective): string | undefined {
    if (!directive.enabled) {
      this.log(`disabled: ${JSON.stringify(msgid)}`);
      return undefined;
    }

    const msgstr = this.translations.get(messageKey(msgid, directive.msgctxt));
    if (msgstr === undefined) {
      this.untranslated++;
      this.log(`untranslated: ${JSON.stringify(msgid)}`);
    } else {
      this.translated++;
    }
    return msgstr;
  }

  /**
   * Separate blocks with a blank line, except between the blocks of a
   * tight list item.
   */
  private renderBlocks(nodes: readonly BlockNode[], width: number, tight: boolean): string[] {
    const out: string[] = [];

    for (const node of nodes) {
      const lines = this.renderBlock(node, width);
      if (!lines || lines.length === 0) continue;

      if (out.length > 0 && !tight) out.push('');
      out.push(...lines);
    }

    return out;
  }

  private renderBlock(node: BlockNode, width: number): string[] | null {
    switch (node.kind) {
      case 'heading': {
        const level = Number(node.token.tag.slice(1)) || 1;
        const text = this.renderInline(node, Number.POSITIVE_INFINITY).join(' ');
        return [`${'#'.repeat(level)} ${text}`.trimEnd()];
      }
      case 'paragraph':
        return this.renderInline(node, width);
      case 'blockquote':
        return this.renderBlocks(node.children, Math.max(1, width - 2), false).map((line) =>
          line ? `> ${line}` : '>'
        );
      case 'bullet_list':
      case 'ordered_list':
        return this.renderList(node, width);
      case 'table':
        return this.renderTable(node);
      case 'fence':
        return this.renderFence(node);
      case 'code_block':
        return this.translateCodeblock(node)
          .split('\n')
          .map((line) => (line ? `    ${line}` : ''));
      case 'html_block':
        return this.renderHtml(node);
      case 'hr':
        return [node.token.markup || '---'];
      default:
        return this.renderBlocks(node.children, width, false);
    }
  }

  private renderInline(node: BlockNode, width: number): string[] {
    const children = node.inline?.children ?? [];
    const msgid = this.serializer.toMsgid(children);
    if (!msgid.trim()) return [];

    const msgstr = this.lookup(msgid, this.state.takeMessage());
    const tokens = msgstr === undefined ? children : parseInline(this.md, msgstr, this.env);
    return this.serializer.toLines(tokens, width);
  }

  /** Cells keep their pipes escaped, in the msgid and in the output */
  private renderCell(cell: BlockNode): string {
    const children = cell.inline?.children ?? [];
    const msgid = escapeTableCell(this.serializer.toMsgid(children));
    if (!msgid.trim()) return '';

    const msgstr = this.lookup(msgid, this.state.takeMessage());
    const tokens = msgstr === undefined ? children : parseInline(this.md, msgstr, this.env);
    return escapeTableCell(this.serializer.toLines(tokens).join(' '));
  }

  private renderList(list: BlockNode, width: number): string[] {
    const tight = isTightList(list);
    const start = Number(list.token.attrGet('start') ?? '1');
    const lines: string[] = [];

    list.children.forEach((item, index) => {
      const marker =
        list.kind === 'ordered_list'
          ? `${item.token.info || String(start + index)}${item.token.markup}`
          : item.token.markup;
      const indent = ' '.repeat(marker.length + 1);
      const body = this.renderBlocks(item.children, Math.max(1, width - indent.length), tight);

      if (index > 0 && !tight) lines.push('');
      if (body.length === 0) {
        lines.push(marker);
        return;
      }
      body.forEach((line, lineIndex) => {
        if (lineIndex === 0) lines.push(`${marker} ${line}`);
        else lines.push(line ? `${indent}${line}` : '');
      });
    });

    return lines;
  }

  private renderTable(table: BlockNode): string[] {
    const header: string[][] = [];
    const body: string[][] = [];
    const alignments: string[] = [];

    for (const section of table.children) {
      for (const row of section.children) {
        const cells = row.children.map((cell) => this.renderCell(cell));
        if (section.kind === 'thead') {
          header.push(cells);
          for (const cell of row.children) {
            alignments.push(TABLE_ALIGNMENTS[cell.token.attrGet('style') ?? ''] ?? '---');
          }
        } else {
          body.push(cells);
        }
      }
    }

    const formatRow = (cells: readonly string[]): string => `| ${cells.join(' | ')} |`;
    return [...header.map(formatRow), formatRow(alignments), ...body.map(formatRow)];
  }

  private renderFence(node: BlockNode): string[] {
    const { markup, info } = node.token;
    const code = this.translateCodeblock(node);
    return [`${markup}${info.trim()}`, ...(code ? code.split('\n') : []), markup];
  }

  private translateCodeblock(node: BlockNode): string {
    const msgid = node.token.content.replace(/\n$/, '');
    if (!this.state.takeCodeblock() || !msgid.trim()) return msgid;

    return this.lookup(msgid, this.state.takeMessage()) ?? msgid;
  }

  /** HTML is copied, command comments are applied and dropped */
  private renderHtml(node: BlockNode): string[] | null {
    const command = parseCommandComment(node.token.content, this.commands);
    if (command) {
      this.state.apply(command);
      return null;
    }
    return node.token.content.replace(/\n+$/, '').split('\n');
  }

  private log(message: string): void {
    if (this.options.debug) {
      console.error(`DEBUG: [po2md] ${message}`);
    }
  }
}

export interface Po2mdRunOptions extends Po2MdOptions {
  /** Write the translated document to this path */
  save?: string;
}

/**
 * Translate a Markdown file (or content) with the catalogs matching
 * `pofiles` (paths or globs).
 */
export async function po2md(
  input: string,
  pofiles: readonly string[],
  options: Po2mdRunOptions = {}
): Promise<Po2MdResult> {
  const source = await resolveMarkdownSource(input);
  const catalogs = await loadCatalogs(pofiles);

  const result = Po2Md.fromCatalogs(catalogs, options).translate(source.content);

  if (options.save) {
    await writeTextFile(options.save, result.markdown);
  }
  return result;
}
