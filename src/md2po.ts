/**
 * Md2Po - Extracts translatable messages from Markdown into a PO catalog
 *
 * Messages are the inline content of headings, paragraphs (also inside list
 * items and block quotes) and table cells, serialized back to Markdown so
 * that translators see the inline markup. Code blocks are messages when
 * enabled, link reference definitions always are.
 */

import { UsageError } from './errorHelpers.js';
import {
  buildCommandLookup,
  CommandState,
  parseCommandComment,
  type CommandLookup,
  type MessageDirective,
} from './markdown/commands.js';
import { InlineSerializer, escapeTableCell } from './markdown/InlineSerializer.js';
import { linkReferenceToMsgid } from './markdown/linkReferences.js';
import { createMarkdownParser, parseMarkdown } from './markdown/parser.js';
import { type BlockNode, type MarkdownParser } from './markdown/types.js';
import { buildCatalog, loadCatalog, messageKey, saveCatalog, type Catalog } from './po/catalog.js';
import { fileExists, resolveMarkdownSources } from './sources.js';
import { type ExtractedMessage, type MarkdownSource, type Md2PoOptions } from './types.js';

export interface Md2PoResult {
  messages: ExtractedMessage[];
  catalog: Catalog;
}

export class Md2Po {
  private readonly md: MarkdownParser;
  private readonly serializer: InlineSerializer;
  private readonly commands: CommandLookup;
  private readonly ignoreMsgids: ReadonlySet<string>;

  private messages: ExtractedMessage[] = [];
  private messagesByKey = new Map<string, ExtractedMessage>();
  private state = new CommandState();
  private filepath: string | undefined;

  constructor(private readonly options: Md2PoOptions = {}) {
    this.md = createMarkdownParser(options);
    this.serializer = new InlineSerializer({
      markup: options.markup,
      plaintext: options.plaintext,
    });
    this.commands = buildCommandLookup(options.commandAliases);
    this.ignoreMsgids = new Set(options.ignoreMsgids ?? []);
  }

  /**
   * Extract messages from one or more documents into a single catalog
   * @param sources Markdown documents, in order
   * @param existing Catalog whose translations are kept
   */
  extract(sources: MarkdownSource | readonly MarkdownSource[], existing?: Catalog): Md2PoResult {
    this.messages = [];
    this.messagesByKey.clear();

    const list: readonly MarkdownSource[] = 'content' in sources ? [sources] : sources;
    for (const source of list) {
      this.extractSource(source);
    }

    const messages = this.messages;
    const catalog = buildCatalog(messages, { ...this.options, existing });
    return { messages, catalog };
  }

  private extractSource(source: MarkdownSource): void {
    this.filepath = source.filepath;
    this.state = new CommandState(this.options.includeCodeblocks ?? false);
    this.log(`Processing ${source.filepath ?? 'content'}`);

    const document = parseMarkdown(this.md, source.content);
    this.walk(document.blocks);

    for (const reference of document.references) {
      this.addMessage(linkReferenceToMsgid(reference), reference.line, { enabled: true });
    }
  }

  private walk(nodes: readonly BlockNode[]): void {
    for (const node of nodes) {
      switch (node.kind) {
        case 'heading':
        case 'paragraph':
        case 'th':
        case 'td':
          this.processInline(node);
          break;
        case 'fence':
        case 'code_block':
          this.processCodeblock(node);
          break;
        case 'html_block':
          this.processHtml(node);
          break;
        case 'hr':
          break;
        default:
          this.walk(node.children);
      }
    }
  }

  private processInline(node: BlockNode): void {
    const text = this.serializer.toMsgid(node.inline?.children ?? []);
    const msgid = node.kind === 'th' || node.kind === 'td' ? escapeTableCell(text) : text;
    if (!msgid.trim()) return;

    this.log(`${node.kind} (line ${node.line}): ${JSON.stringify(msgid)}`);
    this.addMessage(msgid, node.line, this.state.takeMessage());
  }

  private processCodeblock(node: BlockNode): void {
    if (!this.state.takeCodeblock()) return;

    const msgid = node.token.content.replace(/\n$/, '');
    if (!msgid.trim()) return;

    this.log(`${node.kind} (line ${node.line}): ${JSON.stringify(msgid)}`);
    this.addMessage(msgid, node.line, this.state.takeMessage());
  }

  private processHtml(node: BlockNode): void {
    const command = parseCommandComment(node.token.content, this.commands);
    if (!command) return;

    this.log(`command (line ${node.line}): ${command.command}${command.value ? ` ${command.value}` : ''}`);
    this.state.apply(command);
  }

  private addMessage(msgid: string, line: number, directive: MessageDirective): void {
    if (!directive.enabled) {
      this.log(`  skipped (disabled)`);
      return;
    }
    if (this.ignoreMsgids.has(msgid)) {
      this.log(`  skipped (ignored msgid)`);
      return;
    }

    const reference =
      this.filepath !== undefined && this.options.location !== false ? `${this.filepath}:${line}` : undefined;
    const key = messageKey(msgid, directive.msgctxt);
    const known = this.messagesByKey.get(key);

    if (known) {
      if (reference && !known.references.includes(reference)) known.references.push(reference);
      if (directive.tcomment !== undefined) known.tcomment = directive.tcomment;
      return;
    }

    const message: ExtractedMessage = {
      msgid,
      ...(directive.msgctxt !== undefined ? { msgctxt: directive.msgctxt } : {}),
      ...(directive.tcomment !== undefined ? { tcomment: directive.tcomment } : {}),
      references: reference ? [reference] : [],
    };
    this.messages.push(message);
    this.messagesByKey.set(key, message);
  }

  private log(message: string): void {
    if (this.options.debug) {
      console.error(`DEBUG: [md2po] ${message}`);
    }
  }
}

export interface Md2poRunOptions extends Md2PoOptions {
  /** Paths or globs left out of the inputs */
  ignore?: readonly string[];
  /** Catalog merged into the result, written back with `save` */
  poFilepath?: string;
  save?: boolean;
}

/**
 * Extract messages from files, globs or Markdown content.
 * An existing catalog at `poFilepath` is merged so its translations survive.
 */
export async function md2po(
  inputs: string | readonly string[],
  options: Md2poRunOptions = {}
): Promise<Md2PoResult> {
  if (options.save && !options.poFilepath) {
    throw new UsageError('Saving the catalog requires a PO file path.');
  }

  const sources = await resolveMarkdownSources(typeof inputs === 'string' ? [inputs] : inputs, options.ignore);
  const existing =
    options.poFilepath && (await fileExists(options.poFilepath))
      ? await loadCatalog(options.poFilepath)
      : undefined;

  const result = new Md2Po(options).extract(sources, existing);

  if (options.save && options.poFilepath) {
    await saveCatalog(result.catalog, options.poFilepath);
  }
  return result;
}
