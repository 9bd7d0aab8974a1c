/**
 * PO catalog access on top of pofile
 *
 * Catalogs are loaded and saved wholesale. Messages are identified by
 * msgctxt + msgid, joined with EOT the way gettext does.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { glob } from 'glob';
import PO from 'pofile';
import { UsageError, getErrorMessage, isNodeError } from '../errorHelpers.js';
import { type CatalogBuildOptions, type ExtractedMessage } from '../types.js';
import { GENERATOR } from '../version.js';

export type Catalog = PO;
export type CatalogItem = InstanceType<typeof PO.Item>;

/** (msgctxt, msgid) → msgstr */
export type TranslationMap = ReadonlyMap<string, string>;

const CONTEXT_SEPARATOR = '\u0004';

export function messageKey(msgid: string, msgctxt?: string | null): string {
  return msgctxt ? `${msgctxt}${CONTEXT_SEPARATOR}${msgid}` : msgid;
}

export function isFuzzy(item: CatalogItem): boolean {
  return Boolean(item.flags.fuzzy);
}

export function createCatalog(): Catalog {
  return new PO();
}

export function parseCatalog(content: string, source = '<string>'): Catalog {
  try {
    return PO.parse(content);
  } catch (error: unknown) {
    throw new UsageError(`Invalid PO file: ${source} (${getErrorMessage(error)})`);
  }
}

export async function loadCatalog(filePath: string): Promise<Catalog> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      throw new UsageError(`File not found: ${filePath}`);
    }
    throw new Error(`Failed to load PO file ${filePath}: ${getErrorMessage(error)}`);
  }
  return parseCatalog(content, filePath);
}

/**
 * Load every catalog matching the given paths or globs, in pattern order.
 */
export async function loadCatalogs(patterns: readonly string[]): Promise<Catalog[]> {
  const files: string[] = [];

  for (const pattern of patterns) {
    const matches = (await glob(pattern, { nodir: true })).sort();
    for (const match of matches) {
      if (!files.includes(match)) files.push(match);
    }
  }

  if (files.length === 0) {
    throw new UsageError(`No PO files found matching: ${patterns.join(', ')}`);
  }

  return Promise.all(files.map((file) => loadCatalog(file)));
}

export async function saveCatalog(catalog: Catalog, filePath: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, catalog.toString(), 'utf8');
}

/**
 * Translations usable for injection. Obsolete and fuzzy entries and empty
 * msgstrs are left out; across catalogs the first translation found wins.
 */
export function buildTranslationMap(catalogs: readonly Catalog[]): TranslationMap {
  const translations = new Map<string, string>();

  for (const catalog of catalogs) {
    for (const item of catalog.items) {
      if (item.obsolete || isFuzzy(item)) continue;

      const msgstr = item.msgstr[0] ?? '';
      if (!msgstr) continue;

      const key = messageKey(item.msgid, item.msgctxt);
      if (!translations.has(key)) translations.set(key, msgstr);
    }
  }

  return translations;
}

function setHeader(catalog: Catalog, name: string, value: string): void {
  Object.assign(catalog.headers, { [name]: value });
}

export interface BuildCatalogOptions extends CatalogBuildOptions {
  /** Catalog whose translations are merged into the result */
  existing?: Catalog;
}

/**
 * Build a catalog from extracted messages.
 *
 * Entries of `existing` that are found again keep their translation, flags
 * and comments (references are refreshed). `existing` itself is left as it
 * is: its entries are copied first. Entries not found anymore are
 * dropped, unless `markNotFoundAsObsolete` or `preserveNotFound` is set;
 * entries that were already obsolete are kept as they are.
 */
export function buildCatalog(
  messages: readonly ExtractedMessage[],
  options: BuildCatalogOptions = {}
): Catalog {
  const catalog = new PO();
  const existing = options.existing && PO.parse(options.existing.toString());

  if (existing) {
    catalog.comments = [...existing.comments];
    catalog.extractedComments = [...existing.extractedComments];
    Object.assign(catalog.headers, existing.headers);
  }

  if (!catalog.headers['Content-Type']) {
    setHeader(catalog, 'Content-Type', 'text/plain; charset=utf-8');
  }
  for (const [name, value] of Object.entries(options.metadata ?? {})) {
    setHeader(catalog, name, value);
  }
  if (options.xheader) {
    setHeader(catalog, 'X-Generator', GENERATOR);
  }

  const previous = new Map<string, CatalogItem>();
  for (const item of existing?.items ?? []) {
    previous.set(messageKey(item.msgid, item.msgctxt), item);
  }

  const found = new Set<string>();
  for (const message of messages) {
    const key = messageKey(message.msgid, message.msgctxt);
    if (found.has(key)) continue;
    found.add(key);

    const item = previous.get(key) ?? new PO.Item();
    item.msgid = message.msgid;
    if (message.msgctxt !== undefined) item.msgctxt = message.msgctxt;
    if (message.tcomment !== undefined) item.comments = [message.tcomment];
    item.references = [...message.references];
    item.obsolete = false;
    catalog.items.push(item);
  }

  for (const item of existing?.items ?? []) {
    if (found.has(messageKey(item.msgid, item.msgctxt))) continue;

    if (item.obsolete || options.preserveNotFound) {
      catalog.items.push(item);
    } else if (options.markNotFoundAsObsolete) {
      item.obsolete = true;
      catalog.items.push(item);
    }
  }

  return catalog;
}
