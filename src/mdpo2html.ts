// src/mdpo2html.ts - Translated Markdown rendered to HTML

import { createMarkdownParser } from './markdown/parser.js';
import { buildTranslationMap, loadCatalogs, type TranslationMap } from './po/catalog.js';
import { Po2Md } from './po2md.js';
import { resolveMarkdownSource, writeTextFile } from './sources.js';
import { type Po2MdOptions } from './types.js';

export type Mdpo2htmlOptions = Omit<Po2MdOptions, 'wrapwidth'>;

export interface Mdpo2htmlResult {
  html: string;
  translated: number;
  untranslated: number;
}

/**
 * Apply translations to Markdown content and render the result with the
 * same markdown-it configuration used to parse it.
 */
export function renderTranslatedHtml(
  content: string,
  translations: TranslationMap,
  options: Mdpo2htmlOptions = {}
): Mdpo2htmlResult {
  const { markdown, translated, untranslated } = new Po2Md(translations, {
    ...options,
    wrapwidth: Number.POSITIVE_INFINITY,
  }).translate(content);

  // The renderer has no rule for the escapes kept apart while translating
  const renderer = createMarkdownParser(options);
  renderer.core.ruler.enable('text_join');

  const html = renderer.render(markdown);
  return { html, translated, untranslated };
}

export interface Mdpo2htmlRunOptions extends Mdpo2htmlOptions {
  /** Write the HTML to this path */
  save?: string;
}

export async function mdpo2html(
  input: string,
  pofiles: readonly string[],
  options: Mdpo2htmlRunOptions = {}
): Promise<Mdpo2htmlResult> {
  const source = await resolveMarkdownSource(input);
  const catalogs = await loadCatalogs(pofiles);

  const result = renderTranslatedHtml(source.content, buildTranslationMap(catalogs), options);

  if (options.save) {
    await writeTextFile(options.save, result.html);
  }
  return result;
}
