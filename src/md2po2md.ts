// src/md2po2md.ts - One-pass Markdown → PO → Markdown for several languages

import * as path from 'path';
import { UsageError } from './errorHelpers.js';
import { Md2Po } from './md2po.js';
import { buildTranslationMap, loadCatalog, saveCatalog } from './po/catalog.js';
import { Po2Md } from './po2md.js';
import { fileExists, resolveMarkdownSources, writeTextFile } from './sources.js';
import { type MarkdownSource, type Md2PoOptions, type Po2MdOptions } from './types.js';

export interface Md2po2mdOptions extends Md2PoOptions, Omit<Po2MdOptions, 'wrapwidth'> {
  /** Languages to produce */
  langs: readonly string[];
  /** Output directory pattern, must contain `{lang}` */
  output: string;
  /** Catalog path pattern with `{lang}` and `{basename}` (default: `<output>/<basename>.po`) */
  poFilepath?: string;
  /** Wrap width of the written Markdown */
  mdWrapwidth?: number;
  ignore?: readonly string[];
}

export interface Md2po2mdFileResult {
  lang: string;
  source: string;
  pofile: string;
  markdown: string;
  translated: number;
  untranslated: number;
}

interface CatalogGroup {
  pofile: string;
  sources: Required<MarkdownSource>[];
}

function hasFilepath(source: MarkdownSource): source is Required<MarkdownSource> {
  return source.filepath !== undefined;
}

function catalogPath(options: Md2po2mdOptions, outputDir: string, lang: string, filepath: string): string {
  const basename = path.basename(filepath, path.extname(filepath));
  if (!options.poFilepath) {
    return path.join(outputDir, `${basename}.po`);
  }
  return options.poFilepath.replaceAll('{lang}', lang).replaceAll('{basename}', basename);
}

function targetPath(outputDir: string, filepath: string): string {
  return path.join(outputDir, path.basename(filepath));
}

/** Two inputs written to one output file would overwrite each other */
function checkTargets(files: readonly Required<MarkdownSource>[], outputDir: string): void {
  const sources = new Map<string, string>();
  for (const { filepath } of files) {
    const target = targetPath(outputDir, filepath);
    const previous = sources.get(target);
    if (previous !== undefined) {
      throw new UsageError(`Both ${previous} and ${filepath} would be written to ${target}.`);
    }
    sources.set(target, filepath);
  }
}

/**
 * For every language: extract each input into its catalog (keeping the
 * translations already there), save the catalog, then write the translated
 * document into the language's output directory. Inputs sharing a catalog
 * path are extracted together.
 */
export async function md2po2md(
  inputs: string | readonly string[],
  options: Md2po2mdOptions
): Promise<Md2po2mdFileResult[]> {
  if (!options.output.includes('{lang}')) {
    throw new UsageError('The output pattern must contain "{lang}".');
  }
  if (options.langs.length === 0) {
    throw new UsageError('At least one language is required.');
  }

  const inputList = typeof inputs === 'string' ? [inputs] : inputs;
  const sources = await resolveMarkdownSources(inputList, options.ignore);
  const files = sources.filter(hasFilepath);
  if (files.length !== sources.length || files.length === 0) {
    throw new UsageError(`No Markdown files found matching: ${inputList.join(', ')}`);
  }

  const results: Md2po2mdFileResult[] = [];

  for (const lang of options.langs) {
    const outputDir = options.output.replaceAll('{lang}', lang);
    checkTargets(files, outputDir);

    const groups = new Map<string, CatalogGroup>();
    for (const source of files) {
      const pofile = catalogPath(options, outputDir, lang, source.filepath);
      const group = groups.get(pofile) ?? { pofile, sources: [] };
      group.sources.push(source);
      groups.set(pofile, group);
    }

    for (const { pofile, sources: groupSources } of groups.values()) {
      const existing = (await fileExists(pofile)) ? await loadCatalog(pofile) : undefined;
      const { catalog } = new Md2Po({
        ...options,
        metadata: { Language: lang, ...options.metadata },
      }).extract(groupSources, existing);
      await saveCatalog(catalog, pofile);

      const po2md = new Po2Md(buildTranslationMap([catalog]), {
        ...options,
        wrapwidth: options.mdWrapwidth,
      });

      for (const source of groupSources) {
        const target = targetPath(outputDir, source.filepath);
        if (path.resolve(target) === path.resolve(source.filepath)) {
          throw new UsageError(`Refusing to overwrite the source file ${source.filepath}.`);
        }

        const result = po2md.translate(source.content);
        await writeTextFile(target, result.markdown);
        results.push({
          lang,
          source: source.filepath,
          pofile,
          markdown: target,
          translated: result.translated,
          untranslated: result.untranslated,
        });
      }
    }
  }

  return results;
}
