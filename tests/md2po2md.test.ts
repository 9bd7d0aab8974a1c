import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { md2po2md } from '../src/md2po2md.js';
import { loadCatalog, saveCatalog } from '../src/po/catalog.js';
import { UsageError } from '../src/errorHelpers.js';
import { createTempDir, type TempDir } from './harness.js';

describe('md2po2md', () => {
  let tmp: TempDir;

  beforeEach(async () => {
    tmp = await createTempDir();
  });

  afterEach(async () => {
    await tmp.cleanup();
  });

  it('writes a catalog and a translated copy per language', async () => {
    const readme = await tmp.write('README.md', '# Hello\n\nWorld\n');

    const results = await md2po2md([readme], { langs: ['es', 'fr'], output: tmp.resolve('locale', '{lang}') });

    expect(results).toEqual([
      {
        lang: 'es',
        source: readme,
        pofile: tmp.resolve('locale', 'es', 'README.po'),
        markdown: tmp.resolve('locale', 'es', 'README.md'),
        translated: 0,
        untranslated: 2,
      },
      {
        lang: 'fr',
        source: readme,
        pofile: tmp.resolve('locale', 'fr', 'README.po'),
        markdown: tmp.resolve('locale', 'fr', 'README.md'),
        translated: 0,
        untranslated: 2,
      },
    ]);
    expect(await tmp.read('locale/fr/README.md')).toBe('# Hello\n\nWorld\n');

    const catalog = await loadCatalog(tmp.resolve('locale', 'es', 'README.po'));
    const headers: Record<string, string | undefined> = { ...catalog.headers };
    expect(headers.Language).toBe('es');
    expect(catalog.items.map((item) => item.msgid)).toEqual(['Hello', 'World']);
  });

  it('keeps translations already in the catalog on later runs', async () => {
    const readme = await tmp.write('README.md', '# Hello\n\nWorld\n');
    const options = { langs: ['es'], output: tmp.resolve('locale', '{lang}') };
    await md2po2md([readme], options);

    const pofile = tmp.resolve('locale', 'es', 'README.po');
    const catalog = await loadCatalog(pofile);
    const hello = catalog.items.find((item) => item.msgid === 'Hello');
    if (hello) hello.msgstr = ['Hola'];
    await saveCatalog(catalog, pofile);

    const [result] = await md2po2md([readme], options);

    expect(result?.translated).toBe(1);
    expect(await tmp.read('locale/es/README.md')).toBe('# Hola\n\nWorld\n');
    const saved = await loadCatalog(pofile);
    expect(saved.items.map((item) => item.msgstr[0] ?? '')).toEqual(['Hola', '']);
  });

  it('extracts files sharing a catalog path into one catalog', async () => {
    const first = await tmp.write('docs/a.md', 'Alpha\n');
    const second = await tmp.write('docs/b.md', 'Beta\n');

    await md2po2md([tmp.resolve('docs', '*.md')], {
      langs: ['de'],
      output: tmp.resolve('out', '{lang}'),
      poFilepath: tmp.resolve('po', '{lang}.po'),
    });

    const catalog = await loadCatalog(tmp.resolve('po', 'de.po'));
    expect(catalog.items.map((item) => [item.msgid, item.references])).toEqual([
      ['Alpha', [`${first}:1`]],
      ['Beta', [`${second}:1`]],
    ]);
    expect(await tmp.read('out/de/b.md')).toBe('Beta\n');
  });

  it('refuses inputs that would be written to the same file', async () => {
    const first = await tmp.write('a/README.md', 'Alpha\n');
    const second = await tmp.write('b/README.md', 'Beta\n');
    const target = tmp.resolve('out', 'es', 'README.md');

    const run = md2po2md([first, second], { langs: ['es'], output: tmp.resolve('out', '{lang}') });

    await expect(run).rejects.toBeInstanceOf(UsageError);
    await expect(run).rejects.toThrow(`would be written to ${target}.`);
    await expect(tmp.read('out/es/README.md')).rejects.toThrow('ENOENT');
    await expect(tmp.read('out/es/README.po')).rejects.toThrow('ENOENT');
  });

  it('requires {lang} in the output pattern', async () => {
    const readme = await tmp.write('README.md', 'Text\n');
    await expect(md2po2md([readme], { langs: ['es'], output: tmp.resolve('out') })).rejects.toBeInstanceOf(
      UsageError
    );
  });

  it('requires Markdown files', async () => {
    await expect(
      md2po2md(['# Not a file'], { langs: ['es'], output: tmp.resolve('{lang}') })
    ).rejects.toThrow('No Markdown files found matching: # Not a file');
  });
});
