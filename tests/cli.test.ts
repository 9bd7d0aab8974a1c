import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { type Command } from 'commander';
import { createMd2poProgram } from '../src/cli/md2po.js';
import { createPo2mdProgram } from '../src/cli/po2md.js';
import { createMd2po2mdProgram } from '../src/cli/md2po2md.js';
import { createMdpo2htmlProgram } from '../src/cli/mdpo2html.js';
import { packageInfo } from '../src/version.js';
import { createTempDir, type TempDir } from './harness.js';

interface Captured {
  out: string[];
  err: string[];
}

/** Run a program in-process, capturing commander output instead of exiting */
async function run(program: Command, args: string[]): Promise<Captured & { exitCode: number }> {
  const captured: Captured = { out: [], err: [] };
  program.exitOverride().configureOutput({
    writeOut: (text) => captured.out.push(text),
    writeErr: (text) => captured.err.push(text),
  });

  try {
    await program.parseAsync(args, { from: 'user' });
    return { ...captured, exitCode: 0 };
  } catch (error: unknown) {
    const exitCode =
      typeof error === 'object' && error !== null && 'exitCode' in error && typeof error.exitCode === 'number'
        ? error.exitCode
        : -1;
    return { ...captured, exitCode };
  }
}

describe('command line programs', () => {
  let tmp: TempDir;
  let log: MockInstance<typeof console.log>;

  beforeEach(async () => {
    tmp = await createTempDir();
    log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await tmp.cleanup();
  });

  it('reports the package version', async () => {
    const result = await run(createPo2mdProgram(), ['--version']);

    expect(result.exitCode).toBe(0);
    expect(result.out).toEqual([`${packageInfo.version}\n`]);
  });

  describe('md2po', () => {
    it('prints the catalog', async () => {
      const result = await run(createMd2poProgram(), ['# Hello']);

      expect(result.exitCode).toBe(0);
      expect(log).toHaveBeenCalledTimes(1);
      expect(String(log.mock.calls[0]?.[0])).toContain('msgid "Hello"\nmsgstr ""');
    });

    it('saves the catalog quietly', async () => {
      const doc = await tmp.write('doc.md', 'Text\n');
      const pofile = tmp.resolve('doc.po');

      const result = await run(createMd2poProgram(), [doc, '-p', pofile, '-s', '-q', '--no-location', '-x']);

      expect(result.exitCode).toBe(0);
      expect(log).not.toHaveBeenCalled();
      expect(await tmp.read('doc.po')).toContain('msgid "Text"\nmsgstr ""');
    });

    it('reads msgids to ignore from a file', async () => {
      const ignore = await tmp.write('ignore.txt', 'Skip\n');
      const result = await run(createMd2poProgram(), ['Skip', 'Keep', '--ignore-msgids', ignore]);

      expect(result.exitCode).toBe(0);
      expect(String(log.mock.calls[0]?.[0])).toContain('msgid "Keep"');

      expect(String(log.mock.calls[0]?.[0])).not.toContain('msgid "Skip"');
    });

    it('rejects --save without --po-filepath', async () => {
      const result = await run(createMd2poProgram(), ['# Hello', '--save']);

      expect(result.exitCode).toBe(1);
      expect(result.err).toEqual(['❌ md2po: --save requires --po-filepath.\n']);
    });

    it('rejects unknown extensions', async () => {
      const result = await run(createMd2poProgram(), ['# Hello', '-e', 'footnotes']);

      expect(result.exitCode).toBe(1);
      expect(result.err).toEqual(['❌ md2po: Extensions must be one of: tables, strikethrough, linkify.\n']);
    });
  });

  describe('po2md', () => {
    it('saves the translated document', async () => {
      const doc = await tmp.write('doc.md', 'Hello world\n');
      const pofile = await tmp.write('es.po', 'msgid "Hello world"\nmsgstr "Hola mundo"\n');

      const result = await run(createPo2mdProgram(), [doc, '-p', pofile, '-s', tmp.resolve('out.md'), '-w', '5']);

      expect(result.exitCode).toBe(0);
      expect(await tmp.read('out.md')).toBe('Hola\nmundo\n');
    });

    it('requires catalogs', async () => {
      const result = await run(createPo2mdProgram(), ['Hello']);

      expect(result.exitCode).toBe(1);
      expect(result.err).toEqual(['❌ po2md: At least one PO file is required (--pofiles).\n']);
    });

    it('reports missing catalogs', async () => {
      const missing = tmp.resolve('missing.po');
      const result = await run(createPo2mdProgram(), ['Hello', '-p', missing]);

      expect(result.exitCode).toBe(1);
      expect(result.err).toEqual([`❌ po2md: No PO files found matching: ${missing}\n`]);
    });
  });

  describe('md2po2md', () => {
    it('lists the written files', async () => {
      const doc = await tmp.write('doc.md', 'Text\n');
      const result = await run(createMd2po2mdProgram(), [doc, '-l', 'es', '-o', tmp.resolve('{lang}')]);

      expect(result.exitCode).toBe(0);
      expect(log.mock.calls).toEqual([[`[es] ${tmp.resolve('es', 'doc.md')} (0 translated, 1 untranslated)`]]);
    });

    it('requires {lang} in the output', async () => {
      const doc = await tmp.write('doc.md', 'Text\n');
      const result = await run(createMd2po2mdProgram(), [doc, '-l', 'es', '-o', tmp.resolve('out')]);

      expect(result.exitCode).toBe(1);
      expect(result.err).toEqual(['❌ md2po2md: The output pattern must contain "{lang}".\n']);
    });
  });

  describe('mdpo2html', () => {
    it('saves the HTML', async () => {
      const doc = await tmp.write('doc.md', '# Title\n');
      const pofile = await tmp.write('es.po', 'msgid "Title"\nmsgstr "Título"\n');

      const result = await run(createMdpo2htmlProgram(), [doc, '-p', pofile, '-s', tmp.resolve('doc.html')]);

      expect(result.exitCode).toBe(0);
      expect(await tmp.read('doc.html')).toBe('<h1>Título</h1>\n');
    });
  });
});
