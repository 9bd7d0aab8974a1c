// src/cli/md2po2md.ts - md2po2md: catalogs and translated copies for several languages
import { type Command } from 'commander';
import { md2po2md } from '../md2po2md.js';
import { Md2po2mdCliOptions } from '../types.js';
import { collect, createProgram, parseOptions, runAction } from './shared.js';

export function createMd2po2mdProgram(): Command {
  const program = createProgram(
    'md2po2md',
    'Update the PO catalog of every language and write the translated Markdown files'
  )
    .argument('<inputs...>', 'Markdown files or globs')
    .option('-l, --lang <code>', 'Language to produce, repeatable', collect)
    .option('-o, --output <pattern>', 'Output directory, must contain {lang}')
    .option('--po-filepath <pattern>', 'Catalog path, may use {lang} and {basename}')
    .option('-w, --md-wrapwidth <width>', 'Wrap paragraphs at this column, 0 or "inf" to disable')
    .option('-i, --ignore <path>', 'File or glob to leave out, repeatable', collect)
    .option('-x, --xheader', 'Add an X-Generator header naming mdpo')
    .option('-D, --debug', 'Print debug information to stderr');

  program.action(async (inputs: string[], _options: unknown, command: Command) => {
    await runAction(command, async () => {
      const options = parseOptions(Md2po2mdCliOptions, command.opts());

      const results = await md2po2md(inputs, {
        langs: options.lang,
        output: options.output,
        poFilepath: options.poFilepath,
        mdWrapwidth: options.mdWrapwidth,
        ignore: options.ignore,
        xheader: options.xheader,
        includeCodeblocks: options.includeCodeblocks,
        commandAliases: options.commandAlias,
        extensions: options.extensions,
        debug: options.debug,
      });

      for (const result of results) {
        console.log(
          `[${result.lang}] ${result.markdown} (${result.translated} translated, ${result.untranslated} untranslated)`
        );
      }
    });
  });

  return program;
}
