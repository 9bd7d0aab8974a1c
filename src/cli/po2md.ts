// src/cli/po2md.ts - po2md: write a Markdown document back translated
import { type Command } from 'commander';
import { po2md } from '../po2md.js';
import { Po2mdCliOptions } from '../types.js';
import { collect, createProgram, parseOptions, runAction } from './shared.js';

export function createPo2mdProgram(): Command {
  const program = createProgram('po2md', 'Translate a Markdown file using PO catalogs')
    .argument('<input>', 'Markdown file or Markdown content')
    .option('-p, --pofiles <path>', 'PO file or glob with the translations, repeatable', collect)
    .option('-s, --save <path>', 'Write the translated document to this file')
    .option('-w, --wrapwidth <width>', 'Wrap paragraphs at this column, 0 or "inf" to disable')
    .option('-D, --debug', 'Print debug information to stderr');

  program.action(async (input: string, _options: unknown, command: Command) => {
    await runAction(command, async () => {
      const options = parseOptions(Po2mdCliOptions, command.opts());

      const result = await po2md(input, options.pofiles, {
        save: options.save,
        wrapwidth: options.wrapwidth,
        includeCodeblocks: options.includeCodeblocks,
        commandAliases: options.commandAlias,
        extensions: options.extensions,
        debug: options.debug,
      });

      if (!options.save) {
        process.stdout.write(result.markdown);
      }
    });
  });

  return program;
}
