// src/cli/mdpo2html.ts - mdpo2html: render a translated Markdown document as HTML
import { type Command } from 'commander';
import { mdpo2html } from '../mdpo2html.js';
import { Mdpo2htmlCliOptions } from '../types.js';
import { collect, createProgram, parseOptions, runAction } from './shared.js';

export function createMdpo2htmlProgram(): Command {
  const program = createProgram('mdpo2html', 'Translate a Markdown file using PO catalogs and render it as HTML')
    .argument('<input>', 'Markdown file or Markdown content')
    .option('-p, --pofiles <path>', 'PO file or glob with the translations, repeatable', collect)
    .option('-s, --save <path>', 'Write the HTML to this file');

  program.action(async (input: string, _options: unknown, command: Command) => {
    await runAction(command, async () => {
      const options = parseOptions(Mdpo2htmlCliOptions, command.opts());

      const result = await mdpo2html(input, options.pofiles, {
        save: options.save,
        includeCodeblocks: options.includeCodeblocks,
        commandAliases: options.commandAlias,
        extensions: options.extensions,
      });

      if (!options.save) {
        process.stdout.write(result.html);
      }
    });
  });

  return program;
}
