// src/cli/md2po.ts - md2po: extract Markdown messages into a PO catalog
import { type Command } from 'commander';
import { UsageError } from '../errorHelpers.js';
import { md2po } from '../md2po.js';
import { readLines } from '../sources.js';
import { Md2poCliOptions } from '../types.js';
import { collect, createProgram, parseOptions, runAction } from './shared.js';

export function createMd2poProgram(): Command {
  const program = createProgram('md2po', 'Extract the translatable messages of Markdown files into a PO catalog')
    .argument('[inputs...]', 'Markdown files, globs or Markdown content')
    .option('-i, --ignore <path>', 'File or glob to leave out, repeatable', collect)
    .option('-p, --po-filepath <path>', 'Catalog to merge with (and write with --save)')
    .option('-s, --save', 'Write the catalog to --po-filepath')
    .option('-q, --quiet', 'Do not print the catalog')
    .option('--plaintext', 'Extract text without inline Markdown markup')
    .option('--ignore-msgids <file>', 'File with msgids to leave out, one per line')
    .option('-d, --metadata <entry>', 'Catalog header entry as "Key: value", repeatable', collect)
    .option('-x, --xheader', 'Add an X-Generator header naming mdpo')
    .option('--mark-not-found-as-obsolete', 'Keep catalog entries no longer found, marked obsolete')
    .option('--preserve-not-found', 'Keep catalog entries no longer found')
    .option('--no-location', 'Do not write file:line references')
    .option('-D, --debug', 'Print debug information to stderr');

  program.action(async (inputs: string[], _options: unknown, command: Command) => {
    await runAction(command, async () => {
      if (inputs.length === 0) {
        throw new UsageError('No Markdown input given.');
      }
      const options = parseOptions(Md2poCliOptions, command.opts());
      const ignoreMsgids = options.ignoreMsgids ? await readLines(options.ignoreMsgids) : [];

      const { catalog } = await md2po(inputs, {
        ignore: options.ignore,
        poFilepath: options.poFilepath,
        save: options.save,
        plaintext: options.plaintext,
        includeCodeblocks: options.includeCodeblocks,
        ignoreMsgids,
        commandAliases: options.commandAlias,
        extensions: options.extensions,
        metadata: options.metadata,
        xheader: options.xheader,
        markNotFoundAsObsolete: options.markNotFoundAsObsolete,
        preserveNotFound: options.preserveNotFound,
        location: options.location,
        debug: options.debug,
      });

      if (!options.quiet) {
        console.log(catalog.toString());
      }
    });
  });

  return program;
}
