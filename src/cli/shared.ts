// src/cli/shared.ts - Pieces shared by the four command line programs
import { Command } from 'commander';
import { z } from 'zod';
import { UsageError, formatCliError } from '../errorHelpers.js';
import { packageInfo } from '../version.js';

/** Collects a repeatable option into an array */
export function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

/**
 * Validate raw commander options with a zod schema.
 * Every issue is reported, one per line.
 */
export function parseOptions<T extends z.ZodTypeAny>(schema: T, raw: unknown): z.output<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new UsageError(result.error.issues.map((issue) => issue.message).join('\n'));
  }
  return result.data;
}

/**
 * New program with the package version and the options every program takes.
 */
export function createProgram(name: string, description: string): Command {
  return new Command()
    .name(name)
    .description(description)
    .version(packageInfo.version)
    .option(
      '-c, --include-codeblocks',
      'Include code blocks as messages (mdpo-include-codeblocks commands still apply)'
    )
    .option('-a, --command-alias <alias:command>', 'Alias for a mdpo command, repeatable', collect)
    .option(
      '-e, --extensions <name>',
      'Markdown extension to enable (tables, strikethrough, linkify), repeatable',
      collect
    );
}

/**
 * Runs an action and reports its failure through commander, which prints
 * the message and exits with status 1.
 */
export async function runAction(command: Command, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error: unknown) {
    command.error(`❌ ${formatCliError(command.name(), error)}`, { exitCode: 1 });
  }
}
