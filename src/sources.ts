// src/sources.ts - Resolving command inputs to Markdown sources and writing outputs

import * as fs from 'fs/promises';
import * as path from 'path';
import { glob } from 'glob';
import { UsageError, getErrorMessage, isNodeError } from './errorHelpers.js';
import { type MarkdownSource } from './types.js';

async function readTextFile(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      throw new UsageError(`File not found: ${filePath}`);
    }
    throw new Error(`Failed to read ${filePath}: ${getErrorMessage(error)}`);
  }
}

/**
 * Files matching a path or glob, sorted. Empty when nothing matches.
 */
export async function findFiles(pattern: string, ignore: readonly string[] = []): Promise<string[]> {
  const matches = await glob(pattern, { nodir: true, ignore: [...ignore] });
  return matches.sort();
}

/**
 * Resolve each input to the files it matches; an input that matches no
 * file is taken as Markdown content itself.
 */
export async function resolveMarkdownSources(
  inputs: readonly string[],
  ignore: readonly string[] = []
): Promise<MarkdownSource[]> {
  const sources: MarkdownSource[] = [];
  const seen = new Set<string>();

  for (const input of inputs) {
    const files = await findFiles(input, ignore);

    if (files.length === 0) {
      sources.push({ content: input });
      continue;
    }

    for (const filepath of files) {
      if (seen.has(filepath)) continue;
      seen.add(filepath);
      sources.push({ content: await readTextFile(filepath), filepath });
    }
  }

  return sources;
}

/**
 * Resolve a single input (path, glob or content) for one-document commands
 */
export async function resolveMarkdownSource(input: string): Promise<MarkdownSource> {
  const files = await findFiles(input);

  if (files.length > 1) {
    throw new UsageError(`Expected a single Markdown file, but "${input}" matches ${files.length} files.`);
  }
  const [filepath] = files;
  if (filepath === undefined) {
    return { content: input };
  }
  return { content: await readTextFile(filepath), filepath };
}

/** Non-empty lines of a file, e.g. a list of msgids to ignore */
export async function readLines(filePath: string): Promise<string[]> {
  const content = await readTextFile(filePath);
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function writeTextFile(filePath: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content, 'utf8');
}
