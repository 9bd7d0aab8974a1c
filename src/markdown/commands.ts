/**
 * mdpo commands - HTML comments that steer extraction and injection
 *
 *   <!-- mdpo-disable-next-line -->
 *   <!-- mdpo-context button label -->
 *
 * The same state machine drives md2po (what becomes a message) and po2md
 * (what gets translated), so both sides always agree on message identity.
 */

import { UsageError } from '../errorHelpers.js';
import { type CommandAliases } from '../types.js';

export const MDPO_COMMANDS = [
  'mdpo-disable-next-line',
  'mdpo-enable-next-line',
  'mdpo-disable',
  'mdpo-enable',
  'mdpo-context',
  'mdpo-translator',
  'mdpo-include-codeblock',
  'mdpo-disable-codeblock',
  'mdpo-disable-codeblocks',
  'mdpo-enable-codeblocks',
] as const;
export type MdpoCommand = (typeof MDPO_COMMANDS)[number];

/** Commands that need a value after the command name */
const VALUE_COMMANDS: ReadonlySet<MdpoCommand> = new Set(['mdpo-context', 'mdpo-translator']);

const knownCommands: ReadonlySet<string> = new Set(MDPO_COMMANDS);

function isMdpoCommand(value: string): value is MdpoCommand {
  return knownCommands.has(value);
}

const COMMAND_COMMENT_RE = /^<!--\s*(\S+?)(?:\s+([\s\S]*?))?\s*-->\s*$/;

export interface ParsedCommand {
  command: MdpoCommand;
  value?: string;
}

export type CommandLookup = ReadonlyMap<string, MdpoCommand>;

/**
 * Resolve user aliases into a lookup of comment name → command.
 * The alias is used as written; the target may omit the `mdpo-` prefix.
 */
export function buildCommandLookup(aliases: CommandAliases = {}): CommandLookup {
  const lookup = new Map<string, MdpoCommand>();
  for (const command of MDPO_COMMANDS) {
    lookup.set(command, command);
  }

  for (const [alias, target] of Object.entries(aliases)) {
    const command = target.startsWith('mdpo-') ? target : `mdpo-${target}`;
    if (!isMdpoCommand(command)) {
      throw new UsageError(
        `Unknown command "${target}" for alias "${alias}". Valid commands: ${MDPO_COMMANDS.join(', ')}.`
      );
    }
    lookup.set(alias, command);
  }

  return lookup;
}

/**
 * Read a command from the content of an HTML block.
 * Returns null for any HTML that is not a single command comment.
 */
export function parseCommandComment(html: string, lookup: CommandLookup): ParsedCommand | null {
  const match = COMMAND_COMMENT_RE.exec(html.trim());
  if (!match?.[1]) return null;

  const command = lookup.get(match[1]);
  if (!command) return null;

  const value = match[2]?.trim();
  if (VALUE_COMMANDS.has(command)) {
    if (!value) {
      throw new UsageError(`The command "${match[1]}" requires a value.`);
    }
    return { command, value };
  }

  return { command };
}

/** What applies to the message that consumes the pending commands */
export interface MessageDirective {
  enabled: boolean;
  msgctxt?: string;
  tcomment?: string;
}

export class CommandState {
  private disabled = false;
  private disableNext = false;
  private enableNext = false;
  private context: string | undefined;
  private translatorComment: string | undefined;

  private codeblocksEnabled: boolean;
  private includeNextCodeblock = false;
  private disableNextCodeblock = false;

  constructor(includeCodeblocks = false) {
    this.codeblocksEnabled = includeCodeblocks;
  }

  apply({ command, value }: ParsedCommand): void {
    switch (command) {
      case 'mdpo-disable-next-line':
        this.disableNext = true;
        break;
      case 'mdpo-enable-next-line':
        this.enableNext = true;
        break;
      case 'mdpo-disable':
        this.disabled = true;
        break;
      case 'mdpo-enable':
        this.disabled = false;
        break;
      case 'mdpo-context':
        this.context = value;
        break;
      case 'mdpo-translator':
        this.translatorComment = value;
        break;
      case 'mdpo-include-codeblock':
        this.includeNextCodeblock = true;
        break;
      case 'mdpo-disable-codeblock':
        this.disableNextCodeblock = true;
        break;
      case 'mdpo-disable-codeblocks':
        this.codeblocksEnabled = false;
        break;
      case 'mdpo-enable-codeblocks':
        this.codeblocksEnabled = true;
        break;
    }
  }

  /** Consume the one-shot commands for the next message */
  takeMessage(): MessageDirective {
    const enabled = this.disabled ? this.enableNext : !this.disableNext;
    const directive: MessageDirective = {
      enabled,
      ...(this.context !== undefined ? { msgctxt: this.context } : {}),
      ...(this.translatorComment !== undefined ? { tcomment: this.translatorComment } : {}),
    };

    this.disableNext = false;
    this.enableNext = false;
    this.context = undefined;
    this.translatorComment = undefined;

    return directive;
  }

  /** Whether the next code block is a message; consumes the one-shot flags */
  takeCodeblock(): boolean {
    const included = this.disableNextCodeblock
      ? false
      : this.includeNextCodeblock || this.codeblocksEnabled;

    this.includeNextCodeblock = false;
    this.disableNextCodeblock = false;

    return included;
  }
}
