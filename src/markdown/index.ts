/**
 * Markdown layer: parsing, block tree, inline serialization and commands
 */

export { buildBlockTree, isTightList } from './BlockTree.js';
export {
  InlineSerializer,
  backtickFenceLength,
  escapeTableCell,
  linkDestination,
  wrapWords,
  type InlineSerializerOptions,
} from './InlineSerializer.js';
export {
  MDPO_COMMANDS,
  CommandState,
  buildCommandLookup,
  parseCommandComment,
  type MdpoCommand,
  type ParsedCommand,
  type MessageDirective,
  type CommandLookup,
} from './commands.js';
export {
  LINK_REFERENCE_RE,
  escapeLinkTitle,
  linkReferenceToMsgid,
  normalizeReferenceLabel,
  parseLinkReferences,
  referencesEnvFromMessages,
} from './linkReferences.js';
export { createMarkdownParser, parseInline, parseMarkdown } from './parser.js';
export * from './types.js';
