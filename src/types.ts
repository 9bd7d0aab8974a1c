// src/types.ts
import { z } from 'zod';

// --- Markdown Dialect ---

export const MARKDOWN_EXTENSIONS = ['tables', 'strikethrough', 'linkify'] as const;
export type MarkdownExtension = (typeof MARKDOWN_EXTENSIONS)[number];

/** Extensions enabled when none are given */
export const DEFAULT_EXTENSIONS: readonly MarkdownExtension[] = ['tables', 'strikethrough'];

/** Strings written around inline markup when serializing messages */
export interface MarkupStrings {
  boldStart: string;
  boldEnd: string;
  italicStart: string;
  italicEnd: string;
  codeStart: string;
  codeEnd: string;
  strikethroughStart: string;
  strikethroughEnd: string;
  linkStart: string;
  linkEnd: string;
}

export const DEFAULT_MARKUP: MarkupStrings = {
  boldStart: '**',
  boldEnd: '**',
  italicStart: '*',
  italicEnd: '*',
  codeStart: '`',
  codeEnd: '`',
  strikethroughStart: '~~',
  strikethroughEnd: '~~',
  linkStart: '[',
  linkEnd: ']',
};

// --- Documents and Messages ---

/** Markdown input, optionally tied to the file it was read from */
export interface MarkdownSource {
  content: string;
  filepath?: string;
}

/** A translatable message found in a Markdown document */
export interface ExtractedMessage {
  msgid: string;
  msgctxt?: string;
  /** Translator comment set with `mdpo-translator` */
  tcomment?: string;
  /** `file:line` locations */
  references: string[];
}

/** Link reference definition (`[label]: href "title"`) */
export interface LinkReference {
  label: string;
  href: string;
  title?: string;
  /** 1-indexed source line */
  line: number;
}

/** Alias (as written in the comment) → command name */
export type CommandAliases = Record<string, string>;

// --- Library Options ---

export interface ParserOptions {
  /** Markdown extensions to enable (default: tables, strikethrough) */
  extensions?: readonly MarkdownExtension[];
}

export interface CommandOptions {
  commandAliases?: CommandAliases;
}

export interface CatalogBuildOptions {
  /** Header entries written into the catalog */
  metadata?: Record<string, string>;
  /** Add an `X-Generator` header naming this tool */
  xheader?: boolean;
  /** Keep entries that are no longer found, marked obsolete */
  markNotFoundAsObsolete?: boolean;
  /** Keep entries that are no longer found, untouched */
  preserveNotFound?: boolean;
}

export interface SerializerOptions {
  markup?: Partial<MarkupStrings>;
}

export interface Md2PoOptions
  extends ParserOptions,
    CommandOptions,
    CatalogBuildOptions,
    SerializerOptions {
  /** Extract text without inline markup */
  plaintext?: boolean;
  /** Treat code blocks as messages from the start of each document */
  includeCodeblocks?: boolean;
  /** Msgids never written to the catalog */
  ignoreMsgids?: Iterable<string>;
  /** Add `file:line` references for file sources (default: true) */
  location?: boolean;
  /** Log processed blocks to stderr */
  debug?: boolean;
}

export interface Po2MdOptions extends ParserOptions, CommandOptions, SerializerOptions {
  /** Column at which paragraphs are wrapped, Infinity to disable (default: 80) */
  wrapwidth?: number;
  includeCodeblocks?: boolean;
  debug?: boolean;
}

export const DEFAULT_WRAPWIDTH = 80;

// --- Zod Schema Fragments for Command Line Options ---

export const WrapWidthParameter = z
  .string()
  .trim()
  .regex(/^(\d+|inf)$/i, 'Wrap width must be a non-negative integer or "inf".')
  .transform((value) => {
    if (value.toLowerCase() === 'inf') return Number.POSITIVE_INFINITY;
    const width = parseInt(value, 10);
    return width === 0 ? Number.POSITIVE_INFINITY : width;
  });

export const CommandAliasesParameter = z
  .array(
    z
      .string()
      .regex(/^[^:\s]+:[^:\s]+$/, 'Command aliases must be written as "alias:command".')
  )
  .default([])
  .transform((entries): CommandAliases => {
    const aliases: CommandAliases = {};
    for (const entry of entries) {
      const separator = entry.indexOf(':');
      aliases[entry.slice(0, separator)] = entry.slice(separator + 1);
    }
    return aliases;
  });

export const MetadataParameter = z
  .array(z.string().regex(/^[^:]+:.*$/, 'Metadata entries must be written as "Key: value".'))
  .default([])
  .transform((entries): Record<string, string> => {
    const metadata: Record<string, string> = {};
    for (const entry of entries) {
      const separator = entry.indexOf(':');
      metadata[entry.slice(0, separator).trim()] = entry.slice(separator + 1).trim();
    }
    return metadata;
  });

export const ExtensionsParameter = z
  .array(
    z.enum(MARKDOWN_EXTENSIONS, {
      errorMap: () => ({ message: `Extensions must be one of: ${MARKDOWN_EXTENSIONS.join(', ')}.` }),
    })
  )
  .optional();

const SharedOptions = {
  includeCodeblocks: z.boolean().default(false),
  commandAlias: CommandAliasesParameter,
  extensions: ExtensionsParameter,
  debug: z.boolean().default(false),
};

export const Md2poCliOptions = z
  .object({
    ...SharedOptions,
    ignore: z.array(z.string()).default([]),
    poFilepath: z.string().min(1).optional(),
    save: z.boolean().default(false),
    quiet: z.boolean().default(false),
    plaintext: z.boolean().default(false),
    ignoreMsgids: z.string().min(1).optional(),
    metadata: MetadataParameter,
    xheader: z.boolean().default(false),
    markNotFoundAsObsolete: z.boolean().default(false),
    preserveNotFound: z.boolean().default(false),
    location: z.boolean().default(true),
  })
  .refine((options) => !options.save || options.poFilepath !== undefined, {
    message: '--save requires --po-filepath.',
  })
  .refine((options) => !(options.markNotFoundAsObsolete && options.preserveNotFound), {
    message: '--mark-not-found-as-obsolete and --preserve-not-found cannot be used together.',
  });
export type Md2poCliArgs = z.infer<typeof Md2poCliOptions>;

export const Po2mdCliOptions = z.object({
  ...SharedOptions,
  pofiles: z
    .array(z.string(), { required_error: 'At least one PO file is required (--pofiles).' })
    .min(1, 'At least one PO file is required (--pofiles).'),
  save: z.string().min(1).optional(),
  wrapwidth: WrapWidthParameter.default(String(DEFAULT_WRAPWIDTH)),
});
export type Po2mdCliArgs = z.infer<typeof Po2mdCliOptions>;

export const Md2po2mdCliOptions = z.object({
  ...SharedOptions,
  lang: z
    .array(z.string().min(1), { required_error: 'At least one language is required (--lang).' })
    .min(1, 'At least one language is required (--lang).'),
  output: z
    .string({ required_error: 'An output directory is required (--output).' })
    .includes('{lang}', { message: 'The output pattern must contain "{lang}".' }),
  poFilepath: z.string().min(1).optional(),
  mdWrapwidth: WrapWidthParameter.default(String(DEFAULT_WRAPWIDTH)),
  ignore: z.array(z.string()).default([]),
  xheader: z.boolean().default(false),
});
export type Md2po2mdCliArgs = z.infer<typeof Md2po2mdCliOptions>;

export const Mdpo2htmlCliOptions = z.object({
  ...SharedOptions,
  pofiles: z
    .array(z.string(), { required_error: 'At least one PO file is required (--pofiles).' })
    .min(1, 'At least one PO file is required (--pofiles).'),
  save: z.string().min(1).optional(),
});
export type Mdpo2htmlCliArgs = z.infer<typeof Mdpo2htmlCliOptions>;
