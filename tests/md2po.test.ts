import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Md2Po, md2po } from '../src/md2po.js';
import { loadCatalog, parseCatalog } from '../src/po/catalog.js';
import { UsageError } from '../src/errorHelpers.js';
import { createTempDir, type TempDir } from './harness.js';

function msgids(content: string, options: ConstructorParameters<typeof Md2Po>[0] = {}): string[] {
  return new Md2Po(options).extract({ content }).messages.map((message) => message.msgid);
}

describe('Md2Po', () => {
  it('extracts headings, paragraphs and list items in order', () => {
    const content = '# Hello *world*\n\nSome __bold__ text with `code`.\n\n- item one\n- item two\n';

    expect(msgids(content)).toEqual([
      'Hello *world*',
      'Some **bold** text with `code`.',
      'item one',
      'item two',
    ]);
  });

  it('extracts block quotes and table cells', () => {
    const content = '> Quoted\n\n| Name | Value |\n|------|-------|\n| one  | 1     |\n';
    expect(msgids(content)).toEqual(['Quoted', 'Name', 'Value', 'one', '1']);
  });

  it('escapes pipes in table cells', () => {
    expect(msgids('| a \\| b | c |\n|---|---|\n| 1 | 2 |\n')).toEqual(['a \\| b', 'c', '1', '2']);
  });

  it('adds link reference definitions after the document', () => {
    const content = '[Docs][docs]\n\n[docs]: https://example.com "Home"\n';

    expect(msgids(content)).toEqual([
      '[Docs](https://example.com "Home")',
      '[docs]: https://example.com "Home"',
    ]);
  });

  it('records file locations and merges duplicates', () => {
    const { messages } = new Md2Po().extract({ content: 'Same\n\nOther\n\nSame\n', filepath: 'a.md' });

    expect(messages).toEqual([
      { msgid: 'Same', references: ['a.md:1', 'a.md:5'] },
      { msgid: 'Other', references: ['a.md:3'] },
    ]);
  });

  it('leaves out locations when disabled', () => {
    const { messages } = new Md2Po({ location: false }).extract({ content: 'Text\n', filepath: 'a.md' });
    expect(messages).toEqual([{ msgid: 'Text', references: [] }]);
  });

  it('keeps messages with different contexts apart', () => {
    const { messages } = new Md2Po().extract({
      content: '<!-- mdpo-context menu -->\n\nOpen\n\nOpen\n',
    });

    expect(messages).toEqual([
      { msgid: 'Open', msgctxt: 'menu', references: [] },
      { msgid: 'Open', references: [] },
    ]);
  });

  it('applies disable and enable commands', () => {
    const content = [
      '<!-- mdpo-disable-next-line -->',
      '',
      'Skip me',
      '',
      'Keep me',
      '',
      '<!-- mdpo-disable -->',
      '',
      'A',
      '',
      '<!-- mdpo-enable-next-line -->',
      '',
      'B',
      '',
      'C',
      '',
      '<!-- mdpo-enable -->',
      '',
      'D',
      '',
    ].join('\n');

    expect(msgids(content)).toEqual(['Keep me', 'B', 'D']);
  });

  it('writes translator comments to the catalog', () => {
    const { catalog } = new Md2Po().extract({ content: '<!-- mdpo-translator Keep it short -->\n\nHi\n' });
    expect(catalog.items[0]?.comments).toEqual(['Keep it short']);
  });

  it('resolves command aliases', () => {
    const content = '<!-- skip -->\n\nHidden\n\nShown\n';
    expect(msgids(content, { commandAliases: { skip: 'disable-next-line' } })).toEqual(['Shown']);
  });

  it('extracts code blocks only when included', () => {
    const content = '```js\nconst a = 1;\n```\n\n<!-- mdpo-include-codeblock -->\n\n```\nx\n```\n';

    expect(msgids(content)).toEqual(['x']);
    expect(msgids(content, { includeCodeblocks: true })).toEqual(['const a = 1;', 'x']);
  });

  it('extracts plain text without markup', () => {
    expect(msgids('Some **bold** and [a link](https://example.com)\n', { plaintext: true })).toEqual([
      'Some bold and a link',
    ]);
  });

  it('skips ignored msgids', () => {
    expect(msgids('Skip\n\nKeep\n', { ignoreMsgids: ['Skip'] })).toEqual(['Keep']);
  });

  it('keeps escapes in msgids', () => {
    expect(msgids('Not \\*emphasis\\*\n')).toEqual(['Not \\*emphasis\\*']);
  });

  it('does not extract tables when the extension is off', () => {
    expect(msgids('| A |\n|---|\n| 1 |\n', { extensions: [] })).toEqual(['| A | |---| | 1 |']);
  });

  it('merges an existing catalog', () => {
    const existing = parseCatalog('msgid "Hello"\nmsgstr "Hola"\n\nmsgid "Old"\nmsgstr "Viejo"\n');
    const { catalog } = new Md2Po().extract({ content: 'Hello\n\nNew\n' }, existing);

    expect(catalog.items.map((item) => [item.msgid, item.msgstr[0] ?? ''])).toEqual([
      ['Hello', 'Hola'],
      ['New', ''],
    ]);
  });
});

describe('md2po', () => {
  let tmp: TempDir;

  beforeEach(async () => {
    tmp = await createTempDir();
  });

  afterEach(async () => {
    await tmp.cleanup();
  });

  it('extracts from every file matching a glob', async () => {
    const first = await tmp.write('docs/a.md', '# A\n');
    const second = await tmp.write('docs/b.md', '# B\n\nShared\n');
    await tmp.write('docs/skip.md', '# Skipped\n');

    const { messages } = await md2po(tmp.resolve('docs', '*.md'), {
      ignore: [tmp.resolve('docs', 'skip.md')],
    });

    expect(messages).toEqual([
      { msgid: 'A', references: [`${first}:1`] },
      { msgid: 'B', references: [`${second}:1`] },
      { msgid: 'Shared', references: [`${second}:3`] },
    ]);
  });

  it('takes input that matches no file as Markdown content', async () => {
    const { messages } = await md2po('# Just content');
    expect(messages).toEqual([{ msgid: 'Just content', references: [] }]);
  });

  it('saves into the existing catalog keeping its translations', async () => {
    const pofile = await tmp.write('es.po', 'msgid "Hello"\nmsgstr "Hola"\n');
    const doc = await tmp.write('doc.md', 'Hello\n\nWorld\n');

    await md2po(doc, { poFilepath: pofile, save: true, location: false });

    const saved = await loadCatalog(pofile);
    expect(saved.items.map((item) => [item.msgid, item.msgstr[0] ?? ''])).toEqual([
      ['Hello', 'Hola'],
      ['World', ''],
    ]);
  });

  it('requires a catalog path to save', async () => {
    await expect(md2po('Text', { save: true })).rejects.toBeInstanceOf(UsageError);
  });
});
