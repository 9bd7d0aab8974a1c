import { describe, it, expect } from 'vitest';
import {
  escapeLinkTitle,
  linkReferenceToMsgid,
  parseLinkReferences,
  referencesEnvFromMessages,
} from '../src/markdown/linkReferences.js';
import { createMarkdownParser, parseMarkdown } from '../src/markdown/parser.js';

describe('parseLinkReferences', () => {
  it('finds definitions with their titles, first one per label', () => {
    const content = ["[a]: /x 'Single'", '[b]: <https://example.com/b> (Paren)', '[A]: /y', '[c]: /z'].join('\n');

    expect(parseLinkReferences(content)).toEqual([
      { label: 'a', href: '/x', title: 'Single', line: 1 },
      { label: 'b', href: 'https://example.com/b', title: 'Paren', line: 2 },
      { label: 'c', href: '/z', line: 4 },
    ]);
  });

  it('leaves out look-alikes markdown-it did not register', () => {
    const document = parseMarkdown(createMarkdownParser(), '```\n[a]: /x\n```\n');
    expect(document.references).toEqual([]);
  });
});

describe('linkReferenceToMsgid', () => {
  it('writes the title between double quotes', () => {
    expect(linkReferenceToMsgid({ label: 'a', href: '/x', title: 'Say "hi"', line: 1 })).toBe(
      '[a]: /x "Say \\"hi\\""'
    );
    expect(linkReferenceToMsgid({ label: 'a', href: '/x', line: 1 })).toBe('[a]: /x');
  });
});

describe('escapeLinkTitle', () => {
  it('does not escape quotes twice', () => {
    expect(escapeLinkTitle('a \\" b "c"')).toBe('a \\" b \\"c\\"');
  });
});

describe('referencesEnvFromMessages', () => {
  it('keys definitions the way markdown-it does', () => {
    const env = referencesEnvFromMessages(['[Docs  Page]: /es "T"', 'not a definition']);
    expect(env).toEqual({ references: { 'DOCS PAGE': { href: '/es', title: 'T' } } });
  });
});
