/**
 * BlockTree - Folds markdown-it's flat block token stream into a tree
 *
 * markdown-it emits `*_open` / `*_close` pairs with `nesting` set to 1 / -1
 * and leaf tokens (fences, HTML blocks, rules) with `nesting` 0. Inline
 * tokens are attached to the block that opened them.
 */

import { BLOCK_KINDS, type BlockKind, type BlockNode, type Token } from './types.js';

const blockKinds: ReadonlySet<string> = new Set(BLOCK_KINDS);

function isBlockKind(value: string): value is BlockKind {
  return blockKinds.has(value);
}

export function buildBlockTree(tokens: Token[]): BlockNode[] {
  const root: BlockNode[] = [];
  // Entries are null for container tokens of unknown kinds
  const stack: (BlockNode | null)[] = [];

  const currentNode = (): BlockNode | undefined => {
    for (let i = stack.length - 1; i >= 0; i--) {
      const node = stack[i];
      if (node) return node;
    }
    return undefined;
  };

  for (const token of tokens) {
    const parent = currentNode();

    if (token.type === 'inline') {
      if (parent) parent.inline = token;
      continue;
    }

    if (token.nesting === -1) {
      stack.pop();
      continue;
    }

    const kind = token.type.replace(/_open$/, '');
    const node: BlockNode | null = isBlockKind(kind)
      ? {
          kind,
          token,
          children: [],
          line: token.map ? token.map[0] + 1 : (parent?.line ?? 1),
        }
      : null;

    if (node) {
      (parent ? parent.children : root).push(node);
    }
    if (token.nesting === 1) {
      stack.push(node);
    }
  }

  return root;
}

/**
 * Whether a list renders its items without blank lines between them.
 * markdown-it hides the paragraphs of tight lists.
 */
export function isTightList(list: BlockNode): boolean {
  return !list.children.some((item) =>
    item.children.some((child) => child.kind === 'paragraph' && !child.token.hidden)
  );
}
