/**
 * Tree Printer - Renders the walked hierarchy with box-drawing connectors.
 * Directories carry a trailing slash.
 */

import type { TreeNode } from './walker.js';

/**
 * One line per node, root label first. No trailing newline.
 */
export function renderTree(root: TreeNode, rootLabel: string = root.entry.name): string {
  const lines: string[] = [`${rootLabel}/`];
  for (const line of treeHelper(root, '')) {
    lines.push(line);
  }
  return lines.join('\n');
}

function* treeHelper(node: TreeNode, prefix: string): Generator<string> {
  const children = node.children;

  for (let i = 0; i < children.length; i++) {
    const child = children[i];
    const isLast = i === children.length - 1;
    const connector = isLast ? '└── ' : '├── ';
    const childPrefix = isLast ? '    ' : '│   ';

    yield `${prefix}${connector}${child.entry.name}${child.entry.isDirectory ? '/' : ''}`;

    if (child.entry.isDirectory) {
      yield* treeHelper(child, `${prefix}${childPrefix}`);
    }
  }
}
