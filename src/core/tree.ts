import type { DirectoryNode } from "./types.js";

function makeNode(path: string, depth: number): DirectoryNode {
  const name = path === "" ? "" : path.slice(path.lastIndexOf("/") + 1);
  return { path, name, depth, directories: [], files: [], tag: null };
}

function sortTree(node: DirectoryNode): void {
  node.files.sort();
  node.directories.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const child of node.directories) sortTree(child);
}

/** Builds the directory tree for a set of repository-relative file paths. */
export function buildTree(filePaths: Iterable<string>): DirectoryNode {
  const root = makeNode("", 0);
  const nodes = new Map<string, DirectoryNode>([["", root]]);

  for (const filePath of filePaths) {
    const segments = filePath.split("/");
    let parent = root;
    for (let i = 0; i < segments.length - 1; i++) {
      const dirPath = segments.slice(0, i + 1).join("/");
      let node = nodes.get(dirPath);
      if (!node) {
        node = makeNode(dirPath, i + 1);
        nodes.set(dirPath, node);
        parent.directories.push(node);
      }
      parent = node;
    }
    parent.files.push(filePath);
  }

  sortTree(root);
  return root;
}

/**
 * Groups directories by depth, deepest first, so that every directory is
 * visited after all of its subdirectories. The root comes last.
 */
export function directoriesBottomUp(root: DirectoryNode): DirectoryNode[][] {
  const byDepth: DirectoryNode[][] = [];
  const visit = (node: DirectoryNode): void => {
    (byDepth[node.depth] ??= []).push(node);
    for (const child of node.directories) visit(child);
  };
  visit(root);
  return byDepth.reverse().filter((level) => level.length > 0);
}

/** Bottom-up fold: children are always combined before their parent. */
export function foldTree<T>(
  node: DirectoryNode,
  leaf: (filePath: string) => T,
  combine: (dir: DirectoryNode, children: T[]) => T,
): T {
  const childValues = [
    ...node.directories.map((dir) => foldTree(dir, leaf, combine)),
    ...node.files.map((file) => leaf(file)),
  ];
  return combine(node, childValues);
}

/** Indented outline of the directories down to `maxDepth`, each with its tag. */
export function renderTree(root: DirectoryNode, maxDepth: number): string[] {
  return foldTree<string[]>(
    root,
    () => [],
    (dir, children) => {
      if (dir.depth > maxDepth) return [];
      const label = dir.path === "" ? "." : `${"  ".repeat(dir.depth)}${dir.name}/`;
      return [dir.tag ? `${label}  ${dir.tag}` : label, ...children.flat()];
    },
  );
}
