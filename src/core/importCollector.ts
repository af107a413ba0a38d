import type { ImportedName, SyntaxNode } from "../types/types";

function formatImportedName({ name, alias }: ImportedName): string {
  return alias ? `${name} as ${alias}` : name;
}

/**
 * Render one node as import lines. A plain import gives one line per name;
 * a from-import gives a single line. An empty module is kept as is, which
 * yields `from  import x`.
 */
export function renderImport(node: SyntaxNode): string[] {
  switch (node.kind) {
    case "import":
      return node.names.map((n) => `import ${formatImportedName(n)}`);
    case "import_from":
      return [
        `from ${node.module} import ${node.names
          .map(formatImportedName)
          .join(", ")}`,
      ];
    default:
      return [];
  }
}

/**
 * Every import in the tree, at any depth, in document order.
 */
export function collectImports(root: SyntaxNode): string[] {
  const imports: string[] = [];

  const visit = (node: SyntaxNode): void => {
    imports.push(...renderImport(node));
    node.children.forEach(visit);
  };
  visit(root);

  return imports;
}
