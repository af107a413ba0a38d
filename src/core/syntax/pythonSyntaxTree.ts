import Parser from "tree-sitter";
import Python from "tree-sitter-python";
import type {
  ImportedName,
  SyntaxNode,
  SyntaxTreeParser,
} from "../../types/types";
import { ParseError } from "../errors";

type TSNode = Parser.SyntaxNode;

function startLineOf(node: TSNode): number {
  return node.startPosition.row + 1;
}

// A node that ends at column 0 has consumed the previous line's newline.
function endLineOf(node: TSNode): number {
  const { row, column } = node.endPosition;
  return column === 0 && row > node.startPosition.row ? row : row + 1;
}

/**
 * Last line of a definition, ignoring comments that tree-sitter folds into
 * the end of a block. Follows the last non-comment child down to a token.
 */
function definitionEndLine(node: TSNode): number {
  let current = node;
  for (;;) {
    const rest = current.children.filter((child) => child.type !== "comment");
    const last = rest[rest.length - 1];
    if (!last) return endLineOf(current);
    current = last;
  }
}

function dottedName(node: TSNode): string {
  if (node.type !== "dotted_name") {
    return node.text;
  }
  return node.namedChildren.map((part) => part.text).join(".");
}

function importedName(node: TSNode): ImportedName {
  if (node.type === "aliased_import") {
    const name = node.childForFieldName("name");
    const alias = node.childForFieldName("alias");
    return {
      name: name ? dottedName(name) : node.text,
      ...(alias && { alias: alias.text }),
    };
  }
  return { name: dottedName(node) };
}

function importedNames(node: TSNode): ImportedName[] {
  const names = node.childrenForFieldName("name").map(importedName);
  if (node.namedChildren.some((child) => child.type === "wildcard_import")) {
    names.push({ name: "*" });
  }
  return names;
}

// Leading dots of a relative import are not part of the rendered module.
function fromModule(node: TSNode): string {
  const module = node.childForFieldName("module_name");
  if (!module) return "";
  if (module.type === "relative_import") {
    const target = module.namedChildren.find((c) => c.type === "dotted_name");
    return target ? dottedName(target) : "";
  }
  return dottedName(module);
}

function bodyStatements(node: TSNode): SyntaxNode[] {
  const body = node.childForFieldName("body");
  return body ? body.namedChildren.map(toSyntaxNode) : [];
}

function toSyntaxNode(node: TSNode): SyntaxNode {
  const span = { startLine: startLineOf(node), endLine: endLineOf(node) };

  switch (node.type) {
    case "decorated_definition": {
      const definition = node.childForFieldName("definition");
      if (definition) return toSyntaxNode(definition);
      break;
    }
    case "function_definition":
      return {
        kind: node.child(0)?.type === "async" ? "async_function" : "function",
        name: node.childForFieldName("name")?.text ?? "",
        startLine: span.startLine,
        endLine: definitionEndLine(node),
        children: bodyStatements(node),
      };
    case "class_definition":
      return {
        kind: "class",
        name: node.childForFieldName("name")?.text ?? "",
        startLine: span.startLine,
        endLine: definitionEndLine(node),
        children: bodyStatements(node),
      };
    case "import_statement":
      return { kind: "import", names: importedNames(node), ...span, children: [] };
    case "import_from_statement":
      return {
        kind: "import_from",
        module: fromModule(node),
        names: importedNames(node),
        ...span,
        children: [],
      };
    case "future_import_statement":
      return {
        kind: "import_from",
        module: "__future__",
        names: importedNames(node),
        ...span,
        children: [],
      };
  }

  return {
    kind: "other",
    type: node.type,
    ...span,
    children: node.namedChildren.map(toSyntaxNode),
  };
}

interface SyntaxProblem {
  node: TSNode;
  reason: string;
}

// Python 2 statements that the grammar still accepts.
const LEGACY_STATEMENTS = new Map([
  ["print_statement", "missing parentheses in call to 'print'"],
  ["exec_statement", "missing parentheses in call to 'exec'"],
]);

function findSyntaxProblem(node: TSNode): SyntaxProblem | null {
  if (node.type === "ERROR") return { node, reason: "invalid syntax" };
  if (node.isMissing) return { node, reason: `missing "${node.type}"` };
  const legacy = LEGACY_STATEMENTS.get(node.type);
  if (legacy) return { node, reason: legacy };

  for (const child of node.children) {
    const found = findSyntaxProblem(child);
    if (found) return found;
  }
  return null;
}

// A `\` with nothing after it continues into the end of the file.
function findDanglingContinuation(root: TSNode): SyntaxProblem | null {
  let last = root;
  while (last.lastChild) {
    last = last.lastChild;
  }
  return last.type === "line_continuation"
    ? { node: last, reason: "unexpected end of file after line continuation" }
    : null;
}

/**
 * Python syntax trees backed by tree-sitter. tree-sitter recovers from
 * errors instead of failing, so the first `ERROR` or missing node, a
 * Python 2 `print`/`exec` statement or a dangling line continuation is
 * turned into a {@link ParseError} here. Columns are tree-sitter's, which
 * count encoding units rather than characters on non-ASCII lines.
 */
export class PythonSyntaxTree implements SyntaxTreeParser {
  private parser: Parser;

  constructor() {
    this.parser = new Parser();
    this.parser.setLanguage(Python);
  }

  parse(text: string, filename: string): SyntaxNode {
    const tree = this.parser.parse(text, undefined, {
      bufferSize: text.length * 2 + 1,
    });
    const root = tree.rootNode;

    const problem = findSyntaxProblem(root) ?? findDanglingContinuation(root);
    if (problem) {
      const line = problem.node.startPosition.row + 1;
      const column = problem.node.startPosition.column + 1;
      throw new ParseError(
        `${problem.reason} (${filename}, line ${line}, column ${column})`,
        { line, column }
      );
    }

    return toSyntaxNode(root);
  }
}
