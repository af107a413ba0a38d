export interface FunctionRecord {
  name: string;
  signature: string;
  body: string;
  start_line: number;
  end_line: number;
  imports: string[];
  module: string;
}

export interface SourceFile {
  path: string;
  text: string;
  lines: readonly string[]; // terminators retained
}

export interface ImportedName {
  name: string;
  alias?: string;
}

export interface NodeSpan {
  startLine: number;
  endLine?: number;
  children: readonly SyntaxNode[];
}

export interface FunctionNode extends NodeSpan {
  kind: "function" | "async_function";
  name: string;
}

export interface ClassNode extends NodeSpan {
  kind: "class";
  name: string;
}

export interface ImportNode extends NodeSpan {
  kind: "import";
  names: ImportedName[];
}

export interface ImportFromNode extends NodeSpan {
  kind: "import_from";
  module: string;
  names: ImportedName[];
}

export interface OtherNode extends NodeSpan {
  kind: "other";
  type: string;
}

export type SyntaxNode =
  | FunctionNode
  | ClassNode
  | ImportNode
  | ImportFromNode
  | OtherNode;

/**
 * Turns source text into a tree of {@link SyntaxNode}s.
 * Implementations throw `ParseError` when the text is not valid.
 */
export interface SyntaxTreeParser {
  parse(text: string, filename: string): SyntaxNode;
}

export interface LanguageProcessor {
  extensions: string[];
  extractRecords(source: SourceFile): FunctionRecord[];
}

export interface LineRange {
  start: number;
  end: number;
}

export interface OutputStream {
  write(chunk: string): unknown;
}
