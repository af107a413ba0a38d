import type {
  SourceFile,
  SyntaxNode,
  SyntaxTreeParser,
} from "../../types/types";
import { collectImports } from "../importCollector";
import { PYTHON_EXTENSIONS } from "../moduleNamer";
import { PythonSyntaxTree } from "../syntax/pythonSyntaxTree";
import { BaseParser } from "./baseParser";

export class PythonParser extends BaseParser {
  extensions = [...PYTHON_EXTENSIONS];

  // The tree is injectable so extraction can run against hand-built trees.
  constructor(private readonly tree: SyntaxTreeParser = new PythonSyntaxTree()) {
    super();
  }

  protected parseTree(source: SourceFile): SyntaxNode {
    return this.tree.parse(source.text, source.path);
  }

  protected collectImports(root: SyntaxNode): string[] {
    return collectImports(root);
  }

  getLanguageId(): string {
    return "python";
  }
}
