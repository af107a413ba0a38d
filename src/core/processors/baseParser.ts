import type {
  FunctionRecord,
  LanguageProcessor,
  SourceFile,
  SyntaxNode,
} from "../../types/types";
import { extractFunctions } from "../functionExtractor";
import { deriveModuleName } from "../moduleNamer";

export abstract class BaseParser implements LanguageProcessor {
  abstract extensions: string[];

  /**
   * Parse the file and build one record per extracted function. Every record
   * shares the same `imports` and `module` values.
   */
  extractRecords(source: SourceFile): FunctionRecord[] {
    const root = this.parseTree(source);
    const imports = this.collectImports(root);
    const module = deriveModuleName(source.path, this.extensions);

    return extractFunctions(root, source.lines).map((fn) => ({
      name: fn.name,
      signature: fn.signature,
      body: fn.body,
      start_line: fn.startLine,
      end_line: fn.endLine,
      imports,
      module,
    }));
  }

  /**
   * Parse the whole file. Throws `ParseError` on invalid syntax.
   */
  protected abstract parseTree(source: SourceFile): SyntaxNode;

  /**
   * Render the file's import statements, one normalized line each.
   */
  protected abstract collectImports(root: SyntaxNode): string[];

  /**
   * Name used in log output (e.g. 'python').
   */
  abstract getLanguageId(): string;
}
