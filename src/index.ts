export type {
  FunctionRecord,
  ImportedName,
  LanguageProcessor,
  LineRange,
  SourceFile,
  SyntaxNode,
  SyntaxTreeParser,
} from "./types/types";
export { ExtractionError, ParseError, SourceReadError, UsageError } from "./core/errors";
export { createSourceFile, readSourceFile, splitLines } from "./core/sourceReader";
export { collectImports, renderImport } from "./core/importCollector";
export { extractFunctions } from "./core/functionExtractor";
export { sliceBody, sliceSignature, stripLineComment } from "./core/signatureSlicer";
export { deriveModuleName, PYTHON_EXTENSIONS } from "./core/moduleNamer";
export { filterByLineRanges, parseLineRanges } from "./core/lineRanges";
export { serializeRecords } from "./core/emitter";
export { PythonSyntaxTree } from "./core/syntax/pythonSyntaxTree";
export { BaseParser } from "./core/processors/baseParser";
export { PythonParser } from "./core/processors/pyParser";
export { runCli } from "./cli/index";
