import path from "path";
import type { Logger } from "../constants/log";
import { BaseParser } from "./processors/baseParser";

/**
 * Maps file extensions to language parsers. A parser registered as the
 * default also handles files whose extension nobody claims.
 *
 * @example
 * ParserRegistry.registerParser(new PythonParser(), { isDefault: true });
 * const parser = ParserRegistry.getParserForFile("pkg/widget.py");
 */
export class ParserRegistry {
  private static extensionToParserMap = new Map<string, BaseParser>();
  private static defaultParser: BaseParser | undefined;

  static registerParser(
    parser: BaseParser,
    options: { isDefault?: boolean; logger?: Logger } = {}
  ): void {
    parser.extensions.forEach((ext) => {
      if (this.extensionToParserMap.has(ext)) {
        options.logger?.warn(`Overwriting parser for extension '${ext}'`);
      }
      this.extensionToParserMap.set(ext, parser);
    });
    if (options.isDefault) {
      this.defaultParser = parser;
    }
  }

  static clearParsers(): void {
    this.extensionToParserMap.clear();
    this.defaultParser = undefined;
  }

  static getParserForFile(filePath: string): BaseParser | undefined {
    const ext = path.extname(filePath);
    return this.extensionToParserMap.get(ext) ?? this.defaultParser;
  }
}
