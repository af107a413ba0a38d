import { Command, CommanderError } from "commander";
import { c, createLogger } from "../constants/log";
import {
  emitError,
  emitRecords,
  emitUsage,
  type OutputStreams,
} from "../core/emitter";
import { ExtractionError, UsageError } from "../core/errors";
import { filterByLineRanges, parseLineRanges } from "../core/lineRanges";
import { ParserRegistry } from "../core/parserRegistry";
import { PythonParser } from "../core/processors/pyParser";
import { readSourceFile } from "../core/sourceReader";

export const TOOL_NAME = "py-func-extract";
export const VERSION = "0.1.0";
export const USAGE = `Usage: ${TOOL_NAME} <file_path>`;

interface CliOptions {
  verbose: boolean;
  lines?: string;
}

ParserRegistry.registerParser(new PythonParser(), { isDefault: true });

const processStreams: OutputStreams = {
  stdout: process.stdout,
  stderr: process.stderr,
};

function extractFile(
  filePath: string,
  options: CliOptions,
  io: OutputStreams
): number {
  const logger = createLogger(io.stderr, options.verbose);

  try {
    const ranges =
      options.lines === undefined ? undefined : parseLineRanges(options.lines);

    const parser = ParserRegistry.getParserForFile(filePath);
    if (!parser) {
      throw new Error(`No parser registered for ${filePath}`);
    }

    const source = readSourceFile(filePath);
    logger.info(
      `Parsing ${c.bold(filePath)} ${c.dim(
        `(${parser.getLanguageId()}, ${source.lines.length} lines)`
      )}`
    );

    let records = parser.extractRecords(source);
    if (ranges) {
      records = filterByLineRanges(records, ranges);
    }

    logger.ok(
      `${records.length} function${records.length === 1 ? "" : "s"} extracted`
    );
    return emitRecords(records, io);
  } catch (error) {
    if (error instanceof UsageError) {
      return emitUsage(error.message, io);
    }
    if (error instanceof ExtractionError) {
      logger.fail(error.message);
      return emitError(error.message, io);
    }
    throw error;
  }
}

export function createProgram(
  io: OutputStreams,
  onExit: (code: number) => void
): Command {
  const program = new Command();

  program
    .name(TOOL_NAME)
    .description(
      "Extract function and method metadata from a Python source file as JSON"
    )
    .version(VERSION)
    .argument("[paths...]", "Python source file to scan (exactly one)")
    .option("-v, --verbose", "Log progress to stderr", false)
    .option(
      "-l, --lines <ranges>",
      "Only emit functions overlapping these lines, e.g. 10-20,42"
    )
    .exitOverride()
    .configureOutput({
      writeOut: (s) => io.stdout.write(s),
      writeErr: (s) => io.stderr.write(s),
    })
    .action((paths: string[], options: CliOptions) => {
      const [filePath] = paths;
      if (paths.length !== 1 || filePath === undefined) {
        onExit(emitUsage(USAGE, io));
        return;
      }
      onExit(extractFile(filePath, options, io));
    });

  return program;
}

/**
 * Run the CLI against user arguments (without the node/script prefix) and
 * return the process exit code.
 */
export function runCli(
  argv: string[],
  io: OutputStreams = processStreams
): number {
  let exitCode = 0;
  const program = createProgram(io, (code) => {
    exitCode = code;
  });

  try {
    program.parse(argv, { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  return exitCode;
}
