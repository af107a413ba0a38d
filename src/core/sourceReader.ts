import fs from "fs";
import type { SourceFile } from "../types/types";
import { SourceReadError } from "./errors";

const BOM = "\uFEFF";

/**
 * Split text into lines, keeping each line's terminator so that joining any
 * contiguous slice gives back the original text. `\r\n` stays in one line.
 */
export function splitLines(text: string): string[] {
  return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

export function createSourceFile(path: string, text: string): SourceFile {
  const normalized = text.startsWith(BOM) ? text.slice(BOM.length) : text;
  return { path, text: normalized, lines: splitLines(normalized) };
}

/**
 * Read a source file from disk as UTF-8.
 */
export function readSourceFile(path: string): SourceFile {
  let text: string;
  try {
    text = fs.readFileSync(path, "utf8");
  } catch (error) {
    throw new SourceReadError(path, error);
  }
  return createSourceFile(path, text);
}
