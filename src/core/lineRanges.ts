import type { FunctionRecord, LineRange } from "../types/types";
import { UsageError } from "./errors";

/**
 * Parse `--lines` input such as `12,40-55`. Each piece is a single line or an
 * inclusive `start-end` pair with `1 <= start <= end`.
 */
export function parseLineRanges(value: string): LineRange[] {
  return value
    .split(",")
    .map((piece) => piece.trim())
    .filter(Boolean)
    .map((piece) => {
      const match = piece.match(/^(\d+)(?:-(\d+))?$/);
      if (!match) {
        throw new UsageError(`invalid line range "${piece}"`);
      }
      const start = Number(match[1]);
      const end = match[2] === undefined ? start : Number(match[2]);
      if (start < 1 || end < start) {
        throw new UsageError(`invalid line range "${piece}"`);
      }
      return { start, end };
    });
}

export function overlaps(record: FunctionRecord, range: LineRange): boolean {
  return range.end >= record.start_line && range.start <= record.end_line;
}

export function filterByLineRanges(
  records: FunctionRecord[],
  ranges: LineRange[]
): FunctionRecord[] {
  return records.filter((record) =>
    ranges.some((range) => overlaps(record, range))
  );
}
