import type { FunctionRecord, OutputStream } from "../types/types";

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

export interface OutputStreams {
  stdout: OutputStream;
  stderr: OutputStream;
}

export function serializeRecords(records: FunctionRecord[]): string {
  return JSON.stringify(records, null, 2);
}

export function emitRecords(
  records: FunctionRecord[],
  io: OutputStreams
): number {
  io.stdout.write(`${serializeRecords(records)}\n`);
  return EXIT_SUCCESS;
}

export function emitError(message: string, io: OutputStreams): number {
  io.stderr.write(`${JSON.stringify({ error: message })}\n`);
  return EXIT_FAILURE;
}

export function emitUsage(usage: string, io: OutputStreams): number {
  io.stderr.write(`${usage}\n`);
  return EXIT_FAILURE;
}
