import { describe, it, expect } from "vitest";
import {
  EXIT_FAILURE,
  EXIT_SUCCESS,
  emitError,
  emitRecords,
  emitUsage,
  serializeRecords,
} from "../core/emitter";

function capture() {
  const out = { stdout: "", stderr: "" };
  const io = {
    stdout: { write: (s: string) => (out.stdout += s) },
    stderr: { write: (s: string) => (out.stderr += s) },
  };
  return { out, io };
}

describe("emitter", () => {
  it("should print an empty array for no records", () => {
    const { out, io } = capture();
    expect(emitRecords([], io)).toBe(EXIT_SUCCESS);
    expect(out.stdout).toBe("[]\n");
    expect(out.stderr).toBe("");
  });

  it("should indent records by two spaces", () => {
    const json = serializeRecords([
      {
        name: "f",
        signature: "def f():",
        body: "def f():\n    pass\n",
        start_line: 1,
        end_line: 2,
        imports: [],
        module: "m",
      },
    ]);
    expect(json.split("\n").slice(0, 3)).toEqual([
      "[",
      "  {",
      '    "name": "f",',
    ]);
  });

  it("should write errors as a JSON object on stderr", () => {
    const { out, io } = capture();
    expect(emitError("invalid syntax (m.py, line 1, column 1)", io)).toBe(
      EXIT_FAILURE
    );
    expect(out.stdout).toBe("");
    expect(out.stderr).toBe(
      '{"error":"invalid syntax (m.py, line 1, column 1)"}\n'
    );
  });

  it("should write usage as plain text", () => {
    const { out, io } = capture();
    expect(emitUsage("Usage: tool <file>", io)).toBe(EXIT_FAILURE);
    expect(out.stderr).toBe("Usage: tool <file>\n");
  });
});
