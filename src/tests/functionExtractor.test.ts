import { describe, it, expect } from "vitest";
import { extractFunctions } from "../core/functionExtractor";
import { splitLines } from "../core/sourceReader";
import { asyncFn, cls, fn, imp, other, root } from "./fakeTree";

const code = `import os

def top(a):
    def inner():
        pass
    return a

class Box:
    size = 1
    async def fill(self,
                   item):  # add
        return item

    class Inner:
        def hidden(self):
            pass
`;

const lines = splitLines(code);

const tree = root(
  imp(1, { name: "os" }),
  fn("top", 3, 6, [fn("inner", 4, 5), other("return_statement", 6, 6)]),
  cls("Box", 8, 16, [
    other("expression_statement", 9, 9),
    asyncFn("fill", 10, 12, [other("return_statement", 12, 12)]),
    cls("Inner", 14, 16, [fn("hidden", 15, 16)]),
  ])
);

describe("extractFunctions", () => {
  it("should extract root functions and class methods in source order", () => {
    expect(extractFunctions(tree, lines)).toEqual([
      {
        name: "top",
        signature: "def top(a):",
        body: "def top(a):\n    def inner():\n        pass\n    return a\n",
        startLine: 3,
        endLine: 6,
      },
      {
        name: "Box.fill",
        signature: "    async def fill(self,\n                   item):",
        body:
          "    async def fill(self,\n                   item):  # add\n        return item\n",
        startLine: 10,
        endLine: 12,
      },
    ]);
  });

  it("should skip nested functions and nested classes", () => {
    const names = extractFunctions(tree, lines).map((f) => f.name);
    expect(names).not.toContain("inner");
    expect(names).not.toContain("top.inner");
    expect(names).not.toContain("Box.Inner.hidden");
    expect(names).not.toContain("Inner.hidden");
  });

  it("should return nothing when there are no functions", () => {
    expect(extractFunctions(root(imp(1, { name: "os" })), lines)).toEqual([]);
  });

  it("should use the start line when the end line is unknown", () => {
    const oneLine = splitLines("def f(): return 1\nx = 2\n");
    const node = { kind: "function" as const, name: "f", startLine: 1, children: [] };

    expect(extractFunctions(root(node), oneLine)).toEqual([
      {
        name: "f",
        signature: "def f(): return 1",
        body: "def f(): return 1\n",
        startLine: 1,
        endLine: 1,
      },
    ]);
  });
});
