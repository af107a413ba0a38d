import { describe, it, expect } from "vitest";
import { collectImports, renderImport } from "../core/importCollector";
import { fn, fromImp, imp, other, root } from "./fakeTree";

describe("renderImport", () => {
  it("should emit one line per plainly imported name", () => {
    const node = imp(1, { name: "os.path", alias: "osp" }, { name: "sys" });
    expect(renderImport(node)).toEqual(["import os.path as osp", "import sys"]);
  });

  it("should join from-import names into one line", () => {
    const node = fromImp(
      1,
      "typing",
      { name: "List" },
      { name: "Optional", alias: "Opt" }
    );
    expect(renderImport(node)).toEqual([
      "from typing import List, Optional as Opt",
    ]);
  });

  it("should keep an empty module verbatim", () => {
    expect(renderImport(fromImp(1, "", { name: "sibling" }))).toEqual([
      "from  import sibling",
    ]);
  });

  it("should render nothing for other nodes", () => {
    expect(renderImport(fn("f", 1, 2))).toEqual([]);
  });
});

describe("collectImports", () => {
  it("should return nothing for a tree without imports", () => {
    expect(collectImports(root(fn("f", 1, 2)))).toEqual([]);
  });

  it("should find imports at any depth in document order", () => {
    const tree = root(
      imp(1, { name: "os" }),
      fn("load", 3, 6, [
        imp(4, { name: "json" }),
        other("if_statement", 5, 6, [
          fromImp(6, "pathlib", { name: "Path" }),
        ]),
      ]),
      fromImp(8, "typing", { name: "Any" })
    );

    expect(collectImports(tree)).toEqual([
      "import os",
      "import json",
      "from pathlib import Path",
      "from typing import Any",
    ]);
  });
});
