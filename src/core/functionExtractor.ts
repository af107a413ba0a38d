import type { FunctionNode, SyntaxNode } from "../types/types";
import { sliceBody, sliceSignature } from "./signatureSlicer";

export interface ExtractedFunction {
  name: string;
  signature: string;
  body: string;
  startLine: number;
  endLine: number;
}

export function isFunctionNode(node: SyntaxNode): node is FunctionNode {
  return node.kind === "function" || node.kind === "async_function";
}

function describeFunction(
  node: FunctionNode,
  lines: readonly string[],
  className?: string
): ExtractedFunction {
  const startLine = node.startLine;
  const endLine = node.endLine ?? node.startLine;

  return {
    name: className ? `${className}.${node.name}` : node.name,
    signature: sliceSignature(lines, startLine, endLine),
    body: sliceBody(lines, startLine, endLine),
    startLine,
    endLine,
  };
}

/**
 * Functions declared directly in the module and methods declared directly in
 * a module-level class, in source order. Only those two levels are looked at:
 * nested functions and nested classes never show up here.
 */
export function extractFunctions(
  root: SyntaxNode,
  lines: readonly string[]
): ExtractedFunction[] {
  const found: ExtractedFunction[] = [];

  for (const child of root.children) {
    if (isFunctionNode(child)) {
      found.push(describeFunction(child, lines));
    } else if (child.kind === "class") {
      for (const member of child.children) {
        if (isFunctionNode(member)) {
          found.push(describeFunction(member, lines, child.name));
        }
      }
    }
  }

  return found;
}
