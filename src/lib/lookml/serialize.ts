// LookML text rendering for document nodes

import type { LookmlNode } from "./types";

const INDENT = "  ";

function quote(v: string): string {
  return `"${v.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

function renderNode(node: LookmlNode, depth: number): string[] {
  const pad = INDENT.repeat(depth);
  switch (node.kind) {
    case "value":
      return [`${pad}${node.key}: ${node.value}`];
    case "string":
      return [`${pad}${node.key}: ${quote(node.value)}`];
    case "sql":
      // Multi-line SQL keeps its own line breaks, indented under the key
      return `${pad}${node.key}: ${node.value.trim()} ;;`
        .split("\n")
        .map((line, i) => (i === 0 ? line : `${pad}${INDENT}${line.trim()}`));
    case "list":
      return [`${pad}${node.key}: [${node.values.join(", ")}]`];
    case "block": {
      const head = node.name ? `${node.key}: ${node.name}` : `${node.key}:`;
      return [`${pad}${head} {`, ...renderBody(node.body, depth + 1), `${pad}}`];
    }
  }
}

// Nested blocks are separated from whatever precedes them by a blank line
function renderBody(nodes: LookmlNode[], depth: number): string[] {
  const lines: string[] = [];
  nodes.forEach((node, i) => {
    if (node.kind === "block" && i > 0) lines.push("");
    lines.push(...renderNode(node, depth));
  });
  return lines;
}

export function serializeLookml(nodes: LookmlNode[]): string {
  return renderBody(nodes, 0).join("\n") + "\n";
}
