import type { Element } from "../types.js";

const sanitize = (s: string) => s.replace(/[^a-zA-Z0-9_]/g, "_");

// Node 0 is the global ground; every other node is local to its subcircuit.
const netKey = (e: Element, node: string) => (node === "0" ? node : `${e.location}/${node}`);

/**
 * Bipartite connectivity graph: nets (ellipses) and elements with ports
 * (boxes). Elements inside subcircuits are prefixed with their location so
 * equally named instances in different definitions stay distinct.
 */
export function circuitToDot(elements: Iterable<Element>): string {
  const wired = Array.from(elements).filter((e) => Object.keys(e.ports).length > 0);

  const nets = new Set<string>();
  for (const e of wired) for (const n of Object.values(e.ports)) nets.add(netKey(e, n));

  const compId = (e: Element) => `comp_${sanitize(`${e.location}/${e.instance}`)}`;

  let dot = "digraph G {\n";
  dot += "  rankdir=LR;\n";
  dot += "  graph [splines=true, overlap=false];\n";
  dot += "  node  [fontsize=10];\n\n";

  dot += "  // Nets\n";
  for (const n of nets) {
    dot += `  net_${sanitize(n)} [label="${n.slice(n.lastIndexOf("/") + 1)}", shape=ellipse];\n`;
  }
  dot += "\n  // Elements\n";
  for (const e of wired) {
    dot += `  ${compId(e)} [label="${e.instance}", shape=box];\n`;
  }

  dot += "\n  // Edges from nets to elements, labelled with the port role\n";
  for (const e of wired) {
    for (const [role, n] of Object.entries(e.ports)) {
      dot += `  net_${sanitize(netKey(e, n))} -> ${compId(e)} [label="${role}"];\n`;
    }
  }

  dot += "}\n";
  return dot;
}
