import type { Element } from "../types.js";

export function elementToLine(element: Element): string {
  return [element.instance, ...Object.values(element.ports), ...element.args].join(" ").trim();
}

/**
 * Reverse of parseNetlist: renders elements back into netlist text, headed by
 * a comment naming the source. A blank line follows each `.ends`.
 */
export function synthesize(elements: Iterable<Element>, title: string): string {
  let netlist = `* ${title}\n\n`;
  for (const element of elements) {
    netlist += `${elementToLine(element)}\n`;
    if (element.instance === ".ends") netlist += "\n";
  }
  return netlist;
}
