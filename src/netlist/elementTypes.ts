import type { ElementCategory } from "../types.js";

export type ElementType = readonly [category: ElementCategory, ports: readonly string[]];

const TWO_TERMINAL = ["n+", "n-"] as const;
const CONTROLLED = ["n+", "n-", "nc+", "nc-"] as const;
const THREE_NODE = ["n1", "n2", "n3"] as const;
const FOUR_NODE = ["n1", "n2", "n3", "n4"] as const;

/**
 * Leading-letter classification of netlist lines. An empty port list means the
 * element has no fixed ports and everything after the instance name is args.
 */
export const ELEMENT_TYPES = {
  "*": ["comment", []],
  ".": ["statement", []],
  A: ["xspice", []],
  B: ["behavioral source", TWO_TERMINAL],
  C: ["capacitor", TWO_TERMINAL],
  D: ["diode", TWO_TERMINAL],
  E: ["vcvs", CONTROLLED],
  F: ["cccs", TWO_TERMINAL],
  G: ["vccs", CONTROLLED],
  H: ["ccvs", TWO_TERMINAL],
  I: ["isource", TWO_TERMINAL],
  J: ["jfet", THREE_NODE],
  K: ["coupled inductor", []],
  L: ["inductor", TWO_TERMINAL],
  M: ["mosfet", FOUR_NODE],
  N: ["numerical device gss", []],
  O: ["lossy transmission line", FOUR_NODE],
  P: ["coupled multiconductor line", []],
  Q: ["bjt", FOUR_NODE],
  R: ["resistor", TWO_TERMINAL],
  S: ["vcsw", CONTROLLED],
  T: ["lossless transmission line", FOUR_NODE],
  U: ["uniformely distributed rc line", THREE_NODE],
  V: ["vsource", TWO_TERMINAL],
  W: ["icsw", TWO_TERMINAL],
  X: ["subcircuit", []],
  XC: ["capacitor", ["n1", "n2"]],
  XM: ["mosfet", FOUR_NODE],
  Y: ["single lossy transmission line", FOUR_NODE],
  Z: ["mesfet", THREE_NODE],
} as const satisfies Record<string, ElementType>;

export type ElementTypeKey = keyof typeof ELEMENT_TYPES;

// Subcircuit-wrapped devices (PDK style `xm1 ...`) get their own entries.
const TWO_LETTER_PREFIXES = new Set(["XM", "XC"]);

function isElementTypeKey(key: string): key is ElementTypeKey {
  return Object.prototype.hasOwnProperty.call(ELEMENT_TYPES, key);
}

/** Returns the type-table key for a line, or undefined when its prefix is unknown. */
export function identifyLineType(line: string): ElementTypeKey | undefined {
  const head = line.trimStart().slice(0, 2).toUpperCase();
  const key = TWO_LETTER_PREFIXES.has(head) ? head : head.slice(0, 1);
  return isElementTypeKey(key) ? key : undefined;
}

export function elementType(key: ElementTypeKey): ElementType {
  return ELEMENT_TYPES[key];
}

/**
 * Maps the tokens following the instance name onto the element's port roles.
 * A short line fills only the leading roles; a `key=value` token ends the
 * ports, since no node name contains `=`.
 */
export function resolvePorts(tokens: readonly string[], key: ElementTypeKey): Record<string, string> {
  const roles = elementType(key)[1];
  const ports: Record<string, string> = {};
  for (const [i, role] of roles.entries()) {
    const node = tokens[i + 1];
    if (node === undefined || node.includes("=")) break;
    ports[role] = node;
  }
  return ports;
}
