import { createHash } from "node:crypto";
import type { Circuit, Element } from "../types.js";
import { elementType, identifyLineType, resolvePorts } from "./elementTypes.js";
import { DuplicateIdentifierError, NetlistParseError, UnbalancedHierarchyError, UnknownElementTypeError } from "./errors.js";

export const ROOT_FRAME = "root";

const SKIP_RE = /^$|^\.end$|^\*/;
const CONTROL_RE = /^\.control\b/;
const ENDC_RE = /^\.endc\b/;
const SUBCKT_RE = /^\.subckt\b/;
const ENDS_RE = /^\.ends\b/;

export type ParsedLine = { id: string; element: Element };

/** Content hash of a line and its position; stable for identical input. */
export function elementId(lineIndex: number | string, line: string): string {
  return createHash("md5").update(`${lineIndex}${line}`).digest("hex");
}

/**
 * Classifies one normalized line. The hierarchy is only read here; pushing and
 * popping `.subckt`/`.ends` frames is up to the caller.
 *
 * Ports are taken from as many tokens as are present, up to the element's
 * arity, so short forms such as `e1 out 0 vol='...'` still parse.
 */
export function parseLine(line: string, lineIndex: number, hierarchy: readonly string[] = [ROOT_FRAME]): ParsedLine {
  const key = identifyLineType(line);
  if (!key) throw new UnknownElementTypeError(lineIndex, line);

  const tokens = line.trim().split(/\s+/);
  const [category] = elementType(key);
  const ports = resolvePorts(tokens, key);

  return {
    id: elementId(lineIndex, line),
    element: {
      instance: tokens[0],
      category,
      ports,
      location: hierarchy.join("/"),
      args: tokens.slice(Object.keys(ports).length + 1),
    },
  };
}

/**
 * Parses normalized netlist text into elements keyed by identifier, in source
 * order. Control sections (`.control` .. `.endc`) are skipped entirely.
 */
export function parseNetlist(netlist: string | readonly string[]): Circuit {
  const lines = typeof netlist === "string" ? netlist.split("\n") : netlist;
  const elements: Circuit = new Map();
  const hierarchy = [ROOT_FRAME];
  let inControl = false;

  lines.forEach((raw, i) => {
    const line = raw.trim();
    if (SKIP_RE.test(line)) return;

    if (inControl || CONTROL_RE.test(line)) {
      inControl = !ENDC_RE.test(line);
      return;
    }

    if (SUBCKT_RE.test(line)) {
      const name = line.split(/\s+/)[1];
      if (!name) throw new NetlistParseError("Subcircuit definition without a name", i, line);
      hierarchy.push(name);
    }

    const isEnds = ENDS_RE.test(line);
    if (isEnds && hierarchy.length <= 1) throw new UnbalancedHierarchyError(i, line);

    const { id, element } = parseLine(line, i, hierarchy);
    if (elements.has(id)) throw new DuplicateIdentifierError(id, i, line);
    elements.set(id, element);

    if (isEnds) hierarchy.pop();
  });

  return elements;
}
