import type { Criterion, Element, FilterCriteria, MatchField, Pattern } from "../types.js";

const MATCH_FIELDS: readonly MatchField[] = ["instance", "category", "location", "ports"];

function isMatchField(key: string): key is MatchField {
  return (MATCH_FIELDS as readonly string[]).includes(key);
}

function isCriterion(criteria: FilterCriteria): criteria is Criterion {
  return Array.isArray(criteria) && criteria.length === 2 && typeof criteria[0] === "string";
}

function isCriterionList(criteria: FilterCriteria): criteria is readonly Criterion[] {
  return Array.isArray(criteria);
}

/**
 * Collapses the accepted criteria shapes into one ordered list of pairs:
 *
 *   ["instance", "xr.*"]
 *   [["instance", "xr.*"], ["category", "subc.*"]]
 *   { instance: "xr.*", category: "subc.*" }
 */
export function normalizeCriteria(criteria: FilterCriteria): Criterion[] {
  if (isCriterion(criteria)) return [criteria];
  if (isCriterionList(criteria)) return [...criteria];

  const out: Criterion[] = [];
  for (const [field, pattern] of Object.entries(criteria)) {
    if (!isMatchField(field)) throw new Error(`Unknown filter field: ${field}`);
    if (pattern !== undefined) out.push([field, pattern]);
  }
  return out;
}

/** Anchors a pattern so it must match the whole field value. */
export function compilePattern(pattern: Pattern): RegExp {
  const source = typeof pattern === "string" ? pattern : pattern.source;
  const flags = typeof pattern === "string" ? "" : pattern.flags.replace(/[gy]/g, "");
  return new RegExp(`^(?:${source})$`, flags);
}

export function fieldValue(element: Element, field: MatchField): string {
  if (field === "ports") return Object.values(element.ports).join(" ");
  return element[field];
}

/** Ids of elements whose field fully matches the pattern, in iteration order. */
export function matchElements(elements: Iterable<[string, Element]>, field: MatchField, pattern: Pattern): string[] {
  const re = compilePattern(pattern);
  const matches: string[] = [];
  for (const [id, element] of elements) {
    if (re.test(fieldValue(element, field))) matches.push(id);
  }
  return matches;
}

/** ANDs every criterion, keeping the order of the first criterion's matches. */
export function filterElements(elements: ReadonlyMap<string, Element>, criteria: FilterCriteria): string[] {
  const [first, ...rest] = normalizeCriteria(criteria);
  if (!first) return [];

  let matches = matchElements(elements, first[0], first[1]);
  for (const [field, pattern] of rest) {
    const next = new Set(matchElements(elements, field, pattern));
    matches = matches.filter((id) => next.has(id));
  }
  return matches;
}
