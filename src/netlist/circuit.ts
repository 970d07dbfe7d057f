import type { Circuit, Element, FilterCriteria, MatchField, Pattern } from "../types.js";
import { cleanNetlist } from "./clean.js";
import { NetlistError, UnknownIdentifierError } from "./errors.js";
import { filterElements, matchElements } from "./filter.js";
import { ROOT_FRAME, elementId, parseLine, parseNetlist } from "./parse.js";
import { synthesize } from "./synthesize.js";
import { readNetlist, writeNetlist } from "../util/io.js";

const SUBCKT_RE = /^\.subckt\b/;

export type ElementTransform<P> = (element: Element, params: P) => Element;

export function cloneElement(element: Element): Element {
  return { ...element, ports: { ...element.ports }, args: [...element.args] };
}

function cloneCircuit(circuit: ReadonlyMap<string, Element>): Circuit {
  const copy: Circuit = new Map();
  for (const [id, element] of circuit) copy.set(id, cloneElement(element));
  return copy;
}

/**
 * An ordinary (non-control) netlist as an ordered, mutable set of elements.
 *
 * `parsedCircuit` keeps the elements exactly as parsed; `circuit` is the live
 * copy that filter/apply/set edit and that `netlist` is rendered from. One
 * instance must not be shared between concurrent sweep workers.
 */
export class CircuitSection implements Iterable<[string, Element]> {
  readonly title: string;
  readonly parsedCircuit: ReadonlyMap<string, Element>;
  private circuit: Circuit;

  constructor(cleanedNetlist: string, title = "Netlist") {
    this.title = title;
    const parsed = parseNetlist(cleanedNetlist);
    for (const element of parsed.values()) {
      Object.freeze(element.ports);
      Object.freeze(element.args);
      Object.freeze(element);
    }
    this.parsedCircuit = parsed;
    this.circuit = cloneCircuit(parsed);
  }

  static fromText(netlist: string | readonly string[], title = "Netlist"): CircuitSection {
    return new CircuitSection(cleanNetlist(netlist), title);
  }

  /** The file path doubles as the header comment unless a title is given. */
  static async fromFile(filePath: string, title = filePath): Promise<CircuitSection> {
    return new CircuitSection(await readNetlist(filePath), title);
  }

  get size(): number {
    return this.circuit.size;
  }

  /** Simulation-ready text, rendered fresh from the live circuit. */
  get netlist(): string {
    return synthesize(this.circuit.values(), this.title);
  }

  toString(): string {
    return this.netlist;
  }

  [Symbol.iterator](): Iterator<[string, Element]> {
    return this.circuit.entries();
  }

  ids(): string[] {
    return Array.from(this.circuit.keys());
  }

  elements(): Element[] {
    return Array.from(this.circuit.values());
  }

  has(id: string): boolean {
    return this.circuit.has(id);
  }

  get(id: string): Element {
    const element = this.circuit.get(id);
    if (!element) throw new UnknownIdentifierError(id);
    return element;
  }

  /** Replaces an existing element; unknown ids are rejected, use append() to add. */
  set(id: string, element: Element): void {
    if (!this.circuit.has(id)) throw new UnknownIdentifierError(id);
    this.circuit.set(id, element);
  }

  /** Discards every live edit and appended element. */
  reset(): void {
    this.circuit = cloneCircuit(this.parsedCircuit);
  }

  /** Parses one raw line at the top level and adds it at the end. Returns its id. */
  append(line: string): string {
    const cleaned = cleanNetlist(line);
    if (!cleaned) throw new NetlistError(`Nothing to append from "${line}"`);
    if (cleaned.includes("\n")) throw new NetlistError(`Expected a single statement, got "${line}"`);

    const name = SUBCKT_RE.test(cleaned) ? cleaned.split(" ")[1] : undefined;
    const { element } = parseLine(cleaned, this.circuit.size, name ? [ROOT_FRAME, name] : [ROOT_FRAME]);

    let count = 0;
    let id = elementId(count, cleaned);
    while (this.circuit.has(id)) {
      count += 1;
      id = elementId(count, cleaned);
    }
    this.circuit.set(id, element);
    return id;
  }

  match(field: MatchField, pattern: Pattern): string[] {
    return matchElements(this.circuit, field, pattern);
  }

  filter(criteria: FilterCriteria): string[] {
    return filterElements(this.circuit, criteria);
  }

  /**
   * Replaces every element matched by `criteria` with `transform(copy, params)`.
   * Returns the number of elements visited.
   */
  apply<P = void>(transform: ElementTransform<P>, criteria: FilterCriteria, params: P): number {
    const matches = this.filter(criteria);
    for (const id of matches) {
      this.circuit.set(id, transform(cloneElement(this.get(id)), params));
    }
    return matches.length;
  }

  async write(filePath: string): Promise<void> {
    await writeNetlist(this.netlist, filePath);
  }
}
