export type ElementCategory =
  | "comment"
  | "statement"
  | "xspice"
  | "behavioral source"
  | "capacitor"
  | "diode"
  | "vcvs"
  | "cccs"
  | "vccs"
  | "ccvs"
  | "isource"
  | "jfet"
  | "coupled inductor"
  | "inductor"
  | "mosfet"
  | "numerical device gss"
  | "lossy transmission line"
  | "coupled multiconductor line"
  | "bjt"
  | "resistor"
  | "vcsw"
  | "lossless transmission line"
  | "uniformely distributed rc line"
  | "vsource"
  | "icsw"
  | "subcircuit"
  | "single lossy transmission line"
  | "mesfet";

/** One netlist statement: a device instance, a directive or a subcircuit boundary. */
export interface Element {
  /** Leading token, e.g. `r1` or `.param`. */
  instance: string;
  category: ElementCategory;
  /** Port role -> node, in the order the type table declares the roles. */
  ports: Record<string, string>;
  /** Slash-joined subcircuit path, `root` at top level. */
  location: string;
  args: string[];
}

export type Circuit = Map<string, Element>;

export type MatchField = "instance" | "category" | "location" | "ports";

export type Pattern = string | RegExp;

export type Criterion = readonly [field: MatchField, pattern: Pattern];

export type FilterCriteria = Criterion | readonly Criterion[] | Partial<Record<MatchField, Pattern>>;
