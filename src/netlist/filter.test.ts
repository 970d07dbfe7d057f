import { describe, expect, it } from "vitest";
import { CircuitSection } from "./circuit.js";
import { compilePattern, normalizeCriteria } from "./filter.js";

const DIVIDER = "r1 a b 1k\nr2 b c 2k\nc1 b 0 1p\nr3 c 0 3k";

describe("normalizeCriteria", () => {
  it("turns every accepted shape into an ordered list of pairs", () => {
    expect(normalizeCriteria(["instance", "xr.*"])).toEqual([["instance", "xr.*"]]);
    expect(
      normalizeCriteria([
        ["instance", "xr.*"],
        ["category", "subcircuit"],
      ]),
    ).toEqual([
      ["instance", "xr.*"],
      ["category", "subcircuit"],
    ]);
    expect(normalizeCriteria({ location: "root", instance: "r.*" })).toEqual([
      ["location", "root"],
      ["instance", "r.*"],
    ]);
  });

  it("skips undefined record entries", () => {
    expect(normalizeCriteria({ instance: "r1", ports: undefined })).toEqual([["instance", "r1"]]);
  });
});

describe("compilePattern", () => {
  it("anchors patterns to the whole value", () => {
    expect(compilePattern("r").test("r1")).toBe(false);
    expect(compilePattern("r|c1").test("c1")).toBe(true);
    expect(compilePattern(/R\d/i).source).toBe("^(?:R\\d)$");
    expect(compilePattern(/R\d/gi).flags).toBe("i");
  });
});

describe("CircuitSection.filter", () => {
  it("matches instance names across subcircuit instances", () => {
    const cir = CircuitSection.fromText("xr1 a b rpoly w=1u\nxr2 b c rpoly w=2u\nr3 c 0 1k");
    const [xr1, xr2] = cir.ids();
    expect(cir.filter({ instance: "xr.*" })).toEqual([xr1, xr2]);
  });

  it("returns the intersection of every criterion", () => {
    const cir = CircuitSection.fromText(DIVIDER);
    const [, r2] = cir.ids();
    const resistors = new Set(cir.match("category", "resistor"));
    const fromB = cir.match("ports", "b .*");

    expect(cir.filter([["category", "resistor"], ["ports", "b .*"]])).toEqual([r2]);
    expect(fromB.filter((id) => resistors.has(id))).toEqual([r2]);
  });

  it("keeps the order of the first criterion's matches", () => {
    const cir = CircuitSection.fromText(DIVIDER);
    const [r1, r2] = cir.ids();
    expect(cir.filter([["ports", ".*b.*"], ["category", "resistor"]])).toEqual([r1, r2]);
  });

  it("matches ports against their joined node names", () => {
    const cir = CircuitSection.fromText(DIVIDER);
    const [, , c1] = cir.ids();
    expect(cir.match("ports", "b 0")).toEqual([c1]);
  });

  it("uses full-match semantics", () => {
    const cir = CircuitSection.fromText(DIVIDER);
    expect(cir.match("instance", "r")).toEqual([]);
    expect(cir.match("instance", "r\\d")).toHaveLength(3);
  });

  it("accepts a single tuple and RegExp patterns", () => {
    const cir = CircuitSection.fromText(DIVIDER);
    const [r1, , c1] = cir.ids();
    expect(cir.filter(["instance", "c1"])).toEqual([c1]);
    expect(cir.filter({ instance: /R1/i })).toEqual([r1]);
  });

  it("filters by hierarchy location", () => {
    const cir = CircuitSection.fromText("r1 a b 1\n.subckt amp in out\nr2 in out 2\n.ends\nr3 a 0 3");
    const ids = cir.ids();
    expect(cir.filter({ location: "root/amp", category: "resistor" })).toEqual([ids[2]]);
  });

  it("returns nothing for criteria that match nothing or for no criteria", () => {
    const cir = CircuitSection.fromText(DIVIDER);
    expect(cir.filter({ instance: "l.*" })).toEqual([]);
    expect(cir.filter([])).toEqual([]);
    expect(cir.filter({})).toEqual([]);
  });
});
