import { describe, expect, it } from "vitest";
import { ELEMENT_TYPES, identifyLineType, resolvePorts } from "./elementTypes.js";

describe("identifyLineType", () => {
  it.each([
    ["r1 a b 1k", "R"],
    ["V1 a 0 1.8", "V"],
    [".param x=1", "."],
    ["* note", "*"],
    ["xr1 a b rpoly", "X"],
    ["XM1 d g s b nfet", "XM"],
    ["xc2 a b cmim", "XC"],
    ["x", "X"],
  ])("classifies %s as %s", (line, key) => {
    expect(identifyLineType(line)).toBe(key);
  });

  it("returns undefined for unknown prefixes", () => {
    expect(identifyLineType("1k a b")).toBeUndefined();
    expect(identifyLineType("")).toBeUndefined();
  });
});

describe("ELEMENT_TYPES", () => {
  it("gives subcircuit-wrapped devices the arity of the device", () => {
    expect(ELEMENT_TYPES.XM).toEqual(["mosfet", ["n1", "n2", "n3", "n4"]]);
    expect(ELEMENT_TYPES.XC).toEqual(["capacitor", ["n1", "n2"]]);
    expect(ELEMENT_TYPES.X).toEqual(["subcircuit", []]);
  });
});

describe("resolvePorts", () => {
  it("maps the tokens after the instance onto port roles", () => {
    expect(resolvePorts(["m1", "d", "g", "s", "b", "nmos"], "M")).toEqual({ n1: "d", n2: "g", n3: "s", n4: "b" });
    expect(resolvePorts(["e1", "o", "0", "i", "0", "10"], "E")).toEqual({ "n+": "o", "n-": "0", "nc+": "i", "nc-": "0" });
  });

  it("returns no ports for types without fixed ports", () => {
    expect(resolvePorts([".param", "x=1"], ".")).toEqual({});
  });

  it("returns only the ports present when the line is short", () => {
    expect(resolvePorts(["r1", "a"], "R")).toEqual({ "n+": "a" });
  });

  it("stops at the first key=value token", () => {
    expect(resolvePorts(["e1", "out", "0", "vol='v(a)*2'"], "E")).toEqual({ "n+": "out", "n-": "0" });
  });
});
