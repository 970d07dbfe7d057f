import os from "node:os";
import path from "node:path";
import fs from "fs-extra";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CircuitSection } from "./circuit.js";
import { NetlistError, UnknownIdentifierError } from "./errors.js";
import type { Element } from "../types.js";

const HIERARCHICAL = "R1 in out 1k\n.subckt a n1 n2\nr2 n1 n2 2k\n.ends\n";
const SUPPLIES = "vdd vdd 0 1.8\nvss vss 0 0\nr1 vdd out 1k";

function setArgs(element: Element, value: string): Element {
  element.args = [value];
  return element;
}

describe("CircuitSection", () => {
  it("synthesizes a netlist with a title header and a blank line after .ends", () => {
    const cir = CircuitSection.fromText(HIERARCHICAL);
    expect(cir.netlist).toBe("* Netlist\n\nr1 in out 1k\n.subckt a n1 n2\nr2 n1 n2 2k\n.ends\n\n");
    expect(String(cir)).toBe(cir.netlist);
  });

  it("re-parses its own output to the same elements", () => {
    const source = [
      "* amp",
      "vdd vdd 0 1.8",
      ".subckt inv in out vdd vss",
      "xm1 out in vdd vdd pfet w=2u",
      "xm2 out in vss vss nfet",
      "+ w = 1u",
      ".ends",
      "x1 a b vdd 0 inv",
      ".param rload='1k * 2'",
      ".end",
    ].join("\n");
    const first = CircuitSection.fromText(source);
    const second = CircuitSection.fromText(first.netlist);

    expect(second.elements()).toEqual(first.elements());
    expect(CircuitSection.fromText(second.netlist).netlist).toBe(second.netlist);
  });

  it("iterates in insertion order", () => {
    const cir = CircuitSection.fromText(SUPPLIES);
    expect(Array.from(cir, ([, e]) => e.instance)).toEqual(["vdd", "vss", "r1"]);
    expect(cir.ids()).toEqual(Array.from(cir, ([id]) => id));
    expect(cir.size).toBe(3);
  });

  it("applies a transform to matched elements only", () => {
    const cir = CircuitSection.fromText(SUPPLIES);
    const n = cir.apply(setArgs, ["instance", "vdd"], "1.9");

    expect(n).toBe(1);
    expect(cir.netlist).toBe("* Netlist\n\nvdd vdd 0 1.9\nvss vss 0 0\nr1 vdd out 1k\n");
  });

  it("does nothing when apply matches no elements", () => {
    const cir = CircuitSection.fromText(SUPPLIES);
    const before = cir.netlist;

    expect(cir.filter({ instance: "vbias" })).toEqual([]);
    expect(cir.apply(setArgs, { instance: "vbias" }, "0")).toBe(0);
    expect(cir.netlist).toBe(before);
  });

  it("passes a copy to the transform and leaves the parsed circuit untouched", () => {
    const cir = CircuitSection.fromText(SUPPLIES);
    const [vddId] = cir.ids();
    cir.apply(setArgs, ["instance", "vdd"], "3.3");

    expect(cir.get(vddId).args).toEqual(["3.3"]);
    expect(cir.parsedCircuit.get(vddId)?.args).toEqual(["1.8"]);
  });

  it("reset discards edits and appended elements", () => {
    const cir = CircuitSection.fromText(SUPPLIES);
    const original = cir.netlist;
    cir.apply(setArgs, ["instance", "vdd"], "1.9");
    cir.append("c1 out 0 1p");

    cir.reset();
    expect(cir.netlist).toBe(original);
    expect(cir.size).toBe(3);
  });

  it("appends a normalized line at top level under a fresh id", () => {
    const cir = CircuitSection.fromText(SUPPLIES);
    const id = cir.append("C9 OUT 0 1P");
    const again = cir.append("C9 OUT 0 1P");

    expect(id).not.toBe(again);
    expect(cir.ids().slice(-2)).toEqual([id, again]);
    expect(cir.get(id)).toEqual({
      instance: "c9",
      category: "capacitor",
      ports: { "n+": "out", "n-": "0" },
      location: "root",
      args: ["1p"],
    });
    expect(cir.netlist.endsWith("r1 vdd out 1k\nc9 out 0 1p\nc9 out 0 1p\n")).toBe(true);
  });

  it("locates an appended .subckt line inside its own frame", () => {
    const cir = CircuitSection.fromText(SUPPLIES);
    const sub = cir.append(".subckt buf in out");
    const top = cir.append("r9 out 0 1k");

    expect(cir.get(sub).location).toBe("root/buf");
    expect(cir.get(top).location).toBe("root");
  });

  it("refuses to append comments or several statements", () => {
    const cir = CircuitSection.fromText(SUPPLIES);
    expect(() => cir.append("* just a comment")).toThrow(NetlistError);
    expect(() => cir.append("r5 a b 1\nr6 a b 2")).toThrow("Expected a single statement");
  });

  it("rejects point access to unknown identifiers", () => {
    const cir = CircuitSection.fromText(SUPPLIES);
    const element = cir.get(cir.ids()[0]);

    expect(() => cir.get("missing")).toThrow(UnknownIdentifierError);
    expect(() => cir.set("missing", element)).toThrow(UnknownIdentifierError);
    expect(cir.size).toBe(3);
  });

  it("set replaces an element in place", () => {
    const cir = CircuitSection.fromText(SUPPLIES);
    const [, vssId] = cir.ids();
    cir.set(vssId, { ...cir.get(vssId), args: ["0.1"] });
    expect(cir.netlist).toBe("* Netlist\n\nvdd vdd 0 1.8\nvss vss 0 0.1\nr1 vdd out 1k\n");
  });
});

describe("CircuitSection file I/O", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "netlist-sweep-"));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it("reads from a file, titled with its path, and writes a timestamped copy", async () => {
    const input = path.join(dir, "in.cir");
    const output = path.join(dir, "out", "written.cir");
    await fs.outputFile(input, "* test bench\nR1 a b 1K\n");

    const cir = await CircuitSection.fromFile(input);
    expect(cir.title).toBe(input);
    expect(cir.netlist).toBe(`* ${input}\n\nr1 a b 1k\n`);

    await cir.write(output);
    const lines = (await fs.readFile(output, "utf-8")).split("\n");
    expect(lines[0]).toMatch(/^\* Netlist written: \d{4}-\d{2}-\d{2}T/);
    expect(lines.slice(1).join("\n")).toBe(cir.netlist);
  });
});
