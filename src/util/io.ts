import fs from "fs-extra";
import { cleanNetlist } from "../netlist/clean.js";

/** Anything that renders to netlist text: a CircuitSection or a ControlSection. */
export type NetlistSource = string | { readonly netlist: string };

function netlistText(source: NetlistSource): string {
  return typeof source === "string" ? source : source.netlist;
}

export async function readNetlist(filePath: string): Promise<string> {
  const ok = await fs.pathExists(filePath);
  if (!ok) throw new Error(`Netlist file not found: ${filePath}`);
  return cleanNetlist(await fs.readFile(filePath, "utf-8"));
}

export async function writeNetlist(netlist: NetlistSource, filePath: string, now = new Date()): Promise<void> {
  await fs.outputFile(filePath, `* Netlist written: ${now.toISOString()}\n${netlistText(netlist)}`, "utf-8");
}

/** Writes the circuit followed by its control section as one simulator input. */
export async function writeSimNetlist(circuit: NetlistSource, control: NetlistSource, filePath: string): Promise<void> {
  await writeNetlist(netlistText(circuit) + netlistText(control), filePath);
}

export async function writeJson(filePath: string, data: unknown): Promise<void> {
  await fs.outputJson(filePath, data, { spaces: 2 });
}
