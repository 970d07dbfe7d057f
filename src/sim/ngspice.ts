import path from "node:path";
import { execa } from "execa";

export type SimulationRun = {
  stdout: string;
  lines: string[];
};

export async function runSimulation(
  netlistPath: string,
  opts: { bin?: string; cwd?: string } = {},
): Promise<SimulationRun> {
  const bin = opts.bin ?? "ngspice";
  const cwd = opts.cwd ?? path.dirname(netlistPath);
  const { stdout } = await execa(bin, ["-b", path.resolve(netlistPath)], { cwd });
  return { stdout, lines: stdout.split(/\r?\n/) };
}

const ASSIGNMENT_RE = /.* = .*/;

/**
 * Collects `name = value` lines (as printed by `print` and `meas`) into a
 * record. Lines whose value is not numeric are skipped.
 */
export function extractOutputData(lines: readonly string[]): Record<string, number> {
  const results: Record<string, number> = {};
  for (const line of lines) {
    if (!ASSIGNMENT_RE.test(line)) continue;
    const parts = line.split("=");
    const name = (parts[0] ?? "").trim();
    const raw = (parts[parts.length - 1] ?? "").trim();
    const value = raw ? Number(raw) : Number.NaN;
    if (name && Number.isFinite(value)) results[name] = value;
  }
  return results;
}
