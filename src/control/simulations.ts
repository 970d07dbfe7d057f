/**
 * Analysis commands for the ngspice control section, plus the Simulation record
 * that groups a command with what to print, write and measure after it runs.
 */

export type Simulation = {
  cmd: string;
  prints: string[];
  outputs: string[];
  measure: string[];
  plots: string[];
  /** Output directory for wrdata; falls back to the control section's outputdir. */
  location: string;
  /** Output file name for wrdata; falls back to the control section's outputfile. */
  name: string;
  /** Upper-cased analysis keyword, e.g. `TRAN`. */
  identifier: string;
};

export type SimulationInput = {
  cmd: string;
  prints?: string | string[];
  outputs?: string | string[];
  measure?: string | string[];
  plots?: string | string[];
  location?: string;
  name?: string;
};

function asList(v: string | string[] | undefined): string[] {
  if (v === undefined) return [];
  return typeof v === "string" ? [v] : [...v];
}

export function createSimulation(input: SimulationInput): Simulation {
  return {
    cmd: input.cmd,
    prints: asList(input.prints),
    outputs: asList(input.outputs),
    measure: asList(input.measure),
    plots: asList(input.plots),
    location: input.location ?? "",
    name: input.name ?? "",
    identifier: (input.cmd.split(" ")[0] ?? "").toUpperCase(),
  };
}

type Value = string | number;

export function tran(
  tstop: Value,
  opts: { tstep?: Value; tstart?: Value; tmax?: Value; uic?: Value } = {},
): string {
  const parts = ["tran", String(opts.tstep ?? "1n"), String(tstop)];
  if (opts.tstart !== undefined) parts.push(`tstart=${opts.tstart}`);
  if (opts.tmax !== undefined) parts.push(`tmax=${opts.tmax}`);
  if (opts.uic !== undefined) parts.push(`uic=${opts.uic}`);
  return parts.join(" ");
}

export function dc(srcname: string, vstart: Value, vstop: Value, vincrement: Value): string {
  return `dc ${srcname} ${vstart} ${vstop} ${vincrement}`;
}

export type SweepMethod = "dec" | "oct" | "lin";

export function ac(fmin: Value, fmax: Value, pts: Value, method: SweepMethod = "dec"): string {
  return `ac ${method} ${pts} ${fmin} ${fmax}`;
}

/** `outvar` is an expression such as `v(out)` or `i(vload)`. */
export function tf(outvar: string, insrc: string): string {
  return `tf ${outvar} ${insrc.toLowerCase()}`;
}

export function pz(
  vinp: string,
  vinn: string,
  voutp: string,
  voutn: string,
  stype: "vol" | "cur" = "vol",
  otype: "pz" | "pol" | "zer" = "pz",
): string {
  return `pz ${vinp} ${vinn} ${voutp} ${voutn} ${stype} ${otype}`;
}

export function noise(
  vout: string | readonly [string, string],
  src: string,
  pts: Value,
  fstart: Value,
  fstop: Value,
  method: SweepMethod = "dec",
  ptsSum: Value = 1,
): string {
  const probe = typeof vout === "string" ? `v(${vout})` : `v(${vout[0]},${vout[1]})`;
  return `noise ${probe} ${src} ${method} ${pts} ${fstart} ${fstop} ${ptsSum}`;
}
