import { cleanNetlist } from "../netlist/clean.js";
import { readNetlist } from "../util/io.js";
import type { Simulation } from "./simulations.js";

/** The `.control` .. `.endc` part of a simulator input, kept apart from the circuit. */
export interface ControlSection {
  readonly netlist: string;
}

const CONTROL_RE = /^\.control\b/i;
const ENDC_RE = /^\.endc\b/i;
const PLOT_RE = /^plot\b/i;
// xschem wraps user code (models, control blocks) in these comment markers
const USER_CODE_BEGIN_RE = /^\*{4} begin user architecture code/i;
const USER_CODE_END_RE = /^\*{4} end user architecture code/i;

export type ExtractControlOptions = {
  /** Drop `plot` lines, which need a display. Defaults to true. */
  skipPlots?: boolean;
};

function asLines(netlist: string | readonly string[]): readonly string[] {
  return typeof netlist === "string" ? netlist.split(/\r?\n/) : netlist;
}

/** Every `.control` .. `.endc` block of a netlist, each line ending in a newline. */
export function extractControl(netlist: string | readonly string[], opts: ExtractControlOptions = {}): string {
  const skipPlots = opts.skipPlots ?? true;
  let inside = false;
  let out = "";
  for (const raw of asLines(netlist)) {
    const line = raw.trim();
    if (CONTROL_RE.test(line)) inside = true;
    if (inside && !(skipPlots && PLOT_RE.test(line))) out += `${line}\n`;
    if (ENDC_RE.test(line)) inside = false;
  }
  return out;
}

/**
 * The circuit part of a raw (uncleaned) netlist: control blocks and xschem
 * user architecture code are dropped, everything else is kept as written.
 */
export function extractCircuit(netlist: string | readonly string[]): string {
  let inUserCode = false;
  let inControl = false;
  const kept: string[] = [];
  for (const raw of asLines(netlist)) {
    const line = raw.trim();
    if (USER_CODE_BEGIN_RE.test(line)) inUserCode = true;
    if (CONTROL_RE.test(line)) inControl = true;
    if (!inUserCode && !inControl) kept.push(raw);
    if (USER_CODE_END_RE.test(line)) inUserCode = false;
    if (ENDC_RE.test(line)) inControl = false;
  }
  return kept.join("\n");
}

/** The control block(s) of a file or string, cleaned; anything outside them is ignored. */
export class ExternalControlSection implements ControlSection {
  readonly netlist: string;

  constructor(controlText: string) {
    this.netlist = controlText;
  }

  static fromText(text: string, opts: ExtractControlOptions = {}): ExternalControlSection {
    return new ExternalControlSection(extractControl(cleanNetlist(text), opts));
  }

  static async fromFile(filePath: string, opts: ExtractControlOptions = {}): Promise<ExternalControlSection> {
    return new ExternalControlSection(extractControl(await readNetlist(filePath), opts));
  }

  toString(): string {
    return this.netlist;
  }
}

/** A bare option (`set foo`) or a key/value pair (`set foo=bar`). */
export type ControlOption = string | readonly [key: string, value: string | number];

export type LogicalControlOptions = {
  simulations: Simulation | Simulation[];
  includes?: string | string[];
  /** Appended to wrdata file names so each sweep step writes its own file. */
  sweepNum?: string | number;
  /** Emitted as `.option` lines after the control block. */
  simOptions?: ControlOption[];
  /** Emitted as `set` lines inside the control block. */
  ngOptions?: ControlOption[];
  save?: string | string[];
  outputfile?: string;
  outputdir?: string;
  filetype?: "ascii" | "binary";
  wrSinglescale?: boolean;
  wrVecnames?: boolean;
  exitPostRun?: boolean;
};

function asList<T>(v: T | T[] | undefined): T[] {
  if (v === undefined) return [];
  return Array.isArray(v) ? [...v] : [v];
}

function formatOption(opt: ControlOption): string {
  return typeof opt === "string" ? opt : `${opt[0]}=${opt[1]}`;
}

/**
 * A control section assembled from simulations and output settings. Fields may
 * be changed between runs; `netlist` always reflects the current values.
 */
export class LogicalControlSection implements ControlSection {
  simulations: Simulation[];
  includes: string[];
  sweepNum: string;
  simOptions: ControlOption[];
  ngOptions: ControlOption[];
  save: string[];
  outputfile: string;
  outputdir: string;
  filetype: "ascii" | "binary";
  wrSinglescale: boolean;
  wrVecnames: boolean;
  exitPostRun: boolean;

  constructor(opts: LogicalControlOptions) {
    this.simulations = asList(opts.simulations);
    this.includes = asList(opts.includes);
    this.sweepNum = opts.sweepNum === undefined ? "" : String(opts.sweepNum);
    this.simOptions = opts.simOptions ?? [];
    this.ngOptions = opts.ngOptions ?? [];
    this.save = asList(opts.save ?? "all");
    this.outputfile = opts.outputfile ?? "output.csv";
    this.outputdir = opts.outputdir ?? ".";
    this.filetype = opts.filetype ?? "ascii";
    this.wrSinglescale = opts.wrSinglescale ?? true;
    this.wrVecnames = opts.wrVecnames ?? true;
    this.exitPostRun = opts.exitPostRun ?? true;
  }

  get netlist(): string {
    return this.assemble().map((line) => `${line}\n`).join("");
  }

  toString(): string {
    return this.netlist;
  }

  private assemble(): string[] {
    const section = ["", "* Control section", "", ".control"];
    section.push(`set filetype=${this.filetype}`);
    if (this.wrSinglescale) section.push("set wr_singlescale");
    if (this.wrVecnames) section.push("set wr_vecnames");
    for (const opt of this.ngOptions) section.push(`set ${formatOption(opt)}`);
    // hspice compatibility mode
    section.push("set ngbehavior=hsa");
    for (const sig of this.save) section.push(`save ${sig}`);

    for (const sim of this.simulations) {
      section.push(sim.cmd);
      section.push(`echo --- start ${sim.identifier} ---`);
      for (const p of sim.prints) section.push(`print ${p}`);
      for (const p of sim.plots) section.push(`plot ${p}`);
      if (sim.outputs.length) section.push(this.wrdata(sim));
      section.push(...sim.measure);
      section.push(`echo --- end ${sim.identifier} ---`);
    }

    if (this.exitPostRun) section.push("exit");
    section.push(".endc");
    for (const opt of this.simOptions) section.push(`.option ${formatOption(opt)}`);
    for (const lib of this.includes) section.push(`.include "${lib}"`);
    section.push(".end");
    return section;
  }

  private wrdata(sim: Simulation): string {
    const dir = sim.location || this.outputdir;
    const file = sim.name || this.outputfile;
    const stem = this.sweepNum ? `${sim.identifier.toLowerCase()}_${this.sweepNum}` : sim.identifier.toLowerCase();
    return `wrdata ${dir}/${stem}_${file} ${sim.outputs.join(" ")}`;
  }
}
