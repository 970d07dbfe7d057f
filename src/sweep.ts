import path from "node:path";

import { CircuitSection } from "./netlist/circuit.js";
import { replaceArgument } from "./netlist/args.js";
import { ExternalControlSection } from "./control/controlSection.js";
import { extractOutputData, runSimulation, type SimulationRun } from "./sim/ngspice.js";
import { writeJson, writeSimNetlist } from "./util/io.js";
import { defaultLogger, type Logger } from "./util/logger.js";
import { makeRunDir, stepFileName } from "./util/runDir.js";
import type { SweepConfig, SweepFilter, SweepSpec } from "./util/runConfig.js";
import type { Element } from "./types.js";

export type SweepOptions = SweepConfig & {
  /** Replaces the ngspice invocation, e.g. with a stub in tests. */
  runner?: (netlistPath: string, opts: { bin: string; cwd: string }) => Promise<SimulationRun>;
};

export type SweepAssignment = {
  filter: SweepFilter;
  argument?: string;
  value: string;
  matched: number;
};

export type SweepStep = {
  step: number;
  netlistPath: string;
  assignments: SweepAssignment[];
  results?: Record<string, number>;
  error?: string;
};

export type SweepResult = {
  runDir: string;
  steps: SweepStep[];
  summaryJson: string;
};

/** Every combination of one value per list, first list varying slowest. */
export function cartesian<T>(lists: readonly (readonly T[])[]): T[][] {
  return lists.reduce<T[][]>((acc, list) => acc.flatMap((prefix) => list.map((v) => [...prefix, v])), [[]]);
}

function replaceArgs(element: Element, value: string): Element {
  element.args = [value];
  return element;
}

/** Applies one sweep value to the circuit; returns how many elements it touched. */
export function applySweepValue(circuit: CircuitSection, sweep: SweepSpec, value: string): number {
  const argument = sweep.argument;
  if (argument === undefined) return circuit.apply(replaceArgs, sweep.filter, value);

  const ids = circuit.filter(sweep.filter);
  for (const id of ids) replaceArgument(circuit, id, argument, value);
  return ids.length;
}

function describeFilter(filter: SweepFilter): string {
  return Object.entries(filter)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${v}`)
    .join(", ");
}

export async function runSweep(opts: SweepOptions, logger: Logger = defaultLogger()): Promise<SweepResult> {
  const circuit = await CircuitSection.fromFile(opts.netlistPath, opts.title);
  const control = opts.controlPath ? await ExternalControlSection.fromFile(opts.controlPath) : undefined;
  const runner = opts.runner ?? runSimulation;

  const runDir = await makeRunDir(opts.outdir);
  logger.info(`Run directory: ${runDir}`);

  const combos = cartesian(opts.sweeps.map((s) => s.values));
  logger.info(`Sweeping ${combos.length} step(s) over ${circuit.size} element(s)...`);

  const steps: SweepStep[] = [];
  for (const [step, values] of combos.entries()) {
    circuit.reset();

    const assignments = opts.sweeps.map((sweep, k): SweepAssignment => {
      const value = values[k] ?? "";
      const matched = applySweepValue(circuit, sweep, value);
      if (!matched && step === 0) logger.warn(`Sweep filter matched no elements: ${describeFilter(sweep.filter)}`);
      return { filter: sweep.filter, argument: sweep.argument, value, matched };
    });

    const netlistPath = path.join(runDir, stepFileName(step));
    await writeSimNetlist(circuit, control ?? "", netlistPath);

    const record: SweepStep = { step, netlistPath, assignments };
    if (opts.simulate) {
      try {
        const run = await runner(netlistPath, { bin: opts.ngspiceBin, cwd: runDir });
        record.results = extractOutputData(run.lines);
      } catch (e) {
        record.error = e instanceof Error ? e.message : String(e);
        logger.error(`Step ${step}: simulation failed: ${record.error}`);
      }
    }
    steps.push(record);
  }

  const summaryJson = path.join(runDir, "sweep.json");
  await writeJson(summaryJson, {
    netlistPath: opts.netlistPath,
    controlPath: opts.controlPath,
    steps,
  });
  logger.info(`Wrote ${steps.length} netlist(s) and ${path.basename(summaryJson)}.`);

  return { runDir, steps, summaryJson };
}
