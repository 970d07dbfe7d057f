#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import chalk from "chalk";
import fs from "fs-extra";

import { CircuitSection } from "./netlist/circuit.js";
import { cleanNetlist } from "./netlist/clean.js";
import { extractCircuit, extractControl } from "./control/controlSection.js";
import { replaceArgument } from "./netlist/args.js";
import { circuitToDot } from "./netlist/graph.js";
import { elementToLine } from "./netlist/synthesize.js";
import { readNetlist, writeNetlist } from "./util/io.js";
import { mergeSweepConfig, readSweepConfig } from "./util/runConfig.js";
import { defaultLogger } from "./util/logger.js";
import { runSweep } from "./sweep.js";
import type { MatchField } from "./types.js";

type FilterOpts = Partial<Record<MatchField, string>>;

function filterFromOpts(opts: FilterOpts): FilterOpts {
  const filter: FilterOpts = {};
  for (const field of ["instance", "category", "location", "ports"] as const) {
    const v = opts[field]?.trim();
    if (v) filter[field] = v;
  }
  return filter;
}

function withFilterOptions(cmd: Command): Command {
  return cmd
    .option("--instance <regex>", "Match the instance name, e.g. 'xr.*'")
    .option("--category <regex>", "Match the element category, e.g. 'resistor'")
    .option("--location <regex>", "Match the hierarchy path, e.g. 'root/amp.*'")
    .option("--ports <regex>", "Match the space-joined port nodes");
}

function fail(e: unknown): void {
  console.error(chalk.red(e instanceof Error ? e.message : String(e)));
  process.exitCode = 2;
}

async function emit(text: string, out?: string): Promise<void> {
  if (out) {
    await writeNetlist(text, out);
    console.log(chalk.green(`Wrote ${out}`));
  } else {
    process.stdout.write(text);
  }
}

const program = new Command();

program
  .name("netlist-sweep")
  .description("Parse, query, edit and sweep ngspice netlists.")
  .version("0.1.0");

program
  .command("normalize")
  .description("Print the netlist after comment, continuation and whitespace cleanup.")
  .argument("<netlist>", "Path to a SPICE netlist")
  .action(async (netlist: string) => {
    try {
      console.log(await readNetlist(netlist));
    } catch (e) {
      fail(e);
    }
  });

program
  .command("extract")
  .description("Split a combined netlist: print its circuit part, or its control block with --control.")
  .argument("<netlist>", "Path to a SPICE netlist")
  .option("--control", "Print the .control .. .endc block instead of the circuit")
  .option("--keep-plots", "Keep plot lines in the control block")
  .option("-o, --out <path>", "Write the result to a file instead of stdout")
  .action(async (netlist: string, opts: { control?: boolean; keepPlots?: boolean; out?: string }) => {
    try {
      const ok = await fs.pathExists(netlist);
      if (!ok) throw new Error(`Netlist file not found: ${netlist}`);
      const raw = await fs.readFile(netlist, "utf-8");

      const text = opts.control
        ? extractControl(cleanNetlist(raw), { skipPlots: !opts.keepPlots })
        : `${cleanNetlist(extractCircuit(raw))}\n`;
      await emit(text, opts.out);
    } catch (e) {
      fail(e);
    }
  });

program
  .command("print")
  .description("Parse the netlist and print it re-synthesized from the circuit model.")
  .argument("<netlist>", "Path to a SPICE netlist")
  .option("--title <text>", "Header comment (defaults to the file path)")
  .action(async (netlist: string, opts: { title?: string }) => {
    try {
      const cir = await CircuitSection.fromFile(netlist, opts.title);
      process.stdout.write(cir.netlist);
    } catch (e) {
      fail(e);
    }
  });

withFilterOptions(
  program
    .command("list")
    .description("List circuit elements, optionally filtered by regex (all filters must match).")
    .argument("<netlist>", "Path to a SPICE netlist"),
).action(async (netlist: string, opts: FilterOpts) => {
  try {
    const cir = await CircuitSection.fromFile(netlist);
    const filter = filterFromOpts(opts);
    const ids = Object.keys(filter).length ? cir.filter(filter) : cir.ids();
    for (const id of ids) {
      const e = cir.get(id);
      console.log(`${chalk.dim(id.slice(0, 8))}  ${chalk.cyan(e.location)}  ${e.category.padEnd(12)}  ${elementToLine(e)}`);
    }
    console.log(chalk.dim(`${ids.length} of ${cir.size} element(s)`));
  } catch (e) {
    fail(e);
  }
});

withFilterOptions(
  program
    .command("set")
    .description("Set key=value arguments on every matched element and print (or write) the netlist.")
    .argument("<netlist>", "Path to a SPICE netlist")
    .argument("<assignments...>", "One or more key=value pairs, e.g. w=2u l=180n"),
)
  .option("-o, --out <path>", "Write the result to a file instead of stdout")
  .action(async (netlist: string, assignments: string[], opts: FilterOpts & { out?: string }) => {
    try {
      const filter = filterFromOpts(opts);
      if (!Object.keys(filter).length) {
        console.error(chalk.red("Provide at least one of --instance/--category/--location/--ports."));
        process.exitCode = 2;
        return;
      }

      const pairs = assignments.map((a) => {
        const eq = a.indexOf("=");
        if (eq <= 0 || eq === a.length - 1) throw new Error(`Expected key=value, got "${a}"`);
        return [a.slice(0, eq).toLowerCase(), a.slice(eq + 1).toLowerCase()] as const;
      });

      const cir = await CircuitSection.fromFile(netlist);
      const ids = cir.filter(filter);
      if (!ids.length) console.warn(chalk.yellow("No elements matched; netlist unchanged."));
      for (const id of ids) for (const [key, value] of pairs) replaceArgument(cir, id, key, value);

      await emit(cir.netlist, opts.out);
    } catch (e) {
      fail(e);
    }
  });

program
  .command("dot")
  .description("Write a Graphviz connectivity diagram (nets and elements) of the netlist.")
  .argument("<netlist>", "Path to a SPICE netlist")
  .option("-o, --out <path>", "Output .dot file (defaults to stdout)")
  .action(async (netlist: string, opts: { out?: string }) => {
    try {
      const cir = await CircuitSection.fromFile(netlist);
      const dot = circuitToDot(cir.elements());
      if (opts.out) {
        await fs.outputFile(opts.out, dot, "utf-8");
        console.log(chalk.green(`Wrote ${opts.out}`));
      } else {
        process.stdout.write(dot);
      }
    } catch (e) {
      fail(e);
    }
  });

program
  .command("sweep")
  .description("Run a parameter sweep described by a JSON config, writing one netlist per step.")
  .requiredOption("--config <path>", "JSON sweep config")
  .option("--outdir <path>", "Output directory root (overrides the config)")
  .option("--ngspice <bin>", "ngspice executable", process.env.NGSPICE_BIN)
  .option("--no-simulate", "Only write the step netlists; do not run ngspice")
  .action(async (opts: { config: string; outdir?: string; ngspice?: string; simulate: boolean }) => {
    try {
      const cfg = mergeSweepConfig(opts, await readSweepConfig(opts.config));
      const result = await runSweep(cfg, defaultLogger());

      const failed = result.steps.filter((s) => s.error).length;
      console.log(failed ? chalk.yellow(`Done with ${failed} failed step(s).`) : chalk.green("Done."));
      console.log(chalk.cyan("Outputs:"));
      console.log(`- ${result.runDir}`);
      console.log(`- ${result.summaryJson}`);
    } catch (e) {
      fail(e);
    }
  });

program.parseAsync(process.argv).catch((err) => {
  console.error(chalk.red(String(err instanceof Error ? err.stack : err)));
  process.exit(1);
});
