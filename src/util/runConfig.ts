import fs from "fs-extra";
import path from "node:path";
import { z } from "zod";

const SweepFilterSchema = z
  .object({
    instance: z.string().optional(),
    category: z.string().optional(),
    location: z.string().optional(),
    ports: z.string().optional(),
  })
  .strict()
  .refine((f) => Object.values(f).some((v) => v !== undefined), { message: "filter needs at least one field" });

const SweepSchema = z
  .object({
    filter: SweepFilterSchema,
    /** Argument key to set (`w` in `w=1u`); when omitted the matched args are replaced by the value. */
    argument: z.string().optional(),
    values: z.array(z.union([z.string(), z.number()]).transform((v) => String(v))).min(1),
  })
  .strict();

const SweepConfigSchema = z
  .object({
    netlistPath: z.string().min(1),
    controlPath: z.string().optional(),
    title: z.string().optional(),
    outdir: z.string().default("runs"),
    ngspiceBin: z.string().default("ngspice"),
    simulate: z.boolean().default(true),
    sweeps: z.array(SweepSchema).min(1),
  })
  .strict();

export type SweepFilter = z.infer<typeof SweepFilterSchema>;
export type SweepSpec = z.infer<typeof SweepSchema>;
export type SweepConfig = z.infer<typeof SweepConfigSchema>;

function cleanString(v: unknown): string | undefined {
  if (typeof v !== "string") return undefined;
  const s = v.trim();
  return s ? s : undefined;
}

/** Validates raw config data; relative paths are resolved against `baseDir`. */
export function parseSweepConfig(raw: unknown, baseDir = "."): SweepConfig {
  const parsed = SweepConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
    throw new Error(`Invalid sweep config: ${msg}`);
  }

  const cfg = parsed.data;
  const controlPath = cleanString(cfg.controlPath);
  return {
    ...cfg,
    netlistPath: path.resolve(baseDir, cfg.netlistPath),
    controlPath: controlPath ? path.resolve(baseDir, controlPath) : undefined,
    title: cleanString(cfg.title),
    outdir: path.resolve(baseDir, cfg.outdir),
  };
}

export async function readSweepConfig(configPath: string): Promise<SweepConfig> {
  const abs = path.resolve(configPath);
  const ok = await fs.pathExists(abs);
  if (!ok) throw new Error(`Config file not found: ${configPath}`);

  const raw: unknown = await fs.readJson(abs);
  return parseSweepConfig(raw, path.dirname(abs));
}

export function mergeSweepConfig(
  cli: { outdir?: unknown; ngspice?: unknown; simulate?: unknown },
  cfg: SweepConfig,
): SweepConfig {
  // CLI wins when explicitly set
  const merged: SweepConfig = { ...cfg };

  const outdir = cleanString(cli.outdir);
  if (outdir) merged.outdir = path.resolve(outdir);

  const bin = cleanString(cli.ngspice);
  if (bin) merged.ngspiceBin = bin;

  // commander's --no-simulate only ever turns simulation off
  if (cli.simulate === false) merged.simulate = false;

  return merged;
}
