import path from "node:path";
import fs from "fs-extra";

export function runDirName(prefix: string, now: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${prefix}_${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
  );
}

/** Creates `<baseDir>/<prefix>_YYYYMMDD_HHMMSS` and returns its path. */
export async function makeRunDir(baseDir = "runs", prefix = "sweep", now = new Date()): Promise<string> {
  const full = path.join(baseDir, runDirName(prefix, now));
  await fs.mkdirp(full);
  return full;
}

/** Zero-padded file name for one sweep step, e.g. `step_007.cir`. */
export function stepFileName(step: number, ext = ".cir"): string {
  return `step_${String(step).padStart(3, "0")}${ext}`;
}
