import { writeFile } from "node:fs/promises";
import path from "node:path";
import type { ModuleFormat } from "../config.js";
import type { ProcessChildArgs } from "./process-child.js";

/** Module the launcher scripts load inside the child process. */
export const PROCESS_CHILD_ENTRY = new URL("./process-child.js", import.meta.url);

export interface Launcher {
  /** Absolute path of the script to run. */
  script: string;
  format: ModuleFormat;
}

export function launcherSource(format: ModuleFormat, entry: URL, args: ProcessChildArgs): string {
  const json = JSON.stringify(args);
  if (format === "commonjs") {
    return `"use strict";
import(${JSON.stringify(entry.href)})
  .then((child) => child.main(${json}))
  .then(
    (code) => { process.exitCode = code; },
    (error) => { console.error(error); process.exitCode = 101; },
  );
`;
  }
  return `import process from "node:process";
import { main } from ${JSON.stringify(entry.href)};

try {
  process.exitCode = await main(${json});
} catch (error) {
  console.error(error);
  process.exitCode = 101;
}
`;
}

/**
 * Writes the launcher into `dir`. An ES module launcher also gets a
 * package.json marking the directory as `"type": "module"`.
 */
export async function writeLauncher(
  dir: string,
  format: ModuleFormat,
  args: ProcessChildArgs,
  entry: URL = PROCESS_CHILD_ENTRY,
): Promise<Launcher> {
  const script = path.join(dir, format === "commonjs" ? "run.cjs" : "run.mjs");
  await writeFile(script, launcherSource(format, entry, args));
  if (format === "module") {
    await writeFile(path.join(dir, "package.json"), `${JSON.stringify({ type: "module" })}\n`);
  }
  return { script, format };
}
