import * as ui from "./ui.js";

/** Runs a command body, reporting any failure as a one-line error and exit code 1. */
export async function run(task: () => Promise<void>): Promise<void> {
  try {
    await task();
  } catch (e) {
    ui.error(e instanceof Error ? e.message : String(e));
    process.exitCode = 1;
  }
}
