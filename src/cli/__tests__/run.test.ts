import { afterEach, describe, expect, it, vi } from "vitest";

import { loadConfig } from "../../config.js";
import { run } from "../run.js";

describe("run", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  it("reports a configuration error as a message and sets the exit code", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    await run(async () => {
      loadConfig({ PORT: "http" });
    });

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith(expect.stringContaining("PORT must be an integer between 0 and 65535"));
    expect(process.exitCode).toBe(1);
  });

  it("leaves the exit code alone when the task succeeds", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    await run(async () => {
      loadConfig({ PORT: "8080" });
    });

    expect(log).not.toHaveBeenCalled();
    expect(process.exitCode).toBeUndefined();
  });
});
