import { describe, it, expect, afterEach } from "vitest";
import { createSpinner, SilentSpinner } from "./spinner.js";
import { initContext, resetContext } from "./cli-context.js";

describe("spinner", () => {
  afterEach(() => {
    resetContext();
  });

  it("is silent in quiet mode", () => {
    initContext(["node", "follow-audit", "--quiet"], {});

    expect(createSpinner()).toBeInstanceOf(SilentSpinner);
  });

  it("is silent in JSON mode", () => {
    initContext(["node", "follow-audit", "--json"], {});

    expect(createSpinner()).toBeInstanceOf(SilentSpinner);
  });

  it("tracks text and state without printing", () => {
    const spinner = new SilentSpinner();

    spinner.start("Waiting 30s");
    expect(spinner.isSpinning).toBe(true);
    expect(spinner.text).toBe("Waiting 30s");

    spinner.stop();
    expect(spinner.isSpinning).toBe(false);
  });
});
