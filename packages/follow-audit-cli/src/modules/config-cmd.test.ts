import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { Command } from "commander";
import { registerConfigCommands, EXAMPLE_CONFIG } from "./config-cmd.js";

vi.mock("fs", () => ({
  existsSync: vi.fn(),
  mkdirSync: vi.fn(),
  writeFileSync: vi.fn(),
}));

// Mock chalk to avoid color codes in tests
vi.mock("chalk", () => ({
  default: {
    red: (s: string) => s,
    green: (s: string) => s,
    yellow: (s: string) => s,
    cyan: (s: string) => s,
    gray: (s: string) => s,
    bold: (s: string) => s,
  },
}));

vi.mock("../lib/config.js", () => ({
  loadConfig: vi.fn(),
  loadConfigFile: vi.fn(),
  USER_CONFIG_PATH: "/home/user/.config/follow-audit/config.yaml",
  SYSTEM_CONFIG_PATH: "/etc/follow-audit/config.yaml",
}));

import { existsSync, mkdirSync, writeFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import { loadConfig, loadConfigFile, type ResolvedConfig } from "../lib/config.js";
import { invalidConfig } from "../lib/errors/catalog.js";

const RESOLVED: ResolvedConfig = {
  numTabs: 5,
  durationSeconds: 30,
  trailingPause: true,
  domain: "https://www.instagram.com/",
  strategy: "diff",
  logLevel: "warn",
  logJson: false,
};

describe("config-cmd", () => {
  let program: Command;
  let consoleLogSpy: MockInstance;
  let consoleErrorSpy: MockInstance;

  beforeEach(() => {
    vi.resetAllMocks();

    program = new Command();
    program.exitOverride();
    registerConfigCommands(program);

    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

    process.exitCode = undefined;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  describe("example config", () => {
    it("parses into the documented defaults", () => {
      expect(parseYaml(EXAMPLE_CONFIG)).toEqual({
        batch: { numTabs: 5, durationSeconds: 30, trailingPause: true },
        links: { domain: "https://www.instagram.com/", strategy: "diff" },
        logging: { level: "warn", json: false },
      });
    });
  });

  describe("config init", () => {
    it("creates user config file when it does not exist", async () => {
      vi.mocked(existsSync).mockReturnValue(false);

      await program.parseAsync(["node", "test", "config", "init"]);

      expect(mkdirSync).toHaveBeenCalledWith("/home/user/.config/follow-audit", { recursive: true });
      expect(writeFileSync).toHaveBeenCalledWith(
        "/home/user/.config/follow-audit/config.yaml",
        EXAMPLE_CONFIG,
        "utf-8"
      );
      expect(consoleLogSpy).toHaveBeenCalledWith(
        "Created config file: /home/user/.config/follow-audit/config.yaml"
      );
    });

    it("creates system config with --global flag", async () => {
      vi.mocked(existsSync).mockReturnValue(false);

      await program.parseAsync(["node", "test", "config", "init", "--global"]);

      expect(writeFileSync).toHaveBeenCalledWith(
        "/etc/follow-audit/config.yaml",
        EXAMPLE_CONFIG,
        "utf-8"
      );
    });

    it("does not overwrite existing config file", async () => {
      vi.mocked(existsSync).mockReturnValue(true);

      await program.parseAsync(["node", "test", "config", "init"]);

      expect(writeFileSync).not.toHaveBeenCalled();
      expect(consoleErrorSpy).toHaveBeenCalledWith(
        "Config file already exists: /home/user/.config/follow-audit/config.yaml"
      );
      expect(process.exitCode).toBe(1);
    });

    it("suggests sudo when the global config cannot be written", async () => {
      vi.mocked(existsSync).mockReturnValue(false);
      vi.mocked(writeFileSync).mockImplementation(() => {
        throw new Error("Permission denied");
      });

      await program.parseAsync(["node", "test", "config", "init", "--global"]);

      expect(consoleErrorSpy).toHaveBeenCalledWith("Failed to create config: Permission denied");
      expect(consoleErrorSpy).toHaveBeenCalledWith("System config may require sudo.");
      expect(process.exitCode).toBe(1);
    });
  });

  describe("config validate", () => {
    it("validates existing config files", async () => {
      vi.mocked(existsSync).mockImplementation((path) => String(path).includes("/home/"));
      vi.mocked(loadConfigFile).mockReturnValue({});

      await program.parseAsync(["node", "test", "config", "validate"]);

      expect(loadConfigFile).toHaveBeenCalledTimes(1);
      expect(consoleLogSpy).toHaveBeenCalledWith("  ✓ Valid");
      expect(consoleLogSpy).toHaveBeenCalledWith("\nAll configuration files are valid.");
    });

    it("prints issue details for invalid files", async () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(loadConfigFile).mockImplementation(() => {
        throw invalidConfig("/bad/config.yaml", ["batch.numTabs: too small"]);
      });

      await program.parseAsync(["node", "test", "config", "validate", "-c", "/bad/config.yaml"]);

      expect(consoleErrorSpy).toHaveBeenCalledWith(
        "  ✗ Invalid: Config file /bad/config.yaml has errors\nbatch.numTabs: too small"
      );
      expect(process.exitCode).toBe(1);
    });

    it("reports file not found for specific path", async () => {
      vi.mocked(existsSync).mockReturnValue(false);

      await program.parseAsync(["node", "test", "config", "validate", "-c", "/missing/config.yaml"]);

      expect(consoleErrorSpy).toHaveBeenCalledWith("File not found: /missing/config.yaml");
      expect(process.exitCode).toBe(1);
    });

    it("shows message when no config files found", async () => {
      vi.mocked(existsSync).mockReturnValue(false);

      await program.parseAsync(["node", "test", "config", "validate"]);

      expect(consoleLogSpy).toHaveBeenCalledWith("No configuration files found.");
      expect(process.exitCode).toBeUndefined();
    });
  });

  describe("config show", () => {
    it("displays effective configuration", async () => {
      vi.mocked(loadConfig).mockReturnValue({
        config: RESOLVED,
        sources: ["/home/user/.config/follow-audit/config.yaml"],
      });

      await program.parseAsync(["node", "test", "config", "show"]);

      expect(consoleLogSpy).toHaveBeenCalledWith(
        "Sources: /home/user/.config/follow-audit/config.yaml"
      );
      expect(consoleLogSpy).toHaveBeenCalledWith("  numTabs:          5");
      expect(consoleLogSpy).toHaveBeenCalledWith("  strategy:         diff");
    });

    it("shows defaults only message when no sources", async () => {
      vi.mocked(loadConfig).mockReturnValue({ config: RESOLVED, sources: [] });

      await program.parseAsync(["node", "test", "config", "show"]);

      expect(consoleLogSpy).toHaveBeenCalledWith("Sources: (defaults only)");
    });

    it("uses custom config path with -c option", async () => {
      vi.mocked(loadConfig).mockReturnValue({ config: RESOLVED, sources: [] });

      await program.parseAsync(["node", "test", "config", "show", "-c", "/custom/config.yaml"]);

      expect(loadConfig).toHaveBeenCalledWith("/custom/config.yaml");
    });

    it("handles config loading errors", async () => {
      vi.mocked(loadConfig).mockImplementation(() => {
        throw new Error("Config parse error");
      });

      await program.parseAsync(["node", "test", "config", "show"]);

      expect(consoleErrorSpy).toHaveBeenCalledWith("Failed to load config: Config parse error");
      expect(process.exitCode).toBe(1);
    });
  });

  describe("config path", () => {
    it("displays both locations and whether they exist", async () => {
      vi.mocked(existsSync).mockImplementation((path) => String(path).startsWith("/etc/"));

      await program.parseAsync(["node", "test", "config", "path"]);

      expect(consoleLogSpy.mock.calls.map((call) => call[0])).toEqual([
        "User config:",
        "  /home/user/.config/follow-audit/config.yaml",
        "  (not found)",
        "System config:",
        "  /etc/follow-audit/config.yaml",
        "  (exists)",
      ]);
    });
  });
});
