import { readFileSync } from "fs";
import { z } from "zod";

const PackageJsonSchema = z.object({ version: z.string() });

let cachedVersion: string | undefined;

/**
 * Version from the package manifest next to `src/` (or `dist/`).
 */
export function getVersion(): string {
  if (cachedVersion === undefined) {
    const raw = readFileSync(new URL("../../package.json", import.meta.url), "utf-8");
    cachedVersion = PackageJsonSchema.parse(JSON.parse(raw)).version;
  }
  return cachedVersion;
}
