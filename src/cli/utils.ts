import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

/** Reads the version from package.json at the package root (two levels above src/cli or dist/cli). */
export function getPackageJsonVersion(): string {
  try {
    const raw = readFileSync(fileURLToPath(new URL("../../package.json", import.meta.url)), "utf8");
    const pkg = JSON.parse(raw) as { version?: unknown };
    return typeof pkg.version === "string" ? pkg.version : "0.1.0";
  } catch {
    return "0.1.0";
  }
}
