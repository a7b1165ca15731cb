/**
 * Package version, read from package.json so there is one source of truth.
 */
import { readFileSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";

export const PROGRAM_NAME = "Split-Flap Channel Stats";

function readVersion(): string {
  // ESM has no __dirname
  const selfDir = dirname(fileURLToPath(import.meta.url));

  const candidates = [
    join(selfDir, "..", "package.json"),       // from src/
    join(selfDir, "..", "..", "package.json"), // from dist/src/
  ];
  for (const p of candidates) {
    if (!existsSync(p)) continue;
    const pkg: unknown = JSON.parse(readFileSync(p, "utf-8"));
    if (
      typeof pkg === "object" && pkg !== null &&
      "name" in pkg && pkg.name === "flapstat" &&
      "version" in pkg && typeof pkg.version === "string"
    ) {
      return pkg.version;
    }
  }
  return "unknown";
}

export const VERSION = readVersion();
