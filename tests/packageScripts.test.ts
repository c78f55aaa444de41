import { existsSync, readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { describe, it, expect } from "vitest";

const root = new URL("../", import.meta.url);

interface Manifest {
  bin?: unknown;
  scripts: Record<string, string>;
  dependencies: Record<string, string>;
}

const manifest: Manifest = JSON.parse(
  readFileSync(new URL("package.json", root), "utf8")
);

describe("package scripts", () => {
  it("runs each CLI through tsx installed as a runtime dependency", () => {
    expect(manifest.scripts.export).toBe("tsx src/bin/export-height.ts");
    expect(manifest.scripts["update-parents"]).toBe("tsx src/bin/update-parents.ts");
    expect(manifest.dependencies).toHaveProperty("tsx");
  });

  it("points every script at an entry point that exists", () => {
    for (const script of [manifest.scripts.export, manifest.scripts["update-parents"]]) {
      const entry = script.replace(/^tsx /, "");
      expect(existsSync(fileURLToPath(new URL(entry, root)))).toBe(true);
    }
  });

  it("publishes no bin entries that would need tsx on the PATH", () => {
    expect(manifest.bin).toBeUndefined();
  });
});
