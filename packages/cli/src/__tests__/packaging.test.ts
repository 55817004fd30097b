/**
 * @summary Tests that built artifacts resolve without the TypeScript sources.
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { describe, it, expect } from "vitest";
import config from "../../tsup.config.js";

// ---------------------------------------------------------------------------
// Test Fixtures
// ---------------------------------------------------------------------------

const readManifest = (pkg: string): unknown =>
  JSON.parse(
    readFileSync(fileURLToPath(new URL(`../../../${pkg}/package.json`, import.meta.url)), "utf8")
  );

const field = (value: unknown, key: string): unknown => {
  if (typeof value !== "object" || value === null) return undefined;
  return new Map(Object.entries(value)).get(key);
};

// ---------------------------------------------------------------------------
// CLI Bundle Tests
// ---------------------------------------------------------------------------

describe("cli bundle", () => {
  if (typeof config === "function" || Array.isArray(config)) {
    throw new Error("expected a single tsup options object");
  }
  const options = config;

  const isBundled = (name: string): boolean =>
    (options.noExternal ?? []).some((pattern) =>
      typeof pattern === "string" ? pattern === name : pattern.test(name)
    );

  it("inlines every workspace package", () => {
    expect(isBundled("@coinlab/core")).toBe(true);
    expect(isBundled("@coinlab/simulator")).toBe(true);
    expect(isBundled("@coinlab/wallet")).toBe(true);
  });

  it("leaves registry dependencies external", () => {
    expect(isBundled("commander")).toBe(false);
    expect(options.external).toEqual(["commander", "chalk", "vitest"]);
  });
});

// ---------------------------------------------------------------------------
// Package Export Tests
// ---------------------------------------------------------------------------

describe("package exports", () => {
  it.each(["core", "simulator", "wallet"])("%s resolves to built JavaScript at run time", (pkg) => {
    const root = field(field(readManifest(pkg), "exports"), ".");

    expect(field(root, "types")).toBe("./src/index.ts");
    expect(field(root, "import")).toBe("./dist/index.js");
    expect(field(root, "require")).toBe("./dist/index.cjs");
  });

  it("maps the core subpaths to their built entries", () => {
    const exports = field(readManifest("core"), "exports");

    expect(field(field(exports, "./types"), "import")).toBe("./dist/types/index.js");
    expect(field(field(exports, "./utils"), "import")).toBe("./dist/utils/index.js");
  });
});
