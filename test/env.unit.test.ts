import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import type { EnvTarget } from "../src/utils/env.js";
import { defaultEnvFiles, loadEnvFiles, parseEnvContent } from "../src/utils/env.js";

describe("env", () => {
  it("parses comments, quotes and export prefixes", () => {
    const entries = parseEnvContent(
      [
        "# comment",
        "FOO=from-file",
        'export BAR="quoted # not a comment"',
        "BAZ='single quoted'",
        "TRIM=  spaced  ",
        "WITH_COMMENT=value # trailing comment",
        "not a line",
        "",
      ].join("\n"),
    );
    expect([...entries]).toEqual([
      ["FOO", "from-file"],
      ["BAR", "quoted # not a comment"],
      ["BAZ", "single quoted"],
      ["TRIM", "spaced"],
      ["WITH_COMMENT", "value"],
    ]);
  });

  it("loads files in order without overriding existing keys", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "token-duel-env-"));
    const first = path.join(tmpDir, ".env.local");
    const second = path.join(tmpDir, ".env");
    fs.writeFileSync(first, "FOO=first\n", "utf8");
    fs.writeFileSync(second, "FOO=second\nBAR=second\n", "utf8");

    const target: EnvTarget = { BAR: "preset" };
    const loaded = loadEnvFiles([first, path.join(tmpDir, "missing.env"), second], { target });

    expect(loaded).toEqual([first, second]);
    expect(target).toEqual({ FOO: "first", BAR: "preset" });
  });

  it("overrides existing keys when asked", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "token-duel-env-"));
    const file = path.join(tmpDir, ".env");
    fs.writeFileSync(file, "BAR=from-file\n", "utf8");

    const target: EnvTarget = { BAR: "preset" };
    loadEnvFiles([file], { target, override: true });
    expect(target.BAR).toBe("from-file");
  });

  it("looks in the working directory and beside the suite", () => {
    expect(defaultEnvFiles({ cwd: "/work", suiteDir: "/suites" })).toEqual([
      path.join("/work", ".env.local"),
      path.join("/suites", ".env"),
    ]);
    expect(defaultEnvFiles({ cwd: "/work" })).toEqual([path.join("/work", ".env.local")]);
  });
});
