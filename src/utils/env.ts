import fs from "node:fs";
import path from "node:path";

export type EnvTarget = Record<string, string | undefined>;

/**
 * Candidate env files for a run: `.env.local` in the working directory, then
 * `.env` beside the suite file. Earlier files win because loading never
 * overrides a key that is already set.
 */
export function defaultEnvFiles(options: {
  readonly cwd: string;
  readonly suiteDir?: string;
}): readonly string[] {
  const files = [path.join(options.cwd, ".env.local")];
  if (options.suiteDir) {
    files.push(path.join(options.suiteDir, ".env"));
  }
  return files;
}

/**
 * Loads `.env`-style files into `target` (defaults to `process.env`).
 *
 * - Missing files are skipped.
 * - Keys already present in `target` are kept unless `override` is set.
 *
 * Returns the files that were read.
 */
export function loadEnvFiles(
  filePaths: readonly string[],
  { override = false, target = process.env }: { override?: boolean; target?: EnvTarget } = {},
): readonly string[] {
  const loaded: string[] = [];
  for (const filePath of filePaths) {
    let content: string;
    try {
      content = fs.readFileSync(filePath, "utf8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException)?.code === "ENOENT") {
        continue;
      }
      throw error;
    }
    for (const [key, value] of parseEnvContent(content)) {
      if (override || target[key] === undefined) {
        target[key] = value;
      }
    }
    loaded.push(filePath);
  }
  return loaded;
}

export function parseEnvContent(content: string): ReadonlyMap<string, string> {
  const entries = new Map<string, string>();
  for (const line of content.split(/\r?\n/u)) {
    const entry = parseEnvLine(line);
    if (entry) {
      entries.set(entry[0], entry[1]);
    }
  }
  return entries;
}

function parseEnvLine(line: string): [string, string] | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) {
    return null;
  }

  const match = trimmed.match(/^(?:export\s+)?([A-Za-z_][A-Za-z0-9_\-.]*)\s*=\s*(.*)$/u);
  const key = match?.[1];
  if (!match || !key) {
    return null;
  }
  let value = match[2] ?? "";

  const quote = value[0];
  if ((quote === '"' || quote === "'") && value.length >= 2 && value.endsWith(quote)) {
    return [key, value.slice(1, -1)];
  }
  const commentIndex = value.indexOf(" #");
  if (commentIndex >= 0) {
    value = value.slice(0, commentIndex);
  }
  return [key, value.trim()];
}
