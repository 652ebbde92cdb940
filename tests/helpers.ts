import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { createReporter, type Reporter } from "../src/errors";
import { createLogger } from "../src/log";

export const silentLogger = createLogger("silent");

export function lenientReporter(): Reporter {
  return createReporter({ strict: false, logger: silentLogger });
}

export function strictReporter(): Reporter {
  return createReporter({ strict: true, logger: silentLogger });
}

/**
 * Create a temp directory holding the given files (path -> contents)
 */
export async function makeTree(files: Record<string, string> = {}): Promise<string> {
  const root = await mkdtemp(join(tmpdir(), "jotsite-test-"));
  for (const [path, contents] of Object.entries(files)) {
    const target = join(root, path);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, contents);
  }
  return root;
}

export async function removeTree(root: string): Promise<void> {
  await rm(root, { recursive: true, force: true });
}

/**
 * Every file under a directory, as relative path -> contents
 */
export async function readTree(root: string, prefix = ""): Promise<Record<string, string>> {
  const result: Record<string, string> = {};
  const entries = await readdir(join(root, prefix), { withFileTypes: true });
  for (const entry of entries) {
    const path = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      Object.assign(result, await readTree(root, path));
    } else {
      result[path] = await readFile(join(root, path), "utf-8");
    }
  }
  return result;
}
