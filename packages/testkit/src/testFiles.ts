import { readdirSync, statSync } from "node:fs";
import { join, relative, sep } from "node:path";

function walkFiles(root: string, shouldInclude: (fullPath: string) => boolean): string[] {
  const out: string[] = [];
  const stack = [root];
  while (stack.length > 0) {
    const dir = stack.pop();
    if (!dir) continue;
    const entries = readdirSync(dir);
    entries.sort();
    for (const name of entries) {
      const full = join(dir, name);
      const st = statSync(full);
      if (st.isDirectory()) {
        if (name === "node_modules" || name === "dist" || name === ".git") continue;
        stack.push(full);
        continue;
      }
      if (shouldInclude(full)) out.push(full);
    }
  }
  out.sort();
  return out;
}

/**
 * Every `*.test.ts` inside a `__tests__` directory under `<root>/packages`,
 * relative to `root`, sorted.
 */
export function collectTestFiles(root: string): string[] {
  return walkFiles(
    join(root, "packages"),
    (full) => full.endsWith(".test.ts") && full.includes(`${sep}__tests__${sep}`),
  ).map((full) => relative(root, full));
}
