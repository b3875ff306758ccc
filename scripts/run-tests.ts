/**
 * scripts/run-tests.ts — Run every package test suite under `node --test`.
 *
 * Why: Node 20 neither expands globs nor discovers `.ts` files on its own, so
 * the files are collected here and handed to one `node --test` run.
 */

import { spawnSync } from "node:child_process";
import { fileURLToPath } from "node:url";
import { collectTestFiles } from "@trellis-ui/testkit";

const repoRoot = fileURLToPath(new URL("..", import.meta.url));
const files = collectTestFiles(repoRoot);

if (files.length === 0) {
  process.stderr.write("run-tests: no test files found under packages/\n");
  process.exitCode = 1;
} else {
  const result = spawnSync(process.execPath, ["--import", "tsx", "--test", ...files], {
    cwd: repoRoot,
    stdio: "inherit",
  });
  if (result.error) {
    process.stderr.write(`run-tests: ${result.error.message}\n`);
    process.exitCode = 1;
  } else {
    process.exitCode = result.status ?? 1;
  }
}
