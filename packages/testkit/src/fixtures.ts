import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

const FIXTURES_DIR = new URL("../fixtures/", import.meta.url);

function fixtureUrl(name: string): URL {
  if (name.length === 0 || name.includes("..") || name.startsWith("/")) {
    throw new Error(`readFixture: invalid fixture name "${name}"`);
  }
  return new URL(name, FIXTURES_DIR);
}

/** Read a fixture from packages/testkit/fixtures as UTF-8 text. */
export function readFixture(name: string): string {
  return readFileSync(fileURLToPath(fixtureUrl(name)), "utf8");
}

/** Read and parse a JSON fixture. */
export function readJsonFixture(name: string): unknown {
  return JSON.parse(readFixture(name));
}
