import { assert, describe, test } from "@trellis-ui/testkit";
import { TrellisError } from "../../errors.js";
import {
  isPathPrefix,
  normalizeStatePath,
  parseStatePath,
  pathsIntersect,
  tryNormalizeStatePath,
} from "../paths.js";

describe("state paths", () => {
  test("parse dot paths and bracket indices", () => {
    assert.deepEqual(parseStatePath("user.name"), ["user", "name"]);
    assert.deepEqual(parseStatePath("items[0].title"), ["items", "0", "title"]);
    assert.equal(normalizeStatePath("grid[1][2]"), "grid.1.2");
  });

  test("reject empty and malformed paths", () => {
    for (const bad of ["", "a.", ".a", "a..b", "a b", "a[x]"]) {
      assert.throws(
        () => parseStatePath(bad),
        (e: unknown) => e instanceof TrellisError && e.code === "TRUI_INVALID_STATE_PATH",
        `expected "${bad}" to be rejected`,
      );
      assert.equal(tryNormalizeStatePath(bad), null);
    }
  });

  test("prefix relation is segment-wise", () => {
    assert.equal(isPathPrefix("user", "user.name"), true);
    assert.equal(isPathPrefix("user", "user"), true);
    assert.equal(isPathPrefix("user", "username"), false);
    assert.equal(isPathPrefix("user.name", "user"), false);
  });

  test("paths intersect when equal or nested either way", () => {
    assert.equal(pathsIntersect("user", "user.name"), true);
    assert.equal(pathsIntersect("user.name", "user"), true);
    assert.equal(pathsIntersect("user.name", "user.age"), false);
    assert.equal(pathsIntersect("count", "count"), true);
  });
});
