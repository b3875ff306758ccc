export { createDeferred, flushMicrotasks, type Deferred } from "./deferred.js";
export { readFixture, readJsonFixture } from "./fixtures.js";
export { assert, describe, test } from "./nodeTest.js";
export { collectTestFiles } from "./testFiles.js";
