import { type Deferred, assert, createDeferred, describe, flushMicrotasks, test } from "@trellis-ui/testkit";
import type { RemoteRequest } from "../../descriptor/types.js";
import { type RendererLogger, scopeLogger } from "../../logger.js";
import { createStateStore } from "../../state/store.js";
import {
  PENDING,
  type RemoteDataSource,
  createRemoteCoordinator,
  isRemoteFetchError,
  remoteRequestKey,
} from "../remote.js";

function controlledSource(): {
  source: RemoteDataSource;
  calls: RemoteRequest[];
  deferreds: Deferred<unknown>[];
} {
  const calls: RemoteRequest[] = [];
  const deferreds: Deferred<unknown>[] = [];
  return {
    calls,
    deferreds,
    source: {
      fetch: (request) => {
        calls.push(request);
        const d = createDeferred<unknown>();
        deferreds.push(d);
        return d.promise;
      },
    },
  };
}

function captureLogger(): { logger: RendererLogger; lines: string[] } {
  const lines: string[] = [];
  const push = (level: string) => (message: string) => {
    lines.push(`${level} ${message}`);
  };
  return {
    lines,
    logger: { debug: push("debug"), info: push("info"), warn: push("warn"), error: push("error") },
  };
}

function setup(dataSource: RemoteDataSource | null) {
  const store = createStateStore();
  const { logger, lines } = captureLogger();
  const settled: string[] = [];
  const remote = createRemoteCoordinator({
    store,
    dataSource,
    logger: scopeLogger(logger, "remote"),
    onSettled: (target) => settled.push(target),
  });
  return { store, remote, lines, settled };
}

describe("remoteRequestKey", () => {
  test("is independent of param order", () => {
    assert.equal(
      remoteRequestKey({ source: "users", params: { b: 2, a: [1, { y: 1, x: 0 }] } }),
      'users?{"a":[1,{"x":0,"y":1}],"b":2}',
    );
  });
});

describe("createRemoteCoordinator", () => {
  test("returns PENDING, fetches asynchronously, and writes the result", async () => {
    const src = controlledSource();
    const { store, remote } = setup(src.source);
    const owner = { path: "root", mounted: true };

    const first = remote.resolve({ source: "users", target: "u", params: { id: 1 }, current: undefined, owner });
    assert.equal(first, PENDING);
    assert.equal(remote.inflight, 1);
    assert.equal(src.calls.length, 0);

    await flushMicrotasks();
    assert.deepEqual(src.calls, [{ source: "users", params: { id: 1 } }]);

    src.deferreds[0]?.resolve({ name: "Ann" });
    await remote.whenIdle();
    assert.deepEqual(store.get("u"), { name: "Ann" });
    assert.equal(remote.inflight, 0);

    const again = remote.resolve({
      source: "users",
      target: "u",
      params: { id: 1 },
      current: store.get("u"),
      owner,
    });
    assert.deepEqual(again, { name: "Ann" });
    assert.equal(src.calls.length, 1);
  });

  test("joins an in-flight request for the same target and params", async () => {
    const src = controlledSource();
    const { remote } = setup(src.source);
    const a = { path: "a", mounted: true };
    const b = { path: "b", mounted: true };
    remote.resolve({ source: "users", target: "u", params: { id: 1 }, current: undefined, owner: a });
    remote.resolve({ source: "users", target: "u", params: { id: 1 }, current: undefined, owner: b });
    await flushMicrotasks();
    assert.equal(src.calls.length, 1);
    assert.equal(remote.inflight, 1);
  });

  test("rejections are written as RemoteFetchError values", async () => {
    const src = controlledSource();
    const { store, remote, lines } = setup(src.source);
    remote.resolve({
      source: "users",
      target: "u",
      params: { id: 1 },
      current: undefined,
      owner: { path: "root", mounted: true },
    });
    await flushMicrotasks();
    src.deferreds[0]?.reject(new Error("down"));
    await remote.whenIdle();

    const value = store.get("u");
    assert.equal(isRemoteFetchError(value), true);
    if (!isRemoteFetchError(value)) return;
    assert.equal(value.code, "TRUI_REMOTE_FETCH_ERROR");
    assert.equal(value.source, "users");
    assert.equal(value.target, "u");
    assert.equal(value.message, "Error: down");
    assert.deepEqual(
      lines.filter((l) => l.startsWith("warn")),
      ['warn [trellis][remote] fetch users?{"id":1} failed: Error: down'],
    );
  });

  test("a synchronous throw from the data source is captured", async () => {
    const { store, remote } = setup({
      fetch: () => {
        throw new TypeError("bad request");
      },
    });
    remote.resolve({ source: "s", target: "t", params: {}, current: undefined, owner: { path: "r", mounted: true } });
    await remote.whenIdle();
    const value = store.get("t");
    assert.equal(isRemoteFetchError(value), true);
    if (!isRemoteFetchError(value)) return;
    assert.equal(value.message, "TypeError: bad request");
  });

  test("without a data source the binding settles to an error", async () => {
    const { store, remote } = setup(null);
    remote.resolve({ source: "s", target: "t", params: {}, current: undefined, owner: { path: "r", mounted: true } });
    await remote.whenIdle();
    const value = store.get("t");
    assert.equal(isRemoteFetchError(value), true);
    if (!isRemoteFetchError(value)) return;
    assert.equal(value.message, "Error: no remote data source configured");
  });

  test("a newer request for the same target supersedes the older one", async () => {
    const src = controlledSource();
    const { store, remote, lines } = setup(src.source);
    const owner = { path: "root", mounted: true };
    remote.resolve({ source: "users", target: "u", params: { id: 1 }, current: undefined, owner });
    remote.resolve({ source: "users", target: "u", params: { id: 2 }, current: undefined, owner });
    await flushMicrotasks();
    assert.equal(src.calls.length, 2);

    src.deferreds[1]?.resolve("second");
    await flushMicrotasks();
    src.deferreds[0]?.resolve("first");
    await remote.whenIdle();

    assert.equal(store.get("u"), "second");
    assert.ok(lines.includes("debug [trellis][remote] dropped completion for u: superseded"));
  });

  test("a settled value is refetched when the params change", async () => {
    const src = controlledSource();
    const { store, remote } = setup(src.source);
    const owner = { path: "root", mounted: true };
    remote.resolve({ source: "users", target: "u", params: { id: 1 }, current: undefined, owner });
    await flushMicrotasks();
    src.deferreds[0]?.resolve("one");
    await remote.whenIdle();

    const out = remote.resolve({ source: "users", target: "u", params: { id: 2 }, current: "one", owner });
    assert.equal(out, PENDING);
    await flushMicrotasks();
    assert.deepEqual(src.calls[1], { source: "users", params: { id: 2 } });
  });

  test("externally seeded values are used without fetching", async () => {
    const src = controlledSource();
    const { remote } = setup(src.source);
    const out = remote.resolve({
      source: "users",
      target: "u",
      params: {},
      current: "seeded",
      owner: { path: "r", mounted: true },
    });
    assert.equal(out, "seeded");
    await flushMicrotasks();
    assert.equal(src.calls.length, 0);
  });

  test("completions for unmounted owners are dropped", async () => {
    const src = controlledSource();
    const { store, remote, lines } = setup(src.source);
    const owner = { path: "root.children[0]", mounted: true };
    remote.resolve({ source: "users", target: "u", params: {}, current: undefined, owner });
    await flushMicrotasks();
    owner.mounted = false;
    src.deferreds[0]?.resolve("late");
    await remote.whenIdle();

    assert.equal(store.get("u"), undefined);
    assert.equal(remote.inflight, 0);
    assert.ok(lines.includes("debug [trellis][remote] dropped completion for u: no mounted owner"));
  });

  test("completions after dispose are dropped", async () => {
    const src = controlledSource();
    const { store, remote } = setup(src.source);
    remote.resolve({ source: "users", target: "u", params: {}, current: undefined, owner: { path: "r", mounted: true } });
    await flushMicrotasks();
    remote.dispose();
    src.deferreds[0]?.resolve("late");
    await remote.whenIdle();
    assert.equal(store.get("u"), undefined);
    assert.equal(remote.inflight, 0);
  });

  test("a refetch that returns the stored value reports the target as settled", async () => {
    const src = controlledSource();
    const { store, remote, settled } = setup(src.source);
    const owner = { path: "root", mounted: true };
    remote.resolve({ source: "count", target: "n", params: { page: 1 }, current: undefined, owner });
    await flushMicrotasks();
    src.deferreds[0]?.resolve(5);
    await remote.whenIdle();
    assert.deepEqual(settled, []);

    const refetch = remote.resolve({ source: "count", target: "n", params: { page: 2 }, current: 5, owner });
    assert.equal(refetch, PENDING);
    await flushMicrotasks();
    src.deferreds[1]?.resolve(5);
    await remote.whenIdle();

    assert.deepEqual(settled, ["n"]);
    assert.equal(store.get("n"), 5);
    assert.equal(
      remote.resolve({ source: "count", target: "n", params: { page: 2 }, current: 5, owner }),
      5,
    );
    assert.equal(src.calls.length, 2);
  });

  test("an undefined result settles the binding without refetching", async () => {
    const src = controlledSource();
    const { remote, settled } = setup(src.source);
    const owner = { path: "root", mounted: true };
    remote.resolve({ source: "empty", target: "e", params: {}, current: undefined, owner });
    await flushMicrotasks();
    src.deferreds[0]?.resolve(undefined);
    await remote.whenIdle();

    assert.deepEqual(settled, ["e"]);
    assert.equal(
      remote.resolve({ source: "empty", target: "e", params: {}, current: undefined, owner }),
      undefined,
    );
    await flushMicrotasks();
    assert.equal(src.calls.length, 1);
    assert.equal(remote.inflight, 0);
  });
});
