import { assert, describe, test } from "@trellis-ui/testkit";
import { SILENT_LOGGER, scopeLogger } from "../../logger.js";
import { createPathIndex } from "../../state/pathIndex.js";
import { createStateStore } from "../../state/store.js";
import { type RecordedOutput, createRecordingRegistry } from "../../testing/index.js";
import { createBuildJournal, createTreeBuilder } from "../builder.js";
import { type NodeHandle, isNodeHandle } from "../handle.js";
import { createRemoteCoordinator } from "../remote.js";

function setup(state: Record<string, unknown> = {}, maxDepth = 64) {
  const store = createStateStore(state);
  const recording = createRecordingRegistry(["Page", "Row", "Text", "Badge"]);
  const index = createPathIndex<NodeHandle<RecordedOutput>>();
  const remote = createRemoteCoordinator({
    store,
    dataSource: null,
    logger: scopeLogger(SILENT_LOGGER, "remote"),
  });
  const builder = createTreeBuilder({
    registry: recording.registry,
    store,
    remote,
    index,
    logger: scopeLogger(SILENT_LOGGER, "builder"),
    maxDepth,
  });
  return { store, recording, index, builder };
}

function childHandle(
  handle: NodeHandle<RecordedOutput>,
  i: number,
): NodeHandle<RecordedOutput> {
  const entry = handle.current;
  if (entry.type !== "node") throw new Error(`${handle.path} is faulted`);
  const child = entry.children[i];
  if (!isNodeHandle<RecordedOutput>(child)) throw new Error(`child ${String(i)} of ${handle.path} is not a handle`);
  return child;
}

describe("TreeBuilder.build", () => {
  test("empty values and primitives pass through unchanged", () => {
    const { builder } = setup();
    const empty: unknown[] = [];
    for (const value of [undefined, null, false, "", 0, "text", 12, empty]) {
      const res = builder.build(value, {}, "root");
      assert.equal(res.ok, true);
      if (!res.ok) return;
      assert.equal(res.value, value);
    }
  });

  test("other shapes in descriptor position are malformed", () => {
    const { builder } = setup();
    const cases: readonly [unknown, string][] = [
      [[1], "expected a node descriptor at root, got sequence [1]"],
      [{ a: 1 }, 'expected a node descriptor at root, got structured {"a":1}'],
      [() => 1, "expected a node descriptor at root, got opaque [function anonymous]"],
    ];
    for (const [value, detail] of cases) {
      const res = builder.build(value, {}, "root");
      assert.equal(res.ok, false);
      if (res.ok) return;
      assert.deepEqual(res.fatal, { code: "TRUI_MALFORMED_DESCRIPTOR", detail });
    }
  });

  test("descriptors resolve attributes and record their dependencies", () => {
    const { builder, index, recording } = setup({ name: "Ann" });
    const res = builder.build({ kind: "Text", attributes: { value: "$state.name" } }, {}, "root");
    assert.equal(res.ok, true);
    if (!res.ok || !isNodeHandle<RecordedOutput>(res.value)) return;
    const handle = res.value;
    assert.equal(handle.current.type, "node");
    if (handle.current.type !== "node") return;
    assert.deepEqual(handle.current.attributes, { value: "Ann" });
    assert.deepEqual(handle.current.output, {
      kind: "Text",
      path: "root",
      attributes: { value: "Ann" },
      children: [],
    });
    assert.deepEqual([...index.pathsOf(handle)], ["name"]);
    assert.deepEqual(recording.paths(), ["root"]);
  });

  test("inherited attributes take precedence over resolved ones", () => {
    const { builder } = setup();
    const res = builder.build(
      { kind: "Text", attributes: { color: "red", size: 1 } },
      { color: "blue" },
      "root",
    );
    if (!res.ok || !isNodeHandle(res.value) || res.value.current.type !== "node") {
      assert.fail("expected a built node");
    }
    assert.deepEqual(res.value.current.attributes, { color: "blue", size: 1 });
  });

  test("a root with an unknown kind fails with UnknownComponentKind", () => {
    const { builder } = setup();
    const res = builder.build({ kind: "Unknown", attributes: {} }, {}, "root");
    assert.equal(res.ok, false);
    if (res.ok) return;
    assert.deepEqual(res.fatal, {
      code: "TRUI_UNKNOWN_COMPONENT_KIND",
      detail: 'no component registered for kind "Unknown" at root',
    });
  });

  test("building again at the same path replaces the previous root", () => {
    const { builder, index } = setup({ name: "Ann" });
    const descriptor = { kind: "Text", attributes: { value: "$state.name" } };
    const first = builder.build(descriptor, {}, "root");
    const second = builder.build(descriptor, {}, "root");
    if (!first.ok || !second.ok || !isNodeHandle(first.value) || !isNodeHandle(second.value)) {
      return assert.fail("expected two built roots");
    }
    assert.equal(first.value.mounted, false);
    assert.equal(second.value.mounted, true);
    assert.equal(builder.lookup("root"), second.value);
    assert.equal(index.size, 1);
    assert.deepEqual([...index.query("name")], [second.value]);
    assert.equal(builder.mountedCount, 1);
  });
});

describe("fault isolation", () => {
  test("an unknown child faults alone; siblings and parent build", () => {
    const { builder, recording } = setup();
    const root = builder.mountRoot(
      {
        kind: "Page",
        children: [{ kind: "Text" }, { kind: "Unknown", attributes: {} }, { kind: "Text" }],
      },
      {},
      "root",
      createBuildJournal(),
    );
    assert.equal(root.current.type, "node");
    assert.equal(childHandle(root, 0).current.type, "node");
    assert.equal(childHandle(root, 2).current.type, "node");

    const bad = childHandle(root, 1).current;
    assert.equal(bad.type, "fault");
    if (bad.type !== "fault") return;
    assert.equal(bad.code, "TRUI_UNKNOWN_COMPONENT_KIND");
    assert.equal(bad.kind, "Unknown");
    assert.equal(bad.detail, 'no component registered for kind "Unknown" at root.children[1]');
    assert.deepEqual(recording.paths(), ["root.children[0]", "root.children[2]", "root"]);
  });

  test("renderable throws become RenderThrow faults", () => {
    const { builder, recording } = setup();
    recording.registry.register("Boom", () => {
      throw new Error("kaput");
    });
    const journal = createBuildJournal();
    const root = builder.mountRoot(
      { kind: "Page", children: [{ kind: "Boom" }] },
      {},
      "root",
      journal,
    );
    const entry = childHandle(root, 0).current;
    assert.equal(entry.type, "fault");
    if (entry.type !== "fault") return;
    assert.equal(entry.code, "TRUI_RENDER_THROW");
    assert.equal(entry.detail, "Error: kaput");
    assert.deepEqual(journal.faults, ["root.children[0]"]);
  });

  test("malformed children fault; primitives and empty containers pass", () => {
    const { builder } = setup();
    const root = builder.mountRoot(
      { kind: "Page", children: ["text", 3, null, [], {}, { a: 1 }] },
      {},
      "root",
      createBuildJournal(),
    );
    const entry = root.current;
    if (entry.type !== "node") return assert.fail("root should build");
    assert.deepEqual(entry.children.slice(0, 5), ["text", 3, null, [], {}]);
    const bad = childHandle(root, 5).current;
    assert.equal(bad.type, "fault");
    if (bad.type !== "fault") return;
    assert.equal(bad.code, "TRUI_MALFORMED_DESCRIPTOR");
    assert.equal(bad.kind, null);
    assert.equal(
      bad.detail,
      'expected a node descriptor at root.children[5], got structured {"a":1}',
    );
  });

  test("duplicate keys fault only the later sibling", () => {
    const { builder, recording } = setup();
    const root = builder.mountRoot(
      {
        kind: "Page",
        children: [
          { kind: "Text", key: "a" },
          { kind: "Text", key: "a" },
        ],
      },
      {},
      "root",
      createBuildJournal(),
    );
    const first = childHandle(root, 0);
    const second = childHandle(root, 1);
    assert.equal(first.path, "root.children[k:a]");
    assert.equal(first.current.type, "node");
    assert.equal(second.path, "root.children[1]");
    assert.deepEqual(
      second.current.type === "fault" ? [second.current.code, second.current.detail] : null,
      ["TRUI_MALFORMED_DESCRIPTOR", 'duplicate sibling key "a" under root (child indices 0 and 1)'],
    );
    assert.deepEqual(recording.paths(), ["root.children[k:a]", "root"]);
  });

  test("nesting beyond maxDepth faults the deep node", () => {
    const { builder } = setup({}, 1);
    const root = builder.mountRoot(
      { kind: "Page", children: [{ kind: "Row", children: [{ kind: "Text" }] }] },
      {},
      "root",
      createBuildJournal(),
    );
    const deep = childHandle(childHandle(root, 0), 0).current;
    assert.equal(deep.type, "fault");
    if (deep.type !== "fault") return;
    assert.equal(deep.detail, "root.children[0].children[0] is nested deeper than maxDepth=1");
  });
});

describe("handles across rebuilds", () => {
  test("kept positions reuse their handle; removed ones unmount", () => {
    const { builder } = setup();
    const root = builder.mountRoot(
      { kind: "Page", children: [{ kind: "Text", key: "a" }, { kind: "Text", key: "b" }] },
      {},
      "root",
      createBuildJournal(),
    );
    const a = builder.lookup("root.children[k:a]");
    const b = builder.lookup("root.children[k:b]");
    if (a === undefined || b === undefined) return assert.fail("child handles should be mounted");
    assert.equal(builder.mountedCount, 3);

    root.source = { kind: "Page", children: [{ kind: "Text", key: "a" }] };
    const journal = createBuildJournal();
    builder.rebuild(root, journal);

    assert.deepEqual(journal, {
      rebuilt: ["root", "root.children[k:a]"],
      mounted: [],
      unmounted: ["root.children[k:b]"],
      faults: [],
    });
    assert.equal(builder.lookup("root.children[k:a]"), a);
    assert.equal(childHandle(root, 0), a);
    assert.equal(b.mounted, false);
    assert.equal(builder.lookup("root.children[k:b]"), undefined);
    assert.equal(builder.mountedCount, 2);
  });

  test("a kind change at the same path mounts a new handle", () => {
    const { builder } = setup();
    const root = builder.mountRoot(
      { kind: "Page", children: [{ kind: "Text", key: "a" }] },
      {},
      "root",
      createBuildJournal(),
    );
    const before = childHandle(root, 0);
    root.source = { kind: "Page", children: [{ kind: "Row", key: "a" }] };
    const journal = createBuildJournal();
    builder.rebuild(root, journal);

    const after = childHandle(root, 0);
    assert.notEqual(after, before);
    assert.equal(before.mounted, false);
    assert.equal(builder.lookup("root.children[k:a]"), after);
    assert.deepEqual(journal.mounted, ["root.children[k:a]"]);
    assert.deepEqual(journal.unmounted, ["root.children[k:a]"]);
  });

  test("descriptors nested in attributes get their own handle and record", () => {
    const { builder, index } = setup({ n: 5 });
    const root = builder.mountRoot(
      { kind: "Page", attributes: { extra: { kind: "Badge", attributes: { count: "$state.n" } } } },
      {},
      "root",
      createBuildJournal(),
    );
    const entry = root.current;
    if (entry.type !== "node") return assert.fail("root should build");
    const extra = entry.attributes.extra;
    assert.equal(isNodeHandle(extra), true);
    assert.equal(builder.lookup("root.attributes.extra"), extra);
    assert.equal(index.pathsOf(root).size, 0);
    const badge = builder.lookup("root.attributes.extra");
    if (badge === undefined) return assert.fail("badge handle should be mounted");
    assert.deepEqual([...index.pathsOf(badge)], ["n"]);
  });

  test("unmount drops the whole subtree from the index", () => {
    const { builder, index } = setup({ a: 1, b: 2 });
    const journal = createBuildJournal();
    const root = builder.mountRoot(
      {
        kind: "Page",
        attributes: { a: "$state.a" },
        children: [{ kind: "Text", attributes: { b: "$state.b" } }],
      },
      {},
      "root",
      journal,
    );
    assert.equal(index.size, 2);
    builder.unmount(root, journal);
    assert.equal(index.size, 0);
    assert.equal(builder.mountedCount, 0);
    assert.deepEqual(journal.unmounted, ["root.children[0]", "root"]);
  });
});
