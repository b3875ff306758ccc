/**
 * packages/core/src/runtime/slots.ts — Child slots and path identity.
 *
 * Why: Path identity is how the builder matches a node across rebuilds. Each
 * child gets a slot: keyed ("k:mykey") when its descriptor carries a key,
 * indexed ("i:0") otherwise, and the slot determines the child's path.
 *
 * Slot rules:
 *   - Keyed children keep their path across reordering
 *   - Unkeyed children are identified by position
 *   - A repeated key marks the later sibling as a duplicate; it is given its
 *     indexed path so it can carry its own fault
 */

import type { DescriptorKey } from "../descriptor/types.js";

/** Slot identifier: keyed ("k:mykey") or indexed ("i:0"). */
export type SlotId = `k:${string}` | `i:${number}`;

export type ChildSlot = Readonly<{
  slotId: SlotId;
  index: number;
  path: string;
  value: unknown;
  /** Index of the earlier sibling that already claimed this key. */
  duplicateOf: number | null;
}>;

function readKey(child: unknown): DescriptorKey | undefined {
  if (typeof child !== "object" || child === null || Array.isArray(child)) return undefined;
  const key: unknown = Reflect.get(child, "key");
  if (typeof key === "string") return key;
  if (typeof key === "number" && Number.isFinite(key)) return key;
  return undefined;
}

/** Compute the slot ID for a child: keyed if key present, indexed otherwise. */
export function slotIdForChild(child: unknown, childIndex: number): SlotId {
  const key = readKey(child);
  if (key !== undefined) return `k:${String(key)}`;
  return `i:${childIndex}`;
}

export function childPath(parentPath: string, slotId: SlotId): string {
  const inner = slotId.startsWith("i:") ? slotId.slice(2) : slotId;
  return `${parentPath}.children[${inner}]`;
}

/** Base path for values nested in a node's attributes (`<path>.attributes.<name>`). */
export function attributesPath(parentPath: string): string {
  return `${parentPath}.attributes`;
}

function duplicateKeyDetail(parentPath: string, key: string, aIndex: number, bIndex: number): string {
  return `duplicate sibling key "${key}" under ${parentPath} (child indices ${String(
    aIndex,
  )} and ${String(bIndex)})`;
}

export function describeDuplicate(parentPath: string, slot: ChildSlot): string {
  const key = slot.slotId.startsWith("k:") ? slot.slotId.slice(2) : slot.slotId;
  return duplicateKeyDetail(parentPath, key, slot.duplicateOf ?? slot.index, slot.index);
}

export function planChildSlots(parentPath: string, children: readonly unknown[]): readonly ChildSlot[] {
  const firstBySlot = new Map<SlotId, number>();
  const out: ChildSlot[] = [];
  for (let i = 0; i < children.length; i++) {
    const value = children[i];
    const slotId = slotIdForChild(value, i);
    const existing = firstBySlot.get(slotId);
    if (existing !== undefined) {
      const indexed: SlotId = `i:${i}`;
      out.push({ slotId, index: i, path: childPath(parentPath, indexed), value, duplicateOf: existing });
      continue;
    }
    firstBySlot.set(slotId, i);
    out.push({ slotId, index: i, path: childPath(parentPath, slotId), value, duplicateOf: null });
  }
  return out;
}
