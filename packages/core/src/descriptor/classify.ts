/**
 * packages/core/src/descriptor/classify.ts — Structural value classifier.
 *
 * Why: Configuration trees are plain data. Whether a value is a node descriptor
 * is decided by its shape alone, and the answer comes back as a tagged variant
 * so callers switch on `tag` instead of re-inspecting fields.
 *
 * Classification rules:
 *   - descriptor: plain object with a non-empty string `kind`, optional plain
 *     object `attributes`, optional array `children`, optional string/number `key`
 *   - sequence: any array
 *   - structured: any other object (including a malformed descriptor)
 *   - opaque: functions and symbols
 *   - primitive: everything else
 */

import type { NodeDescriptor, Primitive } from "./types.js";

export type ClassifiedValue =
  | Readonly<{ tag: "descriptor"; value: NodeDescriptor }>
  | Readonly<{ tag: "sequence"; value: readonly unknown[] }>
  | Readonly<{ tag: "structured"; value: object }>
  | Readonly<{ tag: "opaque"; value: unknown }>
  | Readonly<{ tag: "primitive"; value: Primitive }>;

export type ValueTag = ClassifiedValue["tag"];

export function isPlainObject(v: unknown): v is Readonly<Record<string, unknown>> {
  if (typeof v !== "object" || v === null || Array.isArray(v)) return false;
  const proto: unknown = Object.getPrototypeOf(v);
  return proto === Object.prototype || proto === null;
}

function isDescriptorKey(v: unknown): boolean {
  return typeof v === "string" || (typeof v === "number" && Number.isFinite(v));
}

export function isNodeDescriptor(v: unknown): v is NodeDescriptor {
  if (!isPlainObject(v)) return false;
  const kind = v.kind;
  if (typeof kind !== "string" || kind.length === 0) return false;
  const attributes = v.attributes;
  if (attributes !== undefined && !isPlainObject(attributes)) return false;
  const children = v.children;
  if (children !== undefined && !Array.isArray(children)) return false;
  const key = v.key;
  if (key !== undefined && !isDescriptorKey(key)) return false;
  return true;
}

export function isPrimitive(v: unknown): v is Primitive {
  return (
    v === null ||
    v === undefined ||
    typeof v === "string" ||
    typeof v === "number" ||
    typeof v === "boolean" ||
    typeof v === "bigint"
  );
}

export function classifyValue(value: unknown): ClassifiedValue {
  if (isPrimitive(value)) return { tag: "primitive", value };
  if (typeof value === "function" || typeof value === "symbol") return { tag: "opaque", value };
  if (Array.isArray(value)) return { tag: "sequence", value };
  if (isNodeDescriptor(value)) return { tag: "descriptor", value };
  if (typeof value === "object" && value !== null) return { tag: "structured", value };
  return { tag: "opaque", value };
}

/**
 * True for values the builder passes through without inspection:
 * falsy values, empty sequences and empty structured values.
 */
export function isEmptyValue(v: unknown): boolean {
  if (!v) return true;
  if (Array.isArray(v)) return v.length === 0;
  if (isPlainObject(v)) return Object.keys(v).length === 0;
  return false;
}
