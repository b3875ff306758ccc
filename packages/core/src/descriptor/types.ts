/**
 * packages/core/src/descriptor/types.ts — Descriptor and binding types.
 *
 * A descriptor is the serializable description of one UI node. Descriptors
 * arrive already parsed from whatever transport delivered them and are never
 * mutated by the core.
 */

export type Primitive = string | number | boolean | bigint | null | undefined;

export type Attributes = Readonly<Record<string, unknown>>;

export type DescriptorKey = string | number;

export type NodeDescriptor = Readonly<{
  kind: string;
  attributes?: Attributes | undefined;
  children?: readonly unknown[] | undefined;
  key?: DescriptorKey | undefined;
}>;

/** Request a remote directive sends to the data source. */
export type RemoteRequest = Readonly<{
  source: string;
  params: Readonly<Record<string, unknown>>;
}>;

/**
 * `{ "$remote": { source, target, params? } }` in attribute position.
 * `target` is the state path the fetched value is written to.
 */
export type RemoteDirective = Readonly<{
  source: string;
  target: string;
  params?: Readonly<Record<string, unknown>> | undefined;
}>;

/** Parsed form of a string attribute value. */
export type StringBinding =
  | Readonly<{ kind: "literal"; value: string }>
  | Readonly<{ kind: "state"; path: string }>
  | Readonly<{ kind: "template"; parts: readonly TemplatePart[] }>;

export type TemplatePart =
  | Readonly<{ kind: "text"; value: string }>
  | Readonly<{ kind: "state"; path: string }>;
