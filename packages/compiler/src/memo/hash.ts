import { createHash } from "node:crypto";

/**
 * Values that know their own content fingerprint. The serializer embeds the
 * fingerprint instead of walking the value, so large immutable trees (content,
 * style chains, frames) hash in constant time once their fingerprint is cached.
 */
export interface Hashable {
  fingerprint(): string;
}

export function isHashable(value: unknown): value is Hashable {
  return typeof value === "object" && value !== null && "fingerprint" in value && typeof value.fingerprint === "function";
}

/**
 * Deterministic, stable JSON-like serialization for hashing.
 * - Sorts object keys and map/set entries.
 * - Treats `undefined` as null and functions as an opaque literal.
 * - Byte arrays contribute their digest, hashables their fingerprint.
 * - Not resilient to cycles (inputs are expected to be DAG-friendly).
 */
export function stableSerialize(value: unknown): string {
  return serialize(value);
}

export function stableHash(value: unknown): string {
  return digest(stableSerialize(value));
}

export function digest(text: string): string {
  return createHash("sha256").update(text).digest("hex");
}

const bytesDigests = new WeakMap<Uint8Array, string>();

/** Digest of raw bytes, cached per buffer (world loads hand out shared buffers). */
export function bytesHash(bytes: Uint8Array): string {
  let hash = bytesDigests.get(bytes);
  if (hash === undefined) {
    hash = createHash("sha256").update(bytes).digest("hex");
    bytesDigests.set(bytes, hash);
  }
  return hash;
}

function serialize(value: unknown): string {
  switch (typeof value) {
    case "string":
      return JSON.stringify(value);
    case "number":
      if (Object.is(value, -0)) return "0";
      return Number.isFinite(value) ? String(value) : `"${String(value)}"`;
    case "bigint":
      return `"${value.toString()}n"`;
    case "boolean":
      return value ? "true" : "false";
    case "undefined":
      return "null";
    case "function":
      return '"<fn>"';
    case "object":
      if (value === null) return "null";
      if (isHashable(value)) return `{"#":${JSON.stringify(value.fingerprint())}}`;
      if (value instanceof Uint8Array) return `{"__bytes__":"${bytesHash(value)}"}`;
      if (value instanceof Map) return serializeMap(value);
      if (value instanceof Set) return serializeSet(value);
      if (Array.isArray(value)) return serializeArray(value);
      return serializeObject(value);
    default:
      return JSON.stringify(String(value));
  }
}

function serializeArray(arr: readonly unknown[]): string {
  const parts: string[] = [];
  for (const item of arr) {
    parts.push(serialize(item));
  }
  return `[${parts.join(",")}]`;
}

function serializeMap(map: ReadonlyMap<unknown, unknown>): string {
  const entries = Array.from(map.entries())
    .map(([k, v]) => [serialize(k), serialize(v)] as const)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const parts = entries.map(([k, v]) => `[${k},${v}]`);
  return `{"__map__":[${parts.join(",")}]}`;
}

function serializeSet(set: ReadonlySet<unknown>): string {
  const sorted = Array.from(set.values())
    .map((v) => serialize(v))
    .sort();
  return `{"__set__":[${sorted.join(",")}]}`;
}

function serializeObject(obj: object): string {
  const entries = Object.entries(obj).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const parts: string[] = [];
  for (const [k, v] of entries) {
    if (v === undefined) continue;
    parts.push(`${JSON.stringify(k)}:${serialize(v)}`);
  }
  return `{${parts.join(",")}}`;
}
