/* =======================================================================================
 * DEBUG CHANNELS - Opt-in logging of pipeline decisions
 * ---------------------------------------------------------------------------------------
 * Enabled per subsystem through QUILLSET_DEBUG:
 *
 *   QUILLSET_DEBUG=layout          one channel
 *   QUILLSET_DEBUG=eval,memo       several channels
 *   QUILLSET_DEBUG=*               everything
 *
 * Disabled channels are no-op functions. Timing lives in CompileTrace, not here.
 * ======================================================================================= */

export type DebugData = Record<string, unknown>;

export type DebugChannel = (point: string, data?: DebugData) => void;

export interface DebugConfig {
  format: "json" | "pretty";
  timestamps: boolean;
  /** Defaults to console.log. */
  output: (message: string) => void;
}

const CHANNELS = ["eval", "realize", "layout", "memo", "world"] as const;
export type DebugChannelName = (typeof CHANNELS)[number];

let config: DebugConfig = { format: "pretty", timestamps: false, output: console.log };
let enabled = readEnv();

function readEnv(): ReadonlySet<string> {
  const raw = (process.env["QUILLSET_DEBUG"] ?? "").trim();
  if (raw === "" || raw === "0" || raw === "false") return new Set();
  if (raw === "*" || raw === "1" || raw === "true") return new Set(["*"]);
  return new Set(
    raw
      .split(",")
      .map((part) => part.trim().toLowerCase())
      .filter((part) => part !== ""),
  );
}

function channelEnabled(name: string): boolean {
  return enabled.has("*") || enabled.has(name.toLowerCase());
}

// =============================================================================
// Formatting
// =============================================================================

const MAX_STRING = 60;
const MAX_INLINE = 100;

function render(channel: string, point: string, data: DebugData | undefined): string {
  if (config.format === "json") {
    const record: Record<string, unknown> = { channel, point };
    if (data) record["data"] = data;
    if (config.timestamps) record["timestamp"] = Date.now();
    return JSON.stringify(record);
  }
  const stamp = config.timestamps ? `[${new Date().toISOString()}] ` : "";
  const head = `${stamp}[${channel}.${point}]`;
  if (!data || Object.keys(data).length === 0) return head;
  return `${head} ${renderFields(data, true)}`;
}

function renderFields(data: object, top: boolean): string {
  const parts = Object.entries(data).map(([key, value]) => `${key}=${renderValue(value, top ? 0 : 1)}`);
  if (parts.length === 0) return "{}";
  const inline = `{ ${parts.join(", ")} }`;
  if (!top || inline.length <= MAX_INLINE) return inline;
  return `{\n  ${parts.join(",\n  ")}\n}`;
}

function renderValue(value: unknown, depth: number): string {
  switch (typeof value) {
    case "string":
      return value.length > MAX_STRING ? `"${value.slice(0, MAX_STRING - 3)}..."` : `"${value}"`;
    case "number":
    case "boolean":
    case "bigint":
      return String(value);
    case "undefined":
      return "undefined";
    case "function":
      return `<fn ${value.name || "anonymous"}>`;
    case "symbol":
      return value.toString();
    case "object":
      break;
  }
  if (value === null) return "null";
  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    if (value.length <= 3 && depth < 2) {
      const inline = `[${value.map((item: unknown) => renderValue(item, depth + 1)).join(", ")}]`;
      if (inline.length <= 50) return inline;
    }
    return `[${value.length} items]`;
  }
  if (value instanceof Map) return `Map(${value.size})`;
  if ("kind" in value && typeof value.kind === "string") return `<${value.kind}>`;
  if ("type" in value && typeof value.type === "string") return `<${value.type}>`;
  return depth < 1 ? renderFields(value, false) : "{...}";
}

// =============================================================================
// Channels
// =============================================================================

function channel(name: DebugChannelName): DebugChannel {
  if (!channelEnabled(name)) return () => {};
  return (point, data) => config.output(render(name, point, data));
}

/**
 * One channel per compiler subsystem.
 *
 * ```typescript
 * debug.eval("import", { from, path });
 * debug.memo("evict", { removed, maxAge });
 * ```
 */
export const debug: Record<DebugChannelName, DebugChannel> = {
  eval: channel("eval"),
  realize: channel("realize"),
  layout: channel("layout"),
  memo: channel("memo"),
  world: channel("world"),
};

/** Re-reads QUILLSET_DEBUG and rebuilds every channel. */
export function refreshDebugChannels(): void {
  enabled = readEnv();
  for (const name of CHANNELS) debug[name] = channel(name);
}

export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

/** Without a name, reports whether any channel is on. */
export function isDebugEnabled(name?: string): boolean {
  return name === undefined ? enabled.size > 0 : channelEnabled(name);
}
