/* =======================================================================================
 * MODULE EVALUATION
 * ---------------------------------------------------------------------------------------
 * `evalModule` is memoized over the source's content. The World and the Route are its
 * tracked inputs: the cached module is reused only while every file it read is
 * unchanged and every cycle check it made still has the same answer.
 *
 * Callers push the file onto the route before calling, so the route a module is
 * cached under always starts with the module itself.
 * ======================================================================================= */

import { resolveFileId, type FileId } from "@quillset/shared";
import { diagnostics, SourceError, isSourceError, sourceError } from "../diagnostics/errors.js";
import type { SinkEffect } from "../diagnostics/sink.js";
import { memoize } from "../memo/store.js";
import type { SourceSpan } from "../model/span.js";
import { debug } from "../shared/debug.js";
import type { Source } from "../syntax/source.js";
import type { FileError } from "../world/types.js";
import type { Engine } from "./engine.js";
import type { Module } from "./module.js";
import { evalRoot } from "./vm.js";

/** Evaluates a parsed source file. Parse errors fail the module with every error at once. */
export function evalSource(engine: Engine, source: Source): Module {
  const { root, errors } = source.root;
  if (errors.length > 0) {
    throw new SourceError(
      errors.map((error) =>
        diagnostics.emit("quillset/parse/syntax", {
          message: error.message,
          span: error.span,
          ...(error.hint ? { hints: [error.hint] } : {}),
        }),
      ),
    );
  }
  return engine.trace.span(`module:${source.id}`, () => {
    debug.eval("module.start", { file: source.id, route: engine.route.chain() });
    const module = evalRoot(engine, root, source.id);
    debug.eval("module.done", { file: source.id, bindings: module.scope.size });
    return module;
  });
}

export const evalModule: (engine: Engine, source: Source) => Module = memoize<[Engine, Source], Module, SinkEffect>(
  "evalModule",
  {
    store: (engine) => engine.memo,
    key: (engine, source) => [source, engine.limits],
    inputs: (engine) => ({ world: engine.world, route: engine.route }),
    effects: (engine) => engine.sink,
    compute: (engine, source) => evalSource(engine, source),
  },
);

/**
 * Loads and evaluates the file `path` refers to from `from`.
 * Fails before loading anything when the file is already being evaluated.
 */
export function importFile(
  engine: Engine,
  from: FileId | null,
  path: string,
  span: SourceSpan,
  kind: "import" | "include" = "import",
): Module {
  const id = resolveFileId(from ?? engine.world.main(), path);
  if (!id) {
    throw sourceError("quillset/world/access-denied", {
      message: `cannot ${kind} ${path}: outside of the project root`,
      span,
      data: { path },
    });
  }
  if (engine.route.contains(id)) {
    const chain = [...engine.route.chain(), id];
    throw sourceError("quillset/eval/cyclic-import", {
      message: `cyclic ${kind}: ${chain.join(" -> ")}`,
      span,
      data: { chain },
    });
  }
  const loaded = engine.world.source(id);
  if (!loaded.ok) throw fileErrorToSourceError(loaded.error, span);
  try {
    return evalModule({ ...engine, route: engine.route.extend(id) }, loaded.value);
  } catch (error) {
    if (isSourceError(error)) throw error.traced({ kind, target: id, span });
    throw error;
  }
}

export function fileErrorToSourceError(error: FileError, span: SourceSpan | null): SourceError {
  const data = { path: error.path };
  switch (error.kind) {
    case "not-found":
      return sourceError("quillset/world/file-not-found", {
        message: `file not found: ${error.path}`,
        span,
        data,
      });
    case "not-source":
      return sourceError("quillset/world/not-source", {
        message: `file is not valid utf-8: ${error.path}`,
        span,
        data,
      });
    case "access-denied":
    case "other":
      return sourceError("quillset/world/access-denied", {
        message: error.message ? `failed to load ${error.path}: ${error.message}` : `failed to load ${error.path}`,
        span,
        data,
      });
  }
}
