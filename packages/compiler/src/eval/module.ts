import type { Content } from "../content/content.js";
import { stableHash, type Hashable } from "../memo/hash.js";
import type { Value } from "./value.js";

/** Result of evaluating a file: its top-level bindings and its content. */
export class Module implements Hashable {
  readonly type = "module";
  #fingerprint: string | undefined;

  constructor(
    readonly name: string,
    readonly scope: ReadonlyMap<string, Value>,
    readonly content: Content,
  ) {}

  get(name: string): Value | undefined {
    return this.scope.get(name);
  }

  fingerprint(): string {
    if (this.#fingerprint === undefined) {
      this.#fingerprint = stableHash(["module", this.name, this.scope, this.content]);
    }
    return this.#fingerprint;
  }
}
