/* =======================================================================================
 * ROUTE
 * ---------------------------------------------------------------------------------------
 * The chain of files currently being evaluated, innermost first. Importing a file that
 * is already on the route is a cycle.
 *
 * A route is a tracked input of memoized module evaluation: the cached result of
 * evaluating a file is only reused when the same membership questions get the same
 * answers. Links created inside a memoized call (the file being evaluated) answer
 * locally; questions that reach the call's own input are recorded against it.
 * ======================================================================================= */

import type { FileId } from "@quillset/shared";
import type { MemoStore } from "../memo/store.js";
import type { TrackedInput } from "../memo/tracked.js";

export class Route implements TrackedInput {
  private constructor(
    readonly id: FileId | null,
    readonly outer: Route | null,
    readonly memo: MemoStore | null,
  ) {}

  static root(memo: MemoStore | null): Route {
    return new Route(null, null, memo);
  }

  /** Route with `id` pushed as the innermost file. */
  extend(id: FileId): Route {
    return new Route(id, this, this.memo);
  }

  contains(id: FileId): boolean {
    for (let link: Route | null = this; link; link = link.outer) {
      if (this.memo?.isTracking(link)) return link.#trackedContains(id);
      if (link.id === id) return true;
    }
    return false;
  }

  /** Files on the route, outermost first. */
  chain(): FileId[] {
    const out: FileId[] = [];
    for (let link: Route | null = this; link; link = link.outer) {
      if (link.id !== null) out.push(link.id);
    }
    return out.reverse();
  }

  get depth(): number {
    let n = 0;
    for (let link: Route | null = this; link; link = link.outer) if (link.id !== null) n++;
    return n;
  }

  validate(method: string, args: readonly unknown[]): string {
    if (method !== "contains") throw new Error(`untracked route method ${method}`);
    return String(this.#containsUntracked(String(args[0])));
  }

  reissue(method: string, args: readonly unknown[]): void {
    if (method !== "contains") throw new Error(`untracked route method ${method}`);
    const target = String(args[0]);
    for (let link: Route | null = this; link; link = link.outer) {
      if (this.memo?.isTracking(link)) {
        link.#trackedContains(target);
        return;
      }
      if (link.id === target) return;
    }
  }

  #trackedContains(id: string): boolean {
    const result = this.#containsUntracked(id);
    this.memo?.record(this, "contains", [id], String(result));
    return result;
  }

  #containsUntracked(id: string): boolean {
    for (let link: Route | null = this; link; link = link.outer) {
      if (link.id === id) return true;
    }
    return false;
  }
}
