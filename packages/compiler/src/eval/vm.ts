/* =======================================================================================
 * EVALUATOR
 * ---------------------------------------------------------------------------------------
 * Tree-walking evaluation of markup and code into values and content.
 *
 * - Markup evaluates to content; code blocks join the values of their expressions.
 * - `set` and `show` apply to the rest of the enclosing block, which is evaluated first
 *   and then wrapped in a `styled` node (or handed to the transform of `show: f`).
 * - Consecutive list and enum items are grouped into one list element here, so later
 *   stages never see a loose item.
 * - Control flow (`break`, `continue`, `return`) is a pending marker on the Vm that
 *   every sequencing construct checks after each step.
 * ======================================================================================= */

import { basenameOf, type FileId } from "@quillset/shared";
import { Content, space, text } from "../content/content.js";
import { collectProperties, construct } from "../content/elements.js";
import { diagnostics, sourceError, isSourceError } from "../diagnostics/errors.js";
import { cm, inch, mm, pt } from "../geom/abs.js";
import { em, length } from "../geom/length.js";
import type { SourceSpan } from "../model/span.js";
import { debug } from "../shared/debug.js";
import { Styles, recipe, type RecipeTransform } from "../style/styles.js";
import type {
  Arg,
  BinaryOp,
  CallExpr,
  ClosureExpr,
  Expr,
  ForExpr,
  ImportExpr,
  Markup,
  MarkupNode,
  Pattern,
  SetExpr,
  ShowExpr,
  Unit,
  WhileExpr,
} from "../syntax/ast.js";
import { Args } from "./args.js";
import * as C from "./cast.js";
import type { Engine } from "./engine.js";
import { Closure, ElementFunc, Func, NativeFunc, PartialFunc, type CallContext } from "./func.js";
import { importFile } from "./import.js";
import { callMethod, callMutatingMethod, isMutatingMethod } from "./methods.js";
import { Module } from "./module.js";
import { binaryOp, join, toJoinable, unaryOp } from "./ops.js";
import { repr } from "./repr.js";
import { Scope, Scopes } from "./scope.js";
import {
  AUTO,
  array,
  dict,
  float,
  fraction,
  int,
  label,
  lengthValue,
  ratio,
  typeName,
  type ArgItem,
  type StylesValue,
  type Value,
} from "./value.js";

export type Flow =
  | { readonly kind: "break"; readonly span: SourceSpan }
  | { readonly kind: "continue"; readonly span: SourceSpan }
  | { readonly kind: "return"; readonly span: SourceSpan; readonly value: Value };

const EMPTY_STYLES: StylesValue = { type: "styles", styles: Styles.EMPTY };

export class Vm {
  readonly scopes: Scopes;
  /** Pending control flow, consumed by the enclosing loop or function. */
  flow: Flow | null = null;

  constructor(
    readonly engine: Engine,
    base: ReadonlyMap<string, Value>,
    /** File being evaluated; relative paths resolve from here. */
    readonly file: FileId | null,
    /** Closure calls on the stack below this Vm. */
    readonly depth = 0,
    top?: Scope,
  ) {
    this.scopes = new Scopes(base, top);
  }

  /* -------------------------------------------------------------------------------------
   * Markup
   * ------------------------------------------------------------------------------------- */

  evalMarkup(markup: Markup): Content {
    return this.#markupFrom(markup.nodes, 0, markup.span);
  }

  #markupFrom(nodes: readonly MarkupNode[], start: number, span: SourceSpan): Content {
    const parts: Content[] = [];
    let i = start;
    while (i < nodes.length && !this.flow) {
      const node = nodes[i];
      if (!node) break;
      if (node.kind === "embed" && (node.expr.kind === "set" || node.expr.kind === "show")) {
        const rule = node.expr;
        parts.push(this.#applyRule(rule, () => this.#markupFrom(nodes, i + 1, span)));
        break;
      }
      if (node.kind === "label") {
        attachLabel(parts, node.name);
        i++;
        continue;
      }
      if (node.kind === "list-item" || node.kind === "enum-item") {
        const grouped = this.#groupItems(nodes, i);
        parts.push(grouped.list);
        i = grouped.next;
        continue;
      }
      parts.push(this.#markupNode(node));
      i++;
    }
    return Content.sequence(parts, span);
  }

  #markupNode(node: MarkupNode): Content {
    const span = node.span;
    switch (node.kind) {
      case "text":
        return text(node.text, span);
      case "space":
        return space(span);
      case "parbreak":
        return Content.element("parbreak", [], span);
      case "linebreak":
        return Content.element("linebreak", [], span);
      case "strong":
        return Content.element("strong", [["body", this.evalMarkup(node.body)]], span);
      case "emph":
        return Content.element("emph", [["body", this.evalMarkup(node.body)]], span);
      case "raw":
        return Content.element(
          "raw",
          [
            ["text", node.text],
            ["block", node.block],
            ["lang", node.lang],
          ],
          span,
        );
      case "equation":
        return Content.element(
          "equation",
          [
            ["body", text(node.text, span)],
            ["block", node.block],
          ],
          span,
        );
      case "link":
        return Content.element(
          "link",
          [
            ["dest", node.url],
            ["body", text(node.url, span)],
          ],
          span,
        );
      case "label":
        return Content.EMPTY;
      case "ref":
        return Content.element("ref", [["target", label(node.target)]], span);
      case "heading":
        return Content.element(
          "heading",
          [
            ["body", this.evalMarkup(node.body)],
            ["level", int(node.level)],
          ],
          span,
        );
      case "list-item":
        return Content.element("list-item", [["body", this.evalMarkup(node.body)]], span);
      case "enum-item":
        return Content.element(
          "enum-item",
          [
            ["number", node.number === null ? null : int(node.number)],
            ["body", this.evalMarkup(node.body)],
          ],
          span,
        );
      case "embed":
        return toMarkup(this.evalExpr(node.expr));
    }
  }

  /** Items of one kind separated only by spaces and paragraph breaks form one list. */
  #groupItems(nodes: readonly MarkupNode[], start: number): { list: Content; next: number } {
    const first = nodes[start];
    const itemKind = first?.kind === "enum-item" ? "enum-item" : "list-item";
    const items: Content[] = [];
    let tight = true;
    let next = start;
    let i = start;
    while (i < nodes.length) {
      const node = nodes[i];
      if (!node || node.kind !== itemKind) break;
      items.push(this.#markupNode(node));
      next = i + 1;
      let gap = false;
      let j = i + 1;
      for (; j < nodes.length; j++) {
        const between = nodes[j];
        if (between?.kind === "parbreak") gap = true;
        else if (between?.kind !== "space") break;
      }
      if (nodes[j]?.kind !== itemKind) break;
      if (gap) tight = false;
      i = j;
    }
    const elem = itemKind === "enum-item" ? "enum" : "list";
    const span = first?.span;
    const fields: [string, Value][] = [["children", array(items)]];
    if (!tight) fields.push(["tight", false]);
    return { list: Content.element(elem, fields, span), next };
  }

  /* -------------------------------------------------------------------------------------
   * Code
   * ------------------------------------------------------------------------------------- */

  #codeFrom(exprs: readonly Expr[], start: number): Value {
    let output: Value = null;
    for (let i = start; i < exprs.length && !this.flow; i++) {
      const expr = exprs[i];
      if (!expr) break;
      if (expr.kind === "set" || expr.kind === "show") {
        const styled = this.#applyRule(expr, () => {
          const rest = this.#codeFrom(exprs, i + 1);
          const content = toJoinable(rest);
          if (!content) {
            throw sourceError("quillset/eval/invalid-operation", {
              message: `cannot apply a ${expr.kind} rule to ${typeName(rest)}`,
              span: expr.span,
            });
          }
          return content;
        });
        return join(output, styled, expr.span);
      }
      output = join(output, this.evalExpr(expr), expr.span);
    }
    return output;
  }

  /** Evaluates a rule, then the rest of the block it governs, and combines them. */
  #applyRule(rule: SetExpr | ShowExpr, rest: () => Content): Content {
    if (rule.kind === "show" && rule.selector === null) {
      const transform = this.evalExpr(rule.transform);
      const body = rest();
      return this.#transformAll(transform, body, rule.span);
    }
    const styles = rule.kind === "set" ? this.#evalSet(rule) : this.#evalShow(rule);
    return Content.styled(rest(), styles.styles);
  }

  /** `show: transform` applied to everything that follows. */
  #transformAll(transform: Value, body: Content, span: SourceSpan): Content {
    if (transform instanceof Func) {
      return C.content.check(this.call(transform, Args.positional(span, [body]), span)) ?? Content.EMPTY;
    }
    if (transform !== null && typeof transform === "object" && transform.type === "styles") {
      return Content.styled(body, transform.styles);
    }
    const replacement = C.content.check(transform);
    if (replacement) return replacement;
    throw sourceError("quillset/eval/type-mismatch", {
      message: `expected function, styles or content, found ${typeName(transform)}`,
      span,
      data: { expected: "function, styles or content", actual: typeName(transform) },
    });
  }

  evalExpr(expr: Expr): Value {
    switch (expr.kind) {
      case "none":
        return null;
      case "auto":
        return AUTO;
      case "bool":
        return expr.value;
      case "int":
        return int(expr.value);
      case "float":
        return float(expr.value);
      case "numeric":
        return numeric(expr.value, expr.unit);
      case "str":
        return expr.value;
      case "label":
        return label(expr.name);
      case "ident": {
        const value = this.scopes.get(expr.name);
        if (value === undefined) {
          throw sourceError("quillset/eval/unknown-variable", {
            message: `unknown variable: ${expr.name}`,
            span: expr.span,
            data: { name: expr.name },
          });
        }
        return value;
      }
      case "content-block":
        return this.scopes.nested(() => this.evalMarkup(expr.body));
      case "code-block":
        return this.scopes.nested(() => this.#codeFrom(expr.exprs, 0));
      case "paren":
        return this.evalExpr(expr.expr);
      case "array": {
        const items: Value[] = [];
        for (const item of expr.items) {
          const value = this.evalExpr(item.expr);
          if (item.kind === "pos") items.push(value);
          else if (value !== null) items.push(...this.#spreadArray(value, item.expr.span));
        }
        return array(items);
      }
      case "dict": {
        const entries = new Map<string, Value>();
        for (const item of expr.items) {
          const value = this.evalExpr(item.expr);
          if (item.kind === "named") {
            entries.set(item.key, value);
          } else if (value !== null) {
            const spread = C.dict.check(value);
            if (!spread) throw cannotSpread(value, item.expr.span);
            for (const [key, entry] of spread) entries.set(key, entry);
          }
        }
        return dict(entries);
      }
      case "unary":
        return unaryOp(expr.op, this.evalExpr(expr.expr), expr.span);
      case "binary":
        return this.#evalBinary(expr.op, expr.lhs, expr.rhs, expr.span);
      case "field":
        return this.#access(this.evalExpr(expr.target), expr.field, expr.fieldSpan);
      case "call":
        return this.#evalCall(expr);
      case "closure":
        return this.#makeClosure(expr);
      case "let": {
        const value = expr.init ? this.evalExpr(expr.init) : null;
        this.#bind(expr.pattern, value);
        return null;
      }
      case "set":
        return this.#evalSet(expr);
      case "show":
        if (expr.selector === null) {
          throw sourceError("quillset/eval/invalid-operation", {
            message: "a show rule without selector must govern the rest of a block",
            span: expr.span,
          });
        }
        return this.#evalShow(expr);
      case "if": {
        const condition = this.#condition(expr.condition);
        if (condition) return this.evalExpr(expr.then);
        return expr.otherwise ? this.evalExpr(expr.otherwise) : null;
      }
      case "while":
        return this.#evalWhile(expr);
      case "for":
        return this.#evalFor(expr);
      case "import":
        this.#evalImport(expr);
        return null;
      case "include": {
        const module = this.#resolveModule(this.evalExpr(expr.source), expr.source.span, "include");
        return module.content;
      }
      case "break":
        this.flow = { kind: "break", span: expr.span };
        return null;
      case "continue":
        this.flow = { kind: "continue", span: expr.span };
        return null;
      case "return": {
        const value = expr.value ? this.evalExpr(expr.value) : null;
        this.flow = { kind: "return", span: expr.span, value };
        return null;
      }
    }
  }

  #condition(expr: Expr): boolean {
    const value = this.evalExpr(expr);
    if (typeof value !== "boolean") {
      throw sourceError("quillset/eval/type-mismatch", {
        message: `expected boolean, found ${typeName(value)}`,
        span: expr.span,
        data: { expected: "boolean", actual: typeName(value) },
      });
    }
    return value;
  }

  #spreadArray(value: Value, span: SourceSpan): readonly Value[] {
    const items = C.array.check(value);
    if (!items) throw cannotSpread(value, span);
    return items;
  }

  #evalBinary(op: BinaryOp, lhs: Expr, rhs: Expr, span: SourceSpan): Value {
    switch (op) {
      case "and":
        return this.#condition(lhs) && this.#condition(rhs);
      case "or":
        return this.#condition(lhs) || this.#condition(rhs);
      case "=": {
        const value = this.evalExpr(rhs);
        this.#update(lhs, () => value);
        return null;
      }
      case "+=":
      case "-=":
      case "*=":
      case "/=": {
        const value = this.evalExpr(rhs);
        const base = op === "+=" ? "+" : op === "-=" ? "-" : op === "*=" ? "*" : "/";
        this.#update(lhs, (old) => binaryOp(base, old, value, span));
        return null;
      }
      default:
        return binaryOp(op, this.evalExpr(lhs), this.evalExpr(rhs), span);
    }
  }

  /** Rebinds the variable or dictionary entry `target` denotes to `fn(current)`. */
  #update(target: Expr, fn: (current: Value) => Value): void {
    switch (target.kind) {
      case "paren":
        this.#update(target.expr, fn);
        return;
      case "ident": {
        const current = this.scopes.getLocal(target.name);
        if (current === undefined) {
          if (this.scopes.get(target.name) !== undefined) {
            throw sourceError("quillset/eval/invalid-operation", {
              message: `cannot mutate a constant: ${target.name}`,
              span: target.span,
            });
          }
          throw sourceError("quillset/eval/unknown-variable", {
            message: `unknown variable: ${target.name}`,
            span: target.span,
            data: { name: target.name },
          });
        }
        this.scopes.assign(target.name, fn(current));
        return;
      }
      case "field":
        this.#update(target.target, (container) => {
          const entries = C.dict.check(container);
          if (!entries) {
            throw sourceError("quillset/eval/invalid-operation", {
              message: `cannot mutate fields on ${typeName(container)}`,
              span: target.span,
            });
          }
          const current = entries.get(target.field);
          if (current === undefined) {
            throw sourceError("quillset/eval/unknown-field", {
              message: `dictionary does not contain key "${target.field}"`,
              span: target.fieldSpan,
              data: { name: target.field },
            });
          }
          const next = new Map(entries);
          next.set(target.field, fn(current));
          return dict(next);
        });
        return;
      default:
        throw sourceError("quillset/eval/invalid-operation", {
          message: "cannot assign to this expression",
          span: target.span,
        });
    }
  }

  #access(target: Value, field: string, span: SourceSpan): Value {
    const found = fieldOf(target, field);
    if (found !== undefined) return found;
    const message =
      target !== null && typeof target === "object" && target.type === "dictionary"
        ? `dictionary does not contain key "${field}"`
        : `${typeName(target)} does not contain field "${field}"`;
    throw sourceError("quillset/eval/unknown-field", { message, span, data: { name: field } });
  }

  /* -------------------------------------------------------------------------------------
   * Calls
   * ------------------------------------------------------------------------------------- */

  #evalCall(expr: CallExpr): Value {
    const callee = expr.callee;
    if (callee.kind === "field") {
      const target = this.evalExpr(callee.target);
      const scoped = fieldOf(target, callee.field);
      if (scoped instanceof Func && (target instanceof Func || target instanceof Module || isDict(target))) {
        return this.call(scoped, this.#evalArgs(expr.args, expr.argsSpan), expr.span);
      }
      const args = this.#evalArgs(expr.args, expr.argsSpan);
      const ctx = this.#context(expr.span);
      if (isMutatingMethod(target, callee.field)) {
        const { result, updated } = callMutatingMethod(ctx, target, callee.field, args);
        this.#update(callee.target, () => updated);
        return result;
      }
      return callMethod(ctx, target, callee.field, args);
    }
    const func = this.evalExpr(callee);
    if (!(func instanceof Func)) {
      throw sourceError("quillset/eval/type-mismatch", {
        message: `expected function, found ${typeName(func)}`,
        span: callee.span,
        data: { expected: "function", actual: typeName(func) },
      });
    }
    return this.call(func, this.#evalArgs(expr.args, expr.argsSpan), expr.span);
  }

  #evalArgs(args: readonly Arg[], span: SourceSpan): Args {
    const items: ArgItem[] = [];
    for (const arg of args) {
      const value = this.evalExpr(arg.expr);
      if (arg.kind === "pos") {
        items.push({ name: null, value, span: arg.expr.span });
      } else if (arg.kind === "named") {
        items.push({ name: arg.name, value, span: arg.expr.span });
      } else {
        items.push(...spreadArgs(value, arg.expr.span));
      }
    }
    return new Args(span, items);
  }

  #context(span: SourceSpan): CallContext {
    return {
      engine: this.engine,
      span,
      call: (func, values) => this.call(func, Args.positional(span, values), span),
    };
  }

  call(func: Func, args: Args, span: SourceSpan): Value {
    if (func instanceof NativeFunc) {
      const result = func.impl(this.#context(span), args);
      args.finish();
      return result;
    }
    if (func instanceof ElementFunc) return construct(func.def, args, span);
    if (func instanceof PartialFunc) return this.call(func.inner, new Args(args.span, [...func.args, ...args.items]), span);
    if (func instanceof Closure) return this.#callClosure(func, args, span);
    throw new Error(`unknown function kind ${func.kind}`);
  }

  #callClosure(closure: Closure, args: Args, span: SourceSpan): Value {
    const limit = this.engine.limits.maxCallDepth;
    if (this.depth >= limit) {
      throw sourceError("quillset/eval/call-depth", {
        message: "maximum function call depth exceeded",
        span,
        data: { limit },
      });
    }
    const name = closure.name ?? "closure";
    debug.eval("call", { name, depth: this.depth + 1 });
    try {
      const vm = new Vm(this.engine, this.scopes.base, closure.file, this.depth + 1, new Scope(closure.captured));
      if (closure.name) vm.scopes.define(closure.name, closure);
      for (const param of closure.node.params) {
        if (param.kind === "named") {
          vm.scopes.define(param.name, args.named(param.name, C.anyValue) ?? vm.evalExpr(param.default));
        }
      }
      for (const param of closure.node.params) {
        if (param.kind === "pos") {
          vm.scopes.define(param.name, args.expect(param.name, C.anyValue));
        } else if (param.kind === "sink") {
          const rest = args.take();
          if (param.name) vm.scopes.define(param.name, rest.toValue());
        }
      }
      args.finish();
      const output = vm.evalExpr(closure.node.body);
      const flow = vm.flow;
      if (flow?.kind === "return") return flow.value ?? output;
      if (flow) throw flowOutside(flow);
      return output;
    } catch (error) {
      if (isSourceError(error)) throw error.traced({ kind: "call", target: name, span });
      throw error;
    }
  }

  #makeClosure(expr: ClosureExpr): Closure {
    const captured = new Map<string, Value>();
    const params = new Set(expr.params.map((p) => p.name));
    for (const name of freeNames(expr)) {
      if (params.has(name)) continue;
      const value = this.scopes.getLocal(name);
      if (value !== undefined) captured.set(name, value);
    }
    return new Closure(expr, captured, this.file);
  }

  /* -------------------------------------------------------------------------------------
   * Bindings and rules
   * ------------------------------------------------------------------------------------- */

  #bind(pattern: Pattern, value: Value): void {
    if (pattern.kind === "name") {
      if (pattern.name !== null) this.scopes.define(pattern.name, value);
      return;
    }
    const items = C.array.check(value);
    if (!items) {
      throw sourceError("quillset/eval/type-mismatch", {
        message: `cannot destructure ${typeName(value)}`,
        span: pattern.span,
        data: { expected: "array", actual: typeName(value) },
      });
    }
    if (items.length !== pattern.names.length) {
      throw sourceError("quillset/eval/invalid-operation", {
        message: `expected ${pattern.names.length} elements to destructure, found ${items.length}`,
        span: pattern.span,
      });
    }
    pattern.names.forEach((name, i) => {
      const item = items[i];
      if (name !== null && item !== undefined) this.scopes.define(name, item);
    });
  }

  #evalSet(expr: SetExpr): StylesValue {
    const target = this.evalExpr(expr.target);
    if (!(target instanceof ElementFunc)) {
      throw sourceError("quillset/eval/type-mismatch", {
        message: `only element functions can be used in set rules, found ${typeName(target)}`,
        span: expr.target.span,
        data: { expected: "element function", actual: typeName(target) },
      });
    }
    const args = this.#evalArgs(expr.args, expr.argsSpan);
    if (expr.condition && !this.#condition(expr.condition)) return EMPTY_STYLES;
    const styles = collectProperties(target.def, args, expr.span);
    args.finish();
    return { type: "styles", styles };
  }

  #evalShow(expr: ShowExpr): StylesValue {
    const selectorExpr = expr.selector;
    const selectorValue = selectorExpr ? this.evalExpr(selectorExpr) : null;
    const selector = C.selector.check(selectorValue);
    if (!selector) {
      throw sourceError("quillset/eval/type-mismatch", {
        message: `expected selector, found ${typeName(selectorValue)}`,
        span: selectorExpr?.span ?? expr.span,
        data: { expected: "selector", actual: typeName(selectorValue) },
      });
    }
    const transform = this.evalExpr(expr.transform);
    return { type: "styles", styles: Styles.of(recipe(selector, toTransform(transform, expr.transform.span), expr.span)) };
  }

  /* -------------------------------------------------------------------------------------
   * Loops
   * ------------------------------------------------------------------------------------- */

  #evalWhile(expr: WhileExpr): Value {
    let output: Value = null;
    let iterations = 0;
    while (this.#condition(expr.condition)) {
      this.#countIteration(++iterations, expr.span);
      output = join(output, this.evalExpr(expr.body), expr.body.span);
      if (this.#finishIteration()) break;
    }
    return output;
  }

  #evalFor(expr: ForExpr): Value {
    const iterable = this.evalExpr(expr.iterable);
    const values = iterate(iterable, expr.iterable.span);
    let output: Value = null;
    let iterations = 0;
    for (const value of values) {
      this.#countIteration(++iterations, expr.span);
      const result = this.scopes.nested(() => {
        this.#bind(expr.pattern, value);
        return this.evalExpr(expr.body);
      });
      output = join(output, result, expr.body.span);
      if (this.#finishIteration()) break;
    }
    return output;
  }

  #countIteration(count: number, span: SourceSpan): void {
    const limit = this.engine.limits.maxIterations;
    if (count > limit) {
      throw sourceError("quillset/eval/loop-limit", {
        message: "loop seems to be infinite",
        span,
        data: { limit },
      });
    }
  }

  /** Consumes loop flow; true when the loop must stop. */
  #finishIteration(): boolean {
    const flow = this.flow;
    if (!flow) return false;
    if (flow.kind === "return") return true;
    this.flow = null;
    return flow.kind === "break";
  }

  /* -------------------------------------------------------------------------------------
   * Modules
   * ------------------------------------------------------------------------------------- */

  #evalImport(expr: ImportExpr): void {
    const source = this.evalExpr(expr.source);
    const module = this.#resolveModule(source, expr.source.span, "import");
    const items = expr.items;
    if (expr.alias !== null && expr.alias === module.name) {
      this.engine.sink.warn(
        diagnostics.emit("quillset/eval/unnecessary-alias", {
          message: "unnecessary import rename to same name",
          span: expr.span,
          data: { name: expr.alias },
        }),
      );
    }
    if (expr.alias !== null) this.scopes.define(expr.alias, module);
    switch (items.kind) {
      case "none":
        if (expr.alias === null) this.scopes.define(module.name, module);
        return;
      case "wildcard":
        for (const [name, value] of module.scope) this.scopes.define(name, value);
        return;
      case "names":
        for (const item of items.names) {
          const value = module.get(item.name);
          if (value === undefined) {
            throw sourceError("quillset/eval/import-missing", {
              message: `unresolved import: ${item.name}`,
              span: item.span,
              data: { name: item.name },
            });
          }
          this.scopes.define(item.name, value);
        }
        return;
    }
  }

  #resolveModule(source: Value, span: SourceSpan, kind: "import" | "include"): Module {
    if (source instanceof Module) return source;
    if (typeof source !== "string") {
      throw sourceError("quillset/eval/type-mismatch", {
        message: `expected path or module, found ${typeName(source)}`,
        span,
        data: { expected: "path or module", actual: typeName(source) },
      });
    }
    return importFile(this.engine, this.file, source, span, kind);
  }
}

/* =======================================================================================
 * Helpers
 * ======================================================================================= */

/** Stops a file or function from ending with pending loop flow. */
export function flowOutside(flow: Flow): Error {
  const what = flow.kind === "return" ? "cannot return outside of function" : `cannot ${flow.kind} outside of loop`;
  return sourceError("quillset/eval/flow-outside", { message: what, span: flow.span });
}

/** Evaluates `root` as a file's markup and returns its module. */
export function evalRoot(engine: Engine, root: Markup, file: FileId): Module {
  const vm = new Vm(engine, engine.world.library().global, file, 0);
  const content = vm.evalMarkup(root);
  if (vm.flow) throw flowOutside(vm.flow);
  return new Module(moduleName(file), new Map(vm.scopes.top.entries()), content);
}

/** Calls `func` outside of any file (show rule transforms during realization). */
export function callFunc(engine: Engine, func: Func, args: readonly Value[], span: SourceSpan): Value {
  const vm = new Vm(engine, engine.world.library().global, span.file ?? null, 0);
  return vm.call(func, Args.positional(span, args), span);
}

function moduleName(file: FileId): string {
  const base = basenameOf(file);
  const dot = base.lastIndexOf(".");
  return dot > 0 ? base.slice(0, dot) : base;
}

function numeric(value: number, unit: Unit): Value {
  switch (unit) {
    case "pt":
      return lengthValue(length(pt(value)));
    case "mm":
      return lengthValue(length(mm(value)));
    case "cm":
      return lengthValue(length(cm(value)));
    case "in":
      return lengthValue(length(inch(value)));
    case "em":
      return lengthValue(em(value));
    case "%":
      return ratio(value / 100);
    case "fr":
      return fraction(value);
  }
}

function isDict(value: Value): boolean {
  return value !== null && typeof value === "object" && value.type === "dictionary";
}

/** Field of a value, or undefined when it has none by that name. */
function fieldOf(target: Value, field: string): Value | undefined {
  if (target instanceof Module) return target.get(field);
  if (target instanceof Func) return target.scope.get(field);
  if (target instanceof Content) return target.field(field);
  if (target !== null && typeof target === "object") {
    if (target.type === "dictionary") return target.entries.get(field);
    if (target.type === "alignment") {
      if (field === "x") return target.align.x ? { type: "alignment", align: { x: target.align.x } } : null;
      if (field === "y") return target.align.y ? { type: "alignment", align: { y: target.align.y } } : null;
    }
  }
  return undefined;
}

function spreadArgs(value: Value, span: SourceSpan): ArgItem[] {
  if (value === null) return [];
  if (typeof value === "object") {
    switch (value.type) {
      case "array":
        return value.items.map((item) => ({ name: null, value: item, span }));
      case "dictionary":
        return [...value.entries].map(([name, item]) => ({ name, value: item, span }));
      case "arguments":
        return [...value.items];
    }
  }
  throw cannotSpread(value, span);
}

function cannotSpread(value: Value, span: SourceSpan): Error {
  return sourceError("quillset/eval/invalid-operation", {
    message: `cannot spread ${typeName(value)}`,
    span,
  });
}

function iterate(value: Value, span: SourceSpan): readonly Value[] {
  if (typeof value === "string") return [...value];
  const items = C.array.check(value);
  if (items) return items;
  const entries = C.dict.check(value);
  if (entries) return [...entries].map(([key, entry]) => array([key, entry]));
  if (value !== null && typeof value === "object" && value.type === "arguments") {
    return value.items.map((item) => item.value);
  }
  throw sourceError("quillset/eval/type-mismatch", {
    message: `cannot loop over ${typeName(value)}`,
    span,
    data: { expected: "array, dictionary or string", actual: typeName(value) },
  });
}

function toTransform(value: Value, span: SourceSpan): RecipeTransform {
  if (value instanceof Func) return { kind: "func", func: value };
  if (value !== null && typeof value === "object" && value.type === "styles") return { kind: "styles", styles: value.styles };
  const content = C.content.check(value);
  if (content) return { kind: "content", content };
  throw sourceError("quillset/eval/type-mismatch", {
    message: `expected function, styles or content as show transform, found ${typeName(value)}`,
    span,
    data: { expected: "function, styles or content", actual: typeName(value) },
  });
}

/** Content an embedded expression contributes to markup. */
function toMarkup(value: Value): Content {
  const joinable = toJoinable(value);
  if (joinable) return joinable;
  if (value !== null && typeof value === "object" && value.type === "styles") return Content.EMPTY;
  return text(repr(value));
}

/** Puts `name` on the last part that is not a space. */
function attachLabel(parts: Content[], name: string): void {
  for (let i = parts.length - 1; i >= 0; i--) {
    const part = parts[i];
    if (!part) continue;
    if (part.is("space") || part.isEmpty()) continue;
    parts[i] = part.withLabel(name);
    return;
  }
}

const freeNameCache = new WeakMap<ClosureExpr, ReadonlySet<string>>();

/** Every identifier the closure body mentions; a superset of its free variables. */
function freeNames(expr: ClosureExpr): ReadonlySet<string> {
  let names = freeNameCache.get(expr);
  if (!names) {
    const out = new Set<string>();
    collectIdents(expr.body, out);
    for (const param of expr.params) if (param.kind === "named") collectIdents(param.default, out);
    names = out;
    freeNameCache.set(expr, names);
  }
  return names;
}

function collectIdents(node: unknown, out: Set<string>): void {
  if (Array.isArray(node)) {
    for (const item of node) collectIdents(item, out);
    return;
  }
  if (typeof node !== "object" || node === null) return;
  if ("kind" in node && node.kind === "ident" && "name" in node && typeof node.name === "string") {
    out.add(node.name);
    return;
  }
  for (const [key, child] of Object.entries(node)) {
    if (key !== "span") collectIdents(child, out);
  }
}
