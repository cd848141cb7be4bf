/* =======================================================================================
 * PARSER
 * ---------------------------------------------------------------------------------------
 * Hand-written recursive descent over a character cursor. Markup and code interleave:
 * `#` enters code from markup, `[...]` re-enters markup from code.
 *
 * The parser never throws. Malformed input produces ParseErrors plus a best-effort tree;
 * evaluation refuses to run a file that has any.
 * ======================================================================================= */

import type { FileId } from "@quillset/shared";
import { spanFromBounds, type SourceSpan } from "../model/span.js";
import type {
  Arg,
  ArrayItem,
  BinaryOp,
  DictItem,
  Expr,
  ImportItems,
  Markup,
  MarkupNode,
  Param,
  ParseError,
  ParseResult,
  Pattern,
  TextNode,
  Unit,
} from "./ast.js";
import {
  KEYWORDS,
  Scanner,
  isAlphanumeric,
  isDigit,
  isIdContinue,
  isIdStart,
  isLabelChar,
  isNewline,
  isSpace,
  isWhitespace,
} from "./scanner.js";

export function parse(text: string, file?: FileId): ParseResult {
  return new Parser(text, file).parseRoot();
}

/** Parse a standalone code snippet (the body of a code block without braces). */
export function parseCode(text: string, file?: FileId): { exprs: readonly Expr[]; errors: readonly ParseError[] } {
  return new Parser(text, file).parseCodeRoot();
}

interface MarkupContext {
  /** Closing delimiter of strong (`*`) or emph (`_`). */
  readonly delimiter: string | null;
  /** Stop at the end of the line (heading bodies). */
  readonly line: boolean;
  /** Stop before a line indented at or below this column (list item bodies). */
  readonly dedent: number | null;
  /** Stop at an unmatched `]` (content blocks). */
  readonly bracket: boolean;
}

const TOP: MarkupContext = { delimiter: null, line: false, dedent: null, bracket: false };

const STATEMENT_KEYWORDS = new Set([
  "let",
  "set",
  "show",
  "if",
  "for",
  "while",
  "import",
  "include",
  "break",
  "continue",
  "return",
]);

const TEXT_STOP = new Set(["\\", "*", "_", "`", "$", "<", "@", "#", "[", "]", "~", "-", ".", "/"]);

const BINARY_PRECEDENCE: Record<BinaryOp, number> = {
  "=": 1,
  "+=": 1,
  "-=": 1,
  "*=": 1,
  "/=": 1,
  or: 2,
  and: 3,
  "==": 4,
  "!=": 4,
  "<": 4,
  "<=": 4,
  ">": 4,
  ">=": 4,
  in: 4,
  "not in": 4,
  "+": 5,
  "-": 5,
  "*": 6,
  "/": 6,
};

const UNITS: readonly Unit[] = ["pt", "mm", "cm", "in", "em", "fr", "%"];

class Parser {
  readonly #s: Scanner;
  readonly #file: FileId | undefined;
  readonly #errors: ParseError[] = [];
  /** In code mode, whether a line break ends the current expression. */
  #newlines = false;
  /** Unmatched `[` seen as text inside the current content block. */
  #brackets = 0;
  /** Label split off the end of a heading line; emitted right after the heading. */
  #pendingLabel: MarkupNode | null = null;

  constructor(text: string, file: FileId | undefined) {
    this.#s = new Scanner(text);
    this.#file = file;
  }

  parseRoot(): ParseResult {
    const root = this.#markup(TOP, 0);
    return { root, errors: this.#errors };
  }

  parseCodeRoot(): { exprs: readonly Expr[]; errors: readonly ParseError[] } {
    this.#newlines = true;
    const exprs = this.#codeBody(null);
    return { exprs, errors: this.#errors };
  }

  /* -------------------------------------------------------------------------------------
   * Helpers
   * ------------------------------------------------------------------------------------- */

  #span(start: number, end = this.#s.pos): SourceSpan {
    return spanFromBounds(start, end, this.#file);
  }

  #error(message: string, start: number, end = this.#s.pos, hint?: string): void {
    const span = this.#span(start, Math.max(end, start));
    this.#errors.push(hint ? { message, span, hint } : { message, span });
  }

  #expect(str: string, what: string): boolean {
    if (this.#s.eatIf(str)) return true;
    this.#error(`expected ${what}`, this.#s.pos);
    return false;
  }

  /** Skip spaces, comments and (unless line breaks are significant) newlines. */
  #trivia(): void {
    const s = this.#s;
    for (;;) {
      const c = s.peek();
      if (isSpace(c) || (isNewline(c) && !this.#newlines)) {
        s.eat();
      } else if (s.at("//")) {
        s.eatWhile((ch) => !isNewline(ch));
      } else if (s.at("/*")) {
        this.#blockComment();
      } else {
        return;
      }
    }
  }

  #blockComment(): void {
    const s = this.#s;
    const start = s.pos;
    s.eatIf("/*");
    let depth = 1;
    while (!s.done && depth > 0) {
      if (s.eatIf("/*")) depth += 1;
      else if (s.eatIf("*/")) depth -= 1;
      else s.eat();
    }
    if (depth > 0) this.#error("unclosed block comment", start);
  }

  #ident(): string {
    const s = this.#s;
    const start = s.pos;
    if (!isIdStart(s.peek())) return "";
    s.eat();
    // A trailing hyphen belongs to the surrounding text or operator, not the name.
    while (isIdContinue(s.peek())) {
      if (s.peek() === "-" && !isIdContinue(s.peek(1))) break;
      s.eat();
    }
    return s.from(start);
  }

  #peekIdent(): string {
    const s = this.#s;
    const start = s.pos;
    const word = this.#ident();
    s.jump(start);
    return word;
  }

  #atKeyword(word: string): boolean {
    const s = this.#s;
    return s.at(word) && !isIdContinue(s.peek(word.length));
  }

  /* -------------------------------------------------------------------------------------
   * Markup
   * ------------------------------------------------------------------------------------- */

  #markup(ctx: MarkupContext, start: number): Markup {
    const nodes: MarkupNode[] = [];
    const s = this.#s;
    while (!s.done && !this.#stops(ctx)) {
      const before = s.pos;
      const node = this.#markupNode(ctx);
      if (node) nodes.push(node);
      if (this.#pendingLabel) {
        nodes.push(this.#pendingLabel);
        this.#pendingLabel = null;
      }
      if (s.pos === before) {
        // Guarantee progress on anything unexpected.
        nodes.push({ kind: "text", text: s.eat(), span: this.#span(before) });
      }
    }
    return { kind: "markup", nodes: mergeText(nodes), span: this.#span(start) };
  }

  #stops(ctx: MarkupContext): boolean {
    const s = this.#s;
    const c = s.peek();
    if (ctx.delimiter !== null && c === ctx.delimiter) return true;
    if (ctx.bracket && c === "]" && this.#brackets === 0) return true;
    if (!isWhitespace(c)) return false;
    if (ctx.line && isNewline(c)) return true;
    if (ctx.line) {
      // Trailing spaces before the line end belong to the outer markup.
      let i = 0;
      while (isSpace(s.peek(i))) i += 1;
      if (isNewline(s.peek(i)) || s.peek(i) === "") return true;
    }
    if (ctx.delimiter === null && ctx.dedent === null) return false;
    const ahead = this.#lookWhitespace();
    if (ahead.newlines === 0) return false;
    if (ctx.delimiter !== null && ahead.newlines >= 2) return true;
    return ctx.dedent !== null && (ahead.indent === -1 || ahead.indent <= ctx.dedent);
  }

  /** Newlines in the whitespace run at the cursor and the indent of the line after it. */
  #lookWhitespace(): { newlines: number; indent: number } {
    const s = this.#s;
    let i = 0;
    let newlines = 0;
    let indent = 0;
    for (;;) {
      const c = s.peek(i);
      if (c === "\r" && s.peek(i + 1) === "\n") {
        i += 2;
      } else if (isNewline(c)) {
        i += 1;
      } else if (isSpace(c)) {
        i += 1;
        indent += 1;
        continue;
      } else {
        return { newlines, indent: c === "" ? -1 : indent };
      }
      newlines += 1;
      indent = 0;
    }
  }

  #markupNode(ctx: MarkupContext): MarkupNode | null {
    const s = this.#s;
    const start = s.pos;
    const c = s.peek();

    if (isWhitespace(c)) return this.#whitespace(ctx);

    switch (c) {
      case "\\":
        return this.#escape();
      case "*":
        return this.#strongOrEmph(ctx, "*");
      case "_":
        if (isAlphanumeric(s.before())) break;
        return this.#strongOrEmph(ctx, "_");
      case "`":
        return this.#raw();
      case "$":
        return this.#equation();
      case "<":
        if (isLabelChar(s.peek(1))) return this.#label();
        break;
      case "@":
        if (isLabelChar(s.peek(1))) return this.#ref();
        break;
      case "#":
        if (isIdStart(s.peek(1)) || (s.peek(1) !== "" && "([{\"".includes(s.peek(1)))) return this.#embed();
        break;
      case "[":
        this.#brackets += 1;
        break;
      case "]":
        if (this.#brackets > 0) this.#brackets -= 1;
        break;
      case "~":
        s.eat();
        return { kind: "text", text: " ", span: this.#span(start) };
      case "-":
        if (s.atLineStart() && isListMarkerEnd(s.peek(1))) return this.#listItem(ctx);
        if (s.eatIf("---")) return { kind: "text", text: "—", span: this.#span(start) };
        if (s.eatIf("--")) return { kind: "text", text: "–", span: this.#span(start) };
        break;
      case "+":
        if (s.atLineStart() && isListMarkerEnd(s.peek(1))) return this.#enumItem(ctx, null);
        break;
      case "=":
        if (s.atLineStart()) {
          const heading = this.#heading(ctx);
          if (heading) return heading;
        }
        break;
      case ".":
        if (s.eatIf("...")) return { kind: "text", text: "…", span: this.#span(start) };
        break;
      case "/":
        if (s.at("//")) {
          s.eatWhile((ch) => !isNewline(ch));
          return null;
        }
        if (s.at("/*")) {
          this.#blockComment();
          return null;
        }
        break;
      default:
        if (isDigit(c) && s.atLineStart()) {
          const item = this.#numberedItem(ctx);
          if (item) return item;
        }
        if (s.at("https://") || s.at("http://")) return this.#link();
        return this.#text();
    }

    s.eat();
    return { kind: "text", text: c, span: this.#span(start) };
  }

  #whitespace(ctx: MarkupContext): MarkupNode {
    const s = this.#s;
    const start = s.pos;
    let newlines = 0;
    while (!s.done) {
      const c = s.peek();
      if (isSpace(c)) {
        s.eat();
      } else if (isNewline(c) && !ctx.line) {
        s.eat();
        if (c === "\r") s.eatIf("\n");
        newlines += 1;
      } else {
        break;
      }
    }
    return newlines >= 2 ? { kind: "parbreak", span: this.#span(start) } : { kind: "space", span: this.#span(start) };
  }

  #text(): TextNode {
    const s = this.#s;
    const start = s.pos;
    s.eat();
    s.eatWhile((c) => !isWhitespace(c) && !TEXT_STOP.has(c));
    return { kind: "text", text: s.from(start), span: this.#span(start) };
  }

  #escape(): MarkupNode {
    const s = this.#s;
    const start = s.pos;
    s.eat();
    const next = s.peek();
    if (next === "" || isWhitespace(next)) {
      return { kind: "linebreak", span: this.#span(start) };
    }
    if (s.eatIf("u{")) {
      const hex = s.eatWhile((c) => /[0-9a-fA-F]/.test(c));
      const code = Number.parseInt(hex, 16);
      if (!this.#expect("}", "closing brace") || Number.isNaN(code) || code > 0x10ffff) {
        this.#error("invalid unicode escape sequence", start);
        return { kind: "text", text: "", span: this.#span(start) };
      }
      return { kind: "text", text: String.fromCodePoint(code), span: this.#span(start) };
    }
    return { kind: "text", text: s.eat(), span: this.#span(start) };
  }

  #strongOrEmph(ctx: MarkupContext, delimiter: "*" | "_"): MarkupNode {
    const s = this.#s;
    const start = s.pos;
    s.eat();
    const body = this.#markup({ ...ctx, delimiter }, s.pos);
    if (!s.eatIf(delimiter)) {
      this.#error(delimiter === "*" ? "expected asterisk" : "expected underscore", start, s.pos,
        delimiter === "*" ? "strong text ends with a matching `*`" : "emphasized text ends with a matching `_`");
    }
    return { kind: delimiter === "*" ? "strong" : "emph", body, span: this.#span(start) };
  }

  #raw(): MarkupNode {
    const s = this.#s;
    const start = s.pos;
    const fence = s.eatWhile((c) => c === "`").length;
    if (fence === 2) return { kind: "raw", text: "", lang: null, block: false, span: this.#span(start) };

    if (fence === 1) {
      const textStart = s.pos;
      s.eatWhile((c) => c !== "`");
      const text = s.from(textStart);
      if (!s.eatIf("`")) this.#error("expected backtick", start);
      return { kind: "raw", text, lang: null, block: false, span: this.#span(start) };
    }

    const lang = this.#ident() || null;
    const bodyStart = s.pos;
    const closing = "`".repeat(fence);
    while (!s.done && !s.at(closing)) s.eat();
    const body = s.from(bodyStart);
    if (!s.eatIf(closing)) this.#error("expected closing raw fence", start);
    const text = blockyRawText(body);
    return { kind: "raw", text, lang, block: body.includes("\n"), span: this.#span(start) };
  }

  #equation(): MarkupNode {
    const s = this.#s;
    const start = s.pos;
    s.eat();
    const bodyStart = s.pos;
    while (!s.done && s.peek() !== "$") {
      if (s.peek() === "\\") s.eat();
      s.eat();
    }
    const raw = s.from(bodyStart);
    if (!s.eatIf("$")) this.#error("expected dollar sign", start);
    const block = raw.length >= 2 && isWhitespace(raw.charAt(0)) && isWhitespace(raw.charAt(raw.length - 1));
    return { kind: "equation", text: raw.trim().replace(/\s+/g, " "), block, span: this.#span(start) };
  }

  #label(): MarkupNode {
    const s = this.#s;
    const start = s.pos;
    s.eat();
    const name = s.eatWhile(isLabelChar);
    if (!s.eatIf(">")) {
      s.jump(start + 1);
      return { kind: "text", text: "<", span: this.#span(start) };
    }
    return { kind: "label", name, span: this.#span(start) };
  }

  #ref(): MarkupNode {
    const s = this.#s;
    const start = s.pos;
    s.eat();
    let name = s.eatWhile(isLabelChar);
    // Sentence punctuation after a reference is not part of the label.
    while (name.endsWith(".") || name.endsWith(":")) {
      name = name.slice(0, -1);
      s.jump(s.pos - 1);
    }
    return { kind: "ref", target: name, span: this.#span(start) };
  }

  #link(): MarkupNode {
    const s = this.#s;
    const start = s.pos;
    s.eatWhile((c) => !isWhitespace(c) && !"<>[]\"".includes(c));
    while (/[.,;:!?')]$/.test(s.from(start))) s.jump(s.pos - 1);
    return { kind: "link", url: s.from(start), span: this.#span(start) };
  }

  #heading(ctx: MarkupContext): MarkupNode | null {
    const s = this.#s;
    const start = s.pos;
    const marker = s.eatWhile((c) => c === "=");
    if (!isListMarkerEnd(s.peek())) {
      s.jump(start);
      return null;
    }
    s.eatWhile(isSpace);
    const body = trimMarkup(this.#markup({ ...ctx, delimiter: null, line: true }, s.pos));
    const last = body.nodes.at(-1);
    if (last?.kind === "label") {
      // `= Title <label>` labels the heading, not its last word.
      this.#pendingLabel = last;
      const rest = trimMarkup({ ...body, nodes: body.nodes.slice(0, -1) });
      return { kind: "heading", level: marker.length, body: rest, span: this.#span(start, last.span.start) };
    }
    return { kind: "heading", level: marker.length, body, span: this.#span(start) };
  }

  #listItem(ctx: MarkupContext): MarkupNode {
    const s = this.#s;
    const start = s.pos;
    const column = s.column();
    s.eat();
    const body = this.#itemBody(ctx, column);
    return { kind: "list-item", body, span: this.#span(start) };
  }

  #enumItem(ctx: MarkupContext, number: number | null): MarkupNode {
    const s = this.#s;
    const start = s.pos;
    const column = s.column();
    if (number === null) {
      s.eat();
    } else {
      s.eatWhile(isDigit);
      s.eatIf(".");
    }
    const body = this.#itemBody(ctx, column);
    return { kind: "enum-item", number, body, span: this.#span(start) };
  }

  #numberedItem(ctx: MarkupContext): MarkupNode | null {
    const s = this.#s;
    const start = s.pos;
    const digits = s.eatWhile(isDigit);
    const isItem = s.peek() === "." && isListMarkerEnd(s.peek(1));
    s.jump(start);
    return isItem ? this.#enumItem(ctx, Number.parseInt(digits, 10)) : null;
  }

  #itemBody(ctx: MarkupContext, column: number): Markup {
    const s = this.#s;
    s.eatWhile(isSpace);
    const body = this.#markup({ delimiter: null, line: false, dedent: column, bracket: ctx.bracket }, s.pos);
    return trimMarkup(body);
  }

  #embed(): MarkupNode {
    const s = this.#s;
    const start = s.pos;
    s.eat();
    const saved = this.#newlines;
    this.#newlines = true;
    try {
      const expr = this.#embeddedExpr();
      s.eatIf(";");
      return { kind: "embed", expr, span: this.#span(start) };
    } finally {
      this.#newlines = saved;
    }
  }

  /** After `#`: a keyword statement, or an atom with calls, fields and trailing blocks. */
  #embeddedExpr(): Expr {
    const word = this.#peekIdent();
    if (STATEMENT_KEYWORDS.has(word)) return this.#statement(word);
    return this.#postfix(this.#primary(true), true);
  }

  /* -------------------------------------------------------------------------------------
   * Code
   * ------------------------------------------------------------------------------------- */

  #codeBody(close: string | null): Expr[] {
    const s = this.#s;
    const exprs: Expr[] = [];
    for (;;) {
      const saved = this.#newlines;
      this.#newlines = false;
      this.#trivia();
      while (s.eatIf(";")) this.#trivia();
      this.#newlines = saved;
      if (s.done || (close !== null && s.at(close))) break;

      const before = s.pos;
      exprs.push(this.#expr(0));
      this.#trivia();
      const c = s.peek();
      if (c === "" || c === ";" || isNewline(c) || (close !== null && s.at(close))) continue;
      this.#error("expected semicolon or line break", s.pos);
      s.eatWhile((ch) => !isNewline(ch) && ch !== ";" && (close === null || ch !== close));
      if (s.pos === before) s.eat();
    }
    return exprs;
  }

  #expr(minPrec: number): Expr {
    const s = this.#s;
    this.#trivia();
    const start = s.pos;
    let lhs: Expr;

    if (this.#atKeyword("not")) {
      s.eatIf("not");
      const operand = this.#expr(4);
      lhs = { kind: "unary", op: "not", expr: operand, span: this.#span(start) };
    } else if ((s.peek() === "-" || s.peek() === "+") && s.peek(1) !== "=") {
      const op = s.eat() === "-" ? "-" : "+";
      const operand = this.#expr(7);
      lhs = { kind: "unary", op, expr: operand, span: this.#span(start) };
    } else {
      lhs = this.#postfix(this.#primary(false), false);
    }

    for (;;) {
      const save = s.pos;
      this.#trivia();
      const op = this.#peekBinary();
      if (!op || BINARY_PRECEDENCE[op.op] < minPrec) {
        s.jump(save);
        break;
      }
      s.jump(s.pos + op.length);
      const prec = BINARY_PRECEDENCE[op.op];
      const rhs = this.#expr(prec === 1 ? prec : prec + 1);
      lhs = { kind: "binary", op: op.op, lhs, rhs, span: this.#span(start) };
    }
    return lhs;
  }

  #peekBinary(): { op: BinaryOp; length: number } | null {
    const s = this.#s;
    for (const op of ["==", "!=", "<=", ">=", "+=", "-=", "*=", "/="] as const) {
      if (s.at(op)) return { op, length: 2 };
    }
    const c = s.peek();
    if (c === "=" && s.peek(1) !== ">") return { op: "=", length: 1 };
    if (c === "<" || c === ">" || c === "+" || c === "-" || c === "*" || c === "/") {
      return { op: c, length: 1 };
    }
    if (this.#atKeyword("and")) return { op: "and", length: 3 };
    if (this.#atKeyword("or")) return { op: "or", length: 2 };
    if (this.#atKeyword("in")) return { op: "in", length: 2 };
    if (this.#atKeyword("not")) {
      const start = s.pos;
      s.jump(start + 3);
      this.#trivia();
      const notIn = this.#atKeyword("in") ? { op: "not in" as const, length: s.pos + 2 - start } : null;
      s.jump(start);
      return notIn;
    }
    return null;
  }

  #primary(embedded: boolean): Expr {
    const s = this.#s;
    const start = s.pos;
    const c = s.peek();

    if (isIdStart(c)) {
      const word = this.#peekIdent();
      switch (word) {
        case "none":
          s.jump(start + 4);
          return { kind: "none", span: this.#span(start) };
        case "auto":
          s.jump(start + 4);
          return { kind: "auto", span: this.#span(start) };
        case "true":
        case "false":
          s.jump(start + word.length);
          return { kind: "bool", value: word === "true", span: this.#span(start) };
      }
      if (STATEMENT_KEYWORDS.has(word)) return this.#statement(word);
      if (KEYWORDS.has(word)) {
        s.jump(start + word.length);
        this.#error(`unexpected keyword \`${word}\``, start);
        return { kind: "none", span: this.#span(start) };
      }
      s.jump(start + word.length);
      if (!embedded) {
        const save = s.pos;
        s.eatWhile(isSpace);
        if (s.eatIf("=>")) {
          const params: Param[] = [{ kind: "pos", name: word, span: this.#span(start, start + word.length) }];
          const body = this.#expr(0);
          return { kind: "closure", name: null, params, body, span: this.#span(start) };
        }
        s.jump(save);
      }
      return { kind: "ident", name: word, span: this.#span(start) };
    }

    if (isDigit(c) || (c === "." && isDigit(s.peek(1)))) return this.#number();
    if (c === '"') return this.#string();
    if (c === "(") return this.#parenthesized();
    if (c === "[") return this.#contentBlock();
    if (c === "{") return this.#codeBlock();
    if (c === "<" && isLabelChar(s.peek(1))) {
      s.eat();
      const name = s.eatWhile(isLabelChar);
      this.#expect(">", "closing angle bracket");
      return { kind: "label", name, span: this.#span(start) };
    }

    if (s.done) {
      this.#error("expected expression", start);
    } else {
      this.#error(`unexpected ${describeChar(c)}`, start, start + 1);
      if (!")]}".includes(c) || embedded) s.eat();
    }
    return { kind: "none", span: this.#span(start) };
  }

  #postfix(expr: Expr, embedded: boolean): Expr {
    const s = this.#s;
    const start = expr.span.start;
    let current = expr;
    for (;;) {
      if (s.peek() === "(") {
        const argsStart = s.pos;
        const args = this.#args();
        current = { kind: "call", callee: current, args, argsSpan: this.#span(argsStart), span: this.#span(start) };
      } else if (s.peek() === "[") {
        const argsStart = s.pos;
        const block = this.#contentBlock();
        if (current.kind === "call" && current.argsSpan.end === argsStart) {
          current = {
            ...current,
            args: [...current.args, { kind: "pos", expr: block }],
            argsSpan: this.#span(current.argsSpan.start),
            span: this.#span(start),
          };
        } else {
          current = {
            kind: "call",
            callee: current,
            args: [{ kind: "pos", expr: block }],
            argsSpan: this.#span(argsStart),
            span: this.#span(start),
          };
        }
      } else if (s.peek() === "." && isIdStart(s.peek(1))) {
        s.eat();
        const fieldStart = s.pos;
        const field = this.#ident();
        if (embedded && KEYWORDS.has(field)) {
          s.jump(fieldStart - 1);
          break;
        }
        current = { kind: "field", target: current, field, fieldSpan: this.#span(fieldStart), span: this.#span(start) };
      } else {
        break;
      }
    }
    return current;
  }

  #number(): Expr {
    const s = this.#s;
    const start = s.pos;
    s.eatWhile(isDigit);
    let float = false;
    if (s.peek() === "." && isDigit(s.peek(1))) {
      s.eat();
      s.eatWhile(isDigit);
      float = true;
    }
    if ((s.peek() === "e" || s.peek() === "E") && (isDigit(s.peek(1)) || ((s.peek(1) === "-" || s.peek(1) === "+") && isDigit(s.peek(2))))) {
      s.eat();
      if (!s.eatIf("-")) s.eatIf("+");
      s.eatWhile(isDigit);
      float = true;
    }
    const digits = s.from(start);
    const value = Number(digits);
    const suffixStart = s.pos;
    const suffix = s.peek() === "%" ? s.eat() : s.eatWhile((c) => /[a-zA-Z]/.test(c));
    if (suffix) {
      const unit = UNITS.find((u) => u === suffix);
      if (!unit) {
        this.#error(`invalid number suffix: ${suffix}`, suffixStart);
        return { kind: "none", span: this.#span(start) };
      }
      return { kind: "numeric", value, unit, span: this.#span(start) };
    }
    if (!float && !Number.isSafeInteger(value)) {
      this.#error("integer literal is too large", start);
    }
    return float ? { kind: "float", value, span: this.#span(start) } : { kind: "int", value, span: this.#span(start) };
  }

  #string(): Expr {
    const s = this.#s;
    const start = s.pos;
    s.eat();
    let value = "";
    for (;;) {
      const c = s.peek();
      if (c === "") {
        this.#error("unclosed string", start);
        break;
      }
      if (c === '"') {
        s.eat();
        break;
      }
      if (c === "\\") {
        const escStart = s.pos;
        s.eat();
        const e = s.eat();
        if (e === "n") value += "\n";
        else if (e === "t") value += "\t";
        else if (e === "r") value += "\r";
        else if (e === "\\" || e === '"') value += e;
        else if (e === "u" && s.eatIf("{")) {
          const hex = s.eatWhile((ch) => /[0-9a-fA-F]/.test(ch));
          const code = Number.parseInt(hex, 16);
          if (!s.eatIf("}") || Number.isNaN(code) || code > 0x10ffff) {
            this.#error("invalid unicode escape sequence", escStart);
          } else {
            value += String.fromCodePoint(code);
          }
        } else {
          this.#error(`invalid escape sequence: \\${e}`, escStart);
        }
        continue;
      }
      value += s.eat();
    }
    return { kind: "str", value, span: this.#span(start) };
  }

  #contentBlock(): Expr {
    const s = this.#s;
    const start = s.pos;
    s.eat();
    const savedBrackets = this.#brackets;
    this.#brackets = 0;
    const body = this.#markup({ delimiter: null, line: false, dedent: null, bracket: true }, s.pos);
    this.#brackets = savedBrackets;
    this.#expect("]", "closing bracket");
    return { kind: "content-block", body, span: this.#span(start) };
  }

  #codeBlock(): Expr {
    const s = this.#s;
    const start = s.pos;
    s.eat();
    const saved = this.#newlines;
    this.#newlines = true;
    const exprs = this.#codeBody("}");
    this.#newlines = saved;
    this.#expect("}", "closing brace");
    return { kind: "code-block", exprs, span: this.#span(start) };
  }

  /** Inside `(...)` line breaks are plain whitespace. */
  #nested<T>(fn: () => T): T {
    const saved = this.#newlines;
    this.#newlines = false;
    try {
      return fn();
    } finally {
      this.#newlines = saved;
    }
  }

  #parenthesized(): Expr {
    const s = this.#s;
    const start = s.pos;
    if (this.#atClosureHead()) return this.#closure(null, start);

    return this.#nested(() => {
      s.eat();
      this.#trivia();
      if (s.eatIf(")")) return { kind: "array", items: [], span: this.#span(start) };
      if (s.at(":")) {
        s.eat();
        this.#trivia();
        this.#expect(")", "closing paren");
        return { kind: "dict", items: [], span: this.#span(start) };
      }

      const positional: ArrayItem[] = [];
      const named: DictItem[] = [];
      let trailingComma = false;
      let mixed = false;
      for (;;) {
        this.#trivia();
        if (s.done || s.at(")")) break;
        const itemStart = s.pos;
        if (s.eatIf("..")) {
          const expr = this.#expr(0);
          positional.push({ kind: "spread", expr });
          named.push({ kind: "spread", expr });
        } else {
          const key = this.#namedKey();
          if (key) {
            const expr = this.#expr(0);
            named.push({ kind: "named", key: key.name, keySpan: key.span, expr });
            if (positional.some((p) => p.kind === "pos")) mixed = true;
          } else {
            const expr = this.#expr(0);
            positional.push({ kind: "pos", expr });
            if (named.some((n) => n.kind === "named")) mixed = true;
          }
        }
        if (s.pos === itemStart) break;
        this.#trivia();
        trailingComma = s.eatIf(",");
        if (!trailingComma) break;
      }
      this.#trivia();
      this.#expect(")", "closing paren");

      const isDict = named.some((n) => n.kind === "named");
      if (mixed) this.#error("expected named pair, found expression", start);
      if (isDict) return { kind: "dict", items: named, span: this.#span(start) };
      const only = positional[0];
      if (positional.length === 1 && only && only.kind === "pos" && !trailingComma) {
        return { kind: "paren", expr: only.expr, span: this.#span(start) };
      }
      return { kind: "array", items: positional, span: this.#span(start) };
    });
  }

  /** `name:` or `"key":` at the cursor; consumes it when present. */
  #namedKey(): { name: string; span: SourceSpan } | null {
    const s = this.#s;
    const start = s.pos;
    let name: string | null = null;
    if (isIdStart(s.peek())) {
      name = this.#ident();
    } else if (s.peek() === '"') {
      const str = this.#string();
      name = str.kind === "str" ? str.value : null;
    }
    if (name !== null) {
      const keyEnd = s.pos;
      this.#trivia();
      if (s.peek() === ":" && s.peek(1) !== ":") {
        s.eat();
        return { name, span: this.#span(start, keyEnd) };
      }
    }
    s.jump(start);
    return null;
  }

  #atClosureHead(): boolean {
    const s = this.#s;
    const text = s.text;
    let depth = 0;
    let i = s.pos;
    for (; i < text.length; i += 1) {
      const c = text.charAt(i);
      if (c === '"') {
        i += 1;
        while (i < text.length && text.charAt(i) !== '"') i += text.charAt(i) === "\\" ? 2 : 1;
      } else if (c === "(" || c === "[" || c === "{") {
        depth += 1;
      } else if (c === ")" || c === "]" || c === "}") {
        depth -= 1;
        if (depth === 0) break;
      }
    }
    i += 1;
    while (isSpace(text.charAt(i))) i += 1;
    return text.startsWith("=>", i);
  }

  #params(): Param[] {
    const s = this.#s;
    const params: Param[] = [];
    this.#nested(() => {
      this.#expect("(", "opening paren");
      for (;;) {
        this.#trivia();
        if (s.done || s.at(")")) break;
        const start = s.pos;
        if (s.eatIf("..")) {
          const name = this.#ident() || null;
          params.push({ kind: "sink", name, span: this.#span(start) });
        } else {
          const name = this.#ident();
          if (!name) {
            this.#error("expected parameter name", start, start + 1);
            s.eat();
          } else {
            this.#trivia();
            if (s.eatIf(":")) {
              const def = this.#expr(0);
              params.push({ kind: "named", name, default: def, span: this.#span(start) });
            } else {
              params.push({ kind: "pos", name, span: this.#span(start) });
            }
          }
        }
        this.#trivia();
        if (!s.eatIf(",")) break;
      }
      this.#trivia();
      this.#expect(")", "closing paren");
    });
    return params;
  }

  #closure(name: string | null, start: number): Expr {
    const s = this.#s;
    const params = this.#params();
    s.eatWhile(isSpace);
    this.#expect("=>", "arrow");
    const body = this.#expr(0);
    return { kind: "closure", name, params, body, span: this.#span(start) };
  }

  #args(): Arg[] {
    const s = this.#s;
    const args: Arg[] = [];
    this.#nested(() => {
      s.eat();
      for (;;) {
        this.#trivia();
        if (s.done || s.at(")")) break;
        const start = s.pos;
        if (s.eatIf("..")) {
          args.push({ kind: "spread", expr: this.#expr(0) });
        } else {
          const key = isIdStart(s.peek()) ? this.#namedKey() : null;
          if (key) args.push({ kind: "named", name: key.name, nameSpan: key.span, expr: this.#expr(0) });
          else args.push({ kind: "pos", expr: this.#expr(0) });
        }
        if (s.pos === start) break;
        this.#trivia();
        if (!s.eatIf(",")) break;
      }
      this.#trivia();
      this.#expect(")", "closing paren");
    });
    return args;
  }

  /* -------------------------------------------------------------------------------------
   * Statements
   * ------------------------------------------------------------------------------------- */

  #statement(word: string): Expr {
    const s = this.#s;
    const start = s.pos;
    s.jump(start + word.length);
    switch (word) {
      case "let":
        return this.#let(start);
      case "set":
        return this.#set(start);
      case "show":
        return this.#show(start);
      case "if":
        return this.#if(start);
      case "for":
        return this.#for(start);
      case "while": {
        const condition = this.#expr(0);
        const body = this.#block();
        return { kind: "while", condition, body, span: this.#span(start) };
      }
      case "import":
        return this.#import(start);
      case "include": {
        const source = this.#expr(0);
        return { kind: "include", source, span: this.#span(start) };
      }
      case "break":
        return { kind: "break", span: this.#span(start) };
      case "continue":
        return { kind: "continue", span: this.#span(start) };
      default: {
        const save = s.pos;
        s.eatWhile(isSpace);
        const c = s.peek();
        if (c === "" || isNewline(c) || ";)]}".includes(c)) {
          s.jump(save);
          return { kind: "return", value: null, span: this.#span(start) };
        }
        const value = this.#expr(0);
        return { kind: "return", value, span: this.#span(start) };
      }
    }
  }

  #pattern(): Pattern {
    const s = this.#s;
    this.#trivia();
    const start = s.pos;
    if (s.peek() === "(") {
      const names: (string | null)[] = [];
      this.#nested(() => {
        s.eat();
        for (;;) {
          this.#trivia();
          if (s.done || s.at(")")) break;
          const nameStart = s.pos;
          const name = this.#ident();
          if (!name) {
            this.#error("expected identifier", nameStart, nameStart + 1);
            s.eat();
          }
          names.push(name === "_" || !name ? null : name);
          this.#trivia();
          if (!s.eatIf(",")) break;
        }
        this.#trivia();
        this.#expect(")", "closing paren");
      });
      return { kind: "destructure", names, span: this.#span(start) };
    }
    const name = this.#ident();
    if (!name) this.#error("expected identifier", start);
    else if (KEYWORDS.has(name)) this.#error(`\`${name}\` is a keyword and cannot be bound`, start);
    return { kind: "name", name: name === "_" || !name ? null : name, span: this.#span(start) };
  }

  #let(start: number): Expr {
    const s = this.#s;
    const pattern = this.#pattern();
    if (pattern.kind === "name" && pattern.name !== null && s.peek() === "(") {
      const closureStart = s.pos;
      const params = this.#params();
      this.#trivia();
      this.#expect("=", "equals sign");
      const body = this.#expr(0);
      const init: Expr = { kind: "closure", name: pattern.name, params, body, span: this.#span(closureStart) };
      return { kind: "let", pattern, init, span: this.#span(start) };
    }
    const save = s.pos;
    this.#trivia();
    if (s.peek() === "=" && s.peek(1) !== "=") {
      s.eat();
      const init = this.#expr(0);
      return { kind: "let", pattern, init, span: this.#span(start) };
    }
    s.jump(save);
    if (pattern.kind === "destructure") this.#error("expected equals sign", s.pos);
    return { kind: "let", pattern, init: null, span: this.#span(start) };
  }

  #set(start: number): Expr {
    const s = this.#s;
    this.#trivia();
    const targetStart = s.pos;
    let target: Expr = { kind: "ident", name: this.#ident(), span: this.#span(targetStart) };
    while (s.peek() === "." && isIdStart(s.peek(1))) {
      s.eat();
      const fieldStart = s.pos;
      const field = this.#ident();
      target = { kind: "field", target, field, fieldSpan: this.#span(fieldStart), span: this.#span(targetStart) };
    }
    if (target.kind === "ident" && !target.name) this.#error("expected identifier", targetStart);
    const argsStart = s.pos;
    let args: Arg[] = [];
    if (s.peek() === "(") args = this.#args();
    else this.#expect("(", "argument list");
    const argsSpan = this.#span(argsStart);
    const save = s.pos;
    this.#trivia();
    let condition: Expr | null = null;
    if (this.#atKeyword("if")) {
      s.jump(s.pos + 2);
      condition = this.#expr(0);
    } else {
      s.jump(save);
    }
    return { kind: "set", target, args, argsSpan, condition, span: this.#span(start) };
  }

  #show(start: number): Expr {
    const s = this.#s;
    this.#trivia();
    const selector = s.peek() === ":" ? null : this.#expr(0);
    this.#trivia();
    this.#expect(":", "colon");
    const transform = this.#expr(0);
    return { kind: "show", selector, transform, span: this.#span(start) };
  }

  #if(start: number): Expr {
    const s = this.#s;
    const condition = this.#expr(0);
    const then = this.#block();
    const save = s.pos;
    const savedNewlines = this.#newlines;
    this.#newlines = false;
    this.#trivia();
    this.#newlines = savedNewlines;
    if (this.#atKeyword("else")) {
      s.jump(s.pos + 4);
      this.#trivia();
      const otherwise = this.#atKeyword("if") ? this.#statement("if") : this.#block();
      return { kind: "if", condition, then, otherwise, span: this.#span(start) };
    }
    s.jump(save);
    return { kind: "if", condition, then, otherwise: null, span: this.#span(start) };
  }

  #for(start: number): Expr {
    const s = this.#s;
    const pattern = this.#pattern();
    this.#trivia();
    if (this.#atKeyword("in")) s.jump(s.pos + 2);
    else this.#error("expected keyword `in`", s.pos);
    const iterable = this.#expr(0);
    const body = this.#block();
    return { kind: "for", pattern, iterable, body, span: this.#span(start) };
  }

  #import(start: number): Expr {
    const s = this.#s;
    const source = this.#expr(0);
    let alias: string | null = null;
    let items: ImportItems = { kind: "none" };
    let save = s.pos;
    this.#trivia();
    if (this.#atKeyword("as")) {
      s.jump(s.pos + 2);
      this.#trivia();
      alias = this.#ident() || null;
      if (!alias) this.#error("expected identifier", s.pos);
      save = s.pos;
      this.#trivia();
    }
    if (s.eatIf(":")) {
      this.#trivia();
      if (s.eatIf("*")) {
        items = { kind: "wildcard" };
      } else {
        const names: { name: string; span: SourceSpan }[] = [];
        for (;;) {
          this.#trivia();
          const nameStart = s.pos;
          const name = this.#ident();
          if (!name) {
            this.#error("expected identifier", nameStart);
            break;
          }
          names.push({ name, span: this.#span(nameStart) });
          const afterName = s.pos;
          this.#trivia();
          if (!s.eatIf(",")) {
            s.jump(afterName);
            break;
          }
        }
        items = { kind: "names", names };
      }
    } else {
      s.jump(save);
    }
    return { kind: "import", source, alias, items, span: this.#span(start) };
  }

  /** `{...}` or `[...]` body of a control-flow construct. */
  #block(): Expr {
    const s = this.#s;
    const save = s.pos;
    const savedNewlines = this.#newlines;
    this.#newlines = false;
    this.#trivia();
    this.#newlines = savedNewlines;
    if (s.peek() === "{") return this.#codeBlock();
    if (s.peek() === "[") return this.#contentBlock();
    s.jump(save);
    this.#error("expected block", s.pos);
    return { kind: "none", span: this.#span(s.pos) };
  }
}

/* =======================================================================================
 * Helpers
 * ======================================================================================= */

function isListMarkerEnd(c: string): boolean {
  return c === "" || isWhitespace(c);
}

function describeChar(c: string): string {
  switch (c) {
    case ")":
      return "closing paren";
    case "]":
      return "closing bracket";
    case "}":
      return "closing brace";
    default:
      return `character \`${c}\``;
  }
}

function mergeText(nodes: readonly MarkupNode[]): MarkupNode[] {
  const out: MarkupNode[] = [];
  for (const node of nodes) {
    const last = out.at(-1);
    if (node.kind === "text" && last?.kind === "text" && last.span.end === node.span.start) {
      out[out.length - 1] = {
        kind: "text",
        text: last.text + node.text,
        span: spanFromBounds(last.span.start, node.span.end, last.span.file),
      };
    } else {
      out.push(node);
    }
  }
  return out;
}

function trimMarkup(markup: Markup): Markup {
  const nodes = [...markup.nodes];
  while (nodes[0]?.kind === "space") nodes.shift();
  while (nodes.at(-1)?.kind === "space") nodes.pop();
  return { ...markup, nodes };
}

/** Drop a whitespace-only first and last line and strip the common indentation. */
function blockyRawText(body: string): string {
  let lines = body.split(/\r\n|\r|\n/);
  if (lines.length > 1 && (lines[0] ?? "").trim() === "") lines = lines.slice(1);
  if (lines.length > 1 && (lines.at(-1) ?? "").trim() === "") lines = lines.slice(0, -1);
  if (lines.length === 1) return (lines[0] ?? "").trim();
  const indents = lines.filter((l) => l.trim() !== "").map((l) => l.length - l.trimStart().length);
  const common = indents.length > 0 ? Math.min(...indents) : 0;
  return lines.map((l) => l.slice(common)).join("\n");
}
