/** Character cursor shared by the markup and code parsers. */
export class Scanner {
  #pos = 0;

  constructor(readonly text: string) {}

  get pos(): number {
    return this.#pos;
  }

  get done(): boolean {
    return this.#pos >= this.text.length;
  }

  jump(pos: number): void {
    this.#pos = Math.max(0, Math.min(pos, this.text.length));
  }

  /** Character at `pos + offset`, or "" past either end. */
  peek(offset = 0): string {
    return this.text.charAt(this.#pos + offset);
  }

  /** Character just before the cursor, or "". */
  before(): string {
    return this.#pos > 0 ? this.text.charAt(this.#pos - 1) : "";
  }

  at(str: string): boolean {
    return this.text.startsWith(str, this.#pos);
  }

  eat(): string {
    const c = this.peek();
    if (c) this.#pos += 1;
    return c;
  }

  eatIf(str: string): boolean {
    if (!this.at(str)) return false;
    this.#pos += str.length;
    return true;
  }

  eatWhile(pred: (c: string) => boolean): string {
    const start = this.#pos;
    while (!this.done && pred(this.peek())) this.#pos += 1;
    return this.text.slice(start, this.#pos);
  }

  from(start: number): string {
    return this.text.slice(start, this.#pos);
  }

  /** Columns between the last line break and `pos`. */
  column(pos = this.#pos): number {
    let i = pos;
    while (i > 0 && !isNewline(this.text.charAt(i - 1))) i -= 1;
    return pos - i;
  }

  /** True when only spaces and tabs precede the cursor on its line. */
  atLineStart(): boolean {
    let i = this.#pos;
    while (i > 0) {
      const c = this.text.charAt(i - 1);
      if (isNewline(c)) return true;
      if (c !== " " && c !== "\t") return false;
      i -= 1;
    }
    return true;
  }
}

export function isNewline(c: string): boolean {
  return c === "\n" || c === "\r";
}

export function isSpace(c: string): boolean {
  return c === " " || c === "\t";
}

export function isWhitespace(c: string): boolean {
  return isSpace(c) || isNewline(c);
}

export function isDigit(c: string): boolean {
  return c >= "0" && c <= "9";
}

const ID_START = /[\p{L}_]/u;
const ID_CONTINUE = /[\p{L}\p{N}_-]/u;
const LABEL_CHAR = /[\p{L}\p{N}_\-.:]/u;

export function isIdStart(c: string): boolean {
  return c !== "" && ID_START.test(c);
}

export function isIdContinue(c: string): boolean {
  return c !== "" && ID_CONTINUE.test(c);
}

export function isLabelChar(c: string): boolean {
  return c !== "" && LABEL_CHAR.test(c);
}

export function isAlphanumeric(c: string): boolean {
  return c !== "" && /[\p{L}\p{N}]/u.test(c);
}

export const KEYWORDS = new Set([
  "none",
  "auto",
  "true",
  "false",
  "not",
  "and",
  "or",
  "let",
  "set",
  "show",
  "if",
  "else",
  "for",
  "in",
  "while",
  "break",
  "continue",
  "return",
  "import",
  "include",
  "as",
]);
