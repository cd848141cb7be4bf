/* =======================================================================================
 * SYNTAX TREE
 * ---------------------------------------------------------------------------------------
 * Markup nodes (document text) and expressions (embedded code). Every node carries the
 * span it was parsed from; evaluation errors point there.
 * ======================================================================================= */

import type { SourceSpan } from "../model/span.js";

interface NodeBase<K extends string> {
  readonly kind: K;
  readonly span: SourceSpan;
}

/* ---------------------------------------------------------------------------------------
 * Markup
 * --------------------------------------------------------------------------------------- */

export interface Markup extends NodeBase<"markup"> {
  readonly nodes: readonly MarkupNode[];
}

export interface TextNode extends NodeBase<"text"> {
  readonly text: string;
}
/** Run of whitespace containing at most one newline. */
export type SpaceNode = NodeBase<"space">;
export type ParbreakNode = NodeBase<"parbreak">;
export type LinebreakNode = NodeBase<"linebreak">;
export interface StrongNode extends NodeBase<"strong"> {
  readonly body: Markup;
}
export interface EmphNode extends NodeBase<"emph"> {
  readonly body: Markup;
}
export interface RawNode extends NodeBase<"raw"> {
  readonly text: string;
  readonly lang: string | null;
  readonly block: boolean;
}
export interface EquationNode extends NodeBase<"equation"> {
  readonly text: string;
  readonly block: boolean;
}
export interface LinkNode extends NodeBase<"link"> {
  readonly url: string;
}
export interface LabelNode extends NodeBase<"label"> {
  readonly name: string;
}
export interface RefNode extends NodeBase<"ref"> {
  readonly target: string;
}
export interface HeadingNode extends NodeBase<"heading"> {
  readonly level: number;
  readonly body: Markup;
}
export interface ListItemNode extends NodeBase<"list-item"> {
  readonly body: Markup;
}
export interface EnumItemNode extends NodeBase<"enum-item"> {
  readonly number: number | null;
  readonly body: Markup;
}
export interface EmbedNode extends NodeBase<"embed"> {
  readonly expr: Expr;
}

export type MarkupNode =
  | TextNode
  | SpaceNode
  | ParbreakNode
  | LinebreakNode
  | StrongNode
  | EmphNode
  | RawNode
  | EquationNode
  | LinkNode
  | LabelNode
  | RefNode
  | HeadingNode
  | ListItemNode
  | EnumItemNode
  | EmbedNode;

/* ---------------------------------------------------------------------------------------
 * Code
 * --------------------------------------------------------------------------------------- */

export type Unit = "pt" | "mm" | "cm" | "in" | "em" | "%" | "fr";

export type UnaryOp = "+" | "-" | "not";
export type BinaryOp =
  | "+" | "-" | "*" | "/"
  | "==" | "!=" | "<" | "<=" | ">" | ">="
  | "and" | "or" | "in" | "not in"
  | "=" | "+=" | "-=" | "*=" | "/=";

export type NoneExpr = NodeBase<"none">;
export type AutoExpr = NodeBase<"auto">;
export interface BoolExpr extends NodeBase<"bool"> {
  readonly value: boolean;
}
export interface IntExpr extends NodeBase<"int"> {
  readonly value: number;
}
export interface FloatExpr extends NodeBase<"float"> {
  readonly value: number;
}
export interface NumericExpr extends NodeBase<"numeric"> {
  readonly value: number;
  readonly unit: Unit;
}
export interface StrExpr extends NodeBase<"str"> {
  readonly value: string;
}
export interface IdentExpr extends NodeBase<"ident"> {
  readonly name: string;
}
export interface LabelExpr extends NodeBase<"label"> {
  readonly name: string;
}
export interface ContentBlockExpr extends NodeBase<"content-block"> {
  readonly body: Markup;
}
export interface CodeBlockExpr extends NodeBase<"code-block"> {
  readonly exprs: readonly Expr[];
}
export interface ParenExpr extends NodeBase<"paren"> {
  readonly expr: Expr;
}

export type ArrayItem =
  | { readonly kind: "pos"; readonly expr: Expr }
  | { readonly kind: "spread"; readonly expr: Expr };
export interface ArrayExpr extends NodeBase<"array"> {
  readonly items: readonly ArrayItem[];
}

export type DictItem =
  | { readonly kind: "named"; readonly key: string; readonly keySpan: SourceSpan; readonly expr: Expr }
  | { readonly kind: "spread"; readonly expr: Expr };
export interface DictExpr extends NodeBase<"dict"> {
  readonly items: readonly DictItem[];
}

export interface UnaryExpr extends NodeBase<"unary"> {
  readonly op: UnaryOp;
  readonly expr: Expr;
}
export interface BinaryExpr extends NodeBase<"binary"> {
  readonly op: BinaryOp;
  readonly lhs: Expr;
  readonly rhs: Expr;
}
export interface FieldExpr extends NodeBase<"field"> {
  readonly target: Expr;
  readonly field: string;
  readonly fieldSpan: SourceSpan;
}

export type Arg =
  | { readonly kind: "pos"; readonly expr: Expr }
  | { readonly kind: "named"; readonly name: string; readonly nameSpan: SourceSpan; readonly expr: Expr }
  | { readonly kind: "spread"; readonly expr: Expr };

export interface CallExpr extends NodeBase<"call"> {
  readonly callee: Expr;
  readonly args: readonly Arg[];
  readonly argsSpan: SourceSpan;
}

export type Param =
  | { readonly kind: "pos"; readonly name: string; readonly span: SourceSpan }
  | { readonly kind: "named"; readonly name: string; readonly span: SourceSpan; readonly default: Expr }
  | { readonly kind: "sink"; readonly name: string | null; readonly span: SourceSpan };

export interface ClosureExpr extends NodeBase<"closure"> {
  readonly name: string | null;
  readonly params: readonly Param[];
  readonly body: Expr;
}

/** `x`, `_`, or a parenthesized list of names for destructuring. */
export type Pattern =
  | { readonly kind: "name"; readonly name: string | null; readonly span: SourceSpan }
  | { readonly kind: "destructure"; readonly names: readonly (string | null)[]; readonly span: SourceSpan };

export interface LetExpr extends NodeBase<"let"> {
  readonly pattern: Pattern;
  readonly init: Expr | null;
}
export interface SetExpr extends NodeBase<"set"> {
  readonly target: Expr;
  readonly args: readonly Arg[];
  readonly argsSpan: SourceSpan;
  readonly condition: Expr | null;
}
export interface ShowExpr extends NodeBase<"show"> {
  readonly selector: Expr | null;
  readonly transform: Expr;
}
export interface IfExpr extends NodeBase<"if"> {
  readonly condition: Expr;
  readonly then: Expr;
  readonly otherwise: Expr | null;
}
export interface WhileExpr extends NodeBase<"while"> {
  readonly condition: Expr;
  readonly body: Expr;
}
export interface ForExpr extends NodeBase<"for"> {
  readonly pattern: Pattern;
  readonly iterable: Expr;
  readonly body: Expr;
}

export type ImportItems =
  | { readonly kind: "none" }
  | { readonly kind: "wildcard" }
  | { readonly kind: "names"; readonly names: readonly { readonly name: string; readonly span: SourceSpan }[] };

export interface ImportExpr extends NodeBase<"import"> {
  readonly source: Expr;
  readonly alias: string | null;
  readonly items: ImportItems;
}
export interface IncludeExpr extends NodeBase<"include"> {
  readonly source: Expr;
}
export type BreakExpr = NodeBase<"break">;
export type ContinueExpr = NodeBase<"continue">;
export interface ReturnExpr extends NodeBase<"return"> {
  readonly value: Expr | null;
}

export type Expr =
  | NoneExpr
  | AutoExpr
  | BoolExpr
  | IntExpr
  | FloatExpr
  | NumericExpr
  | StrExpr
  | IdentExpr
  | LabelExpr
  | ContentBlockExpr
  | CodeBlockExpr
  | ParenExpr
  | ArrayExpr
  | DictExpr
  | UnaryExpr
  | BinaryExpr
  | FieldExpr
  | CallExpr
  | ClosureExpr
  | LetExpr
  | SetExpr
  | ShowExpr
  | IfExpr
  | WhileExpr
  | ForExpr
  | ImportExpr
  | IncludeExpr
  | BreakExpr
  | ContinueExpr
  | ReturnExpr;

export interface ParseError {
  readonly message: string;
  readonly span: SourceSpan;
  readonly hint?: string;
}

export interface ParseResult {
  readonly root: Markup;
  readonly errors: readonly ParseError[];
}
