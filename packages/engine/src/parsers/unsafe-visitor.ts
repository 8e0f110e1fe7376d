/**
 * Counting visitor over Rust token trees.
 *
 * Walks items, statements and expressions and tallies functions, methods,
 * impl blocks, trait declarations and expressions. An occurrence is unsafe
 * when it sits inside an `unsafe { }` block, an `unsafe fn`, an
 * `unsafe impl` or an `unsafe trait`. Nested items start a fresh scope:
 * a plain `fn` declared inside an `unsafe fn` is not unsafe.
 *
 * It also collects out-of-line `mod name;` declarations and `include!`
 * invocations so the scanner can schedule the files they pull in.
 */

import { ParseError } from "../errors.js";
import { countInto, emptyCounters, type CounterBlock, type CounterCategory } from "../scan/counters.js";
import { Cursor } from "./cursor.js";
import { isGroup, isToken, tokenize, type Group, type TokenTree } from "./lexer.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** An out-of-line `mod name;` declaration. */
export interface ModuleDecl {
  name: string;
  /** Value of a `#[path = "..."]` attribute, if any. */
  pathAttr?: string;
  /** Enclosing inline modules, outermost first (directory segments). */
  inlinePath: string[];
  line: number;
}

/** An `include!` invocation. `path` is absent when it is not a plain string literal. */
export interface IncludeRef {
  path?: string;
  line: number;
}

export interface FileScan {
  counters: CounterBlock;
  forbidsUnsafe: boolean;
  modules: ModuleDecl[];
  includes: IncludeRef[];
}

export interface VisitOptions {
  /** Count `#[test]` functions and `#[cfg(test)]` modules. */
  includeTests: boolean;
}

interface Attribute {
  inner: boolean;
  path: string;
  args: TokenTree[];
}

type ItemContext = "module" | "impl" | "trait" | "block";

interface ExprContext {
  /** Struct literals are not allowed here (`if`/`while`/`match` heads). */
  noStruct?: boolean;
  /** Statement position: a block-like expression ends the statement. */
  stmt?: boolean;
}

// ---------------------------------------------------------------------------
// Operator tables
// ---------------------------------------------------------------------------

const ASSIGN_PREC = 1;
const RANGE_PREC = 2;
const LET_SCRUTINEE_PREC = 5;

const BINARY_PREC: Record<string, number> = {
  "=": ASSIGN_PREC, "+=": ASSIGN_PREC, "-=": ASSIGN_PREC, "*=": ASSIGN_PREC, "/=": ASSIGN_PREC,
  "%=": ASSIGN_PREC, "^=": ASSIGN_PREC, "&=": ASSIGN_PREC, "|=": ASSIGN_PREC,
  "<<=": ASSIGN_PREC, ">>=": ASSIGN_PREC,
  "..": RANGE_PREC, "..=": RANGE_PREC, "...": RANGE_PREC,
  "||": 3,
  "&&": 4,
  "==": 5, "!=": 5, "<": 5, ">": 5, "<=": 5, ">=": 5,
  "|": 6,
  "^": 7,
  "&": 8,
  "<<": 9, ">>": 9,
  "+": 10, "-": 10,
  "*": 11, "/": 11, "%": 11,
  as: 12,
};

const ITEM_KEYWORDS = new Set([
  "fn", "struct", "enum", "impl", "trait", "mod", "use", "static", "type", "extern", "pub",
]);

const INCLUDE_MACROS = new Set(["include", "std::include", "core::include"]);

// ---------------------------------------------------------------------------
// Attribute helpers
// ---------------------------------------------------------------------------

function mentionsIdent(trees: readonly TokenTree[], name: string): boolean {
  return trees.some((t) => (isGroup(t) ? mentionsIdent(t.trees, name) : t.kind === "ident" && t.text === name));
}

function parseAttribute(group: Group, inner: boolean): Attribute {
  const c = new Cursor(group.trees);
  const segments: string[] = [];
  for (;;) {
    const tok = c.token();
    if (tok?.kind === "ident") {
      segments.push(tok.text);
      c.next();
      if (c.eatOp("::")) continue;
    }
    break;
  }
  return { inner, path: segments.join("::"), args: group.trees.slice(c.pos) };
}

function isCfgTest(attrs: Attribute[]): boolean {
  return attrs.some((a) => {
    if (a.path !== "cfg") return false;
    const arg = a.args[0];
    return a.args.length === 1 && isGroup(arg) && arg.trees.length === 1
      && isToken(arg.trees[0]) && arg.trees[0].text === "test";
  });
}

function isTestFn(attrs: Attribute[]): boolean {
  return attrs.some((a) => a.path === "test" || a.path.endsWith("::test"));
}

function pathAttribute(attrs: Attribute[]): string | undefined {
  for (const a of attrs) {
    if (a.path !== "path") continue;
    const [eq, lit] = a.args;
    if (isToken(eq) && eq.text === "=" && isToken(lit) && lit.kind === "literal" && lit.value !== undefined) {
      return lit.value;
    }
  }
  return undefined;
}

function isForbidUnsafe(attr: Attribute): boolean {
  return attr.inner && attr.path === "forbid" && mentionsIdent(attr.args, "unsafe_code");
}

/**
 * Any attribute anywhere in the file that loosens `unsafe_code`
 * (`allow`, `warn`, `expect`, or a `cfg_attr` wrapping one of those).
 */
function hasUnsafeCodeOverride(trees: readonly TokenTree[]): boolean {
  for (let i = 0; i < trees.length; i++) {
    const t = trees[i];
    if (isGroup(t)) {
      if (hasUnsafeCodeOverride(t.trees)) return true;
      continue;
    }
    if (t.kind !== "punct" || t.text !== "#") continue;
    let k = i + 1;
    const bang = trees[k];
    if (isToken(bang) && bang.kind === "punct" && bang.text === "!") k++;
    const body = trees[k];
    if (!isGroup(body) || body.delimiter !== "[") continue;
    const attr = parseAttribute(body, k > i + 1);
    const loosening = ["allow", "warn", "expect"];
    if (loosening.includes(attr.path) && mentionsIdent(attr.args, "unsafe_code")) return true;
    if (
      attr.path === "cfg_attr"
      && mentionsIdent(attr.args, "unsafe_code")
      && loosening.some((l) => mentionsIdent(attr.args, l))
    ) {
      return true;
    }
  }
  return false;
}

/** Leading inner attributes of a file or block. */
function leadingInnerAttributes(c: Cursor): Attribute[] {
  const attrs: Attribute[] = [];
  while (c.isPunct("#") && c.isPunct("!", 1)) {
    const body = c.group("[", 2);
    if (!body) break;
    c.pos += 3;
    attrs.push(parseAttribute(body, true));
  }
  return attrs;
}

function fileForbidsUnsafe(trees: readonly TokenTree[]): boolean {
  const inner = leadingInnerAttributes(new Cursor(trees));
  return inner.some(isForbidUnsafe) && !hasUnsafeCodeOverride(trees);
}

function stripRaw(name: string): string {
  return name.startsWith("r#") ? name.slice(2) : name;
}

// ---------------------------------------------------------------------------
// Visitor
// ---------------------------------------------------------------------------

class UnsafeVisitor {
  readonly counters = emptyCounters();
  readonly modules: ModuleDecl[] = [];
  readonly includes: IncludeRef[] = [];

  private unsafeDepth = 0;
  /** > 0 while walking code excluded from counting (tests when not included). */
  private muted = 0;

  constructor(private readonly options: VisitOptions) {}

  private count(category: CounterCategory, forceUnsafe = false): void {
    if (this.muted > 0) return;
    countInto(this.counters, category, forceUnsafe || this.unsafeDepth > 0);
  }

  private withDepth(depth: number, fn: () => void): void {
    const saved = this.unsafeDepth;
    this.unsafeDepth = depth;
    try {
      fn();
    } finally {
      this.unsafeDepth = saved;
    }
  }

  // ─── Items ──────────────────────────────────────────────────────────

  visitFile(trees: readonly TokenTree[]): void {
    const c = new Cursor(trees);
    leadingInnerAttributes(c);
    this.visitItems(c, [], "module");
  }

  private parseAttributes(c: Cursor): Attribute[] {
    const attrs: Attribute[] = [];
    while (c.isPunct("#")) {
      const inner = c.isPunct("!", 1);
      const body = c.group("[", inner ? 2 : 1);
      if (!body) break;
      c.pos += inner ? 3 : 2;
      attrs.push(parseAttribute(body, inner));
    }
    return attrs;
  }

  private visitItems(c: Cursor, inlinePath: string[], ctx: ItemContext): void {
    while (!c.atEnd()) {
      if (c.eatPunct(";")) continue;
      const before = c.pos;
      const attrs = this.parseAttributes(c);
      if (c.atEnd()) break;
      this.visitItem(c, attrs, inlinePath, ctx);
      if (c.pos === before) c.next();
    }
  }

  private visitItem(c: Cursor, attrs: Attribute[], inlinePath: string[], ctx: ItemContext): void {
    const excluded = !this.options.includeTests && isCfgTest(attrs);
    if (excluded) this.muted++;
    try {
      this.visitItemBody(c, attrs, inlinePath, ctx);
    } finally {
      if (excluded) this.muted--;
    }
  }

  private visitItemBody(c: Cursor, attrs: Attribute[], inlinePath: string[], ctx: ItemContext): void {
    // Visibility
    if (c.eatIdent("pub") && c.group("(")) c.next();

    // Qualifiers
    let isUnsafe = false;
    for (;;) {
      if (c.eatIdent("unsafe")) {
        isUnsafe = true;
      } else if (c.isIdent("async") || c.isIdent("safe") || (c.isIdent("auto") && c.isIdent("trait", 1))) {
        c.next();
      } else if (c.isIdent("default") && c.isIdent(undefined, 1) && !c.isPunct("!", 1)) {
        c.next();
      } else if (c.isIdent("const") && ["fn", "unsafe", "async", "extern"].some((k) => c.isIdent(k, 1))) {
        c.next();
      } else if (c.isIdent("extern")) {
        if (c.isIdent("crate", 1)) {
          this.skipToSemicolon(c);
          return;
        }
        const abi = c.isLiteral(1) ? 2 : 1;
        if (c.group("{", abi)) {
          // Foreign block: declarations only.
          c.pos += abi + 1;
          return;
        }
        c.pos += abi;
      } else {
        break;
      }
    }

    const keyword = c.token();
    if (!keyword || keyword.kind !== "ident") {
      c.next();
      return;
    }

    switch (keyword.text) {
      case "fn":
        this.visitFn(c, attrs, isUnsafe, ctx);
        return;
      case "impl":
        this.visitImpl(c, isUnsafe, inlinePath);
        return;
      case "trait":
        this.visitTrait(c, isUnsafe, inlinePath);
        return;
      case "mod":
        this.visitMod(c, attrs, inlinePath);
        return;
      case "const":
      case "static":
        this.visitConstOrStatic(c);
        return;
      case "struct":
      case "enum":
        this.skipToBodyOrSemicolon(c);
        return;
      case "union":
        if (c.isIdent(undefined, 1)) {
          this.skipToBodyOrSemicolon(c);
          return;
        }
        break;
      case "type":
      case "use":
        this.skipToSemicolon(c);
        return;
      case "macro_rules":
        if (c.isPunct("!", 1)) {
          c.pos += 2;
          if (c.isIdent()) c.next();
          if (isGroup(c.peek())) c.next();
          c.eatPunct(";");
          return;
        }
        break;
    }

    if (this.tryItemMacro(c)) return;
    c.next();
  }

  private visitFn(c: Cursor, attrs: Attribute[], isUnsafe: boolean, ctx: ItemContext): void {
    const excluded = !this.options.includeTests && isTestFn(attrs);
    if (excluded) this.muted++;
    try {
      c.next(); // fn
      this.skipHeader(c, true);

      if (ctx === "impl") this.count("methods", isUnsafe);
      else if (ctx !== "trait") this.count("functions", isUnsafe);

      const body = c.group("{");
      if (!body) {
        c.eatPunct(";");
        return;
      }
      c.next();
      this.withDepth(this.unsafeDepth + (isUnsafe ? 1 : 0), () => this.visitBlock(body.trees));
    } finally {
      if (excluded) this.muted--;
    }
  }

  private visitImpl(c: Cursor, isUnsafe: boolean, inlinePath: string[]): void {
    c.next(); // impl
    this.count("itemImpls", isUnsafe);
    this.skipHeader(c, false);
    const body = c.group("{");
    if (!body) return;
    c.next();
    this.withDepth(isUnsafe ? 1 : 0, () => {
      const inner = new Cursor(body.trees);
      leadingInnerAttributes(inner);
      this.visitItems(inner, inlinePath, "impl");
    });
  }

  private visitTrait(c: Cursor, isUnsafe: boolean, inlinePath: string[]): void {
    c.next(); // trait
    this.count("itemTraits", isUnsafe);
    this.skipHeader(c, true);
    const body = c.group("{");
    if (!body) {
      c.eatPunct(";");
      return;
    }
    c.next();
    this.withDepth(isUnsafe ? 1 : 0, () => {
      const inner = new Cursor(body.trees);
      leadingInnerAttributes(inner);
      this.visitItems(inner, inlinePath, "trait");
    });
  }

  private visitMod(c: Cursor, attrs: Attribute[], inlinePath: string[]): void {
    const line = c.token()?.line ?? 0;
    c.next(); // mod
    const nameTok = c.token();
    if (!nameTok || nameTok.kind !== "ident") return;
    c.next();
    const name = stripRaw(nameTok.text);
    const pathAttr = pathAttribute(attrs);

    if (c.eatPunct(";")) {
      if (this.muted === 0) this.modules.push({ name, pathAttr, inlinePath, line });
      return;
    }

    const body = c.group("{");
    if (!body) return;
    c.next();
    this.withDepth(0, () => {
      const inner = new Cursor(body.trees);
      leadingInnerAttributes(inner);
      this.visitItems(inner, [...inlinePath, pathAttr ?? name], "module");
    });
  }

  private visitConstOrStatic(c: Cursor): void {
    c.next(); // const | static
    c.eatIdent("mut");
    while (!c.atEnd() && !c.isPunct(";")) {
      if (c.readOp() === "=") {
        c.next();
        this.visitExpr(c, {});
        break;
      }
      c.next();
    }
    c.eatPunct(";");
  }

  /** `path!(...)` / `path! { ... }` at item position. Not counted as an expression. */
  private tryItemMacro(c: Cursor): boolean {
    const start = c.pos;
    const path = this.readPath(c);
    if (path === undefined || !c.isPunct("!") || c.isOp("!=")) {
      c.pos = start;
      return false;
    }
    c.next(); // !
    if (c.isIdent()) c.next();
    const body = c.peek();
    if (!isGroup(body)) {
      c.pos = start;
      return false;
    }
    c.next();
    this.recordMacro(path, body);
    c.eatPunct(";");
    return true;
  }

  private recordMacro(path: string, body: Group): void {
    if (this.muted > 0 || !INCLUDE_MACROS.has(path)) return;
    const args = body.trees.filter((t) => !(isToken(t) && t.kind === "punct" && t.text === ","));
    const only = args[0];
    const line = body.line;
    if (args.length === 1 && isToken(only) && only.kind === "literal" && only.value !== undefined) {
      this.includes.push({ path: only.value, line });
    } else {
      this.includes.push({ line });
    }
  }

  private skipToSemicolon(c: Cursor): void {
    while (!c.atEnd() && !c.isPunct(";")) c.next();
    c.eatPunct(";");
  }

  private skipToBodyOrSemicolon(c: Cursor): void {
    this.skipHeader(c, true);
    if (c.group("{")) c.next();
    else c.eatPunct(";");
  }

  /**
   * Stop at the item's `{ }` body, or at `;` when `semicolonEnds`. Only
   * groups outside angle brackets qualify: in `Arr<{ N + 1 }>` the braces
   * are a const argument.
   */
  private skipHeader(c: Cursor, semicolonEnds: boolean): void {
    let depth = 0;
    while (!c.atEnd()) {
      if (c.isOp("->")) {
        c.pos += 2;
        continue;
      }
      if (depth === 0 && (c.group("{") || (semicolonEnds && c.isPunct(";")))) return;
      const tree = c.next();
      if (isToken(tree) && tree.kind === "punct") {
        if (tree.text === "<") depth++;
        else if (tree.text === ">" && depth > 0) depth--;
      }
    }
  }

  // ─── Statements ─────────────────────────────────────────────────────

  private startsItem(c: Cursor): boolean {
    const tok = c.token();
    if (!tok || tok.kind !== "ident") return false;
    const { text } = tok;
    if (ITEM_KEYWORDS.has(text)) return text !== "static" || !(c.isPunct("|", 1) || c.isIdent("move", 1));
    switch (text) {
      case "unsafe":
        return ["fn", "impl", "trait", "extern", "auto"].some((k) => c.isIdent(k, 1));
      case "async":
        return c.isIdent("fn", 1) || (c.isIdent("unsafe", 1) && c.isIdent("fn", 2));
      case "const":
        return !c.group("{", 1) && !c.isPunct("|", 1) && !c.isIdent("move", 1) && !c.isIdent("async", 1);
      case "union":
        return c.isIdent(undefined, 1);
      case "auto":
        return c.isIdent("trait", 1);
      case "macro_rules":
        return c.isPunct("!", 1);
      default:
        return false;
    }
  }

  private visitBlock(trees: readonly TokenTree[]): void {
    const c = new Cursor(trees);
    leadingInnerAttributes(c);
    while (!c.atEnd()) {
      if (c.eatPunct(";")) continue;
      const before = c.pos;
      const attrs = this.parseAttributes(c);
      if (c.atEnd()) break;

      if (this.startsItem(c)) {
        this.withDepth(0, () => this.visitItem(c, attrs, [], "block"));
      } else if (c.isIdent("let")) {
        this.visitLet(c);
      } else if (!this.tryStatementMacro(c)) {
        this.visitExpr(c, { stmt: true });
      }
      if (c.pos === before) c.next();
    }
  }

  private visitLet(c: Cursor): void {
    c.next(); // let
    if (this.skipPatternToAssign(c)) {
      c.next(); // =
      this.visitExpr(c, {});
      if (c.eatIdent("else")) {
        const block = c.group("{");
        if (block) {
          c.next();
          this.visitBlock(block.trees);
        }
      }
    }
    c.eatPunct(";");
  }

  /** Statement-position macro: `m!(..);`, `m! { .. }` or a trailing `m!(..)`. */
  private tryStatementMacro(c: Cursor): boolean {
    const start = c.pos;
    const path = this.readPath(c);
    if (path === undefined || !c.isPunct("!") || c.isOp("!=")) {
      c.pos = start;
      return false;
    }
    const body = c.peek(1);
    if (!isGroup(body)) {
      c.pos = start;
      return false;
    }
    const after = c.peek(2);
    const endsStatement = body.delimiter === "{" || after === undefined || (isToken(after) && after.text === ";");
    if (!endsStatement) {
      c.pos = start;
      return false;
    }
    c.pos += 2;
    this.recordMacro(path, body);
    c.eatPunct(";");
    return true;
  }

  // ─── Expressions ────────────────────────────────────────────────────

  private visitExpr(c: Cursor, ctx: ExprContext): void {
    this.visitBinary(c, 0, ctx);
  }

  private peekBinaryOp(c: Cursor): string | undefined {
    if (c.isIdent("as")) return "as";
    const op = c.readOp();
    return op !== undefined && op in BINARY_PREC ? op : undefined;
  }

  private visitBinary(c: Cursor, minPrec: number, ctx: ExprContext): void {
    const blockLike = this.visitUnary(c, ctx);
    if (ctx.stmt && blockLike) return;

    const inner: ExprContext = { noStruct: ctx.noStruct };
    for (;;) {
      const op = this.peekBinaryOp(c);
      if (op === undefined) break;
      const prec = BINARY_PREC[op];
      if (prec < minPrec) break;

      if (op === "as") {
        c.next();
        this.count("exprs");
        this.skipType(c, false);
        continue;
      }

      c.pos += op.length;
      this.count("exprs");
      if (prec === RANGE_PREC) {
        if (this.startsExpr(c, inner)) this.visitBinary(c, prec + 1, inner);
      } else {
        this.visitBinary(c, prec === ASSIGN_PREC ? prec : prec + 1, inner);
      }
    }
  }

  private startsExpr(c: Cursor, ctx: ExprContext): boolean {
    if (c.atEnd() || c.isPunct(";") || c.isPunct(",") || c.isOp("=>")) return false;
    if (ctx.noStruct && c.group("{")) return false;
    return true;
  }

  /** Returns true when the expression is block-like and nothing followed it. */
  private visitUnary(c: Cursor, ctx: ExprContext): boolean {
    const inner: ExprContext = { noStruct: ctx.noStruct };

    if (c.isPunct("-") || c.isPunct("*") || (c.isPunct("!") && !c.isOp("!="))) {
      c.next();
      this.count("exprs");
      this.visitUnary(c, inner);
      return false;
    }
    if (c.isPunct("&")) {
      const double = c.isOp("&&");
      c.pos += double ? 2 : 1;
      this.count("exprs");
      if (double) this.count("exprs");
      if (c.isIdent("raw") && (c.isIdent("const", 1) || c.isIdent("mut", 1))) c.pos += 2;
      else c.eatIdent("mut");
      this.visitUnary(c, inner);
      return false;
    }
    const range = c.readOp();
    if (range === ".." || range === "..=") {
      c.pos += range.length;
      this.count("exprs");
      if (this.startsExpr(c, inner)) this.visitBinary(c, RANGE_PREC + 1, inner);
      return false;
    }
    return this.visitPostfix(c, ctx);
  }

  private visitPostfix(c: Cursor, ctx: ExprContext): boolean {
    const blockLike = this.visitPrimary(c, ctx);
    let extended = false;

    for (;;) {
      if (c.isPunct("?")) {
        c.next();
        this.count("exprs");
      } else if (c.isPunct(".") && !c.isOp("..")) {
        c.next();
        if (c.eatIdent("await")) {
          this.count("exprs");
        } else if (c.isIdent() || c.isLiteral()) {
          c.next();
          if (c.isOp("::") && c.isPunct("<", 2)) {
            c.pos += 2;
            this.skipAngle(c);
          }
          const args = c.group("(");
          if (args) {
            c.next();
            this.count("exprs");
            this.visitExprList(args.trees);
          } else {
            this.count("exprs");
          }
        } else {
          break;
        }
      } else if (!(ctx.stmt && blockLike) && c.group("(")) {
        const args = c.group("(");
        c.next();
        this.count("exprs");
        if (args) this.visitExprList(args.trees);
      } else if (!(ctx.stmt && blockLike) && c.group("[")) {
        const index = c.group("[");
        c.next();
        this.count("exprs");
        if (index) this.visitExprList(index.trees);
      } else {
        break;
      }
      extended = true;
    }

    return blockLike && !extended;
  }

  private visitExprList(trees: readonly TokenTree[]): void {
    const c = new Cursor(trees);
    while (!c.atEnd()) {
      const before = c.pos;
      this.parseAttributes(c);
      if (c.atEnd()) break;
      this.visitExpr(c, {});
      if (!c.eatPunct(",") && !c.eatPunct(";") && c.pos === before) c.next();
    }
  }

  /** Returns true for block-like expressions (blocks, if, match, loops). */
  private visitPrimary(c: Cursor, ctx: ExprContext): boolean {
    const tree = c.peek();
    if (tree === undefined) return false;

    if (isGroup(tree)) {
      c.next();
      this.count("exprs");
      if (tree.delimiter === "{") {
        this.visitBlock(tree.trees);
        return true;
      }
      this.visitExprList(tree.trees);
      return false;
    }

    if (tree.kind === "literal") {
      c.next();
      return false;
    }

    if (tree.kind === "lifetime") {
      // Label: 'outer: loop { .. }
      c.next();
      if (c.isPunct(":") && !c.isOp("::")) {
        c.next();
        return this.visitPrimary(c, ctx);
      }
      return false;
    }

    if (tree.kind === "punct") {
      if (tree.text === "|") {
        this.visitClosure(c, ctx);
        return false;
      }
      if (tree.text === "#" && this.parseAttributes(c).length > 0) {
        return this.visitPrimary(c, ctx);
      }
      if (tree.text === "<" || c.isOp("::")) {
        return this.visitPathExpr(c, ctx);
      }
      c.next();
      return false;
    }

    switch (tree.text) {
      case "unsafe": {
        const block = c.group("{", 1);
        if (!block) break;
        c.pos += 2;
        this.withDepth(this.unsafeDepth + 1, () => this.visitBlock(block.trees));
        return true;
      }
      case "async":
      case "static":
      case "move": {
        if (tree.text === "async" && c.group("{", c.isIdent("move", 1) ? 2 : 1)) {
          c.pos += c.isIdent("move", 1) ? 1 : 0;
          const block = c.group("{", 1);
          c.pos += 2;
          this.count("exprs");
          if (block) this.visitBlock(block.trees);
          return true;
        }
        this.visitClosure(c, ctx);
        return false;
      }
      case "const": {
        const block = c.group("{", 1);
        if (!block) break;
        c.pos += 2;
        this.count("exprs");
        this.visitBlock(block.trees);
        return true;
      }
      case "loop": {
        c.next();
        this.count("exprs");
        this.visitTrailingBlock(c);
        return true;
      }
      case "while": {
        c.next();
        this.count("exprs");
        this.visitExpr(c, { noStruct: true });
        this.visitTrailingBlock(c);
        return true;
      }
      case "for": {
        c.next();
        this.count("exprs");
        while (!c.atEnd() && !c.isIdent("in")) c.next();
        c.eatIdent("in");
        this.visitExpr(c, { noStruct: true });
        this.visitTrailingBlock(c);
        return true;
      }
      case "if":
        this.visitIf(c);
        return true;
      case "match":
        this.visitMatch(c);
        return true;
      case "return":
      case "break":
      case "yield":
      case "become": {
        c.next();
        this.count("exprs");
        if (tree.text === "break" && c.token()?.kind === "lifetime") c.next();
        if (this.startsExpr(c, ctx)) this.visitExpr(c, { noStruct: ctx.noStruct });
        return false;
      }
      case "continue": {
        c.next();
        this.count("exprs");
        if (c.token()?.kind === "lifetime") c.next();
        return false;
      }
      case "let": {
        c.next();
        this.count("exprs");
        if (this.skipPatternToAssign(c)) {
          c.next();
          this.visitBinary(c, LET_SCRUTINEE_PREC, { noStruct: true });
        }
        return false;
      }
      case "true":
      case "false":
        c.next();
        return false;
    }

    return this.visitPathExpr(c, ctx);
  }

  private visitTrailingBlock(c: Cursor): void {
    const block = c.group("{");
    if (!block) return;
    c.next();
    this.visitBlock(block.trees);
  }

  private visitIf(c: Cursor): void {
    c.next(); // if
    this.count("exprs");
    this.visitExpr(c, { noStruct: true });
    this.visitTrailingBlock(c);
    if (!c.eatIdent("else")) return;
    if (c.isIdent("if")) {
      this.visitIf(c);
      return;
    }
    const block = c.group("{");
    if (!block) return;
    c.next();
    this.count("exprs");
    this.visitBlock(block.trees);
  }

  private visitMatch(c: Cursor): void {
    c.next(); // match
    this.count("exprs");
    this.visitExpr(c, { noStruct: true });
    const arms = c.group("{");
    if (!arms) return;
    c.next();

    const a = new Cursor(arms.trees);
    leadingInnerAttributes(a);
    while (!a.atEnd()) {
      const before = a.pos;
      this.parseAttributes(a);
      while (!a.atEnd() && !a.isOp("=>") && !a.isIdent("if")) {
        const op = a.readOp();
        a.pos += op !== undefined ? op.length : 1;
      }
      if (a.eatIdent("if")) this.visitExpr(a, {});
      if (a.eatOp("=>")) this.visitExpr(a, { stmt: true });
      a.eatPunct(",");
      if (a.pos === before) a.next();
    }
  }

  private visitClosure(c: Cursor, ctx: ExprContext): void {
    this.count("exprs");
    while (c.isIdent("static") || c.isIdent("async") || c.isIdent("move")) c.next();
    if (c.isOp("||")) {
      c.pos += 2;
    } else if (c.eatPunct("|")) {
      while (!c.atEnd() && !c.isPunct("|")) c.next();
      c.eatPunct("|");
    }
    if (c.eatOp("->")) this.skipType(c, false);
    this.visitExpr(c, { noStruct: ctx.noStruct });
  }

  /**
   * Paths are not counted themselves; a macro call, struct literal, or the
   * postfix operators applied afterwards are.
   */
  private visitPathExpr(c: Cursor, ctx: ExprContext): boolean {
    const start = c.pos;
    const path = this.readPath(c);
    if (path === undefined) {
      c.pos = start + 1;
      return false;
    }

    if (c.isPunct("!") && !c.isOp("!=")) {
      const body = c.peek(1);
      if (isGroup(body)) {
        c.pos += 2;
        this.count("exprs");
        this.recordMacro(path, body);
        return false;
      }
    }

    const fields = c.group("{");
    if (fields && !ctx.noStruct) {
      c.next();
      this.count("exprs");
      this.visitStructFields(fields.trees);
    }
    return false;
  }

  private visitStructFields(trees: readonly TokenTree[]): void {
    const c = new Cursor(trees);
    while (!c.atEnd()) {
      const before = c.pos;
      this.parseAttributes(c);
      if (c.eatOp("..")) {
        if (this.startsExpr(c, {})) this.visitExpr(c, {});
      } else {
        c.next(); // field name or index
        if (c.isPunct(":") && !c.isOp("::")) {
          c.next();
          this.visitExpr(c, {});
        }
      }
      c.eatPunct(",");
      if (c.pos === before) c.next();
    }
  }

  /**
   * Read `a::b::<T>::c`, `::a`, or `<T as Trait>::f`. Returns the path text
   * without generic arguments, or undefined if there is no path here.
   */
  private readPath(c: Cursor): string | undefined {
    const segments: string[] = [];
    if (c.isPunct("<")) {
      this.skipAngle(c);
      segments.push("<>");
    } else if (c.isIdent()) {
      segments.push(c.token()?.text ?? "");
      c.next();
    } else if (!c.isOp("::")) {
      return undefined;
    }

    while (c.isOp("::")) {
      c.pos += 2;
      if (c.isPunct("<")) {
        this.skipAngle(c);
      } else if (c.isIdent()) {
        segments.push(c.token()?.text ?? "");
        c.next();
      } else {
        break;
      }
    }
    return segments.join("::");
  }

  // ─── Types and patterns ─────────────────────────────────────────────

  /** Skip a balanced `<...>`; `->` inside does not close it. */
  private skipAngle(c: Cursor): void {
    let depth = 0;
    while (!c.atEnd()) {
      if (c.isOp("->")) {
        c.pos += 2;
        continue;
      }
      const tree = c.next();
      if (isToken(tree) && tree.kind === "punct") {
        if (tree.text === "<") depth++;
        else if (tree.text === ">") depth--;
      }
      if (depth <= 0) return;
    }
  }

  private skipType(c: Cursor, allowBounds: boolean): void {
    let bounds = allowBounds;
    for (;;) {
      if (c.isPunct("&") || c.isPunct("*") || c.token()?.kind === "lifetime") {
        c.next();
      } else if (c.isIdent("mut") || c.isIdent("const")) {
        c.next();
      } else if (c.isIdent("dyn") || c.isIdent("impl")) {
        c.next();
        bounds = true;
      } else {
        break;
      }
    }

    if (c.group("(") || c.group("[")) {
      c.next();
    } else if (c.isPunct("!")) {
      c.next();
    } else if (c.isIdent("fn") || c.isIdent("unsafe") || c.isIdent("extern")) {
      while (!c.atEnd() && !c.group("(")) c.next();
      c.next();
      if (c.eatOp("->")) this.skipType(c, false);
    } else if (this.readTypePath(c)) {
      if (c.group("(")) {
        c.next();
        if (c.eatOp("->")) this.skipType(c, false);
      }
    }

    if (bounds && c.isPunct("+")) {
      c.next();
      this.skipType(c, true);
    }
  }

  private readTypePath(c: Cursor): boolean {
    const start = c.pos;
    if (c.isPunct("<")) this.skipAngle(c);
    else if (c.isIdent()) c.next();
    else if (!c.isOp("::")) return false;

    for (;;) {
      if (c.isOp("::")) {
        c.pos += 2;
        continue;
      }
      if (c.isPunct("<") && !c.isOp("<=") && !c.isOp("<<")) {
        this.skipAngle(c);
        continue;
      }
      if (c.isIdent() && this.previousWasPathSep(c)) {
        c.next();
        continue;
      }
      break;
    }
    return c.pos > start;
  }

  private previousWasPathSep(c: Cursor): boolean {
    const prev = c.peek(-1);
    return isToken(prev) && prev.kind === "punct" && prev.text === ":";
  }

  /** Advance to a lone `=` (not `==`, `=>`, `<=` ...). False at `;` or end. */
  private skipPatternToAssign(c: Cursor): boolean {
    while (!c.atEnd() && !c.isPunct(";")) {
      const op = c.readOp();
      if (op === "=") return true;
      c.pos += op !== undefined ? op.length : 1;
    }
    return false;
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Lex and walk one source file.
 * Throws `ParseError` when the file cannot be tokenized.
 */
export function scanSource(source: string, path: string, options: VisitOptions): FileScan {
  const trees = tokenize(source, path);
  const visitor = new UnsafeVisitor(options);
  try {
    visitor.visitFile(trees);
  } catch (err) {
    if (err instanceof ParseError) throw err;
    throw new ParseError(path, err instanceof Error ? err.message : String(err));
  }
  return {
    counters: visitor.counters,
    forbidsUnsafe: fileForbidsUnsafe(trees),
    modules: visitor.modules,
    includes: visitor.includes,
  };
}

/** Only the crate-level `#![forbid(unsafe_code)]` check; nothing is counted. */
export function scanEntryPoint(source: string, path: string): boolean {
  return fileForbidsUnsafe(tokenize(source, path));
}
