import { isGroup, isToken, type Delimiter, type Group, type Token, type TokenTree } from "./lexer.js";

/** Multi-character operators, longest first. */
const OPERATORS = [
  "<<=", ">>=", "...", "..=",
  "::", "->", "=>", "==", "!=", "<=", ">=", "&&", "||",
  "+=", "-=", "*=", "/=", "%=", "^=", "&=", "|=", "<<", ">>", "..",
];

/** Position within one level of a token-tree forest. */
export class Cursor {
  pos = 0;

  constructor(readonly trees: readonly TokenTree[]) {}

  atEnd(): boolean {
    return this.pos >= this.trees.length;
  }

  peek(offset = 0): TokenTree | undefined {
    return this.trees[this.pos + offset];
  }

  next(): TokenTree | undefined {
    const tree = this.trees[this.pos];
    if (tree !== undefined) this.pos++;
    return tree;
  }

  token(offset = 0): Token | undefined {
    const tree = this.peek(offset);
    return isToken(tree) ? tree : undefined;
  }

  group(delimiter: Delimiter, offset = 0): Group | undefined {
    const tree = this.peek(offset);
    return isGroup(tree) && tree.delimiter === delimiter ? tree : undefined;
  }

  isIdent(text?: string, offset = 0): boolean {
    const tok = this.token(offset);
    return tok !== undefined && tok.kind === "ident" && (text === undefined || tok.text === text);
  }

  isPunct(ch: string, offset = 0): boolean {
    const tok = this.token(offset);
    return tok !== undefined && tok.kind === "punct" && tok.text === ch;
  }

  isLiteral(offset = 0): boolean {
    return this.token(offset)?.kind === "literal";
  }

  /** True when the joint punctuation at the cursor spells exactly `op`. */
  isOp(op: string, offset = 0): boolean {
    for (let k = 0; k < op.length; k++) {
      const tok = this.token(offset + k);
      if (!tok || tok.kind !== "punct" || tok.text !== op[k]) return false;
      if (k < op.length - 1 && !tok.joint) return false;
    }
    return true;
  }

  /** Longest operator at the cursor, or the single punctuation character. */
  readOp(offset = 0): string | undefined {
    const first = this.token(offset);
    if (!first || first.kind !== "punct") return undefined;
    for (const op of OPERATORS) {
      if (this.isOp(op, offset)) return op;
    }
    return first.text;
  }

  eatIdent(text: string): boolean {
    if (!this.isIdent(text)) return false;
    this.pos++;
    return true;
  }

  eatPunct(ch: string): boolean {
    if (!this.isPunct(ch)) return false;
    this.pos++;
    return true;
  }

  eatOp(op: string): boolean {
    if (!this.isOp(op)) return false;
    this.pos += op.length;
    return true;
  }
}
