/**
 * Rust lexer producing token trees.
 *
 * Comments (doc comments included) are dropped. Delimited groups are nested,
 * so later passes can skip a balanced `(...)`, `[...]` or `{...}` in one step.
 * Punctuation is emitted one character at a time with a `joint` flag, the
 * way proc-macro token streams are, so `>>` can close two generic lists.
 */

import { ParseError } from "../errors.js";

export type TokenKind = "ident" | "lifetime" | "literal" | "punct";
export type Delimiter = "(" | "[" | "{";

export interface Token {
  kind: TokenKind;
  text: string;
  line: number;
  col: number;
  /** Punctuation immediately followed by more punctuation. */
  joint: boolean;
  /** Decoded value of a string literal. */
  value?: string;
}

export interface Group {
  kind: "group";
  delimiter: Delimiter;
  trees: TokenTree[];
  line: number;
  col: number;
}

export type TokenTree = Token | Group;

const PUNCT = new Set("+-*/%^!&|=<>@.,;:#$?~");
const CLOSERS: Record<string, Delimiter> = { ")": "(", "]": "[", "}": "{" };
const IDENT_START = /[\p{XID_Start}_]/u;
const IDENT_CONTINUE = /\p{XID_Continue}/u;

const ESCAPES: Record<string, string> = { n: "\n", r: "\r", t: "\t", "0": "\0", "\\": "\\", '"': '"', "'": "'" };

function decodeEscapes(body: string): string {
  return body.replace(/\\(\r?\n\s*|u\{([0-9a-fA-F_]+)\}|x([0-9a-fA-F]{2})|.)/g, (_m, esc: string, uni?: string, hex?: string) => {
    if (uni !== undefined) return String.fromCodePoint(parseInt(uni.replace(/_/g, ""), 16));
    if (hex !== undefined) return String.fromCharCode(parseInt(hex, 16));
    if (esc.startsWith("\n") || esc.startsWith("\r")) return "";
    return ESCAPES[esc] ?? esc;
  });
}

export function isGroup(tree: TokenTree | undefined): tree is Group {
  return tree !== undefined && tree.kind === "group";
}

export function isToken(tree: TokenTree | undefined): tree is Token {
  return tree !== undefined && tree.kind !== "group";
}

/**
 * Tokenize `source` into a forest of token trees.
 * Throws `ParseError` on unterminated literals/comments and unbalanced delimiters.
 */
export function tokenize(source: string, path: string): TokenTree[] {
  let src = source.startsWith("﻿") ? source.slice(1) : source;
  let i = 0;
  let line = 1;
  let lineStart = 0;

  // Shebang line, but not an inner attribute like `#![forbid(..)]`.
  if (src.startsWith("#!") && !/^#!\s*\[/.test(src)) {
    const nl = src.indexOf("\n");
    src = nl < 0 ? "" : " ".repeat(nl) + src.slice(nl);
  }

  const root: TokenTree[] = [];
  const stack: Group[] = [];
  const current = (): TokenTree[] => (stack.length > 0 ? stack[stack.length - 1].trees : root);

  const fail = (msg: string, at = i): ParseError => {
    const before = src.slice(0, at);
    const l = before.split("\n").length;
    const c = at - (before.lastIndexOf("\n") + 1) + 1;
    return new ParseError(path, msg, l, c);
  };

  /** Advance over src[from, to), tracking line numbers. */
  const advanceTo = (to: number): void => {
    for (let k = i; k < to; k++) {
      if (src[k] === "\n") {
        line++;
        lineStart = k + 1;
      }
    }
    i = to;
  };

  const push = (kind: TokenKind, start: number, text: string, value?: string): void => {
    const tok: Token = { kind, text, line, col: start - lineStart + 1, joint: false };
    if (value !== undefined) tok.value = value;
    current().push(tok);
  };

  /** End index (exclusive) of a quoted literal whose opening quote is at `open`. */
  const scanQuoted = (open: number, quote: string): number => {
    let k = open + 1;
    while (k < src.length) {
      const ch = src[k];
      if (ch === "\\") {
        k += 2;
        continue;
      }
      if (ch === quote) return k + 1;
      k++;
    }
    throw fail("unterminated literal", open);
  };

  /** End index of a raw string `r#*"..."#*` whose `r` is at `start`. */
  const scanRaw = (start: number): number => {
    let k = start + 1;
    let hashes = 0;
    while (src[k] === "#") {
      hashes++;
      k++;
    }
    if (src[k] !== '"') throw fail("malformed raw string", start);
    const closing = '"' + "#".repeat(hashes);
    const end = src.indexOf(closing, k + 1);
    if (end < 0) throw fail("unterminated raw string", start);
    return end + closing.length;
  };

  const literalSuffix = (k: number): number => {
    if (k < src.length && IDENT_START.test(src[k])) {
      k++;
      while (k < src.length && IDENT_CONTINUE.test(src[k])) k++;
    }
    return k;
  };

  while (i < src.length) {
    const ch = src[i];
    const next = src[i + 1];

    // Whitespace
    if (/\s/.test(ch)) {
      advanceTo(i + 1);
      continue;
    }

    // Comments
    if (ch === "/" && next === "/") {
      const nl = src.indexOf("\n", i);
      advanceTo(nl < 0 ? src.length : nl);
      continue;
    }
    if (ch === "/" && next === "*") {
      let depth = 1;
      let k = i + 2;
      while (k < src.length && depth > 0) {
        if (src[k] === "/" && src[k + 1] === "*") {
          depth++;
          k += 2;
        } else if (src[k] === "*" && src[k + 1] === "/") {
          depth--;
          k += 2;
        } else {
          k++;
        }
      }
      if (depth > 0) throw fail("unterminated block comment");
      advanceTo(k);
      continue;
    }

    // Delimiters
    if (ch === "(" || ch === "[" || ch === "{") {
      const group: Group = { kind: "group", delimiter: ch, trees: [], line, col: i - lineStart + 1 };
      current().push(group);
      stack.push(group);
      advanceTo(i + 1);
      continue;
    }
    if (ch === ")" || ch === "]" || ch === "}") {
      const open = stack.pop();
      if (!open) throw fail(`unexpected closing delimiter '${ch}'`);
      if (open.delimiter !== CLOSERS[ch]) {
        throw fail(`mismatched closing delimiter '${ch}' for '${open.delimiter}' opened at line ${open.line}`);
      }
      advanceTo(i + 1);
      continue;
    }

    // Prefixed literals: b"..", b'..', br"..", r"..", r#"..", c"..", cr".."
    const prefixed = /^(br|cr|b|c|r)(?=["#'])/.exec(src.slice(i, i + 3));
    if (prefixed) {
      const prefix = prefixed[1];
      const after = i + prefix.length;
      if (prefix.endsWith("r") && (src[after] === '"' || (src[after] === "#" && /^#+"/.test(src.slice(after))))) {
        const end = literalSuffix(scanRaw(after - 1));
        const text = src.slice(i, end);
        const body = text.replace(/^[a-z]*r(#*)"([\s\S]*)"\1[\s\S]*$/, "$2");
        push("literal", i, text, body);
        advanceTo(end);
        continue;
      }
      if (prefix !== "r" && prefix !== "br" && prefix !== "cr" && (src[after] === '"' || (prefix === "b" && src[after] === "'"))) {
        const quote = src[after];
        const end = literalSuffix(scanQuoted(after, quote));
        const text = src.slice(i, end);
        push("literal", i, text, decodeEscapes(text.slice(after - i + 1, text.lastIndexOf(quote))));
        advanceTo(end);
        continue;
      }
      // Otherwise an ordinary identifier such as `r#type` or `b`.
    }

    // Raw identifier
    if (ch === "r" && next === "#" && i + 2 < src.length && IDENT_START.test(src[i + 2])) {
      let k = i + 3;
      while (k < src.length && IDENT_CONTINUE.test(src[k])) k++;
      push("ident", i, src.slice(i, k));
      advanceTo(k);
      continue;
    }

    // Identifiers and keywords
    if (IDENT_START.test(ch)) {
      let k = i + 1;
      while (k < src.length && IDENT_CONTINUE.test(src[k])) k++;
      push("ident", i, src.slice(i, k));
      advanceTo(k);
      continue;
    }

    // Strings
    if (ch === '"') {
      const close = scanQuoted(i, '"');
      const end = literalSuffix(close);
      push("literal", i, src.slice(i, end), decodeEscapes(src.slice(i + 1, close - 1)));
      advanceTo(end);
      continue;
    }

    // Char literal or lifetime
    if (ch === "'") {
      const cp = src.codePointAt(i + 1);
      const width = cp !== undefined && cp > 0xffff ? 2 : 1;
      if (next === "\\" || src[i + 1 + width] === "'") {
        const end = literalSuffix(scanQuoted(i, "'"));
        push("literal", i, src.slice(i, end));
        advanceTo(end);
        continue;
      }
      if (next !== undefined && IDENT_START.test(next)) {
        let k = i + 2;
        while (k < src.length && IDENT_CONTINUE.test(src[k])) k++;
        push("lifetime", i, src.slice(i, k));
        advanceTo(k);
        continue;
      }
      throw fail("unterminated character literal");
    }

    // Numbers
    if (/[0-9]/.test(ch)) {
      const isHexLike = /^0[xob]/i.test(src.slice(i, i + 2));
      let k = i + 1;
      const consumeDigits = (): void => {
        while (k < src.length) {
          if (/[0-9A-Za-z_]/.test(src[k])) {
            const isExp = !isHexLike && (src[k] === "e" || src[k] === "E");
            k++;
            if (isExp && (src[k] === "+" || src[k] === "-") && /[0-9]/.test(src[k + 1] ?? "")) k++;
          } else {
            break;
          }
        }
      };
      consumeDigits();
      if (!isHexLike && src[k] === "." && src[k + 1] !== "." && !IDENT_START.test(src[k + 1] ?? "")) {
        k++;
        consumeDigits();
      }
      push("literal", i, src.slice(i, k));
      advanceTo(k);
      continue;
    }

    // Punctuation
    if (PUNCT.has(ch)) {
      push("punct", i, ch);
      const list = current();
      const tok = list[list.length - 1];
      if (isToken(tok)) tok.joint = next !== undefined && PUNCT.has(next);
      advanceTo(i + 1);
      continue;
    }

    throw fail(`unexpected character '${ch}'`);
  }

  const unclosed = stack.pop();
  if (unclosed) {
    throw new ParseError(path, `unclosed delimiter '${unclosed.delimiter}'`, unclosed.line, unclosed.col);
  }
  return root;
}
