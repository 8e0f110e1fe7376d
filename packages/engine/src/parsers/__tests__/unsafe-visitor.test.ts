import { describe, it, expect } from "vitest";
import { scanEntryPoint, scanSource } from "../unsafe-visitor.js";
import { ParseError } from "../../errors.js";

const opts = { includeTests: false };

function scan(source: string, includeTests = false) {
  return scanSource(source, "lib.rs", { includeTests });
}

describe("scanSource counters", () => {
  it("counts a plain function with no expressions", () => {
    const { counters } = scan("fn main() {\n    let x = 1;\n}\n");
    expect(counters.functions).toEqual({ safe: 1, unsafe: 0 });
    expect(counters.exprs).toEqual({ safe: 0, unsafe: 0 });
  });

  it("counts calls inside an unsafe block and an unsafe impl", () => {
    const { counters } = scan(`
struct Foo;
unsafe impl Send for Foo {}
fn f() {
    unsafe {
        a();
        b();
    }
}
`);
    expect(counters.exprs).toEqual({ safe: 0, unsafe: 2 });
    expect(counters.itemImpls).toEqual({ safe: 0, unsafe: 1 });
    expect(counters.functions).toEqual({ safe: 1, unsafe: 0 });
  });

  it("resets the unsafe scope for nested items", () => {
    const { counters } = scan(`
unsafe fn outer() {
    fn inner() {
        g();
    }
    h();
}
`);
    expect(counters.functions).toEqual({ safe: 1, unsafe: 1 });
    expect(counters.exprs).toEqual({ safe: 1, unsafe: 1 });
  });

  it("separates methods, impls and traits", () => {
    const { counters } = scan(`
trait Shape {
    fn area(&self) -> f64;
    fn name(&self) -> String { String::new() }
}
unsafe trait Raw {}
impl Shape for Circle {
    fn area(&self) -> f64 { 3.0 * self.r }
}
`);
    expect(counters.itemTraits).toEqual({ safe: 1, unsafe: 1 });
    expect(counters.itemImpls).toEqual({ safe: 1, unsafe: 0 });
    expect(counters.methods).toEqual({ safe: 1, unsafe: 0 });
    expect(counters.functions).toEqual({ safe: 0, unsafe: 0 });
    expect(counters.exprs).toEqual({ safe: 3, unsafe: 0 });
  });

  it("marks methods of an unsafe impl as unsafe", () => {
    const { counters } = scan(`
unsafe impl Alloc for Arena {
    fn alloc(&mut self) -> *mut u8 { self.next() }
}
`);
    expect(counters.methods).toEqual({ safe: 0, unsafe: 1 });
    expect(counters.exprs).toEqual({ safe: 0, unsafe: 1 });
  });

  it("finds the fn body past braced const arguments in the signature", () => {
    const { counters } = scan(`
fn f<const N: usize>() -> Arr<{ N + 1 }> { unsafe { g() } }
fn k<F>(f: F) -> u8 where F: Fn() -> Arr<{ 1 }> { unsafe { h() } }
`);
    expect(counters.functions).toEqual({ safe: 2, unsafe: 0 });
    expect(counters.exprs).toEqual({ safe: 0, unsafe: 2 });
  });

  it("finds the impl body past braced const arguments in the header", () => {
    const { counters } = scan(`
impl<const N: usize> Tr for Arr<{ N + 1 }> {
    unsafe fn m(&self) { unsafe { h() } }
}
`);
    expect(counters.itemImpls).toEqual({ safe: 1, unsafe: 0 });
    expect(counters.methods).toEqual({ safe: 0, unsafe: 1 });
    expect(counters.exprs).toEqual({ safe: 0, unsafe: 1 });
  });

  it("finds the trait body past braced const arguments in its bounds", () => {
    const { counters } = scan("trait Tr: Into<Arr<{ 3 }>> {\n    fn d(&self) { unsafe { q() } }\n}\n");
    expect(counters.itemTraits).toEqual({ safe: 1, unsafe: 0 });
    expect(counters.exprs).toEqual({ safe: 0, unsafe: 1 });
  });

  it("counts every expression node of an if/else", () => {
    const { counters } = scan(`
fn f(v: &[u8]) -> usize {
    let n = v.len();
    if n > 0 { n - 1 } else { 0 }
}
`);
    // method call, if, comparison, subtraction, else block
    expect(counters.exprs).toEqual({ safe: 5, unsafe: 0 });
  });

  it("counts expression macros but not statement macros", () => {
    const { counters } = scan(`
fn g() {
    println!("{}", 1);
    let s = format!("x");
    vec![1, 2]
}
`);
    expect(counters.exprs).toEqual({ safe: 1, unsafe: 0 });
  });

  it("counts closures and each reference operator", () => {
    const { counters } = scan("fn h() {\n    let f = |x| &&x;\n}\n");
    expect(counters.exprs).toEqual({ safe: 3, unsafe: 0 });
  });

  it("skips tests unless asked to include them", () => {
    const source = `
fn real() {}
#[test]
fn t() { unsafe { x(); } }
#[cfg(test)]
mod tests {
    fn helper() {}
}
`;
    const without = scan(source);
    expect(without.counters.functions).toEqual({ safe: 1, unsafe: 0 });
    expect(without.counters.exprs).toEqual({ safe: 0, unsafe: 0 });

    const withTests = scan(source, true);
    expect(withTests.counters.functions).toEqual({ safe: 3, unsafe: 0 });
    expect(withTests.counters.exprs).toEqual({ safe: 0, unsafe: 1 });
  });

  it("does not record modules declared inside excluded test code", () => {
    const { modules } = scan("#[cfg(test)]\nmod tests;\n");
    expect(modules).toEqual([]);
  });
});

describe("scanSource declarations", () => {
  it("collects out-of-line modules and include! invocations", () => {
    const { modules, includes } = scan(`mod a;
#[path = "other.rs"]
mod b;
mod inline {
    mod c;
}
include!("gen.rs");
include!(concat!(env!("OUT_DIR"), "/x.rs"));
`);
    expect(modules).toEqual([
      { name: "a", pathAttr: undefined, inlinePath: [], line: 1 },
      { name: "b", pathAttr: "other.rs", inlinePath: [], line: 3 },
      { name: "c", pathAttr: undefined, inlinePath: ["inline"], line: 5 },
    ]);
    expect(includes).toEqual([
      { path: "gen.rs", line: 7 },
      { line: 8 },
    ]);
  });

  it("strips the raw prefix from module names", () => {
    const { modules } = scan("mod r#match;\n");
    expect(modules.map((m) => m.name)).toEqual(["match"]);
  });
});

describe("forbid directive", () => {
  it("detects a crate-level forbid", () => {
    expect(scan("#![forbid(unsafe_code)]\nfn a() {}\n").forbidsUnsafe).toBe(true);
  });

  it("is false without the directive", () => {
    expect(scan("fn a() {}\n").forbidsUnsafe).toBe(false);
  });

  it("is cleared by a local allow anywhere in the file", () => {
    const source = "#![forbid(unsafe_code)]\nmod inner {\n    #[allow(unsafe_code)]\n    fn b() {}\n}\n";
    expect(scan(source).forbidsUnsafe).toBe(false);
  });

  it("is cleared by a cfg_attr that loosens the lint", () => {
    const source = "#![forbid(unsafe_code)]\n#![cfg_attr(feature = \"raw\", allow(unsafe_code))]\n";
    expect(scan(source).forbidsUnsafe).toBe(false);
  });

  it("ignores a forbid that is not a leading inner attribute", () => {
    expect(scan("fn a() {}\n#[forbid(unsafe_code)]\nfn b() {}\n").forbidsUnsafe).toBe(false);
  });

  it("is read the same way in entry-point mode", () => {
    expect(scanEntryPoint("#![forbid(unsafe_code)]\nmod a;\n", "lib.rs")).toBe(true);
    expect(scanEntryPoint("#![deny(unsafe_code)]\n", "lib.rs")).toBe(false);
  });
});

describe("scanSource errors", () => {
  it("throws ParseError for sources that do not lex", () => {
    expect(() => scanSource("fn broken( {", "bad.rs", opts)).toThrow(ParseError);
  });
});
