import { describe, expect, it } from "vitest";
import { SimpleTokenizer } from "../simpleTokenizer.js";

describe("SimpleTokenizer", () => {
  const tokenizer = new SimpleTokenizer();

  it("lowercases, splits on non-word characters and drops stop words and single characters", () => {
    expect(tokenizer.tokenize("Hello, World! The cat's_toy is 2-fold")).toEqual([
      "hello",
      "world",
      "cat",
      "s_toy",
      "fold",
    ]);
  });

  it("preserves token order including repeats", () => {
    expect(tokenizer.tokenize("cat dog cat")).toEqual(["cat", "dog", "cat"]);
  });

  it("returns nothing for empty or all-stopword text", () => {
    expect(tokenizer.tokenize("")).toEqual([]);
    expect(tokenizer.tokenize("   \n\t ")).toEqual([]);
    expect(tokenizer.tokenize("the a an")).toEqual([]);
  });

  it("treats non-ASCII letters as separators", () => {
    expect(tokenizer.tokenize("café")).toEqual(["caf"]);
  });

  it("is idempotent when its output is re-joined", () => {
    const inputs = ["Node.js runs JavaScript on servers", "A_b c-d  E:F gh", "x y zz 42 007"];
    for (const text of inputs) {
      const once = tokenizer.tokenize(text);
      expect(tokenizer.tokenize(once.join(" "))).toEqual(once);
    }
  });

  it("accepts a custom stop word set", () => {
    const custom = new SimpleTokenizer(new Set(["hello"]));
    expect(custom.tokenize("hello the world")).toEqual(["the", "world"]);
  });
});
