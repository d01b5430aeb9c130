import { normalizeBlock } from "./blockNormalizer";

describe("Block normalizer", () => {
  it("should remove the indentation shared with the first line", () => {
    expect(normalizeBlock("    foo\n    bar")).toBe("foo\nbar");
  });

  it("should leave text untouched when preserving whitespace", () => {
    expect(normalizeBlock("    foo\n    bar", { preserveWhitespace: true })).toBe("    foo\n    bar");
    expect(normalizeBlock(" * starred\n", { preserveWhitespace: true })).toBe(" * starred\n");
  });

  it("should leave lines indented less than the first line as they are", () => {
    expect(normalizeBlock("    deep\n  shallow\n    deep again")).toBe("deep\n  shallow\ndeep again");
  });

  it("should keep empty lines inside the block", () => {
    expect(normalizeBlock("  a\n\n  b")).toBe("a\n\nb");
  });

  it("should strip leading continuation markers", () => {
    expect(normalizeBlock(" * one\n * two")).toBe("one\ntwo");
    expect(normalizeBlock("** bold start")).toBe("bold start");
  });

  it("should drop a blank line that sits right before a starred line", () => {
    expect(normalizeBlock("a\n\n * b")).toBe("a\n b");
  });

  it("should measure the reference indent on the first line only", () => {
    // the opener line of a doc comment strips to "" so nothing is unindented
    const raw = "*\n * Summary.\n *\n * Details here.\n";
    expect(normalizeBlock(raw)).toBe("Summary.\n\n Details here.");
  });

  it("should trim the whole block", () => {
    expect(normalizeBlock("\n\n  text  \n\n")).toBe("text");
  });

  it("should return an empty string for an empty block", () => {
    expect(normalizeBlock("")).toBe("");
  });
});
