import { CommentBlocksSettings, kDefaultSettings } from "../backend/configTypes";
import { textInput } from "../backend/inputSource";
import { extractBlocks, extractCore, formatExtraction } from "./extract";

function makeSettings(overrides: Partial<CommentBlocksSettings> = {}): CommentBlocksSettings {
  return { ...kDefaultSettings, ...overrides };
}

describe("extract", () => {
  const source = ["// Buttons", "// ------", ".button {}", "", "/*", "  Links", "*/", "a {}", ""].join("\n");

  describe("extractBlocks", () => {
    it("collects blocks per source", () => {
      const results = extractBlocks([textInput(source, "buttons.css")], makeSettings());
      expect(results).toEqual([{ source: "buttons.css", blocks: ["Buttons\n------", "Links"] }]);
    });

    it("honours preserveWhitespace", () => {
      const results = extractBlocks([textInput("//   keep\n")], makeSettings({ preserveWhitespace: true }));
      expect(results[0].blocks).toEqual(["   keep"]);
    });
  });

  describe("formatExtraction", () => {
    const results = [
      { source: "a.css", blocks: ["one", "two"] },
      { source: "b.css", blocks: ["three"] },
    ];

    it("joins all blocks with the separator in text format", () => {
      expect(formatExtraction(results, makeSettings())).toBe("one\n\ntwo\n\nthree\n");
      expect(formatExtraction(results, makeSettings({ separator: "\n---\n" }))).toBe("one\n---\ntwo\n---\nthree\n");
    });

    it("prints nothing in text format when there are no blocks", () => {
      expect(formatExtraction([{ source: "empty.css", blocks: [] }], makeSettings())).toBe("");
    });

    it("keeps blocks grouped by source in json format", () => {
      const output = formatExtraction(results, makeSettings({ format: "json" }));
      expect(JSON.parse(output)).toEqual(results);
      expect(output.endsWith("\n")).toBe(true);
    });
  });

  describe("extractCore", () => {
    it("writes the formatted blocks to stdout", async () => {
      const writeSpy = jest.spyOn(process.stdout, "write").mockImplementation(() => true);
      try {
        const results = await extractCore([textInput("// hello\n")], makeSettings());
        expect(results).toEqual([{ source: "<text>", blocks: ["hello"] }]);
        expect(writeSpy).toHaveBeenCalledWith("hello\n");
      } finally {
        writeSpy.mockRestore();
      }
    });
  });
});
