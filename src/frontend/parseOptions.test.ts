import * as path from "node:path";
import { parseInputs, parseSettingsOverrides } from "./parseOptions";

describe("command line option parsing", () => {
  describe("parseSettingsOverrides", () => {
    it("returns no overrides for no options", () => {
      expect(parseSettingsOverrides(undefined)).toEqual({});
      expect(parseSettingsOverrides({})).toEqual({});
    });

    it("maps flags to settings", () => {
      expect(parseSettingsOverrides({ preserveWhitespace: true, format: "json", logFile: "out.log" })).toEqual({
        preserveWhitespace: true,
        format: "json",
        logFile: "out.log",
      });
    });

    it("throws for an unknown format", () => {
      expect(() => parseSettingsOverrides({ format: "yaml" })).toThrow("Invalid format: yaml");
    });
  });

  describe("parseInputs", () => {
    it("turns files into file inputs", () => {
      expect(parseInputs(["a.css", "b.js"])).toEqual([
        { kind: "file", path: path.resolve("a.css") },
        { kind: "file", path: path.resolve("b.js") },
      ]);
    });

    it("turns --text into a single text input", () => {
      expect(parseInputs([], { text: "// hi" })).toEqual([{ kind: "text", text: "// hi", label: undefined }]);
    });

    it("accepts empty --text", () => {
      expect(parseInputs([], { text: "" })).toHaveLength(1);
    });

    it("throws when both files and --text are given", () => {
      expect(() => parseInputs(["a.css"], { text: "// hi" })).toThrow("either files or --text");
    });

    it("throws when there is no input at all", () => {
      expect(() => parseInputs([])).toThrow("No input files given");
    });
  });
});
