import { helpTopicForCommand, renderHelp } from "./help";
import { applyTemplateVariables } from "./templates";
import { getVersionTag } from "./versionString";

describe("help", () => {
  it("substitutes every occurrence of a template variable", () => {
    expect(applyTemplateVariables("{{A}} and {{A}} but not {{B}}", { A: "x" })).toBe("x and x but not {{B}}");
  });

  it("maps commands and aliases to help topics", () => {
    expect(helpTopicForCommand("extract")).toBe("extract");
    expect(helpTopicForCommand("x")).toBe("extract");
    expect(helpTopicForCommand("w")).toBe("watch");
    expect(helpTopicForCommand("nope")).toBeUndefined();
  });

  it("renders the main help with the env variable name filled in", () => {
    const help = renderHelp("main");
    expect(help).toContain("COMMENTBLOCKS_PRESERVE_WHITESPACE=true|false");
    expect(help).not.toContain("{{");
  });

  it("formats version tags", () => {
    expect(getVersionTag({ name: "commentblocks", version: "1.2.0" })).toBe("v1.2.0");
    expect(getVersionTag({ name: "commentblocks", version: null })).toBe("unknown");
  });
});
