// {{VARIABLE_NAME}} gets replaced with the string value; used for the help text.

import * as fs from "node:fs";
import * as path from "node:path";

export function applyTemplateVariables(template: string, variables: Record<string, string>): string {
  let output = template;
  for (const [key, value] of Object.entries(variables)) {
    output = output.split(`{{${key}}}`).join(value);
  }
  return output;
}

// The directory holding package.json, found by walking up from this file. Works from src/ under
// ts-jest as well as from the compiled dist/ tree.
export function getPackageRootDir(startDir: string = __dirname): string {
  let dir = startDir;
  for (;;) {
    if (fs.existsSync(path.join(dir, "package.json"))) {
      return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      throw new Error(`package.json not found above ${startDir}`);
    }
    dir = parent;
  }
}

export function getTemplatesRootDir(): string {
  return path.join(getPackageRootDir(), "templates");
}
