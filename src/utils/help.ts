import * as fs from "node:fs";
import * as path from "node:path";
import { kPreserveWhitespaceEnvVar } from "../backend/configLoader";
import { applyTemplateVariables, getTemplatesRootDir } from "./templates";
import { getAppVersionString } from "./versionString";

export type HelpTopic = "main" | "extract" | "watch";

function loadHelpTemplate(topic: HelpTopic): string {
  const templatePath = path.join(getTemplatesRootDir(), "help", `${topic}.txt`);
  if (!fs.existsSync(templatePath)) {
    throw new Error(`Help template not found: ${templatePath}`);
  }
  return fs.readFileSync(templatePath, "utf-8");
}

export function renderHelp(topic: HelpTopic): string {
  const template = loadHelpTemplate(topic);
  const variables: Record<string, string> = {
    VERSION: getAppVersionString(),
    ENV_PRESERVE_WHITESPACE: kPreserveWhitespaceEnvVar,
  };
  return applyTemplateVariables(template, variables);
}

export function printHelp(topic: HelpTopic): void {
  process.stdout.write(renderHelp(topic));
}

// Maps a command name or alias to its help topic.
export function helpTopicForCommand(command: string): HelpTopic | undefined {
  switch (command) {
    case "extract":
    case "x":
      return "extract";
    case "watch":
    case "w":
      return "watch";
    case "help":
      return "main";
    default:
      return undefined;
  }
}
