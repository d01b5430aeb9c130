import { SettingsOverrides } from "../backend/configLoader";
import { isOutputFormat, kOutputFormats } from "../backend/configTypes";
import { CommentInput, fileInput, textInput } from "../backend/inputSource";

export interface CommandLineOptions {
  text?: string;
  preserveWhitespace?: boolean;
  format?: string;
  out?: string;
  config?: string;
  logFile?: string;
  verbose?: boolean;
}

export function parseSettingsOverrides(cmd?: CommandLineOptions | undefined): SettingsOverrides {
  const overrides: SettingsOverrides = {};
  if (cmd?.preserveWhitespace) {
    overrides.preserveWhitespace = true;
  }
  if (cmd?.format !== undefined) {
    if (!isOutputFormat(cmd.format)) {
      throw new Error(`Invalid format: ${cmd.format} (expected ${kOutputFormats.join(" or ")})`);
    }
    overrides.format = cmd.format;
  }
  if (cmd?.logFile) {
    overrides.logFile = cmd.logFile;
  }
  return overrides;
}

// --text takes the place of files; giving both is an error rather than a guess.
export function parseInputs(files: string[], cmd?: CommandLineOptions | undefined): CommentInput[] {
  if (cmd?.text !== undefined) {
    if (files.length > 0) {
      throw new Error("Pass either files or --text, not both");
    }
    return [textInput(cmd.text)];
  }
  if (files.length === 0) {
    throw new Error("No input files given (pass files or --text <text>)");
  }
  return files.map((file) => fileInput(file));
}
