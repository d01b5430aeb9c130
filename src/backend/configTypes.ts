export type OutputFormat = "text" | "json";

export const kOutputFormats: readonly OutputFormat[] = ["text", "json"];

// Shape of a commentblocks.jsonc file, as validated by commentblocks.schema.json.
export interface CommentBlocksConfigFile {
  $schema?: string;
  preserveWhitespace?: boolean;
  format?: OutputFormat;
  separator?: string;
  logFile?: string;
}

// Fully resolved settings for one run.
export interface CommentBlocksSettings {
  preserveWhitespace: boolean;
  format: OutputFormat;
  separator: string;
  // absolute, or null for no log file
  logFile: string | null;
  // where the settings file came from, if any
  configPath: string | null;
}

export const kDefaultSettings: CommentBlocksSettings = {
  preserveWhitespace: false,
  format: "text",
  separator: "\n\n",
  logFile: null,
  configPath: null,
};

export function isOutputFormat(value: string): value is OutputFormat {
  return kOutputFormats.some((format) => format === value);
}
