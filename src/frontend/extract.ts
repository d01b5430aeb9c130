import { writeFileSync } from "node:fs";
import * as path from "node:path";
import { CommentParser } from "../backend/commentParser";
import { loadEnvironmentFiles, resolveSettings } from "../backend/configLoader";
import { CommentBlocksSettings } from "../backend/configTypes";
import { CommentInput } from "../backend/inputSource";
import * as cons from "../utils/console";
import { ensureDir, writeTextFile } from "../utils/fileSystem";
import { CommandLineOptions, parseInputs, parseSettingsOverrides } from "./parseOptions";

export interface ExtractedSource {
  source: string;
  blocks: readonly string[];
}

export function loadSettings(options?: CommandLineOptions): CommentBlocksSettings {
  const cwd = process.cwd();
  loadEnvironmentFiles(cwd);
  return resolveSettings({
    cwd,
    configPath: options?.config,
    env: process.env,
    overrides: parseSettingsOverrides(options),
  });
}

// Starts the log file from scratch for each run.
export function setUpLogFile(settings: CommentBlocksSettings): void {
  if (settings.logFile) {
    ensureDir(path.dirname(settings.logFile));
    writeFileSync(settings.logFile, "", "utf-8");
  }
  cons.setLogFile(settings.logFile);
}

export function extractBlocks(inputs: CommentInput[], settings: CommentBlocksSettings): ExtractedSource[] {
  return inputs.map((input) => {
    const parser = new CommentParser(input, { preserveWhitespace: settings.preserveWhitespace });
    const blocks = parser.blocks;
    cons.dim(`  ${parser.sourceName}: ${blocks.length} block(s)`);
    return { source: parser.sourceName, blocks };
  });
}

// Text output is every block of every source, in order, joined by the separator. JSON keeps
// blocks grouped by source.
export function formatExtraction(results: ExtractedSource[], settings: CommentBlocksSettings): string {
  if (settings.format === "json") {
    return `${JSON.stringify(results, null, 2)}\n`;
  }
  const allBlocks = results.flatMap((result) => result.blocks);
  if (allBlocks.length === 0) {
    return "";
  }
  return `${allBlocks.join(settings.separator)}\n`;
}

export async function writeExtraction(output: string, outPath: string | undefined): Promise<void> {
  if (outPath) {
    const absoluteOutPath = path.resolve(outPath);
    await writeTextFile(absoluteOutPath, output, "utf-8");
    cons.success(`Wrote ${absoluteOutPath}`);
    return;
  }
  process.stdout.write(output);
}

export async function extractCore(
  inputs: CommentInput[],
  settings: CommentBlocksSettings,
  outPath?: string,
): Promise<ExtractedSource[]> {
  const startTime = Date.now();
  const results = extractBlocks(inputs, settings);
  await writeExtraction(formatExtraction(results, settings), outPath);

  const blockCount = results.reduce((count, result) => count + result.blocks.length, 0);
  cons.dim(`Extracted ${blockCount} block(s) from ${results.length} source(s) in ${Date.now() - startTime}ms`);
  return results;
}

export async function extractCommand(files: string[], options?: CommandLineOptions): Promise<void> {
  cons.setVerbose(options?.verbose ?? false);
  const settings = loadSettings(options);
  setUpLogFile(settings);
  if (settings.configPath) {
    cons.dim(`Using config: ${settings.configPath}`);
  }

  const inputs = parseInputs(files, options);
  await extractCore(inputs, settings, options?.out);
}
