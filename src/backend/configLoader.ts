import Ajv from "ajv";
import { config as loadDotenv } from "dotenv";
import * as fs from "fs";
import { parse as parseJsonc, ParseError, printParseErrorCode } from "jsonc-parser";
import * as path from "path";

import configSchema from "../../commentblocks.schema.json";

import { CommentBlocksConfigFile, CommentBlocksSettings, kDefaultSettings, OutputFormat } from "./configTypes";
import * as cons from "../utils/console";
import { canonicalizePath, isDirectory, resolvePath } from "../utils/fileSystem";
import { parseBooleanFlag } from "../utils/errorHandling";

export const kPreserveWhitespaceEnvVar = "COMMENTBLOCKS_PRESERVE_WHITESPACE";

export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public errors: unknown[],
  ) {
    super(message);
    this.name = "ConfigValidationError";
  }
}

export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public cause?: Error,
  ) {
    super(message);
    this.name = "ConfigLoadError";
  }
}

export interface LoadedConfig {
  config: CommentBlocksConfigFile;
  filePath: string;
}

// Settings given on the command line; these win over everything else.
export interface SettingsOverrides {
  preserveWhitespace?: boolean;
  format?: OutputFormat;
  logFile?: string;
}

function isConfigFileName(fileName: string): boolean {
  return (
    fileName === "commentblocks.jsonc" ||
    fileName === "commentblocks.json" ||
    fileName.endsWith(".commentblocks.jsonc") ||
    fileName.endsWith(".commentblocks.json")
  );
}

// Finds the first commentblocks config file in a directory, sorted by name.
export function findConfigInDirectory(directory: string): string | undefined {
  try {
    const files = fs.readdirSync(directory).filter(isConfigFileName).sort();
    if (files.length === 0) {
      return undefined;
    }
    return path.join(directory, files[0]);
  } catch (error) {
    throw new ConfigLoadError(`Failed to search directory: ${directory}`, error instanceof Error ? error : undefined);
  }
}

const ajv = new Ajv({ allErrors: true });
const validateConfigFile = ajv.compile<CommentBlocksConfigFile>(configSchema);

function validateConfig(data: unknown, filePath: string): CommentBlocksConfigFile {
  if (!validateConfigFile(data)) {
    const errorMessages = validateConfigFile.errors?.map((e) => `${e.instancePath || "/"} ${e.message}`) || [];
    throw new ConfigValidationError(
      `Config validation failed (${filePath}):\n${errorMessages.join("\n")}`,
      validateConfigFile.errors || [],
    );
  }
  return data;
}

function describeParseErrors(errors: ParseError[]): string {
  return errors.map((e) => `${printParseErrorCode(e.error)} at offset ${e.offset}`).join(", ");
}

// Loads and validates a config file. Comments and trailing commas are allowed.
export function loadConfig(filePath: string): LoadedConfig {
  let fileContent: string;
  try {
    fileContent = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigLoadError(`Failed to read config file: ${filePath}`, error instanceof Error ? error : undefined);
  }

  const parseErrors: ParseError[] = [];
  const parsed: unknown = parseJsonc(fileContent, parseErrors, { allowTrailingComma: true });
  if (parseErrors.length > 0) {
    throw new ConfigLoadError(`Failed to parse config file: ${filePath} (${describeParseErrors(parseErrors)})`);
  }

  const config = validateConfig(parsed, filePath);
  return { config, filePath: path.resolve(filePath) };
}

// configPath - config file or directory. Without it, the working directory is searched.
// returns the config file path, or undefined when searching found nothing
export function resolveConfigPath(configPath: string | undefined, cwd: string): string | undefined {
  if (configPath) {
    const absolutePath = path.resolve(cwd, configPath);
    if (!isDirectory(absolutePath)) {
      return canonicalizePath(absolutePath);
    }
    const foundPath = findConfigInDirectory(absolutePath);
    if (!foundPath) {
      throw new ConfigLoadError(`No config file found in directory: ${absolutePath}`);
    }
    return canonicalizePath(foundPath);
  }

  const foundPath = findConfigInDirectory(cwd);
  return foundPath ? canonicalizePath(foundPath) : undefined;
}

// Loads .env.local then .env from dir. dotenv never overwrites a variable that is already set, so
// the shell environment wins, then .env.local, then .env.
export function loadEnvironmentFiles(dir: string): void {
  loadDotenv({ path: path.join(dir, ".env.local") });
  loadDotenv({ path: path.join(dir, ".env") });
}

export function readEnvironmentOverrides(env: NodeJS.ProcessEnv): SettingsOverrides {
  const overrides: SettingsOverrides = {};
  const raw = env[kPreserveWhitespaceEnvVar];
  if (raw !== undefined && raw !== "") {
    const parsed = parseBooleanFlag(raw);
    if (parsed.ok) {
      overrides.preserveWhitespace = parsed.value;
    } else {
      cons.warning(`Ignoring ${kPreserveWhitespaceEnvVar}: ${parsed.error}`);
    }
  }
  return overrides;
}

export interface ResolveSettingsOptions {
  cwd: string;
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: SettingsOverrides;
}

// Precedence: defaults < config file < environment < command line.
export function resolveSettings(options: ResolveSettingsOptions): CommentBlocksSettings {
  const settings: CommentBlocksSettings = { ...kDefaultSettings };

  const configFilePath = resolveConfigPath(options.configPath, options.cwd);
  if (configFilePath) {
    const loaded = loadConfig(configFilePath);
    const config = loaded.config;
    settings.configPath = loaded.filePath;
    if (config.preserveWhitespace !== undefined) {
      settings.preserveWhitespace = config.preserveWhitespace;
    }
    if (config.format !== undefined) {
      settings.format = config.format;
    }
    if (config.separator !== undefined) {
      settings.separator = config.separator;
    }
    if (config.logFile !== undefined) {
      settings.logFile = resolvePath(loaded.filePath, config.logFile);
    }
  }

  const envOverrides = readEnvironmentOverrides(options.env ?? {});
  if (envOverrides.preserveWhitespace !== undefined) {
    settings.preserveWhitespace = envOverrides.preserveWhitespace;
  }

  const cli = options.overrides ?? {};
  if (cli.preserveWhitespace !== undefined) {
    settings.preserveWhitespace = cli.preserveWhitespace;
  }
  if (cli.format !== undefined) {
    settings.format = cli.format;
  }
  if (cli.logFile !== undefined) {
    settings.logFile = path.resolve(options.cwd, cli.logFile);
  }

  return settings;
}
