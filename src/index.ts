#!/usr/bin/env node

import { Command } from "commander";
import { extractCommand } from "./frontend/extract";
import { CommandLineOptions } from "./frontend/parseOptions";
import { watchCommand } from "./frontend/watch";
import * as cons from "./utils/console";
import { describeError } from "./utils/errorHandling";
import { helpTopicForCommand, printHelp } from "./utils/help";
import { getPackageInfo, getVersionTag } from "./utils/versionString";

function addSharedOptions(command: Command): Command {
  return command
    .option("-p, --preserve-whitespace", "Keep comment text exactly as written")
    .option("-f, --format <format>", "Output format: text or json")
    .option("-o, --out <path>", "Write output to a file instead of stdout")
    .option("-c, --config <path>", "Config file, or directory to search for one")
    .option("--log-file <path>", "Append diagnostics to this file")
    .option("--verbose", "Show debug output");
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  // Intercept help flags early before Commander processes them
  if (args.length === 0 || (args.length === 1 && (args[0] === "-h" || args[0] === "--help"))) {
    printHelp("main");
    return;
  }
  if (args.length >= 2 && (args.includes("-h") || args.includes("--help"))) {
    const topic = helpTopicForCommand(args[0]);
    if (topic) {
      printHelp(topic);
      return;
    }
  }

  const program = new Command();
  const packageInfo = getPackageInfo();

  // Disable default help
  program.helpOption(false);
  program.addHelpCommand(false);

  program
    .name(packageInfo.name)
    .description("Extracts documentation comments from source files")
    .version(getVersionTag(packageInfo), "-v, --version", "Output version information");

  addSharedOptions(
    program
      .command("extract [files...]")
      .alias("x")
      .description("Print the comment blocks found in files")
      .option("-t, --text <text>", "Extract from this text instead of files"),
  ).action(async (files: string[], options: CommandLineOptions) => {
    await extractCommand(files, options);
  });

  addSharedOptions(
    program.command("watch <files...>").alias("w").description("Extract again whenever a file changes"),
  ).action(async (files: string[], options: CommandLineOptions) => {
    await watchCommand(files, options);
  });

  program
    .command("help [command]")
    .description("Show help information")
    .action((command?: string) => {
      if (!command) {
        printHelp("main");
        return;
      }
      const topic = helpTopicForCommand(command);
      if (!topic) {
        cons.error(`Unknown command: ${command}`);
        printHelp("main");
        process.exitCode = 1;
        return;
      }
      printHelp(topic);
    });

  await program.parseAsync(args, { from: "user" });
}

main().catch((error: unknown) => {
  cons.error(describeError(error));
  process.exit(1);
});
