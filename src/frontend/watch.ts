import chokidar from "chokidar";
import { fileInput } from "../backend/inputSource";
import { debounce } from "../utils/algorithms";
import * as cons from "../utils/console";
import { describeError } from "../utils/errorHandling";
import { extractCore, loadSettings, setUpLogFile } from "./extract";
import { CommandLineOptions } from "./parseOptions";

const kDebounceMs = 150;

export async function watchCommand(files: string[], options?: CommandLineOptions): Promise<void> {
  if (files.length === 0) {
    throw new Error("No files to watch");
  }
  if (options?.text !== undefined) {
    throw new Error("--text cannot be watched; pass files instead");
  }

  cons.setVerbose(options?.verbose ?? false);
  const settings = loadSettings(options);
  setUpLogFile(settings);

  const inputs = files.map((file) => fileInput(file));
  const watchPaths = inputs.map((input) => input.path);

  let isExtracting = false;
  let pendingExtract = false;

  const runExtract = async (): Promise<void> => {
    if (isExtracting) {
      pendingExtract = true;
      return;
    }
    isExtracting = true;
    pendingExtract = false;
    try {
      await extractCore(inputs, settings, options?.out);
    } catch (error) {
      cons.error("Extract failed:");
      cons.error(describeError(error));
    } finally {
      isExtracting = false;
    }
    if (pendingExtract) {
      cons.dim("  Starting queued extract...");
      await runExtract();
    }
  };

  await runExtract();

  const watcher = chokidar.watch(watchPaths, {
    ignoreInitial: true,
    awaitWriteFinish: {
      stabilityThreshold: 100,
      pollInterval: 50,
    },
  });

  cons.info(`Watching ${watchPaths.length} file(s) for changes... (press Ctrl+C to stop)`);
  for (const watchPath of watchPaths) {
    cons.dim(`  ${watchPath}`);
  }

  const onChange = debounce((changedPath: string) => {
    cons.info(`File changed: ${changedPath}`);
    void runExtract();
  }, kDebounceMs);

  watcher.on("change", onChange);
  watcher.on("error", (error: unknown) => {
    cons.error(`Watcher error: ${describeError(error)}`);
  });

  // Resolves once the watcher is closed by a signal.
  await new Promise<void>((resolve, reject) => {
    const shutdown = () => {
      cons.info("Shutting down...");
      watcher.close().then(resolve, reject);
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
  });
}
