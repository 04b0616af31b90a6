#!/usr/bin/env node
import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { parseArgs, printHelp } from "./args";
import { crawlSite } from "./crawler";
import { logger } from "./logger";
import { describeError } from "./utils";

const argv = process.argv.slice(2);

function readPackageVersion(): string {
  const raw = readFileSync(new URL("../package.json", import.meta.url), "utf8");
  const parsed: unknown = JSON.parse(raw);
  if (
    typeof parsed === "object" &&
    parsed !== null &&
    "version" in parsed &&
    typeof parsed.version === "string"
  ) {
    return parsed.version;
  }
  return "0.0.0";
}

export function isMainModule(metaUrl: string): boolean {
  const entry = process.argv[1];
  return entry !== undefined && resolve(entry) === fileURLToPath(metaUrl);
}

export async function main(args: string[] = argv): Promise<void> {
  try {
    const result = parseArgs(args);

    if (result.showVersion) {
      console.log(readPackageVersion());
      return;
    }
    if (result.showHelp) {
      printHelp();
      return;
    }

    logger.configure({
      verbose: result.options.verbose,
      showProgress: result.options.progress,
    });

    // The first signal lets the current page finish and the output close;
    // a second one falls through to Node's default handling.
    const controller = new AbortController();
    const interrupt = (signal: NodeJS.Signals): void => {
      logger.warn(`${signal} received, stopping after the current page`);
      controller.abort();
    };
    process.once("SIGINT", interrupt);
    process.once("SIGTERM", interrupt);

    try {
      const summary = await crawlSite(result.options, {
        signal: controller.signal,
      });
      if (summary.interrupted) {
        process.exitCode = 130;
      } else if (summary.passagesWritten === 0) {
        logger.warn("No passages were written");
      }
    } finally {
      process.off("SIGINT", interrupt);
      process.off("SIGTERM", interrupt);
    }
  } catch (error) {
    printHelp();
    logger.error(describeError(error));
    process.exitCode = 1;
  }
}

if (isMainModule(import.meta.url)) {
  void main();
}
