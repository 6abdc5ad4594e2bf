#!/usr/bin/env node
import dotenv from "dotenv";
import { v4 as uuidv4 } from "uuid";
import { CliUsageError, USAGE, parseCliArgs } from "./cli/args.js";
import { runDispatch, runGenerate, runInspect } from "./cli/commands.js";
import { loadAppConfig } from "./config/app-config.js";
import { loggers } from "./utils/logger.js";

dotenv.config();

const logger = loggers.cli;

async function main(argv: string[]): Promise<number> {
  const args = parseCliArgs(argv);
  if (args.command === "help") {
    console.log(USAGE);
    return 0;
  }

  const config = loadAppConfig(process.env);
  const runLogger = logger.child({ run_id: uuidv4(), command: args.command });

  const controller = new AbortController();
  const onSigint = () => {
    runLogger.warn("SIGINT received, stopping after the current record");
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  const context = {
    config,
    logger: runLogger,
    signal: controller.signal,
    searchPath: process.env.PATH,
  };

  try {
    switch (args.command) {
      case "inspect":
        await runInspect(args, context);
        break;

      case "generate": {
        const result = await runGenerate(args, context);
        console.log(
          `Generated ${result.succeeded}/${result.selected} documents (${result.failed} failed)` +
            (result.cancelled ? ", cancelled" : ""),
        );
        console.log(`Archive: ${result.archivePath}`);
        console.log(`Sample:  ${result.samplePath}`);
        console.log(`Report:  ${result.reportPath}`);
        break;
      }

      case "dispatch": {
        const result = await runDispatch(args, context);
        const { counts } = result;
        console.log(
          `Dispatch ${result.mode} ${result.state}: ${counts.OK} sent, ${counts["DRY-RUN"]} simulated, ` +
            `${counts.SKIP} skipped, ${counts.FAIL} failed, ${result.ineligible} not generated`,
        );
        break;
      }
    }
  } finally {
    process.off("SIGINT", onSigint);
  }

  return 0;
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof CliUsageError) {
      console.error(`${error.message}\n\n${USAGE}`);
    } else if (error instanceof Error) {
      logger.error("Run aborted", error);
    } else {
      logger.error("Run aborted", new Error(String(error)));
    }
    process.exitCode = 1;
  });
