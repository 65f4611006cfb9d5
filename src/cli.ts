#!/usr/bin/env node
import fs from "node:fs";
import { pathToFileURL } from "node:url";

import { Command, Option } from "commander";

import { runDemo } from "./demo.js";
import { describeError } from "./errors.js";

const toInt = (value: string) => parseInt(value, 10);

export function buildCli(): Command {
  const program = new Command();

  program
    .name("job-sequencer")
    .description("Index-ordered, single-flight job sequencing")
    .version("0.1.0");

  program
    .command("demo")
    .description("Submit shuffled jobs with random arrival delays and print the execution order")
    .addOption(new Option("--engine <engine>", "Sequencer engine").choices(["self", "timer"]).default("timer"))
    .option("--jobs <n>", "Number of jobs", toInt, 5)
    .option("--delay <ms>", "Pause after each job", toInt, 10)
    .option("--tick <ms>", "Tick interval of the timer engine", toInt, 5)
    .option("--max-arrival <ms>", "Upper bound of the random arrival delay", toInt, 30)
    .option("--max-work <ms>", "Upper bound of the random job duration", toInt, 100)
    .option("--fail <index>", "Make the chunk at this index throw", toInt)
    .action(async (opts) => {
      const played = await runDemo({
        engine: opts.engine,
        jobs: opts.jobs,
        delayMs: opts.delay,
        tickMs: opts.tick,
        maxArrivalMs: opts.maxArrival,
        maxWorkMs: opts.maxWork,
        failIndex: opts.fail,
      });
      console.log(`Execution order: ${played.join(", ")}`);
    });

  return program;
}

export async function main(argv: string[]): Promise<void> {
  await buildCli().parseAsync(argv);
}

/**
 * Whether the module at `moduleUrl` is the script node was started with. npm links installed bins,
 * so the script path is resolved through symlinks before comparing.
 */
export function isEntrypoint(moduleUrl: string, scriptPath: string | undefined): boolean {
  if (!scriptPath || !fs.existsSync(scriptPath)) return false;
  return pathToFileURL(fs.realpathSync(scriptPath)).href === moduleUrl;
}

if (isEntrypoint(import.meta.url, process.argv[1])) {
  main(process.argv).catch((err) => {
    console.error(describeError(err));
    process.exitCode = 1;
  });
}
