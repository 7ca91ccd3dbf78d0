#!/usr/bin/env tsx
import cac from "cac";
import { clean } from "./commands/clean";
import { generate } from "./commands/generate";
import { watch } from "./commands/watch";
import type { CliOptions } from "./dev/config-loader";
import { error } from "./dev/logger";

const VERSION = "0.1.0";

const cli = cac("dartsmith");

function run(command: (options: CliOptions) => Promise<number>) {
    return (options: CliOptions) =>
        command(options).then(
            (code) => {
                process.exitCode = code;
            },
            (err: unknown) => {
                error(err instanceof Error ? (err.stack ?? err.message) : String(err));
                process.exitCode = 1;
            },
        );
}

cli.command("generate", "Generate freezed, JSON and provider companions once")
    .option("-c, --config <path>", "Path to dartsmith.yaml")
    .option("-i, --input <dir>", "Source directory or file (repeatable)")
    .option("-o, --output <dir>", "Directory for companions (default: beside each source)")
    .option("-t, --type <variants>", "freezed | json | riverpod | all, comma separated")
    .option("--delete-conflicting-outputs", "Remove existing companions before generating")
    .option("--concurrency <n>", "Files generated at once")
    .option("-l, --log-level <level>", "Log level (debug | info | warn | error | silent)")
    .action(run(generate));

cli.command("watch", "Generate, then regenerate on every change")
    .option("-c, --config <path>", "Path to dartsmith.yaml")
    .option("-i, --input <dir>", "Source directory or file (repeatable)")
    .option("-o, --output <dir>", "Directory for companions (default: beside each source)")
    .option("-t, --type <variants>", "freezed | json | riverpod | all, comma separated")
    .option("--delete-conflicting-outputs", "Remove existing companions before generating")
    .option("--concurrency <n>", "Files generated at once")
    .option("--debounce-ms <ms>", "Quiet time before a changed file is regenerated")
    .option("-l, --log-level <level>", "Log level (debug | info | warn | error | silent)")
    .action(run(watch));

cli.command("clean", "Remove generated companions")
    .option("-c, --config <path>", "Path to dartsmith.yaml")
    .option("-i, --input <dir>", "Source directory or file (repeatable)")
    .option("-o, --output <dir>", "Directory for companions")
    .option("-l, --log-level <level>", "Log level (debug | info | warn | error | silent)")
    .action(run(clean));

cli.help();
cli.version(VERSION);
cli.parse();
