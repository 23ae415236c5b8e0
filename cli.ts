#!/usr/bin/env node
/**
 * pipeconf command-line entry point.
 */
import { Command } from "commander";
import { registerCli } from "./lib/cli.js";
import { runCommand } from "./lib/run-command.js";

const controller = new AbortController();
process.once("SIGINT", () => controller.abort());

const program = new Command("pipeconf")
  .description("Find the CI pipeline config files that govern a run");

registerCli(program, {
  runCommand,
  stdout: (text) => { process.stdout.write(text); },
  stderr: (text) => { process.stderr.write(text); },
  signal: controller.signal,
});

await program.parseAsync(process.argv);
