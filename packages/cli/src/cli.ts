#!/usr/bin/env node
/**
 * cmdfor CLI
 *
 * Usage:
 *   cmdfor list files sorted by modification time
 *   cmdfor cost
 */

import React from "react";
import { homedir } from "node:os";
import { render } from "ink";
import {
  CompletionClient,
  DEFAULT_CATALOG,
  DEFAULT_PROMPTS,
  createOpenAIBackend,
} from "@cmdfor/completion";
import { createTerminalInjector } from "@cmdfor/terminal";
import { HELP_TEXT, parseArgs } from "./args.js";
import { loadConfig, type CliConfig } from "./config.js";
import { CostTable } from "./cost-table.js";
import { CostLedger, LedgerError, type DailyCosts } from "./ledger.js";
import { runSession, type CommandInjector } from "./orchestrator.js";
import { StderrReporter } from "./reporter.js";
import { AnsiScreen } from "./screen.js";
import { selectCommand } from "./selector.js";
import { InkProgress } from "./spinner.js";
import { VERSION } from "./version.js";

async function main(): Promise<void> {
  const command = parseArgs(process.argv.slice(2));
  const config = loadConfig(process.env, process.platform, homedir());

  switch (command.kind) {
    case "help":
      console.log(HELP_TEXT);
      return;

    case "version":
      console.log(VERSION);
      return;

    case "error":
      console.error(`${command.message}\n`);
      console.error(HELP_TEXT);
      process.exitCode = 1;
      return;

    case "cost":
      await showCosts(config);
      return;

    case "ask":
      process.exitCode = await ask(command.question, config);
      return;
  }
}

async function ask(question: string, config: CliConfig): Promise<number> {
  const reporter = new StderrReporter(process.stderr, config.debug);

  if (!process.stdin.isTTY) {
    reporter.error("cmdfor must be run from an interactive terminal.");
    return 1;
  }

  const completion = new CompletionClient({
    catalog: DEFAULT_CATALOG,
    prompts: DEFAULT_PROMPTS,
    createBackend: createOpenAIBackend,
    env: process.env,
    platform: process.platform,
  });

  // Bound on first use, after Ink has handed the terminal back
  const injector: CommandInjector = {
    inject: (cmd) => {
      const created = createTerminalInjector({ platform: process.platform, stdin: process.stdin });
      return created.ok ? created.value.inject(cmd) : created;
    },
  };

  return runSession(question, {
    completion,
    model: config.model,
    select: selectCommand,
    injector,
    ledger: new CostLedger(config.ledgerPath),
    progress: new InkProgress(),
    screen: new AnsiScreen(process.stdout),
    reporter,
    clock: () => new Date(),
  });
}

async function showCosts(config: CliConfig): Promise<void> {
  let costs: DailyCosts;
  try {
    costs = await new CostLedger(config.ledgerPath).readCosts();
  } catch (error) {
    if (!(error instanceof LedgerError)) throw error;
    new StderrReporter(process.stderr, config.debug).error(error.message);
    process.exitCode = 1;
    return;
  }
  const { unmount } = render(React.createElement(CostTable, { costs }));
  unmount();
}

main().catch((err) => {
  console.error(`Fatal: ${err}`);
  process.exit(1);
});
