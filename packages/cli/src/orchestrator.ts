/**
 * Orchestrator — one `cmdfor <question>` session
 *
 * request → record cost → select → inject, looping back to the request on
 * rerun. Every collaborator is passed in so the loop can be driven by fakes.
 */

import {
  causeMessage,
  describeError,
  type CommandSet,
  type CompletionError,
  type CompletionResult,
  type InjectError,
  type Result,
  type SelectorOutcome,
} from "@cmdfor/protocol";
import { API_KEY_SOURCES } from "@cmdfor/completion";
import { formatDay, type CostRecorder } from "./ledger.js";
import type { Reporter } from "./reporter.js";
import type { Screen } from "./screen.js";
import type { Progress } from "./spinner.js";

// =============================================================================
// Ports
// =============================================================================

export interface CommandSource {
  requestCommands(question: string, model: string): Promise<Result<CompletionResult, CompletionError>>;
}

export interface CommandInjector {
  inject(command: string): Result<void, InjectError>;
}

export interface SessionDeps {
  completion: CommandSource;
  model: string;
  select: (commands: CommandSet) => Promise<SelectorOutcome>;
  injector: CommandInjector;
  ledger: CostRecorder;
  progress: Progress;
  screen: Screen;
  reporter: Reporter;
  clock: () => Date;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

export const MESSAGES = {
  progress: "Generating commands…",
  missingCredentials: [
    "Have you set up your OpenAI API key? Try one of these:",
    ...API_KEY_SOURCES.map((name) => `  export ${name}="<your key>"`),
  ].join("\n"),
  unsupportedModel: (model: string, supported: readonly string[]) =>
    `Unsupported model: ${model}. Supported models are:\n  ${supported.join(", ")}`,
  generateFailed: "Error generating commands.",
  selectFailed: "Error selecting command.",
  injectFailed: "Error injecting command into prompt.",
  ledgerFailed: (reason: string) => `Could not record cost: ${reason}`,
} as const;

// =============================================================================
// Session
// =============================================================================

export async function runSession(question: string, deps: SessionDeps): Promise<number> {
  const { reporter } = deps;

  for (;;) {
    deps.screen.mark();
    deps.progress.start(MESSAGES.progress);
    let completion: Result<CompletionResult, CompletionError>;
    try {
      completion = await deps.completion.requestCommands(question, deps.model);
    } finally {
      deps.progress.stop();
    }

    if (!completion.ok) {
      reporter.error(completionMessage(completion.error));
      reporter.debug(describeError(completion.error));
      return EXIT_FAILURE;
    }

    const { commands, cost, usage, model } = completion.value;
    reporter.debug(
      `${model}: ${usage.inputTokens} in (${usage.cachedInputTokens} cached), ${usage.outputTokens} out, $${cost.toFixed(6)}`,
    );
    await recordCost(deps, cost);

    let outcome: SelectorOutcome;
    try {
      outcome = await deps.select(commands);
    } catch (error) {
      reporter.error(MESSAGES.selectFailed);
      reporter.debug(causeMessage(error));
      return EXIT_FAILURE;
    }

    switch (outcome.kind) {
      case "rerun":
        deps.screen.clear();
        continue;

      case "quit":
        return EXIT_OK;

      case "selected": {
        const injected = deps.injector.inject(outcome.command);
        if (!injected.ok) {
          reporter.error(MESSAGES.injectFailed);
          reporter.debug(describeError(injected.error));
          return EXIT_FAILURE;
        }
        return EXIT_OK;
      }
    }
  }
}

function completionMessage(error: CompletionError): string {
  switch (error.code) {
    case "MISSING_CREDENTIALS":
      return MESSAGES.missingCredentials;
    case "UNSUPPORTED_MODEL":
      return MESSAGES.unsupportedModel(error.model, error.supported);
    case "BACKEND_REQUEST":
    case "RESPONSE_PARSE":
      return MESSAGES.generateFailed;
  }
}

/** A ledger problem costs the user a warning, not the session */
async function recordCost(deps: SessionDeps, cost: number): Promise<void> {
  try {
    await deps.ledger.recordCost(formatDay(deps.clock()), cost);
  } catch (error) {
    deps.reporter.warn(MESSAGES.ledgerFailed(causeMessage(error)));
  }
}
