/**
 * Command-line parsing for `cmdfor`.
 */

export type CliCommand =
  | { kind: "ask"; question: string }
  | { kind: "cost" }
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "error"; message: string };

export function parseArgs(args: readonly string[]): CliCommand {
  const words: string[] = [];
  let optionsEnded = false;

  for (const arg of args) {
    if (optionsEnded || !arg.startsWith("-") || arg === "-") {
      words.push(arg);
    } else if (arg === "--") {
      optionsEnded = true;
    } else if (arg === "--help" || arg === "-h") {
      return { kind: "help" };
    } else if (arg === "--version" || arg === "-v") {
      return { kind: "version" };
    } else {
      return { kind: "error", message: `Unknown option: ${arg}` };
    }
  }

  if (words.length === 0) return { kind: "help" };
  if (words.length === 1 && words[0] === "cost" && !optionsEnded) return { kind: "cost" };

  const question = words.join(" ").trim();
  if (!question) return { kind: "help" };
  return { kind: "ask", question };
}

export const HELP_TEXT = `cmdfor — Ask for a shell command, pick one, find it on your prompt

Usage:
  cmdfor <question...>
  cmdfor cost

Commands:
  cost          Show the recorded spend per day

Options:
  --help, -h    Show this help
  --version, -v Show the version
  --            Treat everything after it as the question

Environment:
  CMDFOR_OPENAI_API_KEY, OPENAI_API_KEY   OpenAI API key (first one set wins)
  CMDFOR_OPENAI_MODEL                      Model to use (default: gpt-4o)
  CMDFOR_DEBUG                             Set to 1 to print error details

Keys:
  ↑/k ↓/j navigate · r rerun · enter/space proceed · q/ctrl+c exit

Examples:
  cmdfor list files sorted by modification time
  cmdfor "find files larger than 100MB"
  cmdfor -- -rf meaning in rm
`;
