/**
 * Command Selector — Ink list of suggested commands
 *
 * Renders the suggestions, one highlighted row at a time, and reports how
 * the user left the list. Ctrl+C is handled here rather than by Ink so that
 * it ends the list like `q` instead of killing the process.
 */

import React, { useEffect, useReducer } from "react";
import { Box, Text, render, useApp, useInput } from "ink";
import type { CommandSet, SelectorOutcome } from "@cmdfor/protocol";
import { KEY_HELP, resolveKey, type SelectorKeyAction } from "./keymap.js";
import { formatCommandRows, initialSelectorState, selectorReducer, type SelectorAction } from "./state.js";

interface CommandSelectorProps {
  commands: CommandSet;
  onOutcome: (outcome: SelectorOutcome) => void;
}

export function CommandSelector({ commands, onOutcome }: CommandSelectorProps) {
  const { exit } = useApp();
  const [state, dispatch] = useReducer(selectorReducer, commands.length, initialSelectorState);

  useInput((input, key) => {
    const action = resolveKey(input, key);
    if (action) dispatch(toAction(action, commands));
  });

  useEffect(() => {
    if (!state.outcome) return;
    onOutcome(state.outcome);
    exit();
  }, [state.outcome]);

  // Leave nothing behind when the list is about to be replaced
  if (state.outcome?.kind === "rerun") return null;

  const rows = formatCommandRows(commands);
  const empty = rows.length === 0;
  const help = empty
    ? [KEY_HELP.rerun, KEY_HELP.exit]
    : [KEY_HELP.navigate, KEY_HELP.rerun, KEY_HELP.proceed, KEY_HELP.exit];

  return (
    <Box flexDirection="column">
      <Text bold>Choose a command:</Text>
      {empty && <Text dimColor>No commands suggested.</Text>}
      {rows.map((row, i) => {
        const active = i === state.cursor;
        return (
          <Text key={i} color={active ? "cyan" : undefined} inverse={active}>
            {active ? "❯" : " "} {row}
          </Text>
        );
      })}
      <Box marginTop={1}>
        <Text dimColor>{help.join(" · ")}</Text>
      </Box>
    </Box>
  );
}

function toAction(action: SelectorKeyAction, commands: CommandSet): SelectorAction {
  switch (action) {
    case "up":
      return { type: "UP" };
    case "down":
      return { type: "DOWN" };
    case "select":
      return { type: "SELECT", commands };
    case "rerun":
      return { type: "RERUN" };
    case "quit":
      return { type: "QUIT" };
  }
}

/**
 * Shows the selector and resolves once the user has left it and Ink has
 * released the terminal.
 */
export async function selectCommand(commands: CommandSet): Promise<SelectorOutcome> {
  const result: { outcome?: SelectorOutcome } = {};
  const instance = render(
    <CommandSelector commands={commands} onOutcome={(outcome) => { result.outcome = outcome; }} />,
    { exitOnCtrlC: false },
  );
  await instance.waitUntilExit();
  return result.outcome ?? { kind: "quit" };
}
