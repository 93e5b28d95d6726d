/**
 * cmdfor Protocol — Structured response schema
 *
 * The backend is asked for a JSON object matching CommandSetWireSchema.
 * Strict structured outputs take no length keywords, so the wire schema is
 * plain types only; parseCommandSet applies the tighter CommandSetSchema.
 */

import { z } from "zod";
import { createResponseParseError, type ResponseParseError } from "./errors.js";
import { ok, err, type CommandSet, type Result } from "./types.js";

export const CommandEntryWireSchema = z
  .object({
    cmd: z.string().describe("The shell command"),
    comment: z.string().describe("Very short inline comment for the command"),
  })
  .strict();

export const CommandSetWireSchema = z
  .object({
    cmds: z
      .array(CommandEntryWireSchema)
      .describe("Variations of the command in the order of increasing complexity"),
  })
  .strict();

export type CommandSetWire = z.infer<typeof CommandSetWireSchema>;

/** What a usable response looks like: the wire shape with non-empty commands */
export const CommandSetSchema = z
  .object({
    cmds: z.array(CommandEntryWireSchema.extend({ cmd: z.string().min(1) }).strict()),
  })
  .strict();

export const COMMAND_SET_SCHEMA_NAME = "cmds";
export const COMMAND_SET_SCHEMA_DESCRIPTION = "A list of commands and associated comments to execute.";

/**
 * Validate a decoded response body. Never returns a partial set.
 */
export function parseCommandSet(body: unknown): Result<CommandSet, ResponseParseError> {
  const parsed = CommandSetSchema.safeParse(body);
  if (!parsed.success) {
    return err(createResponseParseError(parsed.error));
  }
  return ok(parsed.data.cmds.map((entry) => ({ command: entry.cmd, comment: entry.comment })));
}

/** Inverse of parseCommandSet. */
export function toWire(commands: CommandSet): CommandSetWire {
  return {
    cmds: commands.map((entry) => ({ cmd: entry.command, comment: entry.comment })),
  };
}
