/**
 * Cost Ledger — per-day spend in a small JSON file
 *
 *   { "2026-10-19": 0.0075, "2026-10-20": 0.0012 }
 *
 * A file that exists but does not parse is reported, never replaced.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";

export type DailyCosts = Record<string, number>;

const DailyCostsSchema = z.record(z.string(), z.number());

export class LedgerError extends Error {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LedgerError";
    this.path = path;
  }
}

/** What the orchestrator needs from the ledger */
export interface CostRecorder {
  recordCost(day: string, amount: number): Promise<void>;
}

export class CostLedger implements CostRecorder {
  readonly path: string;

  constructor(path: string) {
    this.path = path;
  }

  async readCosts(): Promise<DailyCosts> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf8");
    } catch (cause) {
      if (isNotFound(cause)) return {};
      throw new LedgerError(`Cannot read cost ledger ${this.path}`, this.path, { cause });
    }

    if (raw.trim() === "") return {};

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (cause) {
      throw new LedgerError(`Cost ledger ${this.path} is not valid JSON`, this.path, { cause });
    }

    const parsed = DailyCostsSchema.safeParse(json);
    if (!parsed.success) {
      throw new LedgerError(`Cost ledger ${this.path} has an unexpected shape`, this.path, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  async recordCost(day: string, amount: number): Promise<void> {
    const costs = await this.readCosts();
    costs[day] = (costs[day] ?? 0) + amount;

    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(this.path, JSON.stringify(costs, null, 2) + "\n", "utf8");
    } catch (cause) {
      throw new LedgerError(`Cannot write cost ledger ${this.path}`, this.path, { cause });
    }
  }
}

/** Local calendar day as YYYY-MM-DD */
export function formatDay(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, "0");
  const d = String(date.getDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
