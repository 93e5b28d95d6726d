import React from "react";
import stripAnsi from "strip-ansi";
import { describe, it, expect } from "vitest";
import { render } from "ink-testing-library";
import { CostTable, costRows } from "../src/cost-table.js";

describe("costRows", () => {
  it("sorts days and sums the total", () => {
    expect(costRows({ "2026-10-20": 0.0012, "2026-10-19": 0.0075 })).toEqual({
      rows: [
        { day: "2026-10-19", cost: "$0.007500" },
        { day: "2026-10-20", cost: "$0.001200" },
      ],
      total: "$0.008700",
    });
  });
});

describe("CostTable", () => {
  it("renders a row per day and the total", () => {
    const { lastFrame, unmount } = render(<CostTable costs={{ "2026-10-19": 0.0075, "2026-10-20": 0.0012 }} />);

    expect(stripAnsi(lastFrame() ?? "").split("\n")).toEqual([
      "Date             Cost",
      "2026-10-19  $0.007500",
      "2026-10-20  $0.001200",
      "Total       $0.008700",
    ]);
    unmount();
  });

  it("says so when nothing has been recorded", () => {
    const { lastFrame, unmount } = render(<CostTable costs={{}} />);

    expect(stripAnsi(lastFrame() ?? "")).toBe("No costs recorded yet.");
    unmount();
  });
});
