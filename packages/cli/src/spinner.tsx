/**
 * Progress spinner shown while the completion request is in flight.
 */

import React, { useEffect, useState } from "react";
import { Box, Text, render, type Instance } from "ink";

const FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"] as const;
const INTERVAL_MS = 120;

export function Spinner({ label, active }: { label: string; active: boolean }) {
  const [tick, setTick] = useState(0);

  useEffect(() => {
    if (!active) return;
    const timer = setInterval(() => setTick((t) => t + 1), INTERVAL_MS);
    return () => clearInterval(timer);
  }, [active]);

  if (!active) return null;

  return (
    <Box>
      <Text color="cyan">{FRAMES[tick % FRAMES.length]}</Text>
      <Text> {label}</Text>
    </Box>
  );
}

/** Start/stop handle used by the orchestrator */
export interface Progress {
  start(label: string): void;
  stop(): void;
}

export class InkProgress implements Progress {
  private instance: Instance | null = null;
  private label = "";

  start(label: string): void {
    this.stop();
    this.label = label;
    this.instance = render(<Spinner label={label} active />);
  }

  stop(): void {
    if (!this.instance) return;
    // An empty last frame erases the spinner line instead of leaving it behind
    this.instance.rerender(<Spinner label={this.label} active={false} />);
    this.instance.unmount();
    this.instance = null;
  }
}
