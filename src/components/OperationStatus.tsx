import React, { useState, useEffect } from "react";
import { Box, Text } from "ink";
import Spinner from "ink-spinner";
import type { StatusTone } from "../sync/types.js";

export interface OperationState {
  message: string;
  tone: StatusTone;
}

const TONE_COLORS: Record<StatusTone, string> = {
  info: "gray",
  progress: "cyan",
  success: "green",
  warning: "yellow",
  error: "red",
};

/**
 * Status line under the log. While an operation runs it shows a spinner and
 * the elapsed time next to the latest progress message.
 */
export function OperationStatus({ state, running, startTime }: { state: OperationState | null; running: boolean; startTime?: number }) {
  const [elapsed, setElapsed] = useState(0);

  useEffect(() => {
    if (!running || startTime === undefined) {
      setElapsed(0);
      return;
    }
    const interval = setInterval(() => {
      setElapsed(Math.floor((Date.now() - startTime) / 1000));
    }, 1000);
    return () => clearInterval(interval);
  }, [running, startTime]);

  if (!state && !running) {
    return null;
  }

  const color = TONE_COLORS[state?.tone ?? "progress"];

  return (
    <Box>
      {running && (
        <Text color="cyan">
          <Spinner type="dots" />{" "}
        </Text>
      )}
      <Text color={color}>{state?.message ?? ""}</Text>
      {running && <Text color="white"> ({elapsed}s)</Text>}
    </Box>
  );
}
