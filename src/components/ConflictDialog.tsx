/**
 * ConflictDialog - asks which copy of a conflicting file wins
 *
 * One conflict at a time. "a" toggles applying the choice to every
 * remaining conflict; Esc cancels the whole sync.
 */

import React, { useState, useCallback, useMemo } from "react";
import { Box, Text, useInput } from "ink";
import SelectInput from "ink-select-input";
import { t } from "../i18n/index.js";
import type { Conflict, ConflictChoice, ConflictDecision, ConflictPosition } from "../sync/types.js";

interface ConflictDialogProps {
  conflict: Conflict;
  position: ConflictPosition;
  /** Called with the decision, or null when the user cancels everything */
  onDecide: (decision: ConflictDecision | null) => void;
}

interface ChoiceItem {
  label: string;
  value: ConflictChoice;
}

export function ConflictDialog({ conflict, position, onDecide }: ConflictDialogProps) {
  const [applyToRemaining, setApplyToRemaining] = useState(false);
  const remaining = position.total - position.index - 1;

  const items: ChoiceItem[] = useMemo(() => [
    { label: t("common:conflict_dialog.use_local"), value: "local" },
    { label: t("common:conflict_dialog.use_remote"), value: "remote" },
    { label: t("common:conflict_dialog.skip"), value: "skip" },
  ], []);

  useInput((input, key) => {
    if (key.escape) {
      onDecide(null);
      return;
    }
    if ((input === "a" || input === "A") && remaining > 0) {
      setApplyToRemaining((prev) => !prev);
    }
  });

  const handleSelect = useCallback(
    (item: ChoiceItem) => {
      onDecide({ choice: item.value, applyToRemaining });
    },
    [onDecide, applyToRemaining]
  );

  return (
    <Box flexDirection="column" borderStyle="round" borderColor="yellow" paddingX={1} paddingY={1}>
      <Box marginBottom={1}>
        <Text color="yellow" bold>
          {t("common:conflict_dialog.title")}
        </Text>
        <Text color="gray"> {position.index + 1}/{position.total}</Text>
      </Box>

      <Text bold>{conflict.file}</Text>
      <Text color="gray">
        {t("common:conflict_dialog.local_modified")}: <Text color="white">{conflict.localTime}</Text>
      </Text>
      <Text color="gray">
        {t("common:conflict_dialog.remote_modified")}: <Text color="white">{conflict.remoteTime}</Text>
      </Text>

      <Box marginTop={1}>
        <SelectInput items={items} onSelect={handleSelect} />
      </Box>

      {remaining > 0 && (
        <Box marginTop={1}>
          <Text color={applyToRemaining ? "green" : "gray"}>
            [{applyToRemaining ? "x" : " "}] {t("common:conflict_dialog.apply_to_remaining", { count: remaining })}
          </Text>
        </Box>
      )}

      <Box marginTop={1}>
        <Text color="gray" dimColor>
          {t("common:conflict_dialog.hints")}
        </Text>
      </Box>
    </Box>
  );
}
