import React, { useState, useCallback } from "react";
import { Box, Text, useInput } from "ink";
import TextInput from "ink-text-input";
import { t } from "../i18n/index.js";

interface CommitDialogProps {
  /** `git status --porcelain` output */
  changesSummary: string;
  onSubmit: (message: string | null) => void;
}

const MAX_SUMMARY_LINES = 10;

/**
 * Asks for a commit message before pushing a dirty working tree.
 */
export function CommitDialog({ changesSummary, onSubmit }: CommitDialogProps) {
  const [message, setMessage] = useState("");
  const [showEmptyWarning, setShowEmptyWarning] = useState(false);

  const lines = changesSummary.split("\n");
  const shown = lines.slice(0, MAX_SUMMARY_LINES);

  useInput((_input, key) => {
    if (key.escape) {
      onSubmit(null);
    }
  });

  const handleSubmit = useCallback(
    (value: string) => {
      if (!value.trim()) {
        setShowEmptyWarning(true);
        return;
      }
      onSubmit(value.trim());
    },
    [onSubmit]
  );

  return (
    <Box flexDirection="column" borderStyle="round" borderColor="cyan" paddingX={1} paddingY={1}>
      <Text color="cyan" bold>
        {t("common:commit_dialog.title")}
      </Text>
      <Box flexDirection="column" marginY={1}>
        {shown.map((line, idx) => (
          <Text key={idx} color="gray">
            {line}
          </Text>
        ))}
        {lines.length > shown.length && (
          <Text color="gray" dimColor>
            {t("common:commit_dialog.more_changes", { count: lines.length - shown.length })}
          </Text>
        )}
      </Box>
      <Box borderStyle="single" borderColor={showEmptyWarning ? "red" : "gray"} paddingX={1}>
        <TextInput
          value={message}
          onChange={(value) => {
            setMessage(value);
            setShowEmptyWarning(false);
          }}
          onSubmit={handleSubmit}
          placeholder={t("common:commit_dialog.placeholder")}
        />
      </Box>
      {showEmptyWarning && <Text color="red">{t("common:commit_dialog.empty_warning")}</Text>}
      <Box marginTop={1}>
        <Text color="gray" dimColor>
          {t("common:commit_dialog.hints")}
        </Text>
      </Box>
    </Box>
  );
}
