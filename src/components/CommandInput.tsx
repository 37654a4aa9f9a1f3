import React, { useState, useCallback } from "react";
import { Box, Text, useInput } from "ink";
import TextInput from "ink-text-input";
import { t } from "../i18n/index.js";

// Max input history size
const MAX_HISTORY_SIZE = 100;

interface CommandInputProps {
  /** Slash-command names offered by Tab completion */
  commandNames: string[];
  disabled: boolean;
  onSubmit: (value: string) => void;
}

/**
 * Command line with history (Up/Down) and Tab completion of command names.
 */
export function CommandInput({ commandNames, disabled, onSubmit }: CommandInputProps) {
  const [input, setInput] = useState("");
  const [inputHistory, setInputHistory] = useState<string[]>([]);
  const [historyIndex, setHistoryIndex] = useState(-1);
  const [tempInput, setTempInput] = useState("");
  const [tabIndex, setTabIndex] = useState(0);

  const matchingCommands =
    input.startsWith("/") && !input.includes(" ")
      ? commandNames.filter((name) => `/${name}`.startsWith(input.toLowerCase()))
      : [];

  useInput((_inputChar, key) => {
    if (disabled) return;

    // Tab: Autocomplete command
    if (key.tab && matchingCommands.length > 0) {
      setInput(`/${matchingCommands[tabIndex % matchingCommands.length]}`);
      setTabIndex((tabIndex + 1) % matchingCommands.length);
      return;
    }

    if (!key.tab) {
      setTabIndex(0);
    }

    // Up arrow: Previous history
    if (key.upArrow) {
      if (inputHistory.length === 0) return;

      if (historyIndex === -1) {
        setTempInput(input);
        setHistoryIndex(inputHistory.length - 1);
        setInput(inputHistory[inputHistory.length - 1]);
      } else if (historyIndex > 0) {
        setHistoryIndex(historyIndex - 1);
        setInput(inputHistory[historyIndex - 1]);
      }
      return;
    }

    // Down arrow: Next history
    if (key.downArrow) {
      if (historyIndex === -1) return;

      if (historyIndex < inputHistory.length - 1) {
        setHistoryIndex(historyIndex + 1);
        setInput(inputHistory[historyIndex + 1]);
      } else {
        setHistoryIndex(-1);
        setInput(tempInput);
      }
    }
  });

  const addToHistory = useCallback((value: string) => {
    setInputHistory((prev) => {
      // Don't add duplicates consecutively
      if (prev.length > 0 && prev[prev.length - 1] === value) {
        return prev;
      }
      return [...prev, value].slice(-MAX_HISTORY_SIZE);
    });
    setHistoryIndex(-1);
    setTempInput("");
  }, []);

  const handleSubmit = useCallback(
    (value: string) => {
      const trimmed = value.trim();
      if (!trimmed || disabled) return;

      onSubmit(trimmed);
      addToHistory(trimmed);
      setInput("");
    },
    [disabled, onSubmit, addToHistory]
  );

  const handleChange = useCallback(
    (value: string) => {
      setInput(value);
      if (historyIndex !== -1) {
        setHistoryIndex(-1);
      }
    },
    [historyIndex]
  );

  return (
    <Box flexDirection="column">
      {matchingCommands.length > 0 && (
        <Box paddingX={1}>
          <Text color="gray" dimColor>
            {matchingCommands.map((name) => `/${name}`).join("  ")}
          </Text>
        </Box>
      )}
      <Box borderStyle="round" borderColor="gray" paddingX={1}>
        <Text color="cyan" bold>
          {">"}{" "}
        </Text>
        <Box flexGrow={1}>
          <TextInput
            value={input}
            onChange={handleChange}
            onSubmit={handleSubmit}
            focus={!disabled}
            placeholder={disabled ? t("common:input.waiting") : t("common:input.placeholder")}
          />
        </Box>
      </Box>
    </Box>
  );
}
