import React, { useMemo } from "react";
import { Box, Text, useStdout } from "ink";
import type { StatusTone } from "../sync/types.js";
import { t } from "../i18n/index.js";

export interface Message {
  role: "user" | "assistant";
  content: string;
  /** Colors an assistant message; user messages ignore it */
  tone?: StatusTone;
}

const TONE_COLORS: Record<StatusTone, string> = {
  info: "white",
  progress: "cyan",
  success: "green",
  warning: "yellow",
  error: "red",
};

// Lines taken by the status bar, project panel, status line and input
const FIXED_UI_LINES = 14;

function estimateMessageLines(message: Message): number {
  return message.content.split("\n").length + 1;
}

/**
 * Memoized message bubble component - prevents re-renders when message prop is unchanged
 */
const MessageBubble = React.memo(function MessageBubble({ message }: { message: Message }) {
  if (message.role === "user") {
    return (
      <Box flexDirection="column" marginTop={1}>
        <Text backgroundColor="#3a3a3a" color="white">{` > ${message.content} `}</Text>
      </Box>
    );
  }

  return (
    <Box flexDirection="column" marginLeft={1}>
      <Text color={TONE_COLORS[message.tone ?? "info"]}>{message.content}</Text>
    </Box>
  );
});

/**
 * Command echoes and their responses, trimmed to what fits in the terminal.
 */
export function MessageLog({ messages }: { messages: Message[] }) {
  const { stdout } = useStdout();
  const terminalHeight = stdout?.rows ?? 24;
  const availableLines = Math.max(5, terminalHeight - FIXED_UI_LINES);

  // Always show at least the last message
  const visibleMessages = useMemo(() => {
    let totalLines = 0;
    let startIndex = messages.length;
    for (let i = messages.length - 1; i >= 0; i--) {
      const lines = estimateMessageLines(messages[i]);
      if (totalLines + lines > availableLines && i < messages.length - 1) {
        break;
      }
      totalLines += lines;
      startIndex = i;
    }
    return messages.slice(startIndex);
  }, [messages, availableLines]);

  const hiddenCount = messages.length - visibleMessages.length;

  return (
    <Box flexDirection="column" marginBottom={1}>
      {hiddenCount > 0 && (
        <Text color="gray" dimColor>
          {t("common:messages.hidden_count", { count: hiddenCount })}
        </Text>
      )}
      {visibleMessages.map((message, idx) => (
        <MessageBubble key={hiddenCount + idx} message={message} />
      ))}
    </Box>
  );
}
