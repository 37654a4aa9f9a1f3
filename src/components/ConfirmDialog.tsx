import React from "react";
import { Box, Text, useInput } from "ink";
import { t } from "../i18n/index.js";

/**
 * Yes/no question. Esc counts as no.
 */
export function ConfirmDialog({ message, onAnswer }: { message: string; onAnswer: (confirmed: boolean) => void }) {
  useInput((input, key) => {
    if (input === "y" || input === "Y") {
      onAnswer(true);
    } else if (input === "n" || input === "N" || key.escape) {
      onAnswer(false);
    }
  });

  return (
    <Box flexDirection="column" borderStyle="round" borderColor="yellow" paddingX={1} paddingY={1}>
      <Text color="yellow">{message}</Text>
      <Box marginTop={1}>
        <Text color="green">{t("common:confirm_dialog.yes")}</Text>
        <Text color="gray"> / </Text>
        <Text color="red">{t("common:confirm_dialog.no")}</Text>
      </Box>
    </Box>
  );
}
