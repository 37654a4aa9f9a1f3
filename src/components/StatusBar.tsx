import React from "react";
import { Box, Text } from "ink";
import type { Project } from "../projects/types.js";
import { formatRelativeTime } from "../utils/time.js";
import { t } from "../i18n/index.js";

interface StatusBarProps {
  project?: Project;
  projectCount: number;
  /** When the last operation finished successfully */
  lastSync?: Date;
}

export function StatusBar({ project, projectCount, lastSync }: StatusBarProps) {
  return (
    <Box borderStyle="single" borderColor="gray" paddingX={1} justifyContent="space-between">
      <Text bold color="magenta">
        syncpair
      </Text>
      <Box>
        <Text>
          <Text color="blue">{t("common:status.project")}</Text>{" "}
          <Text color="white">{project?.name ?? t("common:status.none_selected")}</Text>
        </Text>
        <Box marginLeft={2}>
          <Text>
            <Text color="green">{t("common:status.projects")}</Text>{" "}
            <Text color="white">{projectCount}</Text>
          </Text>
        </Box>
        {lastSync && (
          <Box marginLeft={2}>
            <Text>
              <Text color="yellow">{t("common:status.last_sync")}</Text>{" "}
              <Text color="gray">{formatRelativeTime(lastSync)}</Text>
            </Text>
          </Box>
        )}
      </Box>
    </Box>
  );
}
