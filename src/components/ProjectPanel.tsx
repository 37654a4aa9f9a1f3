import React from "react";
import { Box, Text } from "ink";
import type { Project } from "../projects/types.js";
import { t } from "../i18n/index.js";

interface ProjectPanelProps {
  projects: Project[];
  current?: Project;
}

/**
 * Project list with the details of the selected project.
 */
export const ProjectPanel = React.memo(function ProjectPanel({ projects, current }: ProjectPanelProps) {
  if (projects.length === 0) {
    return (
      <Box paddingX={1}>
        <Text color="gray">{t("common:projects.empty_hint")}</Text>
      </Box>
    );
  }

  return (
    <Box flexDirection="column" paddingX={1}>
      <Box>
        {projects.map((project, idx) => {
          const selected = project.name === current?.name;
          return (
            <Box key={project.name} marginLeft={idx === 0 ? 0 : 2}>
              <Text color={selected ? "yellow" : "gray"} bold={selected}>
                {selected ? "● " : "○ "}
                {project.name}
              </Text>
            </Box>
          );
        })}
      </Box>
      {current && (
        <Box flexDirection="column" marginTop={1}>
          <Text color="gray">
            {t("common:project_fields.localPath")}: <Text color="white">{current.localPath}</Text>
          </Text>
          <Text color="gray">
            {t("common:project_fields.remote")}: <Text color="white">{current.remoteHost}:{current.remotePath}</Text>
          </Text>
          <Text color="gray">
            {t("common:project_fields.gitBranch")}: <Text color="white">{current.gitBranch}</Text>
          </Text>
        </Box>
      )}
    </Box>
  );
});
