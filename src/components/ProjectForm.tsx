import React, { useState, useCallback } from "react";
import { Box, Text, useInput } from "ink";
import TextInput from "ink-text-input";
import { t } from "../i18n/index.js";
import { DEFAULT_GIT_BRANCH, type Project, type ProjectInput } from "../projects/types.js";

type FormField = keyof Required<ProjectInput>;

const FIELDS: FormField[] = ["name", "localPath", "remoteHost", "remotePath", "gitBranch"];

interface ProjectFormProps {
  /** Prefills the form when editing */
  initial?: Project;
  onSubmit: (input: ProjectInput | null) => void;
}

function initialValues(initial?: Project): Record<FormField, string> {
  return {
    name: initial?.name ?? "",
    localPath: initial?.localPath ?? "",
    remoteHost: initial?.remoteHost ?? "",
    remotePath: initial?.remotePath ?? "",
    gitBranch: initial?.gitBranch ?? DEFAULT_GIT_BRANCH,
  };
}

/**
 * Field-by-field form for creating or editing a project. Enter moves to the
 * next field, the last Enter submits, Esc cancels. Validation happens in the
 * store once the form is submitted.
 */
export function ProjectForm({ initial, onSubmit }: ProjectFormProps) {
  const [values, setValues] = useState(() => initialValues(initial));
  const [fieldIndex, setFieldIndex] = useState(0);
  const field = FIELDS[fieldIndex];

  useInput((_input, key) => {
    if (key.escape) {
      onSubmit(null);
      return;
    }
    if (key.upArrow && fieldIndex > 0) {
      setFieldIndex(fieldIndex - 1);
    }
  });

  const handleSubmit = useCallback(() => {
    if (fieldIndex < FIELDS.length - 1) {
      setFieldIndex(fieldIndex + 1);
      return;
    }
    onSubmit({ ...values });
  }, [fieldIndex, values, onSubmit]);

  return (
    <Box flexDirection="column" borderStyle="round" borderColor="cyan" paddingX={1} paddingY={1}>
      <Box marginBottom={1}>
        <Text color="cyan" bold>
          {initial ? t("common:project_form.edit_title", { name: initial.name }) : t("common:project_form.add_title")}
        </Text>
      </Box>

      {FIELDS.map((name, idx) => (
        <Box key={name}>
          <Box width={16}>
            <Text color={idx === fieldIndex ? "yellow" : "gray"}>{t(`common:project_fields.${name}`)}</Text>
          </Box>
          {idx === fieldIndex ? (
            <TextInput
              value={values[name]}
              onChange={(value) => setValues((prev) => ({ ...prev, [name]: value }))}
              onSubmit={handleSubmit}
            />
          ) : (
            <Text color="white">{values[name]}</Text>
          )}
        </Box>
      ))}

      <Box marginTop={1}>
        <Text color="gray" dimColor>
          {field === "gitBranch" ? t("common:project_form.hints_last") : t("common:project_form.hints")}
        </Text>
      </Box>
    </Box>
  );
}
