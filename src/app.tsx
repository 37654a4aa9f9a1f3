import React, { useState, useCallback, useMemo } from "react";
import { Box, useApp } from "ink";
import { MessageLog, type Message } from "./components/MessageLog.js";
import { StatusBar } from "./components/StatusBar.js";
import { ProjectPanel } from "./components/ProjectPanel.js";
import { OperationStatus, type OperationState } from "./components/OperationStatus.js";
import { CommandInput } from "./components/CommandInput.js";
import { ConflictDialog } from "./components/ConflictDialog.js";
import { CommitDialog } from "./components/CommitDialog.js";
import { ConfirmDialog } from "./components/ConfirmDialog.js";
import { ProjectForm } from "./components/ProjectForm.js";
import type { ProjectStore } from "./projects/store.js";
import type { Project, ProjectInput } from "./projects/types.js";
import { createSyncManager } from "./sync/manager.js";
import type { CommandRunner } from "./sync/commandRunner.js";
import type { Conflict, ConflictDecision, ConflictPosition, StatusTone, SyncReporter } from "./sync/types.js";
import type { SyncPairConfig } from "./utils/config.js";
import { formatErrorForUser } from "./utils/errors.js";
import { getLogger } from "./utils/logger.js";
import { t } from "./i18n/index.js";
import {
  commandRegistry,
  completedSync,
  parseCommandInput,
  type CommandRegistry,
  type CommandContext,
  type CommandPrompter,
  type CommandResult,
} from "./commands/index.js";

const logger = getLogger();

/**
 * The modal dialog currently waiting for the user, with the callback that
 * settles the prompter promise behind it.
 */
type Dialog =
  | { kind: "conflict"; conflict: Conflict; position: ConflictPosition; resolve: (decision: ConflictDecision | null) => void }
  | { kind: "commit"; changesSummary: string; resolve: (message: string | null) => void }
  | { kind: "confirm"; message: string; resolve: (confirmed: boolean) => void }
  | { kind: "project"; initial?: Project; resolve: (input: ProjectInput | null) => void };

interface AppProps {
  config: SyncPairConfig;
  store: ProjectStore;
  registry?: CommandRegistry;
  /** Replaces the shell runner */
  runner?: CommandRunner;
}

function welcomeMessage(): Message {
  return {
    role: "assistant",
    content: `${t("common:welcome.title")}\n${t("common:welcome.help_hint")}`,
    tone: "info",
  };
}

export function App({ config, store, registry = commandRegistry, runner }: AppProps) {
  const { exit } = useApp();
  const [messages, setMessages] = useState<Message[]>(() => [welcomeMessage()]);
  const [projects, setProjects] = useState<Project[]>(() => store.list());
  const [current, setCurrent] = useState<Project | undefined>(() => store.current());
  const [dialog, setDialog] = useState<Dialog | null>(null);
  const [status, setStatus] = useState<OperationState | null>(null);
  const [running, setRunning] = useState(false);
  const [startTime, setStartTime] = useState<number | undefined>(undefined);
  const [lastSync, setLastSync] = useState<Date | undefined>(undefined);

  // Each dialog settles its promise and closes itself
  const prompter = useMemo<CommandPrompter>(
    () => ({
      decideConflict: (conflict, position) =>
        new Promise<ConflictDecision | null>((resolve) => setDialog({ kind: "conflict", conflict, position, resolve })),
      askCommitMessage: (changesSummary) =>
        new Promise<string | null>((resolve) => setDialog({ kind: "commit", changesSummary, resolve })),
      confirm: (message) => new Promise<boolean>((resolve) => setDialog({ kind: "confirm", message, resolve })),
      editProject: (initial) =>
        new Promise<ProjectInput | null>((resolve) => setDialog({ kind: "project", initial, resolve })),
    }),
    []
  );

  const reporter = useMemo<SyncReporter>(
    () => ({
      status: (message: string, tone: StatusTone) => setStatus({ message, tone }),
    }),
    []
  );

  const manager = useMemo(
    () => createSyncManager({ config, prompter, reporter, runner }),
    [config, prompter, reporter, runner]
  );

  const commandNames = useMemo(() => registry.getAll().map((command) => command.name), [registry]);

  const refreshProjects = useCallback(() => {
    setProjects(store.list());
    setCurrent(store.current());
  }, [store]);

  const buildCommandContext = useCallback(
    (): CommandContext => ({
      store,
      manager,
      prompter,
      setStatus: (message, tone) => setStatus({ message, tone }),
      refreshProjects,
      exit,
    }),
    [store, manager, prompter, refreshProjects, exit]
  );

  const appendResult = useCallback((input: string, result: CommandResult) => {
    setMessages((prev) => {
      const next: Message[] = [...prev, { role: "user", content: input }];
      return result.response ? [...next, result.response] : next;
    });
  }, []);

  const handleSubmit = useCallback(
    async (input: string) => {
      if (running) return;

      const parsed = parseCommandInput(input);
      if (!parsed) {
        appendResult(input, {
          handled: false,
          response: { role: "assistant", content: t("common:input.not_a_command"), tone: "warning" },
        });
        return;
      }

      // Prefix matching: "/pu" is ambiguous, "/ful" runs /full-sync
      const matches = registry.findByPrefix(parsed.name);
      if (matches.length !== 1) {
        const content =
          matches.length === 0
            ? t("common:input.unknown_command", { name: parsed.name })
            : t("common:input.ambiguous_command", { matches: matches.map((name) => `/${name}`).join(", ") });
        appendResult(input, { handled: false, response: { role: "assistant", content, tone: "warning" } });
        return;
      }

      const commandName = matches[0];
      setRunning(true);
      setStartTime(Date.now());
      setStatus(null);

      let result: CommandResult;
      try {
        result = (await registry.execute(commandName, parsed.args, buildCommandContext())) ?? { handled: false };
      } catch (err) {
        logger.error("[App] Command failed", err);
        const message = formatErrorForUser(err);
        result = { handled: true, error: message, response: { role: "assistant", content: message, tone: "error" } };
      } finally {
        setRunning(false);
        setStartTime(undefined);
      }

      if (completedSync(commandName, result)) {
        setLastSync(new Date());
      }
      appendResult(input, result);
    },
    [running, registry, buildCommandContext, appendResult]
  );

  const renderDialog = (active: Dialog) => {
    const settle = () => setDialog(null);
    switch (active.kind) {
      case "conflict":
        return (
          <ConflictDialog
            key={`${active.position.index}:${active.conflict.file}`}
            conflict={active.conflict}
            position={active.position}
            onDecide={(decision) => {
              settle();
              active.resolve(decision);
            }}
          />
        );
      case "commit":
        return (
          <CommitDialog
            changesSummary={active.changesSummary}
            onSubmit={(message) => {
              settle();
              active.resolve(message);
            }}
          />
        );
      case "confirm":
        return (
          <ConfirmDialog
            message={active.message}
            onAnswer={(confirmed) => {
              settle();
              active.resolve(confirmed);
            }}
          />
        );
      case "project":
        return (
          <ProjectForm
            initial={active.initial}
            onSubmit={(projectInput) => {
              settle();
              active.resolve(projectInput);
            }}
          />
        );
    }
  };

  return (
    <Box flexDirection="column" padding={1}>
      <StatusBar project={current} projectCount={projects.length} lastSync={lastSync} />
      <ProjectPanel projects={projects} current={current} />
      <Box marginTop={1} flexDirection="column">
        <MessageLog messages={messages} />
      </Box>
      <OperationStatus state={status} running={running && !dialog} startTime={startTime} />
      {dialog ? (
        renderDialog(dialog)
      ) : (
        <CommandInput
          commandNames={commandNames}
          disabled={running}
          onSubmit={(value) => {
            void handleSubmit(value);
          }}
        />
      )}
    </Box>
  );
}
