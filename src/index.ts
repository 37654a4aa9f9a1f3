#!/usr/bin/env node

import React from "react";
import { render } from "ink";
import { App } from "./app.js";
import { ProjectStore } from "./projects/store.js";
import { loadConfig, type SyncPairConfig } from "./utils/config.js";
import { formatErrorForUser } from "./utils/errors.js";
import { getLogger } from "./utils/logger.js";
import { changeLanguage, initI18n } from "./i18n/index.js";

async function main(): Promise<number> {
  await initI18n();

  let config: SyncPairConfig;
  try {
    config = await loadConfig();
  } catch (err) {
    console.error(formatErrorForUser(err, "detailed"));
    return 1;
  }
  await changeLanguage(config.language);

  // Ink owns the terminal; console logging only when debugging
  const logger = getLogger();
  logger.configure({ debug: config.debug, logToFile: config.logToFile, quiet: !config.debug });
  await logger.init();

  const store = new ProjectStore();
  await store.load();

  const { waitUntilExit } = render(React.createElement(App, { config, store }));
  await waitUntilExit();
  await logger.close();
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("syncpair failed to start:", formatErrorForUser(err, "detailed"));
    process.exit(1);
  });
