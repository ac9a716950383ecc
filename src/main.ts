#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";

import { createBackend } from "./ai/backend.js";
import { RequestCoordinator } from "./async/coordinator.js";
import { loadConfig } from "./config.js";
import { Editor } from "./editor/editor.js";
import { projectRootOrCwd } from "./editor/project.js";
import { ExitSignal, getErrorMessage } from "./errors.js";
import { SystemClipboard } from "./io/clipboard.js";
import { LocalFileStore } from "./io/files.js";
import { configureLogger, logger } from "./logger.js";
import { RenderEngine } from "./render/renderer.js";
import { BlessedTerminal, routeExitEvents } from "./render/terminal.js";
import { SyntaxHighlighter } from "./syntax/highlighter.js";
import { LanguageRegistry } from "./syntax/languages.js";
import { CaptureStyles } from "./syntax/style.js";

function main() {
  const cwd = process.cwd();
  const root = projectRootOrCwd(cwd);
  const { config, credentials } = loadConfig(root);
  configureLogger({ file: path.resolve(root, config.logFile), level: config.logLevel });
  logger.info("Starting", { root });

  const captures = config.captureStyles
    ? CaptureStyles.fromFile(path.resolve(root, config.captureStyles))
    : CaptureStyles.fromFile();
  const editor = new Editor({
    files: new LocalFileStore(cwd),
    clipboard: new SystemClipboard(),
    coordinator: new RequestCoordinator(createBackend(config, credentials)),
    highlighter: new SyntaxHighlighter(new LanguageRegistry(), captures),
  });

  const target = process.argv[2] ?? path.resolve(root, config.defaultDocument);
  if (fs.existsSync(target)) editor.openOrNew(target);
  else editor.newDocument(target);

  const terminal = new BlessedTerminal();
  const renderer = new RenderEngine(terminal, config.tabWidth);
  let timer: NodeJS.Timeout | undefined;

  const shutdown = (error?: unknown) => {
    clearInterval(timer);
    terminal.stop();
    if (error === undefined || error instanceof ExitSignal) {
      logger.info("Exiting");
      process.exit(0);
    }
    logger.error("Fatal error", { error: getErrorMessage(error) });
    console.error(`quillpad: ${getErrorMessage(error)}`);
    process.exit(1);
  };

  const draw = () => renderer.render(editor, terminal.cols, terminal.rows);

  terminal.start();
  terminal.onResize(() => {
    renderer.invalidate();
    draw();
  });
  terminal.onKey((key) => {
    try {
      if (editor.handleKey(key) === "quit") throw new ExitSignal();
      draw();
    } catch (error) {
      shutdown(error);
    }
  });
  routeExitEvents(process, shutdown);

  timer = setInterval(() => {
    try {
      editor.checkResponses();
      draw();
    } catch (error) {
      shutdown(error);
    }
  }, config.frameIntervalMs);
  draw();
}

try {
  main();
} catch (error) {
  logger.error("Startup failed", { error: getErrorMessage(error) });
  console.error(`quillpad: ${getErrorMessage(error)}`);
  process.exit(1);
}
