/**
 * CLI entry point for teaty
 *
 * Runs the typing test on the Node terminal adapter.
 */

import { dirname } from 'path';
import { fileURLToPath } from 'url';
import * as p from '@clack/prompts';
import { helpText, parseCliArgs, type CliConfig } from './config';
import { createNodeTerminal } from './nodeTerminal';
import { runTypingTest, type TypingSummary } from './typing';
import { createRng } from './typing/random';
import { setTheme } from './typing/utils';
import { readPackageVersion } from './version';

const PACKAGE_NAME = 'teaty';

// ---------------------------------------------------------------------------
// Session
// ---------------------------------------------------------------------------

function formatSummary(summary: TypingSummary): string {
  return `Final speed: ${summary.wpm} WPM (${summary.characters} characters typed)`;
}

function start(config: CliConfig) {
  setTheme(config.theme);
  p.intro('Teaty Typing Speed Test');

  const terminal = createNodeTerminal({
    onFatal: (error) => {
      p.log.error(`Lost terminal input: ${error.message}`);
      process.exit(1);
    },
  });

  process.on('exit', () => terminal.restore());
  process.on('SIGTERM', () => { terminal.restore(); process.exit(0); });
  process.on('uncaughtException', (error) => {
    terminal.restore();
    p.log.error(error.stack ?? error.message);
    process.exit(1);
  });

  runTypingTest(terminal, {
    env: config.seed === undefined ? {} : { random: createRng(config.seed) },
    onQuit: (summary) => {
      terminal.restore();
      p.outro(formatSummary(summary));
      process.exit(0);
    },
  });
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

function main() {
  const command = parseCliArgs(process.argv.slice(2));

  switch (command.kind) {
    case 'help':
      console.log(helpText());
      return;
    case 'version':
      console.log(readPackageVersion(dirname(fileURLToPath(import.meta.url)), PACKAGE_NAME));
      return;
    case 'error':
      p.log.error(command.message);
      process.exit(1);
    case 'run':
      start(command.config);
      return;
  }
}

main();
