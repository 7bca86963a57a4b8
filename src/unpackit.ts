#!/usr/bin/env node
import { fail, initUI } from './utils/ui';
import { CancelledError, UsageError, errorMessage } from './errors';
import { parseArguments, type ParsedArguments } from './commands/option-parser';
import { handleHelpCommand } from './commands/help-command';
import { handleVersionCommand } from './commands/version-command';
import { handleListExtensionsCommand } from './commands/list-extensions-command';
import { getConfigPath, loadConfigFile, resolveRunOptions } from './config/config-loader';
import { createLogger, levelFromVerbosity } from './utils/logger';
import { restoreTerminalEcho } from './utils/process-utils';
import { installAbortHandlers } from './runner/abort-handler';
import { createRunContext, type RunContext } from './runner/run-context';
import { ArchiveRunner } from './runner/archive-runner';
import { ExtractAction, ListAction } from './runner/actions';

const EXIT_USAGE = 2;

function usageFailure(message: string): number {
  process.stderr.write(`${fail(`${message} (try --help)`)}\n`);
  return EXIT_USAGE;
}

async function main(argv: string[]): Promise<number> {
  await initUI();

  let parsed: ParsedArguments;
  try {
    parsed = parseArguments(argv);
  } catch (error) {
    if (error instanceof UsageError) return usageFailure(error.message);
    throw error;
  }

  switch (parsed.command) {
    case 'help':
      handleHelpCommand();
      return 0;
    case 'version':
      handleVersionCommand();
      return 0;
    case 'list-extensions':
      handleListExtensionsCommand();
      return 0;
    case 'run':
      break;
  }

  const bootLogger = createLogger(levelFromVerbosity(parsed.cli.verbose, parsed.cli.quiet));
  const controller = new AbortController();
  let ctx: RunContext;
  try {
    const fileSettings = await loadConfigFile(getConfigPath(), bootLogger);
    const options = resolveRunOptions(parsed.cli, fileSettings);
    ctx = createRunContext({
      options,
      logger: createLogger(options.logLevel),
      signal: controller.signal,
    });
  } catch (error) {
    if (error instanceof UsageError) return usageFailure(error.message);
    throw error;
  }

  const removeHandlers = installAbortHandlers(controller, ctx.logger);
  const showHeaders = parsed.archives.length > 1;
  const action = ctx.options.showList
    ? new ListAction(ctx, showHeaders)
    : new ExtractAction(ctx, showHeaders);

  try {
    const summary = await new ArchiveRunner(ctx, action).run(parsed.archives, process.cwd());
    return summary.exitCode;
  } catch (error) {
    if (error instanceof CancelledError) {
      ctx.logger.debug('cancelled');
      return 1;
    }
    throw error;
  } finally {
    ctx.prompter.close();
    removeHandlers();
    restoreTerminalEcho();
  }
}

// A reader that goes away early (`unpackit -l x.zip | head`) is not an error
process.stdout.on('error', (error: NodeJS.ErrnoException) => {
  if (error.code === 'EPIPE') process.exit(0);
  throw error;
});

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`${fail(errorMessage(error))}\n`);
    process.exitCode = 1;
  }
);
