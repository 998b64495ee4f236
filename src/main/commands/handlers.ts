/**
 * Command Runner
 *
 * WHY THIS FILE EXISTS:
 * - Gives every CLI command the same logging and error handling
 * - Converts any thrown error into a CommandErrorResponse so the entry
 *   point only has to look at `success`
 */

import { ExportCancelledError, formatIssues, ManifestError, ValidationError } from '../errors';
import { createLogger } from '../logger';
import { CommandErrorResponse, CommandName, CommandResult } from '../../types/commands';

const log = createLogger('CLI');

export function toErrorResponse(error: unknown): CommandErrorResponse {
  if (error instanceof ValidationError || error instanceof ManifestError) {
    return {
      success: false,
      error: error.message,
      details: error.issues.length > 0 ? formatIssues(error.issues) : undefined,
    };
  }
  if (error instanceof ExportCancelledError) {
    return { success: false, error: error.message };
  }
  return {
    success: false,
    error: error instanceof Error ? error.message : 'Unknown error occurred',
    details: error instanceof Error ? error.stack : String(error),
  };
}

/**
 * Run a command with logging and structured error handling.
 *
 * @example
 * const result = await runCommand(COMMANDS.PLAN, () => buildPlan({ manifestPath }));
 * if (isCommandError(result)) process.exitCode = 1;
 */
export async function runCommand<T>(
  command: CommandName,
  handler: () => Promise<T>
): Promise<CommandResult<T>> {
  const startTime = Date.now();
  log.debug(`Running '${command}'`);

  try {
    const result = await handler();
    log.debug(`'${command}' completed successfully (${Date.now() - startTime}ms)`);
    return result;
  } catch (error) {
    log.debug(`'${command}' failed after ${Date.now() - startTime}ms`);
    if (!(error instanceof ValidationError || error instanceof ManifestError || error instanceof ExportCancelledError)) {
      log.error(`Error in '${command}':`, error);
    }
    return toErrorResponse(error);
  }
}
