import * as p from '@clack/prompts';
import { getLogger } from '@tallyview/logger';
import pc from 'picocolors';

import { ERROR_TIPS } from './cli-error.ts';
import { createErrorResponse, createSuccessResponse, exitCodeToErrorCode } from './cli-response.ts';
import { ExitCodes, type ExitCode } from './exit-codes.ts';

const logger = getLogger('OutputManager');

export type OutputFormat = 'json' | 'text';

/**
 * Formats and displays CLI output, human-readable or JSON.
 */
export class OutputManager {
  private readonly startTime = Date.now();

  constructor(private readonly format: OutputFormat = 'text') {}

  isJsonMode(): boolean {
    return this.format === 'json';
  }

  isTextMode(): boolean {
    return this.format === 'text';
  }

  /**
   * Print the result: the text rendering in text mode, the response envelope in JSON mode.
   */
  success<T>(command: string, data: T, text: string, metadata?: Record<string, unknown>): void {
    if (this.format === 'json') {
      const response = createSuccessResponse(command, data, {
        duration_ms: Date.now() - this.startTime,
        ...metadata,
      });
      console.log(JSON.stringify(response, undefined, 2));
      return;
    }
    console.log(text);
  }

  /**
   * Report an error and set the process exit code.
   */
  error(command: string, error: Error, exitCode: ExitCode = ExitCodes.GENERAL_ERROR): void {
    const errorCode = exitCodeToErrorCode(exitCode);

    if (this.format === 'json') {
      // JSON errors go to stdout so callers can parse them
      console.log(JSON.stringify(createErrorResponse(command, error, errorCode), undefined, 2));
    } else {
      this.displayTextError(error, errorCode);
    }

    process.exitCode = exitCode;
  }

  /**
   * Display a spinner (text mode only).
   */
  spinner(): ReturnType<typeof p.spinner> | undefined {
    return this.format === 'json' ? undefined : p.spinner();
  }

  private displayTextError(error: Error, code: string): void {
    p.log.error(`${pc.red('Error')}: ${error.message}`);

    const tip = ERROR_TIPS[code];
    if (tip) {
      p.note(tip, 'Tip');
    }

    if (process.env['NODE_ENV'] === 'development' && error.stack) {
      logger.debug(`Stack trace:\n${error.stack}`);
    }
  }
}
