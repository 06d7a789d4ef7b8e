/**
 * CLI errors: bad command-line input, plus one place that turns any failure
 * into the text shown to the user
 */

import { ToolboxError } from '../src/errors.js';

export enum ErrorType {
  InvalidParams = 'invalid_params',
  InvalidOption = 'invalid_option'
}

export class CommandError extends Error {
  constructor(
    public readonly type: ErrorType,
    public readonly context: Record<string, string>,
    message?: string
  ) {
    super(message || `Command error: ${type}`);
    this.name = 'CommandError';
    Error.captureStackTrace(this, this.constructor);
  }

  format(): string {
    switch (this.type) {
      case ErrorType.InvalidParams:
        return `Invalid parameters: ${this.context.reason}`;

      case ErrorType.InvalidOption:
        return `Invalid value for ${this.context.option}: '${this.context.value}'\nExpected ${this.context.expected}`;

      default:
        return this.message || 'Unknown error';
    }
  }
}

export class InvalidParamsError extends CommandError {
  constructor(reason: string) {
    super(ErrorType.InvalidParams, { reason }, `Invalid parameters: ${reason}`);
  }
}

/**
 * Malformed `--auth` / `--header` entry
 */
export class InvalidOptionError extends CommandError {
  constructor(option: string, value: string, expected: string) {
    super(ErrorType.InvalidOption, { option, value, expected }, `Invalid value for ${option}: '${value}'`);
  }
}

/**
 * Text shown for a failed command
 */
export function describeError(error: unknown): string {
  if (error instanceof CommandError || error instanceof ToolboxError) {
    return error.format();
  }
  return error instanceof Error ? error.message : String(error);
}
