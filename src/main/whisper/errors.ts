import { ExitCode } from '../../shared/types';

/**
 * Failure that ends a mode before or instead of normal completion.
 * The exit code travels with it up to the CLI boundary.
 */
export class WhisperError extends Error {
  constructor(
    message: string,
    public readonly exitCode: ExitCode,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'WhisperError';
  }
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
