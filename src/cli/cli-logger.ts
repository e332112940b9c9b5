import { ConsoleLogger, LogLevel } from '@nestjs/common';

const LOG_LEVELS: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

export type LogFlags = {
  verbose?: boolean;
  quiet?: boolean;
};

/**
 * Turns `LOG_LEVEL` plus the global flags into the list Nest expects.
 * `--quiet` wins over `--verbose`; an unknown level falls back to `log`.
 */
export function resolveLogLevels(configured: string | undefined, flags: LogFlags = {}): LogLevel[] {
  if (flags.quiet) {
    return ['fatal', 'error'];
  }
  if (flags.verbose) {
    return [...LOG_LEVELS];
  }
  const index = LOG_LEVELS.findIndex((level) => level === configured?.trim().toLowerCase());
  return LOG_LEVELS.slice(0, (index === -1 ? LOG_LEVELS.indexOf('log') : index) + 1);
}

// stdout is reserved for command output
export class CliLogger extends ConsoleLogger {
  protected printMessages(messages: unknown[], context?: string, logLevel?: LogLevel): void {
    super.printMessages(messages, context, logLevel, 'stderr');
  }
}
