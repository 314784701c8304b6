import { ConsoleLogger } from '@nestjs/common';
import type { LogLevel } from '@nestjs/common';

export type Verbosity = 'quiet' | 'normal' | 'verbose';

export function logLevelsFor(verbosity: Verbosity): LogLevel[] {
  if (verbosity === 'quiet') return ['error', 'warn'];
  if (verbosity === 'verbose') return ['error', 'warn', 'log', 'debug', 'verbose'];
  return ['error', 'warn', 'log'];
}

/**
 * Console logger for the CLI. Everything goes to stderr so stdout carries
 * only the report.
 */
export class CliLogger extends ConsoleLogger {
  constructor(verbosity: Verbosity) {
    super('tvledger', { logLevels: logLevelsFor(verbosity) });
  }

  protected override printMessages(
    messages: unknown[],
    context?: string,
    logLevel?: LogLevel,
  ) {
    super.printMessages(messages, context, logLevel, 'stderr');
  }
}
