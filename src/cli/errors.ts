export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/**
 * A failure reading input from, or drawing to, the terminal. Ends the
 * interactive session.
 */
export class TerminalIoError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TerminalIoError';
  }
}
