/**
 * Shared types for CLI commands.
 */

export interface Command {
  name: string;
  description: string;
  usage: string;
  /** Receives the arguments after the command name */
  handler: (args: string[]) => Promise<void>;
}

/** Process exit codes */
export const ExitCode = {
  /** Runtime failure, including a search with no results */
  ERROR: 1,
  /** Bad arguments */
  USAGE: 2,
  /** Invalid configuration */
  CONFIG: 3,
} as const;
