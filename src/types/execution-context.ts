/**
 * Execution context shared by command handlers.
 */

import type { OutputPort } from '../core/ports/output.js';

export interface ExecutionOptions {
  /** Project directory; relative values resolve against process.cwd() */
  cwd?: string;
}

export interface ExecutionContext {
  /** Directory the command was started from */
  sourceCwd: string;
  /** Absolute project root holding the cabal files */
  projectRoot: string;
  /** User-facing output; defaults to the plain console adapter */
  output?: OutputPort;
  /** Whether the session can render spinners and rich output */
  interactive: boolean;
}
