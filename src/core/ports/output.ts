/**
 * Output Port Interface
 *
 * Contract for user-facing output. Commands use this interface instead of
 * console.log or @clack/prompts directly.
 *
 * Implementations:
 *   - createClackOutput (CLI, interactive terminal)
 *   - consoleOutput (default, CI and piped output)
 */

export interface UnifiedSpinner {
  start(message: string): void;
  stop(finalMessage?: string): void;
  message(text: string): void;
}

export interface OutputPort {
  info(message: string): void;
  /** Plain message, no decoration */
  message(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Boxed block of content with an optional title */
  note(content: string, title?: string): void;
  spinner(): UnifiedSpinner;
}
