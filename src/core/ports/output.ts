/**
 * Output Port Interface
 *
 * Defines the contract for all user-facing output operations.
 * Core logic uses this interface instead of console.log or @clack/prompts directly.
 *
 * Implementations:
 *   - createClackOutput (CLI, interactive): routes to @clack/prompts
 *   - createPlainOutput (CLI, CI and host hooks): plain console output
 *   - consoleOutput (default when no port is injected)
 */

export interface OutputPort {
  /** Display an informational message */
  info(message: string): void;

  /** Display a step/progress indicator */
  step(message: string): void;

  /** Display a plain message */
  message(message: string): void;

  /** Display a success message */
  success(message: string): void;

  /**
   * Display a pre-formatted block that must stand out. Lines arrive
   * unstyled; terminal adapters may highlight the non-empty ones.
   */
  alert(lines: readonly string[]): void;
}
