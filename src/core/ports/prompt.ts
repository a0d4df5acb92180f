/**
 * Prompt Port Interface
 *
 * Defines the contract for the interactive questions the uninstaller asks.
 * Core logic uses this interface instead of @clack/prompts or readline directly,
 * so automated callers and tests can supply answers programmatically.
 *
 * Implementations:
 *   - ClackPromptAdapter (CLI, rich mode): routes to @clack/prompts
 *   - PlainPromptAdapter (CLI, plain mode): one readline answer per question
 *   - NonInteractivePromptAdapter (CI/default): throws on prompt attempts
 */

/**
 * A single choice option for select prompts.
 */
export interface PromptChoice<T = string> {
  title: string;
  value: T;
  description?: string;
}

/**
 * PromptPort defines all interactive prompt operations.
 */
export interface PromptPort {
  /** Prompt for a yes/no confirmation */
  confirm(message: string, initial?: boolean): Promise<boolean>;

  /** Prompt user to select one item from a list */
  select<T>(
    message: string,
    choices: Array<PromptChoice<T>>,
    hint?: string
  ): Promise<T>;
}
