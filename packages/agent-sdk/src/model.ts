/**
 * ModelClient: the single language-model call an iteration makes.
 *
 * Transport, retries at the HTTP layer and pricing are the client's business.
 * The loop hands it one prompt and expects the raw reply text back.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Prompt
// ─────────────────────────────────────────────────────────────────────────────

export interface Prompt {
  /** Instructions: task, tool usage, reflection/action rules, reply format */
  system: string;
  /** Memory: code context, lessons, diff, reasoning chain, incoming operation */
  user: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// ModelClient interface
// ─────────────────────────────────────────────────────────────────────────────

export interface ModelClient {
  /**
   * Returns the raw reply text.
   * The signal fires on timeout or cancellation; clients should stop work.
   */
  invoke(prompt: Prompt, signal: AbortSignal): Promise<string>;
}
