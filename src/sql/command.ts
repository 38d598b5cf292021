/**
 * Command Types
 *
 * Typed values produced by the classifier and consumed by the executor.
 * Two disjoint families: meta commands (shell directives starting with `.`)
 * and queries (data directives identified by a keyword prefix).
 */

/**
 * Shell directives.
 */
export type MetaCommand = "exit" | "help";

/**
 * Data directives. Arguments are not parsed yet.
 */
export type Query = "insert" | "select";

/**
 * A classified command.
 */
export type CommandKind =
  | { type: "meta"; command: MetaCommand }
  | { type: "query"; query: Query };

/**
 * Reusable command slot.
 *
 * Created once per session and overwritten on every classification.
 * `variant` is null before the first successful classification and after
 * a failed one.
 */
export class Command {
  variant: CommandKind | null = null;

  set(kind: CommandKind): void {
    this.variant = kind;
  }

  reset(): void {
    this.variant = null;
  }
}
