/**
 * comparebar - comparison bar charts with a highlighted category,
 * inside/outside value labels and an aim line.
 *
 * Main entry point for the library.
 */

// Re-export plotting
export * from "./plot/index.ts";
// Re-export errors
export {
	ColumnNotFoundError,
	ComparebarError,
	TypeMismatchError,
	ValidationError,
} from "./errors/index.ts";
// Re-export Result helpers
export { err, ok, unwrap, unwrapErr, type Result } from "./types/result.ts";
