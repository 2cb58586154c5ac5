import { GraphError, type GraphErrorCode } from "@routegraph/contracts";

/**
 * Run `fn` and return the code of the GraphError it throws, if any.
 */
export function thrownCode(fn: () => unknown): GraphErrorCode | undefined {
  try {
    fn();
  } catch (error) {
    if (GraphError.isGraphError(error)) return error.code;
    throw error;
  }
  return undefined;
}
