import { getLogger } from "../../config";
import { isInheritanceError } from "../../definers/defineError";

/**
 * Runs a release that may end in user `dispose` hooks. A failing hook is
 * logged at `error` and does not reach the caller, whose own result or
 * failure stands. Fatal library errors still propagate.
 */
export function releaseOrReport(release: () => void, what: string): void {
  try {
    release();
  } catch (error) {
    if (isInheritanceError(error) && error.fatal) {
      throw error;
    }
    getLogger().error(`Disposing ${what} failed`, {
      source: "dispose",
      error,
    });
  }
}
