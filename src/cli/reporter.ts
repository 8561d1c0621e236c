import {
  describeError,
  formatMutation,
  type ConvergeObservers
} from "@incus-converge/reconcile";
import { redactMutation } from "../utils/redact.js";
import type { ScopedLogger } from "./logger.js";

/** Converger observers that narrate phases and mutations in verbose mode. */
export function createConvergeReporter(logger: ScopedLogger): ConvergeObservers {
  return {
    onPhase(phase, identity) {
      logger.verbose(`${identity}: ${phase}`);
    },
    onMutationComplete(identity, mutation) {
      logger.verbose(`${identity}: ${formatMutation(redactMutation(mutation))}`);
    },
    onMutationError(identity, mutation, error) {
      logger.verbose(
        `${identity}: ${formatMutation(redactMutation(mutation))} failed: ${describeError(error)}`
      );
    }
  };
}
