import * as p from "@clack/prompts";
import pc from "picocolors";

export interface Notifier {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  // The user backed out; not a failure
  cancel(message: string): void;
  // Only printed with --verbose
  debug(message: string): void;
}

export interface NotifierOptions {
  verbose?: boolean;
}

export function createNotifier(options: NotifierOptions = {}): Notifier {
  return {
    info: (message) => p.log.info(message),
    success: (message) => p.log.success(pc.green(message)),
    warn: (message) => p.log.warn(pc.yellow(message)),
    error: (message) => p.log.error(pc.red(message)),
    cancel: (message) => p.log.info(pc.yellow(message)),
    debug: (message) => {
      if (options.verbose) p.log.message(pc.dim(message));
    },
  };
}

export type Outcome = "done" | "cancelled" | "failed";

export interface TrackedNotifier extends Notifier {
  // An error wins over a cancellation
  readonly outcome: Outcome;
}

/** Forwards everything to `notifier` and remembers how the run ended. */
export function trackOutcome(notifier: Notifier): TrackedNotifier {
  let outcome: Outcome = "done";
  return {
    ...notifier,
    get outcome() {
      return outcome;
    },
    error(message) {
      outcome = "failed";
      notifier.error(message);
    },
    cancel(message) {
      if (outcome === "done") outcome = "cancelled";
      notifier.cancel(message);
    },
  };
}
