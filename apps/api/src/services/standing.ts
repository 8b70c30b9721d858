import { EventEmitter } from "node:events";
import type { FastifyBaseLogger } from "fastify";
import type { Standing, StandingTransition } from "@tollgate/shared";

/**
 * under_limit below 80%, warning_zone from 80% up to the limit, blocked at the
 * limit. Integer arithmetic keeps the 80% edge exact.
 */
export function standingFor(used: number, limit: number): Standing {
  if (used >= limit) {
    return "blocked";
  }
  if (used * 5 >= limit * 4) {
    return "warning_zone";
  }
  return "under_limit";
}

/** Consumer side of the notification collaborator. Emission only; delivery is theirs. */
export interface StandingNotifier {
  notify(transition: StandingTransition): void;
}

/** Hands a transition to the notifier. A notifier fault is logged and never reaches the decision. */
export function emitTransition(
  notifier: StandingNotifier,
  transition: StandingTransition,
  logger: FastifyBaseLogger
): void {
  try {
    notifier.notify(transition);
  } catch (error) {
    logger.warn(
      { err: error, layer: transition.layer, subject: transition.subject, to: transition.to },
      "Standing notification failed"
    );
  }
}

const TRANSITION = "standing.transition";

export class StandingEvents implements StandingNotifier {
  private readonly emitter = new EventEmitter();

  constructor(private readonly logger: FastifyBaseLogger) {}

  notify(transition: StandingTransition): void {
    this.logger.info(
      {
        layer: transition.layer,
        subject: transition.subject,
        resourceType: transition.resourceType,
        from: transition.from,
        to: transition.to,
        used: transition.used,
        limit: transition.limit
      },
      "Standing changed"
    );

    try {
      this.emitter.emit(TRANSITION, transition);
    } catch (error) {
      this.logger.warn({ err: error, subject: transition.subject }, "Standing listener failed");
    }
  }

  onTransition(listener: (transition: StandingTransition) => void): () => void {
    this.emitter.on(TRANSITION, listener);
    return () => {
      this.emitter.off(TRANSITION, listener);
    };
  }
}
