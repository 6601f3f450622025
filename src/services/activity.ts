/**
 * Activity recorder
 *
 * Appends to the activity feed and mirrors each event to the process log.
 * A failed append is logged and dropped; it never reaches the caller.
 */
import type { ActivityKind } from "../db/schema";
import type { ActivityLog } from "../store";
import { componentLogger } from "../logger";
import { errorMessage } from "../errors";

const logger = componentLogger("activity");

export class ActivityRecorder {
  constructor(private readonly log: ActivityLog) {}

  async record(
    watchId: number | null,
    kind: ActivityKind,
    message: string,
    details?: Record<string, unknown>
  ): Promise<void> {
    const context = { watchId, kind, ...details };
    if (kind === "error") {
      logger.warn(context, message);
    } else {
      logger.info(context, message);
    }

    try {
      await this.log.append(watchId, kind, message, details);
    } catch (error) {
      logger.error(
        { watchId, kind, error: errorMessage(error) },
        "Failed to append activity event"
      );
    }
  }
}
