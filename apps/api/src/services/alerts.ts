import type { AlertPayload, ChangeEvent } from "../types/claims";
import { logger as defaultLogger, type Logger } from "./logger";

/**
 * Downstream consumer of change events (email, Slack, dashboards).
 */
export interface AlertDispatcher {
  dispatch(alert: AlertPayload): Promise<void>;
}

export function toAlertPayload(event: ChangeEvent): AlertPayload {
  return {
    competitor_id: event.competitorId,
    change_type: event.changeType,
    severity: event.severity,
    previous_value: event.previousValue,
    new_value: event.newValue,
    detected_at: event.detectedAt.toISOString()
  };
}

export class LoggingAlertDispatcher implements AlertDispatcher {
  constructor(private readonly log: Logger = defaultLogger) {}

  async dispatch(alert: AlertPayload): Promise<void> {
    const emit = alert.severity === "high" ? this.log.warn : this.log.info;
    emit(`Alert: ${alert.change_type}`, {
      competitorId: alert.competitor_id,
      severity: alert.severity,
      detectedAt: alert.detected_at
    });
  }
}
