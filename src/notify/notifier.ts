import { logger } from "../logger.js";
import { formatEvent, type NotifyEvent } from "./format.js";

const log = logger.child("notifier");

export interface MessageSender {
  send(sessionId: string, text: string): Promise<void>;
}

export interface DeliveryReport {
  delivered: string[];
  failed: string[];
}

export class Notifier {
  constructor(private readonly sender: MessageSender) {}

  async notify(event: NotifyEvent, recipients: string[]): Promise<DeliveryReport> {
    const text = formatEvent(event);
    return this.broadcast(text, recipients, event.type);
  }

  /** Best-effort fan-out: one failed chat never blocks the others. */
  private async broadcast(text: string, recipients: string[], label: string): Promise<DeliveryReport> {
    const results = await Promise.allSettled(
      recipients.map(async (sessionId) => this.sender.send(sessionId, text)),
    );

    const report: DeliveryReport = { delivered: [], failed: [] };
    results.forEach((result, index) => {
      const sessionId = recipients[index];
      if (sessionId === undefined) return;
      if (result.status === "fulfilled") {
        report.delivered.push(sessionId);
        return;
      }
      report.failed.push(sessionId);
      log.warn("Failed to notify session", {
        sessionId,
        event: label,
        message: result.reason instanceof Error ? result.reason.message : String(result.reason),
      });
    });

    log.info("Notification dispatched", {
      event: label,
      delivered: report.delivered.length,
      failed: report.failed.length,
    });
    return report;
  }
}
