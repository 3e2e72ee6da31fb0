// ============================================================================
// REMINDER SCHEDULER
// ============================================================================
// Persists reminders and delivers the due ones. A reminder is claimed in
// storage before it is handed to the notifier, so two pollers never deliver
// the same reminder twice.

import { createReminder, type IStorage } from "../storage/index.js";
import type { Reminder } from "../types/index.js";
import { formatLocalIso, parseTimestamp } from "./time.js";

/**
 * Delivery channel for due reminders. Throwing marks the delivery failed and
 * the reminder is retried on the next pass.
 */
export interface ReminderNotifier {
  notify(reminder: Reminder): Promise<void>;
}

export class ConsoleNotifier implements ReminderNotifier {
  async notify(reminder: Reminder): Promise<void> {
    console.log(`\x1b[33m⏰ ${reminder.message}\x1b[0m \x1b[90m(${reminder.fireAt})\x1b[0m`);
  }
}

export interface DeliveryReport {
  delivered: Reminder[];
  failed: Array<{ reminder: Reminder; error: string }>;
}

export class ReminderScheduler {
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<DeliveryReport> | null = null;

  constructor(
    private readonly storage: IStorage,
    private readonly notifier: ReminderNotifier = new ConsoleNotifier()
  ) {}

  /**
   * Store a reminder. `fireAt` may carry an offset; it is stored as local
   * wall-clock time.
   */
  async schedule(message: string, fireAt: string, now = new Date()): Promise<Reminder> {
    const text = message.trim();
    if (!text) throw new Error("Reminder message is required");

    const when = parseTimestamp(fireAt);
    if (!when) throw new Error(`Invalid reminder time: ${fireAt}`);

    const reminder = createReminder({ message: text, fireAt: formatLocalIso(when) }, now);
    await this.storage.saveReminder(reminder);
    return reminder;
  }

  /**
   * One delivery pass over every reminder due at `now`.
   */
  async deliverDue(now = new Date()): Promise<DeliveryReport> {
    const report: DeliveryReport = { delivered: [], failed: [] };
    const due = await this.storage.listDueReminders(now);

    for (const reminder of due) {
      const claimed = await this.storage.claimReminder(reminder.id, now);
      if (!claimed) continue;

      try {
        await this.notifier.notify(reminder);
        report.delivered.push({ ...reminder, sent: true, sentAt: now.toISOString() });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`\x1b[31mReminder delivery failed (${reminder.id}): ${message}\x1b[0m`);
        await this.storage.releaseReminder(reminder.id);
        report.failed.push({ reminder, error: message });
      }
    }

    return report;
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Poll for due reminders every `intervalMs`. Passes never overlap.
   */
  start(intervalMs: number): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.tick();
    }, intervalMs);
    this.timer.unref();
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.running) await this.running;
  }

  private async tick(): Promise<void> {
    if (this.running) return;
    this.running = this.deliverDue();
    try {
      await this.running;
    } catch (error) {
      console.error(`\x1b[31mReminder poll failed: ${error instanceof Error ? error.message : String(error)}\x1b[0m`);
    } finally {
      this.running = null;
    }
  }
}
