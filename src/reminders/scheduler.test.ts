import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { MemoryStorage } from "../storage/memory.js";
import type { Reminder } from "../types/index.js";
import { ReminderScheduler, type ReminderNotifier } from "./scheduler.js";

const NOW = new Date(2026, 1, 28, 10, 0, 0);

class RecordingNotifier implements ReminderNotifier {
  readonly seen: string[] = [];

  constructor(private readonly failOn: string | null = null) {}

  async notify(reminder: Reminder): Promise<void> {
    if (reminder.message === this.failOn) throw new Error("channel closed");
    this.seen.push(reminder.message);
  }
}

describe("ReminderScheduler", () => {
  let storage: MemoryStorage;

  beforeEach(async () => {
    storage = new MemoryStorage();
    await storage.initialize();
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("schedule", () => {
    it("stores a trimmed message at the given local time", async () => {
      const scheduler = new ReminderScheduler(storage, new RecordingNotifier());
      const reminder = await scheduler.schedule("  regar las plantas ", "2026-03-01T09:00:00", NOW);

      expect(reminder.message).toBe("regar las plantas");
      expect(reminder.fireAt).toBe("2026-03-01T09:00:00");
      expect(reminder.sent).toBe(false);
      expect(await storage.listReminders()).toEqual([reminder]);
    });

    it("reads a bare date as local midnight", async () => {
      const scheduler = new ReminderScheduler(storage, new RecordingNotifier());
      const reminder = await scheduler.schedule("pagar alquiler", "2026-03-01", NOW);
      expect(reminder.fireAt).toBe("2026-03-01T00:00:00");
    });

    it("rejects an empty message", async () => {
      const scheduler = new ReminderScheduler(storage, new RecordingNotifier());
      await expect(scheduler.schedule("   ", "2026-03-01T09:00:00", NOW)).rejects.toThrow(
        "Reminder message is required"
      );
    });

    it("rejects a time it cannot read", async () => {
      const scheduler = new ReminderScheduler(storage, new RecordingNotifier());
      await expect(scheduler.schedule("algo", "mañana", NOW)).rejects.toThrow("Invalid reminder time: mañana");
    });
  });

  describe("deliverDue", () => {
    it("delivers due reminders once, oldest first", async () => {
      const notifier = new RecordingNotifier();
      const scheduler = new ReminderScheduler(storage, notifier);
      await scheduler.schedule("segundo", "2026-02-28T09:30:00", NOW);
      await scheduler.schedule("primero", "2026-02-28T08:00:00", NOW);
      await scheduler.schedule("futuro", "2026-02-28T11:00:00", NOW);

      const report = await scheduler.deliverDue(NOW);
      expect(notifier.seen).toEqual(["primero", "segundo"]);
      expect(report.delivered.map((r) => r.sent)).toEqual([true, true]);
      expect(report.failed).toEqual([]);

      const again = await scheduler.deliverDue(NOW);
      expect(again.delivered).toEqual([]);
      expect(notifier.seen).toEqual(["primero", "segundo"]);
    });

    it("releases a reminder whose delivery failed so the next pass retries it", async () => {
      const scheduler = new ReminderScheduler(storage, new RecordingNotifier("roto"));
      const reminder = await scheduler.schedule("roto", "2026-02-28T09:00:00", NOW);

      const report = await scheduler.deliverDue(NOW);
      expect(report.delivered).toEqual([]);
      expect(report.failed).toEqual([{ reminder, error: "channel closed" }]);

      const [stored] = await storage.listReminders();
      expect(stored.sent).toBe(false);
      expect(await storage.listDueReminders(NOW)).toHaveLength(1);
    });
  });

  describe("polling", () => {
    it("starts and stops", async () => {
      const scheduler = new ReminderScheduler(storage, new RecordingNotifier());
      expect(scheduler.isRunning).toBe(false);

      scheduler.start(60_000);
      expect(scheduler.isRunning).toBe(true);

      await scheduler.stop();
      expect(scheduler.isRunning).toBe(false);
    });
  });
});
