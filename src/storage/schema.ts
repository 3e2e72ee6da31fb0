// ============================================================================
// PERSISTED SHAPES
// ============================================================================
// Stored JSON is validated on the way back in, whatever backend holds it.

import { z } from "zod";

import type { IdeaTree, Reminder, UnclassifiedNote } from "../types/index.js";
import type { StorageSnapshot } from "./interface.js";

export const SubgroupSchema = z.object({
  name: z.string(),
  ideas: z.array(z.string()),
});

export const GroupSchema = z.object({
  name: z.string(),
  ideas: z.array(z.string()),
  subgroups: z.array(SubgroupSchema),
});

export const IdeaTreeSchema = z.object({
  groups: z.array(GroupSchema),
});

export const ReminderSchema = z.object({
  id: z.string(),
  message: z.string(),
  fireAt: z.string(),
  sent: z.boolean(),
  createdAt: z.string(),
  sentAt: z.string().optional(),
});

export const UnclassifiedNoteSchema = z.object({
  id: z.string(),
  text: z.string(),
  reason: z.string(),
  createdAt: z.string(),
});

export const SnapshotSchema = z.object({
  tree: IdeaTreeSchema,
  reminders: z.array(ReminderSchema).default([]),
  unclassified: z.array(UnclassifiedNoteSchema).default([]),
});

export function parseTree(value: unknown): IdeaTree {
  return IdeaTreeSchema.parse(value);
}

export function parseReminder(value: unknown): Reminder {
  return ReminderSchema.parse(value);
}

export function parseUnclassifiedNote(value: unknown): UnclassifiedNote {
  return UnclassifiedNoteSchema.parse(value);
}

export function parseSnapshot(value: unknown): StorageSnapshot {
  return SnapshotSchema.parse(value);
}
