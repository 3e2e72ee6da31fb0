// ============================================================================
// tRPC SETUP
// ============================================================================
// Base tRPC configuration for the server.

import { initTRPC } from "@trpc/server";
import { z } from "zod";

import type { IdeaTreeEngine } from "../engine/index.js";
import { DecodeError, isEngineError } from "../engine/errors.js";
import type { ReminderScheduler } from "../reminders/scheduler.js";
import type { IStorage } from "../storage/index.js";
import type { IdeaTreeConfig } from "../types/index.js";

// ---- Context ----

export interface TRPCContext {
  engine: IdeaTreeEngine;
  storage: IStorage;
  scheduler: ReminderScheduler;
  config: IdeaTreeConfig;
}

// ---- tRPC Instance ----

const t = initTRPC.context<TRPCContext>().create({
  errorFormatter({ shape, error }) {
    const cause = error.cause;
    return {
      ...shape,
      data: {
        ...shape.data,
        kind: isEngineError(cause) ? cause.kind : null,
        retryable: isEngineError(cause) ? cause.retryable : false,
        rawResponse: cause instanceof DecodeError ? cause.raw : null,
        stack: process.env.NODE_ENV === "development" ? error.stack : undefined,
      },
    };
  },
});

// ---- Exports ----

export const router = t.router;
export const publicProcedure = t.procedure;
export const createCallerFactory = t.createCallerFactory;

// ---- Zod Schemas for Validation ----

export const LocaleSchema = z.enum(["es", "en"]);

export const SubmitNoteInputSchema = z.object({
  text: z.string().min(1, "Note text is required"),
  locale: LocaleSchema.optional(),
});

export const GroupRenameSchema = z.object({
  oldName: z.string().min(1),
  newName: z.string().min(1),
});

export const CanonicalMutationSchema = z.object({
  action: z.enum(["add", "delete", "remind"]),
  makesSense: z.boolean().default(true),
  reason: z.string().nullable().default(null),
  group: z.string().nullable().default(null),
  subgroup: z.string().nullable().default(null),
  idea: z.string().nullable().default(null),
  isNewGroup: z.boolean().default(false),
  isNewSubgroup: z.boolean().default(false),
  inheritParentIdeas: z.boolean().default(false),
  rename: GroupRenameSchema.nullable().default(null),
  remindAt: z.string().nullable().default(null),
});

export const ApplyMutationsInputSchema = z.object({
  mutations: z.array(CanonicalMutationSchema).min(1, "At least one mutation is required"),
});

export const ScheduleReminderInputSchema = z.object({
  message: z.string().min(1, "Reminder message is required"),
  fireAt: z.string().min(1, "Fire time is required"),
});
