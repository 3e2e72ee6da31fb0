// ============================================================================
// tRPC ROUTER - Idea Tree API
// ============================================================================
// Procedures for submitting notes, reading and editing the tree, and
// managing reminders.

import { TRPCError } from "@trpc/server";
import { observable } from "@trpc/server/observable";
import { z } from "zod";

import {
  router,
  publicProcedure,
  SubmitNoteInputSchema,
  ApplyMutationsInputSchema,
  ScheduleReminderInputSchema,
  LocaleSchema,
} from "./trpc.js";

import { enforceBatchInvariants } from "../normalizer/index.js";
import { findGroup } from "../reconciler/index.js";
import { SnapshotSchema } from "../storage/schema.js";
import type { ChangeSet } from "../types/index.js";

// ============================================================================
// NOTE ROUTER
// ============================================================================

export const noteRouter = router({
  /**
   * Classify a note and apply it to the tree
   */
  submit: publicProcedure.input(SubmitNoteInputSchema).mutation(async ({ ctx, input }) => {
    return ctx.engine.processNote(input.text, { locale: input.locale });
  }),

  /**
   * Notes stored while the classifier was unavailable
   */
  unclassified: publicProcedure.query(async ({ ctx }) => {
    return ctx.storage.listUnclassifiedNotes();
  }),
});

// ============================================================================
// TREE ROUTER
// ============================================================================

export const treeRouter = router({
  get: publicProcedure.query(async ({ ctx }) => {
    return ctx.storage.loadTree();
  }),

  /**
   * Get a single group by name (case-insensitive)
   */
  group: publicProcedure.input(z.object({ name: z.string().min(1) })).query(async ({ ctx, input }) => {
    const group = findGroup(await ctx.storage.loadTree(), input.name);

    if (!group) {
      throw new TRPCError({
        code: "NOT_FOUND",
        message: `Group not found: ${input.name}`,
      });
    }

    return group;
  }),

  /**
   * Groups, subgroups and ideas whose text contains the query
   */
  search: publicProcedure
    .input(z.object({ query: z.string().min(1, "Query is required") }))
    .query(async ({ ctx, input }) => {
      return ctx.engine.search(input.query);
    }),

  /**
   * Per-group summaries and key points from the language model
   */
  summarize: publicProcedure
    .input(z.object({ locale: LocaleSchema.optional() }).optional())
    .query(async ({ ctx, input }) => {
      return ctx.engine.summarize(input?.locale);
    }),

  /**
   * Apply mutations directly, without the classifier
   */
  apply: publicProcedure.input(ApplyMutationsInputSchema).mutation(async ({ ctx, input }) => {
    return ctx.engine.applyMutations(enforceBatchInvariants(input.mutations));
  }),

  /**
   * Stream every applied batch (WebSocket only)
   */
  changes: publicProcedure.subscription(({ ctx }) => {
    return observable<ChangeSet>((emit) => ctx.engine.onBatchApplied((changes) => emit.next(changes)));
  }),
});

// ============================================================================
// REMINDER ROUTER
// ============================================================================

export const reminderRouter = router({
  list: publicProcedure
    .input(z.object({ includeSent: z.boolean().optional() }).optional())
    .query(async ({ ctx, input }) => {
      return ctx.storage.listReminders(input?.includeSent ?? false);
    }),

  schedule: publicProcedure.input(ScheduleReminderInputSchema).mutation(async ({ ctx, input }) => {
    try {
      return await ctx.scheduler.schedule(input.message, input.fireAt);
    } catch (error) {
      throw new TRPCError({
        code: "BAD_REQUEST",
        message: error instanceof Error ? error.message : String(error),
        cause: error,
      });
    }
  }),

  /**
   * Run one delivery pass now
   */
  deliver: publicProcedure.mutation(async ({ ctx }) => {
    return ctx.scheduler.deliverDue();
  }),
});

// ============================================================================
// SYSTEM ROUTER
// ============================================================================

export const systemRouter = router({
  /**
   * Health check
   */
  health: publicProcedure.query(async ({ ctx }) => {
    const ready = await ctx.storage.isReady();
    return {
      status: ready ? "ok" : "error",
      timestamp: new Date().toISOString(),
      storage: ctx.config.storage.type,
    };
  }),

  /**
   * Get server info
   */
  info: publicProcedure.query(async ({ ctx }) => {
    const [tree, pending] = await Promise.all([ctx.storage.loadTree(), ctx.storage.listReminders(false)]);
    return {
      version: "0.1.0",
      storage: ctx.config.storage.type,
      llmProvider: ctx.config.llm.provider,
      locale: ctx.config.engine.locale,
      groupCount: tree.groups.length,
      pendingReminders: pending.length,
    };
  }),

  /**
   * Export all data
   */
  export: publicProcedure.query(async ({ ctx }) => {
    return ctx.storage.exportAll();
  }),

  /**
   * Import data
   */
  import: publicProcedure.input(SnapshotSchema).mutation(async ({ ctx, input }) => {
    await ctx.storage.importAll(input);
    return { success: true };
  }),
});

// ============================================================================
// APP ROUTER
// ============================================================================

export const appRouter = router({
  note: noteRouter,
  tree: treeRouter,
  reminder: reminderRouter,
  system: systemRouter,
});

export type AppRouter = typeof appRouter;
