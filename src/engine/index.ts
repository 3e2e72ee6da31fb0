// ============================================================================
// IDEA TREE ENGINE
// ============================================================================
// One note in, one applied batch out:
//   pre-detector → oracle → decoder → normalizer → enumeration splitter →
//   reconciler (inside storage.applyBatch, under the keyed lock)

import { randomUUID } from "crypto";

import { proposalsFromRaw } from "../decoder/proposal.js";
import { splitEnumeration } from "../enumeration/index.js";
import { loadLexicon } from "../lexicon/index.js";
import { normalizeBatch, noopMutation } from "../normalizer/index.js";
import type { ClassificationOracle } from "../oracle/index.js";
import { touchedGroups } from "../reconciler/index.js";
import { detectReminder } from "../reminders/detector.js";
import { searchTree } from "../search/index.js";
import type { IStorage } from "../storage/index.js";
import type { TreeSummarizer } from "../summary/index.js";
import {
  DEFAULT_ENGINE_CONFIG,
  emptyChangeSet,
  type CanonicalMutation,
  type ChangeSet,
  type Locale,
  type NoteProcessingResult,
  type RawProposal,
  type SearchHit,
  type TreeSummary,
  type UnclassifiedNote,
} from "../types/index.js";
import { OracleUnavailableError } from "./errors.js";
import { KeyedLock } from "./lock.js";

export { DecodeError, EngineError, OracleUnavailableError, isEngineError } from "./errors.js";
export { KeyedLock } from "./lock.js";

export const EMPTY_NOTE_REASON = "empty note";

export interface EngineOptions {
  storage: IStorage;
  oracle: ClassificationOracle;
  /** Without one, summarize() rejects */
  summarizer?: TreeSummarizer;
  locale?: Locale;
  lock?: KeyedLock;
}

export type BatchListener = (changes: ChangeSet) => void;

export interface ProcessNoteOptions {
  now?: Date;
  locale?: Locale;
}

export class IdeaTreeEngine {
  readonly storage: IStorage;
  private readonly oracle: ClassificationOracle;
  private readonly summarizer: TreeSummarizer | null;
  private readonly locale: Locale;
  private readonly lock: KeyedLock;
  private readonly listeners = new Set<BatchListener>();

  constructor(options: EngineOptions) {
    this.storage = options.storage;
    this.oracle = options.oracle;
    this.summarizer = options.summarizer ?? null;
    this.locale = options.locale ?? DEFAULT_ENGINE_CONFIG.locale;
    this.lock = options.lock ?? new KeyedLock();
  }

  /**
   * Classify a note and apply the resulting batch to the stored tree.
   * @throws DecodeError when the oracle's answer cannot be decoded
   */
  async processNote(text: string, options: ProcessNoteOptions = {}): Promise<NoteProcessingResult> {
    const now = options.now ?? new Date();
    const locale = options.locale ?? this.locale;
    const lexicon = loadLexicon(locale);
    const noteText = text.trim();

    if (!noteText) {
      return {
        results: [noopMutation(EMPTY_NOTE_REASON)],
        changes: emptyChangeSet(),
        source: "pre-detector",
        oracleSkipped: true,
      };
    }

    // ---- Deterministic reminders skip the oracle ----
    const reminder = detectReminder(noteText, now, lexicon);
    if (reminder) {
      const changes = await this.applyMutations([reminder]);
      return { results: [reminder], changes, source: "pre-detector", oracleSkipped: true };
    }

    // ---- Oracle ----
    const tree = await this.storage.loadTree();
    let raw: RawProposal;
    try {
      raw = await this.oracle.classify(noteText, tree, locale, now);
    } catch (error) {
      if (!(error instanceof OracleUnavailableError)) throw error;
      const unclassified = await this.storeUnclassified(noteText, error.message, now);
      return {
        results: [],
        changes: emptyChangeSet(),
        source: "degraded",
        oracleSkipped: true,
        unclassified,
      };
    }

    // ---- Decode, normalize, split ----
    const proposals = proposalsFromRaw(raw);
    const normalized = normalizeBatch(proposals, { tree, noteText, lexicon, now });
    const mutations = splitEnumeration(normalized, noteText, lexicon);

    const changes = await this.applyMutations(mutations);
    return { results: mutations, changes, source: "oracle", oracleSkipped: false };
  }

  /**
   * Apply already-normalized mutations as one batch, serialized against
   * other batches touching the same groups.
   */
  async applyMutations(mutations: readonly CanonicalMutation[]): Promise<ChangeSet> {
    if (!mutations.some((m) => m.makesSense)) return emptyChangeSet();
    const changes = await this.lock.run(touchedGroups(mutations), () => this.storage.applyBatch(mutations));
    for (const listener of this.listeners) listener(changes);
    return changes;
  }

  async search(query: string): Promise<SearchHit[]> {
    return searchTree(await this.storage.loadTree(), query);
  }

  /**
   * Summarise every group of the stored tree.
   * @throws DecodeError when the summarizer's answer cannot be decoded
   */
  async summarize(locale: Locale = this.locale): Promise<TreeSummary> {
    if (!this.summarizer) throw new Error("No summarizer configured");
    return this.summarizer.summarize(await this.storage.loadTree(), locale);
  }

  /**
   * Subscribe to every applied batch. Returns the unsubscribe function.
   */
  onBatchApplied(listener: BatchListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private async storeUnclassified(text: string, reason: string, now: Date): Promise<UnclassifiedNote> {
    const note: UnclassifiedNote = { id: randomUUID(), text, reason, createdAt: now.toISOString() };
    await this.storage.saveUnclassifiedNote(note);
    console.warn(`\x1b[33m⚠ Classifier unavailable, note stored unclassified (${note.id})\x1b[0m`);
    return note;
  }
}
