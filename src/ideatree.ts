#!/usr/bin/env node

import { readFileSync } from "fs";

import { parseArgs } from "./cli/args.js";
import {
  describeChange,
  renderGroup,
  renderReminder,
  renderResult,
  renderSearchHit,
  renderSummary,
  renderTree,
  renderUnclassified,
} from "./cli/format.js";
import { watchTreeChanges } from "./client/index.js";
import { describeConfig, getConfigPath, loadConfig } from "./config/index.js";
import { DecodeError, IdeaTreeEngine } from "./engine/index.js";
import { LangChainOracle } from "./oracle/index.js";
import { findGroup } from "./reconciler/index.js";
import { ReminderScheduler } from "./reminders/scheduler.js";
import { searchTree } from "./search/index.js";
import { startServerCLI } from "./server/index.js";
import { createStorage, getStorageTypeName, parseSnapshot, type IStorage } from "./storage/index.js";
import { OracleSummarizer } from "./summary/index.js";
import type { IdeaTreeConfig } from "./types/index.js";

// ============================================================================
// HELP
// ============================================================================

function showHelp(config: IdeaTreeConfig) {
  console.log(`
\x1b[36m┌─────────────────────────────────────────┐
│  \x1b[1mideatree\x1b[0m\x1b[36m - Notes into an idea tree      │
└─────────────────────────────────────────┘\x1b[0m

\x1b[33mNotes:\x1b[0m
  ideatree <note>                   Classify a note and apply it
  ideatree <note> --locale es|en    Classify with another keyword set

\x1b[33mTree:\x1b[0m
  ideatree --tree [--json]          Print the whole tree
  ideatree --group <name>           Print one group
  ideatree --search <text>          Find groups, subgroups and ideas
  ideatree --summarize [--json]     Summaries and key points per group

\x1b[33mReminders:\x1b[0m
  ideatree --reminders [--all]      Pending reminders (--all includes sent)
  ideatree --deliver                Deliver due reminders now

\x1b[33mData:\x1b[0m
  ideatree --unclassified           Notes saved while the classifier was down
  ideatree --export                 Dump tree, reminders and notes as JSON
  ideatree --import <file>          Restore a dump

\x1b[33mServer:\x1b[0m
  ideatree --serve [--port N]       Start the API server
  ideatree --watch [--url <server>] Follow the changes a running server applies

\x1b[33mConfig:\x1b[0m
  ideatree --config                 Show the active configuration
  Provider: \x1b[1m${config.llm.provider}\x1b[0m
  Storage: ${getStorageTypeName(config.storage)}
`);
}

// ============================================================================
// MAIN
// ============================================================================

async function withStorage<T>(config: IdeaTreeConfig, fn: (storage: IStorage) => Promise<T>): Promise<T> {
  const storage = createStorage(config.storage);
  await storage.initialize();
  try {
    return await fn(storage);
  } finally {
    await storage.close();
  }
}

async function main() {
  const config = loadConfig();
  const parsed = parseArgs(process.argv.slice(2));

  try {
    switch (parsed.command) {
      case "help":
        showHelp(config);
        break;

      case "usage":
        console.error(`\x1b[31mUsage: ${parsed.message}\x1b[0m`);
        process.exit(1);
        break;

      case "note":
        await withStorage(config, async (storage) => {
          const engine = new IdeaTreeEngine({
            storage,
            oracle: LangChainOracle.fromConfig(config.llm),
            locale: config.engine.locale,
          });
          console.log(`\x1b[90m⏳ Classifying...\x1b[0m`);
          const result = await engine.processNote(parsed.text, { locale: parsed.locale });
          console.log(renderResult(result).join("\n"));
        });
        break;

      case "tree":
        await withStorage(config, async (storage) => {
          const tree = await storage.loadTree();
          console.log(parsed.json ? JSON.stringify(tree, null, 2) : renderTree(tree).join("\n"));
        });
        break;

      case "group":
        await withStorage(config, async (storage) => {
          const group = findGroup(await storage.loadTree(), parsed.name);
          if (!group) {
            console.error(`\x1b[31mGroup not found: ${parsed.name}\x1b[0m`);
            process.exitCode = 1;
            return;
          }
          console.log(renderGroup(group).join("\n"));
        });
        break;

      case "search":
        await withStorage(config, async (storage) => {
          const hits = searchTree(await storage.loadTree(), parsed.query);
          if (hits.length === 0) {
            console.log(`\x1b[90mNothing matches "${parsed.query}"\x1b[0m`);
            return;
          }
          for (const hit of hits) console.log(renderSearchHit(hit));
        });
        break;

      case "summarize":
        await withStorage(config, async (storage) => {
          const model = LangChainOracle.fromConfig(config.llm);
          const engine = new IdeaTreeEngine({
            storage,
            oracle: model,
            summarizer: new OracleSummarizer(model),
            locale: config.engine.locale,
          });
          console.log(`\x1b[90m⏳ Summarizing...\x1b[0m`);
          const summary = await engine.summarize(parsed.locale);
          console.log(parsed.json ? JSON.stringify(summary, null, 2) : renderSummary(summary).join("\n"));
        });
        break;

      case "watch": {
        const watch = watchTreeChanges(
          (changes) => {
            for (const change of changes.changes) console.log(describeChange(change));
          },
          {
            url: parsed.url,
            onError: (error) => console.error(`\x1b[31m✗ ${error.message}\x1b[0m`),
          }
        );
        await watch.ready;
        console.log(`\x1b[90mWatching for changes (Ctrl+C to stop)\x1b[0m`);
        process.once("SIGINT", () => {
          watch.close();
          process.exit(0);
        });
        break;
      }

      case "reminders":
        await withStorage(config, async (storage) => {
          const reminders = await storage.listReminders(parsed.includeSent);
          if (reminders.length === 0) {
            console.log(`\x1b[90mNo reminders\x1b[0m`);
            return;
          }
          for (const reminder of reminders) console.log(renderReminder(reminder));
        });
        break;

      case "deliver":
        await withStorage(config, async (storage) => {
          const report = await new ReminderScheduler(storage).deliverDue();
          console.log(
            `\x1b[32m✓ ${report.delivered.length} delivered\x1b[0m` +
              (report.failed.length > 0 ? ` \x1b[31m(${report.failed.length} failed)\x1b[0m` : "")
          );
        });
        break;

      case "unclassified":
        await withStorage(config, async (storage) => {
          const notes = await storage.listUnclassifiedNotes();
          if (notes.length === 0) {
            console.log(`\x1b[90mNo unclassified notes\x1b[0m`);
            return;
          }
          for (const note of notes) console.log(renderUnclassified(note));
        });
        break;

      case "export":
        await withStorage(config, async (storage) => {
          console.log(JSON.stringify(await storage.exportAll(), null, 2));
        });
        break;

      case "import": {
        const snapshot = parseSnapshot(JSON.parse(readFileSync(parsed.file, "utf-8")));
        await withStorage(config, (storage) => storage.importAll(snapshot));
        console.log(
          `\x1b[32m✓ Imported ${snapshot.tree.groups.length} groups, ${snapshot.reminders.length} reminders\x1b[0m`
        );
        break;
      }

      case "serve":
        await startServerCLI(parsed.port);
        break;

      case "config":
        console.log(`\x1b[90m${getConfigPath()}\x1b[0m`);
        console.log(describeConfig(config));
        break;
    }
  } catch (error) {
    if (error instanceof DecodeError) {
      console.error(`\n\x1b[31m✗ Could not read the classifier's answer:\x1b[0m ${error.message}`);
    } else {
      console.error(`\n\x1b[31m✗ Error:\x1b[0m ${error instanceof Error ? error.message : String(error)}`);
    }
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(`\x1b[31m${error instanceof Error ? error.message : String(error)}\x1b[0m`);
  process.exit(1);
});
