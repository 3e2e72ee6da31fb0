// ============================================================================
// ARGUMENT PARSING
// ============================================================================

import { isLocale } from "../lexicon/index.js";
import type { Locale } from "../types/index.js";

export type CliCommand =
  | { command: "help" }
  | { command: "note"; text: string; locale?: Locale }
  | { command: "tree"; json: boolean }
  | { command: "group"; name: string }
  | { command: "search"; query: string }
  | { command: "summarize"; json: boolean; locale?: Locale }
  | { command: "watch"; url?: string }
  | { command: "reminders"; includeSent: boolean }
  | { command: "deliver" }
  | { command: "unclassified" }
  | { command: "export" }
  | { command: "import"; file: string }
  | { command: "serve"; port?: number }
  | { command: "config" }
  | { command: "usage"; message: string };

export function parseArgs(argv: readonly string[]): CliCommand {
  const args = [...argv];

  if (args.length === 0 || args[0] === "--help" || args[0] === "-h") {
    return { command: "help" };
  }

  switch (args[0]) {
    case "--tree":
      return { command: "tree", json: args.includes("--json") };
    case "--group":
      return args[1] ? { command: "group", name: args.slice(1).join(" ") } : { command: "usage", message: "ideatree --group <name>" };
    case "--search":
      return args[1] ? { command: "search", query: args.slice(1).join(" ") } : { command: "usage", message: "ideatree --search <text>" };
    case "--summarize":
      return parseSummarize(args);
    case "--watch":
      if (args[1] === "--url") {
        return args[2] ? { command: "watch", url: args[2] } : { command: "usage", message: "ideatree --watch [--url <server>]" };
      }
      return { command: "watch" };
    case "--reminders":
      return { command: "reminders", includeSent: args.includes("--all") };
    case "--deliver":
      return { command: "deliver" };
    case "--unclassified":
      return { command: "unclassified" };
    case "--export":
      return { command: "export" };
    case "--import":
      return args[1] ? { command: "import", file: args[1] } : { command: "usage", message: "ideatree --import <file>" };
    case "--config":
      return { command: "config" };
    case "--serve":
      return parseServe(args);
  }

  // Default: classify a note
  const locale = takeLocale(args);
  if (locale === null) return { command: "usage", message: "ideatree <note> --locale es|en" };

  const text = args.join(" ").trim();
  if (!text) return { command: "usage", message: "ideatree <note>" };
  return locale ? { command: "note", text, locale } : { command: "note", text };
}

/**
 * Removes `--locale <value>` from args. Null when the value is missing or unknown.
 */
function takeLocale(args: string[]): Locale | undefined | null {
  const localeIdx = args.indexOf("--locale");
  if (localeIdx === -1) return undefined;

  const value = args[localeIdx + 1];
  if (!value || !isLocale(value)) return null;
  args.splice(localeIdx, 2);
  return value;
}

function parseSummarize(args: string[]): CliCommand {
  const locale = takeLocale(args);
  if (locale === null) return { command: "usage", message: "ideatree --summarize [--json] [--locale es|en]" };

  const json = args.includes("--json");
  return locale ? { command: "summarize", json, locale } : { command: "summarize", json };
}

function parseServe(args: string[]): CliCommand {
  const portIdx = args.indexOf("--port");
  if (portIdx === -1) return { command: "serve" };

  const port = Number(args[portIdx + 1]);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    return { command: "usage", message: "ideatree --serve [--port <1-65535>]" };
  }
  return { command: "serve", port };
}
