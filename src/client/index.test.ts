import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";

import type { ClassificationOracle } from "../oracle/index.js";
import type { ReminderNotifier } from "../reminders/scheduler.js";
import { createServer, type IdeaTreeServer } from "../server/index.js";
import { DEFAULT_ENGINE_CONFIG, DEFAULT_LLM_CONFIG, type RawProposal } from "../types/index.js";
import type { ChangeSet } from "../types/index.js";
import { checkServerHealth, createIdeaTreeClient, getServerInfo, watchTreeChanges } from "./index.js";

const oracle: ClassificationOracle = {
  async classify(noteText: string): Promise<RawProposal> {
    if (noteText === "xyzzy") return { kind: "text", text: "no lo sé" };
    return { kind: "text", text: '{"action": "add", "makes_sense": true, "group": "viajes", "idea": "Oporto", "is_new_group": true}' };
  },
};

const silentNotifier: ReminderNotifier = {
  async notify(): Promise<void> {},
};

describe("ideatree client", () => {
  let server: IdeaTreeServer;
  let url: string;

  beforeAll(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    server = await createServer({
      port: 0,
      host: "127.0.0.1",
      enableWebSocket: false,
      oracle,
      notifier: silentNotifier,
      config: { llm: DEFAULT_LLM_CONFIG, storage: { type: "memory" }, engine: DEFAULT_ENGINE_CONFIG },
    });
    await server.start();
    url = `http://127.0.0.1:${server.getPort()}`;
  });

  afterAll(async () => {
    await server.stop();
    vi.restoreAllMocks();
  });

  it("reports a healthy server", async () => {
    expect(await checkServerHealth(url)).toBe(true);
  });

  it("submits notes and reads the tree back", async () => {
    const client = createIdeaTreeClient({ url });
    const result = await client.note.submit.mutate({ text: "me apetece ir a Oporto" });

    expect(result.source).toBe("oracle");
    expect(await client.tree.group.query({ name: "viajes" })).toEqual({ name: "viajes", ideas: ["Oporto"], subgroups: [] });

    const info = await getServerInfo(url);
    expect(info.storage).toBe("memory");
    expect(info.groupCount).toBe(1);
  });

  it("carries the error code of a missing group", async () => {
    const client = createIdeaTreeClient({ url });
    await expect(client.tree.group.query({ name: "libros" })).rejects.toMatchObject({
      message: "Group not found: libros",
      data: { code: "NOT_FOUND", kind: null },
    });
  });

  it("marks an undecodable classifier answer as a retryable decode error", async () => {
    const client = createIdeaTreeClient({ url });
    await expect(client.note.submit.mutate({ text: "xyzzy" })).rejects.toMatchObject({
      data: { code: "INTERNAL_SERVER_ERROR", kind: "decode", retryable: true, rawResponse: "no lo sé" },
    });
  });
});

describe("ideatree client over WebSocket", () => {
  let server: IdeaTreeServer;
  let url: string;

  beforeAll(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    server = await createServer({
      port: 0,
      host: "127.0.0.1",
      enableWebSocket: true,
      oracle,
      notifier: silentNotifier,
      config: { llm: DEFAULT_LLM_CONFIG, storage: { type: "memory" }, engine: DEFAULT_ENGINE_CONFIG },
    });
    await server.start();
    url = `http://127.0.0.1:${server.getPort()}`;
  });

  afterAll(async () => {
    await server.stop();
    vi.restoreAllMocks();
  });

  it("streams the changes of each applied batch", async () => {
    let received: (changes: ChangeSet) => void = () => undefined;
    const next = new Promise<ChangeSet>((resolve) => {
      received = resolve;
    });
    const watch = watchTreeChanges((changes) => received(changes), { url });

    try {
      await watch.ready;
      await createIdeaTreeClient({ url }).tree.apply.mutate({
        mutations: [{ action: "add", group: "compras", idea: "pan", isNewGroup: true }],
      });

      const changes = await next;
      expect(changes.changes).toEqual([
        { type: "group_created", group: "compras" },
        { type: "idea_added", group: "compras", subgroup: null, idea: "pan" },
      ]);
    } finally {
      watch.close();
    }
  });
});
