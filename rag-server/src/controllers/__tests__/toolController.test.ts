import fs from "node:fs/promises";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";

import { createKnowledgeBase, type KnowledgeBase } from "../../knowledgeBase";
import { createMcpServer } from "../../mcp/serverFactory";
import {
  FakeEmbeddings,
  FakeGenerator,
  makeTempDir,
  removeDir,
} from "../../__tests__/fakes";

const NOTES = "Release checklist for the mobile app.";

describe("knowledge tools", () => {
  let dir: string;
  let knowledgeBase: KnowledgeBase;
  let client: Client;
  let locked: boolean;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    dir = await makeTempDir();
    locked = false;
    knowledgeBase = await createKnowledgeBase({
      storagePath: dir,
      embeddings: new FakeEmbeddings(),
      generator: new FakeGenerator(),
      removePath: async (target) => {
        if (locked) {
          throw new Error("EBUSY: resource busy or locked");
        }
        await fs.rm(target, { recursive: true, force: true });
      },
    });

    const [clientTransport, serverTransport] =
      InMemoryTransport.createLinkedPair();
    await createMcpServer(knowledgeBase).connect(serverTransport);
    client = new Client({ name: "tool-test", version: "0.0.0" });
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    await knowledgeBase.close();
    await removeDir(dir);
    vi.restoreAllMocks();
  });

  const ingestNotes = () =>
    client.callTool({
      name: "ingest_document",
      arguments: {
        filename: "notes.txt",
        contentBase64: Buffer.from(NOTES).toString("base64"),
      },
    });

  it("exposes the knowledge base tools", async () => {
    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name).sort()).toEqual([
      "ask_knowledge_base",
      "ingest_document",
      "list_indexed_sources",
      "reset_knowledge_base",
    ]);
  });

  it("ingests, lists and answers with sources", async () => {
    expect((await ingestNotes()).content).toEqual([
      { type: "text", text: 'Added "notes.txt" (1 chunks).' },
    ]);
    expect((await ingestNotes()).content).toEqual([
      { type: "text", text: '"notes.txt" is already in the knowledge base.' },
    ]);

    const listed = await client.callTool({
      name: "list_indexed_sources",
      arguments: {},
    });
    expect(listed.content).toEqual([{ type: "text", text: "notes.txt" }]);

    const answered = await client.callTool({
      name: "ask_knowledge_base",
      arguments: { question: "What is in the release checklist?" },
    });
    expect(answered.content).toEqual([
      { type: "text", text: "Grounded answer" },
      { type: "text", text: "Sources:\n1. notes.txt (page 1, text)" },
    ]);
  });

  it("reports an empty knowledge base", async () => {
    const listed = await client.callTool({
      name: "list_indexed_sources",
      arguments: {},
    });

    expect(listed.content).toEqual([
      { type: "text", text: "No documents indexed." },
    ]);
  });

  it("returns failures as tool errors", async () => {
    const result = await client.callTool({
      name: "ingest_document",
      arguments: { filename: "slides.docx", contentBase64: "AQID" },
    });

    expect(result.isError).toBe(true);
  });

  it("clears the knowledge base", async () => {
    await ingestNotes();

    const result = await client.callTool({
      name: "reset_knowledge_base",
      arguments: {},
    });

    expect(result.isError).not.toBe(true);
    expect(result.content).toEqual([
      { type: "text", text: "Knowledge base cleared." },
    ]);
    expect(await knowledgeBase.listIndexedSources()).toEqual([]);
  });

  it("reports when storage must be released before a reset", async () => {
    await ingestNotes();
    locked = true;

    const result = await client.callTool({
      name: "reset_knowledge_base",
      arguments: {},
    });

    expect(result.isError).toBe(true);
    expect(result.content).toEqual([
      {
        type: "text",
        text: "Storage could not be deleted (EBUSY: resource busy or locked). Restart the process holding the files, then retry the reset.",
      },
    ]);
  });
});
