/**
 * Archive entry tests.
 *
 * Run: node --import tsx --test src/archive/entry.test.ts
 */

import { describe, it } from "node:test";
import { strict as assert } from "node:assert";

import { ExplorationSession } from "../session/session.js";
import type { SuggestionProvider } from "../suggestions/provider.js";
import { ArchiveSearch } from "./search.js";
import { ArchiveEntrySchema, toArchiveEntry } from "./entry.js";

const T0 = Date.UTC(2025, 5, 1, 9, 0, 0);

const provider: SuggestionProvider = {
  suggest: async () => [{ candidateTopic: "Chlorophyll" }],
  explain: async () => "  Light becomes sugar.  ",
};

async function exploredRecord() {
  const session = ExplorationSession.start({
    sessionId: "s-leaf",
    ownerRef: "user-1",
    rootTopic: "Photosynthesis",
    provider,
    tags: ["Biology"],
    clock: () => T0,
  });
  await session.expand("n1");
  await session.explain("n1");
  return session.end(T0 + 60_000);
}

describe("toArchiveEntry", () => {
  it("indexes topic and explanation tokens", async () => {
    const entry = toArchiveEntry(await exploredRecord());
    assert.deepEqual(entry, {
      sessionId: "s-leaf",
      ownerRef: "user-1",
      rootTopic: "Photosynthesis",
      indexedTerms: ["becomes", "chlorophyll", "light", "photosynthesis", "sugar"],
      tags: ["biology"],
      startedAt: "2025-06-01T09:00:00.000Z",
    });
    assert.equal(ArchiveEntrySchema.safeParse(entry).success, true);
  });

  it("makes a session findable by words of its explanations", async () => {
    const archive = new ArchiveSearch();
    archive.index(toArchiveEntry(await exploredRecord()));
    assert.deepEqual(archive.search("sugar"), ["s-leaf"]);
  });
});
