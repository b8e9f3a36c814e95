/**
 * KnowledgeTree tests.
 *
 * Run: node --import tsx --test src/tree/knowledge-tree.test.ts
 */

import { describe, it } from "node:test";
import { strict as assert } from "node:assert";

import {
  CorruptRecordError,
  CycleError,
  InvalidTopicError,
  NodeNotFoundError,
  ParentNotFoundError,
  RootRemovalError,
  TreeAlreadyInitializedError,
  TreeNotInitializedError,
} from "../errors.js";
import { KnowledgeTree } from "./knowledge-tree.js";

const T0 = Date.UTC(2025, 0, 15, 9, 0, 0);

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Photosynthesis
 * ├── Chlorophyll (n2)
 * │   └── Light Absorption (n4)
 * └── Calvin Cycle (n3)
 */
function makeTree(): KnowledgeTree {
  const tree = new KnowledgeTree({ clock: () => T0 });
  const root = tree.createRoot("Photosynthesis");
  tree.attachChild(root, "Chlorophyll");
  tree.attachChild(root, "Calvin Cycle");
  tree.attachChild("n2", "Light Absorption");
  return tree;
}

function keys(tree: KnowledgeTree): string[] {
  return [...tree.walk()].map((n) => n.topic.key);
}

// ═══════════════════════════════════════════════════════════════════════════
// CREATION
// ═══════════════════════════════════════════════════════════════════════════

describe("createRoot", () => {
  it("creates n1 as the root", () => {
    const tree = new KnowledgeTree({ clock: () => T0 });
    assert.equal(tree.rootId, null);
    assert.throws(() => tree.requireRoot(), TreeNotInitializedError);

    const id = tree.createRoot("  Photosynthesis ");
    assert.equal(id, "n1");
    const root = tree.requireRoot();
    assert.equal(root.parentId, null);
    assert.equal(root.topic.display, "Photosynthesis");
    assert.equal(root.createdAt, "2025-01-15T09:00:00.000Z");
    assert.equal(tree.depthOf(id), 1);
  });

  it("refuses a second root", () => {
    const tree = makeTree();
    assert.throws(() => tree.createRoot("Botany"), TreeAlreadyInitializedError);
  });

  it("rejects an empty root topic", () => {
    const tree = new KnowledgeTree();
    assert.throws(() => tree.createRoot(" ?! "), InvalidTopicError);
    assert.equal(tree.size, 0);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// ATTACH
// ═══════════════════════════════════════════════════════════════════════════

describe("attachChild", () => {
  it("creates children in insertion order with sequential ids", () => {
    const tree = makeTree();
    assert.deepEqual(tree.requireNode("n1").children, ["n2", "n3"]);
    assert.deepEqual(keys(tree), [
      "photosynthesis",
      "chlorophyll",
      "light absorption",
      "calvin cycle",
    ]);
  });

  it("stores the rationale", () => {
    const tree = makeTree();
    const result = tree.attachChild("n3", "RuBisCO", { rationale: "Fixes carbon in the cycle" });
    assert.equal(tree.requireNode(result.nodeId).rationale, "Fixes carbon in the cycle");
  });

  it("stores an explanation and keeps it through a snapshot", () => {
    const tree = makeTree();
    tree.setExplanation("n3", "First draft");
    tree.setExplanation("n3", "Carbon fixation in the stroma");
    assert.equal(tree.requireNode("n3").explanation, "Carbon fixation in the stroma");

    const restored = KnowledgeTree.restore(JSON.parse(JSON.stringify(tree.toSnapshot())));
    assert.equal(restored.requireNode("n3").explanation, "Carbon fixation in the stroma");
    assert.equal(restored.requireNode("n2").explanation, undefined);
  });

  it("links instead of duplicating a topic that exists elsewhere", () => {
    const tree = makeTree();
    const result = tree.attachChild("n3", "light   absorption!");
    assert.deepEqual(result, {
      kind: "linked",
      nodeId: "n4",
      topic: { key: "light absorption", display: "light absorption!" },
    });
    assert.equal(tree.size, 4);
    assert.deepEqual(tree.requireNode("n3").crossLinks, ["n4"]);

    tree.attachChild("n3", "Light Absorption");
    assert.deepEqual(tree.requireNode("n3").crossLinks, ["n4"], "link recorded once");
  });

  it("records no cross-link when the owner is already a direct child", () => {
    const tree = makeTree();
    const result = tree.attachChild("n1", "chlorophyll");
    assert.equal(result.kind, "linked");
    assert.equal(result.nodeId, "n2");
    assert.deepEqual(tree.requireNode("n1").crossLinks, []);
  });

  it("throws ParentNotFoundError before looking at the topic", () => {
    const tree = makeTree();
    assert.throws(() => tree.attachChild("n99", ""), ParentNotFoundError);
  });

  it("throws InvalidTopicError before checking cycles", () => {
    const tree = makeTree();
    assert.throws(() => tree.attachChild("n4", "..."), InvalidTopicError);
  });

  it("rejects the parent's own topic or an ancestor's with CycleError, unchanged", () => {
    const tree = makeTree();
    const before = tree.toSnapshot();

    assert.throws(
      () => tree.attachChild("n4", "PHOTOSYNTHESIS"),
      (err: unknown) =>
        err instanceof CycleError && err.ancestorId === "n1" && err.parentId === "n4"
    );
    assert.throws(() => tree.attachChild("n4", "Light Absorption"), CycleError);

    assert.deepEqual(tree.toSnapshot(), before);
    assert.equal(tree.findByTopic("photosynthesis")?.id, "n1");
  });

  it("keeps topic keys unique across the whole tree", () => {
    const tree = makeTree();
    tree.attachChild("n3", "Chlorophyll");
    tree.attachChild("n4", "Calvin cycle");
    const all = keys(tree);
    assert.equal(new Set(all).size, all.length);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// QUERIES
// ═══════════════════════════════════════════════════════════════════════════

describe("paths and ancestry", () => {
  it("pathTo runs from the root to the node and matches depthOf", () => {
    const tree = makeTree();
    assert.deepEqual(
      tree.pathTo("n4").map((t) => t.display),
      ["Photosynthesis", "Chlorophyll", "Light Absorption"]
    );
    for (const node of tree.walk()) {
      assert.equal(tree.pathTo(node.id).length, tree.depthOf(node.id));
    }
  });

  it("ancestorsOf lists nearest first", () => {
    const tree = makeTree();
    assert.deepEqual(tree.ancestorsOf("n4"), ["n2", "n1"]);
    assert.deepEqual(tree.ancestorsOf("n1"), []);
  });

  it("throws NodeNotFoundError for unknown ids", () => {
    const tree = makeTree();
    assert.throws(() => tree.pathTo("n42"), NodeNotFoundError);
    assert.equal(tree.getNode("n42"), undefined);
  });

  it("finds nodes by any spelling", () => {
    const tree = makeTree();
    assert.equal(tree.findByTopic("CALVIN-CYCLE"), undefined);
    assert.equal(tree.findByTopic("calvin cycle.")?.id, "n3");
    assert.equal(tree.findByTopic("!!"), undefined);
  });
});

describe("suggestion memory and dwell", () => {
  it("remembers the latest offer time", () => {
    const tree = makeTree();
    tree.recordSeen("n2", "chloroplast", 100);
    tree.recordSeen("n2", "chloroplast", 500);
    assert.equal(tree.hasSeen("n2", "chloroplast"), true);
    assert.equal(tree.hasSeen("n2", "chloroplast", 500), true);
    assert.equal(tree.hasSeen("n2", "chloroplast", 501), false);
    assert.equal(tree.hasSeen("n3", "chloroplast"), false);
  });

  it("adds dwell only to existing nodes", () => {
    const tree = makeTree();
    assert.equal(tree.addDwell("n2", 1500), true);
    assert.equal(tree.addDwell("n2", 500), true);
    assert.equal(tree.requireNode("n2").cumulativeDwellMs, 2000);
    assert.equal(tree.addDwell("n77", 10), false);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// REMOVAL & RESET
// ═══════════════════════════════════════════════════════════════════════════

describe("removeSubtree", () => {
  it("removes the subtree, its index entries and links into it", () => {
    const tree = makeTree();
    tree.attachChild("n3", "Light Absorption");
    assert.deepEqual(tree.requireNode("n3").crossLinks, ["n4"]);

    assert.deepEqual(tree.removeSubtree("n2"), ["n2", "n4"]);
    assert.equal(tree.size, 2);
    assert.deepEqual(tree.requireNode("n1").children, ["n3"]);
    assert.deepEqual(tree.requireNode("n3").crossLinks, []);
    assert.equal(tree.hasTopicKey("light absorption"), false);

    const again = tree.attachChild("n1", "Chlorophyll");
    assert.deepEqual(again, {
      kind: "created",
      nodeId: "n5",
      topic: { key: "chlorophyll", display: "Chlorophyll" },
    });
  });

  it("refuses the root and unknown ids", () => {
    const tree = makeTree();
    assert.throws(() => tree.removeSubtree("n1"), RootRemovalError);
    assert.throws(() => tree.removeSubtree("n9"), NodeNotFoundError);
    assert.equal(tree.size, 4);
  });
});

describe("reset", () => {
  it("starts over without reusing ids", () => {
    const tree = makeTree();
    const root = tree.reset("Botany");
    assert.equal(root, "n5");
    assert.equal(tree.size, 1);
    assert.equal(tree.has("n2"), false);
    assert.equal(tree.findByTopic("chlorophyll"), undefined);
  });

  it("leaves the tree untouched on an invalid topic", () => {
    const tree = makeTree();
    assert.throws(() => tree.reset("  "), InvalidTopicError);
    assert.equal(tree.size, 4);
    assert.equal(tree.rootId, "n1");
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// SNAPSHOTS
// ═══════════════════════════════════════════════════════════════════════════

describe("snapshots", () => {
  it("renders structure only", () => {
    const tree = makeTree();
    tree.attachChild("n3", "Light Absorption");
    const render = tree.toRenderSnapshot();
    assert.deepEqual(render.nodes[0], {
      id: "n1",
      topic: { key: "photosynthesis", display: "Photosynthesis" },
      parentId: null,
      childIds: ["n2", "n3"],
      crossLinks: [],
    });
    assert.deepEqual(
      render.nodes.map((n) => n.id),
      ["n1", "n2", "n4", "n3"]
    );
    assert.deepEqual(render.nodes[3]?.crossLinks, ["n4"]);
  });

  it("restores losslessly and keeps counting ids", () => {
    const tree = makeTree();
    tree.recordSeen("n1", "chlorophyll", T0);
    tree.addDwell("n3", 750);
    const restored = KnowledgeTree.restore(JSON.parse(JSON.stringify(tree.toSnapshot())));

    assert.deepEqual(restored.toSnapshot(), tree.toSnapshot());
    assert.equal(restored.hasSeen("n1", "chlorophyll"), true);
    assert.equal(restored.requireNode("n3").cumulativeDwellMs, 750);
    assert.equal(restored.attachChild("n3", "RuBisCO").nodeId, "n5");
  });

  it("rejects a snapshot that breaks the tree invariants", () => {
    const snapshot = makeTree().toSnapshot();
    const broken = {
      ...snapshot,
      nodes: snapshot.nodes.map((n) =>
        n.id === "n4" ? { ...n, topic: { key: "chlorophyll", display: "Chlorophyll" } } : n
      ),
    };
    assert.throws(() => KnowledgeTree.restore(broken), CorruptRecordError);
    assert.throws(() => KnowledgeTree.restore({ rootId: "n1" }), CorruptRecordError);
  });
});
