/**
 * Session timer tests.
 *
 * Run: node --import tsx --test src/session/timer.test.ts
 */

import { describe, it } from "node:test";
import { strict as assert } from "node:assert";

import { InvalidTimestampError, NodeNotFoundError, SessionEndedError } from "../errors.js";
import { KnowledgeTree } from "../tree/knowledge-tree.js";
import { SessionTimer } from "./timer.js";

/** Root n1 with children n2 and n3 */
function setup(): { tree: KnowledgeTree; timer: SessionTimer } {
  const tree = new KnowledgeTree({ clock: () => 0 });
  tree.createRoot("Volcanoes");
  tree.attachChild("n1", "Magma");
  tree.attachChild("n1", "Tectonic Plates");
  return { tree, timer: new SessionTimer(tree, { sessionId: "s-test", startedAt: 0 }) };
}

describe("SessionTimer", () => {
  it("credits dwell to the node that had focus", () => {
    const { tree, timer } = setup();
    timer.focus("n1", 1_000);
    timer.focus("n2", 4_000);
    timer.blur(4_500);
    timer.focus("n1", 10_000);
    timer.endSession(12_000);

    assert.deepEqual(Object.fromEntries(timer.perNodeDwell()), { n1: 5_000, n2: 500 });
    assert.equal(tree.requireNode("n1").cumulativeDwellMs, 5_000);
    assert.equal(tree.requireNode("n2").cumulativeDwellMs, 500);
    assert.equal(tree.requireNode("n3").cumulativeDwellMs, 0);
  });

  it("sums dwell to the focused time", () => {
    const { timer } = setup();
    timer.focus("n1", 100);
    timer.focus("n2", 250);
    timer.focus("n3", 250);
    timer.focus("n2", 900);
    timer.endSession(1_000);
    assert.equal(timer.totalDwellMs(), 900);
    assert.deepEqual(Object.fromEntries(timer.perNodeDwell()), { n1: 150, n2: 100, n3: 650 });
  });

  it("does not count idle time", () => {
    const { timer } = setup();
    timer.blur(5_000);
    timer.focus("n3", 6_000);
    timer.blur(6_250);
    timer.blur(9_000);
    assert.equal(timer.totalDwellMs(), 250);
    assert.deepEqual(timer.current(), { status: "idle" });
  });

  it("reports the current focus", () => {
    const { timer } = setup();
    timer.focus("n2", 42);
    assert.deepEqual(timer.current(), { status: "focused", nodeId: "n2", since: 42 });
  });

  it("accepts a timestamp equal to the last transition", () => {
    const { timer } = setup();
    timer.focus("n1", 500);
    timer.focus("n2", 500);
    timer.blur(500);
    assert.equal(timer.totalDwellMs(), 0);
  });

  it("rejects timestamps before the last transition", () => {
    const { timer } = setup();
    timer.focus("n1", 500);
    assert.throws(
      () => timer.focus("n2", 499),
      (err: unknown) =>
        err instanceof InvalidTimestampError && err.at === 499 && err.lastTransitionAt === 500
    );
    assert.deepEqual(timer.current(), { status: "focused", nodeId: "n1", since: 500 });
  });

  it("rejects timestamps that are not finite numbers", () => {
    const { timer } = setup();
    timer.focus("n1", 10);
    assert.throws(() => timer.blur(Number.NaN), InvalidTimestampError);
    assert.throws(() => timer.focus("n2", Number.POSITIVE_INFINITY), InvalidTimestampError);
    assert.throws(() => timer.endSession(Number.NaN), /not a finite epoch-ms value/);
    assert.deepEqual(timer.current(), { status: "focused", nodeId: "n1", since: 10 });

    timer.blur(40);
    assert.deepEqual(Object.fromEntries(timer.perNodeDwell()), { n1: 30 });
    assert.equal(timer.totalDwellMs(), 30);
  });

  it("rejects focus on an unknown node without closing the interval", () => {
    const { timer } = setup();
    timer.focus("n1", 0);
    assert.throws(() => timer.focus("n9", 100), NodeNotFoundError);
    timer.blur(300);
    assert.deepEqual(Object.fromEntries(timer.perNodeDwell()), { n1: 300 });
  });

  it("keeps dwell for a node removed from the tree", () => {
    const { tree, timer } = setup();
    timer.focus("n2", 0);
    tree.removeSubtree("n2");
    timer.focus("n1", 700);
    timer.endSession(1_000);
    assert.deepEqual(Object.fromEntries(timer.perNodeDwell()), { n2: 700, n1: 300 });
    assert.equal(timer.totalDwellMs(), 1_000);
  });

  it("ends once; later ends are no-ops and transitions fail", () => {
    const { timer } = setup();
    timer.focus("n1", 0);
    assert.equal(timer.endSession(2_000), 2_000);
    assert.equal(timer.endSession(9_000), 2_000);
    assert.equal(timer.totalDwellMs(), 2_000);
    assert.equal(timer.ended, true);

    assert.throws(() => timer.focus("n1", 9_500), SessionEndedError);
    assert.throws(() => timer.blur(9_500), {
      name: "SessionEndedError",
      message: "Session s-test has already ended",
    });
    assert.deepEqual(timer.current(), { status: "ended", endedAt: 2_000 });
  });

  it("uses the clock when no timestamp is given", () => {
    let now = 100;
    const tree = new KnowledgeTree();
    tree.createRoot("Glaciers");
    const timer = new SessionTimer(tree, { clock: () => now });
    timer.focus("n1");
    now = 350;
    timer.endSession();
    assert.equal(timer.totalDwellMs(), 250);
  });
});
