import test from "node:test";
import assert from "node:assert/strict";
import { analyzeRelationships } from "../lib/relationships";
import { buildSnapshot } from "../lib/snapshot";
import { matchRow, threeMatchSeries } from "./fixtures";

function matchesOf(rows: ReturnType<typeof threeMatchSeries>) {
  return buildSnapshot({ players: [], matches: rows }).matches;
}

test("best partner counts joint wins and losses with the same teammate", () => {
  const relationships = analyzeRelationships(matchesOf(threeMatchSeries()), "a");

  assert.deepEqual(relationships.bestPartner, { partnerId: "b", wins: 2, losses: 1 });
});

test("nemesis ties on losses and margin fall back to the lower opponent id", () => {
  const relationships = analyzeRelationships(matchesOf(threeMatchSeries()), "c");

  assert.deepEqual(relationships.nemesis, { opponentId: "a", lossesAgainst: 2, winsAgainst: 1 });
});

test("player with no games has no partner and no nemesis", () => {
  const relationships = analyzeRelationships(matchesOf(threeMatchSeries()), "nobody");

  assert.deepEqual(relationships, { bestPartner: null, nemesis: null });
});

test("player who never lost has no nemesis", () => {
  const rows = [
    matchRow("m1", ["a", "b"], ["c", "d"], "2024-05-01T10:00:00Z"),
    matchRow("m2", ["a", "c"], ["b", "d"], "2024-05-01T11:00:00Z")
  ];
  const relationships = analyzeRelationships(matchesOf(rows), "a");

  assert.equal(relationships.nemesis, null);
  assert.deepEqual(relationships.bestPartner, { partnerId: "b", wins: 1, losses: 0 });
});

test("best partner ties on wins prefer more games together, then lower id", () => {
  const rows = [
    matchRow("m1", ["p", "x"], ["q", "r"], "2024-05-01T10:00:00Z"),
    matchRow("m2", ["p", "w"], ["q", "r"], "2024-05-01T11:00:00Z"),
    matchRow("m3", ["q", "r"], ["p", "w"], "2024-05-01T12:00:00Z"),
    matchRow("m4", ["p", "v"], ["q", "r"], "2024-05-01T13:00:00Z")
  ];
  const relationships = analyzeRelationships(matchesOf(rows), "p");

  // w: 1 win in 2 games; v and x: 1 win in 1 game each.
  assert.deepEqual(relationships.bestPartner, { partnerId: "w", wins: 1, losses: 1 });

  const withoutW = analyzeRelationships(matchesOf(rows.filter((row) => row.id !== "m3")), "p");
  assert.deepEqual(withoutW.bestPartner, { partnerId: "v", wins: 1, losses: 0 });
});

test("nemesis ties on losses prefer the wider losing margin", () => {
  const rows = [
    matchRow("m1", ["x", "y"], ["p", "q"], "2024-05-01T10:00:00Z"),
    matchRow("m2", ["x", "z"], ["p", "q"], "2024-05-01T11:00:00Z"),
    matchRow("m3", ["p", "q"], ["x", "w"], "2024-05-01T12:00:00Z"),
    matchRow("m4", ["y", "w"], ["p", "q"], "2024-05-01T13:00:00Z")
  ];
  const relationships = analyzeRelationships(matchesOf(rows), "p");

  // x: 2 losses, 1 win against. y: 2 losses, 0 wins against.
  assert.deepEqual(relationships.nemesis, { opponentId: "y", lossesAgainst: 2, winsAgainst: 0 });
});

test("minimum sample options exclude thin partnerships and rivalries", () => {
  const relationships = analyzeRelationships(matchesOf(threeMatchSeries()), "a", {
    minPartnerGames: 4,
    minNemesisLosses: 2
  });

  assert.deepEqual(relationships, { bestPartner: null, nemesis: null });
});
