import test from "node:test";
import assert from "node:assert/strict";
import { buildSnapshot } from "../lib/snapshot";
import { computeAllStats, computeStreak, computeWinLossStats, type Outcome } from "../lib/stats";
import { matchRow, player, threeMatchSeries } from "./fixtures";

function newestFirst(chronological: Outcome[]) {
  return [...chronological].reverse();
}

test("streak counts the run ending at the most recent match", () => {
  assert.equal(computeStreak(newestFirst(["win", "win", "loss", "win"])), 1);
  assert.equal(computeStreak(newestFirst(["loss", "loss", "loss"])), -3);
  assert.equal(computeStreak([]), 0);
  assert.equal(computeStreak(newestFirst(["loss", "win", "win", "win", "win", "win", "win", "win"])), 7);
});

test("player with no games has zeroed stats", () => {
  const snapshot = buildSnapshot({ players: [player("e")], matches: threeMatchSeries() });

  assert.deepEqual(computeWinLossStats(snapshot.matches, "e"), {
    playerId: "e",
    wins: 0,
    losses: 0,
    totalGames: 0,
    winRate: 0,
    streak: 0
  });
});

test("three match series gives A two wins, one loss and a streak of one", () => {
  const snapshot = buildSnapshot({ players: [], matches: threeMatchSeries() });
  const stats = computeWinLossStats(snapshot.matches, "a");

  assert.equal(stats.wins, 2);
  assert.equal(stats.losses, 1);
  assert.equal(stats.totalGames, 3);
  assert.ok(Math.abs(stats.winRate - 2 / 3) < 1e-12);
  assert.equal(stats.streak, 1);

  assert.equal(computeWinLossStats(snapshot.matches, "c").streak, -1);
});

test("streak follows played_at, not input order", () => {
  const rows = [
    matchRow("late", ["a", "b"], ["c", "d"], "2024-05-03T10:00:00Z"),
    matchRow("early", ["c", "d"], ["a", "b"], "2024-05-01T10:00:00Z"),
    matchRow("middle", ["a", "c"], ["b", "d"], "2024-05-02T10:00:00Z")
  ];
  const snapshot = buildSnapshot({ players: [], matches: rows });

  assert.equal(computeWinLossStats(snapshot.matches, "a").streak, 2);
  assert.equal(computeWinLossStats(snapshot.matches, "b").streak, 1);
  assert.equal(computeWinLossStats(snapshot.matches, "d").streak, -2);
});

test("timestamp collisions are ordered by match id ascending", () => {
  // Same instant: "m-a" counts as the most recent, then "m-b".
  const rows = [
    matchRow("m-b", ["a", "b"], ["c", "d"], "2024-05-01T10:00:00Z"),
    matchRow("m-a", ["c", "d"], ["a", "b"], "2024-05-01T10:00:00Z")
  ];
  const snapshot = buildSnapshot({ players: [], matches: rows });

  assert.equal(computeWinLossStats(snapshot.matches, "a").streak, -1);
  assert.equal(computeWinLossStats(snapshot.matches, "c").streak, 1);
});

test("all-player stats cover directory players and unknown participants", () => {
  const snapshot = buildSnapshot({ players: [player("a"), player("zoe")], matches: threeMatchSeries() });
  const stats = computeAllStats(snapshot);

  assert.deepEqual(
    stats.map((entry) => entry.playerId),
    ["a", "b", "c", "d", "zoe"]
  );
  assert.equal(stats.find((entry) => entry.playerId === "zoe")?.totalGames, 0);
});

test("wins and losses across all players each sum to twice the match count", () => {
  const rows = [
    ...threeMatchSeries(),
    matchRow("m4", ["a", "c"], ["b", "e"], "2024-05-02T09:00:00Z"),
    matchRow("m5", ["e", "d"], ["a", "f"], "2024-05-02T09:30:00Z")
  ];
  const stats = computeAllStats(buildSnapshot({ players: [], matches: rows }));

  assert.equal(stats.reduce((sum, entry) => sum + entry.wins, 0), 10);
  assert.equal(stats.reduce((sum, entry) => sum + entry.losses, 0), 10);
});

test("all-player stats match per-player computation and are repeatable", () => {
  const snapshot = buildSnapshot({ players: [], matches: threeMatchSeries() });
  const first = computeAllStats(snapshot);
  const second = computeAllStats(snapshot);

  assert.deepEqual(first, second);
  for (const entry of first) {
    assert.deepEqual(entry, computeWinLossStats(snapshot.matches, entry.playerId));
  }
});
