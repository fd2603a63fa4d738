import { describe, it, expect } from "vitest";
import {
  appendHistory,
  createSessionState,
  expiryInstant,
  historyPlaces,
  isExpired,
  isSilent,
  markTerminal,
  recentExclusions,
  toSnapshot,
} from "../session-state.js";

const T0 = Date.parse("2026-03-01T10:00:00Z");

function makeState() {
  return createSessionState({
    userId: "u1",
    destinationId: "dest-1",
    position: { latitude: 55.75, longitude: 37.62 },
    trackingDurationSeconds: 3600,
    deliveryIntervalMinutes: 10,
    language: "ru",
    now: T0,
  });
}

describe("createSessionState", () => {
  it("starts with no deliveries, no history and the start time as last update", () => {
    const state = makeState();
    expect(state.deliveryCount).toBe(0);
    expect(state.contentHistory).toEqual([]);
    expect(state.lastUpdateTime).toBe(T0);
    expect(state.terminal).toBeNull();
    expect(expiryInstant(state)).toBe(T0 + 3_600_000);
  });
});

describe("expiry and silence", () => {
  it("is expired exactly at the expiry instant", () => {
    const state = makeState();
    expect(isExpired(state, T0 + 3_599_999)).toBe(false);
    expect(isExpired(state, T0 + 3_600_000)).toBe(true);
  });

  it("is silent only once the gap exceeds the threshold", () => {
    const state = makeState();
    expect(isSilent(state, T0 + 180_000, 180_000)).toBe(false);
    expect(isSilent(state, T0 + 180_001, 180_000)).toBe(true);
  });
});

describe("markTerminal", () => {
  it("lets only the first claim win", () => {
    const state = makeState();
    expect(markTerminal(state, "silent")).toBe(true);
    expect(markTerminal(state, "expired")).toBe(false);
    expect(state.terminal).toBe("silent");
  });
});

describe("history", () => {
  it("drops the oldest entries beyond the limit", () => {
    const state = makeState();
    for (const place of ["A1", "B2", "C3", "D4"]) {
      appendHistory(state, place, `about ${place}`, 3);
    }
    expect(state.contentHistory).toEqual(["B2: about B2", "C3: about C3", "D4: about D4"]);
  });

  it("returns the newest entries oldest first as exclusions", () => {
    const state = makeState();
    for (const place of ["A1", "B2", "C3"]) {
      appendHistory(state, place, "x", 10);
    }
    expect(recentExclusions(state, 2)).toEqual(["B2: x", "C3: x"]);
    expect(recentExclusions(state, 0)).toEqual([]);
  });

  it("extracts place names, skipping entries without a place", () => {
    const state = makeState();
    state.contentHistory.push("Red Square: a fact: with colons", "no separator here", ": empty place");
    expect(historyPlaces(state)).toEqual(["Red Square"]);
  });
});

describe("toSnapshot", () => {
  it("reports times as ISO strings and the history size", () => {
    const state = makeState();
    appendHistory(state, "Red Square", "a fact", 10);
    state.deliveryCount = 1;

    expect(toSnapshot(state)).toEqual({
      userId: "u1",
      destinationId: "dest-1",
      language: "ru",
      position: { latitude: 55.75, longitude: 37.62 },
      startedAt: "2026-03-01T10:00:00.000Z",
      lastUpdateAt: "2026-03-01T10:00:00.000Z",
      expiresAt: "2026-03-01T11:00:00.000Z",
      deliveryIntervalMinutes: 10,
      deliveryCount: 1,
      historySize: 1,
    });
  });
});
