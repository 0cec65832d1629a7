import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

vi.mock("../../logging.js", () => ({
  logSession: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { SessionStore } from "../store.js";

describe("SessionStore", () => {
  let store: SessionStore;

  beforeEach(() => {
    vi.useFakeTimers();
    store = new SessionStore({ ttlMs: 1_000, maxRecords: 5, defaultTier: "legacy" });
  });

  afterEach(() => {
    store.closeAll();
    vi.useRealTimers();
  });

  it("creates a session when no id is given", () => {
    const { session, created } = store.resolve(undefined);
    expect(created).toBe(true);
    expect(session.settings().model).toBe("legacy");
    expect(store.size()).toBe(1);
  });

  it("returns the same session for a known id", () => {
    const { session } = store.resolve(undefined);
    const again = store.resolve(session.id);
    expect(again.created).toBe(false);
    expect(again.session).toBe(session);
    expect(store.size()).toBe(1);
  });

  it("creates a fresh session for an unknown id", () => {
    const { session, created } = store.resolve("no-such-session");
    expect(created).toBe(true);
    expect(session.id).not.toBe("no-such-session");
  });

  it("keeps sessions isolated", () => {
    const a = store.create();
    const b = store.create();
    a.append({
      timestamp: "2026-03-01T10:00:00.000Z",
      original_text: "only in a",
      feedback_text: "ok",
      model_identifier: "gemini-2.0-flash",
    });
    expect(a.history()).toHaveLength(1);
    expect(b.history()).toHaveLength(0);
  });

  it("expires idle sessions", () => {
    const { session } = store.resolve(undefined);
    vi.advanceTimersByTime(1_001);
    expect(store.size()).toBe(0);
    expect(store.resolve(session.id).created).toBe(true);
  });

  it("refreshes the idle timer on each hit", () => {
    const { session } = store.resolve(undefined);
    vi.advanceTimersByTime(600);
    store.resolve(session.id);
    vi.advanceTimersByTime(600);
    const again = store.resolve(session.id);
    expect(again.created).toBe(false);
    expect(again.session).toBe(session);
  });

  it("destroys sessions on demand", () => {
    const session = store.create();
    expect(store.destroy(session.id)).toBe(true);
    expect(store.destroy(session.id)).toBe(false);
    expect(store.size()).toBe(0);
  });
});
