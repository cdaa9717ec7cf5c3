/**
 * cache-epochs.test.ts — Write-after-read commit guard
 */

import { describe, it, expect } from "vitest";
import { CacheEpochs } from "../src/cache/cache-epochs.js";

describe("CacheEpochs", () => {
  it("a capture stays current until something bumps", () => {
    const epochs = new CacheEpochs();
    const captured = epochs.capture("u1:foodEntries");
    expect(epochs.isCurrent("u1:foodEntries", captured)).toBe(true);
  });

  it("an exact bump stales only that key", () => {
    const epochs = new CacheEpochs();
    const a = epochs.capture("u1:settings:prefs");
    const b = epochs.capture("u1:settings:other");
    epochs.bump("u1:settings:prefs");
    expect(epochs.isCurrent("u1:settings:prefs", a)).toBe(false);
    expect(epochs.isCurrent("u1:settings:other", b)).toBe(true);
  });

  it("a prefix bump stales every key under it", () => {
    const epochs = new CacheEpochs();
    const list = epochs.capture("u1:foodEntries?limit=5");
    const one = epochs.capture("u1:foodEntries:e1");
    const other = epochs.capture("u1:settings");
    epochs.bump("u1:foodEntries*");
    expect(epochs.isCurrent("u1:foodEntries?limit=5", list)).toBe(false);
    expect(epochs.isCurrent("u1:foodEntries:e1", one)).toBe(false);
    expect(epochs.isCurrent("u1:settings", other)).toBe(true);
  });

  it("a prefix bump leaves collections that share a name prefix", () => {
    const epochs = new CacheEpochs();
    const longer = epochs.capture("u1:foodEntries:e1");
    const own = epochs.capture("u1:food:e1");
    epochs.bump("u1:food*");
    expect(epochs.isCurrent("u1:foodEntries:e1", longer)).toBe(true);
    expect(epochs.isCurrent("u1:food:e1", own)).toBe(false);
  });

  it("a capture taken after a bump is current", () => {
    const epochs = new CacheEpochs();
    epochs.bump("u1:foodEntries*");
    const captured = epochs.capture("u1:foodEntries:e1");
    expect(epochs.isCurrent("u1:foodEntries:e1", captured)).toBe(true);
  });

  it("bumpAll() stales every earlier capture", () => {
    const epochs = new CacheEpochs();
    const a = epochs.capture("u1:a");
    epochs.bump("u1:b");
    const b = epochs.capture("u1:b");
    epochs.bumpAll();
    expect(epochs.isCurrent("u1:a", a)).toBe(false);
    expect(epochs.isCurrent("u1:b", b)).toBe(false);
    const fresh = epochs.capture("u1:a");
    expect(epochs.isCurrent("u1:a", fresh)).toBe(true);
  });
});
