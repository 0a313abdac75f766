/**
 * Tests for the configuration system
 */

import { describe, it, expect, afterEach } from "vitest";
import { config, loadConfigFromEnv, DEFAULT_DISPLAY_TERMS } from "@powser/core";

describe("config", () => {
  afterEach(() => {
    delete process.env.POWSER_DEBUG;
    delete process.env.POWSER_DISPLAY_TERMS;
    config.reset();
  });

  describe("defaults", () => {
    it("has debug off", () => {
      expect(config.get("debug")).toBe(false);
      expect(config.isDebug()).toBe(false);
    });

    it("renders three terms", () => {
      expect(config.get("display.terms")).toBe(3);
      expect(config.displayTerms()).toBe(DEFAULT_DISPLAY_TERMS);
    });

    it("returns undefined for unknown paths", () => {
      expect(config.get("nope.missing")).toBeUndefined();
      expect(config.has("nope")).toBe(false);
    });
  });

  describe("environment", () => {
    it("parses prefixed variables into nested paths", () => {
      const parsed = loadConfigFromEnv({
        POWSER_DEBUG: "1",
        POWSER_DISPLAY_TERMS: "7",
        POWSER_LABEL: "taylor",
        OTHER_VAR: "ignored",
      });
      expect(parsed).toEqual({ debug: true, display: { terms: 7 }, label: "taylor" });
    });

    it("reads false-like values", () => {
      expect(loadConfigFromEnv({ POWSER_DEBUG: "0" })).toEqual({ debug: false });
      expect(loadConfigFromEnv({ POWSER_DEBUG: "false" })).toEqual({ debug: false });
      expect(loadConfigFromEnv({ POWSER_DEBUG: "" })).toEqual({ debug: false });
    });

    it("overrides defaults", () => {
      process.env.POWSER_DEBUG = "true";
      process.env.POWSER_DISPLAY_TERMS = "5";
      config.reset();
      expect(config.isDebug()).toBe(true);
      expect(config.displayTerms()).toBe(5);
    });
  });

  describe("programmatic", () => {
    it("set merges into nested objects", () => {
      config.set({ display: { terms: 6 } });
      expect(config.displayTerms()).toBe(6);
      expect(config.get("debug")).toBe(false);
    });

    it("set wins over the environment", () => {
      process.env.POWSER_DISPLAY_TERMS = "5";
      config.reset();
      config.set({ display: { terms: 2 } });
      expect(config.displayTerms()).toBe(2);
    });

    it("falls back to the default for invalid term counts", () => {
      config.set({ display: { terms: 0 } });
      expect(config.displayTerms()).toBe(DEFAULT_DISPLAY_TERMS);
      config.set({ display: { terms: 2.5 } });
      expect(config.displayTerms()).toBe(DEFAULT_DISPLAY_TERMS);
    });

    it("reset discards programmatic values", () => {
      config.set({ debug: true });
      config.reset();
      expect(config.isDebug()).toBe(false);
    });

    it("getAll exposes the merged store", () => {
      config.set({ label: "maclaurin" });
      expect(config.getAll()).toEqual({ debug: false, display: { terms: 3 }, label: "maclaurin" });
    });
  });
});
