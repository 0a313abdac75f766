import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { config, resetLogWriter, setLogWriter } from "@powser/core";
import { divide, expSeries, identity, sqrt } from "../src/index.js";
import { R, poly } from "./fixtures.js";

describe("debug logging", () => {
  let lines: string[];

  beforeEach(() => {
    lines = [];
    setLogWriter((line) => lines.push(line));
  });

  afterEach(() => {
    resetLogWriter();
    config.reset();
  });

  it("is silent unless debug is on", () => {
    expSeries(R);
    expect(lines).toEqual([]);
  });

  it("reports tied knots", () => {
    config.set({ debug: true });
    expSeries(R);
    expect(lines).toEqual(["[powser:lazy] tied exp"]);
  });

  it("reports cancelled leading zeros in divide", () => {
    const num = identity(R);
    const den = poly(0, 2);
    config.set({ debug: true });
    divide(num, den, R);
    expect(lines).toEqual(["[powser:series] divide: cancelled x^1 from numerator and denominator"]);
  });

  it("reports a factored square", () => {
    const f = poly(0, 0, 1);
    config.set({ debug: true });
    sqrt(f, R);
    expect(lines).toEqual(["[powser:series] sqrt: factored out x^2"]);
  });
});
