import { expect } from "chai";

import {
  ConfigurationError,
  DEFAULT_POLICY,
  ERROR_CONFIG_INVALID,
  describePolicy,
  resolvePolicy,
} from "../../../src/search/index.js";

describe("search/policy", () => {
  it("exposes the documented defaults", () => {
    expect(DEFAULT_POLICY).to.deep.equal({
      useQuotes: true,
      requireExact: true,
      trustQueryOnEmptyBody: true,
      minViews: 0,
      maxPages: 3,
      dateToInclusive: false,
      fuzzyThreshold: 0.8,
    });
    expect(Object.isFrozen(DEFAULT_POLICY)).to.equal(true);
  });

  it("merges overrides onto the base policy", () => {
    const base = resolvePolicy({ minViews: 100 });
    const policy = resolvePolicy({ requireExact: false, maxPages: 5 }, base);
    expect(policy.minViews).to.equal(100);
    expect(policy.requireExact).to.equal(false);
    expect(policy.maxPages).to.equal(5);
    expect(policy.useQuotes).to.equal(true);
  });

  it("rejects out-of-range values with a configuration error", () => {
    let captured: unknown;
    try {
      resolvePolicy({ maxPages: 0 });
    } catch (error) {
      captured = error;
    }
    expect(captured).to.be.instanceOf(ConfigurationError);
    if (captured instanceof ConfigurationError) {
      expect(captured.code).to.equal(ERROR_CONFIG_INVALID);
      expect(captured.message).to.match(/^Invalid search policy \(maxPages: /);
    }
    expect(() => resolvePolicy({ minViews: -1 })).to.throw(ConfigurationError);
    expect(() => resolvePolicy({ minViews: 1.5 })).to.throw(ConfigurationError);
    expect(() => resolvePolicy({ fuzzyThreshold: 0 })).to.throw(ConfigurationError);
    expect(() => resolvePolicy({ fuzzyThreshold: 1.2 })).to.throw(ConfigurationError);
  });

  it("describes the policy on one line", () => {
    expect(describePolicy(DEFAULT_POLICY)).to.equal(
      "quotes=on mode=strict trust_empty=on min_views=0 max_pages=3 date_to_inclusive=off",
    );
    const relaxed = resolvePolicy({
      useQuotes: false,
      requireExact: false,
      trustQueryOnEmptyBody: false,
      minViews: 1000,
      maxPages: 1,
      dateToInclusive: true,
    });
    expect(describePolicy(relaxed)).to.equal(
      "quotes=off mode=fuzzy(0.8) trust_empty=off min_views=1000 max_pages=1 date_to_inclusive=on",
    );
  });
});
