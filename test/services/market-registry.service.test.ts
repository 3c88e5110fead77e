/**
 * Tests for the in-memory market registry. Time is passed explicitly; no clock mocking.
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { fail } from "../../src/lib/errors.js";
import {
  createMarket,
  formatD9,
  getMarket,
  getMarketSnapshot,
  listMarkets,
  purchaseShares,
  quotePurchase,
  resetMarketRegistry,
  type CreateMarketInput,
} from "../../src/services/market-registry.service.js";

const NOW = 1_700_000_000;

const input: CreateMarketInput = {
  label: "rain-tomorrow",
  admin: "test-admin",
  numOutcomes: 2,
  scale: 1_000_000_000n,
  resolveAt: NOW + 3600,
};

beforeEach(() => {
  resetMarketRegistry();
  vi.stubEnv("MIN_MARKET_DURATION_SECONDS", "60");
});

describe("market-registry.service", () => {
  describe("formatD9", () => {
    it("renders nine decimal places", () => {
      expect(formatD9(731_058_578n)).toBe("0.731058578");
      expect(formatD9(500_000_000n)).toBe("0.500000000");
      expect(formatD9(1_000_000_000n)).toBe("1.000000000");
      expect(formatD9(0n)).toBe("0.000000000");
      expect(formatD9(2n)).toBe("0.000000002");
    });
  });

  describe("createMarket", () => {
    it("registers a fresh market under its label", () => {
      const created = createMarket(input, NOW);
      expect(created.ok).toBe(true);
      const stored = getMarket("rain-tomorrow");
      expect(stored.ok && stored.value.initializedAt).toBe(NOW);
      expect(listMarkets()).toHaveLength(1);
    });

    it("rejects a duplicate label and keeps the first market", () => {
      createMarket(input, NOW);
      expect(createMarket({ ...input, admin: "other-admin" }, NOW)).toEqual(fail("MarketAlreadyExists"));
      const stored = getMarket("rain-tomorrow");
      expect(stored.ok && stored.value.admin).toBe("test-admin");
    });

    it("applies the configured minimum duration", () => {
      expect(createMarket({ ...input, resolveAt: NOW + 60 }, NOW)).toEqual(fail("MarketTooQuick"));
      expect(createMarket({ ...input, resolveAt: NOW + 61 }, NOW).ok).toBe(true);
    });

    it("does not register a market that fails validation", () => {
      expect(createMarket({ ...input, numOutcomes: 17 }, NOW)).toEqual(fail("TooManyOutcomes"));
      expect(listMarkets()).toHaveLength(0);
    });
  });

  describe("getMarketSnapshot", () => {
    it("reports not found for an unknown label", () => {
      expect(getMarketSnapshot("missing")).toEqual(fail("MarketNotFound"));
    });

    it("renders a fresh binary market", () => {
      createMarket(input, NOW);
      const snapshot = getMarketSnapshot("rain-tomorrow");
      expect(snapshot.ok).toBe(true);
      if (!snapshot.ok) return;
      expect(snapshot.value).toEqual({
        label: "rain-tomorrow",
        admin: "test-admin",
        numOutcomes: 2,
        scale: "1000000000",
        initializedAt: NOW,
        resolveAt: NOW + 3600,
        reserves: ["0", "0"],
        supplies: ["0", "0"],
        cost: "693147180",
        prices: ["500000000", "500000000"],
        probabilities: ["0.500000000", "0.500000000"],
        worstCaseLoss: "693147180",
      });
    });
  });

  describe("purchaseShares", () => {
    it("mints shares and updates the stored market", () => {
      createMarket(input, NOW);
      const receipt = purchaseShares("rain-tomorrow", 0, 500_000_000n, NOW + 10);
      expect(receipt).toEqual({
        ok: true,
        value: {
          label: "rain-tomorrow",
          outcomeIndex: 0,
          amountIn: "500000000",
          sharesMinted: "831796565000000000",
          prices: ["696734670", "303265330"],
          cost: "1193147179",
        },
      });
      const snapshot = getMarketSnapshot("rain-tomorrow");
      expect(snapshot.ok && snapshot.value.supplies).toEqual(["831796565000000000", "0"]);
      expect(snapshot.ok && snapshot.value.reserves).toEqual(["500000000", "0"]);
    });

    it("rejects trades at or after resolveAt", () => {
      createMarket(input, NOW);
      expect(purchaseShares("rain-tomorrow", 0, 500_000_000n, NOW + 3600)).toEqual(fail("MarketExpired"));
      const stored = getMarket("rain-tomorrow");
      expect(stored.ok && stored.value.supplies[0]).toBe(0n);
    });

    it("surfaces engine errors", () => {
      createMarket(input, NOW);
      expect(purchaseShares("rain-tomorrow", 2, 500_000_000n, NOW)).toEqual(fail("InvalidOutcomeIndex"));
      expect(purchaseShares("rain-tomorrow", 0, 0n, NOW)).toEqual(fail("DepositIsZero"));
      expect(purchaseShares("missing", 0, 1n, NOW)).toEqual(fail("MarketNotFound"));
    });
  });

  describe("quotePurchase", () => {
    it("quotes without changing the market", () => {
      createMarket(input, NOW);
      expect(quotePurchase("rain-tomorrow", 0, 500_000_000n, NOW)).toEqual({
        ok: true,
        value: {
          label: "rain-tomorrow",
          outcomeIndex: 0,
          amountIn: "500000000",
          sharesOut: "831796565000000000",
          priceBefore: "500000000",
          priceAfter: "696734670",
          costBefore: "693147180",
          costAfter: "1193147179",
        },
      });
      const snapshot = getMarketSnapshot("rain-tomorrow");
      expect(snapshot.ok && snapshot.value.cost).toBe("693147180");
    });

    it("refuses to quote an expired market", () => {
      createMarket(input, NOW);
      expect(quotePurchase("rain-tomorrow", 0, 1n, NOW + 7200)).toEqual(fail("MarketExpired"));
    });
  });
});
