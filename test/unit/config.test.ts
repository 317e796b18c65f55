import { describe, it, expect } from "vitest";
import { DEFAULT_PARAMS, resolveParams } from "../../src/config.js";
import type { ProtocolParams } from "../../src/config.js";
import { InvalidConfigError } from "../../src/utils/errors.js";

describe("resolveParams", () => {
  it("falls back to the defaults", () => {
    expect(resolveParams()).toEqual({
      liquidationThresholdPct: 50n,
      liquidationBonusPct: 10n,
      minHealthFactor: 10n ** 18n,
      priceTimeoutSeconds: 10_800,
    });
  });

  it("applies overrides on top of the defaults", () => {
    expect(resolveParams({ liquidationBonusPct: 5n, priceTimeoutSeconds: 60 })).toEqual({
      ...DEFAULT_PARAMS,
      liquidationBonusPct: 5n,
      priceTimeoutSeconds: 60,
    });
  });

  it("does not share the defaults object", () => {
    const params = resolveParams();
    params.liquidationBonusPct = 99n;
    expect(DEFAULT_PARAMS.liquidationBonusPct).toBe(10n);
  });

  const invalid: [string, Partial<ProtocolParams>][] = [
    ["zero threshold", { liquidationThresholdPct: 0n }],
    ["threshold over 100", { liquidationThresholdPct: 101n }],
    ["negative bonus", { liquidationBonusPct: -1n }],
    ["bonus over 100", { liquidationBonusPct: 101n }],
    ["zero minimum health factor", { minHealthFactor: 0n }],
    ["zero timeout", { priceTimeoutSeconds: 0 }],
    ["fractional timeout", { priceTimeoutSeconds: 1.5 }],
  ];

  it.each(invalid)("rejects a %s", (_label, overrides) => {
    expect(() => resolveParams(overrides)).toThrow(InvalidConfigError);
  });
});
