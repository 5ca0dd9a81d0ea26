import { describe, expect, it } from "vitest";
import { EASING_FUNCTIONS, SoftPitySystem } from "../src/engine/soft-pity";
import { InvalidPityConfigError, InvalidProbabilityError } from "../src/errors";
import type { Easing, SoftPityConfig } from "../src/types";
import { EASINGS, PROBABILITY_CEILING } from "../src/types";
import { ScriptedSource, throwingSource } from "./sources";

const atStreak = (
  streak: number,
  pity: number,
  soft?: SoftPityConfig
): SoftPitySystem =>
  new SoftPitySystem(pity, soft, {
    source: throwingSource,
    initialMissStreak: streak,
  });

describe("SoftPitySystem construction", () => {
  it("should reject configs that leave no room to ramp", () => {
    expect(() => atStreak(0, 10, { rampStart: 9, targetProb: 0.5 })).toThrow(
      InvalidPityConfigError
    );
    expect(() => atStreak(0, 10, { rampStart: 12, targetProb: 0.5 })).toThrow(
      InvalidPityConfigError
    );
    expect(() => atStreak(0, 10, { rampStart: 8, targetProb: 0.5 })).not.toThrow();
  });

  it.each([1, 0, -4])("should reject pity = %s when a ramp is configured", (pity) => {
    expect(() => atStreak(0, pity, { rampStart: 0, targetProb: 0.5 })).toThrow(
      InvalidPityConfigError
    );
  });

  it.each([0, 1, -0.2, 1.3, Number.NaN])(
    "should reject targetProb = %s",
    (targetProb) => {
      expect(() => atStreak(0, 90, { rampStart: 70, targetProb })).toThrow(
        InvalidPityConfigError
      );
    }
  );

  it("should reject a non-positive increment and a fractional ramp start", () => {
    expect(() =>
      atStreak(0, 90, { mode: "per_draw_increment", rampStart: 70, increment: 0 })
    ).toThrow(InvalidPityConfigError);
    expect(() => atStreak(0, 90, { rampStart: 70.5, targetProb: 0.5 })).toThrow(
      InvalidPityConfigError
    );
  });

  it("should raise a negative ramp start to 0 and default the easing", () => {
    const sp = atStreak(0, 10, { rampStart: -3, targetProb: 0.5 });
    expect(sp.ramp).toEqual({
      mode: "target_ramp",
      rampStart: 0,
      targetProb: 0.5,
      easing: "linear",
    });
  });

  it("should carry the reason on the error", () => {
    try {
      atStreak(0, 10, { rampStart: 9, targetProb: 0.5 });
      expect.unreachable("construction should throw");
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidPityConfigError);
      if (err instanceof InvalidPityConfigError) {
        expect(err.code).toBe("INVALID_PITY_CONFIG");
        expect(err.reason).toBe("rampStart 9 leaves no room to ramp before pity 10");
      }
    }
  });
});

describe("SoftPitySystem.effectiveProbability()", () => {
  // pity 11 → ramp runs over miss streaks 5..10 (length 5)
  const ramp = (easing: Easing): SoftPityConfig => ({
    rampStart: 5,
    targetProb: 0.6,
    easing,
  });

  it("should return pBase below the ramp start", () => {
    for (const easing of EASINGS) {
      for (let s = 0; s < 5; s++) {
        expect(atStreak(s, 11, ramp(easing)).effectiveProbability(0.1)).toBe(0.1);
      }
    }
  });

  it("should interpolate linearly", () => {
    expect(atStreak(5, 11, ramp("linear")).effectiveProbability(0.1)).toBeCloseTo(0.1, 12);
    expect(atStreak(6, 11, ramp("linear")).effectiveProbability(0.1)).toBeCloseTo(0.2, 12);
    expect(atStreak(9, 11, ramp("linear")).effectiveProbability(0.1)).toBeCloseTo(0.5, 12);
  });

  it("should apply easeOutQuad and easeInOutCubic", () => {
    // t = 0.2 → 1 - 0.8² = 0.36
    expect(atStreak(6, 11, ramp("easeOutQuad")).effectiveProbability(0.1)).toBeCloseTo(0.28, 12);
    // t = 0.2 → 4 · 0.008 = 0.032
    expect(atStreak(6, 11, ramp("easeInOutCubic")).effectiveProbability(0.1)).toBeCloseTo(0.116, 12);
    // t = 0.6 → 1 - 0.8³ / 2 = 0.744
    expect(atStreak(8, 11, ramp("easeInOutCubic")).effectiveProbability(0.1)).toBeCloseTo(0.472, 12);
  });

  it("should report 1 at the hard cap", () => {
    expect(atStreak(10, 11, ramp("linear")).effectiveProbability(0.1)).toBe(1);
    expect(atStreak(10, 11).effectiveProbability(0.1)).toBe(1);
  });

  it("should be non-decreasing across the ramp for every easing", () => {
    for (const easing of EASINGS) {
      const soft: SoftPityConfig = { rampStart: 73, targetProb: 0.5, easing };
      let prev = 0;
      for (let s = 0; s <= 89; s++) {
        const p = atStreak(s, 90, soft).effectiveProbability(0.006);
        if (s < 73) expect(p).toBe(0.006);
        expect(p).toBeGreaterThanOrEqual(prev);
        prev = p;
      }
    }
  });

  it("should keep easing curves anchored at 0 and 1", () => {
    for (const easing of EASINGS) {
      expect(EASING_FUNCTIONS[easing](0)).toBe(0);
      expect(EASING_FUNCTIONS[easing](1)).toBe(1);
    }
  });

  it("should add the increment once per draw past the ramp start", () => {
    const soft: SoftPityConfig = {
      mode: "per_draw_increment",
      rampStart: 10,
      increment: 0.05,
    };
    expect(atStreak(9, 20, soft).effectiveProbability(0.01)).toBe(0.01);
    expect(atStreak(10, 20, soft).effectiveProbability(0.01)).toBeCloseTo(0.06, 12);
    expect(atStreak(12, 20, soft).effectiveProbability(0.01)).toBeCloseTo(0.16, 12);
  });

  it("should never reach 1 before the hard cap", () => {
    const soft: SoftPityConfig = {
      mode: "per_draw_increment",
      rampStart: 0,
      increment: 0.5,
    };
    expect(atStreak(5, 20, soft).effectiveProbability(0.5)).toBe(PROBABILITY_CEILING);
  });
});

describe("SoftPitySystem.draw()", () => {
  it("should draw with the ramped probability", () => {
    const source = new ScriptedSource([0.15]);
    const sp = new SoftPitySystem(
      11,
      { rampStart: 5, targetProb: 0.6 },
      { source, initialMissStreak: 6 }
    );

    // effective p is 0.2 here, so 0.15 hits although pBase is only 0.1
    expect(sp.draw(0.1)).toBe(true);
    expect(sp.missStreak).toBe(0);
    expect(source.calls).toBe(1);
  });

  it("should behave like hard pity without a ramp", () => {
    const sp = new SoftPitySystem(10, undefined, { source: throwingSource });
    for (let i = 0; i < 9; i++) expect(sp.draw(0)).toBe(false);
    expect(sp.draw(0)).toBe(true);
    expect(sp.missStreak).toBe(0);
  });

  it("should degrade to a plain draw when pity <= 0 and no ramp is set", () => {
    const sp = new SoftPitySystem(0, undefined, { source: throwingSource });
    for (let i = 0; i < 50; i++) expect(sp.draw(0)).toBe(false);
    expect(sp.missStreak).toBe(0);
  });

  it("should reject an invalid base probability below the cap", () => {
    const sp = new SoftPitySystem(10, undefined, { source: throwingSource });
    expect(() => sp.draw(1.5)).toThrow(InvalidProbabilityError);
    expect(() => sp.draw(Number.NaN)).toThrow(InvalidProbabilityError);
  });

  it("should short-circuit the hard cap before looking at pBase", () => {
    const sp = new SoftPitySystem(
      10,
      { rampStart: 2, targetProb: 0.5 },
      { source: throwingSource, initialMissStreak: 9 }
    );
    expect(sp.draw(0)).toBe(true);
    expect(sp.missStreak).toBe(0);
  });
});
