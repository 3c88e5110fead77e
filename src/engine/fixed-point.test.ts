import { describe, it, expect } from "vitest";
import Decimal from "decimal.js";
import { U128_MAX } from "../lib/checked-math.js";
import { fail, ok } from "../lib/errors.js";
import { D9, E_D9, EXP_ARG_LIMIT, fpExp, fpLn } from "./fixed-point.js";

const HP = Decimal.clone({ precision: 60 });

function trueExp(x: bigint): Decimal {
  return new HP(x.toString()).div(D9.toString()).exp().times(D9.toString());
}

function trueLn(x: bigint): Decimal {
  return new HP(x.toString()).div(D9.toString()).ln().times(D9.toString());
}

function unwrap(r: { ok: true; value: bigint } | { ok: false }): bigint {
  if (!r.ok) throw new Error("unexpected error result");
  return r.value;
}

describe("fpExp", () => {
  it("matches known values", () => {
    expect(fpExp(0n)).toEqual(ok(D9));
    expect(fpExp(D9)).toEqual(ok(2_718_281_828n));
    expect(fpExp(-D9)).toEqual(ok(367_879_441n));
    expect(fpExp(D9 / 2n)).toEqual(ok(1_648_721_270n));
    expect(fpExp(4n * D9)).toEqual(ok(54_598_150_033n));
    expect(fpExp(1n)).toEqual(ok(1_000_000_001n));
  });

  it("saturates above +20 and flushes to zero below -20", () => {
    expect(fpExp(EXP_ARG_LIMIT + 1n)).toEqual(ok(U128_MAX));
    expect(fpExp(100n * D9)).toEqual(ok(U128_MAX));
    expect(fpExp(-EXP_ARG_LIMIT - 1n)).toEqual(ok(0n));
    expect(fpExp(-100n * D9)).toEqual(ok(0n));
  });

  it("still evaluates the series on the domain edges", () => {
    expect(fpExp(-EXP_ARG_LIMIT)).toEqual(ok(2n));
    const top = unwrap(fpExp(EXP_ARG_LIMIT));
    const rel = new HP(top.toString()).minus(trueExp(EXP_ARG_LIMIT)).abs().div(trueExp(EXP_ARG_LIMIT));
    expect(rel.lt("1e-12")).toBe(true);
  });

  it("stays within one unit of e^x across the domain", () => {
    const cutoff = new HP("1e12");
    for (let x = -EXP_ARG_LIMIT; x <= EXP_ARG_LIMIT; x += 37_123_457n) {
      const got = new HP(unwrap(fpExp(x)).toString());
      const want = trueExp(x);
      const err = got.minus(want).abs();
      if (want.lt(cutoff)) {
        expect(err.lte(1), `x=${x}`).toBe(true);
      } else {
        expect(err.div(want).lt("1e-12"), `x=${x}`).toBe(true);
      }
    }
  });

  it("is monotonic", () => {
    let prev = unwrap(fpExp(-EXP_ARG_LIMIT));
    for (let x = -EXP_ARG_LIMIT; x <= EXP_ARG_LIMIT; x += 250_000_000n) {
      const cur = unwrap(fpExp(x));
      expect(cur >= prev).toBe(true);
      prev = cur;
    }
  });
});

describe("fpLn", () => {
  it("ln(1) is exactly zero", () => {
    expect(fpLn(D9)).toEqual(ok(0n));
  });

  it("rejects zero and negative arguments as a domain error", () => {
    expect(fpLn(0n)).toEqual(fail("MathDomain"));
    expect(fpLn(-5n)).toEqual(fail("MathDomain"));
  });

  it("matches known values", () => {
    expect(fpLn(2n * D9)).toEqual(ok(693_147_180n));
    expect(fpLn(D9 / 2n)).toEqual(ok(-693_147_180n));
    expect(fpLn(3n * D9)).toEqual(ok(1_098_612_288n));
    expect(fpLn(10n * D9)).toEqual(ok(2_302_585_092n));
    expect(fpLn(E_D9)).toEqual(ok(999_999_999n));
    expect(fpLn(1n)).toEqual(ok(-20_723_265_836n));
  });

  it("reduces the largest u128 argument without hitting the step cap", () => {
    expect(fpLn(U128_MAX)).toEqual(ok(67_999_573_274n));
  });

  it("stays within one unit of ln(x)", () => {
    const samples: bigint[] = [
      1n, 2n, 7n, 1234n, 98_765_432n, 500_000_000n, 999_999_999n, D9 + 1n, D9 + 7n,
      1_500_000_000n, 2n * D9, 2n * D9 + 1n, E_D9, 3n * D9, 123n * D9 + 456n, D9 * D9, 10n ** 30n,
    ];
    for (let x = D9 / 10n; x < 40n * D9; x += 333_333_337n) samples.push(x);
    for (const x of samples) {
      const got = new HP(unwrap(fpLn(x)).toString());
      expect(got.minus(trueLn(x)).abs().lt(1), `x=${x}`).toBe(true);
    }
  });
});
