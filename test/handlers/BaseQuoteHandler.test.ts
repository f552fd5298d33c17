import { applySlippage, deadlineFrom } from "../../src/services/handlers/BaseQuoteHandler";

describe("applySlippage", () => {
  it("floors the whole-percent case", () => {
    expect(applySlippage(123_456_789n, 1)).toBe(122_222_221n);
  });

  it("keeps precision below a basis point", () => {
    expect(applySlippage(1_000_000n, 0.125)).toBe(998_750n);
    expect(applySlippage(1_000_000n, 0.0001)).toBe(999_999n);
    expect(applySlippage(10n ** 18n, 1e-7)).toBe(999_999_999_000_000_000n);
  });

  it("clamps at zero and full tolerance", () => {
    expect(applySlippage(1_000n, 0)).toBe(1_000n);
    expect(applySlippage(1_000n, 100)).toBe(0n);
    expect(applySlippage(1_000n, 150)).toBe(0n);
  });
});

describe("deadlineFrom", () => {
  it("adds the window to the current second", () => {
    expect(deadlineFrom(1_700_000_000.9, 300)).toBe(1_700_000_300n);
  });
});
