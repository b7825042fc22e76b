import { describe, expect, test } from "vitest";
import { fiberCouplingEfficiency, focusedWaist } from "../fiberCoupling";

const MFD = 10.4e-6; // SMF-28 at 1550 nm

describe("Fiber coupling efficiency", () => {
    test("Waist equal to the mode field diameter couples fully", () => {
        expect(fiberCouplingEfficiency(MFD, MFD)).toBe(1);
        expect(fiberCouplingEfficiency(MFD, MFD, MFD)).toBe(1);
    });

    test("Omitted y waist assumes a round beam", () => {
        for (const w of [2e-6, 5e-6, 20e-6]) {
            expect(fiberCouplingEfficiency(MFD, w)).toBe(fiberCouplingEfficiency(MFD, w, w));
        }
    });

    test("Factor-of-two mismatch either way gives 0.64", () => {
        // Each axis: 2 / (0.5 + 2) = 0.8
        expect(fiberCouplingEfficiency(1, 2)).toBeCloseTo(0.64, 12);
        expect(fiberCouplingEfficiency(1, 0.5)).toBeCloseTo(0.64, 12);
    });

    test("Elliptical beam multiplies the per-axis factors", () => {
        expect(fiberCouplingEfficiency(1, 1, 2)).toBeCloseTo(0.8, 12);
        expect(fiberCouplingEfficiency(1, 2, 1)).toBeCloseTo(0.8, 12);
    });

    test("Stays within (0, 1]", () => {
        for (const wx of [1e-7, 1e-6, 5e-6, MFD, 3e-5, 1e-3]) {
            for (const wy of [1e-6, MFD, 1e-4]) {
                const eta = fiberCouplingEfficiency(MFD, wx, wy);
                expect(eta).toBeGreaterThan(0);
                expect(eta).toBeLessThanOrEqual(1);
            }
        }
    });
});

describe("Focused waist", () => {
    test("Thin-lens spot is 4·λ·f / (π·w_in)", () => {
        // 1 µm light, f = 10 mm, 1 mm beam → 4e-5/π ≈ 12.73 µm
        const w = focusedWaist(1e-6, 0.01, 1e-3);
        expect(w / (4e-5 / Math.PI)).toBeCloseTo(1, 12);
        expect(w * 1e6).toBeCloseTo(12.7324, 3);
    });

    test("Longer focal length gives a larger spot", () => {
        expect(focusedWaist(1550e-9, 0.02, 1e-3)).toBeGreaterThan(focusedWaist(1550e-9, 0.01, 1e-3));
    });
});
