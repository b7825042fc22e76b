/**
 * Coupling of a free-space Gaussian beam into the fundamental mode of a
 * single-mode fiber.
 *
 * Theoretical overlap-integral efficiency only: Fresnel loss at the fiber
 * facet (about 8% for an uncoated facet) is not included.
 */

/**
 * Overlap efficiency between a Gaussian beam with waists (waistX, waistY)
 * and a fiber mode of the given mode-field diameter:
 *
 *   η = 4 / ((mfd/wx + wx/mfd) · (mfd/wy + wy/mfd))
 *
 * Each transverse axis contributes a factor 2 / (mfd/w + w/mfd), which is
 * 1 when w = mfd. Range (0, 1].
 */
export function fiberCouplingEfficiency(
    modeFieldDiameter: number,
    waistX: number,
    waistY: number = waistX
): number {
    const termX = modeFieldDiameter / waistX + waistX / modeFieldDiameter;
    const termY = modeFieldDiameter / waistY + waistY / modeFieldDiameter;
    return 4 / (termX * termY);
}

/**
 * Diffraction-limited spot produced by an ideal thin lens of focal
 * length f from an incident Gaussian beam:
 *
 *   w_f = 4 · λ · f / (π · w_in)
 */
export function focusedWaist(wavelength: number, focalLength: number, incidentWaist: number): number {
    return 4 * wavelength * focalLength / (Math.PI * incidentWaist);
}
