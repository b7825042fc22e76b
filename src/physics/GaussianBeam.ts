import { fiberCouplingEfficiency, focusedWaist } from './fiberCoupling';
import { DEFAULT_PROFILE_SAMPLES, DEFAULT_WAIST_POSITION } from './constants';
import { parseBeamParameters } from './validation';

/** Complex beam parameter q = re + i·im. */
export interface Complex {
    re: number;
    im: number;
}

export interface ProfileSample {
    z: number; // axial position
    w: number; // beam radius at z
}

/**
 * GaussianBeam: a TEM₀₀ beam described by its waist.
 *
 * Units: any self-consistent length unit (SI meters by convention).
 * Power units are whatever the caller passes in.
 *
 * The Rayleigh length zR = π·w₀²/λ is cached and recomputed by every
 * setter, so it is never stale when read. The constructor does not
 * validate: a zero or negative wavelength or waist shows up as
 * Infinity/NaN in the results. Use `fromParameters` for checked input.
 */
export class GaussianBeam {
    private _wavelength: number;
    private _waistRadius: number;
    private _waistPosition: number;
    private _rayleighLength: number;

    constructor(wavelength: number, waistRadius: number, waistPosition: number = DEFAULT_WAIST_POSITION) {
        this._wavelength = wavelength;
        this._waistRadius = waistRadius;
        this._waistPosition = waistPosition;
        this._rayleighLength = this.computeRayleighLength();
    }

    /**
     * Build a beam from untrusted input.
     * @throws BeamParameterError if wavelength or waist radius is not a positive finite number
     */
    static fromParameters(input: unknown): GaussianBeam {
        const { wavelength, waistRadius, waistPosition } = parseBeamParameters(input);
        return new GaussianBeam(wavelength, waistRadius, waistPosition);
    }

    static fiberCouplingEfficiency(modeFieldDiameter: number, waistX: number, waistY: number = waistX): number {
        return fiberCouplingEfficiency(modeFieldDiameter, waistX, waistY);
    }

    get wavelength(): number {
        return this._wavelength;
    }

    set wavelength(value: number) {
        this._wavelength = value;
        this.onParameterChange();
    }

    get waistRadius(): number {
        return this._waistRadius;
    }

    set waistRadius(value: number) {
        this._waistRadius = value;
        this.onParameterChange();
    }

    get waistPosition(): number {
        return this._waistPosition;
    }

    // zR does not depend on the waist position; recomputed all the same.
    set waistPosition(value: number) {
        this._waistPosition = value;
        this.onParameterChange();
    }

    get rayleighLength(): number {
        return this._rayleighLength;
    }

    /** Far-field divergence half-angle θ = λ / (π·w₀), in radians. */
    get divergence(): number {
        return this._wavelength / (Math.PI * this._waistRadius);
    }

    /**
     * Beam radius (1/e² intensity) at axial position z:
     *   w(z) = w₀ · sqrt(1 + ((z - z₀)/zR)²)
     */
    beamRadius(z: number): number {
        const dz = z - this._waistPosition;
        return this._waistRadius * Math.sqrt(1 + (dz / this._rayleighLength) ** 2);
    }

    /** Complex beam parameter q(z) = (z - z₀) + i·zR. */
    qParameter(z: number): Complex {
        return { re: z - this._waistPosition, im: this._rayleighLength };
    }

    /**
     * Wavefront radius of curvature:
     *   R(z) = (z - z₀) · (1 + (zR/(z - z₀))²)
     * Infinity at the waist, where the wavefront is flat.
     */
    wavefrontRadius(z: number): number {
        const dz = z - this._waistPosition;
        if (dz === 0) return Infinity;
        return dz * (1 + (this._rayleighLength / dz) ** 2);
    }

    /** Gouy phase atan((z - z₀)/zR), in radians. */
    gouyPhase(z: number): number {
        return Math.atan((z - this._waistPosition) / this._rayleighLength);
    }

    /**
     * Irradiance at radial distance r from the axis:
     *   I(r, z) = (2P / (π·w²)) · exp(-2r²/w²)
     */
    intensity(power: number, r: number, z: number): number {
        const w = this.beamRadius(z);
        return (2 * power / (Math.PI * w ** 2)) * Math.exp(-2 * r ** 2 / w ** 2);
    }

    /**
     * Power passing a centered circular aperture of radius r at z.
     * See https://en.wikipedia.org/wiki/Gaussian_beam#Power_and_intensity
     */
    apertureTransmittedPower(incidentPower: number, apertureRadius: number, z: number): number {
        return incidentPower * (1 - Math.exp(-2 * apertureRadius ** 2 / this.beamRadius(z) ** 2));
    }

    /** Spot radius after focusing through an ideal lens; defaults to this beam's waist. */
    focusedWaist(focalLength: number, incidentWaist: number = this._waistRadius): number {
        return focusedWaist(this._wavelength, focalLength, incidentWaist);
    }

    /**
     * Coupling efficiency into a fiber placed at the focus of an ideal lens.
     * Same as `fiberCouplingEfficiency(mfd, focusedWaist(f, w_in))`.
     */
    fiberCouplingEfficiencyViaLens(
        modeFieldDiameter: number,
        focalLength: number,
        incidentWaist: number = this._waistRadius
    ): number {
        return fiberCouplingEfficiency(modeFieldDiameter, this.focusedWaist(focalLength, incidentWaist));
    }

    /**
     * Sample the beam radius at evenly spaced points from zStart to zEnd
     * (both included). Returns numSamples + 1 samples; numSamples is
     * floored and raised to at least 1, and a non-finite count falls back
     * to DEFAULT_PROFILE_SAMPLES.
     */
    sampleProfile(zStart: number, zEnd: number, numSamples: number = DEFAULT_PROFILE_SAMPLES): ProfileSample[] {
        const count = Number.isFinite(numSamples) ? numSamples : DEFAULT_PROFILE_SAMPLES;
        const n = Math.max(1, Math.floor(count));
        const samples: ProfileSample[] = [];
        const span = zEnd - zStart;

        for (let i = 0; i <= n; i++) {
            const z = zStart + (i / n) * span;
            samples.push({ z, w: this.beamRadius(z) });
        }

        return samples;
    }

    private computeRayleighLength(): number {
        return Math.PI * this._waistRadius ** 2 / this._wavelength;
    }

    private onParameterChange(): void {
        this._rayleighLength = this.computeRayleighLength();
    }
}
