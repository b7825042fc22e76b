/** Axial position of the waist when none is given. */
export const DEFAULT_WAIST_POSITION = 0;

/** Number of intervals used by `GaussianBeam.sampleProfile` (yields one more sample). */
export const DEFAULT_PROFILE_SAMPLES = 20;
