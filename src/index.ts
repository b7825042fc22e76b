export { GaussianBeam } from './physics/GaussianBeam';
export type { Complex, ProfileSample } from './physics/GaussianBeam';
export { fiberCouplingEfficiency, focusedWaist } from './physics/fiberCoupling';
export {
    BeamParametersSchema,
    BeamParameterError,
    parseBeamParameters
} from './physics/validation';
export type { BeamParameters, BeamParametersInput } from './physics/validation';
export { DEFAULT_PROFILE_SAMPLES, DEFAULT_WAIST_POSITION } from './physics/constants';
