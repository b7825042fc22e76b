import { z } from 'zod';
import { DEFAULT_WAIST_POSITION } from './constants';

export const BeamParametersSchema = z.object({
    wavelength: z.number().finite().positive(),
    waistRadius: z.number().finite().positive(),
    waistPosition: z.number().finite().default(DEFAULT_WAIST_POSITION),
});

export type BeamParameters = z.infer<typeof BeamParametersSchema>;
export type BeamParametersInput = z.input<typeof BeamParametersSchema>;

/** Thrown when beam parameters fail validation. */
export class BeamParameterError extends Error {
    readonly issues: z.ZodIssue[];

    constructor(issues: z.ZodIssue[]) {
        const detail = issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        super(`Invalid beam parameters: ${detail}`);
        this.name = 'BeamParameterError';
        this.issues = issues;
    }
}

export function parseBeamParameters(input: unknown): BeamParameters {
    const parsed = BeamParametersSchema.safeParse(input);
    if (!parsed.success) {
        throw new BeamParameterError(parsed.error.issues);
    }
    return parsed.data;
}
