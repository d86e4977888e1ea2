/**
 * One or more effects failed for reasons outside the business rules
 * (storage unreachable, a query rejected). Nothing about the failure is
 * recoverable by changing the request.
 */
export class EffectsError extends Error {
    readonly causes: Error[];

    constructor(errors: Error[]) {
        super(errors.map(e => e.message).join('; '));
        this.name = 'EffectsError';
        this.causes = errors;
    }
}

export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}
