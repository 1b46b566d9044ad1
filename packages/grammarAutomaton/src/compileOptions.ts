// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

export interface CompileOptions {
    /** Name recorded on the automaton, for debugging */
    name?: string | undefined;

    /**
     * Longest continuation (tokens still to match after a nonterminal) an
     * expansion may carry. Alternatives that would exceed it are pruned, which
     * bounds self-embedding and left-recursive rules.
     * Default: 16
     */
    maxContinuationLength?: number | undefined;

    /**
     * Upper bound on the number of states created. Exceeding it aborts
     * construction with a StateLimitExceededError.
     * Default: 1,000,000
     */
    maxStates?: number | undefined;
}

export type ResolvedCompileOptions = {
    name: string | undefined;
    maxContinuationLength: number;
    maxStates: number;
};

export const DEFAULT_MAX_CONTINUATION_LENGTH = 16;
export const DEFAULT_MAX_STATES = 1_000_000;

export function resolveCompileOptions(
    options: CompileOptions = {},
): ResolvedCompileOptions {
    const maxContinuationLength =
        options.maxContinuationLength ?? DEFAULT_MAX_CONTINUATION_LENGTH;
    const maxStates = options.maxStates ?? DEFAULT_MAX_STATES;

    if (!Number.isInteger(maxContinuationLength) || maxContinuationLength < 0) {
        throw new RangeError(
            `maxContinuationLength must be a non-negative integer, got ${maxContinuationLength}`,
        );
    }
    if (!Number.isInteger(maxStates) || maxStates < 1) {
        throw new RangeError(
            `maxStates must be a positive integer, got ${maxStates}`,
        );
    }
    return { name: options.name, maxContinuationLength, maxStates };
}
