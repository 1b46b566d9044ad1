// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

export type AutomatonCompileErrorKind =
    | "UndefinedSymbol"
    | "NonTerminatingGrammar"
    | "EmptyGrammar"
    | "StateLimitExceeded"
    | "ContinuationLimitExceeded"
    | "InvalidGrammarFormat"
    | "InvalidAutomaton";

/**
 * Base class of every error raised while loading, compiling or importing.
 * `symbol` carries the offending nonterminal when there is one.
 */
export class AutomatonCompileError extends Error {
    constructor(
        public readonly kind: AutomatonCompileErrorKind,
        message: string,
        public readonly symbol?: string | undefined,
    ) {
        super(message);
        this.name = "AutomatonCompileError";
    }
}

export class UndefinedSymbolError extends AutomatonCompileError {
    constructor(
        symbol: string,
        public readonly definition: string,
    ) {
        super(
            "UndefinedSymbol",
            `Missing rule definition for '<${symbol}>' in definition '<${definition}>'`,
            symbol,
        );
        this.name = "UndefinedSymbolError";
    }
}

export class NonTerminatingGrammarError extends AutomatonCompileError {
    constructor(symbol: string) {
        super(
            "NonTerminatingGrammar",
            `Rule '<${symbol}>' has no finite derivation`,
            symbol,
        );
        this.name = "NonTerminatingGrammarError";
    }
}

export class EmptyGrammarError extends AutomatonCompileError {
    constructor(message: string, symbol?: string) {
        super("EmptyGrammar", message, symbol);
        this.name = "EmptyGrammarError";
    }
}

export class StateLimitExceededError extends AutomatonCompileError {
    constructor(
        public readonly maxStates: number,
        symbol: string,
    ) {
        super(
            "StateLimitExceeded",
            `Automaton exceeded the limit of ${maxStates} states while expanding '<${symbol}>'`,
            symbol,
        );
        this.name = "StateLimitExceededError";
    }
}

export class ContinuationLimitExceededError extends AutomatonCompileError {
    constructor(
        symbol: string,
        public readonly maxContinuationLength: number,
    ) {
        super(
            "ContinuationLimitExceeded",
            `Start rule '<${symbol}>' has no derivation within a continuation length of ${maxContinuationLength}`,
            symbol,
        );
        this.name = "ContinuationLimitExceededError";
    }
}

export class InvalidGrammarFormatError extends AutomatonCompileError {
    constructor(
        public readonly fileName: string,
        public readonly errors: readonly string[],
    ) {
        const errorStr = errors.length === 1 ? "error" : "errors";
        super(
            "InvalidGrammarFormat",
            [
                `Error detected in grammar file '${fileName}': ${errors.length} ${errorStr}.`,
                ...errors,
            ].join("\n"),
        );
        this.name = "InvalidGrammarFormatError";
    }
}

export class InvalidAutomatonError extends AutomatonCompileError {
    constructor(public readonly problems: readonly string[]) {
        super(
            "InvalidAutomaton",
            `Invalid automaton:\n${problems.map((p) => `  ${p}`).join("\n")}`,
        );
        this.name = "InvalidAutomatonError";
    }
}
