// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

/**
 * Grammar Types - in memory
 */
export type TerminalToken = {
    type: "terminal";
    text: string;
};

export type NonTerminalToken = {
    type: "nonterminal";
    name: string;
};

export type Token = TerminalToken | NonTerminalToken;

// One way to derive a nonterminal. Token order is significant.
export type Alternative = readonly Token[];

export type Grammar = {
    start: string;
    // Declaration order of both rules and alternatives drives state numbering.
    rules: ReadonlyMap<string, readonly Alternative[]>;
};

export function terminal(text: string): TerminalToken {
    return { type: "terminal", text };
}

export function nonTerminal(name: string): NonTerminalToken {
    return { type: "nonterminal", name };
}

/**
 * Build a grammar from a plain record, e.g.
 *
 * ```ts
 * createGrammar("S", {
 *     S: [[terminal("a"), nonTerminal("S"), terminal("b")], [terminal("c")]],
 * });
 * ```
 */
export function createGrammar(
    start: string,
    rules: Record<string, readonly Alternative[]>,
): Grammar {
    return { start, rules: new Map(Object.entries(rules)) };
}

export function formatToken(token: Token): string {
    switch (token.type) {
        case "terminal":
            return JSON.stringify(token.text);
        case "nonterminal":
            return `<${token.name}>`;
    }
}

export function formatAlternative(alternative: Alternative): string {
    return alternative.length === 0
        ? "ε"
        : alternative.map(formatToken).join(" ");
}
