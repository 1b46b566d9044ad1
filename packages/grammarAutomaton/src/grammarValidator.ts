// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { EmptyGrammarError, UndefinedSymbolError } from "./errors.js";
import { Alternative, Grammar } from "./grammarTypes.js";

/**
 * Nonterminal names referenced by a rule's alternatives, in first-seen order.
 */
export function collectReferences(
    alternatives: readonly Alternative[],
): string[] {
    const seen = new Set<string>();
    for (const alternative of alternatives) {
        for (const token of alternative) {
            if (token.type === "nonterminal") {
                seen.add(token.name);
            }
        }
    }
    return Array.from(seen);
}

/**
 * Check that the grammar is non-empty, has its start rule, and is closed:
 * every nonterminal reference names a defined rule. Unreachable rules are
 * checked too.
 */
export function validateGrammar(grammar: Grammar): void {
    if (grammar.rules.size === 0) {
        throw new EmptyGrammarError("Grammar has no rules");
    }
    if (!grammar.rules.has(grammar.start)) {
        throw new EmptyGrammarError(
            `Start rule '<${grammar.start}>' is not defined`,
            grammar.start,
        );
    }
    for (const [name, alternatives] of grammar.rules) {
        for (const ref of collectReferences(alternatives)) {
            if (!grammar.rules.has(ref)) {
                throw new UndefinedSymbolError(ref, name);
            }
        }
    }
}
