// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import registerDebug from "debug";
import { NonTerminatingGrammarError } from "./errors.js";
import { Grammar } from "./grammarTypes.js";
import { collectReferences } from "./grammarValidator.js";

const debugAnalysis = registerDebug("grammar-automaton:analysis");

export type GrammarAnalysis = {
    // Rules reachable from the start rule, in discovery order.
    reachable: string[];
    // Rules with at least one finite, terminal-only derivation.
    productive: Set<string>;
    // Reachable rules that are not productive. Non-empty means rejection.
    unproductive: string[];
    // Rules never reached from the start rule.
    unused: string[];
};

/**
 * Fixed-point computation of the productive rules. Each pass marks rules
 * having an alternative made only of terminals and already-productive
 * references; at most one pass per rule is needed before nothing changes.
 */
export function computeProductiveSymbols(grammar: Grammar): Set<string> {
    const productive = new Set<string>();
    let changed = true;
    while (changed) {
        changed = false;
        for (const [name, alternatives] of grammar.rules) {
            if (productive.has(name)) {
                continue;
            }
            const finite = alternatives.some((alternative) =>
                alternative.every(
                    (token) =>
                        token.type === "terminal" ||
                        productive.has(token.name),
                ),
            );
            if (finite) {
                productive.add(name);
                changed = true;
            }
        }
    }
    return productive;
}

export function computeReachableSymbols(grammar: Grammar): string[] {
    if (!grammar.rules.has(grammar.start)) {
        return [];
    }
    const reachable = [grammar.start];
    const seen = new Set(reachable);
    for (let i = 0; i < reachable.length; i++) {
        const alternatives = grammar.rules.get(reachable[i]) ?? [];
        for (const ref of collectReferences(alternatives)) {
            if (!seen.has(ref) && grammar.rules.has(ref)) {
                seen.add(ref);
                reachable.push(ref);
            }
        }
    }
    return reachable;
}

export function analyzeGrammar(grammar: Grammar): GrammarAnalysis {
    const productive = computeProductiveSymbols(grammar);
    const reachable = computeReachableSymbols(grammar);
    const reached = new Set(reachable);
    const unproductive = reachable.filter((name) => !productive.has(name));
    const unused = Array.from(grammar.rules.keys()).filter(
        (name) => !reached.has(name),
    );
    if (unused.length > 0) {
        debugAnalysis(
            `Rules defined but never used: ${unused.map((n) => `<${n}>`).join(", ")}`,
        );
    }
    return { reachable, productive, unproductive, unused };
}

/**
 * Reject grammars where the start rule, or a rule it reaches, can only
 * derive through unbounded recursion.
 */
export function ensureTerminating(grammar: Grammar): GrammarAnalysis {
    const analysis = analyzeGrammar(grammar);
    if (analysis.unproductive.length > 0) {
        throw new NonTerminatingGrammarError(analysis.unproductive[0]);
    }
    debugAnalysis(
        `${analysis.reachable.length} reachable rules, all productive`,
    );
    return analysis;
}
