// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import registerDebug from "debug";
import { Automaton, AutomatonBuilder } from "./automaton.js";
import { removeDeadStates } from "./automatonTrimmer.js";
import {
    CompileOptions,
    ResolvedCompileOptions,
    resolveCompileOptions,
} from "./compileOptions.js";
import {
    ContinuationLimitExceededError,
    StateLimitExceededError,
} from "./errors.js";
import { ensureTerminating } from "./grammarAnalysis.js";
import {
    Alternative,
    Grammar,
    Token,
    formatAlternative,
} from "./grammarTypes.js";
import { validateGrammar } from "./grammarValidator.js";

const debugCompile = registerDebug("grammar-automaton:compile");

/**
 * A nonterminal waiting to have its alternatives threaded out of the state
 * already allocated for its (nonterminal, continuation) key.
 */
type ExpansionJob = {
    state: number;
    nonterminal: string;
    continuation: readonly Token[];
};

/**
 * Everything one compilation owns. Nothing here outlives the call.
 */
type CompileContext = {
    grammar: Grammar;
    options: ResolvedCompileOptions;
    builder: AutomatonBuilder;
    // ContinuationKey -> state id
    memo: Map<string, number>;
    worklist: ExpansionJob[];
    memoHits: number;
    prunedAlternatives: number;
};

/**
 * Canonical fingerprint of a nonterminal together with the tokens that must
 * still be matched after it completes.
 */
export function continuationKey(
    nonterminal: string,
    continuation: readonly Token[],
): string {
    return JSON.stringify([
        nonterminal,
        ...continuation.map((token) =>
            token.type === "terminal" ? ["t", token.text] : ["n", token.name],
        ),
    ]);
}

/**
 * Compile a grammar into an automaton.
 *
 * Each (nonterminal, continuation) pair maps to exactly one state, allocated
 * and registered before its alternatives are threaded, so a recursive
 * reference to a pair already under construction becomes a back edge. The
 * expansion runs from a FIFO worklist; state ids follow discovery order.
 *
 * @throws EmptyGrammarError, UndefinedSymbolError or NonTerminatingGrammarError
 * before any state is created; StateLimitExceededError or
 * ContinuationLimitExceededError during construction.
 */
export function compileGrammarToAutomaton(
    grammar: Grammar,
    options?: CompileOptions,
): Automaton {
    const resolved = resolveCompileOptions(options);
    validateGrammar(grammar);
    ensureTerminating(grammar);

    const context: CompileContext = {
        grammar,
        options: resolved,
        builder: new AutomatonBuilder(),
        memo: new Map(),
        worklist: [],
        memoHits: 0,
        prunedAlternatives: 0,
    };

    const startState = expand(context, grammar.start, []);
    for (let next = 0; next < context.worklist.length; next++) {
        processExpansion(context, context.worklist[next]);
    }

    const automaton = context.builder.build(startState, resolved.name);
    const trimmed = removeDeadStates(automaton);
    if (trimmed === undefined) {
        throw new ContinuationLimitExceededError(
            grammar.start,
            resolved.maxContinuationLength,
        );
    }

    debugCompile(
        `Compiled '<${grammar.start}>': ${automaton.states.length} states created, ` +
            `${context.memo.size} keys, ${context.memoHits} memo hits, ` +
            `${context.prunedAlternatives} alternatives pruned, ` +
            `${automaton.states.length - trimmed.states.length} dead states removed`,
    );
    return trimmed;
}

/**
 * State for (nonterminal, continuation): the memoized one, or a new one queued
 * for expansion.
 */
function expand(
    context: CompileContext,
    nonterminal: string,
    continuation: readonly Token[],
): number {
    const key = continuationKey(nonterminal, continuation);
    const existing = context.memo.get(key);
    if (existing !== undefined) {
        context.memoHits++;
        return existing;
    }
    const state = createState(context, nonterminal);
    context.memo.set(key, state);
    context.worklist.push({ state, nonterminal, continuation });
    return state;
}

function createState(context: CompileContext, nonterminal: string): number {
    const { builder, options } = context;
    if (builder.getStateCount() >= options.maxStates) {
        throw new StateLimitExceededError(options.maxStates, nonterminal);
    }
    return builder.createState();
}

function processExpansion(context: CompileContext, job: ExpansionJob): void {
    const alternatives = context.grammar.rules.get(job.nonterminal) ?? [];
    for (const alternative of alternatives) {
        const sequence = [...alternative, ...job.continuation];
        if (exceedsContinuationLimit(sequence, context.options)) {
            context.prunedAlternatives++;
            debugCompile(
                `Pruned <${job.nonterminal}> = ${formatAlternative(alternative)} ` +
                    `with continuation ${formatAlternative(job.continuation)}`,
            );
            continue;
        }
        threadSequence(context, job.state, sequence, job.nonterminal);
    }
}

/**
 * Only the first nonterminal of a sequence is expanded from here; the rest of
 * the sequence becomes its continuation.
 */
function exceedsContinuationLimit(
    sequence: Alternative,
    options: ResolvedCompileOptions,
): boolean {
    const first = sequence.findIndex((token) => token.type === "nonterminal");
    return (
        first !== -1 && sequence.length - first - 1 > options.maxContinuationLength
    );
}

/**
 * Emit the chain of edges for `sequence` starting at `from`. Terminals get a
 * fresh intermediate state each; the first nonterminal hands the remainder
 * over to its own expansion through an empty-trigger edge. A sequence made of
 * terminals only ends in a final state.
 */
function threadSequence(
    context: CompileContext,
    from: number,
    sequence: Alternative,
    owner: string,
): void {
    const { builder } = context;
    let current = from;
    for (let i = 0; i < sequence.length; i++) {
        const token = sequence[i];
        switch (token.type) {
            case "terminal": {
                const next = createState(context, owner);
                builder.addEdge(current, token.text, next);
                current = next;
                break;
            }
            case "nonterminal": {
                const entry = expand(context, token.name, sequence.slice(i + 1));
                builder.addEdge(current, "", entry);
                return;
            }
        }
    }
    builder.markFinal(current);
}
