// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { Automaton } from "./automaton.js";

export interface WalkOptions {
    /** Uniform source in [0, 1). Default: Math.random */
    random?: (() => number) | undefined;
    /** Edges taken before giving up. Default: 10,000 */
    maxSteps?: number | undefined;
}

export interface WalkResult {
    /** Concatenated triggers */
    text: string;
    /** Visited state ids, starting with the start state */
    states: number[];
    /** False when the walk was cut off before stopping at a final state */
    complete: boolean;
}

const DEFAULT_MAX_STEPS = 10_000;

/**
 * Generate one string by walking the automaton. At every state the walk picks
 * uniformly among the outgoing edges and, when the state is final, stopping.
 */
export function randomWalk(
    automaton: Automaton,
    options: WalkOptions = {},
): WalkResult {
    const random = options.random ?? Math.random;
    const maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;

    let current = automaton.startState;
    const states = [current];
    let text = "";

    for (let step = 0; ; step++) {
        const state = automaton.states[current];
        const choices = state.edges.length + (state.final ? 1 : 0);
        if (choices === 0) {
            return { text, states, complete: false };
        }
        if (step === maxSteps) {
            return { text, states, complete: state.final };
        }
        const choice = Math.min(Math.floor(random() * choices), choices - 1);
        if (choice === state.edges.length) {
            return { text, states, complete: true };
        }
        const edge = state.edges[choice];
        text += edge.trigger;
        current = edge.to;
        states.push(current);
    }
}

/**
 * All distinct strings spelled by walks of at most `maxEdges` edges that end
 * at a final state, sorted.
 */
export function enumerateStrings(
    automaton: Automaton,
    maxEdges: number,
): string[] {
    const found = new Set<string>();
    // Explicit stack of (state, text so far, edges used).
    const stack: [number, string, number][] = [[automaton.startState, "", 0]];
    while (stack.length > 0) {
        const [id, text, used] = stack.pop()!;
        const state = automaton.states[id];
        if (state.final) {
            found.add(text);
        }
        if (used === maxEdges) {
            continue;
        }
        for (const edge of state.edges) {
            stack.push([edge.to, text + edge.trigger, used + 1]);
        }
    }
    return Array.from(found).sort();
}
