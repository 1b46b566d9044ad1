// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { Automaton, AutomatonEdge, AutomatonState } from "./automaton.js";

/**
 * States from which some final state can be reached.
 */
export function liveStates(automaton: Automaton): Set<number> {
    const predecessors: number[][] = automaton.states.map(() => []);
    for (const state of automaton.states) {
        for (const edge of state.edges) {
            predecessors[edge.to].push(state.id);
        }
    }

    const live = new Set<number>(automaton.finalStates);
    const worklist = [...automaton.finalStates];
    while (worklist.length > 0) {
        const id = worklist.pop()!;
        for (const from of predecessors[id]) {
            if (!live.has(from)) {
                live.add(from);
                worklist.push(from);
            }
        }
    }
    return live;
}

/**
 * Remove states that cannot reach a final state, together with the edges
 * into them, and renumber the survivors densely in their original order.
 * Returns undefined when the start state itself is dead.
 */
export function removeDeadStates(automaton: Automaton): Automaton | undefined {
    const live = liveStates(automaton);
    if (live.size === automaton.states.length) {
        return automaton;
    }

    const renumber = new Map<number, number>();
    for (const state of automaton.states) {
        if (live.has(state.id)) {
            renumber.set(state.id, renumber.size);
        }
    }
    const startState = renumber.get(automaton.startState);
    if (startState === undefined) {
        return undefined;
    }

    const states: AutomatonState[] = [];
    for (const state of automaton.states) {
        const id = renumber.get(state.id);
        if (id === undefined) {
            continue;
        }
        const edges: AutomatonEdge[] = [];
        for (const edge of state.edges) {
            const to = renumber.get(edge.to);
            if (to !== undefined) {
                edges.push({ trigger: edge.trigger, to });
            }
        }
        states.push({ id, edges, final: state.final });
    }

    return {
        startState,
        states,
        finalStates: states.filter((s) => s.final).map((s) => s.id),
        name: automaton.name,
    };
}
