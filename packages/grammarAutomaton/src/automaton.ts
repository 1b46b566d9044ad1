// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

/**
 * Automaton Types
 *
 * The compiled form of a grammar: states connected by edges labeled with the
 * literal text they emit. A generator walks it from the start state and may
 * stop at any final state.
 */

/**
 * An edge to another state. An empty trigger is a structural bridge between
 * sub-expansions and emits nothing.
 */
export interface AutomatonEdge {
    readonly trigger: string;
    readonly to: number;
}

export interface AutomatonState {
    readonly id: number;
    readonly edges: readonly AutomatonEdge[];

    // True iff a walk may legally stop here.
    readonly final: boolean;
}

export interface Automaton {
    readonly startState: number;
    // Indexed by state id.
    readonly states: readonly AutomatonState[];
    readonly finalStates: readonly number[];

    // Metadata
    readonly name?: string | undefined;
}

type MutableState = {
    id: number;
    edges: AutomatonEdge[];
    final: boolean;
};

/**
 * Builder helper for constructing automata. States live in an id-indexed
 * arena; ids are allocated densely from 0.
 */
export class AutomatonBuilder {
    private states: MutableState[] = [];

    createState(final: boolean = false): number {
        const id = this.states.length;
        this.states.push({ id, edges: [], final });
        return id;
    }

    addEdge(from: number, trigger: string, to: number): void {
        const state = this.getState(from);
        if (this.states[to] === undefined) {
            throw new Error(`State ${to} does not exist`);
        }
        state.edges.push({ trigger, to });
    }

    markFinal(id: number): void {
        this.getState(id).final = true;
    }

    getStateCount(): number {
        return this.states.length;
    }

    build(startState: number, name?: string): Automaton {
        this.getState(startState);
        const states = this.states.map((s) => ({
            id: s.id,
            edges: [...s.edges],
            final: s.final,
        }));
        return {
            startState,
            states,
            finalStates: states.filter((s) => s.final).map((s) => s.id),
            name,
        };
    }

    private getState(id: number): MutableState {
        const state = this.states[id];
        if (!state) {
            throw new Error(`State ${id} does not exist`);
        }
        return state;
    }
}

/**
 * Structural check of an automaton. Returns one message per problem; an
 * empty list means the automaton is well formed.
 */
export function validateAutomaton(automaton: Automaton): string[] {
    const problems: string[] = [];
    const { states, startState } = automaton;

    if (!Number.isInteger(startState) || !states[startState]) {
        problems.push(`Start state ${startState} does not exist`);
    }

    states.forEach((state, index) => {
        if (state.id !== index) {
            problems.push(`State at index ${index} has id ${state.id}`);
        }
        for (const edge of state.edges) {
            if (!Number.isInteger(edge.to) || !states[edge.to]) {
                problems.push(
                    `State ${index} has an edge to missing state ${edge.to}`,
                );
            }
        }
    });

    const declaredFinal = new Set(automaton.finalStates);
    states.forEach((state, index) => {
        if (state.final !== declaredFinal.has(index)) {
            problems.push(
                `State ${index} final flag disagrees with the final state list`,
            );
        }
    });
    for (const id of declaredFinal) {
        if (!states[id]) {
            problems.push(`Final state ${id} does not exist`);
        }
    }

    if (problems.length === 0) {
        const reached = reachableStates(automaton);
        states.forEach((_, index) => {
            if (!reached.has(index)) {
                problems.push(`State ${index} is unreachable from the start`);
            }
        });
    }
    return problems;
}

export function reachableStates(automaton: Automaton): Set<number> {
    const reached = new Set<number>([automaton.startState]);
    const worklist = [automaton.startState];
    while (worklist.length > 0) {
        const id = worklist.pop()!;
        for (const edge of automaton.states[id].edges) {
            if (!reached.has(edge.to)) {
                reached.add(edge.to);
                worklist.push(edge.to);
            }
        }
    }
    return reached;
}
