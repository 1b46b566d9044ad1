// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { Automaton, AutomatonEdge } from "./automaton.js";

/**
 * Human-readable listing of an automaton, for diagnostics.
 */
export function renderAutomaton(automaton: Automaton): string {
    const lines: string[] = [];

    lines.push(`Automaton: ${automaton.name || "(unnamed)"}`);
    lines.push(`  Start state: ${automaton.startState}`);
    lines.push(`  Final states: [${automaton.finalStates.join(", ")}]`);
    lines.push(`  States (${automaton.states.length}):`);

    for (const state of automaton.states) {
        const final = state.final ? " [FINAL]" : "";
        lines.push(`    State ${state.id}${final}:`);

        if (state.edges.length === 0) {
            lines.push(`      (no edges)`);
        }

        for (const edge of state.edges) {
            lines.push(`      ${formatTrigger(edge)} -> ${edge.to}`);
        }
    }

    return lines.join("\n");
}

function formatTrigger(edge: AutomatonEdge): string {
    return edge.trigger === "" ? "ε" : JSON.stringify(edge.trigger);
}
