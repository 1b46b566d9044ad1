// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import registerDebug from "debug";
import {
    Automaton,
    AutomatonEdge,
    AutomatonState,
    validateAutomaton,
} from "./automaton.js";
import { InvalidAutomatonError } from "./errors.js";

const debugExport = registerDebug("grammar-automaton:export");

export const SERIALIZED_AUTOMATON_VERSION = 1;

/**
 * Automaton Types - serialized
 */
export type SerializedEdge = {
    trigger: string;
    to: number;
};

export type SerializedState = {
    id: number;
    final: boolean;
    edges: SerializedEdge[];
};

export type SerializedAutomaton = {
    version: number;
    name?: string | undefined;
    startState: number;
    states: SerializedState[];
};

/**
 * The boundary to whatever turns an automaton into bytes. The wire format is
 * owned by the codec; errors it throws are passed through.
 */
export interface AutomatonCodec {
    encode(automaton: SerializedAutomaton): Uint8Array;
    decode(bytes: Uint8Array): unknown;
}

export const jsonAutomatonCodec: AutomatonCodec = {
    encode(automaton) {
        return new TextEncoder().encode(JSON.stringify(automaton));
    },
    decode(bytes) {
        return JSON.parse(new TextDecoder().decode(bytes));
    },
};

/**
 * Order-stable plain form: states by ascending id, edges in declaration order.
 */
export function toSerializedAutomaton(
    automaton: Automaton,
): SerializedAutomaton {
    const states = [...automaton.states]
        .sort((a, b) => a.id - b.id)
        .map((state) => ({
            id: state.id,
            final: state.final,
            edges: state.edges.map((e) => ({ trigger: e.trigger, to: e.to })),
        }));
    return {
        version: SERIALIZED_AUTOMATON_VERSION,
        name: automaton.name,
        startState: automaton.startState,
        states,
    };
}

export function exportAutomaton(
    automaton: Automaton,
    codec: AutomatonCodec = jsonAutomatonCodec,
): Uint8Array {
    const bytes = codec.encode(toSerializedAutomaton(automaton));
    debugExport(
        `Exported ${automaton.states.length} states in ${bytes.length} bytes`,
    );
    return bytes;
}

export function importAutomaton(
    bytes: Uint8Array,
    codec: AutomatonCodec = jsonAutomatonCodec,
): Automaton {
    return automatonFromSerialized(codec.decode(bytes));
}

/**
 * Check the shape of a decoded value and rebuild the automaton from it.
 */
export function automatonFromSerialized(value: unknown): Automaton {
    if (!isRecord(value)) {
        throw new InvalidAutomatonError(["Expected an object"]);
    }
    const { version, name, startState, states: rawStates } = value;
    const problems: string[] = [];
    if (version !== SERIALIZED_AUTOMATON_VERSION) {
        problems.push(`Unsupported version ${String(version)}`);
    }
    if (name !== undefined && typeof name !== "string") {
        problems.push("name must be a string");
    }
    if (typeof startState !== "number") {
        problems.push("Missing numeric startState");
    }
    if (!Array.isArray(rawStates)) {
        problems.push("Missing states array");
    }
    if (
        problems.length > 0 ||
        typeof startState !== "number" ||
        !Array.isArray(rawStates)
    ) {
        throw new InvalidAutomatonError(problems);
    }

    const items: unknown[] = rawStates;
    const states: AutomatonState[] = [];
    items.forEach((raw, index) => {
        const state = stateFromSerialized(raw, index, problems);
        if (state !== undefined) {
            states.push(state);
        }
    });
    if (problems.length > 0) {
        throw new InvalidAutomatonError(problems);
    }

    const automaton: Automaton = {
        startState,
        states,
        finalStates: states.filter((s) => s.final).map((s) => s.id),
        name: typeof name === "string" ? name : undefined,
    };
    const structural = validateAutomaton(automaton);
    if (structural.length > 0) {
        throw new InvalidAutomatonError(structural);
    }
    return automaton;
}

function stateFromSerialized(
    raw: unknown,
    index: number,
    problems: string[],
): AutomatonState | undefined {
    if (!isRecord(raw)) {
        problems.push(`State at index ${index} is malformed`);
        return undefined;
    }
    const { id, final, edges: rawEdges } = raw;
    if (
        typeof id !== "number" ||
        typeof final !== "boolean" ||
        !Array.isArray(rawEdges)
    ) {
        problems.push(`State at index ${index} is malformed`);
        return undefined;
    }
    const items: unknown[] = rawEdges;
    const edges: AutomatonEdge[] = [];
    for (const edge of items) {
        const trigger = isRecord(edge) ? edge.trigger : undefined;
        const to = isRecord(edge) ? edge.to : undefined;
        if (typeof trigger !== "string" || typeof to !== "number") {
            problems.push(`State ${id} has a malformed edge`);
            return undefined;
        }
        edges.push({ trigger, to });
    }
    return { id, final, edges };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Single-final-state layout: a sink state is appended after the last state and
 * every final state gets an empty trigger into it. Consumers that only know
 * one designated final state walk until they reach the sink.
 */
export type TriggerTable = {
    initState: number;
    finalState: number;
    pda: { dest: number; term: string }[][];
};

export function toTriggerTable(automaton: Automaton): TriggerTable {
    const finalState = automaton.states.length;
    const pda = toSerializedAutomaton(automaton).states.map((state) => {
        const triggers = state.edges.map((e) => ({
            dest: e.to,
            term: e.trigger,
        }));
        if (state.final) {
            triggers.push({ dest: finalState, term: "" });
        }
        return triggers;
    });
    pda.push([]);
    return { initState: automaton.startState, finalState, pda };
}
