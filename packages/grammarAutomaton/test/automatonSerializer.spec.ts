// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { Automaton, validateAutomaton } from "../src/automaton.js";
import { compileGrammarToAutomaton } from "../src/automatonCompiler.js";
import {
    AutomatonCodec,
    exportAutomaton,
    importAutomaton,
    jsonAutomatonCodec,
    toTriggerTable,
} from "../src/automatonSerializer.js";
import { InvalidAutomatonError } from "../src/errors.js";
import { captureError, grammarOf } from "./testUtils.js";

const repeat = grammarOf("S", { S: [["a", "S"], []] });

function importJson(value: unknown): Automaton {
    return importAutomaton(new TextEncoder().encode(JSON.stringify(value)));
}

function importProblems(value: unknown): readonly string[] {
    const error = captureError(() => importJson(value));
    if (!(error instanceof InvalidAutomatonError)) {
        throw error;
    }
    return error.problems;
}

describe("Automaton Serializer", () => {
    describe("Export", () => {
        it("should write states in id order with their edges", () => {
            const bytes = exportAutomaton(compileGrammarToAutomaton(repeat));

            expect(new TextDecoder().decode(bytes)).toBe(
                '{"version":1,"startState":0,"states":[' +
                    '{"id":0,"final":true,"edges":[{"trigger":"a","to":1}]},' +
                    '{"id":1,"final":false,"edges":[{"trigger":"","to":0}]}]}',
            );
        });

        it("should round trip through the JSON codec", () => {
            const automaton = compileGrammarToAutomaton(
                grammarOf("S", { S: [["a", "S", "b"], ["c"]] }),
                { name: "balanced" },
            );

            const imported = importAutomaton(exportAutomaton(automaton));

            expect(imported).toEqual(automaton);
            expect(imported.name).toBe("balanced");
        });

        it("should pass codec errors through", () => {
            const failing: AutomatonCodec = {
                encode() {
                    throw new Error("codec unavailable");
                },
                decode: jsonAutomatonCodec.decode,
            };

            expect(() =>
                exportAutomaton(compileGrammarToAutomaton(repeat), failing),
            ).toThrow("codec unavailable");
        });

        it("should use a custom codec in both directions", () => {
            const encoded: unknown[] = [];
            const codec: AutomatonCodec = {
                encode(automaton) {
                    encoded.push(automaton);
                    return new Uint8Array([encoded.length - 1]);
                },
                decode(bytes) {
                    return encoded[bytes[0]];
                },
            };
            const automaton = compileGrammarToAutomaton(repeat);

            const bytes = exportAutomaton(automaton, codec);

            expect(Array.from(bytes)).toEqual([0]);
            expect(importAutomaton(bytes, codec)).toEqual(automaton);
        });
    });

    describe("Import", () => {
        it("should reject a value that is not an object", () => {
            expect(importProblems([])).toEqual(["Expected an object"]);
        });

        it("should reject an unknown version", () => {
            const error = captureError(() =>
                importJson({ version: 2, startState: 0, states: [] }),
            );

            expect(error).toBeInstanceOf(InvalidAutomatonError);
            expect(error).toMatchObject({
                message: "Invalid automaton:\n  Unsupported version 2",
            });
        });

        it("should require a start state and states", () => {
            expect(importProblems({ version: 1 })).toEqual([
                "Missing numeric startState",
                "Missing states array",
            ]);
        });

        it("should report malformed states and edges", () => {
            expect(
                importProblems({
                    version: 1,
                    startState: 0,
                    states: [
                        5,
                        { id: 1, final: true, edges: [{ trigger: "a" }] },
                    ],
                }),
            ).toEqual([
                "State at index 0 is malformed",
                "State 1 has a malformed edge",
            ]);
        });

        it("should report edges to missing states", () => {
            expect(
                importProblems({
                    version: 1,
                    startState: 0,
                    states: [
                        {
                            id: 0,
                            final: false,
                            edges: [{ trigger: "a", to: 3 }],
                        },
                    ],
                }),
            ).toEqual(["State 0 has an edge to missing state 3"]);
        });

        it("should report unreachable states", () => {
            expect(
                importProblems({
                    version: 1,
                    startState: 0,
                    states: [
                        { id: 0, final: true, edges: [] },
                        { id: 1, final: false, edges: [] },
                    ],
                }),
            ).toEqual(["State 1 is unreachable from the start"]);
        });
    });

    describe("validateAutomaton", () => {
        it("should report a missing start state", () => {
            expect(
                validateAutomaton({ startState: 4, states: [], finalStates: [] }),
            ).toEqual(["Start state 4 does not exist"]);
        });

        it("should report ids that do not match their index", () => {
            expect(
                validateAutomaton({
                    startState: 0,
                    states: [{ id: 1, final: false, edges: [] }],
                    finalStates: [],
                }),
            ).toEqual(["State at index 0 has id 1"]);
        });

        it("should report final flags that disagree with the final list", () => {
            expect(
                validateAutomaton({
                    startState: 0,
                    states: [{ id: 0, final: false, edges: [] }],
                    finalStates: [0, 2],
                }),
            ).toEqual([
                "State 0 final flag disagrees with the final state list",
                "Final state 2 does not exist",
            ]);
        });
    });

    describe("Trigger table", () => {
        it("should route final states into an appended sink", () => {
            expect(toTriggerTable(compileGrammarToAutomaton(repeat))).toEqual({
                initState: 0,
                finalState: 2,
                pda: [
                    [
                        { dest: 1, term: "a" },
                        { dest: 2, term: "" },
                    ],
                    [{ dest: 0, term: "" }],
                    [],
                ],
            });
        });
    });
});
