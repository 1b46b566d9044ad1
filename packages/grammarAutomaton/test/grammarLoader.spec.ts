// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { compileGrammarToAutomaton } from "../src/automatonCompiler.js";
import { enumerateStrings } from "../src/automatonWalker.js";
import { EmptyGrammarError, InvalidGrammarFormatError } from "../src/errors.js";
import { loadGrammar } from "../src/grammarLoader.js";
import { nonTerminal, terminal } from "../src/grammarTypes.js";
import { captureError } from "./testUtils.js";

function load(json: unknown, start?: string) {
    return loadGrammar("g.json", JSON.stringify(json), { start });
}

function formatErrors(json: unknown): readonly string[] {
    const error = captureError(() => load(json));
    if (!(error instanceof InvalidGrammarFormatError)) {
        throw error;
    }
    return error.errors;
}

describe("Grammar Loader", () => {
    describe("Bare rule mapping", () => {
        it("should resolve rule names to references", () => {
            const grammar = load({ S: [["a", "S", "b"], ["c"]] });

            expect(grammar.start).toBe("S");
            expect(grammar.rules.get("S")).toEqual([
                [terminal("a"), nonTerminal("S"), terminal("b")],
                [terminal("c")],
            ]);
        });

        it("should treat quoted words as terminals", () => {
            const grammar = load({ S: [["'S'", "S"], []] });

            expect(grammar.rules.get("S")).toEqual([
                [terminal("S"), nonTerminal("S")],
                [],
            ]);
        });

        it("should start from the first rule", () => {
            expect(load({ B: [["b"]], A: [["B"]] }).start).toBe("B");
        });

        it("should honor an explicit start rule", () => {
            expect(load({ B: [["b"]], A: [["B"]] }, "A").start).toBe("A");
        });
    });

    describe("Rules with a declared start", () => {
        const json = {
            start: "E",
            rules: {
                S: ["'x'"],
                E: ["'(' E ')'", "S"],
            },
        };

        it("should read the declared start rule", () => {
            expect(load(json).start).toBe("E");
        });

        it("should split text alternatives into tokens", () => {
            const grammar = load(json);

            expect(grammar.rules.get("E")).toEqual([
                [terminal("("), nonTerminal("E"), terminal(")")],
                [nonTerminal("S")],
            ]);
            expect(grammar.rules.get("S")).toEqual([[terminal("x")]]);
        });

        it("should unescape quoted text", () => {
            const grammar = load({ S: ["'it\\'s' 'a b'"] });

            expect(grammar.rules.get("S")).toEqual([
                [terminal("it's"), terminal("a b")],
            ]);
        });

        it("should read a blank alternative as empty", () => {
            expect(load({ S: ["", "  "] }).rules.get("S")).toEqual([[], []]);
        });

        it("should compile the loaded grammar", () => {
            const automaton = compileGrammarToAutomaton(load(json));

            expect(enumerateStrings(automaton, 5)).toEqual(["(x)", "x"]);
        });
    });

    describe("Errors", () => {
        it("should report invalid JSON", () => {
            const error = captureError(() => loadGrammar("g.json", "{ S: "));

            expect(error).toBeInstanceOf(InvalidGrammarFormatError);
            expect(error).toMatchObject({ kind: "InvalidGrammarFormat" });
        });

        it("should report an unterminated quote", () => {
            const error = captureError(() => load({ S: ["'abc"] }));

            expect(error).toBeInstanceOf(InvalidGrammarFormatError);
            expect(error).toMatchObject({
                message:
                    "Error detected in grammar file 'g.json': 1 error.\n" +
                    "g.json: error: Rule '<S>' alternative 0: unterminated quote at offset 0",
            });
        });

        it("should report the offset of a later unterminated quote", () => {
            expect(formatErrors({ S: ["a 'b c"] })).toEqual([
                "g.json: error: Rule '<S>' alternative 0: unterminated quote at offset 2",
            ]);
        });

        it("should collect every malformed rule", () => {
            expect(formatErrors({ S: 5, T: [7] })).toEqual([
                "g.json: error: Rule '<S>' must be an array of alternatives",
                "g.json: error: Rule '<T>' alternative 0: must be a string or an array of strings",
            ]);
        });

        it("should reject tokens that are not strings", () => {
            expect(formatErrors({ S: [["a", 1]] })).toEqual([
                "g.json: error: Rule '<S>' alternative 0: token 1 is not a string",
            ]);
        });

        it("should reject a start that is not a string", () => {
            expect(formatErrors({ start: 3, rules: { S: [["s"]] } })).toEqual([
                "g.json: error: 'start' must be a string",
            ]);
        });

        it("should reject a top-level array", () => {
            expect(formatErrors([])).toEqual([
                "g.json: error: Grammar must be a JSON object",
            ]);
        });

        it("should reject a file without rules", () => {
            const error = captureError(() => load({}));

            expect(error).toBeInstanceOf(EmptyGrammarError);
            expect(error).toMatchObject({
                message: "Grammar file 'g.json' has no rules",
            });
        });
    });
});
