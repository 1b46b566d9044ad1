// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import {
    analyzeGrammar,
    computeProductiveSymbols,
    computeReachableSymbols,
    ensureTerminating,
} from "../src/grammarAnalysis.js";
import { NonTerminatingGrammarError } from "../src/errors.js";
import { captureError, grammarOf } from "./testUtils.js";

describe("Grammar Analysis", () => {
    const grammar = grammarOf("S", {
        S: [["A", "B"], ["s"]],
        A: [["a"]],
        B: [["B", "b"]],
        C: [["c"]],
    });

    it("should find the productive rules", () => {
        expect(computeProductiveSymbols(grammar)).toEqual(
            new Set(["S", "A", "C"]),
        );
    });

    it("should list reachable rules in discovery order", () => {
        expect(computeReachableSymbols(grammar)).toEqual(["S", "A", "B"]);
    });

    it("should report unproductive and unused rules", () => {
        const analysis = analyzeGrammar(grammar);

        expect(analysis.unproductive).toEqual(["B"]);
        expect(analysis.unused).toEqual(["C"]);
    });

    it("should reject the first reachable unproductive rule", () => {
        const error = captureError(() => ensureTerminating(grammar));

        expect(error).toBeInstanceOf(NonTerminatingGrammarError);
        expect(error).toMatchObject({ symbol: "B" });
    });

    it("should reject a rule whose only alternative is itself", () => {
        const error = captureError(() =>
            ensureTerminating(grammarOf("A", { A: [["A"]] })),
        );

        expect(error).toMatchObject({
            kind: "NonTerminatingGrammar",
            symbol: "A",
        });
    });

    it("should propagate productivity through a chain of rules", () => {
        const chain = grammarOf("X", {
            X: [["Y"]],
            Y: [["Z"]],
            Z: [["z"]],
        });

        expect(computeProductiveSymbols(chain)).toEqual(
            new Set(["X", "Y", "Z"]),
        );
        expect(ensureTerminating(chain).reachable).toEqual(["X", "Y", "Z"]);
    });

    it("should treat an empty alternative as productive", () => {
        const analysis = ensureTerminating(
            grammarOf("S", { S: [["a", "S"], []] }),
        );

        expect(analysis.productive).toEqual(new Set(["S"]));
        expect(analysis.unproductive).toEqual([]);
    });

    it("should return nothing reachable without a start rule", () => {
        expect(computeReachableSymbols(grammarOf("Q", { S: [["s"]] }))).toEqual(
            [],
        );
    });
});
