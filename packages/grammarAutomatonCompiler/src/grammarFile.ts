// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import fs from "node:fs";
import path from "node:path";
import registerDebug from "debug";
import {
    Automaton,
    CompileOptions,
    LoadGrammarOptions,
    compileGrammarToAutomaton,
    exportAutomaton,
    loadGrammar,
    toTriggerTable,
} from "grammar-automaton";

const debugCli = registerDebug("grammar-automaton:cli");

export type AutomatonLayout = "states" | "table";
export const automatonLayouts: readonly AutomatonLayout[] = ["states", "table"];

export type GrammarFileOptions = LoadGrammarOptions & CompileOptions;

/**
 * Load a JSON grammar file and compile it. The automaton is named after the
 * start rule unless a name is given.
 */
export function compileGrammarFile(
    inputPath: string,
    options: GrammarFileOptions = {},
): Automaton {
    const content = fs.readFileSync(inputPath, "utf-8");
    const grammar = loadGrammar(path.basename(inputPath), content, {
        start: options.start,
    });
    debugCli(
        `Loaded ${grammar.rules.size} rules from ${inputPath}, start '<${grammar.start}>'`,
    );
    return compileGrammarToAutomaton(grammar, {
        name: options.name ?? grammar.start,
        maxContinuationLength: options.maxContinuationLength,
        maxStates: options.maxStates,
    });
}

export function encodeAutomaton(
    automaton: Automaton,
    layout: AutomatonLayout,
): Uint8Array {
    switch (layout) {
        case "states":
            return exportAutomaton(automaton);
        case "table":
            return new TextEncoder().encode(
                JSON.stringify(toTriggerTable(automaton)),
            );
    }
}

/**
 * Write the encoded automaton, creating the output directory when needed.
 * Returns the number of bytes written.
 */
export function writeAutomatonFile(
    outputPath: string,
    automaton: Automaton,
    layout: AutomatonLayout = "states",
): number {
    const bytes = encodeAutomaton(automaton, layout);
    const outputDir = path.dirname(outputPath);
    if (!fs.existsSync(outputDir)) {
        fs.mkdirSync(outputDir, { recursive: true });
    }
    fs.writeFileSync(outputPath, bytes);
    return bytes.length;
}

export function isAutomatonLayout(value: string): value is AutomatonLayout {
    return automatonLayouts.some((layout) => layout === value);
}
