// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { Command, Flags } from "@oclif/core";
import {
    automatonLayouts,
    compileGrammarFile,
    isAutomatonLayout,
    writeAutomatonFile,
} from "../grammarFile.js";
import { exitOnCompileError, grammarFlags } from "../flags.js";

export default class Compile extends Command {
    static description = "Compile a grammar file into a fuzzing automaton";

    static flags = {
        ...grammarFlags,
        output: Flags.string({
            description: "Output file for the encoded automaton",
            required: true,
            char: "o",
        }),
        layout: Flags.string({
            description:
                "states: one final flag per state; table: single final sink state",
            options: [...automatonLayouts],
            default: "states",
        }),
    };

    async run(): Promise<void> {
        const { flags } = await this.parse(Compile);
        const layout = isAutomatonLayout(flags.layout) ? flags.layout : "states";

        try {
            const automaton = compileGrammarFile(flags.input, {
                start: flags.start,
                maxContinuationLength: flags["max-continuation"],
                maxStates: flags["max-states"],
            });
            writeAutomatonFile(flags.output, automaton, layout);
            console.log(
                `Automaton written: ${flags.output} (${automaton.states.length} states)`,
            );
        } catch (e) {
            exitOnCompileError(e);
        }
    }
}
