// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { Command } from "@oclif/core";
import { renderAutomaton } from "grammar-automaton";
import { compileGrammarFile } from "../grammarFile.js";
import { exitOnCompileError, grammarFlags } from "../flags.js";

export default class Render extends Command {
    static description = "Print a readable listing of a grammar's automaton";

    static flags = {
        ...grammarFlags,
    };

    async run(): Promise<void> {
        const { flags } = await this.parse(Render);

        try {
            const automaton = compileGrammarFile(flags.input, {
                start: flags.start,
                maxContinuationLength: flags["max-continuation"],
                maxStates: flags["max-states"],
            });
            process.stdout.write(`${renderAutomaton(automaton)}\n`);
        } catch (e) {
            exitOnCompileError(e);
        }
    }
}
