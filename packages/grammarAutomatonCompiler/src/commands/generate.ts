// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { Command, Flags } from "@oclif/core";
import registerDebug from "debug";
import { randomWalk } from "grammar-automaton";
import { compileGrammarFile } from "../grammarFile.js";
import { exitOnCompileError, grammarFlags } from "../flags.js";

const debugCli = registerDebug("grammar-automaton:cli");

export default class Generate extends Command {
    static description =
        "Generate strings from a grammar by random automaton walks";

    static flags = {
        ...grammarFlags,
        count: Flags.integer({
            description: "Number of strings to generate",
            char: "n",
            default: 10,
            min: 1,
        }),
        "max-steps": Flags.integer({
            description: "Edges a single walk may take before it is dropped",
            default: 10_000,
            min: 1,
        }),
    };

    async run(): Promise<void> {
        const { flags } = await this.parse(Generate);

        try {
            const automaton = compileGrammarFile(flags.input, {
                start: flags.start,
                maxContinuationLength: flags["max-continuation"],
                maxStates: flags["max-states"],
            });
            let dropped = 0;
            for (let i = 0; i < flags.count; i++) {
                const walk = randomWalk(automaton, {
                    maxSteps: flags["max-steps"],
                });
                if (walk.complete) {
                    console.log(walk.text);
                } else {
                    dropped++;
                }
            }
            if (dropped > 0) {
                debugCli(`${dropped} walks exceeded ${flags["max-steps"]} steps`);
            }
        } catch (e) {
            exitOnCompileError(e);
        }
    }
}
