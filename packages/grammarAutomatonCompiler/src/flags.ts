// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { Flags } from "@oclif/core";
import { AutomatonCompileError } from "grammar-automaton";

// Flags shared by every command that compiles a grammar file.
export const grammarFlags = {
    input: Flags.file({
        description: "Input grammar file (JSON)",
        required: true,
        exists: true,
        char: "i",
    }),
    start: Flags.string({
        description: "Start rule (defaults to the file's start or first rule)",
        char: "s",
    }),
    "max-continuation": Flags.integer({
        description:
            "Longest continuation an expansion may carry; deeper recursion is pruned",
        min: 0,
    }),
    "max-states": Flags.integer({
        description: "Abort when the automaton grows past this many states",
        min: 1,
    }),
};

/**
 * Report grammar and compile errors the way the command line reports them;
 * anything else is rethrown.
 */
export function exitOnCompileError(e: unknown): never {
    if (e instanceof AutomatonCompileError) {
        console.error(`Failed to compile grammar: ${e.message}`);
        process.exit(1);
    }
    throw e;
}
