// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

export type {
    Alternative,
    Grammar,
    NonTerminalToken,
    TerminalToken,
    Token,
} from "./grammarTypes.js";
export {
    createGrammar,
    formatAlternative,
    nonTerminal,
    terminal,
} from "./grammarTypes.js";
export type { LoadGrammarOptions } from "./grammarLoader.js";
export { loadGrammar } from "./grammarLoader.js";
export { collectReferences, validateGrammar } from "./grammarValidator.js";
export type { GrammarAnalysis } from "./grammarAnalysis.js";
export {
    analyzeGrammar,
    computeProductiveSymbols,
    computeReachableSymbols,
    ensureTerminating,
} from "./grammarAnalysis.js";
export type {
    Automaton,
    AutomatonEdge,
    AutomatonState,
} from "./automaton.js";
export {
    AutomatonBuilder,
    reachableStates,
    validateAutomaton,
} from "./automaton.js";
export type { CompileOptions } from "./compileOptions.js";
export {
    DEFAULT_MAX_CONTINUATION_LENGTH,
    DEFAULT_MAX_STATES,
    resolveCompileOptions,
} from "./compileOptions.js";
export {
    compileGrammarToAutomaton,
    continuationKey,
} from "./automatonCompiler.js";
export { liveStates, removeDeadStates } from "./automatonTrimmer.js";
export type {
    AutomatonCodec,
    SerializedAutomaton,
    TriggerTable,
} from "./automatonSerializer.js";
export {
    automatonFromSerialized,
    exportAutomaton,
    importAutomaton,
    jsonAutomatonCodec,
    toSerializedAutomaton,
    toTriggerTable,
} from "./automatonSerializer.js";
export { renderAutomaton } from "./automatonPrinter.js";
export type { WalkOptions, WalkResult } from "./automatonWalker.js";
export { enumerateStrings, randomWalk } from "./automatonWalker.js";
export type { AutomatonCompileErrorKind } from "./errors.js";
export {
    AutomatonCompileError,
    ContinuationLimitExceededError,
    EmptyGrammarError,
    InvalidAutomatonError,
    InvalidGrammarFormatError,
    NonTerminatingGrammarError,
    StateLimitExceededError,
    UndefinedSymbolError,
} from "./errors.js";
