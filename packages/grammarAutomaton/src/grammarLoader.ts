// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { EmptyGrammarError, InvalidGrammarFormatError } from "./errors.js";
import {
    Alternative,
    Grammar,
    Token,
    nonTerminal,
    terminal,
} from "./grammarTypes.js";

export interface LoadGrammarOptions {
    /** Overrides the start rule named in the file */
    start?: string | undefined;
}

/**
 * Grammar file formats (JSON):
 *
 *   { "S": [["a", "S", "b"], ["c"]] }
 *   { "start": "S", "rules": { "S": ["'a' S 'b'", "'c'"] } }
 *
 * An alternative written as an array resolves each string against the rule
 * names: a rule name is a reference, anything else is literal text, and
 * 'quoted' text is always literal. An alternative written as a single string
 * is split on whitespace: 'quoted' words are literal text, bare words are
 * references.
 *
 * Without an explicit start the first rule in the file is the start rule.
 */
export function loadGrammar(
    fileName: string,
    content: string,
    options: LoadGrammarOptions = {},
): Grammar {
    const errors: string[] = [];
    const report = (message: string) =>
        errors.push(`${fileName}: error: ${message}`);

    let json: unknown;
    try {
        json = JSON.parse(content);
    } catch (e) {
        report(`Invalid JSON: ${e instanceof Error ? e.message : String(e)}`);
        throw new InvalidGrammarFormatError(fileName, errors);
    }

    const { declaredStart, ruleJson } = splitGrammarJson(json, report);
    const names = new Set(Object.keys(ruleJson));
    const rules = new Map<string, Alternative[]>();
    for (const [name, alternativesJson] of Object.entries(ruleJson)) {
        if (!Array.isArray(alternativesJson)) {
            report(`Rule '<${name}>' must be an array of alternatives`);
            continue;
        }
        const items: unknown[] = alternativesJson;
        const alternatives: Alternative[] = [];
        items.forEach((item, index) => {
            const alternative = parseAlternative(item, names, (message) =>
                report(`Rule '<${name}>' alternative ${index}: ${message}`),
            );
            if (alternative !== undefined) {
                alternatives.push(alternative);
            }
        });
        rules.set(name, alternatives);
    }

    if (errors.length > 0) {
        throw new InvalidGrammarFormatError(fileName, errors);
    }
    const firstRule: string | undefined = Array.from(rules.keys())[0];
    const start = options.start ?? declaredStart ?? firstRule;
    if (start === undefined) {
        throw new EmptyGrammarError(`Grammar file '${fileName}' has no rules`);
    }
    return { start, rules };
}

function splitGrammarJson(
    json: unknown,
    report: (message: string) => void,
): { declaredStart: string | undefined; ruleJson: Record<string, unknown> } {
    if (!isRecord(json)) {
        report("Grammar must be a JSON object");
        return { declaredStart: undefined, ruleJson: {} };
    }
    const { start, rules } = json;
    if (!isRecord(rules)) {
        // Bare mapping of rule name to alternatives.
        return { declaredStart: undefined, ruleJson: json };
    }
    if (start !== undefined && typeof start !== "string") {
        report("'start' must be a string");
        return { declaredStart: undefined, ruleJson: rules };
    }
    return { declaredStart: start, ruleJson: rules };
}

function parseAlternative(
    item: unknown,
    names: ReadonlySet<string>,
    report: (message: string) => void,
): Alternative | undefined {
    if (typeof item === "string") {
        return parseAlternativeText(item, report);
    }
    if (!Array.isArray(item)) {
        report("must be a string or an array of strings");
        return undefined;
    }
    const words: unknown[] = item;
    const tokens: Token[] = [];
    for (const word of words) {
        if (typeof word !== "string") {
            report(`token ${JSON.stringify(word)} is not a string`);
            return undefined;
        }
        const quoted = unquote(word);
        if (quoted !== undefined) {
            tokens.push(terminal(quoted));
        } else if (names.has(word)) {
            tokens.push(nonTerminal(word));
        } else {
            tokens.push(terminal(word));
        }
    }
    return tokens;
}

const wordPattern = /'((?:[^'\\]|\\.)*)'|(\S+)/y;
const spacePattern = /\s*/y;

function parseAlternativeText(
    text: string,
    report: (message: string) => void,
): Alternative | undefined {
    const tokens: Token[] = [];
    let pos = 0;
    for (;;) {
        spacePattern.lastIndex = pos;
        spacePattern.exec(text);
        pos = spacePattern.lastIndex;
        if (pos >= text.length) {
            return tokens;
        }
        wordPattern.lastIndex = pos;
        const match = wordPattern.exec(text);
        if (match === null) {
            report(`unterminated quote at offset ${pos}`);
            return undefined;
        }
        pos = wordPattern.lastIndex;
        const [word, quoted, bare] = match;
        if (quoted !== undefined) {
            tokens.push(terminal(unescapeQuoted(quoted)));
        } else if (bare.startsWith("'")) {
            report(`unterminated quote at offset ${match.index}`);
            return undefined;
        } else {
            tokens.push(nonTerminal(word));
        }
    }
}

function unquote(word: string): string | undefined {
    if (word.length >= 2 && word.startsWith("'") && word.endsWith("'")) {
        return word.slice(1, -1);
    }
    return undefined;
}

function unescapeQuoted(text: string): string {
    return text.replace(/\\(.)/g, "$1");
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}
