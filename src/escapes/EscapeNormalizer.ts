/*
 *   typein - Converts magazine BASIC type-in listings to Commodore PRG files
 *   Copyright (C) 2023 Folke Will <folko@solhost.org>
 *
 *   This program is free software: you can redistribute it and/or modify
 *   it under the terms of the GNU Affero General Public License as published by
 *   the Free Software Foundation, either version 3 of the License, or
 *   (at your option) any later version.
 *
 *   This program is distributed in the hope that it will be useful,
 *   but WITHOUT ANY WARRANTY; without even the implied warranty of
 *   MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE.  See the
 *   GNU Affero General Public License for more details.
 *
 *   You should have received a copy of the GNU Affero General Public License
 *   along with this program.  If not, see <https://www.gnu.org/licenses/>.
 */

import { AhoyCodes } from "../charmaps/CharMaps.js";
import { CanonicalLine, SourceLine } from "../listing/SourceLine.js";
import { BraceError } from "./BraceError.js";

export type EscapeSpan = SimpleSpan | RepeatSpan;

// {xx}: a single code
export interface SimpleSpan {
    kind: "simple";
    text: string;
}

// {N "xx"}: a code or literal text, repeated N times
export interface RepeatSpan {
    kind: "repeat";
    text: string;
    count: number;
    payload: string;
}

// a line cut into literal text and escape spans, in original order
export type LinePart = { kind: "literal"; text: string } | EscapeSpan;

export class EscapeNormalizer {
    // repeat form first, so that {4"{cd}"} isn't taken as {4"{cd}
    private static SpanRegex = /\{\d+\s?".[^{]*?"\}|\{.[^{]*?\}/g;
    private static RepeatRegex = /^\{(\d+)\s?".+?"\}/;
    private static PayloadRegex = /"(.+?)"/;
    private static BraceRegex = /[{}]/;

    private codes: ReadonlyMap<string, string>;

    public constructor(codes: ReadonlyMap<string, string> = AhoyCodes) {
        this.codes = codes;
    }

    // magazines used both notations over the years
    public static replaceBrackets(text: string): string {
        return text.replaceAll("[", "{").replaceAll("]", "}");
    }

    public static splitParts(text: string): LinePart[] {
        const parts: LinePart[] = [];
        let last = 0;

        for (const match of text.matchAll(EscapeNormalizer.SpanRegex)) {
            const start = match.index ?? last;
            parts.push({ kind: "literal", text: text.substring(last, start) });
            parts.push(EscapeNormalizer.parseSpan(match[0]));
            last = start + match[0].length;
        }
        parts.push({ kind: "literal", text: text.substring(last) });

        return parts;
    }

    public static parseSpan(text: string): EscapeSpan {
        const repeat = text.match(EscapeNormalizer.RepeatRegex);
        const payload = text.match(EscapeNormalizer.PayloadRegex);
        if (repeat && payload) {
            return {
                kind: "repeat",
                text,
                count: Number.parseInt(repeat[1], 10),
                payload: payload[1],
            };
        }
        return { kind: "simple", text };
    }

    /**
     * Checks that every brace belongs to an escape span.
     * Returns false for a single unmatched brace or a brace nested inside a span.
     */
    public static hasBalancedBraces(text: string): boolean {
        const parts = EscapeNormalizer.splitParts(EscapeNormalizer.replaceBrackets(text));
        return parts.every(p => p.kind != "literal" || !EscapeNormalizer.BraceRegex.test(p.text));
    }

    public validate(line: SourceLine) {
        if (!EscapeNormalizer.hasBalancedBraces(line.text)) {
            throw new BraceError(line.number, line.cursor);
        }
    }

    public normalize(line: SourceLine): CanonicalLine {
        this.validate(line);

        // like splitting the line number off again, blanks created by expanding
        // a leading repeat span are dropped
        const text = this.normalizeText(line.text).trimStart();
        return { number: line.number, text, cursor: line.cursor };
    }

    /**
     * Rewrites all escape spans of an already validated text to canonical tokens.
     */
    public normalizeText(text: string): string {
        return EscapeNormalizer.splitParts(EscapeNormalizer.replaceBrackets(text))
            .map(part => part.kind == "literal" ? part.text : this.expandSpan(part).join(""))
            .join("");
    }

    public expandSpan(span: EscapeSpan): string[] {
        const direct = this.codes.get(span.text.toUpperCase());
        if (direct !== undefined) {
            return [direct];
        }

        if (span.kind == "repeat") {
            // unknown payloads are literal text, e.g. {4"*"} -> ****
            const code = this.codes.get(span.payload.toUpperCase()) ?? span.payload;
            return Array<string>(span.count).fill(code);
        }

        return [span.text];
    }
}
