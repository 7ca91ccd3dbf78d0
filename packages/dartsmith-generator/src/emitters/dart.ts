/**
 * Dart text helpers shared by the emitters.
 *
 * Lists are laid out the way the Dart formatter's tall style does: on one
 * line when they fit in 80 columns, otherwise one item per line with a
 * trailing comma.
 */

import type { UnsupportedTypeError } from "@dartsmith/core";
import type { TypeDescriptor } from "../types";

export const PAGE_WIDTH = 80;

export interface EmitOutput {
    text: string;
    errors: UnsupportedTypeError[];
    /** Enums whose `_$<Enum>EnumMap` the text refers to. */
    enumMaps: string[];
    /** The text uses `_SystemHash`. */
    usesSystemHash: boolean;
    /** The text uses `DeepCollectionEquality` from package:collection. */
    usesDeepEquality: boolean;
}

export function emitOutput(text: string, partial: Partial<Omit<EmitOutput, "text">> = {}): EmitOutput {
    return {
        text,
        errors: partial.errors ?? [],
        enumMaps: partial.enumMaps ?? [],
        usesSystemHash: partial.usesSystemHash ?? false,
        usesDeepEquality: partial.usesDeepEquality ?? false,
    };
}

// ── Names ───────────────────────────────────────────────────────────

/** `_User` → `User`, `__x` → `x`. */
export function nonPrivate(name: string): string {
    return name.replace(/^_+/, "");
}

export function lowerFirst(name: string): string {
    return name.charAt(0).toLowerCase() + name.slice(1);
}

export function upperFirst(name: string): string {
    return name.charAt(0).toUpperCase() + name.slice(1);
}

/** Single-quoted Dart string literal. */
export function dartString(value: string): string {
    return `'${value.replace(/\\/g, "\\\\").replace(/'/g, "\\'").replace(/\$/g, "\\$")}'`;
}

/** Strip one level of quotes from a Dart string literal, or null when `text` is not one. */
export function stringLiteralValue(text: string): string | null {
    const match = /^r?(['"])(.*)\1$/s.exec(text.trim());
    return match?.[2] ?? null;
}

export function typeText(type: TypeDescriptor | null): string {
    return type?.text ?? "dynamic";
}

/** The type without its trailing `?`. */
export function nonNullableText(type: TypeDescriptor): string {
    return type.nullable ? type.text.slice(0, -1) : type.text;
}

// ── Layout ──────────────────────────────────────────────────────────

export interface ParameterGroups {
    positional: string[];
    optional?: string[];
    named?: string[];
}

/**
 * `head(a, b, {c, d})tail`, or the same list split over lines.
 * `indent` is the indentation of the line `head` starts on.
 */
export function parameterList(head: string, groups: ParameterGroups, tail: string, indent: string): string {
    const optional = groups.optional ?? [];
    const named = groups.named ?? [];
    const [open, close, group]: [string, string, string[]] =
        optional.length > 0 ? ["[", "]", optional] : named.length > 0 ? ["{", "}", named] : ["", "", []];

    const parts = [...groups.positional];
    if (group.length > 0) parts.push(`${open}${group.join(", ")}${close}`);
    const flat = `${head}${parts.join(", ")}${tail}`;
    if (parts.length === 0) return flat;
    if (indent.length + flat.length <= PAGE_WIDTH && !flat.includes("\n")) return flat;

    const inner = `${indent}  `;
    const lines: string[] = [];
    if (groups.positional.length === 0) {
        lines.push(`${head}${open}`);
    } else {
        lines.push(head);
        groups.positional.forEach((p, i) => {
            const last = i === groups.positional.length - 1;
            lines.push(`${inner}${p},${last && open ? ` ${open}` : ""}`);
        });
    }
    for (const item of group) lines.push(`${inner}${item},`);
    lines.push(`${indent}${close}${tail}`);
    return lines.join("\n");
}

/** `head(a, b)tail` for calls and literals. */
export function argumentList(head: string, args: readonly string[], tail: string, indent: string): string {
    return parameterList(head, { positional: [...args] }, tail, indent);
}

/** Indent every non-empty line of `text`. */
export function indentLines(text: string, indent: string): string {
    return text
        .split("\n")
        .map((line) => (line.length > 0 ? `${indent}${line}` : line))
        .join("\n");
}

export function banner(generator: string): string {
    const rule = `// ${"*".repeat(74)}`;
    return `${rule}\n// ${generator}\n${rule}`;
}
