/**
 * Per-file pipeline: scan → classify → emit → assemble companions.
 *
 * Pure: takes source text, returns companion texts and a report. Reading
 * and writing files is left to the coordinator and the writer.
 */

import { basename, dirname, relative, resolve, sep } from "node:path";
import {
    CompanionKind,
    extractionWarning,
    ParseError,
    ReportBuilder,
    type ResolvedConfig,
    type RunReport,
    VariantKind,
    warningToDiagnostic,
} from "@dartsmith/core";
import { classifyAll } from "./classifier";
import { banner, type EmitOutput } from "./emitters/dart";
import { emitFreezed, FREEZED_PRELUDE, hasCopyWith } from "./emitters/freezed";
import { emitEnumMap, emitJson } from "./emitters/json";
import { emitProvider, SYSTEM_HASH } from "./emitters/riverpod";
import { DeclarationKind } from "./enums";
import { scanSource } from "./scanner";
import type { ClassifiedDeclaration, EmissionResult, EnumInfo, ExtractedFile } from "./types";

const GENERATED_HEADER = "// GENERATED CODE - DO NOT MODIFY BY HAND";
/** Libraries that make `DeepCollectionEquality` visible to the `.g.dart` part. */
const DEEP_EQUALITY_IMPORTS = ["package:collection/collection.dart", "package:freezed_annotation/freezed_annotation.dart"];

const FREEZED_IGNORES = [
    "// ignore_for_file: type=lint",
    "// ignore_for_file: unused_element, deprecated_member_use, deprecated_member_use_from_same_package, use_function_type_syntax_for_parameters, unnecessary_const, avoid_init_to_null, invalid_override_different_default_values_named, prefer_expression_function_bodies, annotate_overrides, invalid_annotation_target, unnecessary_question_mark",
];

const RIVERPOD_IGNORES = [
    "// ignore_for_file: type=lint",
    "// ignore_for_file: subtype_of_sealed_class, invalid_use_of_internal_member, invalid_use_of_visible_for_testing_member, deprecated_member_use_from_same_package",
];

export interface GeneratorInput {
    /** Absolute source path. */
    path: string;
    source: string;
    config: ResolvedConfig;
}

export interface GeneratorOutput {
    path: string;
    /** Companions with content, freezed first. */
    outputs: EmissionResult[];
    /**
     * Companion paths this source maps to that received nothing. Empty when
     * the source failed to parse, so earlier output stays in place.
     */
    absent: string[];
    report: RunReport;
}

// ── Sections ────────────────────────────────────────────────────────

/** Emitted text for one companion, grouped by generator. */
class CompanionSections {
    readonly freezed: string[] = [];
    readonly json: string[] = [];
    readonly riverpod: string[] = [];
    readonly enumMaps = new Set<string>();
    usesSystemHash = false;
    readonly declarations: string[] = [];
}

function partOf(sourcePath: string, companionPath: string): string {
    const rel = relative(dirname(companionPath), sourcePath).split(sep).join("/");
    return `part of '${rel}';`;
}

function freezedFile(sourcePath: string, companionPath: string, sections: readonly string[]): string {
    return [
        ["// coverage:ignore-file", GENERATED_HEADER, ...FREEZED_IGNORES].join("\n"),
        partOf(sourcePath, companionPath),
        banner("FreezedGenerator"),
        FREEZED_PRELUDE,
        ...sections,
    ].join("\n\n");
}

function generatedFile(sourcePath: string, companionPath: string, s: CompanionSections, enums: ReadonlyMap<string, EnumInfo>): string {
    const blocks = [GENERATED_HEADER, partOf(sourcePath, companionPath)];
    if (s.json.length > 0) {
        blocks.push(banner("JsonSerializableGenerator"), ...s.json);
        for (const name of s.enumMaps) {
            const info = enums.get(name);
            if (info) blocks.push(emitEnumMap(info));
        }
    }
    if (s.riverpod.length > 0) {
        blocks.push(banner("RiverpodGenerator"), ...s.riverpod);
        if (s.usesSystemHash) blocks.push(SYSTEM_HASH);
        blocks.push(RIVERPOD_IGNORES.join("\n"));
    }
    return blocks.join("\n\n");
}

// ── Pipeline ────────────────────────────────────────────────────────

class FilePipeline {
    private readonly report = new ReportBuilder();
    private readonly sections = new CompanionSections();
    private readonly enums: Map<string, EnumInfo>;
    private readonly copyWithTypes = new Set<string>();

    constructor(
        private readonly input: GeneratorInput,
        private readonly file: ExtractedFile,
    ) {
        this.enums = new Map(file.enums.map((e) => [e.name, e]));
    }

    run(): GeneratorOutput {
        const { path, config } = this.input;
        this.report.fileProcessed();
        for (const warning of this.file.warnings) this.report.add(warningToDiagnostic(warning, path));

        const { classified, warnings, errors } = classifyAll(this.file.declarations, path);
        for (const warning of warnings) this.report.add(warningToDiagnostic(warning, path));
        for (const error of errors) this.report.fail(error, path);

        for (const { declaration, variant } of classified) {
            if (variant.kind === VariantKind.Immutable && declaration.kind === DeclarationKind.ValueType && hasCopyWith(declaration)) {
                this.copyWithTypes.add(declaration.name);
            }
        }
        for (const entry of this.dedupe(classified)) {
            if (config.enabledVariants.has(entry.variant.kind)) this.emit(entry);
        }
        return this.assemble();
    }

    /** Keep the first declaration of each provider name. */
    private dedupe(classified: readonly ClassifiedDeclaration[]): ClassifiedDeclaration[] {
        const seen = new Set<string>();
        return classified.filter(({ declaration, variant }) => {
            if (variant.kind !== VariantKind.Provider) return true;
            if (!seen.has(declaration.name)) {
                seen.add(declaration.name);
                return true;
            }
            this.report.add(
                warningToDiagnostic(
                    extractionWarning(`provider "${declaration.name}" is declared more than once; keeping the first`, declaration.name, declaration.location),
                    this.input.path,
                ),
            );
            return false;
        });
    }

    private collect(output: EmitOutput, variant: VariantKind, target: string[], name: string): void {
        for (const error of output.errors) this.report.fail(error, this.input.path);
        for (const map of output.enumMaps) this.sections.enumMaps.add(map);
        this.sections.usesSystemHash ||= output.usesSystemHash;
        if (output.usesDeepEquality && !this.file.imports.some((uri) => DEEP_EQUALITY_IMPORTS.includes(uri))) {
            this.report.add(
                warningToDiagnostic(
                    extractionWarning(
                        `"${name}" compares collection arguments with DeepCollectionEquality; import 'package:collection/collection.dart'`,
                        name,
                    ),
                    this.input.path,
                ),
            );
        }
        if (output.text.length === 0) return;
        target.push(output.text);
        this.report.declarationEmitted(variant);
        this.sections.declarations.push(`${this.input.path}#${name}`);
    }

    private emit({ declaration, variant }: ClassifiedDeclaration): void {
        const { path, config } = this.input;
        const s = this.sections;
        if (variant.kind === VariantKind.Provider) {
            if (declaration.kind === DeclarationKind.ValueType) return;
            this.collect(emitProvider(declaration, variant, { file: path }), variant.kind, s.riverpod, declaration.name);
            return;
        }
        if (declaration.kind !== DeclarationKind.ValueType) return;

        if (variant.kind === VariantKind.Immutable) {
            const freezed = emitFreezed(declaration, { withJson: variant.withJson, copyWithTypes: this.copyWithTypes, file: path });
            this.collect(freezed, variant.kind, s.freezed, declaration.name);
            // The json half of a freezed class follows the json variant's switch.
            if (!variant.withJson || !config.enabledVariants.has(VariantKind.JsonCodec) || freezed.text.length === 0) return;
        }
        const json = emitJson(declaration, variant, { json: config.json, enums: this.enums, file: path });
        this.collect(json, VariantKind.JsonCodec, s.json, declaration.name);
    }

    private assemble(): GeneratorOutput {
        const { path, config } = this.input;
        const s = this.sections;
        const outputs: EmissionResult[] = [];
        const absent: string[] = [];
        const declarations = [...new Set(s.declarations)];

        const freezedPath = config.outputMapping(path, CompanionKind.Freezed);
        if (s.freezed.length > 0) {
            outputs.push({ path: freezedPath, kind: CompanionKind.Freezed, text: `${freezedFile(path, freezedPath, s.freezed)}\n`, declarations });
            this.report.companionEmitted(VariantKind.Immutable);
        } else {
            absent.push(freezedPath);
        }

        const gPath = config.outputMapping(path, CompanionKind.Generated);
        if (s.json.length > 0 || s.riverpod.length > 0) {
            outputs.push({ path: gPath, kind: CompanionKind.Generated, text: `${generatedFile(path, gPath, s, this.enums)}\n`, declarations });
            if (s.json.length > 0) this.report.companionEmitted(VariantKind.JsonCodec);
            if (s.riverpod.length > 0) this.report.companionEmitted(VariantKind.Provider);
        } else {
            absent.push(gPath);
        }

        for (const output of outputs) this.checkPart(output.path);
        return { path, outputs, absent, report: this.report.build() };
    }

    private checkPart(companionPath: string): void {
        const dir = dirname(this.input.path);
        if (this.file.parts.some((uri) => resolve(dir, uri) === resolve(companionPath))) return;
        const uri = relative(dir, companionPath).split(sep).join("/");
        this.report.add(
            warningToDiagnostic(extractionWarning(`missing directive part '${uri}'; ${basename(companionPath)} will not compile`), this.input.path),
        );
    }
}

/**
 * Generate the companions of one source file.
 *
 * A ParseError is reported and yields no outputs; any other error is a bug
 * and propagates.
 */
export function generate(input: GeneratorInput): GeneratorOutput {
    let file: ExtractedFile;
    try {
        file = scanSource(input.source, input.path);
    } catch (error) {
        if (!(error instanceof ParseError)) throw error;
        return { path: input.path, outputs: [], absent: [], report: new ReportBuilder().fail(error, input.path).build() };
    }
    return new FilePipeline(input, file).run();
}
