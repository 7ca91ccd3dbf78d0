/**
 * Contract: generate -- one source file to its companion texts.
 *
 * Sections:
 *   1. Companion layout
 *   2. Part directives and output directories
 *   3. Variant switches
 *   4. Diagnostics
 */
import { CompanionKind, defineConfig, VariantKind } from "@dartsmith/core";
import { beforeAll, describe, expect, it } from "vitest";
import { banner } from "./emitters/dart";
import { SYSTEM_HASH } from "./emitters/riverpod";
import { generate } from "./generator";
import { loadDartGrammar } from "./grammar/loader";

beforeAll(async () => {
    await loadDartGrammar();
});

const ROOT = "/project";
const USER_PATH = "/project/lib/user.dart";

const USER = `import 'package:freezed_annotation/freezed_annotation.dart';

part 'user.freezed.dart';
part 'user.g.dart';

@freezed
class User with _$User {
  const factory User({required String name, @Default(0) int age}) = _User;

  factory User.fromJson(Map<String, dynamic> json) => _$UserFromJson(json);
}
`;

const PROVIDERS = `part 'user.g.dart';

enum Role { admin, guest }

@JsonSerializable()
class Member {
  Member(this.role);
  final Role role;
}

@riverpod
int count(CountRef ref) => 0;

@riverpod
String label(LabelRef ref, int id) => '$id';
`;

function run(source: string, config = defineConfig({ root: ROOT, input: "lib" })) {
    return generate({ path: USER_PATH, source, config });
}

function textOf(source: string, kind: CompanionKind): string {
    const output = run(source).outputs.find((o) => o.kind === kind);
    if (!output) throw new Error(`no ${kind} companion`);
    return output.text;
}

describe("generate", () => {
    // -- 1. Companion layout --
    describe("companion layout", () => {
        it("writes a freezed and a .g.dart companion beside the source", () => {
            const result = run(USER);
            expect(result.outputs.map((o) => [o.kind, o.path])).toEqual([
                [CompanionKind.Freezed, "/project/lib/user.freezed.dart"],
                [CompanionKind.Generated, "/project/lib/user.g.dart"],
            ]);
            expect(result.absent).toEqual([]);
            expect(result.outputs[0]?.declarations).toEqual(["/project/lib/user.dart#User"]);
        });

        it("opens the freezed companion with its header, part of and prelude", () => {
            const text = textOf(USER, CompanionKind.Freezed);
            const lines = text.split("\n");
            expect(lines.slice(0, 3)).toEqual(["// coverage:ignore-file", "// GENERATED CODE - DO NOT MODIFY BY HAND", "// ignore_for_file: type=lint"]);
            expect(text).toContain(`\n\npart of 'user.dart';\n\n${banner("FreezedGenerator")}\n\nT _$identity<T>(T value) => value;`);
            expect(text.endsWith("}\n")).toBe(true);
        });

        it("chains copyWith into freezed classes of the same file", () => {
            const source = `part 'user.freezed.dart';

@freezed
class Point with _$Point {
  const factory Point({required int x}) = _Point;
}

@freezed
class Line with _$Line {
  const factory Line({required Point start}) = _Line;
}
`;
            expect(textOf(source, CompanionKind.Freezed)).toContain("    return $PointCopyWith<$Res>(_value.start, (value) {");
        });

        it("puts checked JSON functions under their banner in the .g.dart companion", () => {
            const text = textOf(USER, CompanionKind.Generated);
            expect(text.startsWith(`// GENERATED CODE - DO NOT MODIFY BY HAND\n\npart of 'user.dart';\n\n${banner("JsonSerializableGenerator")}\n\n`)).toBe(true);
            expect(text).toContain("_$UserImpl _$$UserImplFromJson(Map<String, dynamic> json) => $checkedCreate(");
            expect(text).toContain("          age: $checkedConvert('age', (v) => (v as num?)?.toInt() ?? 0),");
            expect(text).not.toContain("RiverpodGenerator");
        });

        it("follows JSON sections with enum maps, then providers, _SystemHash and the ignore lines", () => {
            const text = textOf(PROVIDERS, CompanionKind.Generated);
            const jsonAt = text.indexOf(banner("JsonSerializableGenerator"));
            const enumAt = text.indexOf("const _$RoleEnumMap = {\n  Role.admin: 'admin',\n  Role.guest: 'guest',\n};");
            const riverpodAt = text.indexOf(banner("RiverpodGenerator"));
            const hashAt = text.indexOf(SYSTEM_HASH);
            expect(jsonAt).toBeGreaterThan(0);
            expect(enumAt).toBeGreaterThan(jsonAt);
            expect(riverpodAt).toBeGreaterThan(enumAt);
            expect(hashAt).toBeGreaterThan(text.indexOf("class LabelProvider"));
            expect(
                text.endsWith(
                    "// ignore_for_file: type=lint\n// ignore_for_file: subtype_of_sealed_class, invalid_use_of_internal_member, invalid_use_of_visible_for_testing_member, deprecated_member_use_from_same_package\n",
                ),
            ).toBe(true);
        });

        it("counts declarations and companions per variant", () => {
            const { report } = run(PROVIDERS);
            expect(report.filesProcessed).toBe(1);
            expect(report.declarationsEmittedByVariant).toEqual({
                [VariantKind.Immutable]: 0,
                [VariantKind.JsonCodec]: 1,
                [VariantKind.Provider]: 2,
            });
            expect(report.companionsByVariant).toEqual({
                [VariantKind.Immutable]: 0,
                [VariantKind.JsonCodec]: 1,
                [VariantKind.Provider]: 1,
            });
        });

        it("returns identical text for identical input", () => {
            expect(run(PROVIDERS).outputs).toEqual(run(PROVIDERS).outputs);
        });
    });

    // -- 2. Part directives and output directories --
    describe("part directives", () => {
        it("warns when a companion is not listed as a part", () => {
            const source = USER.replace("part 'user.freezed.dart';\npart 'user.g.dart';\n", "");
            expect(run(source).report.warnings.map((w) => w.message)).toEqual([
                "missing directive part 'user.freezed.dart'; user.freezed.dart will not compile",
                "missing directive part 'user.g.dart'; user.g.dart will not compile",
            ]);
        });

        it("points part of back at the source from an output directory", () => {
            const config = defineConfig({ root: ROOT, input: "lib", output: "gen" });
            const result = run(USER, config);
            const freezed = result.outputs[0];
            expect(freezed?.path).toBe("/project/gen/user.freezed.dart");
            expect(freezed?.text).toContain("\n\npart of '../lib/user.dart';\n\n");
            expect(result.report.warnings[0]?.message).toBe(
                "missing directive part '../gen/user.freezed.dart'; user.freezed.dart will not compile",
            );
        });
    });

    // -- 3. Variant switches --
    describe("variant switches", () => {
        it("leaves disabled variants out and lists their companions as absent", () => {
            const config = defineConfig({ root: ROOT, input: "lib", variants: [VariantKind.Provider] });
            const result = run(USER, config);
            expect(result.outputs).toEqual([]);
            expect(result.absent).toEqual(["/project/lib/user.freezed.dart", "/project/lib/user.g.dart"]);
        });

        it("drops the JSON half of a freezed class when JSON codecs are off", () => {
            const config = defineConfig({ root: ROOT, input: "lib", variants: [VariantKind.Immutable] });
            const result = run(USER, config);
            expect(result.outputs.map((o) => o.kind)).toEqual([CompanionKind.Freezed]);
            expect(result.absent).toEqual(["/project/lib/user.g.dart"]);
        });

        it("writes only providers when they are the only variant enabled", () => {
            const config = defineConfig({ root: ROOT, input: "lib", variants: [VariantKind.Provider] });
            const [output] = run(PROVIDERS, config).outputs;
            expect(output?.kind).toBe(CompanionKind.Generated);
            expect(output?.text).not.toContain("JsonSerializableGenerator");
            expect(output?.text).toContain("final countProvider = AutoDisposeProvider<int>.internal(");
        });
    });

    // -- 4. Diagnostics --
    describe("diagnostics", () => {
        it("keeps the first of two providers with the same name", () => {
            const source = "part 'user.g.dart';\n\n@riverpod\nint count(CountRef ref) => 0;\n\n@riverpod\nint count(CountRef ref) => 1;\n";
            const result = run(source);
            expect(result.report.warnings.map((w) => w.message)).toEqual([
                'provider "count" is declared more than once; keeping the first',
            ]);
            expect(result.outputs[0]?.text.split("final countProvider =")).toHaveLength(2);
        });

        it("reports markers that cannot be combined and still emits the rest", () => {
            const source = `part 'user.g.dart';\n\n@freezed\n@riverpod\nclass Both with _$Both {\n  const factory Both() = _Both;\n}\n\n@riverpod\nint count(CountRef ref) => 0;\n`;
            const result = run(source);
            expect(result.report.errors.map((e) => [e.code, e.file, e.declaration])).toEqual([["conflict", USER_PATH, "Both"]]);
            expect(result.outputs.map((o) => o.kind)).toEqual([CompanionKind.Generated]);
        });

        it("yields no outputs and no absent companions for a source that does not parse", () => {
            const result = run("@freezed\nclass Broken with _$Broken {\n  const factory Broken(");
            expect(result.outputs).toEqual([]);
            expect(result.absent).toEqual([]);
            expect(result.report.errors.map((e) => [e.code, e.file])).toEqual([["parse", USER_PATH]]);
        });

        it("emits every companion of a source that uses records and class modifiers", () => {
            const source = `part 'user.freezed.dart';
part 'user.g.dart';

base mixin Greeter {
  void hi() {}
}

(int, String) pair() => (1, 'a');

@freezed
class User with _$User {
  const factory User({required String name}) = _User;
}

@riverpod
int counter(Ref ref) => 0;
`;
            const result = run(source);
            expect(result.report.errors).toEqual([]);
            expect(result.outputs.map((o) => o.kind)).toEqual([CompanionKind.Freezed, CompanionKind.Generated]);
            expect(result.outputs[1]?.text).toContain("final counterProvider = AutoDisposeProvider<int>.internal(");
        });

        it("warns when a collection family argument has no package:collection import", () => {
            const source = "part 'user.g.dart';\n\n@riverpod\nint total(TotalRef ref, List<int> values) => 0;\n";
            expect(run(source).report.warnings.map((w) => [w.message, w.declaration])).toEqual([
                [`"total" compares collection arguments with DeepCollectionEquality; import 'package:collection/collection.dart'`, "total"],
            ]);
            const imported = `import 'package:collection/collection.dart';\n\n${source}`;
            expect(run(imported).report.warnings).toEqual([]);
        });

        it("reports unsupported members as file errors", () => {
            const source = "part 'user.g.dart';\n\n@riverpod\nint lonely() => 0;\n";
            const result = run(source);
            expect(result.report.errors.map((e) => e.message)).toEqual([
                'riverpod: "lonely.ref" has unsupported type "missing"; member omitted',
            ]);
            expect(result.outputs).toEqual([]);
        });
    });
});
