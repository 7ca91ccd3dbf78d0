/**
 * Contract: parseDart -- declaration-level syntax tree read from the tree-sitter Dart grammar.
 *
 * Sections:
 *   1. Directives
 *   2. Classes and annotations
 *   3. Constructors and parameters
 *   4. Fields, methods, accessors
 *   5. Types
 *   6. Functions, enums, opaque declarations
 *   7. Dart 3 syntax
 *   8. Errors
 */
import { ParseError } from "@dartsmith/core";
import { beforeAll, describe, expect, it } from "vitest";
import { loadDartGrammar } from "./loader";
import { parseDart } from "./reader";
import type { ClassNode, ConstructorNode, DeclarationNode, TypeNode } from "./types";

beforeAll(async () => {
    await loadDartGrammar();
});

function classOf(source: string): ClassNode {
    const decl = parseDart(source).declarations[0];
    if (decl?.kind !== "class") throw new Error(`expected a class, got ${decl?.kind}`);
    return decl;
}

function parseErrorOf(source: string, file?: string): ParseError {
    try {
        parseDart(source, file);
    } catch (error) {
        if (error instanceof ParseError) return error;
        throw error;
    }
    throw new Error("expected a ParseError");
}

function constructorsOf(node: ClassNode): ConstructorNode[] {
    return node.members.filter((m): m is ConstructorNode => m.kind === "constructor");
}

function typeName(type: TypeNode | null): string | null {
    if (type === null) return null;
    if (type.kind === "named-type") {
        const args = type.args.length > 0 ? `<${type.args.map(typeName).join(", ")}>` : "";
        return `${type.name}${args}${type.nullable ? "?" : ""}`;
    }
    return type.text;
}

const USER = `
import 'package:freezed_annotation/freezed_annotation.dart';

part 'user.freezed.dart';
part 'user.g.dart';

@freezed
class User with _$User {
  const factory User({
    required String name,
    @Default(0) int age,
    List<String>? tags,
  }) = _User;

  factory User.fromJson(Map<String, dynamic> json) => _$UserFromJson(json);
}
`;

describe("parseDart", () => {
    // -- 1. Directives --

    it("collects imports and part directives with their URIs", () => {
        const unit = parseDart(USER);
        expect(unit.directives.map((d) => [d.keyword, d.uri])).toEqual([
            ["import", "package:freezed_annotation/freezed_annotation.dart"],
            ["part", "user.freezed.dart"],
            ["part", "user.g.dart"],
        ]);
    });

    it("recognizes library and part of directives", () => {
        const unit = parseDart("library app.models;\npart of 'models.dart';");
        expect(unit.directives.map((d) => [d.keyword, d.uri])).toEqual([
            ["library", null],
            ["part of", "models.dart"],
        ]);
        expect(unit.declarations).toEqual([]);
    });

    // -- 2. Classes and annotations --

    it("parses a class with its annotation, mixins and members", () => {
        const user = classOf(USER);
        expect(user.name).toBe("User");
        expect(user.annotations.map((a) => [a.name, a.args])).toEqual([["freezed", null]]);
        expect(user.mixins.map(typeName)).toEqual(["_$User"]);
        expect(user.members.map((m) => m.kind)).toEqual(["constructor", "constructor"]);
    });

    it("splits annotation arguments at top-level commas", () => {
        const node = classOf("@JsonSerializable(explicitToJson: true, fieldRename: FieldRename.snake)\nclass A {}");
        expect(node.annotations[0]).toMatchObject({
            name: "JsonSerializable",
            args: ["explicitToJson: true", "fieldRename: FieldRename.snake"],
        });
    });

    it("keeps qualified annotation names", () => {
        const node = classOf("@f.Freezed(copyWith: false)\nclass A {}");
        expect(node.annotations[0]?.name).toBe("f.Freezed");
    });

    it("reads class modifiers, superclass and interfaces", () => {
        const node = classOf("sealed class Shape extends Base<int> with M implements A, B {}");
        expect(node.modifiers).toEqual(["sealed"]);
        expect(typeName(node.superclass)).toBe("Base<int>");
        expect(node.interfaces.map(typeName)).toEqual(["A", "B"]);
    });

    // -- 3. Constructors and parameters --

    it("parses a redirecting factory with named parameters", () => {
        const [ctor] = constructorsOf(classOf(USER));
        expect(ctor).toMatchObject({ isFactory: true, isConst: true, name: null });
        expect(typeName(ctor?.redirect ?? null)).toBe("_User");
        expect(
            ctor?.parameters.map((p) => [p.name, typeName(p.type), p.section, p.required, p.defaultValue]),
        ).toEqual([
            ["name", "String", "named", true, null],
            ["age", "int", "named", false, null],
            ["tags", "List<String>?", "named", false, null],
        ]);
        expect(ctor?.parameters[1]?.annotations.map((a) => [a.name, a.args])).toEqual([["Default", ["0"]]]);
    });

    it("keeps arrow bodies of factories as text", () => {
        const [, fromJson] = constructorsOf(classOf(USER));
        expect(fromJson?.name).toBe("fromJson");
        expect(fromJson?.body).toMatchObject({ kind: "arrow", text: "_$UserFromJson(json)" });
    });

    it("reads positional, optional and default parameters", () => {
        const node = classOf("class P { P(this.x, [int y = 2, List<int> z = const <int>[]]); }");
        const [ctor] = constructorsOf(node);
        expect(ctor?.parameters.map((p) => [p.name, p.section, p.required, p.isField, p.defaultValue])).toEqual([
            ["x", "positional", true, true, null],
            ["y", "optional", false, false, "2"],
            ["z", "optional", false, false, "const <int>[]"],
        ]);
    });

    it("parses private constructors and initializer lists", () => {
        const node = classOf("class A { const A._(); A.named(int v) : _v = v, super(); }");
        const ctors = constructorsOf(node);
        expect(ctors.map((c) => [c.name, c.isConst, c.initializers])).toEqual([
            ["_", true, null],
            ["named", false, "_v = v, super()"],
        ]);
    });

    it("turns function-typed formals into function types", () => {
        const [ctor] = constructorsOf(classOf("class A { A(void onTap(int index)); }"));
        expect(ctor?.parameters[0]).toMatchObject({ name: "onTap", section: "positional" });
        expect(ctor?.parameters[0]?.type).toMatchObject({
            kind: "function-type",
            text: "void Function(int index)",
            nullable: false,
        });
    });

    // -- 4. Fields, methods, accessors --

    it("parses fields with modifiers and initializers", () => {
        const node = classOf("class A { static const int a = 1, b = 2; late final String c; }");
        expect(node.members).toMatchObject([
            { kind: "field", modifiers: ["static", "const"], names: [{ name: "a", initializer: "1" }, { name: "b", initializer: "2" }] },
            { kind: "field", modifiers: ["late", "final"], names: [{ name: "c", initializer: null }] },
        ]);
        const c = node.members[1];
        expect(c?.kind === "field" && typeName(c.type)).toBe("String");
    });

    it("parses methods with modifiers, getters, setters and operators", () => {
        const source = `
class Counter extends _$Counter {
  @override
  Future<int> build(int start) async => start;
  int get doubled => state * 2;
  set value(int v) {}
  bool operator ==(Object other) => true;
  static void reset() {}
}`;
        const node = classOf(source);
        const methods = node.members.filter((m) => m.kind === "method");
        expect(methods.map((m) => [m.name, m.accessor, m.isOperator, m.isStatic])).toEqual([
            ["build", null, false, false],
            ["doubled", "get", false, false],
            ["value", "set", false, false],
            ["operator==", null, true, false],
            ["reset", null, false, true],
        ]);
        const build = methods[0];
        expect(build?.kind === "method" && typeName(build.returnType)).toBe("Future<int>");
        expect(build?.kind === "method" && build.body).toMatchObject({ kind: "arrow", modifier: "async", text: "start" });
        expect(build?.annotations.map((a) => a.name)).toEqual(["override"]);
    });

    it("treats `get` without a return type as a getter", () => {
        const node = classOf("class A { get props => [1, 2]; }");
        expect(node.members[0]).toMatchObject({ kind: "method", name: "props", accessor: "get", returnType: null });
    });

    // -- 5. Types --

    it("parses nested generics, nullability and prefixes", () => {
        const node = classOf("class A { final Map<String, List<m.Item?>>? items; }");
        const field = node.members[0];
        expect(field?.kind === "field" && typeName(field.type)).toBe("Map<String, List<m.Item?>>?");
    });

    it("parses function and record types", () => {
        const node = classOf("class A { final void Function(int a)? cb; final (int, String) pair; }");
        const [cb, pair] = node.members;
        expect(cb?.kind === "field" && cb.type).toMatchObject({ kind: "function-type", text: "void Function(int a)?", nullable: true });
        expect(pair?.kind === "field" && pair.type).toMatchObject({ kind: "record-type", text: "(int, String)" });
    });

    // -- 6. Functions, enums, opaque declarations --

    it("parses annotated top-level functions", () => {
        const unit = parseDart("@riverpod\nFuture<List<User>> users(UsersRef ref, {int page = 0}) async {\n  return [];\n}");
        const users = unit.declarations[0];
        if (users?.kind !== "function") throw new Error("expected a function");
        expect(users.name).toBe("users");
        expect(typeName(users.returnType)).toBe("Future<List<User>>");
        expect(users.parameters.map((p) => [p.name, p.section, p.defaultValue])).toEqual([
            ["ref", "positional", null],
            ["page", "named", "0"],
        ]);
        expect(users.body).toMatchObject({ kind: "block", modifier: "async", text: "{\n  return [];\n}" });
    });

    it("parses enum values and ignores enhanced enum members", () => {
        const unit = parseDart("enum Status { @JsonValue('on') active, inactive(2); const Status([this.v]); final int? v; }");
        expect(unit.declarations[0]).toMatchObject({ kind: "enum", name: "Status", values: ["active", "inactive"] });
    });

    it("keeps mixins, extensions, typedefs and variables opaque", () => {
        const unit = parseDart(`
mixin Loggable on Object { void log() {} }
extension on String { int get size => length; }
typedef Json = Map<String, dynamic>;
final answer = 42;
int get version => 1;
`);
        const kinds = unit.declarations.map((d: DeclarationNode) => (d.kind === "opaque" ? d.keyword : d.kind));
        expect(kinds).toEqual(["mixin", "extension", "typedef", "variable", "getter"]);
        expect(unit.declarations.map((d) => (d.kind === "opaque" ? d.name : null))).toEqual([
            "Loggable",
            null,
            "Json",
            "answer",
            "version",
        ]);
    });

    it("skips generic calls and closures inside bodies", () => {
        const unit = parseDart("void main() { final x = <String, int>{'a': 1}; run(() { if (x.length < 2) return; }); }\nclass After {}");
        expect(unit.declarations.map((d) => d.kind)).toEqual(["function", "class"]);
    });

    it("records the start location of declarations", () => {
        const unit = parseDart("\n\n  class A {}");
        expect(unit.declarations[0]?.span.location).toEqual({ offset: 4, line: 3, column: 3 });
    });

    // -- 7. Dart 3 syntax --

    it("reads record return types of top-level functions", () => {
        const unit = parseDart("(int, String) pair() => (1, 'a');\n@riverpod\nint counter(Ref ref) => 0;");
        expect(unit.declarations.map((d) => d.kind)).toEqual(["function", "function"]);
        const [pair, counter] = unit.declarations;
        expect(pair?.kind === "function" && pair.returnType).toMatchObject({ kind: "record-type", text: "(int, String)" });
        expect(counter?.kind === "function" && counter.annotations.map((a) => a.name)).toEqual(["riverpod"]);
    });

    it("reads Dart 3 class and mixin modifiers", () => {
        const unit = parseDart("base mixin A {}\nmixin class B {}\nfinal class C {}\nsealed class D {}");
        const shapes = unit.declarations.map((d) => {
            if (d.kind === "opaque") return `${d.keyword} ${d.name}`;
            if (d.kind === "class") return `${d.modifiers.join(" ")} class ${d.name}`;
            return d.kind;
        });
        expect(shapes).toEqual(["mixin A", "mixin class B", "final class C", "sealed class D"]);
    });

    // -- 8. Errors --

    it("reports an unclosed class with its file", () => {
        const error = parseErrorOf("class A {\n  int x;\n", "lib/a.dart");
        expect(error.file).toBe("lib/a.dart");
        expect(error.location.line).toBeGreaterThanOrEqual(1);
    });

    it("reports mismatched brackets", () => {
        expect(() => parseDart("void f() { g(]; }")).toThrow(ParseError);
    });

    it("reports stray tokens at top level", () => {
        const error = parseErrorOf("}");
        expect(error.location).toEqual({ offset: 0, line: 1, column: 1 });
        expect(error.message).toBe('1:1: unexpected "}"');
    });
});
