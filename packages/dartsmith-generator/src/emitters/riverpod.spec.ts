/**
 * Contract: emitProvider -- riverpod_generator 2.x providers for one declaration.
 *
 * Sections:
 *   1. Function providers
 *   2. Stateful units
 *   3. Families
 *   4. Errors and hashes
 */
import { UnsupportedTypeError, VariantKind } from "@dartsmith/core";
import { beforeAll, describe, expect, it } from "vitest";
import { classify } from "../classifier";
import { DeclarationKind } from "../enums";
import { loadDartGrammar } from "../grammar/loader";
import { scanSource } from "../scanner";
import { emitProvider, sourceHash, SYSTEM_HASH } from "./riverpod";

beforeAll(async () => {
    await loadDartGrammar();
});

function emit(source: string) {
    const [decl] = scanSource(source, "lib/providers.dart").declarations;
    if (!decl || decl.kind === DeclarationKind.ValueType) throw new Error("expected a provider declaration");
    const result = classify(decl);
    if (result.outcome !== "variant" || result.variant.kind !== VariantKind.Provider) throw new Error("expected a provider variant");
    return { ...emitProvider(decl, result.variant, { file: "lib/providers.dart" }), hash: sourceHash(decl.source) };
}

const HASH_DEBUG = "const bool.fromEnvironment('dart.vm.product') ? null";

describe("emitProvider", () => {
    // -- 1. Function providers --
    describe("function providers", () => {
        it("wraps a future function in an auto-dispose provider with its Ref typedef", () => {
            const { text, errors, usesSystemHash, hash } = emit("@riverpod\nFuture<int> answer(AnswerRef ref) async => 42;");
            expect(errors).toEqual([]);
            expect(usesSystemHash).toBe(false);
            expect(text).toBe(
                [
                    `String _$answerHash() => r'${hash}';`,
                    "",
                    "/// See also [answer].",
                    "@ProviderFor(answer)",
                    "final answerProvider = AutoDisposeFutureProvider<int>.internal(",
                    "  answer,",
                    "  name: r'answerProvider',",
                    "  debugGetCreateSourceHash:",
                    `      ${HASH_DEBUG} : _$answerHash,`,
                    "  dependencies: null,",
                    "  allTransitiveDependencies: null,",
                    ");",
                    "",
                    "@Deprecated('Will be removed in 3.0. Use Ref instead')",
                    "// ignore: unused_element",
                    "typedef AnswerRef = AutoDisposeFutureProviderRef<int>;",
                ].join("\n"),
            );
        });

        it("drops the AutoDispose prefix with keepAlive", () => {
            const { text } = emit("@Riverpod(keepAlive: true)\nString greeting(GreetingRef ref) => 'hi';");
            expect(text).toContain("final greetingProvider = Provider<String>.internal(");
            expect(text).toContain("typedef GreetingRef = ProviderRef<String>;");
        });

        it("unwraps the element type of a stream", () => {
            const { text } = emit("@riverpod\nStream<List<int>> ticks(TicksRef ref) => const Stream.empty();");
            expect(text).toContain("final ticksProvider = AutoDisposeStreamProvider<List<int>>.internal(");
        });
    });

    // -- 2. Stateful units --
    describe("stateful units", () => {
        it("emits the notifier base with a single build and a guarded state setter", () => {
            const { text, hash } = emit("@riverpod\nclass Counter extends _$Counter {\n  @override\n  int build() => 0;\n}");
            expect(text).toBe(
                [
                    `String _$counterHash() => r'${hash}';`,
                    "",
                    "abstract class _$Counter extends BuildlessAutoDisposeNotifier<int> {",
                    "  bool _$disposed = false;",
                    "  late final int _$initial = build();",
                    "",
                    "  int build();",
                    "",
                    "  /// Runs [build] once per notifier and hands back its first result.",
                    "  int _$runBuild() {",
                    "    _$disposed = false;",
                    "    ref.onDispose(() => _$disposed = true);",
                    "    return _$initial;",
                    "  }",
                    "",
                    "  @override",
                    "  set state(int value) {",
                    "    if (_$disposed) {",
                    "      throw StateError('Counter was used after being disposed.');",
                    "    }",
                    "    super.state = value;",
                    "  }",
                    "}",
                    "",
                    "/// See also [Counter].",
                    "@ProviderFor(Counter)",
                    "final counterProvider = CounterProvider._();",
                    "",
                    "/// See also [Counter].",
                    "class CounterProvider extends AutoDisposeNotifierProviderImpl<Counter, int> {",
                    "  CounterProvider._()",
                    "      : super.internal(",
                    "          Counter.new,",
                    "          name: r'counterProvider',",
                    "          debugGetCreateSourceHash:",
                    `              ${HASH_DEBUG} : _$counterHash,`,
                    "          dependencies: null,",
                    "          allTransitiveDependencies: null,",
                    "        );",
                    "",
                    "  @override",
                    "  int runNotifierBuild(",
                    "    covariant Counter notifier,",
                    "  ) {",
                    "    return notifier._$runBuild();",
                    "  }",
                    "}",
                ].join("\n"),
            );
        });

        it("types an async unit's state as AsyncValue", () => {
            const { text } = emit("@riverpod\nclass Feed extends _$Feed {\n  @override\n  Future<String> build() async => '';\n}");
            expect(text).toContain("abstract class _$Feed extends BuildlessAutoDisposeAsyncNotifier<String> {");
            expect(text).toContain("  late final FutureOr<String> _$initial = build();");
            expect(text).toContain("  set state(AsyncValue<String> value) {");
            expect(text).toContain("class FeedProvider extends AutoDisposeAsyncNotifierProviderImpl<Feed, String> {");
        });
    });

    // -- 3. Families --
    describe("families", () => {
        const USER = "@riverpod\nFuture<String> user(UserRef ref, int id, {bool fresh = false}) async => '';";

        it("emits the family, its call and override forwarding every argument", () => {
            const { text, usesSystemHash } = emit(USER);
            expect(usesSystemHash).toBe(true);
            expect(text).toContain("/// See also [user].\n@ProviderFor(user)\nconst userProvider = UserFamily();");
            expect(text).toContain("class UserFamily extends Family<AsyncValue<String>> {");
            expect(text).toContain("  UserProvider call(int id, {bool fresh = false}) {\n    return UserProvider(id, fresh: fresh);\n  }");
            expect(text).toContain("    return call(provider.id, fresh: provider.fresh);");
            expect(text).toContain("  String? get name => r'userProvider';");
        });

        it("passes the ref and arguments through the provider constructor", () => {
            const { text } = emit(USER);
            expect(text).toContain(
                [
                    "class UserProvider extends AutoDisposeFutureProvider<String> {",
                    "  /// See also [user].",
                    "  UserProvider(int id, {bool fresh = false})",
                    "      : this._internal(",
                    "          (ref) => user(",
                    "            ref as UserRef,",
                    "            id,",
                    "            fresh: fresh,",
                    "          ),",
                    "          from: userProvider,",
                    "          name: r'userProvider',",
                ].join("\n"),
            );
            expect(text).toContain("          id: id,\n          fresh: fresh,\n        );");
            expect(text).toContain("  final int id;\n  final bool fresh;");
        });

        it("compares and hashes arguments through _SystemHash", () => {
            const { text } = emit(USER);
            expect(text).toContain("    return other is UserProvider && other.id == id && other.fresh == fresh;");
            expect(text).toContain(
                [
                    "    var hash = _SystemHash.combine(0, runtimeType.hashCode);",
                    "    hash = _SystemHash.combine(hash, id.hashCode);",
                    "    hash = _SystemHash.combine(hash, fresh.hashCode);",
                    "",
                    "    return _SystemHash.finish(hash);",
                ].join("\n"),
            );
        });

        it("compares collection arguments by content", () => {
            const { text, usesDeepEquality } = emit("@riverpod\nint total(TotalRef ref, List<int> values) => 0;");
            expect(usesDeepEquality).toBe(true);
            expect(text).toContain("    return other is TotalProvider && const DeepCollectionEquality().equals(other.values, values);");
            expect(text).toContain("    hash = _SystemHash.combine(hash, const DeepCollectionEquality().hash(values));");
        });

        it("exposes arguments on the ref mixin and the element", () => {
            const { text } = emit(USER);
            expect(text).toContain(
                [
                    "mixin UserRef on AutoDisposeFutureProviderRef<String> {",
                    "  /// The parameter `id` of this provider.",
                    "  int get id;",
                    "",
                    "  /// The parameter `fresh` of this provider.",
                    "  bool get fresh;",
                    "}",
                ].join("\n"),
            );
            expect(text).toContain(
                [
                    "class _UserProviderElement extends AutoDisposeFutureProviderElement<String>",
                    "    with UserRef {",
                    "  _UserProviderElement(super.provider);",
                    "",
                    "  @override",
                    "  int get id => (origin as UserProvider).id;",
                ].join("\n"),
            );
        });

        it("builds a unit family through a cascade of its build arguments", () => {
            const { text } = emit(
                "@Riverpod(keepAlive: true)\nclass Todos extends _$Todos {\n  @override\n  Stream<List<String>> build(String owner) => const Stream.empty();\n}",
            );
            expect(text).toContain("abstract class _$Todos extends BuildlessStreamNotifier<List<String>> {\n  late final String owner;\n");
            expect(text).toContain("  late final Stream<List<String>> _$initial = build(owner);");
            expect(text).toContain("class TodosProvider extends StreamNotifierProviderImpl<Todos, List<String>> {");
            expect(text).toContain("          () => Todos()..owner = owner,");
            expect(text).toContain("  Stream<List<String>> runNotifierBuild(\n    covariant Todos notifier,\n  ) {");
            expect(text).toContain("mixin TodosRef on StreamNotifierProviderRef<List<String>> {");
        });
    });

    // -- 4. Errors and hashes --
    describe("errors and hashes", () => {
        it("reports a function without a ref parameter and emits nothing", () => {
            const { text, errors } = emit("@riverpod\nint lonely() => 0;");
            expect(text).toBe("");
            expect(errors).toHaveLength(1);
            expect(errors[0]).toBeInstanceOf(UnsupportedTypeError);
            expect(errors[0]?.message).toBe('riverpod: "lonely.ref" has unsupported type "missing"; member omitted');
            expect(errors[0]?.file).toBe("lib/providers.dart");
        });

        it("hashes the declaration source with sha1", () => {
            expect(sourceHash("abc")).toBe("a9993e364706816aba3e25717850c26c9cd0d89d");
        });

        it("ships the _SystemHash helper", () => {
            expect(SYSTEM_HASH.split("\n").slice(0, 2)).toEqual(["/// Copied from Dart SDK", "class _SystemHash {"]);
        });
    });
});
