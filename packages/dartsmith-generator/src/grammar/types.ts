import type { SourceLocation } from "@dartsmith/core";

// ── Syntax tree ─────────────────────────────────────────────────────

export interface Span {
    start: number;
    end: number;
    location: SourceLocation;
}

export interface AnnotationNode {
    kind: "annotation";
    /** Qualified name without `@`, e.g. `Riverpod` or `JsonKey`. */
    name: string;
    /** Top-level arguments as written, e.g. `["keepAlive: true"]`. Null when no parentheses. */
    args: string[] | null;
    span: Span;
}

export interface NamedTypeNode {
    kind: "named-type";
    name: string;
    args: TypeNode[];
    nullable: boolean;
    span: Span;
}

export interface FunctionTypeNode {
    kind: "function-type";
    text: string;
    nullable: boolean;
    span: Span;
}

export interface RecordTypeNode {
    kind: "record-type";
    text: string;
    nullable: boolean;
    span: Span;
}

export type TypeNode = NamedTypeNode | FunctionTypeNode | RecordTypeNode;

export type ParameterSection = "positional" | "optional" | "named";

export interface ParameterNode {
    kind: "parameter";
    name: string;
    type: TypeNode | null;
    section: ParameterSection;
    required: boolean;
    /** `this.name` initializing formal. */
    isField: boolean;
    isSuper: boolean;
    defaultValue: string | null;
    annotations: AnnotationNode[];
    span: Span;
}

export type BodyKind = "block" | "arrow" | "empty";

export interface BodyNode {
    kind: BodyKind;
    /** `async`, `async*` or `sync*` when present. */
    modifier: string | null;
    text: string;
    span: Span;
}

export interface ConstructorNode {
    kind: "constructor";
    className: string;
    name: string | null;
    isFactory: boolean;
    isConst: boolean;
    parameters: ParameterNode[];
    /** Redirect target of `= _Impl;` factories. */
    redirect: TypeNode | null;
    initializers: string | null;
    body: BodyNode | null;
    annotations: AnnotationNode[];
    span: Span;
}

export interface FieldNode {
    kind: "field";
    type: TypeNode | null;
    names: { name: string; initializer: string | null }[];
    modifiers: string[];
    annotations: AnnotationNode[];
    span: Span;
}

export interface MethodNode {
    kind: "method";
    name: string;
    returnType: TypeNode | null;
    typeParameters: string | null;
    parameters: ParameterNode[];
    body: BodyNode;
    isStatic: boolean;
    accessor: "get" | "set" | null;
    isOperator: boolean;
    annotations: AnnotationNode[];
    span: Span;
}

export type MemberNode = ConstructorNode | FieldNode | MethodNode;

export interface ClassNode {
    kind: "class";
    name: string;
    typeParameters: string | null;
    modifiers: string[];
    superclass: TypeNode | null;
    mixins: TypeNode[];
    interfaces: TypeNode[];
    members: MemberNode[];
    annotations: AnnotationNode[];
    span: Span;
}

export interface EnumNode {
    kind: "enum";
    name: string;
    values: string[];
    annotations: AnnotationNode[];
    span: Span;
}

export interface FunctionNode {
    kind: "function";
    name: string;
    returnType: TypeNode | null;
    typeParameters: string | null;
    parameters: ParameterNode[];
    body: BodyNode;
    annotations: AnnotationNode[];
    span: Span;
}

/** Declarations the extractor does not look into: mixins, extensions, typedefs, variables. */
export interface OpaqueNode {
    kind: "opaque";
    keyword: string;
    name: string | null;
    annotations: AnnotationNode[];
    span: Span;
}

export type DeclarationNode = ClassNode | EnumNode | FunctionNode | OpaqueNode;

export interface DirectiveNode {
    kind: "directive";
    keyword: "library" | "import" | "export" | "part" | "part of";
    uri: string | null;
    span: Span;
}

export interface CompilationUnit {
    kind: "unit";
    directives: DirectiveNode[];
    declarations: DeclarationNode[];
    source: string;
}
