import { ParseError, type SourceLocation } from "@dartsmith/core";
import type Parser from "web-tree-sitter";
import { dartParser } from "./loader";
import type {
    AnnotationNode,
    BodyNode,
    ClassNode,
    CompilationUnit,
    ConstructorNode,
    DeclarationNode,
    DirectiveNode,
    EnumNode,
    FieldNode,
    FunctionNode,
    MemberNode,
    MethodNode,
    OpaqueNode,
    ParameterNode,
    ParameterSection,
    Span,
    TypeNode,
} from "./types";

type SyntaxNode = Parser.SyntaxNode;

const COMMENTS = new Set(["comment", "documentation_comment"]);
const ANNOTATIONS = new Set(["annotation", "marker_annotation"]);

const CLASS_MODIFIERS = new Set(["abstract", "sealed", "base", "interface", "final", "mixin", "augment", "macro"]);
const MEMBER_MODIFIERS = new Set(["static", "external", "late", "final", "const", "var", "covariant", "abstract", "augment"]);
const PARAM_MODIFIERS = new Set(["covariant", "final", "var", "late", "const"]);
const TYPE_KEYWORDS = new Set(["extends", "with", "implements", "on"]);

const TYPE_DECLARATIONS = new Set(["class_definition", "mixin_declaration"]);
const OPAQUE_KEYWORDS = new Map([
    ["mixin_declaration", "mixin"],
    ["extension_declaration", "extension"],
    ["extension_type_declaration", "extension type"],
    ["type_alias", "typedef"],
]);
const DECLARATION_STARTS = new Set([
    "class_definition",
    "enum_declaration",
    "function_signature",
    "getter_signature",
    "setter_signature",
    ...OPAQUE_KEYWORDS.keys(),
]);

const CONSTRUCTORS = new Set([
    "redirecting_factory_constructor_signature",
    "factory_constructor_signature",
    "constructor_signature",
    "constant_constructor_signature",
]);
const SIGNATURES = new Set([...CONSTRUCTORS, "function_signature", "getter_signature", "setter_signature", "operator_signature"]);
const MEMBER_CONTAINERS = new Set(["declaration", "method_signature"]);
const FIELD_LISTS = new Set(["initialized_identifier_list", "static_final_declaration_list", "identifier_list"]);

/** Nodes a parameter may be nested in; their children are read as one flat run. */
const PARAMETER_WRAPPERS = new Set([
    "formal_parameter",
    "normal_formal_parameter",
    "default_formal_parameter",
    "default_named_parameter",
    "simple_formal_parameter",
    "typed_identifier",
]);

const PARENS = new Set(["(", ")"]);
const OPTIONAL_BRACKETS = new Set(["[", "]", "{", "}"]);
const ANGLES = new Set(["<", ">"]);

// ── Node helpers ────────────────────────────────────────────────────

function childrenOf(node: SyntaxNode): SyntaxNode[] {
    return node.children.filter((child) => !COMMENTS.has(child.type));
}

function locate(node: SyntaxNode): SourceLocation {
    return { offset: node.startIndex, line: node.startPosition.row + 1, column: node.startPosition.column + 1 };
}

function spanOf(first: SyntaxNode, last: SyntaxNode = first): Span {
    return { start: first.startIndex, end: Math.max(first.startIndex, last.endIndex), location: locate(first) };
}

function findFirst(node: SyntaxNode, match: (node: SyntaxNode) => boolean): SyntaxNode | null {
    if (match(node)) return node;
    for (const child of node.children) {
        const found = findFirst(child, match);
        if (found !== null) return found;
    }
    return null;
}

/** Splits a node's children at `,`, dropping the separators and `skip` tokens. */
function segments(nodes: readonly SyntaxNode[], skip: ReadonlySet<string>): SyntaxNode[][] {
    const out: SyntaxNode[][] = [];
    let current: SyntaxNode[] = [];
    for (const node of nodes) {
        if (node.type === ",") {
            if (current.length > 0) out.push(current);
            current = [];
        } else if (!skip.has(node.type) && !COMMENTS.has(node.type)) {
            current.push(node);
        }
    }
    if (current.length > 0) out.push(current);
    return out;
}

/** A syntax error node: `ERROR`, or a zero-width token the parser inserted. */
function isErrorNode(node: SyntaxNode): boolean {
    return node.type === "ERROR" || (node.childCount === 0 && node.startIndex === node.endIndex);
}

function firstError(root: SyntaxNode): SyntaxNode | null {
    if (root.type === "ERROR") return root;
    for (const child of root.children) {
        const found = findFirst(child, isErrorNode);
        if (found !== null) return found;
    }
    return null;
}

function unquote(literal: string): string {
    return literal.replace(/^[rR]?('''|"""|'|")/, "").replace(/('''|"""|'|")$/, "");
}

function normalizeSpace(text: string): string {
    return text.replace(/\s+/g, " ").replace(/\(\s+/g, "(").replace(/\s+\)/g, ")").replace(/,\s*\)/g, ")");
}

function isModifierRun(node: SyntaxNode): boolean {
    const words = node.text.trim().split(/\s+/);
    return words.length > 0 && words.every((word) => CLASS_MODIFIERS.has(word));
}

// ── Reader ──────────────────────────────────────────────────────────

/**
 * Reads the tree-sitter concrete syntax tree of one Dart file into the
 * declaration-level nodes the scanner consumes.
 *
 * Types are rebuilt from their nodes; function bodies, initializers and
 * default values are kept as source text.
 */
class TreeReader {
    constructor(
        private readonly source: string,
        private readonly file?: string,
    ) {}

    readUnit(root: SyntaxNode): CompilationUnit {
        const error = firstError(root);
        if (error !== null) throw this.errorAt(error);

        const directives: DirectiveNode[] = [];
        const declarations: DeclarationNode[] = [];
        const kids = childrenOf(root);

        let annotations: AnnotationNode[] = [];
        let modifiers: string[] = [];
        let start: SyntaxNode | null = null;

        for (let i = 0; i < kids.length; i++) {
            const node = kids[i];
            if (node.type === ";" || node.text === "external") continue;

            const directive = this.readDirective(node);
            if (directive !== null) {
                directives.push(directive);
                continue;
            }
            if (ANNOTATIONS.has(node.type)) {
                annotations.push(this.readAnnotation(node));
                start ??= node;
                continue;
            }
            if (isModifierRun(node) && this.leadsToTypeDeclaration(kids, i)) {
                modifiers.push(...node.text.trim().split(/\s+/));
                start ??= node;
                continue;
            }

            const first = start ?? node;
            const next = kids[i + 1];
            let consumed = 0;
            let declaration: DeclarationNode;

            if (node.type === "class_definition") {
                declaration = this.readClass(node, annotations, modifiers, first);
            } else if (node.type === "enum_declaration") {
                declaration = this.readEnum(node, annotations, first);
            } else if (node.type === "function_signature") {
                const body = next?.type === "function_body" ? next : null;
                if (body !== null) consumed = 1;
                declaration = this.readFunction(node, body, annotations, first);
            } else if (node.type === "getter_signature" || node.type === "setter_signature") {
                if (next?.type === "function_body") consumed = 1;
                const keyword = node.type === "getter_signature" ? "getter" : "setter";
                const name = keyword === "getter" ? this.lastIdentifier(childrenOf(node)) : null;
                declaration = this.opaque(keyword, name, annotations, first, kids[i + consumed] ?? node);
            } else {
                const keyword = OPAQUE_KEYWORDS.get(node.type);
                if (keyword !== undefined) {
                    declaration = this.opaque(keyword, this.opaqueName(node), annotations, first, node);
                } else {
                    // A top-level variable is a run of nodes up to its `;`.
                    let end = i;
                    while (end + 1 < kids.length && kids[end].type !== ";") {
                        const following = kids[end + 1];
                        if (ANNOTATIONS.has(following.type) || DECLARATION_STARTS.has(following.type)) break;
                        end++;
                    }
                    consumed = end - i;
                    declaration = this.opaque("variable", this.variableName(kids.slice(i, end + 1)), annotations, first, kids[end]);
                }
            }

            declarations.push(declaration);
            i += consumed;
            annotations = [];
            modifiers = [];
            start = null;
        }

        return { kind: "unit", directives, declarations, source: this.source };
    }

    private leadsToTypeDeclaration(kids: readonly SyntaxNode[], index: number): boolean {
        for (let i = index + 1; i < kids.length; i++) {
            if (TYPE_DECLARATIONS.has(kids[i].type)) return true;
            if (!isModifierRun(kids[i])) return false;
        }
        return false;
    }

    // ── Directives ──────────────────────────────────────────────────

    private readDirective(node: SyntaxNode): DirectiveNode | null {
        let keyword: DirectiveNode["keyword"];
        switch (node.type) {
            case "library_name":
                keyword = "library";
                break;
            case "import_or_export":
                keyword = node.text.trimStart().startsWith("export") ? "export" : "import";
                break;
            case "part_directive":
                keyword = "part";
                break;
            case "part_of_directive":
                keyword = "part of";
                break;
            default:
                return null;
        }
        const literal = findFirst(node, (n) => n.type === "string_literal");
        return { kind: "directive", keyword, uri: literal ? unquote(literal.text) : null, span: spanOf(node) };
    }

    // ── Annotations ─────────────────────────────────────────────────

    private readAnnotation(node: SyntaxNode): AnnotationNode {
        const text = node.text;
        const open = text.indexOf("(");
        const head = open === -1 ? text : text.slice(0, open);
        const name = head.replace(/^@/, "").replace(/<[\s\S]*$/, "").replace(/\s+/g, "");

        let args: string[] | null = null;
        const list = this.argumentList(node);
        if (list !== null) {
            args = segments(childrenOf(list), PARENS).map((seg) => this.textOf(seg).trim());
        }
        return { kind: "annotation", name, args, span: spanOf(node) };
    }

    /** The `( ... )` node of an annotation, however deeply the grammar nests it. */
    private argumentList(node: SyntaxNode): SyntaxNode | null {
        const isList = (n: SyntaxNode) => n.text.startsWith("(") && n.text.endsWith(")");
        let list = node.children.find(isList) ?? null;
        while (list !== null && list.children[0]?.type !== "(") {
            list = list.children.find(isList) ?? null;
        }
        return list;
    }

    private annotationsIn(nodes: readonly SyntaxNode[]): AnnotationNode[] {
        return nodes.filter((n) => ANNOTATIONS.has(n.type)).map((n) => this.readAnnotation(n));
    }

    // ── Classes ─────────────────────────────────────────────────────

    private readClass(node: SyntaxNode, annotations: AnnotationNode[], modifiers: string[], first: SyntaxNode): DeclarationNode {
        const kids = childrenOf(node);
        const keywordAt = kids.findIndex((k) => k.type === "class");
        const head = keywordAt === -1 ? [] : kids.slice(0, keywordAt);
        annotations = [...annotations, ...this.annotationsIn(head)];
        modifiers = [...modifiers, ...head.filter((k) => !ANNOTATIONS.has(k.type)).flatMap((k) => k.text.trim().split(/\s+/))];

        const nameNode = node.childForFieldName("name") ?? kids.find((k, i) => i > keywordAt && k.type === "identifier");
        const name = nameNode?.text ?? "";
        const body = node.childForFieldName("body") ?? kids.find((k) => k.type === "class_body");
        if (body === undefined) {
            return this.opaque("class", name || null, annotations, first, node);
        }

        let superclass: TypeNode | null = null;
        let mixinsNode = kids.find((k) => k.type === "mixins");
        const superNode = kids.find((k) => k.type === "superclass");
        if (superNode !== undefined) {
            const parts = childrenOf(superNode);
            mixinsNode ??= parts.find((k) => k.type === "mixins");
            superclass = this.readType(parts.filter((k) => k.type !== "mixins"));
        }
        const interfacesNode = kids.find((k) => k.type === "interfaces");

        const classNode: ClassNode = {
            kind: "class",
            name,
            typeParameters: kids.find((k) => k.type === "type_parameters")?.text ?? null,
            modifiers,
            superclass,
            mixins: mixinsNode ? this.readTypes(childrenOf(mixinsNode)) : [],
            interfaces: interfacesNode ? this.readTypes(childrenOf(interfacesNode)) : [],
            members: this.readMembers(body, name),
            annotations,
            span: spanOf(first, node),
        };
        return classNode;
    }

    private readMembers(body: SyntaxNode, className: string): MemberNode[] {
        const kids = childrenOf(body).filter((k) => k.type !== "{" && k.type !== "}");
        const members: MemberNode[] = [];
        let annotations: AnnotationNode[] = [];
        let start: SyntaxNode | null = null;

        for (let i = 0; i < kids.length; i++) {
            const node = kids[i];
            if (ANNOTATIONS.has(node.type)) {
                annotations.push(this.readAnnotation(node));
                start ??= node;
                continue;
            }
            if (node.type === ";") continue;

            let bodyNode: SyntaxNode | null = null;
            if (node.type === "method_signature" && kids[i + 1]?.type === "function_body") {
                bodyNode = kids[i + 1];
                i++;
            }
            const member = this.readMember(node, bodyNode, className, annotations, start ?? node);
            if (member !== null) members.push(member);
            annotations = [];
            start = null;
        }
        return members;
    }

    private readMember(
        container: SyntaxNode,
        bodyNode: SyntaxNode | null,
        className: string,
        annotations: AnnotationNode[],
        first: SyntaxNode,
    ): MemberNode | null {
        if (!MEMBER_CONTAINERS.has(container.type) && !SIGNATURES.has(container.type)) {
            const inner = childrenOf(container);
            const nested = inner.find((k) => MEMBER_CONTAINERS.has(k.type));
            if (nested === undefined) return null;
            const nestedBody = bodyNode ?? inner.find((k) => k.type === "function_body") ?? null;
            return this.readMember(nested, nestedBody, className, annotations, first);
        }
        const kids = SIGNATURES.has(container.type) ? [container] : childrenOf(container);
        annotations = [...annotations, ...this.annotationsIn(kids)];
        const last = bodyNode ?? container;
        const signature = kids.find((k) => SIGNATURES.has(k.type));
        const modifiers = kids.filter((k) => MEMBER_MODIFIERS.has(k.text)).map((k) => k.text);

        if (signature === undefined) return this.readField(kids, modifiers, annotations, first, last);
        if (CONSTRUCTORS.has(signature.type)) {
            return this.readConstructor(signature, kids, bodyNode, className, annotations, first, last);
        }

        const parts = childrenOf(signature);
        const isStatic = modifiers.includes("static") || parts.some((k) => k.text === "static");
        const body = bodyNode ? this.readBody(bodyNode) : this.emptyBody(last);

        if (signature.type === "getter_signature" || signature.type === "setter_signature") {
            const keyword = signature.type === "getter_signature" ? "get" : "set";
            const keywordAt = parts.findIndex((k) => k.text === keyword);
            return this.method({
                name: this.lastIdentifier(parts.filter((k) => k.type !== "formal_parameter_list")) ?? "",
                returnType: this.readType(parts.slice(0, Math.max(keywordAt, 0))),
                typeParameters: null,
                parameters: this.readParameters(parts.find((k) => k.type === "formal_parameter_list")),
                body,
                isStatic,
                accessor: keyword,
                isOperator: false,
                annotations,
                span: spanOf(first, last),
            });
        }

        if (signature.type === "operator_signature") {
            const keywordAt = parts.findIndex((k) => k.text === "operator");
            const params = parts.find((k) => k.type === "formal_parameter_list");
            const symbolStart = parts[keywordAt]?.endIndex ?? signature.startIndex;
            const symbol = this.source.slice(symbolStart, params?.startIndex ?? symbolStart).replace(/\s+/g, "");
            return this.method({
                name: `operator${symbol}`,
                returnType: this.readType(parts.slice(0, Math.max(keywordAt, 0))),
                typeParameters: null,
                parameters: this.readParameters(params),
                body,
                isStatic,
                accessor: null,
                isOperator: true,
                annotations,
                span: spanOf(first, last),
            });
        }

        const sig = this.readSignature(signature);
        return this.method({ ...sig, body, isStatic, accessor: null, isOperator: false, annotations, span: spanOf(first, last) });
    }

    private method(node: Omit<MethodNode, "kind">): MethodNode {
        return { kind: "method", ...node };
    }

    private readField(
        kids: readonly SyntaxNode[],
        modifiers: string[],
        annotations: AnnotationNode[],
        first: SyntaxNode,
        last: SyntaxNode,
    ): FieldNode | null {
        const list = kids.find((k) => FIELD_LISTS.has(k.type));
        if (list === undefined) return null;

        const names: FieldNode["names"] = [];
        for (const [entry] of segments(childrenOf(list), new Set())) {
            if (entry.type === "identifier") {
                names.push({ name: entry.text, initializer: null });
                continue;
            }
            const parts = childrenOf(entry);
            const name = parts.find((k) => k.type === "identifier")?.text;
            if (name === undefined) continue;
            const assign = parts.findIndex((k) => k.type === "=");
            const value = assign === -1 ? [] : parts.slice(assign + 1);
            names.push({ name, initializer: value.length > 0 ? this.textOf(value).trim() : null });
        }

        const typeNodes = kids.filter(
            (k) => k !== list && k.type !== ";" && !ANNOTATIONS.has(k.type) && !MEMBER_MODIFIERS.has(k.text),
        );
        return {
            kind: "field",
            type: this.readType(typeNodes),
            names,
            modifiers,
            annotations,
            span: spanOf(first, last),
        };
    }

    private readConstructor(
        signature: SyntaxNode,
        kids: readonly SyntaxNode[],
        bodyNode: SyntaxNode | null,
        className: string,
        annotations: AnnotationNode[],
        first: SyntaxNode,
        last: SyntaxNode,
    ): ConstructorNode {
        const parts = childrenOf(signature);
        const paramsAt = parts.findIndex((k) => k.type === "formal_parameter_list");
        const head = paramsAt === -1 ? parts : parts.slice(0, paramsAt);
        const names = head.filter((k) => k.type === "identifier").map((k) => k.text);
        const ctorName = names[0] === className ? (names[1] ?? null) : (names[0] ?? null);

        let redirect: TypeNode | null = null;
        const assign = parts.findIndex((k) => k.type === "=");
        if (signature.type === "redirecting_factory_constructor_signature" && assign !== -1) {
            const target = parts.slice(assign + 1).filter((k) => k.type !== ";");
            // `= _Impl.named` redirects to a named constructor of `_Impl`.
            const dot = target.findIndex((k) => k.type === ".");
            redirect = this.readType(dot === -1 ? target : target.slice(0, dot));
        }

        const initializerNode = [...kids, ...parts].find((k) => k.type === "initializers" || k.type === "redirection");
        const isConst = [...kids, ...parts].some((k) => k.text === "const");

        return {
            kind: "constructor",
            className,
            name: ctorName,
            isFactory: signature.type.includes("factory"),
            isConst,
            parameters: this.readParameters(parts[paramsAt]),
            redirect,
            initializers: initializerNode ? initializerNode.text.replace(/^:/, "").trim() : null,
            body: bodyNode ? this.readBody(bodyNode) : null,
            annotations,
            span: spanOf(first, last),
        };
    }

    // ── Enums and opaque declarations ───────────────────────────────

    private readEnum(node: SyntaxNode, annotations: AnnotationNode[], first: SyntaxNode): EnumNode {
        const kids = childrenOf(node);
        const name = node.childForFieldName("name")?.text ?? kids.find((k) => k.type === "identifier")?.text ?? "";
        const body = node.childForFieldName("body") ?? kids.find((k) => k.type === "enum_body");
        const values: string[] = [];
        for (const constant of body ? childrenOf(body) : []) {
            if (constant.type !== "enum_constant") continue;
            const valueName =
                constant.childForFieldName("name")?.text ??
                childrenOf(constant).find((k) => k.type === "identifier")?.text;
            if (valueName !== undefined) values.push(valueName);
        }
        return { kind: "enum", name, values, annotations, span: spanOf(first, node) };
    }

    private opaqueName(node: SyntaxNode): string | null {
        const named = node.childForFieldName("name");
        if (named !== null) return named.text;
        const kids = childrenOf(node);
        const onAt = kids.findIndex((k) => k.text === "on");
        const head = onAt === -1 ? kids : kids.slice(0, onAt);
        return head.find((k) => k.type === "identifier" || k.type === "type_identifier")?.text ?? null;
    }

    private variableName(nodes: readonly SyntaxNode[]): string | null {
        for (const node of nodes) {
            const found = findFirst(node, (n) => n.type === "identifier");
            if (found !== null) return found.text;
        }
        return null;
    }

    private opaque(
        keyword: string,
        name: string | null,
        annotations: AnnotationNode[],
        first: SyntaxNode,
        last: SyntaxNode,
    ): OpaqueNode {
        return { kind: "opaque", keyword, name, annotations, span: spanOf(first, last) };
    }

    // ── Functions ───────────────────────────────────────────────────

    private readFunction(
        signature: SyntaxNode,
        bodyNode: SyntaxNode | null,
        annotations: AnnotationNode[],
        first: SyntaxNode,
    ): FunctionNode {
        const last = bodyNode ?? signature;
        return {
            kind: "function",
            ...this.readSignature(signature),
            body: bodyNode ? this.readBody(bodyNode) : this.emptyBody(last),
            annotations,
            span: spanOf(first, last),
        };
    }

    private readSignature(signature: SyntaxNode): Pick<FunctionNode, "name" | "returnType" | "typeParameters" | "parameters"> {
        const parts = childrenOf(signature);
        const paramsAt = parts.findIndex((k) => k.type === "formal_parameter_list");
        const head = (paramsAt === -1 ? parts : parts.slice(0, paramsAt)).filter((k) => k.type !== "type_parameters");
        let nameAt = -1;
        head.forEach((k, i) => {
            if (k.type === "identifier") nameAt = i;
        });
        const returnNodes = head.slice(0, Math.max(nameAt, 0)).filter((k) => !MEMBER_MODIFIERS.has(k.text));
        return {
            name: head[nameAt]?.text ?? "",
            returnType: this.readType(returnNodes),
            typeParameters: parts.find((k) => k.type === "type_parameters")?.text ?? null,
            parameters: this.readParameters(parts[paramsAt]),
        };
    }

    private readBody(node: SyntaxNode): BodyNode {
        let rest = node.text;
        let modifier: string | null = null;
        const marker = /^(async\s*\*|sync\s*\*|async)\s*/.exec(rest);
        if (marker?.[1] !== undefined) {
            modifier = marker[1].replace(/\s+/g, "");
            rest = rest.slice(marker[0].length);
        }
        if (rest.startsWith("=>")) {
            return { kind: "arrow", modifier, text: rest.slice(2).replace(/;\s*$/, "").trim(), span: spanOf(node) };
        }
        if (rest.startsWith("{")) return { kind: "block", modifier, text: rest, span: spanOf(node) };
        return { kind: "empty", modifier, text: "", span: spanOf(node) };
    }

    private emptyBody(after: SyntaxNode): BodyNode {
        const span = spanOf(after);
        return { kind: "empty", modifier: null, text: "", span: { ...span, start: span.end } };
    }

    // ── Parameters ──────────────────────────────────────────────────

    private readParameters(list: SyntaxNode | undefined): ParameterNode[] {
        if (list === undefined) return [];
        const params: ParameterNode[] = [];
        for (const seg of segments(childrenOf(list), PARENS)) {
            const [only] = seg;
            if (seg.length === 1 && only.type === "optional_formal_parameters") {
                const section: ParameterSection = childrenOf(only).some((k) => k.type === "{") ? "named" : "optional";
                for (const inner of segments(childrenOf(only), OPTIONAL_BRACKETS)) {
                    const param = this.readParameter(inner, section);
                    if (param !== null) params.push(param);
                }
                continue;
            }
            const param = this.readParameter(seg, "positional");
            if (param !== null) params.push(param);
        }
        return params;
    }

    private flatten(nodes: readonly SyntaxNode[]): SyntaxNode[] {
        return nodes.flatMap((n) => (PARAMETER_WRAPPERS.has(n.type) ? this.flatten(childrenOf(n)) : [n]));
    }

    private readParameter(seg: readonly SyntaxNode[], section: ParameterSection): ParameterNode | null {
        const items = this.flatten(seg);
        const annotations: AnnotationNode[] = [];
        const typeNodes: SyntaxNode[] = [];
        let required = false;
        let isField = false;
        let isSuper = false;
        let nameNode: SyntaxNode | null = null;
        let signature: SyntaxNode | null = null;
        let signatureNullable = false;
        let defaultValue: string | null = null;

        for (let i = 0; i < items.length; i++) {
            const item = items[i];
            const more = i < items.length - 1;
            if (ANNOTATIONS.has(item.type)) {
                annotations.push(this.readAnnotation(item));
            } else if (item.type === "=" || item.type === ":") {
                const value = items.slice(i + 1);
                defaultValue = value.length > 0 ? this.textOf(value).trim() : null;
                break;
            } else if (item.childCount > 0 && (item.children[0]?.type === "=" || item.children[0]?.type === ":")) {
                defaultValue = this.textOf(item.children.slice(1)).trim() || null;
                break;
            } else if (nameNode === null && more && item.text === "required") {
                required = true;
            } else if (nameNode === null && more && PARAM_MODIFIERS.has(item.text)) {
                continue;
            } else if (item.type === "constructor_param" || item.type === "super_formal_parameter") {
                isField = item.type === "constructor_param";
                isSuper = !isField;
                const parts = childrenOf(item);
                nameNode = parts.filter((k) => k.type === "identifier").pop() ?? null;
                signature = parts.find((k) => k.type === "formal_parameter_list") ?? null;
            } else if (item.type === "formal_parameter_list" && nameNode !== null) {
                signature = item;
            } else if (signature !== null && (item.type === "nullable_type" || item.type === "?")) {
                signatureNullable = true;
            } else if (item.type === "identifier") {
                if (nameNode !== null) typeNodes.push(nameNode);
                nameNode = item;
            } else if (signature === null) {
                // Only the last identifier before `=` is the name; anything earlier belongs to the type.
                if (nameNode !== null) typeNodes.push(nameNode);
                nameNode = null;
                typeNodes.push(item);
            }
        }
        if (nameNode === null) return null;

        let type = this.readType(typeNodes);
        if (signature !== null) {
            const returnText = typeNodes.length > 0 ? `${normalizeSpace(this.textOf(typeNodes))} ` : "";
            const firstNode = typeNodes[0] ?? nameNode;
            type = {
                kind: "function-type",
                text: `${returnText}Function${normalizeSpace(signature.text)}${signatureNullable ? "?" : ""}`,
                nullable: signatureNullable,
                span: spanOf(firstNode, signature),
            };
        }

        const [firstItem] = items;
        return {
            kind: "parameter",
            name: nameNode.text,
            type,
            section,
            required: section === "positional" || required,
            isField,
            isSuper,
            defaultValue,
            annotations,
            span: spanOf(firstItem ?? nameNode, items[items.length - 1] ?? nameNode),
        };
    }

    // ── Types ───────────────────────────────────────────────────────

    private readTypes(nodes: readonly SyntaxNode[]): TypeNode[] {
        const types: TypeNode[] = [];
        for (const seg of segments(nodes, ANGLES)) {
            const type = this.readType(seg);
            if (type !== null) types.push(type);
        }
        return types;
    }

    /** Rebuilds one type from the run of sibling nodes that spell it. */
    private readType(nodes: readonly SyntaxNode[]): TypeNode | null {
        const parts = nodes.filter((n) => !TYPE_KEYWORDS.has(n.type) && !COMMENTS.has(n.type) && n.type !== ";");
        const first = parts[0];
        const last = parts[parts.length - 1];
        if (first === undefined || last === undefined) return null;

        // Some grammar revisions wrap the whole type in `nullable_type`.
        if (parts.length === 1 && first.type === "nullable_type" && first.namedChildren.length > 0) {
            const inner = this.readType(childrenOf(first).filter((k) => k.type !== "?"));
            return inner === null ? null : { ...inner, nullable: true };
        }

        const span = spanOf(first, last);
        const text = normalizeSpace(this.textOf(parts));
        const nullable = parts.some((p) => p.type === "nullable_type" || p.type === "?");

        if (parts.some((p) => p.type === "function_type" || p.text === "Function")) {
            return { kind: "function-type", text, nullable, span };
        }
        if (first.type === "record_type" || first.type === "(") {
            return { kind: "record-type", text, nullable, span };
        }

        let name = "";
        let args: TypeNode[] = [];
        for (const part of parts) {
            if (part.type === "type_arguments") args = this.readTypes(childrenOf(part));
            else if (part.type !== "nullable_type" && part.type !== "?") name += part.text.replace(/\s+/g, "");
        }
        if (name.length === 0) name = text.replace(/\?$/, "");
        return { kind: "named-type", name, args, nullable, span };
    }

    // ── Text ────────────────────────────────────────────────────────

    private lastIdentifier(nodes: readonly SyntaxNode[]): string | null {
        return nodes.filter((k) => k.type === "identifier").pop()?.text ?? null;
    }

    private textOf(nodes: readonly SyntaxNode[]): string {
        const first = nodes[0];
        const last = nodes[nodes.length - 1];
        if (first === undefined || last === undefined) return "";
        return this.source.slice(first.startIndex, last.endIndex);
    }

    private errorAt(node: SyntaxNode): ParseError {
        let reason: string;
        if (node.type === "ERROR") {
            const snippet = (node.text.split("\n")[0] ?? "").trim().slice(0, 24);
            reason = snippet.length > 0 ? `unexpected "${snippet}"` : "unexpected input";
        } else {
            reason = `missing "${node.type}"`;
        }
        return new ParseError(reason, locate(node), { file: this.file });
    }
}

/**
 * Parses one Dart source file with the tree-sitter Dart grammar into its
 * declaration-level syntax tree. Throws ParseError on the first syntax error.
 */
export function parseDart(source: string, file?: string): CompilationUnit {
    const tree = dartParser().parse(source);
    try {
        return new TreeReader(source, file).readUnit(tree.rootNode);
    } finally {
        tree.delete();
    }
}
