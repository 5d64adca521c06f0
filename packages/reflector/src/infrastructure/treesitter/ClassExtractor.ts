/**
 * Extract class-like declarations from a tree-sitter-php parse tree.
 *
 * Node types are looked up by name among children rather than by field so the
 * extractor tolerates small grammar revisions.
 */

import type Parser from "tree-sitter";

import {
  NAMESPACE_SEPARATOR,
  type ClassDeclaration,
  type ClassKind,
  type ConstantDeclaration,
  type MethodDeclaration,
  type NamespaceContext,
  type ParameterDeclaration,
  type PropertyDeclaration,
  type Visibility,
} from "../../core/model.js";
import { resolveName } from "../../core/namespace/NamespaceResolver.js";

type SyntaxNode = Parser.SyntaxNode;

const CLASS_NODES: Record<string, ClassKind> = {
  class_declaration: "class",
  interface_declaration: "interface",
  trait_declaration: "trait",
  enum_declaration: "enum",
};

const TYPE_NODES = new Set([
  "named_type",
  "optional_type",
  "union_type",
  "intersection_type",
  "primitive_type",
  "disjunctive_normal_form_type",
  "type_list",
  "bottom_type",
]);

const PARAMETER_NODES = new Set(["simple_parameter", "variadic_parameter", "property_promotion_parameter"]);

/** Type names never resolved against the namespace. */
const BUILTIN_TYPES = new Set([
  "array",
  "bool",
  "callable",
  "false",
  "float",
  "int",
  "iterable",
  "mixed",
  "never",
  "null",
  "object",
  "parent",
  "self",
  "static",
  "string",
  "true",
  "void",
]);

const TYPE_NAME = /\\?[A-Za-z_\x80-\uffff][\w\x80-\uffff]*(?:\\[A-Za-z_\x80-\uffff][\w\x80-\uffff]*)*/g;

export interface ExtractionContext {
  file: string;
  /** Alias map of the whole file; the namespace is tracked per declaration */
  aliases: ReadonlyMap<string, string>;
}

/**
 * Every class, interface, trait and enum in the tree, in source order.
 * Anonymous classes are not declarations and are skipped.
 */
export function extractClasses(root: SyntaxNode, context: ExtractionContext): ClassDeclaration[] {
  const classes: ClassDeclaration[] = [];
  walk(root, "", context, classes);
  return classes;
}

/**
 * @returns The namespace in effect after `node`, for statement-form
 * `namespace Foo;` declarations that apply to the following siblings
 */
function walk(node: SyntaxNode, namespace: string, context: ExtractionContext, out: ClassDeclaration[]): string {
  const kind = CLASS_NODES[node.type];
  if (kind) {
    out.push(extractClass(node, kind, { namespace, aliases: context.aliases }, context.file));
    return namespace;
  }

  if (node.type === "namespace_definition") {
    const name = node.children.find((c) => c.type === "namespace_name")?.text ?? "";
    const body = node.children.find((c) => c.type === "compound_statement");
    if (body) {
      walkChildren(body, name, context, out);
      return namespace;
    }
    return name;
  }

  // Declarations never nest inside functions or class bodies
  if (node.type === "function_definition" || node.type === "anonymous_class") {
    return namespace;
  }

  walkChildren(node, namespace, context, out);
  return namespace;
}

function walkChildren(node: SyntaxNode, namespace: string, context: ExtractionContext, out: ClassDeclaration[]): void {
  let current = namespace;
  for (const child of node.children) {
    current = walk(child, current, context, out);
  }
}

function extractClass(node: SyntaxNode, kind: ClassKind, ns: NamespaceContext, file: string): ClassDeclaration {
  const shortName = node.children.find((c) => c.type === "name")?.text ?? "";
  const name = ns.namespace ? `${ns.namespace}${NAMESPACE_SEPARATOR}${shortName}` : shortName;
  const modifiers = readModifiers(node);

  const baseNames = namesIn(node.children.find((c) => c.type === "base_clause"), ns);
  const implemented = namesIn(node.children.find((c) => c.type === "class_interface_clause"), ns);

  const declaration: ClassDeclaration = {
    file,
    name,
    shortName,
    namespace: ns.namespace,
    kind,
    // Interfaces extend interfaces: the base clause lists them
    parent: kind === "class" ? (baseNames[0] ?? null) : null,
    interfaces: kind === "interface" ? baseNames : implemented,
    traits: [],
    isAbstract: modifiers.has("abstract"),
    isFinal: modifiers.has("final"),
    docComment: docCommentOf(node),
    startLine: node.startPosition.row + 1,
    endLine: node.endPosition.row + 1,
    methods: [],
    properties: [],
    constants: [],
  };

  const body = node.children.find((c) => c.type === "declaration_list" || c.type === "enum_declaration_list");
  if (body) readMembers(body, declaration, ns);

  return declaration;
}

function readMembers(body: SyntaxNode, declaration: ClassDeclaration, ns: NamespaceContext): void {
  for (const member of body.children) {
    switch (member.type) {
      case "use_declaration":
        declaration.traits.push(...namesIn(member, ns));
        break;
      case "method_declaration": {
        const method = readMethod(member, declaration, ns);
        declaration.methods.push(method);
        if (method.name.toLowerCase() === "__construct") {
          declaration.properties.push(...promotedProperties(member, declaration.name, ns));
        }
        break;
      }
      case "property_declaration":
        declaration.properties.push(...readProperties(member, declaration.name, ns));
        break;
      case "const_declaration":
        declaration.constants.push(...readConstants(member, declaration.name));
        break;
    }
  }
}

function readMethod(node: SyntaxNode, owner: ClassDeclaration, ns: NamespaceContext): MethodDeclaration {
  const modifiers = readModifiers(node);
  const parameters = node.children.find((c) => c.type === "formal_parameters");
  const returnType = node.childForFieldName("return_type") ?? typeAfterColon(node);

  return {
    name: node.children.find((c) => c.type === "name")?.text ?? "",
    parameters: parameters ? parameters.children.filter((c) => PARAMETER_NODES.has(c.type)).map((p) => readParameter(p, ns)) : [],
    returnType: returnType ? resolveTypeText(returnType.text, ns) : null,
    visibility: visibilityOf(modifiers),
    isStatic: modifiers.has("static"),
    // Interface methods are implicitly abstract
    isAbstract: modifiers.has("abstract") || owner.kind === "interface",
    isFinal: modifiers.has("final"),
    docComment: docCommentOf(node),
    declaringClass: owner.name,
    startLine: node.startPosition.row + 1,
    endLine: node.endPosition.row + 1,
  };
}

function readParameter(node: SyntaxNode, ns: NamespaceContext): ParameterDeclaration {
  const type = node.childForFieldName("type") ?? node.children.find((c) => TYPE_NODES.has(c.type));
  const variable = findDescendant(node, "variable_name");

  return {
    name: variable ? variable.text.replace(/^\$/, "") : "",
    type: type ? resolveTypeText(type.text, ns) : null,
    defaultValue: valueAfterEquals(node),
    variadic: node.type === "variadic_parameter" || node.children.some((c) => c.type === "..."),
    byRef: node.children.some((c) => c.type === "reference_modifier" || c.type === "&" || c.type === "by_ref"),
    promoted: node.type === "property_promotion_parameter",
  };
}

function promotedProperties(method: SyntaxNode, owner: string, ns: NamespaceContext): PropertyDeclaration[] {
  const parameters = method.children.find((c) => c.type === "formal_parameters");
  if (!parameters) return [];

  return parameters.children
    .filter((p) => p.type === "property_promotion_parameter")
    .map((p) => {
      const modifiers = readModifiers(p);
      const parameter = readParameter(p, ns);
      return {
        name: parameter.name,
        type: parameter.type,
        defaultValue: parameter.defaultValue,
        visibility: visibilityOf(modifiers),
        isStatic: false,
        isReadonly: modifiers.has("readonly"),
        docComment: docCommentOf(p),
        declaringClass: owner,
        startLine: p.startPosition.row + 1,
        endLine: p.endPosition.row + 1,
      };
    });
}

function readProperties(node: SyntaxNode, owner: string, ns: NamespaceContext): PropertyDeclaration[] {
  const modifiers = readModifiers(node);
  const type = node.childForFieldName("type") ?? node.children.find((c) => TYPE_NODES.has(c.type));
  const docComment = docCommentOf(node);

  return node.children
    .filter((c) => c.type === "property_element")
    .map((element) => {
      const variable = findDescendant(element, "variable_name");
      return {
        name: variable ? variable.text.replace(/^\$/, "") : "",
        type: type ? resolveTypeText(type.text, ns) : null,
        defaultValue: valueAfterEquals(element) ?? valueAfterEquals(element.children.find((c) => c.type === "property_initializer")),
        visibility: visibilityOf(modifiers),
        isStatic: modifiers.has("static"),
        isReadonly: modifiers.has("readonly"),
        docComment,
        declaringClass: owner,
        startLine: node.startPosition.row + 1,
        endLine: node.endPosition.row + 1,
      };
    });
}

function readConstants(node: SyntaxNode, owner: string): ConstantDeclaration[] {
  const visibility = visibilityOf(readModifiers(node));
  const docComment = docCommentOf(node);

  return node.children
    .filter((c) => c.type === "const_element")
    .map((element) => ({
      name: element.children.find((c) => c.type === "name")?.text ?? "",
      value: valueAfterEquals(element) ?? "",
      visibility,
      docComment,
      declaringClass: owner,
      startLine: node.startPosition.row + 1,
      endLine: node.endPosition.row + 1,
    }));
}

/**
 * Lowercased modifier keywords on a declaration: `public`, `static`, `abstract`…
 */
function readModifiers(node: SyntaxNode): Set<string> {
  const modifiers = new Set<string>();
  for (const child of node.children) {
    if (child.type.endsWith("_modifier")) {
      modifiers.add(child.text.toLowerCase());
    }
  }
  return modifiers;
}

function visibilityOf(modifiers: ReadonlySet<string>): Visibility {
  if (modifiers.has("private")) return "private";
  if (modifiers.has("protected")) return "protected";
  return "public";
}

/**
 * Fully-qualified names listed in a clause: `extends A, B`, `implements C`, `use T1, T2`.
 */
function namesIn(node: SyntaxNode | undefined, ns: NamespaceContext): string[] {
  if (!node) return [];
  return node.children
    .filter((c) => c.type === "name" || c.type === "qualified_name")
    .map((c) => resolveName(c.text, ns));
}

/**
 * Resolve every class name inside a type declaration, keeping builtins and
 * punctuation as written: `?User|null` → `?App\Models\User|null`.
 */
export function resolveTypeText(text: string, ns: NamespaceContext): string {
  return text.replace(TYPE_NAME, (name) => (BUILTIN_TYPES.has(name.toLowerCase()) ? name : resolveName(name, ns)));
}

/**
 * The docblock comment directly before a declaration, if any.
 */
function docCommentOf(node: SyntaxNode): string | null {
  const previous = node.previousSibling;
  if (previous && previous.type === "comment" && previous.text.startsWith("/**")) {
    return previous.text;
  }
  return null;
}

function typeAfterColon(node: SyntaxNode): SyntaxNode | undefined {
  const colon = node.children.findIndex((c) => c.type === ":");
  if (colon < 0) return undefined;
  return node.children.slice(colon + 1).find((c) => TYPE_NODES.has(c.type));
}

/**
 * Source text after the `=` among a node's children.
 */
function valueAfterEquals(node: SyntaxNode | undefined): string | null {
  if (!node) return null;
  const children = node.children;
  const equals = children.findIndex((c) => c.type === "=");
  if (equals < 0) return null;
  const value = children.slice(equals + 1).find((c) => c.type !== "comment");
  return value ? value.text : null;
}

function findDescendant(node: SyntaxNode, type: string): SyntaxNode | undefined {
  for (const child of node.children) {
    if (child.type === type) return child;
    const nested = findDescendant(child, type);
    if (nested) return nested;
  }
  return undefined;
}
