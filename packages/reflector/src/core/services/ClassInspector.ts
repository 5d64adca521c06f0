/**
 * Renders a class's API surface: docblocks, parent, members and the
 * interfaces and traits it carries.
 */

import path from "node:path";
import { Err, Ok, type Result } from "@phpscope/core";

import { InvalidParameterError, type NotFoundError } from "../errors.js";
import type { ConstantDeclaration, MethodDeclaration, ParameterDeclaration, PropertyDeclaration, Visibility } from "../model.js";
import type { ClassDescriptor, ClassReference } from "./ClassDescriptor.js";
import type { ClassRepository, ClassSource } from "./ClassRepository.js";
import { IGNORED_TAGS, parseDocBlock, renderTag } from "./DocBlockParser.js";

export type DocblockView = { summary?: string; description?: string; tags?: string[] } | string;

export interface ParentView {
  file: string | null;
  name: string;
  namespace: string;
  startLine?: number;
  endLine?: number;
  docblock?: DocblockView;
}

export interface ConstantView {
  constantName: string;
  value: string;
  startLine: number;
  endLine: number;
  docblock?: DocblockView;
}

interface MemberFlags {
  isStatic?: true;
  isPublic?: true;
  isProtected?: true;
  isPrivate?: true;
  /** Set when the member comes from an ancestor */
  declaringClass?: string;
  docblock?: DocblockView;
}

export interface PropertyView extends MemberFlags {
  propertyName: string;
  type: string | null;
  defaultValue: string | null;
  isReadonly?: true;
  startLine: number;
  endLine: number;
}

export interface MethodView extends MemberFlags {
  methodName: string;
  /** Parameter signatures: `?User $owner = null` */
  parameters: string[];
  returnType: string | null;
  isAbstract?: true;
  isFinal?: true;
  startLine: number;
  endLine: number;
}

export interface ClassInformation {
  /** Project-relative path, `/`-separated; null for classes that could not be located */
  file: string | null;
  name: string;
  startLine?: number;
  endLine?: number;
  docblock?: DocblockView;
  parent?: ParentView;
  isAbstract?: true;
  isFinal?: true;
  isInterface?: true;
  isTrait?: true;
  isEnum?: true;
  constants?: Record<string, ConstantView>;
  properties?: PropertyView[];
  methods?: MethodView[];
  interfaces?: ClassInformation[];
  traits?: ClassInformation[];
}

export interface InspectOptions {
  constants?: boolean;
  properties?: boolean;
  methods?: boolean;
  includeInherited?: boolean;
  /** Docblocks reduced to their summary */
  summary?: boolean;
  /** Overrides `summary` */
  fullDocblocks?: boolean;
  /** Docblocks as written in the source */
  rawDocblock?: boolean;
  /** Comma list of public, protected, private or all */
  visibility?: string;
  methodsOffset?: number;
  methodsLimit?: number;
  propertiesOffset?: number;
  propertiesLimit?: number;
  constantsOffset?: number;
  constantsLimit?: number;
  staticOnly?: boolean;
  /** Methods only, at most five, no inherited members */
  summaryMode?: boolean;
}

interface Page {
  offset: number;
  limit: number;
}

interface RenderSettings {
  constants: boolean;
  properties: boolean;
  methods: boolean;
  includeInherited: boolean;
  summary: boolean;
  rawDocblock: boolean;
  visibility: ReadonlySet<string>;
  staticOnly: boolean;
  pages: { constants: Page; properties: Page; methods: Page };
}

export interface ClassInspectorOptions {
  projectRoot: string;
  repository: ClassRepository;
}

export class ClassInspector {
  constructor(private readonly options: ClassInspectorOptions) {}

  async inspect(
    source: ClassSource,
    options: InspectOptions = {}
  ): Promise<Result<ClassInformation, NotFoundError | InvalidParameterError>> {
    const settings = toSettings(options);
    if (!settings.ok) return settings;

    const descriptor = await this.options.repository.resolve(source);
    if (!descriptor.ok) return descriptor;

    return Ok(this.render(descriptor.value, settings.value, true));
  }

  /**
   * Listing entry: location, full docblock, parent, interfaces and traits,
   * without members.
   */
  summarize(descriptor: ClassDescriptor, options: { rawDocblock?: boolean } = {}): ClassInformation {
    const none: Page = { offset: 0, limit: 0 };
    return this.render(
      descriptor,
      {
        constants: false,
        properties: false,
        methods: false,
        includeInherited: false,
        summary: false,
        rawDocblock: options.rawDocblock ?? false,
        visibility: new Set(["public"]),
        staticOnly: false,
        pages: { constants: none, properties: none, methods: none },
      },
      true
    );
  }

  private render(descriptor: ClassDescriptor, settings: RenderSettings, details: boolean): ClassInformation {
    const declaration = descriptor.declaration;
    const info: ClassInformation = {
      file: this.relativePath(declaration.file),
      name: declaration.name,
    };

    if (details) {
      info.startLine = declaration.startLine;
      info.endLine = declaration.endLine;
    }

    const docblock = docblockView(declaration.docComment, settings);
    if (docblock) info.docblock = docblock;

    if (descriptor.parent) {
      info.parent = this.parentView(descriptor.parent, settings, details);
    }

    if (declaration.isAbstract) info.isAbstract = true;
    if (declaration.isFinal) info.isFinal = true;
    if (declaration.kind === "interface") info.isInterface = true;
    if (declaration.kind === "trait") info.isTrait = true;
    if (declaration.kind === "enum") info.isEnum = true;

    if (details) {
      if (settings.constants) {
        const constants = paginate(descriptor.constants(settings.includeInherited), settings.pages.constants);
        info.constants = Object.fromEntries(constants.map((c) => [c.name, constantView(c, settings)]));
      }
      if (settings.properties && declaration.kind !== "interface") {
        const properties = descriptor
          .properties(settings.includeInherited)
          .filter((p) => settings.visibility.has(p.visibility));
        info.properties = paginate(properties, settings.pages.properties).map((p) =>
          propertyView(p, descriptor.name, settings)
        );
      }
      if (settings.methods) {
        const methods = descriptor
          .methods(settings.includeInherited)
          .filter((m) => settings.visibility.has(m.visibility))
          .filter((m) => !settings.staticOnly || m.isStatic);
        info.methods = paginate(methods, settings.pages.methods).map((m) => methodView(m, descriptor.name, settings));
      }
    }

    if (declaration.kind !== "trait") {
      const interfaces = descriptor.interfaceReferences().map((ref) => this.nested(ref, settings));
      if (interfaces.length > 0) info.interfaces = interfaces;
    }

    const traits = descriptor.traitRefs.map((ref) => this.nested(ref, settings));
    if (traits.length > 0) info.traits = traits;

    return info;
  }

  private nested(ref: ClassReference, settings: RenderSettings): ClassInformation {
    return ref.descriptor ? this.render(ref.descriptor, settings, false) : { file: null, name: ref.name };
  }

  private parentView(ref: ClassReference, settings: RenderSettings, details: boolean): ParentView {
    const parent = ref.descriptor?.declaration;
    if (!parent) {
      return { file: null, name: ref.name, namespace: namespaceOf(ref.name) };
    }

    const view: ParentView = {
      file: this.relativePath(parent.file),
      name: parent.name,
      namespace: parent.namespace,
    };
    if (details) {
      view.startLine = parent.startLine;
      view.endLine = parent.endLine;
    }
    const docblock = docblockView(parent.docComment, settings);
    if (docblock) view.docblock = docblock;
    return view;
  }

  private relativePath(file: string): string {
    const relative = path.relative(this.options.projectRoot, file);
    if (relative.startsWith("..") || path.isAbsolute(relative)) return file;
    return relative.split(path.sep).join("/");
  }
}

function toSettings(options: InspectOptions): Result<RenderSettings, InvalidParameterError> {
  const pages = {
    constants: { offset: options.constantsOffset ?? 0, limit: options.constantsLimit ?? 0 },
    properties: { offset: options.propertiesOffset ?? 0, limit: options.propertiesLimit ?? 0 },
    methods: { offset: options.methodsOffset ?? 0, limit: options.methodsLimit ?? 0 },
  };
  for (const [section, page] of Object.entries(pages)) {
    if (!isCount(page.offset) || !isCount(page.limit)) {
      return Err(new InvalidParameterError(`${section} offset and limit must be non-negative integers`));
    }
  }

  const levels = new Set(
    (options.visibility ?? "public")
      .toLowerCase()
      .split(",")
      .map((level) => level.trim())
  );
  const visibility = new Set<Visibility>();
  if (levels.has("all") || levels.has("private")) {
    visibility.add("public").add("protected").add("private");
  } else {
    if (levels.has("public")) visibility.add("public");
    if (levels.has("protected")) visibility.add("protected");
  }

  const settings: RenderSettings = {
    constants: options.constants ?? true,
    properties: options.properties ?? true,
    methods: options.methods ?? true,
    includeInherited: options.includeInherited ?? false,
    summary: options.fullDocblocks ? false : (options.summary ?? true),
    rawDocblock: options.rawDocblock ?? false,
    visibility,
    staticOnly: options.staticOnly ?? false,
    pages,
  };

  if (options.summaryMode) {
    settings.constants = false;
    settings.properties = false;
    settings.includeInherited = false;
    settings.pages.methods = { offset: settings.pages.methods.offset, limit: 5 };
  }

  return Ok(settings);
}

function isCount(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

function paginate<T>(items: T[], page: Page): T[] {
  if (page.offset === 0 && page.limit === 0) return items;
  return page.limit > 0 ? items.slice(page.offset, page.offset + page.limit) : items.slice(page.offset);
}

/**
 * Parsed docblock per the settings; undefined when there is nothing to show.
 */
export function docblockView(
  raw: string | null,
  settings: Pick<RenderSettings, "summary" | "rawDocblock">
): DocblockView | undefined {
  if (!raw) return undefined;
  if (settings.rawDocblock) return raw;

  const parsed = parseDocBlock(raw);
  const view: { summary?: string; description?: string; tags?: string[] } = {};
  if (parsed.summary) view.summary = parsed.summary;

  if (!settings.summary) {
    if (parsed.description) view.description = parsed.description;
    const tags = parsed.tags.filter((tag) => !IGNORED_TAGS.has(tag.name)).map(renderTag);
    if (tags.length > 0) view.tags = tags;
  }

  return Object.keys(view).length > 0 ? view : undefined;
}

function constantView(constant: ConstantDeclaration, settings: RenderSettings): ConstantView {
  const view: ConstantView = {
    constantName: constant.name,
    value: constant.value,
    startLine: constant.startLine,
    endLine: constant.endLine,
  };
  const docblock = docblockView(constant.docComment, settings);
  if (docblock) view.docblock = docblock;
  return view;
}

function memberFlags(
  member: { visibility: Visibility; isStatic: boolean; declaringClass: string; docComment: string | null },
  owner: string,
  settings: RenderSettings
): MemberFlags {
  const flags: MemberFlags = {};
  if (member.isStatic) flags.isStatic = true;
  if (member.visibility === "public") flags.isPublic = true;
  if (member.visibility === "protected") flags.isProtected = true;
  if (member.visibility === "private") flags.isPrivate = true;
  if (member.declaringClass !== owner) flags.declaringClass = member.declaringClass;
  const docblock = docblockView(member.docComment, settings);
  if (docblock) flags.docblock = docblock;
  return flags;
}

function propertyView(property: PropertyDeclaration, owner: string, settings: RenderSettings): PropertyView {
  const view: PropertyView = {
    propertyName: property.name,
    type: property.type,
    defaultValue: property.defaultValue,
    startLine: property.startLine,
    endLine: property.endLine,
    ...memberFlags(property, owner, settings),
  };
  if (property.isReadonly) view.isReadonly = true;
  return view;
}

function methodView(method: MethodDeclaration, owner: string, settings: RenderSettings): MethodView {
  const view: MethodView = {
    methodName: method.name,
    parameters: method.parameters.map(parameterSignature),
    returnType: method.returnType,
    startLine: method.startLine,
    endLine: method.endLine,
    ...memberFlags(method, owner, settings),
  };
  if (method.isAbstract) view.isAbstract = true;
  if (method.isFinal) view.isFinal = true;
  return view;
}

export function parameterSignature(parameter: ParameterDeclaration): string {
  let signature = parameter.type ? `${parameter.type} ` : "";
  if (parameter.byRef) signature += "&";
  if (parameter.variadic) signature += "...";
  signature += `$${parameter.name}`;
  if (parameter.defaultValue !== null) signature += ` = ${parameter.defaultValue}`;
  return signature;
}

function namespaceOf(name: string): string {
  const index = name.lastIndexOf("\\");
  return index < 0 ? "" : name.slice(0, index);
}
