import {
  sameClass,
  type ClassDeclaration,
  type ClassKind,
  type ConstantDeclaration,
  type MethodDeclaration,
  type PropertyDeclaration,
} from "../model.js";

/** A related class by name, with its descriptor when it could be located. */
export interface ClassReference {
  name: string;
  descriptor: ClassDescriptor | null;
}

/**
 * A class-like with its hierarchy loaded: parent chain, used traits and
 * implemented interfaces. Read-only.
 *
 * Members pulled in from traits count as the class's own, as PHP reflection
 * reports them. `includeInherited` adds the parent chain (and, for
 * interfaces, the extended interfaces).
 */
export class ClassDescriptor {
  constructor(
    readonly declaration: ClassDeclaration,
    readonly parent: ClassReference | null,
    readonly traitRefs: readonly ClassReference[],
    readonly interfaceRefs: readonly ClassReference[]
  ) {}

  get name(): string {
    return this.declaration.name;
  }

  get file(): string {
    return this.declaration.file;
  }

  get kind(): ClassKind {
    return this.declaration.kind;
  }

  /** Directly used traits */
  get traits(): string[] {
    return [...this.declaration.traits];
  }

  /**
   * Every implemented interface: direct ones, those they extend, and those of
   * the parent chain.
   */
  get interfaces(): string[] {
    const names: string[] = [];
    const add = (name: string): void => {
      if (!names.some((existing) => sameClass(existing, name))) names.push(name);
    };

    for (const ref of this.interfaceRefs) {
      add(ref.name);
      ref.descriptor?.interfaces.forEach(add);
    }
    this.parent?.descriptor?.interfaces.forEach(add);
    return names;
  }

  /**
   * Loaded descriptors for {@link interfaces}, in the same order; null where an
   * interface could not be located.
   */
  interfaceReferences(): ClassReference[] {
    const byName = new Map<string, ClassReference>();
    const collect = (ref: ClassReference): void => {
      const key = ref.name.toLowerCase();
      if (!byName.has(key)) byName.set(key, ref);
      ref.descriptor?.interfaceReferences().forEach(collect);
    };
    this.interfaceRefs.forEach(collect);
    this.parent?.descriptor?.interfaceReferences().forEach(collect);

    return this.interfaces.map((name) => byName.get(name.toLowerCase()) ?? { name, descriptor: null });
  }

  hasMethod(name: string): boolean {
    const wanted = name.toLowerCase();
    return this.methods(true).some((method) => method.name.toLowerCase() === wanted);
  }

  methods(includeInherited = false): MethodDeclaration[] {
    return this.collect(
      includeInherited,
      (d) => d.declaration.methods,
      (d, inherited) => d.methods(inherited),
      // Method names are case-insensitive
      (m) => m.name.toLowerCase()
    );
  }

  properties(includeInherited = false): PropertyDeclaration[] {
    return this.collect(
      includeInherited,
      (d) => d.declaration.properties,
      (d, inherited) => d.properties(inherited),
      (p) => p.name
    );
  }

  constants(includeInherited = false): ConstantDeclaration[] {
    const own = this.collect(
      includeInherited,
      (d) => d.declaration.constants,
      (d, inherited) => d.constants(inherited),
      (c) => c.name
    );
    if (!includeInherited) return own;

    // Interface constants are visible on implementing classes
    const seen = new Set(own.map((c) => c.name));
    for (const ref of this.interfaceReferences()) {
      for (const constant of ref.descriptor?.declaration.constants ?? []) {
        if (seen.has(constant.name)) continue;
        seen.add(constant.name);
        own.push(constant);
      }
    }
    return own;
  }

  /**
   * Own members, then trait members (rebased onto this class), then
   * inherited ones, keeping the first of each name.
   */
  private collect<M extends { declaringClass: string }>(
    includeInherited: boolean,
    own: (d: ClassDescriptor) => readonly M[],
    related: (d: ClassDescriptor, includeInherited: boolean) => M[],
    keyOf: (member: M) => string
  ): M[] {
    const result: M[] = [];
    const seen = new Set<string>();
    const add = (member: M): void => {
      const key = keyOf(member);
      if (seen.has(key)) return;
      seen.add(key);
      result.push(member);
    };

    own(this).forEach(add);
    for (const ref of this.traitRefs) {
      if (!ref.descriptor) continue;
      related(ref.descriptor, false).forEach((member) => add({ ...member, declaringClass: this.name }));
    }

    if (includeInherited) {
      if (this.parent?.descriptor) related(this.parent.descriptor, true).forEach(add);
      if (this.kind === "interface") {
        for (const ref of this.interfaceRefs) {
          if (ref.descriptor) related(ref.descriptor, true).forEach(add);
        }
      }
    }

    return result;
  }
}
