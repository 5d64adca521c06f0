import path from "node:path";
import { Err, Ok, type Logger, type Result } from "@phpscope/core";

import { NotFoundError } from "../errors.js";
import { stripRoot, type ClassDeclaration } from "../model.js";
import type { ClassLocator } from "../ports/ClassLocator.js";
import type { ClassReflector } from "../ports/ClassReflector.js";
import type { FileSystem } from "../ports/FileSystem.js";
import type { SourceScanner } from "../ports/SourceScanner.js";
import { ClassDescriptor, type ClassReference } from "./ClassDescriptor.js";

/**
 * Where a class comes from: a fully-qualified name, a file declaring it, or
 * an already loaded descriptor.
 */
export type ClassSource =
  | { kind: "name"; name: string }
  | { kind: "file"; path: string }
  | { kind: "descriptor"; descriptor: ClassDescriptor };

export interface ClassRepositoryOptions {
  projectRoot: string;
  vendorDir: string;
  fs: FileSystem;
  scanner: SourceScanner;
  reflector: ClassReflector;
  locator: ClassLocator;
  logger?: Logger;
}

interface CachedFile {
  mtime: number;
  classes: ClassDeclaration[];
}

/** Directories never indexed when searching the project for a class. */
const INDEX_EXCLUDES = [".git", "node_modules"];

/**
 * Class lookup and hierarchy loading over the reflector.
 * Declarations are cached per file and re-read when the file's mtime changes.
 */
export class ClassRepository {
  private readonly files = new Map<string, CachedFile>();
  private index: Promise<Map<string, string>> | undefined;

  constructor(private readonly options: ClassRepositoryOptions) {}

  /**
   * Class-likes declared in a file.
   */
  async declarationsIn(filePath: string): Promise<Result<ClassDeclaration[], Error>> {
    const absolute = path.resolve(this.options.projectRoot, filePath);
    const stats = this.options.fs.stats(absolute);
    if (!stats.ok) return stats;

    const cached = this.files.get(absolute);
    if (cached && cached.mtime === stats.value.mtime) {
      return Ok(cached.classes);
    }

    const source = this.options.fs.read(absolute);
    if (!source.ok) return source;

    const reflected = await this.options.reflector.reflect(absolute, source.value);
    if (!reflected.ok) return reflected;

    this.files.set(absolute, { mtime: stats.value.mtime, classes: reflected.value });
    return reflected;
  }

  /**
   * Locate a class by fully-qualified name: Composer autoload candidates
   * first, then an index of the project's own sources. Names compare
   * case-insensitively, as PHP class names do.
   */
  async find(fqn: string): Promise<ClassDeclaration | undefined> {
    const name = stripRoot(fqn).toLowerCase();
    if (name === "") return undefined;

    for (const candidate of this.options.locator.candidates(stripRoot(fqn))) {
      const found = await this.findIn(candidate, name);
      if (found) return found;
    }

    const file = (await this.getIndex()).get(name);
    return file ? this.findIn(file, name) : undefined;
  }

  /**
   * Resolve a class source into a descriptor with its hierarchy loaded.
   */
  async resolve(source: ClassSource): Promise<Result<ClassDescriptor, NotFoundError>> {
    switch (source.kind) {
      case "descriptor":
        return Ok(source.descriptor);
      case "name": {
        const declaration = await this.find(source.name);
        if (!declaration) return Err(new NotFoundError(`Class not found: ${source.name}`));
        return Ok(await this.describe(declaration));
      }
      case "file": {
        const absolute = path.resolve(this.options.projectRoot, source.path);
        if (!this.options.fs.exists(absolute)) {
          return Err(new NotFoundError(`File not found: ${source.path}`));
        }
        const declarations = await this.declarationsIn(absolute);
        if (!declarations.ok) {
          return Err(new NotFoundError(`No classes found in file: ${source.path} (${declarations.error.message})`));
        }
        const first = declarations.value[0];
        if (!first) return Err(new NotFoundError(`No classes found in file: ${source.path}`));
        return Ok(await this.describe(first));
      }
    }
  }

  /**
   * Load the parent chain, traits and interfaces of a declaration.
   * Classes that cannot be located stay as bare names.
   */
  async describe(declaration: ClassDeclaration): Promise<ClassDescriptor> {
    return this.load(declaration, new Map(), new Set());
  }

  /**
   * Drop the project index; the next lookup that needs it rebuilds it.
   */
  resetIndex(): void {
    this.index = undefined;
  }

  private async load(
    declaration: ClassDeclaration,
    memo: Map<string, ClassDescriptor>,
    visiting: Set<string>
  ): Promise<ClassDescriptor> {
    const key = declaration.name.toLowerCase();
    const known = memo.get(key);
    if (known) return known;

    visiting.add(key);
    const reference = async (name: string): Promise<ClassReference> => {
      const nameKey = stripRoot(name).toLowerCase();
      // A class inheriting from itself, directly or not, ends the walk
      if (visiting.has(nameKey)) return { name, descriptor: null };
      const found = await this.find(name);
      return { name, descriptor: found ? await this.load(found, memo, visiting) : null };
    };

    const parent = declaration.parent ? await reference(declaration.parent) : null;
    const traits: ClassReference[] = [];
    for (const name of declaration.traits) traits.push(await reference(name));
    const interfaces: ClassReference[] = [];
    for (const name of declaration.interfaces) interfaces.push(await reference(name));
    visiting.delete(key);

    const descriptor = new ClassDescriptor(declaration, parent, traits, interfaces);
    memo.set(key, descriptor);
    return descriptor;
  }

  private async findIn(file: string, lowerName: string): Promise<ClassDeclaration | undefined> {
    if (!this.options.fs.exists(file)) return undefined;
    const declarations = await this.declarationsIn(file);
    if (!declarations.ok) {
      this.options.logger?.debug(`Cannot reflect ${file}: ${declarations.error.message}`);
      return undefined;
    }
    return declarations.value.find((d) => d.name.toLowerCase() === lowerName);
  }

  private getIndex(): Promise<Map<string, string>> {
    if (!this.index) {
      this.index = this.buildIndex();
    }
    return this.index;
  }

  private async buildIndex(): Promise<Map<string, string>> {
    const index = new Map<string, string>();
    const listed = this.options.scanner.scan(this.options.projectRoot, {
      excludeDirs: [this.options.vendorDir, ...INDEX_EXCLUDES],
    });
    if (!listed.ok) {
      this.options.logger?.warn(`Cannot index ${this.options.projectRoot}: ${listed.error.message}`);
      return index;
    }

    for (const file of listed.value) {
      const declarations = await this.declarationsIn(file);
      if (!declarations.ok) {
        this.options.logger?.debug(`Not indexing ${file}: ${declarations.error.message}`);
        continue;
      }
      for (const declaration of declarations.value) {
        const key = declaration.name.toLowerCase();
        if (!index.has(key)) index.set(key, file);
      }
    }

    this.options.logger?.debug(`Indexed ${index.size} classes in ${listed.value.length} files`);
    return index;
  }
}
