/**
 * PSR-4 class location from Composer metadata: the project's composer.json
 * (`autoload` and `autoload-dev`) and the installed packages recorded in
 * `<vendor>/composer/installed.json`.
 */

import path from "node:path";
import * as z from "zod/v4";
import type { Logger } from "@phpscope/core";

import { stripRoot } from "../../core/model.js";
import type { ClassLocator } from "../../core/ports/ClassLocator.js";
import type { FileSystem } from "../../core/ports/FileSystem.js";

const Psr4Schema = z.record(z.string(), z.union([z.string(), z.array(z.string())]));

const AutoloadSchema = z.object({
  "psr-4": Psr4Schema.optional(),
});

const ComposerJsonSchema = z.object({
  autoload: AutoloadSchema.optional(),
  "autoload-dev": AutoloadSchema.optional(),
});

const InstalledPackageSchema = z.object({
  name: z.string(),
  "install-path": z.string().optional(),
  autoload: AutoloadSchema.optional(),
});

// Composer 2 wraps the list; Composer 1 writes a bare array
const InstalledJsonSchema = z.union([
  z.object({ packages: z.array(InstalledPackageSchema) }),
  z.array(InstalledPackageSchema),
]);

type Psr4Map = z.infer<typeof Psr4Schema>;

interface Psr4Mapping {
  /** Namespace prefix without the trailing separator, "" for the fallback */
  prefix: string;
  directory: string;
}

export interface ComposerClassLocatorOptions {
  projectRoot: string;
  vendorDir: string;
  fs: FileSystem;
  logger?: Logger;
}

export class ComposerClassLocator implements ClassLocator {
  private mappings: Psr4Mapping[] | undefined;

  constructor(private readonly options: ComposerClassLocatorOptions) {}

  candidates(fqn: string): string[] {
    const name = stripRoot(fqn);
    const candidates: string[] = [];

    for (const mapping of this.getMappings()) {
      let relative: string;
      if (mapping.prefix === "") {
        relative = name;
      } else if (name.startsWith(`${mapping.prefix}\\`)) {
        relative = name.slice(mapping.prefix.length + 1);
      } else {
        continue;
      }
      candidates.push(path.join(mapping.directory, `${relative.split("\\").join("/")}.php`));
    }

    return candidates;
  }

  /**
   * Forget loaded metadata; the next lookup re-reads composer files.
   */
  reset(): void {
    this.mappings = undefined;
  }

  private getMappings(): Psr4Mapping[] {
    if (!this.mappings) {
      const mappings = [...this.loadProjectMappings(), ...this.loadInstalledMappings()];
      // Longest prefix first; the sort is stable so declaration order breaks ties
      this.mappings = mappings.sort((a, b) => b.prefix.length - a.prefix.length);
    }
    return this.mappings;
  }

  private loadProjectMappings(): Psr4Mapping[] {
    const { projectRoot } = this.options;
    const composer = this.readJson(path.join(projectRoot, "composer.json"), ComposerJsonSchema);
    if (!composer) return [];

    return [
      ...toMappings(composer.autoload?.["psr-4"], projectRoot),
      ...toMappings(composer["autoload-dev"]?.["psr-4"], projectRoot),
    ];
  }

  private loadInstalledMappings(): Psr4Mapping[] {
    const composerDir = path.join(this.options.projectRoot, this.options.vendorDir, "composer");
    const installed = this.readJson(path.join(composerDir, "installed.json"), InstalledJsonSchema);
    if (!installed) return [];

    const packages = Array.isArray(installed) ? installed : installed.packages;
    return packages.flatMap((pkg) => {
      const installPath = pkg["install-path"]
        ? path.resolve(composerDir, pkg["install-path"])
        : path.join(this.options.projectRoot, this.options.vendorDir, pkg.name);
      return toMappings(pkg.autoload?.["psr-4"], installPath);
    });
  }

  private readJson<T>(filePath: string, schema: z.ZodType<T>): T | undefined {
    if (!this.options.fs.exists(filePath)) return undefined;

    const content = this.options.fs.read(filePath);
    if (!content.ok) {
      this.options.logger?.warn(`Cannot read ${filePath}: ${content.error.message}`);
      return undefined;
    }

    let json: unknown;
    try {
      json = JSON.parse(content.value);
    } catch (error) {
      this.options.logger?.warn(`Invalid JSON in ${filePath}:`, error);
      return undefined;
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      this.options.logger?.warn(`Unexpected layout in ${filePath}: ${parsed.error.message}`);
      return undefined;
    }
    return parsed.data;
  }
}

function toMappings(psr4: Psr4Map | undefined, baseDir: string): Psr4Mapping[] {
  if (!psr4) return [];
  return Object.entries(psr4).flatMap(([prefix, dirs]) =>
    (Array.isArray(dirs) ? dirs : [dirs]).map((dir) => ({
      prefix: stripRoot(prefix).replace(/\\+$/, ""),
      directory: path.resolve(baseDir, dir),
    }))
  );
}
