import { describe, it, expect, afterEach, vi } from "vitest";
import { utimesSync } from "node:fs";

import { NotFoundError } from "../src/index.js";
import { createHierarchy, type HierarchyFixture } from "./support/hierarchy.js";

describe("ClassRepository", () => {
  let fixture: HierarchyFixture;

  afterEach(() => {
    fixture.project.remove();
  });

  describe("find", () => {
    it("finds a class through the project index, ignoring case", async () => {
      fixture = createHierarchy();

      const found = await fixture.repository.find("app\\models\\user");

      expect(found?.name).toBe("App\\Models\\User");
      expect(found?.file).toBe(`${fixture.project.root}/app/Models/User.php`);
    });

    it("ignores a leading root separator", async () => {
      fixture = createHierarchy();

      const found = await fixture.repository.find("\\App\\Models\\Post");

      expect(found?.name).toBe("App\\Models\\Post");
    });

    it("prefers locator candidates and skips indexing", async () => {
      fixture = createHierarchy({ "App\\Models\\Post": "app/Models/Post.php" });
      const scan = vi.spyOn(fixture.scanner, "scan");

      const found = await fixture.repository.find("App\\Models\\Post");

      expect(found?.name).toBe("App\\Models\\Post");
      expect(scan).not.toHaveBeenCalled();
    });

    it("returns undefined for unknown and empty names", async () => {
      fixture = createHierarchy();

      expect(await fixture.repository.find("App\\Missing")).toBeUndefined();
      expect(await fixture.repository.find("\\")).toBeUndefined();
    });

    it("builds the index once until reset", async () => {
      fixture = createHierarchy();
      const scan = vi.spyOn(fixture.scanner, "scan");

      await fixture.repository.find("App\\Models\\User");
      await fixture.repository.find("App\\Models\\Post");
      expect(scan).toHaveBeenCalledTimes(1);

      fixture.repository.resetIndex();
      await fixture.repository.find("App\\Models\\User");
      expect(scan).toHaveBeenCalledTimes(2);
    });
  });

  describe("declarationsIn", () => {
    it("reflects a file once while its mtime is unchanged", async () => {
      fixture = createHierarchy();

      await fixture.repository.declarationsIn("app/Models/Post.php");
      await fixture.repository.declarationsIn("app/Models/Post.php");
      expect(fixture.reflector.calls).toBe(1);

      const later = new Date("2030-01-01T00:00:00Z");
      utimesSync(`${fixture.project.root}/app/Models/Post.php`, later, later);
      await fixture.repository.declarationsIn("app/Models/Post.php");
      expect(fixture.reflector.calls).toBe(2);
    });

    it("fails for a missing file", async () => {
      fixture = createHierarchy();

      const result = await fixture.repository.declarationsIn("app/Nope.php");

      expect(result.ok).toBe(false);
    });
  });

  describe("resolve", () => {
    it("resolves a name", async () => {
      fixture = createHierarchy();

      const result = await fixture.repository.resolve({ kind: "name", name: "App\\Models\\User" });

      expect(result.ok && result.value.name).toBe("App\\Models\\User");
    });

    it("resolves the first class of a file", async () => {
      fixture = createHierarchy();

      const result = await fixture.repository.resolve({ kind: "file", path: "app/Models/Post.php" });

      expect(result.ok && result.value.name).toBe("App\\Models\\Post");
    });

    it("passes a descriptor through", async () => {
      fixture = createHierarchy();
      const resolved = await fixture.repository.resolve({ kind: "name", name: "App\\Models\\Post" });
      if (!resolved.ok) throw resolved.error;

      const result = await fixture.repository.resolve({ kind: "descriptor", descriptor: resolved.value });

      expect(result.ok && result.value).toBe(resolved.value);
    });

    it.each([
      [{ kind: "name", name: "App\\Missing" } as const, "Class not found: App\\Missing"],
      [{ kind: "file", path: "app/Nope.php" } as const, "File not found: app/Nope.php"],
      [{ kind: "file", path: "scripts/empty.php" } as const, "No classes found in file: scripts/empty.php"],
    ])("reports %o as not found", async (source, message) => {
      fixture = createHierarchy();

      const result = await fixture.repository.resolve(source);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(NotFoundError);
        expect(result.error.message).toBe(message);
      }
    });
  });

  describe("describe", () => {
    async function describeUser(f: HierarchyFixture) {
      const resolved = await f.repository.resolve({ kind: "name", name: "App\\Models\\User" });
      if (!resolved.ok) throw resolved.error;
      return resolved.value;
    }

    it("loads parent, traits and interfaces", async () => {
      fixture = createHierarchy();

      const user = await describeUser(fixture);

      expect(user.parent?.descriptor?.name).toBe("App\\Models\\Model");
      expect(user.traits).toEqual(["App\\Concerns\\HasUuid"]);
      expect(user.interfaces).toEqual(["App\\Contracts\\Jsonable", "App\\Contracts\\Arrayable", "Countable"]);
      expect(user.interfaceReferences().map((ref) => ref.descriptor?.name ?? null)).toEqual([
        "App\\Contracts\\Jsonable",
        "App\\Contracts\\Arrayable",
        null,
      ]);
    });

    it("counts trait members as the class's own", async () => {
      fixture = createHierarchy();

      const user = await describeUser(fixture);

      expect(user.methods().map((m) => m.name)).toEqual(["find", "save", "secret", "count", "fill", "uuid"]);
      expect(user.methods().find((m) => m.name === "uuid")?.declaringClass).toBe("App\\Models\\User");
      expect(user.properties().map((p) => p.name)).toEqual(["name", "password", "casts", "uuidColumn"]);
    });

    it("adds inherited members after the class's own", async () => {
      fixture = createHierarchy();

      const user = await describeUser(fixture);
      const methods = user.methods(true);

      expect(methods.map((m) => m.name)).toEqual(["find", "save", "secret", "count", "fill", "uuid", "boot"]);
      expect(methods.find((m) => m.name === "save")?.declaringClass).toBe("App\\Models\\User");
      expect(methods.find((m) => m.name === "boot")?.declaringClass).toBe("App\\Models\\Model");
      expect(user.properties(true).map((p) => p.name)).toEqual(["name", "password", "casts", "uuidColumn", "table"]);
      expect(user.constants().map((c) => c.name)).toEqual(["STATUS_ACTIVE"]);
      expect(user.constants(true).map((c) => c.name)).toEqual(["STATUS_ACTIVE", "CREATED_AT", "FORMAT"]);
    });

    it("matches method names case-insensitively", async () => {
      fixture = createHierarchy();

      const user = await describeUser(fixture);

      expect(user.hasMethod("BOOT")).toBe(true);
      expect(user.hasMethod("uuid")).toBe(true);
      expect(user.hasMethod("toArray")).toBe(false);
    });

    it("gives interfaces the methods of the interfaces they extend", async () => {
      fixture = createHierarchy();

      const resolved = await fixture.repository.resolve({ kind: "name", name: "App\\Contracts\\Jsonable" });
      if (!resolved.ok) throw resolved.error;

      expect(resolved.value.methods().map((m) => m.name)).toEqual(["toJson"]);
      expect(resolved.value.methods(true).map((m) => m.name)).toEqual(["toJson", "toArray"]);
    });

    it("stops at a cyclic parent chain", async () => {
      fixture = createHierarchy();

      const resolved = await fixture.repository.resolve({ kind: "name", name: "Lib\\A" });
      if (!resolved.ok) throw resolved.error;

      expect(resolved.value.parent?.descriptor?.name).toBe("Lib\\B");
      expect(resolved.value.parent?.descriptor?.parent).toEqual({ name: "Lib\\A", descriptor: null });
    });

    it("keeps an unlocatable parent as a bare name", async () => {
      fixture = createHierarchy();

      const resolved = await fixture.repository.resolve({ kind: "name", name: "Lib\\Orphan" });
      if (!resolved.ok) throw resolved.error;

      expect(resolved.value.parent).toEqual({ name: "Vendor\\Base", descriptor: null });
    });
  });
});
