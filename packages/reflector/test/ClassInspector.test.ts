import { describe, it, expect, beforeEach, afterEach } from "vitest";

import {
  ClassInspector,
  InvalidParameterError,
  docblockView,
  parameterSignature,
  type ClassInformation,
  type InspectOptions,
} from "../src/index.js";
import { paramDecl } from "./support/declarations.js";
import { createHierarchy, type HierarchyFixture } from "./support/hierarchy.js";

const USER = "App\\Models\\User";

describe("ClassInspector", () => {
  let fixture: HierarchyFixture;
  let inspector: ClassInspector;

  beforeEach(() => {
    fixture = createHierarchy();
    inspector = new ClassInspector({ projectRoot: fixture.project.root, repository: fixture.repository });
  });

  afterEach(() => {
    fixture.project.remove();
  });

  async function inspect(name: string, options: InspectOptions = {}): Promise<ClassInformation> {
    const result = await inspector.inspect({ kind: "name", name }, options);
    if (!result.ok) throw result.error;
    return result.value;
  }

  function methodNames(info: ClassInformation): string[] | undefined {
    return info.methods?.map((m) => m.methodName);
  }

  describe("inspect", () => {
    it("describes the class header with summary docblocks", async () => {
      const info = await inspect(USER);

      expect(info.file).toBe("app/Models/User.php");
      expect(info.name).toBe(USER);
      expect(info.startLine).toBe(12);
      expect(info.endLine).toBe(60);
      expect(info.docblock).toEqual({ summary: "An account holder." });
      expect(info.isFinal).toBe(true);
      expect(info.isAbstract).toBeUndefined();
      expect(info.parent).toEqual({
        file: "app/Models/Model.php",
        name: "App\\Models\\Model",
        namespace: "App\\Models",
        startLine: 5,
        endLine: 40,
        docblock: { summary: "Base model." },
      });
    });

    it("lists public members by default", async () => {
      const info = await inspect(USER);

      expect(info.constants).toEqual({
        STATUS_ACTIVE: {
          constantName: "STATUS_ACTIVE",
          value: "1",
          startLine: 16,
          endLine: 16,
          docblock: { summary: "Active flag." },
        },
      });
      expect(info.properties).toEqual([
        { propertyName: "name", type: "string", defaultValue: null, startLine: 18, endLine: 18, isPublic: true },
      ]);
      expect(methodNames(info)).toEqual(["find", "save", "count", "fill", "uuid"]);
      expect(info.methods?.[0]).toEqual({
        methodName: "find",
        parameters: ["int $id"],
        returnType: "?App\\Models\\User",
        startLine: 22,
        endLine: 25,
        isStatic: true,
        isPublic: true,
        docblock: { summary: "Find by key." },
      });
      expect(info.methods?.[3]?.parameters).toEqual(["array $attributes = []", "mixed ...$rest", "&$target"]);
    });

    it("nests interfaces and traits", async () => {
      const info = await inspect(USER);

      expect(info.interfaces).toEqual([
        {
          file: "app/Contracts/Jsonable.php",
          name: "App\\Contracts\\Jsonable",
          isInterface: true,
          interfaces: [
            {
              file: "app/Contracts/Arrayable.php",
              name: "App\\Contracts\\Arrayable",
              docblock: { summary: "Converts to arrays." },
              isInterface: true,
            },
          ],
        },
        {
          file: "app/Contracts/Arrayable.php",
          name: "App\\Contracts\\Arrayable",
          docblock: { summary: "Converts to arrays." },
          isInterface: true,
        },
        { file: null, name: "Countable" },
      ]);
      expect(info.traits).toEqual([{ file: "app/Concerns/HasUuid.php", name: "App\\Concerns\\HasUuid", isTrait: true }]);
    });

    it("shows full and raw docblocks on request", async () => {
      const full = await inspect(USER, { fullDocblocks: true, constants: false, properties: false, methods: false });
      const raw = await inspect("App\\Models\\Post", { rawDocblock: true });

      expect(full.docblock).toEqual({
        summary: "An account holder.",
        description: "Users sign in with email.",
        tags: ["@see Post"],
      });
      expect(full.constants).toBeUndefined();
      expect(full.properties).toBeUndefined();
      expect(full.methods).toBeUndefined();
      expect(raw.parent?.docblock).toBe("/** Base model. */");
    });

    it("widens visibility and adds inherited members", async () => {
      const info = await inspect(USER, { visibility: "all", includeInherited: true });

      expect(methodNames(info)).toEqual(["find", "save", "secret", "count", "fill", "uuid", "boot"]);
      expect(info.methods?.[6]).toEqual({
        methodName: "boot",
        parameters: [],
        returnType: null,
        startLine: 17,
        endLine: 20,
        isStatic: true,
        isProtected: true,
        declaringClass: "App\\Models\\Model",
      });
      expect(info.properties?.map((p) => p.propertyName)).toEqual(["name", "password", "casts", "uuidColumn", "table"]);
      expect(Object.keys(info.constants ?? {})).toEqual(["STATUS_ACTIVE", "CREATED_AT", "FORMAT"]);
    });

    it("filters by a comma list of visibilities", async () => {
      const info = await inspect(USER, { visibility: "public, protected" });

      expect(info.properties?.map((p) => p.propertyName)).toEqual(["name", "casts", "uuidColumn"]);
      expect(methodNames(await inspect(USER, { visibility: "protected", includeInherited: true }))).toEqual(["boot"]);
    });

    it("keeps only static methods", async () => {
      expect(methodNames(await inspect(USER, { staticOnly: true }))).toEqual(["find"]);
    });

    it("pages each member section", async () => {
      const info = await inspect(USER, {
        methodsOffset: 1,
        methodsLimit: 2,
        includeInherited: true,
        constantsOffset: 1,
        constantsLimit: 1,
      });

      expect(methodNames(info)).toEqual(["save", "count"]);
      expect(Object.keys(info.constants ?? {})).toEqual(["CREATED_AT"]);
    });

    it("keeps at most five methods and nothing else in summary mode", async () => {
      const info = await inspect(USER, { summaryMode: true, visibility: "all", includeInherited: true });

      expect(methodNames(info)).toEqual(["find", "save", "secret", "count", "fill"]);
      expect(info.constants).toBeUndefined();
      expect(info.properties).toBeUndefined();
    });

    it("shows interface constants and inherited methods but no properties", async () => {
      const info = await inspect("App\\Contracts\\Jsonable", { includeInherited: true });

      expect(info.isInterface).toBe(true);
      expect(info.properties).toBeUndefined();
      expect(info.constants).toEqual({
        FORMAT: { constantName: "FORMAT", value: "'array'", startLine: 7, endLine: 7 },
      });
      expect(info.methods?.map((m) => [m.methodName, m.declaringClass, m.isAbstract])).toEqual([
        ["toJson", undefined, true],
        ["toArray", "App\\Contracts\\Arrayable", true],
      ]);
    });

    it("keeps an unresolved parent by name", async () => {
      const info = await inspect("Lib\\Orphan");

      expect(info.parent).toEqual({ file: null, name: "Vendor\\Base", namespace: "Vendor" });
    });

    it("inspects by file", async () => {
      const result = await inspector.inspect({ kind: "file", path: "app/Models/Post.php" });

      expect(result.ok && result.value.name).toBe("App\\Models\\Post");
    });

    it("rejects negative paging", async () => {
      const result = await inspector.inspect({ kind: "name", name: USER }, { methodsLimit: -1 });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(InvalidParameterError);
        expect(result.error.message).toBe("methods offset and limit must be non-negative integers");
      }
    });

    it("reports a missing class", async () => {
      const result = await inspector.inspect({ kind: "name", name: "App\\Missing" });

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe("Class not found: App\\Missing");
    });
  });

  describe("summarize", () => {
    it("renders the header with full docblocks and no members", async () => {
      const resolved = await fixture.repository.resolve({ kind: "name", name: USER });
      if (!resolved.ok) throw resolved.error;

      const info = inspector.summarize(resolved.value);

      expect(info.docblock).toEqual({
        summary: "An account holder.",
        description: "Users sign in with email.",
        tags: ["@see Post"],
      });
      expect(info.methods).toBeUndefined();
      expect(info.constants).toBeUndefined();
      expect(info.interfaces?.[1]).toEqual({
        file: "app/Contracts/Arrayable.php",
        name: "App\\Contracts\\Arrayable",
        docblock: { summary: "Converts to arrays.", tags: ["@api"] },
        isInterface: true,
      });
    });
  });

  describe("docblockView", () => {
    it("returns undefined for a missing or empty docblock", () => {
      expect(docblockView(null, { summary: true, rawDocblock: false })).toBeUndefined();
      expect(docblockView("/** */", { summary: false, rawDocblock: false })).toBeUndefined();
    });
  });

  describe("parameterSignature", () => {
    it("renders type, reference, variadic and default", () => {
      expect(parameterSignature(paramDecl("owner", "?User", { defaultValue: "null" }))).toBe("?User $owner = null");
      expect(parameterSignature(paramDecl("items", "array", { byRef: true }))).toBe("array &$items");
      expect(parameterSignature(paramDecl("args", null, { variadic: true }))).toBe("...$args");
    });
  });
});
