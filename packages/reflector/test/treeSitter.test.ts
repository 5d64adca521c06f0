import { describe, it, expect } from "vitest";

import { TreeSitterReflector, TreeSitterTokenizer } from "../src/index.js";
import { resolveTypeText } from "../src/infrastructure/treesitter/ClassExtractor.js";

const SOURCE = `<?php
namespace App\\Models;

use App\\Contracts\\Arrayable;

/** A blog post. */
final class Post extends Model implements Arrayable
{
    public function toArray(): array
    {
        return [];
    }
}
`;

describe("TreeSitterTokenizer", () => {
  it("covers the whole source", async () => {
    const result = await new TreeSitterTokenizer().tokenize(SOURCE);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.map((token) => token.text).join("")).toBe(SOURCE);
    expect(result.value.find((token) => token.kind === "class")?.line).toBe(7);
  });
});

describe("TreeSitterReflector", () => {
  it("reflects a namespaced class", async () => {
    const result = await new TreeSitterReflector().reflect("/project/app/Models/Post.php", SOURCE);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toHaveLength(1);
    expect(result.value[0]).toMatchObject({
      file: "/project/app/Models/Post.php",
      name: "App\\Models\\Post",
      shortName: "Post",
      namespace: "App\\Models",
      kind: "class",
      parent: "App\\Models\\Model",
      interfaces: ["App\\Contracts\\Arrayable"],
      isFinal: true,
      docComment: "/** A blog post. */",
      startLine: 7,
      endLine: 13,
    });
    expect(result.value[0]?.methods.map((method) => method.name)).toEqual(["toArray"]);
  });
});

describe("resolveTypeText", () => {
  it("resolves class names and keeps builtins", () => {
    const ns = { namespace: "App\\Models", aliases: new Map([["Carbon", "Carbon\\Carbon"]]) };

    expect(resolveTypeText("?User|null", ns)).toBe("?App\\Models\\User|null");
    expect(resolveTypeText("Carbon&\\Stringable", ns)).toBe("Carbon\\Carbon&Stringable");
    expect(resolveTypeText("array", ns)).toBe("array");
  });
});
