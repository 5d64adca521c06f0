import { describe, it, expect, beforeAll, afterAll, beforeEach, vi } from "vitest";
import { Err, type Result } from "@phpscope/core";

import {
  InMemoryKeyValueStore,
  MalformedInputError,
  NodeFileSystem,
  NodeSourceScanner,
  TreeSitterTokenizer,
  UsageScanner,
  VendorResultCache,
  buildStatistics,
  sortUsages,
  type Token,
  type Tokenizer,
  type UsageMatch,
  type UsageRecord,
} from "../src/index.js";
import { LexerTokenizer } from "./support/phpLexer.js";
import { createTempProject, type TempProject } from "./support/project.js";

const USER = "App\\Models\\User";

const FILES: Record<string, string> = {
  "app/Http/UserController.php": `<?php
namespace App\\Http;

use App\\Models\\User;

class UserController
{
    public function show(User $user): User
    {
        return User::findOrFail($user->id);
    }
}
`,
  "app/Models/User.php": `<?php
namespace App\\Models;

class User extends Model
{
    public static function make(): self
    {
        return new User();
    }
}
`,
  "app/Services/Report.php": `<?php
namespace App\\Services;

class Report
{
}
`,
  "vendor/acme/lib/Helper.php": `<?php
namespace Acme;

use App\\Models\\User;

function greet(User $user): string
{
    return 'hi';
}
`,
};

const PROFILE_CONTROLLER = `<?php
namespace App\\Http;

use App\\Models\\UserProfile;

class ProfileController
{
    public function show(UserProfile $profile): UserProfile
    {
        $copy = new UserProfile();
        return UserProfile::find($profile->id);
    }
}
`;

const CONTROLLER = "app/Http/UserController.php";
const MODEL = "app/Models/User.php";

const importLine: UsageRecord = { file: CONTROLLER, line: 4, usageType: "import", code: "use App\\Models\\User;" };
const staticCall: UsageRecord = {
  file: CONTROLLER,
  line: 10,
  usageType: "static_call",
  code: "User::findOrFail",
  method: "findOrFail",
};
const parameter: UsageRecord = { file: CONTROLLER, line: 8, usageType: "type_hint", code: "User $user" };
const returnType: UsageRecord = { file: CONTROLLER, line: 8, usageType: "type_hint", code: ": User" };
const instantiation: UsageRecord = { file: MODEL, line: 8, usageType: "new", code: "new User" };

function steppingClock(step: number): () => number {
  let time = 0;
  return () => (time += step);
}

describe("UsageScanner", () => {
  let project: TempProject;
  let tokenizer: LexerTokenizer;

  function createScanner(options: { tokenizer?: Tokenizer; root?: string } = {}): UsageScanner {
    const root = options.root ?? project.root;
    return new UsageScanner({
      projectRoot: root,
      vendorDir: "vendor",
      fs: new NodeFileSystem(root),
      scanner: new NodeSourceScanner(),
      tokenizer: options.tokenizer ?? tokenizer,
      vendorCache: new VendorResultCache(new InMemoryKeyValueStore<UsageMatch[]>({ ttlMs: 60_000 })),
      now: steppingClock(5),
    });
  }

  beforeAll(() => {
    project = createTempProject("usage-scanner", FILES);
  });

  afterAll(() => {
    project.remove();
  });

  beforeEach(() => {
    tokenizer = new LexerTokenizer();
  });

  it("finds every usage type across the directory", async () => {
    const result = await createScanner().findUsages({ target: USER, path: "app", limit: 0 });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.target).toBe(USER);
    expect(result.value.totalUsages).toBe(5);
    expect(result.value.listing).toEqual({
      grouped: false,
      usages: [importLine, parameter, returnType, instantiation, staticCall],
    });
  });

  it("finds the same usages with the tree-sitter tokenizer", async () => {
    const result = await createScanner({ tokenizer: new TreeSitterTokenizer() }).findUsages({
      target: USER,
      path: "app",
      limit: 0,
    });

    expect(result.ok && result.value.listing).toEqual({
      grouped: false,
      usages: [importLine, parameter, returnType, instantiation, staticCall],
    });
  });

  it("never matches a class whose name extends the target's", async () => {
    const profiles = createTempProject("usage-scanner-profiles", { "app/Http/ProfileController.php": PROFILE_CONTROLLER });

    try {
      const result = await createScanner({ root: profiles.root }).findUsages({ target: USER, path: "app" });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.totalUsages).toBe(0);
      expect(result.value.scanStats.filesScanned).toBe(1);
      expect(result.value.scanStats.filesMatched).toBe(0);
    } finally {
      profiles.remove();
    }
  });

  it("reports scan statistics", async () => {
    const result = await createScanner().findUsages({ target: USER, path: "app" });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.scanStats).toEqual({ filesScanned: 3, filesMatched: 2, scanTimeMs: 5 });
    expect(result.value.statistics).toEqual({
      totalUsages: 5,
      byType: { import: 1, type_hint: 2, new: 1, static_call: 1 },
      byFile: { [CONTROLLER]: 4, [MODEL]: 1 },
      mostUsedFile: CONTROLLER,
    });
  });

  it("sorts by file and by type, keeping discovery order for ties", async () => {
    const scanner = createScanner();

    const byFile = await scanner.findUsages({ target: USER, path: "app", sortBy: "file" });
    const byType = await scanner.findUsages({ target: USER, path: "app", sortBy: "type" });

    expect(byFile.ok && byFile.value.listing).toEqual({
      grouped: false,
      usages: [importLine, staticCall, parameter, returnType, instantiation],
    });
    expect(byType.ok && byType.value.listing).toEqual({
      grouped: false,
      usages: [importLine, instantiation, staticCall, parameter, returnType],
    });
  });

  it("paginates after sorting and counts the full list", async () => {
    const scanner = createScanner();

    const page = await scanner.findUsages({ target: USER, path: "app", limit: 2, offset: 1 });
    const rest = await scanner.findUsages({ target: USER, path: "app", limit: 0, offset: 3 });
    const beyond = await scanner.findUsages({ target: USER, path: "app", limit: 10, offset: 10 });

    expect(page.ok && page.value.listing).toEqual({ grouped: false, usages: [parameter, returnType] });
    expect(rest.ok && rest.value.listing).toEqual({ grouped: false, usages: [instantiation, staticCall] });
    expect(beyond.ok && beyond.value.listing).toEqual({ grouped: false, usages: [] });
    expect(beyond.ok && beyond.value.totalUsages).toBe(5);
  });

  it("groups the page by usage type", async () => {
    const result = await createScanner().findUsages({ target: USER, path: "app", groupByType: true });

    expect(result.ok && result.value.listing).toEqual({
      grouped: true,
      usagesByType: {
        import: [importLine],
        type_hint: [parameter, returnType],
        new: [instantiation],
        static_call: [staticCall],
      },
    });
  });

  it("filters by usage type", async () => {
    const result = await createScanner().findUsages({ target: USER, path: "app", usageTypes: ["new", "import"] });

    expect(result.ok && result.value.listing).toEqual({ grouped: false, usages: [importLine, instantiation] });
  });

  it("returns the same report for the same request", async () => {
    const scanner = createScanner();
    const request = { target: USER, path: "app", sortBy: "file" as const };

    const first = await scanner.findUsages(request);
    const second = await scanner.findUsages(request);

    expect(first.ok && second.ok).toBe(true);
    if (!first.ok || !second.ok) return;
    expect(second.value.listing).toEqual(first.value.listing);
    expect(second.value.statistics).toEqual(first.value.statistics);
  });

  it("treats a leading separator on the target as insignificant", async () => {
    const scanner = createScanner();

    const plain = await scanner.findUsages({ target: USER, path: "app" });
    const rooted = await scanner.findUsages({ target: `\\${USER}`, path: "app" });

    expect(rooted.ok && rooted.value.listing).toEqual(plain.ok && plain.value.listing);
  });

  it("succeeds with no usages", async () => {
    const result = await createScanner().findUsages({ target: "App\\Models\\Ghost", path: "app" });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.totalUsages).toBe(0);
    expect(result.value.listing).toEqual({ grouped: false, usages: [] });
    expect(result.value.statistics.mostUsedFile).toBeNull();
    expect(result.value.scanStats.filesScanned).toBe(3);
    expect(result.value.scanStats.filesMatched).toBe(0);
  });

  describe("vendor files", () => {
    const vendorUsage: UsageRecord = {
      file: "vendor/acme/lib/Helper.php",
      line: 6,
      usageType: "type_hint",
      code: "User $user",
    };

    it("are skipped unless requested", async () => {
      const scanner = createScanner();

      const excluded = await scanner.findUsages({ target: USER, path: ".", usageTypes: ["type_hint"] });
      const included = await scanner.findUsages({
        target: USER,
        path: ".",
        usageTypes: ["type_hint"],
        excludeVendor: false,
      });

      expect(excluded.ok && excluded.value.scanStats.filesScanned).toBe(3);
      expect(included.ok && included.value.scanStats.filesScanned).toBe(4);
      expect(included.ok && included.value.listing).toEqual({
        grouped: false,
        usages: [vendorUsage, parameter, returnType],
      });
    });

    it("reuse cached results until the cache is flushed", async () => {
      const scanner = createScanner();
      const tokenize = vi.spyOn(tokenizer, "tokenize");
      const request = { target: USER, path: ".", usageTypes: ["type_hint" as const], excludeVendor: false };

      const first = await scanner.findUsages(request);
      expect(tokenize).toHaveBeenCalledTimes(3);

      const second = await scanner.findUsages(request);
      // Project files are always re-read; the vendor file is not
      expect(tokenize).toHaveBeenCalledTimes(5);
      expect(second.ok && second.value.listing).toEqual(first.ok && first.value.listing);

      await scanner.findUsages({ ...request, flushCache: true });
      expect(tokenize).toHaveBeenCalledTimes(8);
    });
  });

  describe("errors", () => {
    it("rejects an empty target before reading anything", async () => {
      const tokenize = vi.spyOn(tokenizer, "tokenize");

      const result = await createScanner().findUsages({ target: "  ", path: "app" });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe("Target class is required");
      expect(result.error.code).toBe("INVALID_PARAMETER");
      expect(tokenize).not.toHaveBeenCalled();
    });

    it("rejects a negative limit", async () => {
      const result = await createScanner().findUsages({ target: USER, path: "app", limit: -1 });

      expect(!result.ok && result.error.message).toBe("limit must be a non-negative integer, got -1");
    });

    it("reports a missing directory", async () => {
      const result = await createScanner().findUsages({ target: USER, path: "missing" });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe("NOT_FOUND");
      expect(result.error.message).toBe("Directory not found: missing");
    });

    it("fails when no file could be tokenized", async () => {
      const broken = createTempProject("usage-scanner-broken", {
        "src/One.php": "<?php\n$x = new User();\n",
        "src/Two.php": "<?php\n$y = User::make();\n",
      });
      const failing: Tokenizer = {
        tokenize: async (): Promise<Result<Token[], MalformedInputError>> => Err(new MalformedInputError("boom")),
      };

      try {
        const result = await createScanner({ tokenizer: failing, root: broken.root }).findUsages({
          target: "User",
          path: "src",
        });

        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.code).toBe("MALFORMED_INPUT");
      } finally {
        broken.remove();
      }
    });
  });
});

describe("sortUsages", () => {
  it("keeps discovery order for equal lines", () => {
    const usages: UsageRecord[] = [
      { file: "b.php", line: 3, usageType: "new", code: "new A" },
      { file: "a.php", line: 1, usageType: "import", code: "use A;" },
      { file: "a.php", line: 3, usageType: "extends", code: "extends A" },
    ];

    expect(sortUsages(usages, "line").map((u) => u.file)).toEqual(["a.php", "b.php", "a.php"]);
  });
});

describe("buildStatistics", () => {
  it("names the first file to reach the highest count", () => {
    const usages: UsageRecord[] = [
      { file: "a.php", line: 1, usageType: "new", code: "new A" },
      { file: "b.php", line: 1, usageType: "new", code: "new A" },
      { file: "b.php", line: 2, usageType: "new", code: "new A" },
      { file: "a.php", line: 2, usageType: "new", code: "new A" },
    ];

    expect(buildStatistics(usages).mostUsedFile).toBe("a.php");
  });
});
