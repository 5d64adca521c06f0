import type { Logger } from "@phpscope/core";

import type { ReflectorConfig } from "./config.js";
import type { UsageMatch } from "./core/model.js";
import type { ClassReflector } from "./core/ports/ClassReflector.js";
import type { FileSystem } from "./core/ports/FileSystem.js";
import type { SourceScanner } from "./core/ports/SourceScanner.js";
import type { Tokenizer } from "./core/ports/Tokenizer.js";
import { ClassDiscovery } from "./core/services/ClassDiscovery.js";
import { ClassInspector } from "./core/services/ClassInspector.js";
import { ClassRepository } from "./core/services/ClassRepository.js";
import { UsageScanner } from "./core/services/UsageScanner.js";
import { VendorResultCache } from "./core/services/VendorResultCache.js";
import { InMemoryKeyValueStore } from "./infrastructure/cache/InMemoryKeyValueStore.js";
import { ComposerClassLocator } from "./infrastructure/composer/ComposerClassLocator.js";
import { NodeFileSystem } from "./infrastructure/filesystem/NodeFileSystem.js";
import { NodeSourceScanner } from "./infrastructure/scanner/NodeSourceScanner.js";
import { TreeSitterReflector } from "./infrastructure/treesitter/TreeSitterReflector.js";
import { TreeSitterTokenizer } from "./infrastructure/treesitter/TreeSitterTokenizer.js";
import type { Services } from "./tools/index.js";

/** Adapters to use instead of the defaults. */
export interface ServiceOverrides {
  fs?: FileSystem;
  scanner?: SourceScanner;
  tokenizer?: Tokenizer;
  reflector?: ClassReflector;
  now?: () => number;
}

/**
 * Wire the services behind the three tools.
 */
export function createReflectorServices(
  config: ReflectorConfig,
  logger: Logger,
  overrides: ServiceOverrides = {}
): Services {
  const { projectRoot, vendorDir } = config;
  const fs = overrides.fs ?? new NodeFileSystem(projectRoot);
  const scanner = overrides.scanner ?? new NodeSourceScanner({ logger });

  const repository = new ClassRepository({
    projectRoot,
    vendorDir,
    fs,
    scanner,
    reflector: overrides.reflector ?? new TreeSitterReflector(),
    locator: new ComposerClassLocator({ projectRoot, vendorDir, fs, logger }),
    logger,
  });

  const store = new InMemoryKeyValueStore<UsageMatch[]>({ ttlMs: config.cacheTtlMs, now: overrides.now });

  return {
    projectRoot,
    defaultScanPath: config.defaultScanPath,
    fs,
    discovery: new ClassDiscovery({ projectRoot, fs, scanner, repository, logger }),
    inspector: new ClassInspector({ projectRoot, repository }),
    usages: new UsageScanner({
      projectRoot,
      vendorDir,
      fs,
      scanner,
      tokenizer: overrides.tokenizer ?? new TreeSitterTokenizer(),
      vendorCache: new VendorResultCache(store, logger),
      logger,
      now: overrides.now,
    }),
  };
}
