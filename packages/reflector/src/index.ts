// Domain model and errors
export * from "./core/model.js";
export * from "./core/errors.js";
export { TokenStream, type NameSpan } from "./core/TokenStream.js";

// Ports
export type { ClassLocator } from "./core/ports/ClassLocator.js";
export type { ClassReflector } from "./core/ports/ClassReflector.js";
export type { FileStats, FileSystem } from "./core/ports/FileSystem.js";
export type { KeyValueStore } from "./core/ports/KeyValueStore.js";
export type { ScanOptions, SourceScanner } from "./core/ports/SourceScanner.js";
export type { Tokenizer } from "./core/ports/Tokenizer.js";

// Namespace resolution and detectors
export * from "./core/namespace/NamespaceResolver.js";
export { parseUseStatement, type UseStatement, type ImportedName } from "./core/namespace/UseStatement.js";
export { runDetectors, type DetectionContext, type UsageDetector } from "./core/detectors/Detector.js";
export { DETECTORS, selectDetectors } from "./core/detectors/registry.js";

// Services
export { ClassDescriptor, type ClassReference } from "./core/services/ClassDescriptor.js";
export { ClassDiscovery, type DiscoverRequest } from "./core/services/ClassDiscovery.js";
export * from "./core/services/ClassInspector.js";
export { ClassRepository, type ClassSource } from "./core/services/ClassRepository.js";
export * from "./core/services/DocBlockParser.js";
export * from "./core/services/UsageScanner.js";
export * from "./core/services/VendorResultCache.js";

// Infrastructure
export { InMemoryKeyValueStore } from "./infrastructure/cache/InMemoryKeyValueStore.js";
export { ComposerClassLocator } from "./infrastructure/composer/ComposerClassLocator.js";
export { NodeFileSystem } from "./infrastructure/filesystem/NodeFileSystem.js";
export { NodeSourceScanner } from "./infrastructure/scanner/NodeSourceScanner.js";
export { TreeSitterReflector } from "./infrastructure/treesitter/TreeSitterReflector.js";
export { TreeSitterTokenizer } from "./infrastructure/treesitter/TreeSitterTokenizer.js";

// Configuration and tools
export { loadConfig, type ReflectorConfig } from "./config.js";
export { createReflectorServices, type ServiceOverrides } from "./services.js";
export { registerAllTools, formatUsageReport, toClassSource, type Services } from "./tools/index.js";
