/**
 * Core domain types for the reflector package.
 */

// ============================================================================
// Tokens
// ============================================================================

export type TokenKind =
  | "open_tag"
  | "close_tag"
  | "inline_html"
  | "whitespace"
  | "comment"
  | "doc_comment"
  | "name"
  | "ns_separator"
  | "variable"
  | "namespace"
  | "use"
  | "as"
  | "new"
  | "extends"
  | "implements"
  | "class"
  | "trait"
  | "interface"
  | "enum"
  | "function"
  | "fn"
  | "const"
  | "public"
  | "protected"
  | "private"
  | "static"
  | "readonly"
  | "abstract"
  | "final"
  | "var"
  | "double_colon"
  | "ellipsis"
  | "punct"
  | "other";

export interface Token {
  readonly kind: TokenKind;
  /** Verbatim source text */
  readonly text: string;
  /** 1-indexed line the token starts on */
  readonly line: number;
}

export const NAMESPACE_SEPARATOR = "\\";

/**
 * Drop a leading root separator: `\App\User` → `App\User`.
 */
export function stripRoot(name: string): string {
  let start = 0;
  while (name[start] === NAMESPACE_SEPARATOR) start++;
  return name.slice(start);
}

/**
 * Last segment of a (possibly qualified) name.
 */
export function shortName(name: string): string {
  const segments = stripRoot(name).split(NAMESPACE_SEPARATOR).filter((s) => s !== "");
  return segments[segments.length - 1] ?? "";
}

/**
 * Exact, case-sensitive comparison that ignores a leading root separator.
 */
export function sameClass(a: string, b: string): boolean {
  return stripRoot(a) === stripRoot(b);
}

// ============================================================================
// Usages
// ============================================================================

export const USAGE_TYPES = [
  "import",
  "new",
  "static_call",
  "extends",
  "implements",
  "trait",
  "type_hint",
] as const;

export type UsageType = (typeof USAGE_TYPES)[number];

export function isUsageType(value: string): value is UsageType {
  return (USAGE_TYPES as readonly string[]).includes(value);
}

/** One syntactic occurrence found by a detector, before the file is attached. */
export interface UsageMatch {
  line: number;
  usageType: UsageType;
  code: string;
  method?: string;
}

export interface UsageRecord extends UsageMatch {
  /** Project-relative path with `/` separators */
  file: string;
}

export interface NamespaceContext {
  /** Declared namespace, "" for the global namespace */
  readonly namespace: string;
  /** Short name or alias → fully-qualified name */
  readonly aliases: ReadonlyMap<string, string>;
}

export const SORT_KEYS = ["line", "file", "type"] as const;

export type SortKey = (typeof SORT_KEYS)[number];

export interface FindUsagesRequest {
  target: string;
  /** Directory relative to the project root */
  path: string;
  /** Empty means every usage type */
  usageTypes?: UsageType[];
  excludeVendor?: boolean;
  flushCache?: boolean;
  sortBy?: SortKey;
  groupByType?: boolean;
  /** 0 means unlimited */
  limit?: number;
  offset?: number;
}

export interface ScanStatistics {
  totalUsages: number;
  byType: Partial<Record<UsageType, number>>;
  byFile: Record<string, number>;
  mostUsedFile: string | null;
}

export interface ScanStats {
  filesScanned: number;
  filesMatched: number;
  scanTimeMs: number;
}

export type UsageListing =
  | { grouped: false; usages: UsageRecord[] }
  | { grouped: true; usagesByType: Partial<Record<UsageType, UsageRecord[]>> };

export interface UsageScanReport {
  target: string;
  totalUsages: number;
  scanStats: ScanStats;
  statistics: ScanStatistics;
  listing: UsageListing;
}

// ============================================================================
// Class reflection
// ============================================================================

export type ClassKind = "class" | "interface" | "trait" | "enum";

export type Visibility = "public" | "protected" | "private";

export interface LineRange {
  startLine: number;
  endLine: number;
}

export interface ParameterDeclaration {
  name: string;
  type: string | null;
  defaultValue: string | null;
  variadic: boolean;
  byRef: boolean;
  /** Constructor property promotion */
  promoted: boolean;
}

export interface MethodDeclaration extends LineRange {
  name: string;
  parameters: ParameterDeclaration[];
  returnType: string | null;
  visibility: Visibility;
  isStatic: boolean;
  isAbstract: boolean;
  isFinal: boolean;
  docComment: string | null;
  declaringClass: string;
}

export interface PropertyDeclaration extends LineRange {
  name: string;
  type: string | null;
  defaultValue: string | null;
  visibility: Visibility;
  isStatic: boolean;
  isReadonly: boolean;
  docComment: string | null;
  declaringClass: string;
}

export interface ConstantDeclaration extends LineRange {
  name: string;
  /** Source text of the value expression */
  value: string;
  visibility: Visibility;
  docComment: string | null;
  declaringClass: string;
}

/** A class-like exactly as declared in one file. */
export interface ClassDeclaration extends LineRange {
  /** Absolute path of the declaring file */
  file: string;
  /** Fully-qualified name */
  name: string;
  shortName: string;
  namespace: string;
  kind: ClassKind;
  parent: string | null;
  /** Directly implemented (classes, enums) or extended (interfaces) interfaces */
  interfaces: string[];
  /** Directly used traits */
  traits: string[];
  isAbstract: boolean;
  isFinal: boolean;
  docComment: string | null;
  methods: MethodDeclaration[];
  properties: PropertyDeclaration[];
  constants: ConstantDeclaration[];
}
