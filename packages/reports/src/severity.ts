import { reportKindOf, type Report } from "./report.js";
import {
  categoryOfKind,
  reportKinds,
  semErrorReportKinds,
  semHintReportKinds,
  semWarningReportKinds,
  externalCmdlineReportKinds,
  type BackendReportKind,
  type ExternalReportKind,
  type InternalReportKind,
  type LexerReportKind,
  type ParserReportKind,
  type ReportCategory,
  type ReportKind,
  type ReportKindOf,
  type SemReportKind,
} from "./taxonomy.js";

export const reportSeverities = [
  "debug",
  "trace",
  "hint",
  "warning",
  "error",
  "fatal",
] as const;

export type ReportSeverity = (typeof reportSeverities)[number];

/**
 * Default classification for one category. Buckets are checked in the
 * order fatal, error, warning, hint; anything else gets `fallback`.
 */
export type SeverityBuckets<C extends ReportCategory> = {
  fatal?: ReadonlySet<ReportKindOf<C>>;
  error?: ReadonlySet<ReportKindOf<C>>;
  warning?: ReadonlySet<ReportKindOf<C>>;
  hint?: ReadonlySet<ReportKindOf<C>>;
  fallback: "trace" | "debug";
};

const lexerErrorKinds = new Set<LexerReportKind>([
  "lex-malformed-underscores",
  "lex-invalid-integer-prefix",
  "lex-invalid-integer-suffix",
  "lex-number-not-in-range",
  "lex-invalid-integer-literal",
]);

const backendErrorKinds = new Set<BackendReportKind>([
  "back-cannot-write-script",
  "back-cannot-write-mapping-file",
  "back-target-not-supported",
  "back-json-script-mismatch",
  "back-cannot-produce-assembly",
]);

const backendHintKinds = new Set<BackendReportKind>([
  "back-produced-assembly",
  "back-linking",
  "back-compiling-extra-file",
  "back-use-dyn-lib",
]);

const externalErrorKinds = new Set<ExternalReportKind>([
  "ext-unknown-c-compiler",
  ...externalCmdlineReportKinds,
  "ext-invalid-package-name",
]);

const severityBuckets: {
  readonly [C in ReportCategory]: SeverityBuckets<C>;
} = {
  lexer: {
    error: lexerErrorKinds,
    warning: new Set<LexerReportKind>(["lex-deprecated-octal-prefix"]),
    hint: new Set<LexerReportKind>(["lex-line-too-long"]),
    fallback: "trace",
  },
  parser: {
    error: new Set<ParserReportKind>(["par-invalid-indentation"]),
    hint: new Set<ParserReportKind>(["par-name"]),
    fallback: "trace",
  },
  sem: {
    error: new Set<SemReportKind>(semErrorReportKinds),
    warning: new Set<SemReportKind>(semWarningReportKinds),
    hint: new Set<SemReportKind>(semHintReportKinds),
    fallback: "trace",
  },
  cmd: { fallback: "trace" },
  debug: { fallback: "debug" },
  internal: {
    fatal: new Set<InternalReportKind>(["int-unknown", "int-fatal", "int-ice"]),
    fallback: "trace",
  },
  backend: {
    error: backendErrorKinds,
    hint: backendHintKinds,
    fallback: "trace",
  },
  external: {
    error: externalErrorKinds,
    warning: new Set<ExternalReportKind>(["ext-deprecated"]),
    fallback: "trace",
  },
};

export const severityBucketsOf = <C extends ReportCategory>(
  category: C
): SeverityBuckets<C> => severityBuckets[category];

const classifyKind = <C extends ReportCategory>(
  category: C,
  kind: ReportKindOf<C>
): ReportSeverity => {
  const buckets = severityBuckets[category];
  if (buckets.fatal?.has(kind)) return "fatal";
  if (buckets.error?.has(kind)) return "error";
  if (buckets.warning?.has(kind)) return "warning";
  if (buckets.hint?.has(kind)) return "hint";
  return buckets.fallback;
};

/** Compiled-in severity of a kind, before any policy overrides. */
export const defaultSeverityOf = (kind: ReportKind): ReportSeverity =>
  classifyKind(categoryOfKind(kind), kind);

export type SeverityOverrides = {
  asError?: ReadonlySet<ReportKind>;
  asWarning?: ReadonlySet<ReportKind>;
};

/**
 * Severity of a report under a policy. Overrides win over the category
 * defaults, `asError` before `asWarning`.
 */
export const severityOf = (
  report: Report,
  overrides: SeverityOverrides = {}
): ReportSeverity => {
  const kind = reportKindOf(report);
  if (overrides.asError?.has(kind)) return "error";
  if (overrides.asWarning?.has(kind)) return "warning";
  return classifyKind(report.category, kind);
};

const kindsWithDefaultSeverity = (
  severity: ReportSeverity
): ReadonlySet<ReportKind> =>
  new Set(reportKinds.filter((kind) => defaultSeverityOf(kind) === severity));

export const fatalReportKinds = kindsWithDefaultSeverity("fatal");
export const errorReportKinds = kindsWithDefaultSeverity("error");
export const warningReportKinds = kindsWithDefaultSeverity("warning");
export const hintReportKinds = kindsWithDefaultSeverity("hint");

const severityRank = (severity: ReportSeverity): number =>
  reportSeverities.indexOf(severity);

export const compareSeverity = (
  left: ReportSeverity,
  right: ReportSeverity
): number => severityRank(left) - severityRank(right);

export const isSeverityAtLeast = (
  severity: ReportSeverity,
  threshold: ReportSeverity
): boolean => compareSeverity(severity, threshold) >= 0;

export const countBySeverity = (
  reports: Iterable<Report>,
  overrides: SeverityOverrides = {}
): Record<ReportSeverity, number> => {
  const counts: Record<ReportSeverity, number> = {
    debug: 0,
    trace: 0,
    hint: 0,
    warning: 0,
    error: 0,
    fatal: 0,
  };
  for (const report of reports) {
    counts[severityOf(report, overrides)] += 1;
  }
  return counts;
};

export const maxSeverityOf = (
  reports: Iterable<Report>,
  overrides: SeverityOverrides = {}
): ReportSeverity | undefined => {
  let max: ReportSeverity | undefined;
  for (const report of reports) {
    const severity = severityOf(report, overrides);
    if (!max || compareSeverity(severity, max) > 0) {
      max = severity;
    }
  }
  return max;
};
