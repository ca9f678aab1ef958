/**
 * Every report kind the compiler can produce, laid out as one flat ordinal
 * space. Each category owns a contiguous run of that space; membership
 * checks compare ordinals against the run's bounds.
 *
 * New kinds must be inserted inside their category's list. Appending them
 * to another list silently moves them to that category.
 */

import { raiseConsistencyFault } from "./errors.js";

export const reportCategories = [
  "lexer",
  "parser",
  "sem",
  "cmd",
  "debug",
  "internal",
  "backend",
  "external",
] as const;

export type ReportCategory = (typeof reportCategories)[number];

export const internalReportKinds = [
  "int-unknown",
  "int-fatal",
  "int-ice",
  "int-stack-trace",
  "int-missing-stack-trace",
  "int-gc-stats",
  "int-quit-called",
  "int-assert",
  "int-source",
  "int-success-x",
] as const;

/** Malformed command-line parameters. */
export const externalCmdlineReportKinds = [
  "ext-invalid-hint",
  "ext-invalid-warning",
  "ext-invalid-command-line-option",
  "ext-only-all-off-supported",
  "ext-expected-on-or-off",
  "ext-expected-on-or-off-or-list",
  "ext-expected-cmd-argument",
  "ext-expected-no-cmd-argument",
  "ext-invalid-number",
  "ext-invalid-value",
  "ext-unexpected-value",
  "ext-invalid-path",
] as const;

export const externalReportKinds = [
  "ext-unknown-c-compiler",
  ...externalCmdlineReportKinds,
  "ext-invalid-package-name",
  "ext-deprecated",
  "ext-conf",
  "ext-path",
] as const;

export const lexerReportKinds = [
  "lex-malformed-underscores",
  "lex-invalid-integer-prefix",
  "lex-invalid-integer-suffix",
  "lex-number-not-in-range",
  "lex-invalid-integer-literal",
  "lex-deprecated-octal-prefix",
  "lex-line-too-long",
  "lex-code-begin",
  "lex-code-end",
] as const;

export const parserReportKinds = [
  "par-invalid-indentation",
  "par-name",
] as const;

export const semErrorReportKinds = [
  "sem-user-error",
  "sem-custom-error",
  "sem-custom-print-msg-and-node-error",
  "sem-type-mismatch",
  "sem-custom-user-error",
  "sem-custom-global-error",
  // calls
  "sem-call-type-mismatch",
  "sem-expression-cannot-be-called",
  "sem-wrong-number-of-arguments",
  "sem-ambiguous-call",
  "sem-calling-convention-mismatch",
  // identifier lookup
  "sem-undeclared-identifier",
  "sem-expected-identifier",
  "sem-expected-identifier-in-expr",
  // objects and object construction
  "sem-field-not-accessible",
  "sem-field-assignment-invalid",
  "sem-field-ok-but-assigned-value-invalid",
  "sem-object-constructor-incorrect",
  "sem-expression-has-no-type",
  // literals
  "sem-int-literal-expected",
  "sem-string-literal-expected",
  // pragmas
  "sem-invalid-pragma",
  "sem-illegal-custom-pragma",
  "sem-no-return-has-return",
  "sem-implicit-pragma-error",
  "sem-pragma-dynlib-requires-exportc",
  "sem-wrapped-error",
] as const;

export const semWarningReportKinds = [
  "sem-user-warning",
  "sem-unknown-magic",
] as const;

export const semHintReportKinds = [
  "sem-user-hint",
  "sem-x-declared-but-not-used",
  "sem-duplicate-module-import",
  "sem-x-cannot-raise-y",
  "sem-conv-to-base-not-needed",
  "sem-conv-from-x-to-itself-not-needed",
  "sem-processing",
  "sem-processing-stmt",
  "sem-expr-always-x",
  "sem-condition-always-true",
  "sem-condition-always-false",
  "sem-pattern",
  "sem-cannot-make-sink",
  "sem-copies-to-sink",
  "sem-global-var",
  "sem-expand-macro",
  "sem-user-raw",
  "sem-extended-context",
  "sem-implicit-obj-conv",
] as const;

export const semReportKinds = [
  ...semErrorReportKinds,
  ...semWarningReportKinds,
  ...semHintReportKinds,
] as const;

export const cmdReportKinds = [
  "cmd-executing",
  "cmd-failed-execution",
  "cmd-cc",
] as const;

export const debugReportKinds = ["dbg-test"] as const;

export const backendReportKinds = [
  "back-cannot-write-script",
  "back-cannot-write-mapping-file",
  "back-target-not-supported",
  "back-json-script-mismatch",
  "back-cannot-produce-assembly",
  "back-produced-assembly",
  "back-linking",
  "back-compiling-extra-file",
  "back-use-dyn-lib",
] as const;

export type InternalReportKind = (typeof internalReportKinds)[number];
export type ExternalReportKind = (typeof externalReportKinds)[number];
export type ExternalCmdlineReportKind =
  (typeof externalCmdlineReportKinds)[number];
export type LexerReportKind = (typeof lexerReportKinds)[number];
export type ParserReportKind = (typeof parserReportKinds)[number];
export type SemReportKind = (typeof semReportKinds)[number];
export type CmdReportKind = (typeof cmdReportKinds)[number];
export type DebugReportKind = (typeof debugReportKinds)[number];
export type BackendReportKind = (typeof backendReportKinds)[number];

export type ReportKindMap = {
  lexer: LexerReportKind;
  parser: ParserReportKind;
  sem: SemReportKind;
  cmd: CmdReportKind;
  debug: DebugReportKind;
  internal: InternalReportKind;
  backend: BackendReportKind;
  external: ExternalReportKind;
};

export type ReportKindOf<C extends ReportCategory> = ReportKindMap[C];

/** Global ordinal order. Category runs follow each other without gaps. */
export const reportKinds = [
  ...internalReportKinds,
  ...externalReportKinds,
  ...lexerReportKinds,
  ...parserReportKinds,
  ...semReportKinds,
  ...cmdReportKinds,
  ...debugReportKinds,
  ...backendReportKinds,
] as const;

export type ReportKind = (typeof reportKinds)[number];

export type ReportKindRange<C extends ReportCategory = ReportCategory> =
  readonly [first: ReportKindOf<C>, last: ReportKindOf<C>];

const kindsByCategory: {
  readonly [C in ReportCategory]: readonly ReportKindOf<C>[];
} = {
  lexer: lexerReportKinds,
  parser: parserReportKinds,
  sem: semReportKinds,
  cmd: cmdReportKinds,
  debug: debugReportKinds,
  internal: internalReportKinds,
  backend: backendReportKinds,
  external: externalReportKinds,
};

const ordinals = new Map<string, number>(
  reportKinds.map((kind, index) => [kind, index])
);

const boundsOf = <K extends string>(
  kinds: readonly K[]
): readonly [first: K, last: K] => {
  const first = kinds[0];
  const last = kinds[kinds.length - 1];
  if (first === undefined || last === undefined) {
    throw new Error("report category declares no kinds");
  }
  return [first, last];
};

const categoryRanges: {
  readonly [C in ReportCategory]: ReportKindRange<C>;
} = {
  lexer: boundsOf(lexerReportKinds),
  parser: boundsOf(parserReportKinds),
  sem: boundsOf(semReportKinds),
  cmd: boundsOf(cmdReportKinds),
  debug: boundsOf(debugReportKinds),
  internal: boundsOf(internalReportKinds),
  backend: boundsOf(backendReportKinds),
  external: boundsOf(externalReportKinds),
};

export const isReportKind = (value: string): value is ReportKind =>
  ordinals.has(value);

export const isReportCategory = (value: string): value is ReportCategory =>
  reportCategories.some((category) => category === value);

/** Position of the kind in the flat ordinal space, or -1 when unknown. */
export const kindOrdinal = (kind: string): number => ordinals.get(kind) ?? -1;

/** Inclusive bounds of the category's run. Single-kind runs have first === last. */
export const categoryRangeOf = <C extends ReportCategory>(
  category: C
): ReportKindRange<C> => categoryRanges[category];

export const kindsOfCategory = <C extends ReportCategory>(
  category: C
): readonly ReportKindOf<C>[] => kindsByCategory[category];

export const isKindInCategory = <C extends ReportCategory>(
  kind: string,
  category: C
): kind is ReportKindOf<C> => {
  const ordinal = kindOrdinal(kind);
  if (ordinal < 0) return false;
  const [first, last] = categoryRanges[category];
  return kindOrdinal(first) <= ordinal && ordinal <= kindOrdinal(last);
};

export const categoryOfKind = (kind: string): ReportCategory => {
  const category = reportCategories.find((candidate) =>
    isKindInCategory(kind, candidate)
  );
  return (
    category ?? raiseConsistencyFault({ kind: "unknown-report-kind", reportKind: kind })
  );
};
