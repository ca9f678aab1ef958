import { reportBrand } from "./brand.js";
import { raiseConsistencyFault } from "./errors.js";
import type { ReportPayloadOf } from "./payloads/index.js";
import {
  captureReportSite,
  freezeLinePoint,
  freezeReportContext,
  toReportLineInfo,
  type CaptureBoundary,
  type ReportContext,
  type ReportLineInfo,
  type ReportLinePoint,
} from "./provenance.js";
import {
  categoryRangeOf,
  isKindInCategory,
  type ReportCategory,
  type ReportKind,
} from "./taxonomy.js";

type ReportEnvelope<C extends ReportCategory> = {
  readonly category: C;
  readonly payload: ReportPayloadOf<C>;
  /** Where in the compiler the report was constructed. */
  readonly site: ReportLinePoint;
  /** Where in user source the condition was detected. */
  readonly location?: ReportLineInfo;
  /** Instantiation chain, oldest first. */
  readonly context: readonly ReportContext[];
  readonly [reportBrand]: true;
};

export type Report = {
  [C in ReportCategory]: ReportEnvelope<C>;
}[ReportCategory];

export type ReportOf<C extends ReportCategory> = Extract<Report, { category: C }>;

export type ReportDraft = {
  [C in ReportCategory]: { category: C; payload: ReportPayloadOf<C> };
}[ReportCategory];

export type WrapReportOptions = ReportDraft & {
  site?: ReportLinePoint;
  location?: ReportLinePoint | ReportLineInfo;
  context?: readonly ReportContext[];
};

/** @internal Shared by the public constructors so the captured site skips them. */
export const buildReport = (
  options: WrapReportOptions,
  boundary: CaptureBoundary
): Report => {
  const { site, location, context, ...draft } = options;
  if (!isKindInCategory(draft.payload.kind, draft.category)) {
    return raiseConsistencyFault({
      kind: "kind-outside-category",
      category: draft.category,
      reportKind: draft.payload.kind,
      range: categoryRangeOf(draft.category),
    });
  }

  return Object.freeze({
    ...draft,
    site: site ? freezeLinePoint(site) : captureReportSite(boundary),
    ...(location ? { location: toReportLineInfo(location) } : {}),
    context: Object.freeze(context ? context.map(freezeReportContext) : []),
    [reportBrand]: true as const,
  });
};

/**
 * The only way to obtain a {@link Report}. Fails with a
 * `ReportConsistencyError` when the payload kind lies outside the
 * category's range. Without an explicit `site`, the caller's position is
 * recorded.
 */
export const wrapReport = (options: WrapReportOptions): Report =>
  buildReport(options, wrapReport);

export const reportKindOf = (report: Report): ReportKind => report.payload.kind;

export const isReportOf = <C extends ReportCategory>(
  report: Report,
  category: C
): report is ReportOf<C> => report.category === category;

/**
 * Adds an outer instantiation step as the report bubbles up. The step goes
 * first since outer instantiations happened earlier.
 */
export const withInstantiationContext = (
  report: Report,
  entry: ReportContext
): Report =>
  Object.freeze({
    ...report,
    context: Object.freeze([freezeReportContext(entry), ...report.context]),
  });
