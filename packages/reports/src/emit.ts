import { ReportLedger, type ReportId } from "./ledger.js";
import { formatReportLinePoint } from "./provenance.js";
import {
  buildReport,
  reportKindOf,
  type Report,
  type WrapReportOptions,
} from "./report.js";

type ReportsCarrier = ReportLedger | { reports: ReportLedger };

export type EmitReportOptions = WrapReportOptions & { ctx: ReportsCarrier };

const getLedger = (carrier: ReportsCarrier): ReportLedger =>
  carrier instanceof ReportLedger ? carrier : carrier.reports;

/** Wraps the payload and appends it. The site defaults to the caller. */
export const emitReport = (options: EmitReportOptions): ReportId => {
  const { ctx, ...rest } = options;
  return getLedger(ctx).addReport(buildReport(rest, emitReport));
};

/**
 * Thrown to stop a run on a report it cannot continue past. The ledger
 * keeps everything appended so far, including the report itself.
 */
export class CompilationAbortedError extends Error {
  readonly id: ReportId;
  readonly report: Report;
  readonly ledger: ReportLedger;

  constructor(id: ReportId, report: Report, ledger: ReportLedger) {
    super(
      `compilation aborted by ${reportKindOf(report)} report #${id} raised at ${formatReportLinePoint(report.site)}`
    );
    this.name = "CompilationAbortedError";
    this.id = id;
    this.report = report;
    this.ledger = ledger;
  }
}

export const abortWithReport = (options: EmitReportOptions): never => {
  const { ctx, ...rest } = options;
  const ledger = getLedger(ctx);
  const report = buildReport(rest, abortWithReport);
  const id = ledger.addReport(report);
  throw new CompilationAbortedError(id, report, ledger);
};
