import { raiseConsistencyFault } from "./errors.js";
import { traceReports } from "./log.js";
import { formatReportLinePoint } from "./provenance.js";
import { reportKindOf, type Report } from "./report.js";

/** 1-based position of a report in the ledger that issued it. */
export type ReportId = number & { readonly __brand: "ReportId" };

/** Brands an id recorded elsewhere, e.g. by external tooling. */
export const reportIdFrom = (value: number): ReportId => {
  if (!Number.isInteger(value) || value < 1) {
    return raiseConsistencyFault({ kind: "invalid-report-id", value });
  }
  return value as ReportId;
};

/**
 * Append-only record of every report produced during one compilation run.
 * Ids are never reused and stay valid for the lifetime of the ledger.
 * Independent compilation units each own their own ledger.
 */
export class ReportLedger {
  #reports: Report[] = [];

  addReport(report: Report): ReportId {
    this.#reports.push(report);
    const id = reportIdFrom(this.#reports.length);
    traceReports({
      event: "report-added",
      id,
      category: report.category,
      kind: reportKindOf(report),
      site: formatReportLinePoint(report.site),
    });
    return id;
  }

  getReport(id: ReportId): Report {
    const report = this.#reports[id - 1];
    if (!report) {
      return raiseConsistencyFault({
        kind: "unknown-report-id",
        id,
        size: this.#reports.length,
      });
    }
    return report;
  }

  get size(): number {
    return this.#reports.length;
  }

  get reports(): readonly Report[] {
    return this.#reports;
  }

  *entries(): IterableIterator<[ReportId, Report]> {
    for (const [index, report] of this.#reports.entries()) {
      yield [reportIdFrom(index + 1), report];
    }
  }

  [Symbol.iterator](): IterableIterator<Report> {
    return this.#reports.values();
  }
}
