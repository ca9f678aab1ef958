const REPORTS_TRACE_ENV = "COMPILER_REPORTS_TRACE";

const traceFlagValues: ReadonlySet<string> = new Set(["1", "true", "yes"]);

/** Read on every event. */
export const isReportTraceEnabled = (): boolean => {
  const flag = process.env[REPORTS_TRACE_ENV]?.trim().toLowerCase();
  return flag !== undefined && traceFlagValues.has(flag);
};

export type ReportTraceEvent =
  | {
      event: "report-added";
      id: number;
      category: string;
      kind: string;
      site: string;
    }
  | { event: "consistency-fault"; fault: string; message: string };

export const traceReports = (entry: ReportTraceEvent): void => {
  if (!isReportTraceEnabled()) {
    return;
  }
  console.error(`[compiler:reports] ${JSON.stringify(entry)}`);
};
