import { describe, expect, it } from "vitest";
import {
  compareSeverity,
  countBySeverity,
  defaultSeverityOf,
  errorReportKinds,
  fatalReportKinds,
  hintReportKinds,
  isKindInCategory,
  isSeverityAtLeast,
  kindsOfCategory,
  maxSeverityOf,
  reportCategories,
  semErrorReportKinds,
  semHintReportKinds,
  semReportKinds,
  semWarningReportKinds,
  severityBucketsOf,
  severityOf,
  warningReportKinds,
  wrapReport,
  type ReportKind,
} from "../index.js";
import {
  compilerSite,
  executingReport,
  iceReport,
  lineTooLongReport,
  typeMismatchReport,
  userWarningReport,
} from "./fixtures/reports.js";

describe("severity buckets", () => {
  it("keeps each category's buckets disjoint and inside the category", () => {
    for (const category of reportCategories) {
      const buckets = severityBucketsOf(category);
      const seen = new Set<string>();
      for (const bucket of [
        buckets.fatal,
        buckets.error,
        buckets.warning,
        buckets.hint,
      ]) {
        for (const kind of bucket ?? []) {
          expect(seen.has(kind)).toBe(false);
          expect(isKindInCategory(kind, category)).toBe(true);
          seen.add(kind);
        }
      }
    }
  });

  it("partitions the sem range into error, warning and hint kinds", () => {
    const classified = semReportKinds.map(defaultSeverityOf);
    expect(classified).toEqual([
      ...semErrorReportKinds.map(() => "error"),
      ...semWarningReportKinds.map(() => "warning"),
      ...semHintReportKinds.map(() => "hint"),
    ]);
  });

  it("derives the global severity sets from the category buckets", () => {
    expect([...fatalReportKinds]).toEqual(["int-unknown", "int-fatal", "int-ice"]);
    expect(errorReportKinds.size).toBe(52);
    expect([...warningReportKinds]).toEqual([
      "ext-deprecated",
      "lex-deprecated-octal-prefix",
      "sem-user-warning",
      "sem-unknown-magic",
    ]);
    expect(hintReportKinds.size).toBe(25);
  });

  it("falls back to trace for progress kinds and debug for test kinds", () => {
    expect(defaultSeverityOf("lex-code-begin")).toBe("trace");
    expect(defaultSeverityOf("int-stack-trace")).toBe("trace");
    expect(defaultSeverityOf("ext-conf")).toBe("trace");
    for (const kind of kindsOfCategory("cmd")) {
      expect(defaultSeverityOf(kind)).toBe("trace");
    }
    expect(defaultSeverityOf("dbg-test")).toBe("debug");
  });
});

describe("severityOf", () => {
  it("classifies reports by their category defaults", () => {
    expect(severityOf(typeMismatchReport())).toBe("error");
    expect(severityOf(userWarningReport())).toBe("warning");
    expect(severityOf(lineTooLongReport())).toBe("hint");
    expect(severityOf(executingReport())).toBe("trace");
    expect(severityOf(iceReport())).toBe("fatal");
    expect(
      severityOf(
        wrapReport({
          category: "debug",
          payload: { kind: "dbg-test", message: "probe" },
          site: compilerSite,
        })
      )
    ).toBe("debug");
  });

  it("lets overrides promote or demote a kind", () => {
    const report = lineTooLongReport();
    const promoted = new Set<ReportKind>(["lex-line-too-long"]);

    expect(severityOf(report, { asError: promoted })).toBe("error");
    expect(severityOf(report, { asWarning: promoted })).toBe("warning");
    expect(severityOf(report, { asError: promoted, asWarning: promoted })).toBe(
      "error"
    );
    expect(severityOf(report)).toBe("hint");
  });

  it("overrides even fatal defaults", () => {
    const report = iceReport();
    expect(
      severityOf(report, { asWarning: new Set<ReportKind>(["int-ice"]) })
    ).toBe("warning");
  });
});

describe("severity ordering", () => {
  it("ranks debug lowest and fatal highest", () => {
    expect(compareSeverity("debug", "fatal")).toBeLessThan(0);
    expect(compareSeverity("error", "warning")).toBeGreaterThan(0);
    expect(compareSeverity("hint", "hint")).toBe(0);
    expect(isSeverityAtLeast("error", "warning")).toBe(true);
    expect(isSeverityAtLeast("warning", "warning")).toBe(true);
    expect(isSeverityAtLeast("hint", "warning")).toBe(false);
  });

  it("counts reports per severity under a policy", () => {
    const reports = [
      typeMismatchReport(),
      lineTooLongReport(),
      lineTooLongReport(),
      executingReport(),
    ];

    expect(countBySeverity(reports)).toEqual({
      debug: 0,
      trace: 1,
      hint: 2,
      warning: 0,
      error: 1,
      fatal: 0,
    });
    expect(
      countBySeverity(reports, {
        asError: new Set<ReportKind>(["lex-line-too-long"]),
      })
    ).toEqual({
      debug: 0,
      trace: 1,
      hint: 0,
      warning: 0,
      error: 3,
      fatal: 0,
    });
  });

  it("finds the highest severity present", () => {
    expect(maxSeverityOf([lineTooLongReport(), userWarningReport()])).toBe(
      "warning"
    );
    expect(maxSeverityOf([executingReport(), iceReport()])).toBe("fatal");
    expect(maxSeverityOf([])).toBeUndefined();
  });
});
