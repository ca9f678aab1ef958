import { describe, expect, it } from "vitest";
import {
  captureReportSite,
  formatReportLinePoint,
  parseStackFrames,
  stackTraceOf,
  toReportLineInfo,
  unknownReportSite,
  type ReportLinePoint,
} from "../index.js";
import { compilerSite, userPoint } from "./fixtures/reports.js";

const fabricatedStack = [
  "Error: lowering failed",
  "    at lowerCall (/compiler/sem/calls.ts:120:9)",
  "    at new Lowerer (/compiler/sem/lowerer.ts:33:15)",
  "    at file:///compiler/driver.ts:7:3",
  "    at async Promise.all (index 0)",
].join("\n");

describe("stack frames", () => {
  it("parses named, constructor and anonymous frames", () => {
    expect(parseStackFrames(fabricatedStack)).toEqual([
      {
        procName: "lowerCall",
        file: "/compiler/sem/calls.ts",
        line: 120,
        column: 9,
      },
      {
        procName: "new Lowerer",
        file: "/compiler/sem/lowerer.ts",
        line: 33,
        column: 15,
      },
      {
        procName: "<anonymous>",
        file: "/compiler/driver.ts",
        line: 7,
        column: 3,
      },
    ]);
  });

  it("reads the trace of a thrown error", () => {
    const error = new Error("lowering failed");
    error.stack = fabricatedStack;
    expect(stackTraceOf(error).map((entry) => entry.procName)).toEqual([
      "lowerCall",
      "new Lowerer",
      "<anonymous>",
    ]);
  });

  it("returns no frames for a stack without positions", () => {
    expect(parseStackFrames("Error: nothing here")).toEqual([]);
  });
});

describe("captureReportSite", () => {
  it("points at the calling code", () => {
    const site = captureReportSite();
    expect(site.file).toContain("provenance.test.ts");
    expect(site.line).toBeGreaterThan(0);
    expect(site.column).toBeGreaterThan(0);
    expect(Object.isFrozen(site)).toBe(true);
  });

  it("skips frames below the boundary", () => {
    const emitFromHelper = (): ReportLinePoint =>
      captureReportSite(emitFromHelper);
    const site = emitFromHelper();
    expect(site.file).toContain("provenance.test.ts");
  });

  it("has a placeholder for unknown sites", () => {
    expect(unknownReportSite).toEqual({ file: "<unknown>", line: 0, column: 0 });
    expect(Object.isFrozen(unknownReportSite)).toBe(true);
  });
});

describe("line info", () => {
  it("wraps a bare point and copies line info", () => {
    expect(toReportLineInfo(userPoint)).toEqual({
      kind: "point",
      point: userPoint,
    });
    const info = { kind: "point", point: userPoint } as const;
    const normalized = toReportLineInfo(info);
    expect(normalized).toEqual(info);
    expect(normalized).not.toBe(info);
    expect(Object.isFrozen(normalized)).toBe(true);
  });

  it("formats a point as file(line, column)", () => {
    expect(formatReportLinePoint(compilerSite)).toBe(
      "/compiler/sem/calls.ts(120, 9)"
    );
  });
});
