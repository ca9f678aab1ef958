import { fileURLToPath } from "node:url";

/** A single position, either in user source or in the compiler itself. */
export type ReportLinePoint = {
  readonly file: string;
  readonly line: number;
  readonly column: number;
};

export type ReportLineRange = {
  readonly file: string;
  readonly startLine: number;
  readonly endLine: number;
  readonly startColumn: number;
  readonly endColumn: number;
};

export type ReportLineInfo =
  | { readonly kind: "point"; readonly point: ReportLinePoint }
  | { readonly kind: "range"; readonly range: ReportLineRange };

/** Symbol as seen by a report consumer, detached from compiler internals. */
export type ReportSymbol = {
  readonly name: string;
  readonly kind: string;
  readonly location?: ReportLinePoint;
};

/**
 * One step of the generic instantiation chain that led to a report.
 * Chains are ordered oldest-first.
 */
export type ReportContext =
  | {
      readonly kind: "instantiation-of";
      readonly location: ReportLinePoint;
      readonly entry: ReportSymbol;
    }
  | { readonly kind: "instantiation-from"; readonly location: ReportLinePoint };

export type StackTraceEntry = {
  procName: string;
  file: string;
  line: number;
  column?: number;
};

export type CaptureBoundary = (...args: never[]) => unknown;

export const unknownReportSite: ReportLinePoint = Object.freeze({
  file: "<unknown>",
  line: 0,
  column: 0,
});

const framePattern = /^\s*at (?:(.+?) \()?(.+?):(\d+):(\d+)\)?$/;

const normalizeFrameFile = (file: string): string =>
  file.startsWith("file:///") ? fileURLToPath(file) : file;

export const parseStackFrames = (stack: string): StackTraceEntry[] =>
  stack.split("\n").flatMap((line) => {
    const match = framePattern.exec(line);
    if (!match) return [];
    const [, procName, file, lineText, columnText] = match;
    if (!file || !lineText || !columnText) return [];
    return [
      {
        procName: procName ?? "<anonymous>",
        file: normalizeFrameFile(file),
        line: Number(lineText),
        column: Number(columnText),
      },
    ];
  });

export const stackTraceOf = (error: Error): StackTraceEntry[] =>
  parseStackFrames(error.stack ?? "");

/**
 * Position of the code that called `boundary`. Frames for `boundary` and
 * everything it called are dropped by the host before parsing.
 */
export const captureReportSite: (
  boundary?: CaptureBoundary
) => ReportLinePoint = (boundary = captureReportSite) => {
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, boundary);
  const frame = parseStackFrames(holder.stack ?? "")[0];
  if (!frame) return unknownReportSite;
  return Object.freeze({
    file: frame.file,
    line: frame.line,
    column: frame.column ?? 0,
  });
};

/** Frozen copies for storage in a report. */
export const freezeLinePoint = (point: ReportLinePoint): ReportLinePoint =>
  Object.freeze({ file: point.file, line: point.line, column: point.column });

const freezeLineRange = (range: ReportLineRange): ReportLineRange =>
  Object.freeze({
    file: range.file,
    startLine: range.startLine,
    endLine: range.endLine,
    startColumn: range.startColumn,
    endColumn: range.endColumn,
  });

export const toReportLineInfo = (
  location: ReportLinePoint | ReportLineInfo
): ReportLineInfo => {
  if (!("kind" in location)) {
    return Object.freeze({ kind: "point", point: freezeLinePoint(location) });
  }
  return location.kind === "point"
    ? Object.freeze({ kind: "point", point: freezeLinePoint(location.point) })
    : Object.freeze({ kind: "range", range: freezeLineRange(location.range) });
};

const freezeSymbol = (symbol: ReportSymbol): ReportSymbol =>
  Object.freeze({
    name: symbol.name,
    kind: symbol.kind,
    ...(symbol.location ? { location: freezeLinePoint(symbol.location) } : {}),
  });

export const freezeReportContext = (entry: ReportContext): ReportContext =>
  entry.kind === "instantiation-of"
    ? Object.freeze({
        kind: "instantiation-of",
        location: freezeLinePoint(entry.location),
        entry: freezeSymbol(entry.entry),
      })
    : Object.freeze({
        kind: "instantiation-from",
        location: freezeLinePoint(entry.location),
      });

export const formatReportLinePoint = (point: ReportLinePoint): string =>
  `${point.file}(${point.line}, ${point.column})`;
