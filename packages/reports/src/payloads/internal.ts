import type { StackTraceEntry } from "../provenance.js";
import type { DebugReportKind, InternalReportKind } from "../taxonomy.js";

export type UsedBuildParams = {
  project: string;
  output: string;
  /** Peak memory in bytes. */
  mem: number;
  isMaxMem: boolean;
  /** Wall time in seconds. */
  sec: number;
} & (
  | {
      isCompilation: true;
      threads: boolean;
      backend: string;
      buildMode: string;
      optimize: string;
      gc: string;
    }
  | { isCompilation: false }
);

type InternalDetailedKind = "int-stack-trace" | "int-assert" | "int-success-x";

/** Reports about the compiler's own execution: ICEs, traces, build summaries. */
export type InternalPayload = { message: string } & (
  | { kind: "int-stack-trace"; trace: readonly StackTraceEntry[] }
  | { kind: "int-assert"; expression: string }
  | { kind: "int-success-x"; buildParams: UsedBuildParams }
  | { kind: Exclude<InternalReportKind, InternalDetailedKind> }
);

export type DebugPayload = {
  kind: DebugReportKind;
  message: string;
};
