import type { ReportLinePoint, ReportSymbol } from "../provenance.js";
import type { SemReportKind } from "../taxonomy.js";

/** Expression tree snapshot taken when the report was raised. */
export type ReportNode = {
  kind: string;
  rendered: string;
  location?: ReportLinePoint;
  children?: readonly ReportNode[];
};

export type EffectsCompat =
  | "compatible"
  | "raises-differ"
  | "raises-unknown"
  | "tags-differ"
  | "tags-unknown"
  | "lock-levels-differ"
  | "effects-delayed";

export type CallConvMismatch =
  | "no-side-effect"
  | "not-gc-safe"
  | "lock-difference"
  | "not-iterator"
  | "different-call-conv";

export type SemTypeMismatch = {
  actualType: string;
  wantedType: string;
  description: string;
  effectsCompat: EffectsCompat;
  convMismatch: readonly CallConvMismatch[];
};

export type SemCallMismatchReason =
  | { kind: "type-mismatch"; typeMismatch: SemTypeMismatch }
  | {
      kind:
        | "positional-already-given"
        | "unknown-named-param"
        | "already-given"
        | "missing-param";
      nameParam: string;
    }
  | { kind: "var-needed" | "extra-argument" | "unknown" };

/** Why a single overload candidate was rejected. */
export type SemCallMismatch = {
  target: ReportSymbol;
  expression?: ReportNode;
  /** Index of the offending argument. */
  arg: number;
  reason: SemCallMismatchReason;
};

type SemDetailedKind =
  | "sem-expand-macro"
  | "sem-pattern"
  | "sem-type-mismatch"
  | "sem-call-type-mismatch";

export type SemPayload = {
  /** Rendered form of the expression the report is about. */
  expression?: string;
  message?: string;
} & (
  | { kind: "sem-expand-macro" | "sem-pattern"; originalExpr: ReportNode }
  | { kind: "sem-type-mismatch"; typeMismatch: SemTypeMismatch }
  | {
      kind: "sem-call-type-mismatch";
      callMismatches: readonly SemCallMismatch[];
    }
  | { kind: Exclude<SemReportKind, SemDetailedKind> }
);
