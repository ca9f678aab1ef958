import { traceReports } from "./log.js";
import type { ReportCategory, ReportKindRange } from "./taxonomy.js";

/**
 * Faults raised when a compiler phase misuses the reports core. They mark a
 * defect in the caller and are never turned into user-facing reports.
 */
export type ReportConsistencyFault =
  | {
      kind: "kind-outside-category";
      category: ReportCategory;
      reportKind: string;
      range: ReportKindRange;
    }
  | { kind: "unknown-report-kind"; reportKind: string }
  | { kind: "unknown-report-id"; id: number; size: number }
  | { kind: "invalid-report-id"; value: number };

const describeFault = (fault: ReportConsistencyFault): string => {
  switch (fault.kind) {
    case "kind-outside-category":
      return `report kind ${fault.reportKind} is outside the ${fault.category} range [${fault.range[0]} .. ${fault.range[1]}]`;
    case "unknown-report-kind":
      return `unknown report kind ${fault.reportKind}`;
    case "unknown-report-id":
      return `report id ${fault.id} was never issued by this ledger (size ${fault.size})`;
    case "invalid-report-id":
      return `report ids are positive integers, got ${fault.value}`;
  }
  return exhaustive(fault);
};

export class ReportConsistencyError extends Error {
  readonly fault: ReportConsistencyFault;

  constructor(fault: ReportConsistencyFault) {
    super(describeFault(fault));
    this.name = "ReportConsistencyError";
    this.fault = fault;
  }
}

export const raiseConsistencyFault = (fault: ReportConsistencyFault): never => {
  const error = new ReportConsistencyError(fault);
  traceReports({
    event: "consistency-fault",
    fault: fault.kind,
    message: error.message,
  });
  throw error;
};

export const exhaustive = (_value: never): never => _value;
