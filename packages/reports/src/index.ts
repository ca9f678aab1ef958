export * from "./taxonomy.js";
export * from "./payloads/index.js";
export * from "./provenance.js";
export * from "./severity.js";
export * from "./ledger.js";
export * from "./emit.js";
export * from "./policy.js";
export {
  ReportConsistencyError,
  type ReportConsistencyFault,
} from "./errors.js";
export { isReportTraceEnabled } from "./log.js";
export {
  wrapReport,
  reportKindOf,
  isReportOf,
  withInstantiationContext,
  type Report,
  type ReportOf,
  type ReportDraft,
  type WrapReportOptions,
} from "./report.js";
