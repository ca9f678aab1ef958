import type { ExternalPayload } from "./payloads/index.js";
import type { SeverityOverrides } from "./severity.js";
import { isReportKind, type ReportKind } from "./taxonomy.js";

/** Kind names as a flag parser hands them over, e.g. from `--warningAsError`. */
export type ReportPolicyInput = {
  asError?: Iterable<string>;
  asWarning?: Iterable<string>;
};

export type ReportPolicy = Required<SeverityOverrides>;

export type ResolvedReportPolicy = {
  policy: ReportPolicy;
  /** One `ext-invalid-warning` payload per name that is not a report kind. */
  rejected: readonly ExternalPayload[];
};

type PolicySwitch = keyof ReportPolicyInput;

const rejectKindName = (
  cmdlineSwitch: PolicySwitch,
  name: string
): ExternalPayload => ({
  kind: "ext-invalid-warning",
  cmdlineSwitch,
  cmdlineProvided: name,
  cmdlineAllowed: [],
  cmdlineError: `unknown report kind ${name}`,
});

const toKindSet = (
  cmdlineSwitch: PolicySwitch,
  names: Iterable<string>,
  rejected: ExternalPayload[]
): ReadonlySet<ReportKind> => {
  const kinds = new Set<ReportKind>();
  for (const name of names) {
    if (isReportKind(name)) {
      kinds.add(name);
    } else {
      rejected.push(rejectKindName(cmdlineSwitch, name));
    }
  }
  return kinds;
};

/**
 * Builds the override sets `severityOf` takes. Policies are plain values
 * passed per query, so one ledger can be judged under several of them.
 *
 * Unknown names are user input, not a misuse of the core: they are skipped
 * and handed back as external payloads for the caller to report.
 */
export const resolveReportPolicy = (
  input: ReportPolicyInput = {}
): ResolvedReportPolicy => {
  const rejected: ExternalPayload[] = [];
  const policy: ReportPolicy = Object.freeze({
    asError: toKindSet("asError", input.asError ?? [], rejected),
    asWarning: toKindSet("asWarning", input.asWarning ?? [], rejected),
  });
  return { policy, rejected: Object.freeze(rejected) };
};

export const emptyReportPolicy: ReportPolicy = resolveReportPolicy().policy;
