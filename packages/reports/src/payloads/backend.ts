import type { BackendReportKind } from "../taxonomy.js";

export type JsonScriptParams = readonly [
  outputCurrent: string,
  output: string,
  jsonFile: string,
];

type BackendFileKind =
  | "back-cannot-write-script"
  | "back-cannot-write-mapping-file"
  | "back-produced-assembly";

type BackendDetailedKind =
  | BackendFileKind
  | "back-target-not-supported"
  | "back-json-script-mismatch";

export type BackendPayload = {
  usedCompiler?: string;
} & (
  | { kind: BackendFileKind; filename: string }
  | { kind: "back-target-not-supported"; requestedTarget: string }
  | { kind: "back-json-script-mismatch"; jsonScriptParams: JsonScriptParams }
  | { kind: Exclude<BackendReportKind, BackendDetailedKind> }
);
