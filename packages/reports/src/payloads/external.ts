import type { ExternalCmdlineReportKind } from "../taxonomy.js";

/** Reads of the environment: configuration files, flags, packages. */
export type ExternalPayload =
  | {
      kind: ExternalCmdlineReportKind;
      cmdlineSwitch: string;
      cmdlineProvided: string;
      cmdlineAllowed: readonly string[];
      cmdlineError: string;
    }
  | {
      kind: "ext-unknown-c-compiler";
      knownCompilers: readonly string[];
      passedCompiler: string;
    }
  | { kind: "ext-deprecated"; message: string }
  | { kind: "ext-invalid-package-name"; packageName: string }
  | { kind: "ext-path"; packagePath: string }
  | { kind: "ext-conf"; configFile: string };
