import type { LexerReportKind } from "../taxonomy.js";

export type LexerPayload = {
  kind: LexerReportKind;
  message: string;
};

export type ParserPayload =
  | { kind: "par-invalid-indentation"; message: string }
  | {
      kind: "par-name";
      /** Identifier flagged by the naming linter. */
      name: string;
      message: string;
    };
