import type { ReportCategory } from "../taxonomy.js";
import type { BackendPayload } from "./backend.js";
import type { CmdPayload } from "./cmd.js";
import type { ExternalPayload } from "./external.js";
import type { DebugPayload, InternalPayload } from "./internal.js";
import type { SemPayload } from "./sem.js";
import type { LexerPayload, ParserPayload } from "./syntax.js";

export * from "./backend.js";
export * from "./cmd.js";
export * from "./external.js";
export * from "./internal.js";
export * from "./sem.js";
export * from "./syntax.js";

export type ReportPayloadMap = {
  lexer: LexerPayload;
  parser: ParserPayload;
  sem: SemPayload;
  cmd: CmdPayload;
  debug: DebugPayload;
  internal: InternalPayload;
  backend: BackendPayload;
  external: ExternalPayload;
};

export type ReportPayloadOf<C extends ReportCategory> = ReportPayloadMap[C];

export type ReportPayload = ReportPayloadMap[ReportCategory];
