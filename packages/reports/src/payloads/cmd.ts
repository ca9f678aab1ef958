/** External command execution: start, failure and C compiler invocations. */
export type CmdPayload = {
  cmd: string;
  message: string;
  code: number;
} & (
  | { kind: "cmd-executing" }
  | { kind: "cmd-failed-execution"; exitOut: string; exitErr: string }
  | { kind: "cmd-cc"; packageName: string }
);
