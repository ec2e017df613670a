// Commands only record the code; the process exits once stdin and timers drain.
export function setExitCode(code: number): void {
  process.exitCode = code;
}
