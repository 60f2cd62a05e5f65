/**
 * Thread Dump Types
 *
 * Normalized view of the JSON served by `/actuator/threaddump`.
 */

/**
 * One stack frame.
 */
export interface StackFrame {
  className: string;
  methodName: string;
  /** Source line, negative or null when unknown (native methods) */
  lineNumber: number | null;
  /** Index in the dump's raw stack trace, 0 for the top frame */
  depth: number;
}

/**
 * One thread's state and call stack, top frame first.
 */
export interface ThreadDumpEntry {
  name: string;
  id: number | null;
  /** Thread state label (`BLOCKED`, `WAITING`, `RUNNABLE`, ...) */
  state: string;
  /** Well-formed frames only; `depth` keeps each one's place in the raw trace */
  frames: StackFrame[];
}
