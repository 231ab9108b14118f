/**
 * Finite state machine for the reader lifecycle.
 *
 * Valid transitions:
 * - `CREATED` → `CONNECTING` | `CLOSED`
 * - `CONNECTING` → `OPEN` | `FAILED`
 * - `OPEN` → `EXHAUSTED` | `FAILED` | `CLOSED`
 * - `EXHAUSTED`, `FAILED` → `CLOSED`
 * - `CLOSED` → (terminal)
 */
export const ReaderStatus = {
  CREATED: 'CREATED',
  CONNECTING: 'CONNECTING',
  OPEN: 'OPEN',
  EXHAUSTED: 'EXHAUSTED',
  FAILED: 'FAILED',
  CLOSED: 'CLOSED',
} as const;

export type ReaderStatus = (typeof ReaderStatus)[keyof typeof ReaderStatus];

const VALID_TRANSITIONS: Record<ReaderStatus, readonly ReaderStatus[]> = {
  [ReaderStatus.CREATED]: [ReaderStatus.CONNECTING, ReaderStatus.CLOSED],
  [ReaderStatus.CONNECTING]: [ReaderStatus.OPEN, ReaderStatus.FAILED],
  [ReaderStatus.OPEN]: [ReaderStatus.EXHAUSTED, ReaderStatus.FAILED, ReaderStatus.CLOSED],
  [ReaderStatus.EXHAUSTED]: [ReaderStatus.CLOSED],
  [ReaderStatus.FAILED]: [ReaderStatus.CLOSED],
  [ReaderStatus.CLOSED]: [],
};

/** Check whether a state transition is valid according to the reader lifecycle FSM. */
export function canTransition(from: ReaderStatus, to: ReaderStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}
