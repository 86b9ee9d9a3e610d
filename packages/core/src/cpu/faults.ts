import type { FaultReason } from './exceptions.js';

export type DiagnosticLog = (message: string) => void;

export const defaultLog: DiagnosticLog = (message) => {
  // eslint-disable-next-line no-console
  console.error(message);
};

// Only overflow gets a message here; the other reasons are reported where they are detected.
export function reportFault(failure: { reason: FaultReason }, log: DiagnosticLog = defaultLog): void {
  if (failure.reason === 'integer-overflow') {
    log('Integer overflow exception.');
  }
}
