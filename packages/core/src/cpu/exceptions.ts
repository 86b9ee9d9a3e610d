import { hex } from '../utils/bit.js';

export type FaultReason = 'invalid-program' | 'unrecognized-instruction' | 'unrecognized-syscall' | 'integer-overflow';

export class ExecutionFault extends Error {
  constructor(public readonly reason: FaultReason, public readonly ip: number, message?: string) {
    super(message ?? `${reason} at ${hex(ip)}`);
    this.name = 'ExecutionFault';
  }
}
