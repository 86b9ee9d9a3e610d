export function toInt32(x: number): number {
  return x | 0;
}

// Replicates bit 15 into the upper half; result is a signed 32-bit number
export function signExtend16(x: number): number {
  x = x & 0xffff;
  return (x & 0x8000) ? (x | 0xffff0000) : x;
}

export function zeroExtend16(x: number): number {
  return x & 0xffff;
}

// Byte 0 is the most significant. Callers check bounds first.
export function readU32BE(bytes: Uint8Array, offset: number): number {
  const b0 = bytes[offset] ?? 0;
  const b1 = bytes[offset + 1] ?? 0;
  const b2 = bytes[offset + 2] ?? 0;
  const b3 = bytes[offset + 3] ?? 0;
  return (
    (b0 << 24) |
    (b1 << 16) |
    (b2 << 8) |
    (b3 << 0)
  ) >>> 0;
}

export function writeU32BE(bytes: Uint8Array, offset: number, value: number): void {
  bytes[offset] = (value >>> 24) & 0xff;
  bytes[offset + 1] = (value >>> 16) & 0xff;
  bytes[offset + 2] = (value >>> 8) & 0xff;
  bytes[offset + 3] = value & 0xff;
}

// 64-bit product via BigInt; hi/lo come back as signed 32-bit halves
export function mul64Signed(a: number, b: number): { hi: number; lo: number } {
  const P = BigInt(toInt32(a)) * BigInt(toInt32(b));
  const lo = Number(BigInt.asIntN(32, P));
  const hi = Number(BigInt.asIntN(32, P >> BigInt(32)));
  return { hi, lo };
}

// Unpadded, for display
export function hex(x: number): string {
  return `0x${(x >>> 0).toString(16)}`;
}

export function hex32(x: number): string {
  return `0x${(x >>> 0).toString(16).padStart(8, '0')}`;
}
