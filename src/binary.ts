export const INT32_BYTES = 4;
export const INT64_BYTES = 8;
export const CODE_UNIT_BYTES = 2;

export function readInt32BE(buf: Uint8Array, offset = 0): number {
  const view = new DataView(buf.buffer, buf.byteOffset, buf.byteLength);
  return view.getInt32(offset, false);
}

export function readInt64BE(buf: Uint8Array, offset = 0): bigint {
  const view = new DataView(buf.buffer, buf.byteOffset, buf.byteLength);
  return view.getBigInt64(offset, false);
}

export function encodeInt32BE(value: number): Uint8Array {
  const out = new Uint8Array(INT32_BYTES);
  new DataView(out.buffer).setInt32(0, value, false);
  return out;
}

export function encodeInt64BE(value: bigint): Uint8Array {
  const out = new Uint8Array(INT64_BYTES);
  new DataView(out.buffer).setBigInt64(0, value, false);
  return out;
}

export function writeCodeUnitBE(buf: Uint8Array, offset: number, unit: number): void {
  buf[offset] = (unit >>> 8) & 0xff;
  buf[offset + 1] = unit & 0xff;
}

/** Decode big-endian UTF-16 code units; `bytes.length` must be even. */
export function decodeCodeUnitsBE(bytes: Uint8Array): string {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const units: number[] = [];
  for (let offset = 0; offset + 1 < bytes.length; offset += CODE_UNIT_BYTES) {
    units.push(view.getUint16(offset, false));
  }
  let out = '';
  // fromCharCode takes units as call arguments, so batch them
  for (let i = 0; i < units.length; i += 4096) {
    out += String.fromCharCode(...units.slice(i, i + 4096));
  }
  return out;
}
