"use strict";

export const toHex32 = (value: number, width = 0): string => {
  const masked = Number(value >>> 0);
  return "0x" + masked.toString(16).padStart(width, "0");
};

const UTF8_DECODER = new TextDecoder("utf-8", { fatal: false });
const UTF8_ENCODER = new TextEncoder();

/** Decodes the NUL-terminated UTF-8 run starting at `offset`, reading at most `maxLength` bytes. */
export const readCString = (dataView: DataView, offset: number, maxLength: number): string => {
  const limit = Math.min(dataView.byteLength, offset + maxLength);
  if (offset < 0 || offset >= limit) return "";
  let end = offset;
  while (end < limit && dataView.getUint8(end) !== 0) end += 1;
  return UTF8_DECODER.decode(new Uint8Array(dataView.buffer, dataView.byteOffset + offset, end - offset));
};

export const bufferToHex = (bytes: Uint8Array): string =>
  [...bytes].map(byteValue => byteValue.toString(16).padStart(2, "0")).join("");

export const toSafeIndex = (value: bigint, label: string, issues: string[]): number | null => {
  const num = Number(value);
  if (!Number.isSafeInteger(num) || num < 0) {
    issues.push(`${label} (${value.toString()}) is too large to index into the file.`);
    return null;
  }
  return num;
};

/** Orders strings by their UTF-8 encoding, byte by byte. */
export const compareByteOrder = (left: string, right: string): number => {
  if (left === right) return 0;
  const leftBytes = UTF8_ENCODER.encode(left);
  const rightBytes = UTF8_ENCODER.encode(right);
  const length = Math.min(leftBytes.length, rightBytes.length);
  for (let index = 0; index < length; index += 1) {
    const diff = (leftBytes[index] ?? 0) - (rightBytes[index] ?? 0);
    if (diff !== 0) return diff;
  }
  return leftBytes.length - rightBytes.length;
};
