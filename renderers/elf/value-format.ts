"use strict";

import { toHex32 } from "../../binary-utils.js";

export const formatElfHex = (value: bigint | number, width?: number): string => {
  if (typeof value === "bigint") {
    const hex = value.toString(16);
    const pad = width ? hex.padStart(width, "0") : hex;
    return `0x${pad}`;
  }
  return toHex32(value, width || 0);
};

export const formatElfFlags = (mask: bigint, names: string[], width = 8): string => {
  const hex = formatElfHex(mask, width);
  return names.length ? `${hex} (${names.join(" | ")})` : hex;
};

export const formatElfLabel = (name: string | null, value: number): string =>
  name ? `${name} (${value})` : `Unknown (${value})`;
