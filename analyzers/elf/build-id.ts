"use strict";

import { bufferToHex } from "../../binary-utils.js";
import { NT_GNU_BUILD_ID, SHT_NOTE } from "./constants.js";
import type { ElfSection, ExtractResult } from "./types.js";

export const BUILD_ID_SECTION = ".note.gnu.build-id";
export const BUILD_ID_UNAVAILABLE = "N/A";

const NOTE_HEADER_SIZE = 12;
const GNU_NOTE_NAME = [0x47, 0x4e, 0x55, 0x00];

const isGnuName = (name: Uint8Array): boolean =>
  name.length === GNU_NOTE_NAME.length && GNU_NOTE_NAME.every((byte, index) => name[index] === byte);

/**
 * Decodes the first note of a `.note.gnu.build-id` section. The section must
 * hold exactly one GNU build-id note: the descriptor has to end where the
 * section ends, so trailing bytes count as out of bounds.
 */
export function decodeBuildId(section: ElfSection | null): ExtractResult<string> {
  if (!section) return { status: "not-applicable", reason: `No ${BUILD_ID_SECTION} section.` };
  if (section.type !== SHT_NOTE) {
    return { status: "not-applicable", reason: `Section "${section.name}" is not SHT_NOTE (type ${section.type}).` };
  }
  const { content, littleEndian } = section;
  if (content.length < NOTE_HEADER_SIZE) {
    return { status: "truncated", reason: `Note header needs ${NOTE_HEADER_SIZE} bytes, section has ${content.length}.` };
  }
  const dv = new DataView(content.buffer, content.byteOffset, content.byteLength);
  const namesz = dv.getUint32(0, littleEndian);
  const descsz = dv.getUint32(4, littleEndian);
  const type = dv.getUint32(8, littleEndian);

  const nameEnd = NOTE_HEADER_SIZE + namesz;
  if (nameEnd > content.length) {
    return { status: "truncated", reason: `Note name (${namesz} bytes) runs past the section end.` };
  }
  if (type !== NT_GNU_BUILD_ID || !isGnuName(content.subarray(NOTE_HEADER_SIZE, nameEnd))) {
    return { status: "not-applicable", reason: `First note is not a GNU build-id (type ${type}).` };
  }

  const descriptorEnd = nameEnd + descsz;
  if (descriptorEnd !== content.length) {
    return {
      status: "out-of-bounds",
      reason: `Build-id descriptor ends at ${descriptorEnd}, section length is ${content.length}.`
    };
  }
  return { status: "ok", value: bufferToHex(content.subarray(nameEnd, descriptorEnd)) };
}

export const formatBuildId = (result: ExtractResult<string>): string =>
  result.status === "ok" ? result.value : BUILD_ID_UNAVAILABLE;
