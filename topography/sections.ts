import { join } from "node:path";
import type { Parameter, SectionDescriptor } from "./config.ts";

/** `[Elevation Anterior]` → `Elevation Anterior` (directory name). */
export function sectionDirName(tag: string): string {
  return tag.replace(/^[[\]]+|[[\]]+$/g, "");
}

/** `[Elevation Anterior]` → `Elevation_Anterior` (file-name prefix). */
export function sectionFilePrefix(tag: string): string {
  return sectionDirName(tag).replace(/ /g, "_");
}

/** Output for one section of `inputName`; the extension is lower-cased to `.csv`. */
export function sectionOutputPath(outDir: string, desc: SectionDescriptor, inputName: string): string {
  const name = inputName.replace(/\.csv$/i, ".csv");
  return join(outDir, sectionDirName(desc.tag), `${sectionFilePrefix(desc.tag)}_${name}`);
}

/** Where the assembler looks for one parameter of one sample. */
export function parameterPath(baseDir: string, param: Parameter, sampleId: string): string {
  return join(baseDir, param.replace(/_/g, " "), `${param}_${sampleId}.csv`);
}
