import fs from "fs/promises";
import path from "path";
import { CaptureTimestamp, OUTPUT_EXTENSION, OutputPlan } from "../models";
import { pad } from "../utils/format";

export type ExistencePredicate = (fileName: string) => boolean | Promise<boolean>;

/** `YYYY-MM-DD-HHMM`; seconds are dropped. */
export function formatTimestamp(timestamp: CaptureTimestamp): string {
  return `${pad(timestamp.year, 4)}-${pad(timestamp.month)}-${pad(
    timestamp.day
  )}-${pad(timestamp.hour)}${pad(timestamp.minute)}`;
}

export function buildBaseName(event: string, timestamp: CaptureTimestamp): string {
  return `${event}-${formatTimestamp(timestamp)}`;
}

export function candidateName(baseName: string, counter?: number): string {
  return counter === undefined
    ? `${baseName}${OUTPUT_EXTENSION}`
    : `${baseName}-${counter}${OUTPUT_EXTENSION}`;
}

/**
 * First of `<base>.jpg`, `<base>-1.jpg`, `<base>-2.jpg`, ... that `exists`
 * rejects, along with the counter that produced it.
 */
export async function resolveUniqueName(
  baseName: string,
  exists: ExistencePredicate
): Promise<{ fileName: string; counter?: number }> {
  let fileName = candidateName(baseName);
  if (!(await exists(fileName))) {
    return { fileName };
  }

  let counter = 1;
  fileName = candidateName(baseName, counter);
  while (await exists(fileName)) {
    counter++;
    fileName = candidateName(baseName, counter);
  }
  return { fileName, counter };
}

export function fileExistsIn(directory: string): ExistencePredicate {
  return async (fileName) => {
    try {
      await fs.access(path.join(directory, fileName));
      return true;
    } catch (error) {
      return false;
    }
  };
}

export async function planOutput(
  event: string,
  timestamp: CaptureTimestamp,
  exists: ExistencePredicate
): Promise<OutputPlan> {
  const { fileName, counter } = await resolveUniqueName(
    buildBaseName(event, timestamp),
    exists
  );
  return { event, timestamp, counter, fileName };
}
