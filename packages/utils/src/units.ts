export const MIB = 1024 * 1024;

/**
 * Whole mebibytes, rounded down
 */
export function toMiB(bytes: number): number {
  return Math.floor(bytes / MIB);
}

export function fromMiB(mib: number): number {
  return Math.round(mib * MIB);
}
