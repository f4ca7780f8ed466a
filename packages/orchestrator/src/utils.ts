/** Code-unit order, independent of the process locale. */
export function compareNames(left: string, right: string): number {
  if (left < right) {
    return -1;
  }
  return left > right ? 1 : 0;
}

export function sortedNames(values: Iterable<string>): string[] {
  return Array.from(values).sort(compareNames);
}
