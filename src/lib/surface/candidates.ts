export const DEFINITION_EXTENSION = '.json'
export const DEFAULT_NAMESPACE_ROOTS: readonly string[] = ['java', 'org']

/**
 * Derives the sorted list of top-level candidate type names from archive entry paths.
 * Keeps type definition entries under one of the namespace roots and ignores nested types,
 * whose entry names contain `$`.
 */
export function candidateTypeNames(
  entryNames: Iterable<string>,
  roots: readonly string[] = DEFAULT_NAMESPACE_ROOTS
): string[] {
  const names = new Set<string>()
  for (const entryName of entryNames) {
    if (!entryName.endsWith(DEFINITION_EXTENSION)) continue
    if (!roots.some(root => entryName.startsWith(root))) continue
    if (entryName.includes('$')) continue
    names.add(entryNameToTypeName(entryName))
  }
  return [...names].sort()
}

export function entryNameToTypeName(entryName: string): string {
  return entryName.slice(0, -DEFINITION_EXTENSION.length).replace(/\//g, '.')
}

export function typeNameToEntryName(qualifiedName: string): string {
  return qualifiedName.replace(/\./g, '/') + DEFINITION_EXTENSION
}
