import { parseTypeDefinition } from '../parsers/typedef'
import { ResolveResult, TypeMetadataProvider } from '../types/surface'
import { SurfaceArchive } from './archive'
import { typeNameToEntryName } from './candidates'

/**
 * Resolves type metadata from the entries of a candidate archive.
 * Entries are parsed on first use and the outcome, found or not, is cached.
 */
export class ArchiveTypeProvider implements TypeMetadataProvider {
  private resolved: Map<string, ResolveResult> = new Map()

  constructor(private readonly archive: SurfaceArchive) {}

  public resolve(qualifiedName: string): ResolveResult {
    const cached = this.resolved.get(qualifiedName)
    if (cached) {
      return cached
    }
    const result = this.load(qualifiedName)
    this.resolved.set(qualifiedName, result)
    return result
  }

  private load(qualifiedName: string): ResolveResult {
    const entryName = typeNameToEntryName(qualifiedName)
    if (!this.archive.has(entryName)) {
      return { found: false, reason: `no archive entry ${entryName}` }
    }

    const definition = parseTypeDefinition(this.archive.read(entryName), entryName)
    if (!definition) {
      return { found: false, reason: `unrecognized type definition in ${entryName}` }
    }

    return {
      found: true,
      type: { qualifiedName, ...definition }
    }
  }
}
