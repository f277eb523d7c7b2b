import { TypeDefinition } from '../../types/surface'

/**
 * A function that attempts to turn an archive entry payload into a TypeDefinition.
 * @param payload The entry payload: raw text for directory entries, a parsed value for bundle entries.
 * @param entryName The archive entry path, for diagnostics.
 * @returns The definition, or null if the payload is not in this parser's format.
 */
export type TypeDefinitionParser = (payload: unknown, entryName: string) => TypeDefinition | null
