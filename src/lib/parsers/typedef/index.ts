import { TypeDefinitionParser } from './types'
import { standardParser } from './standard'
import { TypeDefinition } from '../../types/surface'

// Array of all available type definition parsers.
// To add a new format, create a new parser and add it to this list.
const parsers: TypeDefinitionParser[] = [
  standardParser
]

/**
 * Attempts to parse an entry payload using a series of registered parsers.
 * Returns the first successfully parsed definition.
 * @param payload The entry payload.
 * @param entryName The archive entry path.
 * @returns A parsed TypeDefinition or null if no parser succeeds.
 */
export function parseTypeDefinition(payload: unknown, entryName: string): TypeDefinition | null {
  for (const parser of parsers) {
    const result = parser(payload, entryName)
    if (result) {
      return result
    }
  }
  return null
}

export type { TypeDefinitionParser } from './types'
export { standardParser } from './standard'
