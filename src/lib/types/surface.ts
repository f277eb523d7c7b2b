/**
 * Kinds of type definitions found in a candidate archive.
 * Annotation types are interfaces for classification purposes.
 */
export type TypeKind = 'interface' | 'annotation' | 'class' | 'enum' | 'record'

export const TYPE_KINDS: readonly TypeKind[] = ['interface', 'annotation', 'class', 'enum', 'record']

export interface OperationRecord {
  name: string
  parameters: string[]
  returnType: string
  isDefault: boolean
  isStatic: boolean
  isSynthetic: boolean
}

/**
 * A parsed type definition before it is bound to a qualified name.
 */
export interface TypeDefinition {
  kind: TypeKind
  operations: OperationRecord[]
}

export interface TypeRecord extends TypeDefinition {
  qualifiedName: string
}

export type ResolveResult =
  | { found: true; type: TypeRecord }
  | { found: false; reason: string }

/**
 * Supplies the declared operations of a type by qualified name.
 * Implementations report unresolvable names through the result, never by throwing.
 */
export interface TypeMetadataProvider {
  resolve(qualifiedName: string): ResolveResult
}
