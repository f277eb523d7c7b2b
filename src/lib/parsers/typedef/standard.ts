import { TypeDefinitionParser } from './types'
import { OperationRecord, TYPE_KINDS, TypeKind } from '../../types/surface'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item: unknown) => typeof item === 'string')
}

function isTypeKind(value: unknown): value is TypeKind {
  return TYPE_KINDS.some(kind => kind === value)
}

function parseOperation(value: unknown): OperationRecord | null {
  if (!isRecord(value) || typeof value.name !== 'string' || value.name === '') {
    return null
  }

  // parameters, returns and modifiers are optional
  const parameters = value.parameters ?? []
  const returnType = value.returns ?? 'void'
  const modifiers = value.modifiers ?? []
  if (!isStringArray(parameters) || typeof returnType !== 'string' || !isStringArray(modifiers)) {
    return null
  }

  return {
    name: value.name,
    parameters: [...parameters],
    returnType,
    isDefault: modifiers.includes('default'),
    isStatic: modifiers.includes('static'),
    isSynthetic: modifiers.includes('synthetic')
  }
}

/**
 * Parser for the standard type definition format:
 *
 * ```json
 * { "kind": "interface",
 *   "methods": [{ "name": "accept", "parameters": ["java.lang.Object"], "returns": "void", "modifiers": [] }] }
 * ```
 *
 * Directory entries arrive as JSON text, bundle entries as already-parsed objects.
 */
export const standardParser: TypeDefinitionParser = (payload: unknown) => {
  let json: unknown = payload
  if (typeof payload === 'string') {
    try {
      json = JSON.parse(payload)
    } catch {
      // Not valid JSON, so it's not for this parser
      return null
    }
  }

  if (!isRecord(json)) {
    return null
  }
  const kind = json.kind
  if (!isTypeKind(kind)) {
    return null
  }

  const methods = json.methods ?? []
  if (!Array.isArray(methods)) {
    return null
  }

  const operations: OperationRecord[] = []
  for (const method of methods) {
    const operation = parseOperation(method)
    if (!operation) {
      return null
    }
    operations.push(operation)
  }

  return { kind, operations }
}
