import { isSyntheticName } from '../core/classifier'
import { SurfaceEventEmitter, surfaceEvents } from '../events'
import { TypeMetadataProvider } from '../types/surface'
import { BASELINE_FIELD_SEPARATOR } from './baseline-index'

/**
 * Produces baseline records for a surface, so one release's archive can serve as the
 * baseline for the next. Types without methods get a bare record.
 */
export function exportBaselineRecords(
  typeNames: Iterable<string>,
  provider: TypeMetadataProvider,
  events: SurfaceEventEmitter = surfaceEvents
): string[] {
  const records: string[] = []

  for (const typeName of [...typeNames].sort()) {
    const resolved = provider.resolve(typeName)
    if (!resolved.found) {
      events.emitEvent({
        type: 'type_not_found',
        level: 'warn',
        data: { typeName, reason: resolved.reason }
      })
      continue
    }

    const operations = resolved.type.operations.filter(operation => !isSyntheticName(operation.name))
    if (operations.length === 0) {
      records.push(typeName)
      continue
    }
    for (const operation of operations) {
      records.push([typeName, operation.name, ...operation.parameters].join(BASELINE_FIELD_SEPARATOR))
    }
  }

  return records
}
