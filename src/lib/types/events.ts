/**
 * Event system for structured logging throughout an analysis run.
 * The report goes to its own destination; everything else is an event.
 */

export type EventLevel = 'info' | 'warn' | 'error' | 'debug'

export interface BaseEvent {
  type: string
  timestamp: Date
  level: EventLevel
}

// Input loading events
export interface BaselineLoadingStartedEvent extends BaseEvent {
  type: 'baseline_loading_started'
  level: 'info'
  data: {
    path: string
  }
}

export interface BaselineLoadedEvent extends BaseEvent {
  type: 'baseline_loaded'
  level: 'info'
  data: {
    typeCount: number
    signatureCount: number
    skippedRecords: number
  }
}

export interface BaselineRecordSkippedEvent extends BaseEvent {
  type: 'baseline_record_skipped'
  level: 'warn'
  data: {
    lineNumber: number
    reason: string
  }
}

export interface ArchiveLoadedEvent extends BaseEvent {
  type: 'archive_loaded'
  level: 'info'
  data: {
    path: string
    entryCount: number
    candidateCount: number
  }
}

// Classification and scanning events
export interface ContractTypesFoundEvent extends BaseEvent {
  type: 'contract_types_found'
  level: 'info'
  data: {
    count: number
  }
}

export interface TypeNotFoundEvent extends BaseEvent {
  type: 'type_not_found'
  level: 'warn'
  data: {
    typeName: string
    reason: string
  }
}

export interface ScanStartedEvent extends BaseEvent {
  type: 'scan_started'
  level: 'info'
  data: {
    typeCount: number
    target?: string
  }
}

export interface ScanCompletedEvent extends BaseEvent {
  type: 'scan_completed'
  level: 'info'
  data: {
    typeCount: number
    parameterTypeCount: number
    sourceTypeCount: number
    unresolvedCount: number
    target?: string
  }
}

// Statistics
export interface ParameterUsageSummaryEvent extends BaseEvent {
  type: 'parameter_usage_summary'
  level: 'info'
  data: {
    methodCount: number
    newMethodCount: number
    typeCount: number
  }
}

export interface SourceUsageSummaryEvent extends BaseEvent {
  type: 'source_usage_summary'
  level: 'info'
  data: {
    methodCount: number
    typeCount: number
  }
}

export interface ReportWrittenEvent extends BaseEvent {
  type: 'report_written'
  level: 'info'
  data: {
    destination: string
  }
}

// Process-level events
export interface CLIErrorEvent extends BaseEvent {
  type: 'cli_error'
  level: 'error'
  data: {
    message: string
  }
}

export interface UnhandledRejectionEvent extends BaseEvent {
  type: 'unhandled_rejection'
  level: 'error'
  data: {
    reason: unknown
  }
}

export interface UncaughtExceptionEvent extends BaseEvent {
  type: 'uncaught_exception'
  level: 'error'
  data: {
    error: unknown
  }
}

export interface DebugInfoEvent extends BaseEvent {
  type: 'debug_info'
  level: 'debug' | 'info' | 'warn'
  data: {
    message: string
  }
}

// Union type of all events
export type SurfaceEvent =
  | BaselineLoadingStartedEvent
  | BaselineLoadedEvent
  | BaselineRecordSkippedEvent
  | ArchiveLoadedEvent
  | ContractTypesFoundEvent
  | TypeNotFoundEvent
  | ScanStartedEvent
  | ScanCompletedEvent
  | ParameterUsageSummaryEvent
  | SourceUsageSummaryEvent
  | ReportWrittenEvent
  | CLIErrorEvent
  | UnhandledRejectionEvent
  | UncaughtExceptionEvent
  | DebugInfoEvent

export type SurfaceEventType = SurfaceEvent['type']

type WithoutTimestamp<E> = E extends SurfaceEvent ? Omit<E, 'timestamp'> : never

/**
 * An event as passed to `emitEvent`: the emitter adds the timestamp.
 */
export type EmittableEvent = WithoutTimestamp<SurfaceEvent>
