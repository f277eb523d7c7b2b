// Types
export * from './types/surface'
export * from './types/events'
export * from './types/config'

// Core analysis
export * from './core/signature'
export * from './core/signature-set'
export * from './core/classifier'
export * from './core/scanner'
export * from './core/novelty'
export * from './core/analyser'

// Baseline
export * from './baseline/baseline-index'
export * from './baseline/exporter'

// Candidate surface
export * from './surface/archive'
export * from './surface/candidates'
export * from './surface/provider'

// Parsers
export * as parsers from './parsers/typedef'

// Reporting
export * from './report/report-writer'

// Configuration and errors
export * from './config-loader'
export * from './utils/errors'

// Events
export * from './events'
