export { makeScanCommand, buildScanReport } from './scan'
export { makeExportBaselineCommand } from './export-baseline'
