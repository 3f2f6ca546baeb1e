// System module exports
export {
  getSystemInfo,
  formatTimestamp,
  calculateFileHash,
  saveSystemInfo,
  validateRuntimeVersion,
  getDirectorySize,
  formatBytes,
  type SystemInfo,
  type SavedSystemInfo,
} from './system-info.js';
export { runSystemReport, type SystemReportOptions, type TextSink } from './report.js';
