#!/usr/bin/env node

/**
 * System information utility
 * Usage: npm run sysinfo
 */

import {
  formatBytes,
  getDirectorySize,
  getSystemInfo,
  saveSystemInfo,
  validateRuntimeVersion,
  type SavedSystemInfo,
} from './system-info.js';

// Anything with a stream-style write, e.g. process.stdout
export type TextSink = Pick<NodeJS.WritableStream, 'write'>;

export interface SystemReportOptions {
  out?: TextSink;
  directory?: string;
  outputFile?: string;
  minRuntimeVersion?: string;
}

export async function runSystemReport(options: SystemReportOptions = {}): Promise<SavedSystemInfo> {
  const out = options.out ?? process.stdout;
  const outputFile = options.outputFile ?? 'system_info.json';
  const print = (line: string): void => {
    out.write(`${line}\n`);
  };

  print('=== System Information Utility ===');

  const info = getSystemInfo();
  print(`Platform: ${info.platform} ${info.platformRelease}`);
  print(`Node.js: ${info.runtimeVersion} (${info.runtimeName})`);
  print(`Architecture: ${info.architecture}`);
  print(`Hostname: ${info.hostname}`);

  if (validateRuntimeVersion(options.minRuntimeVersion)) {
    print('✅ Node.js version meets requirements');
  } else {
    print('❌ Node.js version below minimum requirements');
  }

  const size = await getDirectorySize(options.directory ?? '.');
  print(`Current directory size: ${formatBytes(size)}`);

  const saved = await saveSystemInfo(outputFile);
  print(`System info saved to: ${outputFile}`);
  print(`Generated at: ${saved.timestamp}`);

  return saved;
}

// Run report if this file is executed directly
if (import.meta.url === `file://${process.argv[1]}`) {
  runSystemReport().catch((error) => {
    process.stderr.write(`FATAL_ERROR: ${error instanceof Error ? error.stack : String(error)}\n`);
    process.exit(1);
  });
}
