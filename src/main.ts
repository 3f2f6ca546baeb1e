#!/usr/bin/env node

import fs from 'node:fs';
import { formatTimestamp, getSystemInfo, type SystemInfo, type TextSink } from './system/index.js';

export const APP_NAME = 'sysinfo-greeter';

export function formatGreeting(name: string, now: Date = new Date()): string {
  return `Hello from ${name}! Current time: ${formatTimestamp(now)}`;
}

export function buildGreetingLines(now: Date = new Date(), info: SystemInfo = getSystemInfo()): string[] {
  return [
    formatGreeting(APP_NAME, now),
    `Running on: ${info.platform} ${info.platformRelease}`,
    `Node.js version: ${info.runtimeVersion}`,
  ];
}

export function runGreeting(out: TextSink = process.stdout, now: Date = new Date()): void {
  for (const line of buildGreetingLines(now)) {
    out.write(`${line}\n`);
  }
}

function readVersion(): string {
  // package.json sits one level above both src/ and dist/
  const manifest: unknown = JSON.parse(
    fs.readFileSync(new URL('../package.json', import.meta.url), 'utf-8')
  );
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return '0.0.0';
}

async function main(args: string[]): Promise<void> {
  const isHelp = args.includes('--help') || args.includes('-h');
  const isVersion = args.includes('--version') || args.includes('-v');

  if (isHelp) {
    process.stderr.write(`
${APP_NAME} - print a greeting with the current time and system information

Usage: npm start [options]

Options:
  -h, --help     Show this help message
  -v, --version  Show version information

Related scripts:
  npm run demo:logging   Write sample log lines to the console and logs/
  npm run sysinfo        Print a system report and save system_info.json

Environment Variables:
  APP_CONFIG_FILE    INI configuration file (default: config/config.ini)
  LOG_LEVEL          Log level (debug, info, warn, error)
  LOG_DIR            Log directory (default: logs)
`);
    return;
  }

  if (isVersion) {
    process.stderr.write(`${APP_NAME} v${readVersion()}\nNode.js ${process.version}\n`);
    return;
  }

  runGreeting();
}

// Start if this file is run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  main(process.argv.slice(2)).catch((error) => {
    process.stderr.write(`FATAL_ERROR: ${error instanceof Error ? error.stack : String(error)}\n`);
    process.exit(1);
  });
}
