#!/usr/bin/env node
import { spawn } from 'child_process';
import { existsSync } from 'fs';
import { COLORS, formatLogLine } from '../src/logging/format.js';

function tailFile(path: string) {
  if (!existsSync(path)) {
    console.error(`File not found: ${path}`);
    process.exit(1);
  }

  const tail = spawn('tail', ['-f', path]);

  tail.stdout.on('data', (data: Buffer) => {
    const lines = data.toString().split('\n').filter((l) => l.trim());
    lines.forEach((line) => {
      console.log(formatLogLine(line));
    });
  });

  tail.stderr.on('data', (data: Buffer) => {
    console.error(`tail error: ${data.toString()}`);
  });

  tail.on('close', (code) => {
    process.exit(code || 0);
  });

  process.on('SIGINT', () => {
    tail.kill();
    process.exit(0);
  });
}

const args = process.argv.slice(2);
const filePath = args[0] || process.env.PUBSUB_WEBHOOK_LOG;

if (!filePath) {
  console.error('Usage: tail-log.ts <path-to-jsonl-file>');
  console.error('   or: PUBSUB_WEBHOOK_LOG=/path/to/file.jsonl tail-log.ts');
  process.exit(1);
}

console.log(`${COLORS.bold}Tailing webhook log from: ${filePath}${COLORS.reset}\n`);
tailFile(filePath);
