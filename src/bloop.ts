#!/usr/bin/env node
// src/bloop.ts
import fs from 'fs';
import { runCli } from './cli.js';

try {
    process.exitCode = runCli(process.argv.slice(2), {
        stdout: text => process.stdout.write(text),
        stderr: text => process.stderr.write(text),
        readFile: file => fs.readFileSync(file, 'utf8'),
        random: Math.random,
        clock: () => process.hrtime.bigint(),
    });
} catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : 'Unknown error'}`);
    process.exitCode = 1;
}
