#!/usr/bin/env tsx
// ─────────────────────────────────────────────────────────────
// zscribe  ·  Command Line
// ─────────────────────────────────────────────────────────────

import { Command, InvalidArgumentError } from 'commander';
import { readFileSync } from 'fs';
import { readFile, writeFile } from 'fs/promises';
import { dirname, extname, join } from 'path';
import { fileURLToPath } from 'url';
import { describeWarning, resolveOptions, type CliFlags } from './core/config';
import { ZscribeError, formatError } from './core/errors';
import { generateHtml } from './emitters/html';
import { DEFAULT_OPTIONS, generate } from './emitters/latex';
import type { Document } from './parser/ast';
import { parse } from './parser/document';

interface CliOptions extends CliFlags {
    output?: string;
    html?: boolean;
    warnOverflow: boolean;
}

const here = dirname(fileURLToPath(import.meta.url));
const pkg: unknown = JSON.parse(readFileSync(join(here, '..', 'package.json'), 'utf-8'));
const version = typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';

function positiveInt(value: string): number {
    const n = Number.parseInt(value, 10);
    if (!Number.isInteger(n) || n <= 0 || String(n) !== value.trim()) {
        throw new InvalidArgumentError('Expected a positive whole number.');
    }
    return n;
}

async function run(input: string, flags: CliOptions): Promise<void> {
    const opts = resolveOptions(flags, process.env);
    const source = await readFile(input, 'utf-8');
    const target = flags.output ?? input.slice(0, input.length - extname(input).length) + (flags.html ? '.html' : '.tex');

    if (target === input) {
        console.error(`[CLI] Refusing to overwrite ${input}; choose an output file with -o`);
        process.exitCode = 1;
        return;
    }

    let doc: Document;
    try {
        doc = parse(source);
    } catch (err) {
        if (!(err instanceof ZscribeError)) throw err;
        console.error(formatError(err, source));
        process.exitCode = 1;
        return;
    }

    if (flags.html) {
        await writeFile(target, generateHtml(doc), 'utf-8');
    } else {
        const { output, warnings } = generate(doc, opts.mode, opts.overflowThreshold);
        await writeFile(target, output, 'utf-8');
        for (const warning of warnings) {
            if (warning.tag === 'Overflow' && !flags.warnOverflow) continue;
            console.warn(describeWarning(warning));
        }
    }
    console.log(`[CLI] Wrote ${target}`);
}

const program = new Command();

program
    .name('zscribe')
    .description('Convert whiteboard-style Z notation into LaTeX')
    .version(version)
    .argument('<input>', 'Text file written in whiteboard notation')
    .option('-o, --output <file>', 'Output file (default: input with .tex or .html)')
    .option('--zed', 'Use the zed-cm and zed-maths packages instead of fuzz')
    .option('--html', 'Write an HTML preview rendered with KaTeX')
    .option('--overflow <n>', `Warn about output lines longer than n characters (default: ${DEFAULT_OPTIONS.overflowThreshold})`, positiveInt)
    .option('--no-warn-overflow', 'Do not report long output lines')
    .action(run);

await program.parseAsync();
