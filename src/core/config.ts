// ─────────────────────────────────────────────────────────────
// zscribe  ·  Run Configuration
// ─────────────────────────────────────────────────────────────

import { DEFAULT_OPTIONS, type GenerateOptions, type Warning } from '../emitters/latex';
import type { NotationMode } from './symbols';

export interface CliFlags {
    zed?: boolean;
    overflow?: number;
}

function modeFromEnv(value: string | undefined): NotationMode | undefined {
    switch (value) {
        case 'fuzz': return 'fuzz';
        case 'standard':
        case 'zed': return 'standard';
        default: return undefined;
    }
}

/** Flags first, then ZSCRIBE_MODE and ZSCRIBE_OVERFLOW, then the defaults. */
export function resolveOptions(flags: CliFlags, env: Readonly<Record<string, string | undefined>>): GenerateOptions {
    const envMode = modeFromEnv(env.ZSCRIBE_MODE);
    const rawOverflow = env.ZSCRIBE_OVERFLOW;
    const envOverflow = rawOverflow !== undefined && /^[1-9]\d*$/.test(rawOverflow)
        ? Number.parseInt(rawOverflow, 10)
        : undefined;

    return {
        ...DEFAULT_OPTIONS,
        ...(envMode !== undefined ? { mode: envMode } : {}),
        ...(envOverflow !== undefined ? { overflowThreshold: envOverflow } : {}),
        ...(flags.zed === true ? { mode: 'standard' } : {}),
        ...(flags.overflow !== undefined ? { overflowThreshold: flags.overflow } : {}),
    };
}

export function describeWarning(warning: Warning): string {
    switch (warning.tag) {
        case 'Overflow':
            return `[Overflow] Output line ${warning.line} is ${warning.length} characters (limit ${warning.threshold})`;
        case 'Discharge':
            switch (warning.reason) {
                case 'duplicate': return `[Proof] Line ${warning.line}: label [${warning.label}] is defined more than once`;
                case 'undefined': return `[Proof] Line ${warning.line}: label [${warning.label}] is not defined`;
                case 'out-of-scope': return `[Proof] Line ${warning.line}: label [${warning.label}] is not in scope here`;
            }
    }
}
