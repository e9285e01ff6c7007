// ─────────────────────────────────────────────────────────────
// zscribe  ·  Run Configuration Tests
// ─────────────────────────────────────────────────────────────

import { describe, it, expect } from 'vitest';
import { describeWarning, resolveOptions } from '../core/config';

describe('resolveOptions', () => {
    it('falls back to the defaults', () => {
        expect(resolveOptions({}, {})).toEqual({ mode: 'fuzz', overflowThreshold: 100 });
    });

    it('reads the environment', () => {
        expect(resolveOptions({}, { ZSCRIBE_MODE: 'zed', ZSCRIBE_OVERFLOW: '80' })).toEqual({ mode: 'standard', overflowThreshold: 80 });
        expect(resolveOptions({}, { ZSCRIBE_MODE: 'standard' }).mode).toBe('standard');
    });

    it('ignores values it does not understand', () => {
        expect(resolveOptions({}, { ZSCRIBE_MODE: 'latex', ZSCRIBE_OVERFLOW: '0' })).toEqual({ mode: 'fuzz', overflowThreshold: 100 });
        expect(resolveOptions({}, { ZSCRIBE_OVERFLOW: '12abc' }).overflowThreshold).toBe(100);
    });

    it('lets flags win over the environment', () => {
        const env = { ZSCRIBE_MODE: 'fuzz', ZSCRIBE_OVERFLOW: '80' };
        expect(resolveOptions({ zed: true, overflow: 60 }, env)).toEqual({ mode: 'standard', overflowThreshold: 60 });
        expect(resolveOptions({ zed: false }, { ZSCRIBE_MODE: 'zed' }).mode).toBe('standard');
    });
});

describe('describeWarning', () => {
    it('describes long lines', () => {
        expect(describeWarning({ tag: 'Overflow', line: 12, length: 130, threshold: 100 }))
            .toBe('[Overflow] Output line 12 is 130 characters (limit 100)');
    });

    it('describes each label problem', () => {
        expect(describeWarning({ tag: 'Discharge', line: 3, label: 2, reason: 'undefined' }))
            .toBe('[Proof] Line 3: label [2] is not defined');
        expect(describeWarning({ tag: 'Discharge', line: 4, label: 1, reason: 'out-of-scope' }))
            .toBe('[Proof] Line 4: label [1] is not in scope here');
        expect(describeWarning({ tag: 'Discharge', line: 5, label: 1, reason: 'duplicate' }))
            .toBe('[Proof] Line 5: label [1] is defined more than once');
    });
});
