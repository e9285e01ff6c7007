// ─────────────────────────────────────────────────────────────
// zscribe  ·  HTML Preview Tests
// ─────────────────────────────────────────────────────────────

import { describe, it, expect } from 'vitest';
import { generateHtml, typeset } from '../emitters/html';
import { parse } from '../parser/document';

function html(source: string): string {
    return generateHtml(parse(source));
}

describe('typeset', () => {
    it('knows the Z commands', () => {
        expect(typeset('A \\pfun B')).toContain('class="katex"');
        expect(typeset('A \\pfun B')).not.toContain('katex-error');
    });

    it('renders unknown commands in place', () => {
        expect(typeset('\\notacommand')).toContain('katex-error');
    });
});

describe('generateHtml', () => {
    it('writes a standalone page with a title block', () => {
        const page = html('TITLE: Notes\nAUTHOR: Sam\nDATE: May\nx');
        expect(page.startsWith('<!DOCTYPE html>\n<html lang="en">\n<head>\n<meta charset="utf-8">\n<title>Notes</title>\n')).toBe(true);
        expect(page).toContain('\n<header>\n<h1>Notes</h1>\n<p class="byline">Sam · May</p>\n</header>\n');
        expect(page.endsWith('</body>\n</html>\n')).toBe(true);
    });

    it('links the contents to numbered sections', () => {
        const page = html('CONTENTS:\n=== A & B ===\nx\n=== C ===\ny');
        expect(page).toContain('<nav class="toc">\n<ul>\n<li><a href="#section-1">A &amp; B</a></li>\n<li><a href="#section-2">C</a></li>\n</ul>\n</nav>');
        expect(page).toContain('<section id="section-1">\n<h2>A &amp; B</h2>\n');
        expect(page).toContain('<section id="section-2">\n<h2>C</h2>\n');
    });

    it('displays formulas', () => {
        expect(html('x = 1')).toContain('<div class="formula"><span class="katex-display">');
    });

    it('labels solutions and parts', () => {
        const page = html('** Solution 1 **\n(a) PAGEBREAK:');
        expect(page).toContain('<div class="solution">\n<h3>Solution 1</h3>\n<div class="part">\n<strong>(a)</strong>\n<hr class="page-break">\n</div>\n</div>');
    });

    it('draws schemas as boxes', () => {
        const page = html('schema S\n  x : N\nwhere\n  x > 0\nend');
        expect(page).toContain('<div class="z-box">\n<div class="z-box-title"><span class="katex">');
        expect(page).toContain('<hr class="z-where">\n<div class="z-pred">');
    });

    it('leaves an axdef untitled', () => {
        const page = html('axdef\n  x : N\nend');
        expect(page).toContain('<div class="z-box">\n<div class="z-decl">');
        expect(page).not.toContain('z-box-title');
        expect(page).not.toContain('z-where');
    });

    it('spaces blank-line groups of predicates', () => {
        const page = html('axdef\n  x : N\nwhere\n  x > 0\n\n  x < 9\nend');
        expect(page).toContain('</div>\n<div class="z-also"></div>\n<div class="z-pred">');
        expect(page.split('<div class="z-also">')).toHaveLength(2);
    });

    it('draws inference rules with a line between premises and conclusion', () => {
        const page = html('INFRULE:\nA [premise]\nA => B\n---\nB');
        expect(page).toContain('<div class="infrule">\n<div class="infrule-premises"><span class="premise"><span class="katex">');
        expect(page).toContain('</div>\n<hr class="infrule-line">\n<div class="infrule-conclusion"><span class="katex">');
        expect(page.split('<span class="premise">')).toHaveLength(3);
    });

    it('writes truth tables as tables', () => {
        const page = html('TRUTH TABLE:\np | q\nT | F');
        expect(page).toContain('<table class="truth-table">\n<thead><tr><th>');
        expect(page).toContain('<tbody>\n<tr><td>T</td><td>F</td></tr>\n</tbody>\n</table>');
    });

    it('renders the three text modes', () => {
        expect(html('PURETEXT: a < b')).toContain('\n<p>a &lt; b</p>\n');
        expect(html('LATEX: \\vspace{1em}')).toContain('\n<pre class="latex">\\vspace{1em}</pre>\n');
        expect(html('TEXT: see [cite spivey92 p. 4] & more')).toContain('\n<p>see <cite>(spivey92, p. 4)</cite> &amp; more</p>\n');
    });

    it('nests proof steps under their conclusion', () => {
        const page = html('PROOF:\n[1] p [assumption]\n  p or q [or intro from 1]');
        expect(page).toContain('<ul class="proof">\n<li><span class="conclusion">');
        expect(page.split('<span class="rule">')).toHaveLength(3);
    });
});
