// ─────────────────────────────────────────────────────────────
// zscribe  ·  Text Escaping
// ─────────────────────────────────────────────────────────────

const LATEX_SPECIALS: Readonly<Record<string, string>> = {
    '\\': '\\textbackslash{}',
    '{': '\\{',
    '}': '\\}',
    '$': '\\$',
    '&': '\\&',
    '%': '\\%',
    '#': '\\#',
    '_': '\\_',
    '^': '\\^{}',
    '~': '\\~{}',
};

/** Make plain text safe for a LaTeX paragraph. */
export function escapeLatex(text: string): string {
    return text.replace(/[\\{}$&%#_^~]/g, (ch) => LATEX_SPECIALS[ch] ?? ch);
}

const HTML_SPECIALS: Readonly<Record<string, string>> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    '\'': '&#39;',
};

export function escapeHtml(text: string): string {
    return text.replace(/[&<>"']/g, (ch) => HTML_SPECIALS[ch] ?? ch);
}
