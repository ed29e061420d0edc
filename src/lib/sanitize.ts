import path from 'node:path';

export const SANITIZED_EXTENSIONS: ReadonlySet<string> = new Set([
  '.c', '.cpp', '.h', '.hpp', '.cc', '.cxx', '.c++', '.h++', '.cs',
  '.m', '.mm',
  '.java',
  '.js', '.jsx', '.ts', '.tsx',
  '.proto',
  '.swift',
  '.kt',
  '.go',
  '.rs',
]);

const BLOCK_COMMENT = /\/\*[\s\S]*?\*\//g;
const LINE_COMMENT = /\/\/.*$/gm;

export function isSanitizable(filePath: string): boolean {
  return SANITIZED_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

/**
 * Strip C-style comments so diffs ignore comment-only edits.
 *
 * This is a lexical pass, not a tokenizer: `//` or `/*` inside a string or
 * character literal is treated as a comment too.
 */
export function sanitize(content: string | undefined, filePath: string): string | undefined {
  if (content === undefined) return undefined;
  if (!content.trim()) return '';
  if (!isSanitizable(filePath)) return content;
  return content.replace(BLOCK_COMMENT, '').replace(LINE_COMMENT, '');
}
