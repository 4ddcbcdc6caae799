/**
 * Normalization of generated file content before it is written.
 */

import { stripCodeFences } from '@devcrew/crew-contracts';

const LITERAL_ESCAPE = /\\[ntr]/;
const ESCAPE_SEQUENCE = /\\(u[0-9a-fA-F]{4}|x[0-9a-fA-F]{2}|[ntr"'\\])/g;

const SIMPLE_ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '"': '"',
  "'": "'",
  '\\': '\\',
};

function unescapeSequences(text: string): string {
  return text.replace(ESCAPE_SEQUENCE, (match: string, body: string) => {
    if (body.length > 1) {
      return String.fromCharCode(parseInt(body.slice(1), 16));
    }
    return SIMPLE_ESCAPES[body] ?? match;
  });
}

/**
 * Strips a surrounding code fence, unescapes literal `\n`/`\t`/`\r` style
 * sequences when present and guarantees a trailing newline.
 */
export function sanitizeGeneratedContent(text: string): string {
  let content = text.trim();

  if (content.startsWith('```')) {
    content = stripCodeFences(content);
  }

  if (LITERAL_ESCAPE.test(content)) {
    content = unescapeSequences(content);
  }

  return content.endsWith('\n') ? content : `${content}\n`;
}
