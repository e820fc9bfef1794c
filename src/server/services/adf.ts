// =============================================================================
// ADF (Atlassian Document Format) ⇄ plain text
// =============================================================================
// JIRA REST v3 takes and returns rich-text fields (description) as ADF. The
// gateway's internal model is plain text, so we wrap text paragraphs on the
// way in and flatten the tree on the way out.
// =============================================================================

export interface ADFNode {
  type: string;
  text?: string;
  content?: ADFNode[];
  attrs?: Record<string, unknown>;
}

export interface ADFDocument {
  type: 'doc';
  version: 1;
  content: ADFNode[];
}

/** Text-bearing blocks; each one ends a line when flattened */
const BLOCK_TYPES = new Set(['paragraph', 'heading', 'codeBlock']);

/**
 * Wraps plain text in an ADF doc: one paragraph per line, empty lines become
 * empty paragraphs.
 */
export function textToAdf(text: string): ADFDocument {
  const content: ADFNode[] = text.split(/\r?\n/).map((line) =>
    line.length
      ? { type: 'paragraph', content: [{ type: 'text', text: line }] }
      : { type: 'paragraph', content: [] },
  );
  return { type: 'doc', version: 1, content };
}

export function isAdfNode(value: unknown): value is ADFNode {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    typeof value.type === 'string'
  );
}

/**
 * Flattens an ADF tree to text. Strings pass through (JIRA v2 style
 * payloads); anything else yields `null`.
 */
export function adfToText(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (!isAdfNode(value)) return null;

  const lines: string[] = [];
  let current = '';

  const visit = (node: ADFNode): void => {
    if (node.type === 'text' && node.text) {
      current += node.text;
    } else if (node.type === 'hardBreak') {
      lines.push(current);
      current = '';
    }
    for (const child of node.content ?? []) {
      visit(child);
    }
    if (BLOCK_TYPES.has(node.type)) {
      lines.push(current);
      current = '';
    }
  };

  for (const child of value.content ?? []) {
    visit(child);
  }
  if (current) lines.push(current);

  return lines.join('\n');
}
