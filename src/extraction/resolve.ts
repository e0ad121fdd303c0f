import { DomNode } from '../types/renderer';
import { FieldStrategy } from './profile';

// A query that finds nothing, or a node that detached mid-read, is normal
// on partially rendered listing pages: every DOM access degrades to "absent".

export async function safeQuery(node: DomNode, selector: string): Promise<DomNode | null> {
  try {
    return await node.query(selector);
  } catch {
    return null;
  }
}

export async function safeQueryAll(node: DomNode, selector: string): Promise<DomNode[]> {
  try {
    return await node.queryAll(selector);
  } catch {
    return [];
  }
}

export async function safeText(node: DomNode): Promise<string> {
  try {
    return (await node.text()) ?? '';
  } catch {
    return '';
  }
}

export async function safeAttribute(node: DomNode, name: string): Promise<string> {
  try {
    return (await node.attribute(name)) ?? '';
  } catch {
    return '';
  }
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function firstGroup(match: RegExpMatchArray): string {
  return collapseWhitespace(match[1] ?? match[0]);
}

/**
 * Search free text with a field's fallback pattern
 */
export function matchText(text: string, pattern: RegExp): string | null {
  const match = text.match(pattern);
  if (!match) return null;
  const value = firstGroup(match);
  return value || null;
}

/**
 * Resolve one field inside `scope`: first selector whose text passes the
 * shape predicate wins; otherwise the text pattern over `scopeText` (read
 * from the scope when not supplied). Returns null when nothing qualifies.
 */
export async function resolveField(
  scope: DomNode,
  strategy: FieldStrategy,
  scopeText?: string
): Promise<string | null> {
  for (const selector of strategy.selectors) {
    const candidate = await safeQuery(scope, selector);
    if (!candidate) continue;

    const text = collapseWhitespace(await safeText(candidate));
    if (!text) continue;

    const match = text.match(strategy.accept);
    if (match) {
      return strategy.take === 'match' ? firstGroup(match) : text;
    }
  }

  if (!strategy.textPattern) return null;

  const text = scopeText ?? (await safeText(scope));
  return matchText(text, strategy.textPattern);
}
