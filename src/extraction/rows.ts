import { DomNode } from '../types/renderer';
import { RowStrategy } from './profile';
import { safeQueryAll, safeText } from './resolve';

export interface UnitRow {
  node: DomNode;
  text: string;
}

export interface RowDiscovery {
  rows: UnitRow[];
  selector: string | null;
}

/**
 * True when the row text looks like a unit: not a header, has a price and
 * a room identifier or layout code
 */
export function isUnitRowText(text: string, strategy: RowStrategy): boolean {
  if (!text) return false;
  if (strategy.headerLabels.some(label => text.includes(label))) return false;
  return strategy.pricePattern.test(text) && strategy.identifierPattern.test(text);
}

/**
 * Walk the row selectors from most to least specific. The first selector
 * that yields at least one qualifying row decides the result; rows from
 * different selectors are never merged.
 */
export async function findUnitRows(page: DomNode, strategy: RowStrategy): Promise<RowDiscovery> {
  for (const selector of strategy.selectors) {
    const candidates = await safeQueryAll(page, selector);
    if (candidates.length === 0) continue;

    const rows: UnitRow[] = [];
    for (const node of candidates) {
      const text = await safeText(node);
      if (isUnitRowText(text, strategy)) {
        rows.push({ node, text });
      }
    }

    if (rows.length > 0) {
      return { rows, selector };
    }
  }

  return { rows: [], selector: null };
}
